/**
 * Escape / Strip Utilities
 *
 * Pure text rewrites over the tag-span grammar. Text outside matched spans
 * is kept verbatim and in order.
 */

import { CharacterCodes } from './scanner/character-codes.js';
import { findTagSpans, mapTagSpans, type TagSpan } from './tag-span.js';

export const ESCAPE_MARKER = '\\';

/**
 * Prefixes every tag span with the escape marker. Quoted argument segments
 * are escaped too, so tags nested in an argument stay literal.
 */
export function escapeTags(text: string): string {
  return mapTagSpans(text, span => ESCAPE_MARKER + '<' + mapInner(span, escapeTags) + '>');
}

/**
 * Deletes every tag span
 */
export function stripTags(text: string): string {
  return mapTagSpans(text, () => '');
}

/**
 * Reverses escapeTags: drops the marker directly in front of each span and
 * inside quoted argument segments. Backslashes anywhere else are kept.
 */
export function unescapeTags(text: string): string {
  let output = '';
  let lastEnd = 0;

  for (const span of findTagSpans(text)) {
    const marked = span.start > lastEnd && text.charCodeAt(span.start - 1) === CharacterCodes.backslash;
    output += text.slice(lastEnd, marked ? span.start - 1 : span.start);
    output += '<' + mapInner(span, unescapeTags) + '>';
    lastEnd = span.end;
  }

  if (text.length > lastEnd) output += text.slice(lastEnd);
  return output;
}

function mapInner(span: TagSpan, rewrite: (text: string) => string): string {
  if (span.inner === undefined) return span.body;
  const after = span.innerOffset + span.inner.length;
  return span.body.slice(0, span.innerOffset) + rewrite(span.inner) + span.body.slice(after);
}
