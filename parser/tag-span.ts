/**
 * Tag-Span Matcher
 *
 * Delimits tag-shaped text in raw markup: `<`, a body of `:`-separated
 * segments (a segment may be quoted, with backslash-escaped quotes inside),
 * then `>`. It does not decide whether a span names a real tag.
 */

import { CharacterCodes, isQuote } from './scanner/character-codes.js';

export interface TagSpan {
  /** Offset of the opening `<` */
  start: number;

  /** Offset just past the closing `>` */
  end: number;

  /** Everything between the brackets */
  body: string;

  /** Last quoted argument segment, quotes included, if the body has one */
  inner: string | undefined;

  /** Offset of `inner` within `body` */
  innerOffset: number;
}

/**
 * Finds every tag span, left to right, without overlap, in one forward pass.
 * The first `>` outside quotes ends a span. Before the first `:` an unquoted
 * `<` restarts the candidate; after it, `<` belongs to the argument.
 */
export function findTagSpans(text: string): TagSpan[] {
  const spans: TagSpan[] = [];
  let start = text.indexOf('<');
  let pos = start + 1;
  let inner: string | undefined;
  let innerOffset = -1;
  let inArguments = false;

  while (start >= 0 && pos < text.length) {
    const ch = text.charCodeAt(pos);

    if (ch === CharacterCodes.greaterThan) {
      if (pos > start + 1) {
        spans.push({ start, end: pos + 1, body: text.slice(start + 1, pos), inner, innerOffset });
      }
      start = text.indexOf('<', pos + 1);
      pos = start + 1;
      inner = undefined;
      innerOffset = -1;
      inArguments = false;
      continue;
    }

    if (ch === CharacterCodes.lessThan && !inArguments) {
      start = pos++;
      continue;
    }

    if (ch === CharacterCodes.colon) {
      inArguments = true;
      pos++;
      continue;
    }

    if (isQuote(ch) && text.charCodeAt(pos - 1) === CharacterCodes.colon) {
      const close = closingQuote(text, pos);
      // Unclosed: the quote is an ordinary character
      if (close >= 0) {
        inner = text.slice(pos, close + 1);
        innerOffset = pos - start - 1;
        pos = close + 1;
        continue;
      }
    }

    pos++;
  }

  return spans;
}

/**
 * Rebuilds text by replacing every tag span; text between spans is kept
 * verbatim. Shared by the escape and strip utilities.
 */
export function mapTagSpans(text: string, mapSpan: (span: TagSpan) => string): string {
  let output = '';
  let lastEnd = 0;

  for (const span of findTagSpans(text)) {
    if (span.start > lastEnd) output += text.slice(lastEnd, span.start);
    output += mapSpan(span);
    lastEnd = span.end;
  }

  if (text.length > lastEnd) output += text.slice(lastEnd);
  return output;
}

function closingQuote(text: string, open: number): number {
  const quote = text.charCodeAt(open);
  for (let i = open + 1; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === CharacterCodes.backslash && isQuote(text.charCodeAt(i + 1))) i++;
    else if (ch === quote) return i;
  }
  return -1;
}
