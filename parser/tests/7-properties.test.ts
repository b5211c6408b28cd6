import * as fc from 'fast-check';
import { describe, expect, test } from 'vitest';
import { createLogger } from '../logger.js';
import { plainText } from '../node-traversal.js';
import type { ParseDiagnostic } from '../parser-interfaces.js';
import { findTagSpans } from '../tag-span.js';
import { createTagParser } from '../tag-parser.js';
import { escapeTags, stripTags, unescapeTags } from '../tag-text.js';

const logger = createLogger({ level: 'silent' });

const markupChars = ['<', '>', '/', ':', '\\', '\'', '"', ' ', 'a', 'r', 'e', 'd', 'b', '#'];
const markupArb = fc.array(fc.constantFrom(...markupChars), { maxLength: 40 }).map(chars => chars.join(''));

const plainArb = fc.array(fc.constantFrom('a', 'b', ' ', ':', '>', '/', '\'', '#'), { maxLength: 40 })
  .map(chars => chars.join(''));

// No quotes: without them the span matcher and the scanner agree on what a tag is
const quotelessArb = fc.array(fc.constantFrom('<', '>', '/', ':', '\\', ' ', 'x', 'y'), { maxLength: 40 })
  .map(chars => chars.join(''));

const unclosedArb = fc.array(fc.constantFrom(':b', ':\'', ':"', '<a', '\\', ' '), { maxLength: 3000 })
  .map(pieces => '<a' + pieces.join(''));

const tagPieces = ['<red>', '</red>', '<bold>', '</bold>', '<br>'];
const piecesArb = fc.array(fc.constantFrom('a', 'b', ' ', ':', ...tagPieces), { maxLength: 20 });

describe('Properties', () => {
  test('lenient parsing never throws and reports in-range offsets', () => {
    fc.assert(
      fc.property(markupArb, text => {
        const diagnostics: ParseDiagnostic[] = [];
        createTagParser({ logger, onDiagnostic: d => diagnostics.push(d) }).parse(text);

        for (const diagnostic of diagnostics) {
          expect(diagnostic.pos).toBeGreaterThanOrEqual(0);
          expect(diagnostic.end).toBeLessThanOrEqual(text.length);
          expect(diagnostic.pos).toBeLessThan(diagnostic.end);
        }
      }),
      { numRuns: 300 }
    );
  });

  test('text without tag markers parses to itself', () => {
    const parser = createTagParser({ logger });

    fc.assert(
      fc.property(plainArb, text => {
        expect(plainText(parser.parse(text))).toBe(text);
      })
    );
  });

  test('escaped markup reads back as its source text', () => {
    fc.assert(
      fc.property(piecesArb, pieces => {
        const text = pieces.join('');
        const diagnostics: ParseDiagnostic[] = [];
        const parser = createTagParser({ logger, onDiagnostic: d => diagnostics.push(d) });

        expect(plainText(parser.parse(escapeTags(text)))).toBe(text);
        expect(diagnostics).toEqual([]);
      })
    );
  });

  test('text without tag spans is unchanged by every operation', () => {
    const parser = createTagParser({ logger });

    fc.assert(
      fc.property(quotelessArb.filter(text => findTagSpans(text).length === 0), text => {
        expect(escapeTags(text)).toBe(text);
        expect(stripTags(text)).toBe(text);
        expect(plainText(parser.parse(text))).toBe(text);
      }),
      { numRuns: 300 }
    );
  });

  test('unescape reverses escape for arbitrary markup', () => {
    fc.assert(
      fc.property(markupArb, text => {
        const escaped = escapeTags(text);
        expect(unescapeTags(escaped)).toBe(text);
        expect(unescapeTags(escapeTags(escaped))).toBe(escaped);
      }),
      { numRuns: 500 }
    );
  });

  test('text utilities finish quickly on long unclosed tags', () => {
    const started = performance.now();

    fc.assert(
      fc.property(unclosedArb, text => {
        expect(stripTags(text)).toBe(text);
        expect(escapeTags(text)).toBe(text);
      }),
      { numRuns: 50 }
    );
    expect(performance.now() - started).toBeLessThan(5000);
  });

  test('unescape reverses escape', () => {
    fc.assert(
      fc.property(piecesArb, pieces => {
        const text = pieces.join('');
        expect(unescapeTags(escapeTags(text))).toBe(text);
      })
    );
  });

  test('strip keeps exactly the text between tags', () => {
    fc.assert(
      fc.property(piecesArb, pieces => {
        const expected = pieces.filter(piece => !tagPieces.includes(piece)).join('');
        expect(stripTags(pieces.join(''))).toBe(expected);
      })
    );
  });
});
