import {
  CharacterCodes,
  isQuote,
  isTagNameCharacter,
  isWhiteSpace
} from './character-codes.js';
import { createToken, type Token, TokenKind } from './token-types.js';

export interface Scanner {
  /** Initialize scanner text. Resets all scanning state. */
  initText(text: string): void;

  /**
   * Advances to the next token and updates all public token fields.
   * Callers stop once offsetNext reaches the end of the text.
   */
  scan(): void;

  /** Current token type. Updated by scan(). */
  token: TokenKind;

  /** Current token text (always materialized). */
  tokenText: string;

  /** Where the current token starts in the source. */
  tokenStart: number;

  /** Where the next token will start (offset into the source). */
  offsetNext: number;
}

/** Scanning mode - where we are relative to a tag. */
const enum ScanMode {
  /** Literal text between tags. */
  Text = 0,

  /** Right after a tag start marker, a name may follow. */
  TagName = 1,

  /** After the tag name, a separator or the tag end may follow. */
  TagAfterName = 2,

  /** After a separator, inside the parameter list. */
  TagParams = 3,
}

/** Cached token text for fixed tokens to avoid substring allocation. */
const TokenTextCache = {
  LESS_THAN: '<',
  LESS_THAN_SLASH: '</',
  ESCAPED_LESS_THAN: '\\<',
  ESCAPED_LESS_THAN_SLASH: '\\</',
  GREATER_THAN: '>',
  COLON: ':',
} as const;

/**
 * Tag scanner with closure-based architecture.
 *
 * Text runs become a single String token. A `<` opens a tag unless
 * whitespace follows it; `\<` is the escaped form of the same marker.
 */
export function createScanner(): Scanner {
  let source = '';
  let pos = 0;
  let end = 0;
  let mode: ScanMode = ScanMode.Text;

  // Scanner interface fields
  let token: TokenKind = TokenKind.String;
  let tokenText = '';
  let tokenStart = 0;
  let offsetNext = 0;

  function setText(text: string): void {
    source = text;
    pos = 0;
    end = text.length;
    mode = ScanMode.Text;
    token = TokenKind.String;
    tokenText = '';
    tokenStart = 0;
    offsetNext = 0;
  }

  function emit(kind: TokenKind, text: string, start: number, next: number): void {
    token = kind;
    tokenText = text;
    tokenStart = start;
    pos = next;
    offsetNext = next;
  }

  /**
   * Length of the start marker beginning at `at` ('<' or '</'), or 0 when the
   * '<' there is ordinary text because whitespace follows it.
   */
  function tagStartLength(at: number): number {
    if (source.charCodeAt(at) !== CharacterCodes.lessThan) return 0;
    let next = at + 1;
    if (next < end && source.charCodeAt(next) === CharacterCodes.slash) next++;
    if (next < end && isWhiteSpace(source.charCodeAt(next))) return 0;
    return next - at;
  }

  function isEscapedTagStart(at: number): boolean {
    return source.charCodeAt(at) === CharacterCodes.backslash &&
      at + 1 < end &&
      tagStartLength(at + 1) > 0;
  }

  function scanText(): void {
    const start = pos;
    const markerLength = tagStartLength(pos);
    if (markerLength > 0) {
      mode = ScanMode.TagName;
      if (markerLength === 2) emit(TokenKind.CloseTagStart, TokenTextCache.LESS_THAN_SLASH, start, pos + 2);
      else emit(TokenKind.OpenTagStart, TokenTextCache.LESS_THAN, start, pos + 1);
      return;
    }

    if (isEscapedTagStart(pos)) {
      mode = ScanMode.TagName;
      if (tagStartLength(pos + 1) === 2) emit(TokenKind.EscapedCloseTagStart, TokenTextCache.ESCAPED_LESS_THAN_SLASH, start, pos + 3);
      else emit(TokenKind.EscapedOpenTagStart, TokenTextCache.ESCAPED_LESS_THAN, start, pos + 2);
      return;
    }

    let i = pos + 1;
    while (i < end && tagStartLength(i) === 0 && !isEscapedTagStart(i)) i++;
    emit(TokenKind.String, source.slice(start, i), start, i);
  }

  function scanTagName(): void {
    let i = pos;
    while (i < end && isTagNameCharacter(source.charCodeAt(i))) i++;
    if (i === pos) {
      // No name: the marker stands alone and text scanning resumes here.
      mode = ScanMode.Text;
      scanText();
      return;
    }
    mode = ScanMode.TagAfterName;
    emit(TokenKind.Name, source.slice(pos, i), pos, i);
  }

  function scanTagDelimiter(): boolean {
    const ch = source.charCodeAt(pos);
    if (ch === CharacterCodes.colon) {
      mode = ScanMode.TagParams;
      emit(TokenKind.ParamSeparator, TokenTextCache.COLON, pos, pos + 1);
      return true;
    }
    if (ch === CharacterCodes.greaterThan) {
      mode = ScanMode.Text;
      emit(TokenKind.TagEnd, TokenTextCache.GREATER_THAN, pos, pos + 1);
      return true;
    }
    return false;
  }

  function scanTagParam(): void {
    if (scanTagDelimiter()) return;

    const start = pos;
    let i = pos;
    const quote = source.charCodeAt(i);
    if (isQuote(quote)) {
      i++;
      while (i < end) {
        const ch = source.charCodeAt(i);
        if (ch === CharacterCodes.backslash && i + 1 < end && isQuote(source.charCodeAt(i + 1))) {
          i += 2;
          continue;
        }
        i++;
        if (ch === quote) break;
      }
    } else {
      while (i < end) {
        const ch = source.charCodeAt(i);
        if (ch === CharacterCodes.colon || ch === CharacterCodes.greaterThan) break;
        i++;
      }
    }
    emit(TokenKind.String, source.slice(start, i), start, i);
  }

  function scan(): void {
    if (pos >= end) {
      tokenStart = end;
      tokenText = '';
      return;
    }

    switch (mode) {
      case ScanMode.TagName:
        scanTagName();
        return;

      case ScanMode.TagAfterName:
        if (!scanTagDelimiter()) {
          mode = ScanMode.Text;
          scanText();
        }
        return;

      case ScanMode.TagParams:
        scanTagParam();
        return;

      default:
        scanText();
        return;
    }
  }

  // Return the scanner interface object
  const scanner: Scanner = {
    scan,
    initText: setText,

    get token() { return token; },
    set token(value: TokenKind) { token = value; },

    get tokenText() { return tokenText; },
    set tokenText(value: string) { tokenText = value; },

    get tokenStart() { return tokenStart; },
    set tokenStart(value: number) { tokenStart = value; },

    get offsetNext() { return offsetNext; },
    set offsetNext(value: number) { offsetNext = value; }
  };

  return scanner;
}

/**
 * Scans the whole text into an ordered token buffer.
 */
export function scanTokens(text: string, scanner: Scanner = createScanner()): Token[] {
  const tokens: Token[] = [];
  scanner.initText(text);
  while (scanner.offsetNext < text.length) {
    scanner.scan();
    tokens.push(createToken(scanner.token, scanner.tokenText, scanner.tokenStart, scanner.offsetNext));
  }
  return tokens;
}
