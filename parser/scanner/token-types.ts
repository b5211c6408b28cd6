/**
 * Token types for the tag scanner.
 *
 * The scanner only delimits tag-shaped text; deciding whether a tag is real
 * is left to the interpreter and the tag registry.
 */

/**
 * Token kinds produced by the scanner
 */
export enum TokenKind {
  String,                   // Literal text, or a tag parameter (verbatim, quotes included)
  OpenTagStart,             // <
  EscapedOpenTagStart,      // \<
  CloseTagStart,            // </
  EscapedCloseTagStart,     // \</
  Name,                     // Tag name following a start marker
  ParamSeparator,           // :
  TagEnd,                   // >
}

/**
 * A scanned token. Tokens are values: the interpreter replaces them rather than
 * editing them in place.
 */
export interface Token {
  readonly kind: TokenKind;

  /** Text the token stands for when re-absorbed as literal content. */
  readonly text: string;

  /** Start offset in the scanned source. */
  readonly pos: number;

  /** End offset in the scanned source. */
  readonly end: number;
}

/**
 * Creates a token value
 */
export function createToken(kind: TokenKind, text: string, pos: number, end: number): Token {
  return { kind, text, pos, end };
}

/**
 * Human-readable token kind, used by diagnostics and the test harness
 */
export function tokenKindToString(kind: TokenKind): string {
  return TokenKind[kind] ?? 'TokenKind:' + kind;
}

/**
 * Debug form of a token: `Name "red"@1`
 */
export function describeToken(token: Token): string {
  return tokenKindToString(token.kind) + ' ' + JSON.stringify(token.text) + '@' + token.pos;
}

/**
 * True for the two escaped start markers
 */
export function isEscapedTagStart(kind: TokenKind): boolean {
  return kind === TokenKind.EscapedOpenTagStart || kind === TokenKind.EscapedCloseTagStart;
}

/**
 * True for the four tag start markers
 */
export function isTagStart(kind: TokenKind): boolean {
  return kind === TokenKind.OpenTagStart ||
         kind === TokenKind.EscapedOpenTagStart ||
         kind === TokenKind.CloseTagStart ||
         kind === TokenKind.EscapedCloseTagStart;
}
