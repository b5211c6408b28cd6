/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  nextLine = 0x0085,

  // Control characters
  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,

  // ASCII printable characters that matter to the tag grammar
  space = 0x20,
  doubleQuote = 0x22,           // "
  singleQuote = 0x27,           // '
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  colon = 0x3A,                 // :
  lessThan = 0x3C,              // <
  greaterThan = 0x3E,           // >

  A = 0x41,
  F = 0x46,

  backslash = 0x5C,             // \

  a = 0x61,
  f = 0x66,

  // Unicode categories
  nonBreakingSpace = 0x00A0,
  enQuad = 0x2000,
  zeroWidthSpace = 0x200B,
  narrowNoBreakSpace = 0x202F,
  ideographicSpace = 0x3000,
  mathematicalSpace = 0x205F,
  ogham = 0x1680,
}

/**
 * Check if character is a line break
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn ||
         ch === CharacterCodes.lineSeparator ||
         ch === CharacterCodes.paragraphSeparator ||
         ch === CharacterCodes.nextLine;
}

/**
 * Check if character is whitespace (excluding line breaks)
 */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.verticalTab ||
         ch === CharacterCodes.formFeed ||
         ch === CharacterCodes.nonBreakingSpace ||
         ch === CharacterCodes.ogham ||
         ch === CharacterCodes.narrowNoBreakSpace ||
         ch === CharacterCodes.mathematicalSpace ||
         ch === CharacterCodes.ideographicSpace ||
         (ch >= CharacterCodes.enQuad && ch <= CharacterCodes.zeroWidthSpace);
}

/**
 * Check if character is any whitespace (including line breaks)
 */
export function isWhiteSpace(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) || isLineBreak(ch);
}

/**
 * Check if character is a quote that can open a quoted tag parameter
 */
export function isQuote(ch: number): boolean {
  return ch === CharacterCodes.singleQuote || ch === CharacterCodes.doubleQuote;
}

/**
 * Check if character is a hexadecimal digit
 */
export function isHexDigit(ch: number): boolean {
  return (ch >= CharacterCodes._0 && ch <= CharacterCodes._9) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.F) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.f);
}

/**
 * Check if character can appear in a tag name.
 * Anything but whitespace, quotes, the escape and the tag delimiters.
 */
export function isTagNameCharacter(ch: number): boolean {
  return !isWhiteSpace(ch) &&
         !isQuote(ch) &&
         ch !== CharacterCodes.lessThan &&
         ch !== CharacterCodes.greaterThan &&
         ch !== CharacterCodes.colon &&
         ch !== CharacterCodes.backslash;
}
