/**
 * Rune Lookup Tables
 */

/** Code points the classifier and recognizers dispatch on */
export const RUNES = {
  NEWLINE: 0x0a,
  QUOTE: 0x22,
  HASH: 0x23,
  PLUS: 0x2b,
  MINUS: 0x2d,
  DOT: 0x2e,
  ZERO: 0x30,
  COLON: 0x3a,
  SEMICOLON: 0x3b,
  AT: 0x40,
  BACKSLASH: 0x5c,
  UNDERSCORE: 0x5f,
  LOWER_B: 0x62,
  LOWER_E: 0x65,
  LOWER_O: 0x6f,
  LOWER_P: 0x70,
  LOWER_U: 0x75,
  UPPER_U: 0x55,
  LOWER_X: 0x78,
  LBRACE: 0x7b,
  TILDE: 0x7e,
} as const;

/** Single-character escapes and what they decode to */
export const SIMPLE_ESCAPES: ReadonlyMap<number, string> = new Map<number, string>([
  [0x61, '\x07'], // a
  [0x62, '\b'],
  [0x66, '\f'],
  [0x6e, '\n'],
  [0x72, '\r'],
  [0x74, '\t'],
  [0x76, '\v'],
  [RUNES.BACKSLASH, '\\'],
  [RUNES.QUOTE, '"'],
]);

/** Hex escape letter to digit count */
export const HEX_ESCAPE_DIGITS: ReadonlyMap<number, number> = new Map<number, number>([
  [RUNES.LOWER_X, 2],
  [RUNES.LOWER_U, 4],
  [RUNES.UPPER_U, 8],
]);

/** Two-rune reader macros scanned as one Ident: `~@` and `#{` */
export const READER_MACRO_PAIRS: ReadonlyMap<number, number> = new Map<number, number>([
  [RUNES.TILDE, RUNES.AT],
  [RUNES.HASH, RUNES.LBRACE],
]);
