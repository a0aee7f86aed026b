/**
 * Lexer Helper Functions
 * Rune classification over code points
 */

export function isDecimal(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

export function isHex(ch: number): boolean {
  return isDecimal(ch) || (lower(ch) >= 0x61 && lower(ch) <= 0x66);
}

export function isOctal(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x37;
}

/** ASCII lowercase; other runes unchanged */
export function lower(ch: number): number {
  return ch >= 0x41 && ch <= 0x5a ? ch | 0x20 : ch;
}

/** Value of a hex digit, or 16 for anything else */
export function digitVal(ch: number): number {
  if (isDecimal(ch)) return ch - 0x30;
  const l = lower(ch);
  if (l >= 0x61 && l <= 0x66) return l - 0x61 + 10;
  return 16;
}

export function runeString(ch: number): string {
  return String.fromCodePoint(ch);
}

export function isScalarValue(value: number): boolean {
  return value <= 0x10ffff && (value < 0xd800 || value > 0xdfff);
}

/** Quoted form of a rune for messages, e.g. '9' */
export function quoteRune(ch: number): string {
  return `'${runeString(ch)}'`;
}
