/**
 * Scan Modes
 * Mode bits, whitespace masks and the identifier predicate
 */

import { TOKEN_TYPES } from '../token-types.js';

// ============================================================
// MODE BITS
// ============================================================

// Each class bit sits at the position of its (negated) token tag
export const SCAN_IDENTS = 1 << -TOKEN_TYPES.IDENT;
export const SCAN_INTS = 1 << -TOKEN_TYPES.INT;
export const SCAN_FLOATS = 1 << -TOKEN_TYPES.FLOAT; // includes Ints
export const SCAN_STRINGS = 1 << -TOKEN_TYPES.STRING;
export const SCAN_KEYWORDS = 1 << -TOKEN_TYPES.KEYWORD;
export const SCAN_RAW_STRINGS = 1 << -TOKEN_TYPES.RAW_STRING;
export const SCAN_COMMENTS = 1 << -TOKEN_TYPES.COMMENT;
export const SKIP_COMMENTS = 1 << 9; // with SCAN_COMMENTS, comments are dropped

/** Every token class, with comments skipped */
export const LISP_TOKENS =
  SCAN_IDENTS |
  SCAN_FLOATS |
  SCAN_STRINGS |
  SCAN_KEYWORDS |
  SCAN_RAW_STRINGS |
  SCAN_COMMENTS |
  SKIP_COMMENTS;

/** Mode bit names as used in configuration files */
export const MODE_NAMES = {
  idents: SCAN_IDENTS,
  ints: SCAN_INTS,
  floats: SCAN_FLOATS,
  strings: SCAN_STRINGS,
  keywords: SCAN_KEYWORDS,
  'raw-strings': SCAN_RAW_STRINGS,
  comments: SCAN_COMMENTS,
  'skip-comments': SKIP_COMMENTS,
} as const;

export type ModeName = keyof typeof MODE_NAMES;

export function isModeName(value: string): value is ModeName {
  return Object.prototype.hasOwnProperty.call(MODE_NAMES, value);
}

export function modeFromNames(names: Iterable<ModeName>): number {
  let mode = 0;
  for (const name of names) {
    mode |= MODE_NAMES[name];
  }
  return mode;
}

export function scansInts(mode: number): boolean {
  return (mode & (SCAN_INTS | SCAN_FLOATS)) !== 0;
}

// ============================================================
// WHITESPACE
// ============================================================

/** Tab, newline, carriage return and space */
export const LISP_WHITESPACE =
  (1n << 0x09n) | (1n << 0x0an) | (1n << 0x0dn) | (1n << 0x20n);

/**
 * Build a whitespace mask from characters or code points.
 * Throws RangeError for anything at or above code point 64.
 */
export function whitespaceMask(chars: Iterable<string | number>): bigint {
  let mask = 0n;
  for (const ch of chars) {
    const code = typeof ch === 'number' ? ch : (ch.codePointAt(0) ?? -1);
    if (!Number.isInteger(code) || code < 0 || code >= 64) {
      throw new RangeError(
        `Whitespace character out of range: ${JSON.stringify(ch)}`
      );
    }
    mask |= 1n << BigInt(code);
  }
  return mask;
}

export function isWhitespace(mask: bigint, ch: number): boolean {
  return ch >= 0 && ch < 64 && (mask & (1n << BigInt(ch))) !== 0n;
}

// ============================================================
// IDENTIFIER PREDICATE
// ============================================================

/**
 * Decides whether `ch` may appear at index `i` of an identifier.
 * Never called for end of input.
 */
export type IdentRunePredicate = (ch: string, i: number) => boolean;

const SYMBOL_RUNES = new Set(['_', '$', '*', '+', '/', '?', '!', '<', '>', '=']);

const ALPHABETIC = /^\p{Alphabetic}$/u;
const NUMERIC = /^\p{N}$/u;

/**
 * Lisp identifiers: letters and `_ $ * + / ? ! < > =` anywhere;
 * `-` and digits after the first rune.
 */
export const defaultIsIdentRune: IdentRunePredicate = (ch, i) => {
  if (SYMBOL_RUNES.has(ch) || ALPHABETIC.test(ch)) {
    return true;
  }
  return i > 0 && (ch === '-' || NUMERIC.test(ch));
};

// ============================================================
// SCAN CONFIGURATION
// ============================================================

export const DEFAULT_RAW_STRING_DELIMITER = '¬';

export interface ScanConfig {
  mode: number;
  whitespace: bigint;
  isIdentRune: IdentRunePredicate;
  /** Code point of the raw string delimiter */
  rawStringDelimiter: number;
}

/** Code point of a one-rune string; RangeError otherwise */
export function delimiterRune(delimiter: string): number {
  const code = delimiter.codePointAt(0);
  if (code === undefined || String.fromCodePoint(code) !== delimiter) {
    throw new RangeError(
      `Raw string delimiter must be a single character: ${JSON.stringify(delimiter)}`
    );
  }
  return code;
}
