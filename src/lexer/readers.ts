/**
 * Token Readers
 * Identifiers, strings, raw strings and comments
 */

import {
  digitVal,
  isOctal,
  isScalarValue,
  runeString,
} from './helpers.js';
import { EOF_RUNE, REPLACEMENT_RUNE } from './reader.js';
import { HEX_ESCAPE_DIGITS, RUNES, SIMPLE_ESCAPES } from './runes.js';
import {
  advance,
  isIdentRune,
  peek,
  reportError,
  type ScannerState,
} from './state.js';

/** Continue an identifier whose first `i` runes are already consumed */
export function readIdentifierTail(state: ScannerState, i: number): void {
  while (isIdentRune(state, peek(state), i)) {
    advance(state);
    i++;
  }
}

/** Read an identifier; the lookahead already passed the index-0 check */
export function readIdentifier(state: ScannerState): void {
  advance(state);
  readIdentifierTail(state, 1);
}

/**
 * Read `count` digits of `base` and decode the code point they name.
 * On a short run the escape text read so far is kept verbatim.
 */
function readNumericEscape(
  state: ScannerState,
  escapeStart: number,
  base: number,
  count: number,
  initial: number
): string {
  let value = initial;
  for (let n = count; n > 0; n--) {
    const d = digitVal(peek(state));
    if (d >= base) {
      reportError(state, 'SCAN-L002');
      return state.text.slice(escapeStart);
    }
    advance(state);
    value = value * base + d;
  }
  if (!isScalarValue(value)) {
    reportError(state, 'SCAN-L010');
    return runeString(REPLACEMENT_RUNE);
  }
  return runeString(value);
}

/** Decode the escape at the lookahead backslash */
function readEscape(state: ScannerState): string {
  const escapeStart = state.text.length;
  advance(state); // consume backslash
  const ch = peek(state);

  const simple = SIMPLE_ESCAPES.get(ch);
  if (simple !== undefined) {
    advance(state);
    return simple;
  }

  if (isOctal(ch)) {
    advance(state);
    if (ch === RUNES.ZERO && !isOctal(peek(state))) {
      return '\0';
    }
    return readNumericEscape(state, escapeStart, 8, 2, ch - RUNES.ZERO);
  }

  const hexDigits = HEX_ESCAPE_DIGITS.get(ch);
  if (hexDigits !== undefined) {
    advance(state);
    return readNumericEscape(state, escapeStart, 16, hexDigits, 0);
  }

  // The rune after the backslash is left for the string loop
  reportError(state, 'SCAN-L002');
  return '\\';
}

/**
 * Read a double-quoted string. The decoded contents go to `state.value`.
 * An unterminated string ends at, and includes, the newline.
 */
export function readString(state: ScannerState): void {
  advance(state); // consume opening "

  let value = '';
  for (;;) {
    const ch = peek(state);
    if (ch === RUNES.QUOTE) {
      advance(state);
      break;
    }
    if (ch === RUNES.NEWLINE || ch === EOF_RUNE) {
      reportError(state, 'SCAN-L001');
      advance(state);
      break;
    }
    if (ch === RUNES.BACKSLASH) {
      value += readEscape(state);
    } else {
      advance(state);
      value += runeString(ch);
    }
  }
  state.value = value;
}

/**
 * Read a raw string up to the next undoubled delimiter.
 * A doubled delimiter stands for one delimiter in `state.value`.
 */
export function readRawString(state: ScannerState): void {
  const delimiter = state.config.rawStringDelimiter;
  advance(state); // consume opening delimiter

  let value = '';
  for (;;) {
    const ch = peek(state);
    if (ch === EOF_RUNE) {
      reportError(state, 'SCAN-L001');
      break;
    }
    advance(state);
    if (ch === delimiter) {
      if (peek(state) !== delimiter) {
        break;
      }
      advance(state);
    }
    value += runeString(ch);
  }
  state.value = value;
}

/** Read a `;` comment up to, but not including, the newline */
export function readComment(state: ScannerState): void {
  advance(state); // consume ;
  for (
    let ch = peek(state);
    ch !== RUNES.NEWLINE && ch !== EOF_RUNE;
    ch = peek(state)
  ) {
    advance(state);
  }
}
