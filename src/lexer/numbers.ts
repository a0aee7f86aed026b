/**
 * Number Recognizer
 * Decimal, octal, hexadecimal and binary literals with fractions and exponents
 */

import { FLOAT, INT, type TokenTag } from '../token-types.js';
import { isDecimal, isHex, lower, quoteRune, runeString } from './helpers.js';
import { SCAN_FLOATS } from './mode.js';
import { RUNES } from './runes.js';
import { advance, peek, reportError, type ScannerState } from './state.js';

type Prefix = 'x' | 'o' | 'b' | '0' | '';

const LITERAL_NAMES: Record<Prefix, string> = {
  x: 'hexadecimal literal',
  o: 'octal literal',
  '0': 'octal literal',
  b: 'binary literal',
  '': 'decimal literal',
};

interface Radix {
  readonly prefix: Prefix;
  readonly base: number;
}

const PREFIXES: ReadonlyMap<number, Radix> = new Map<number, Radix>([
  [RUNES.LOWER_X, { prefix: 'x', base: 16 }],
  [RUNES.LOWER_O, { prefix: 'o', base: 8 }],
  [RUNES.LOWER_B, { prefix: 'b', base: 2 }],
]);

// Bits of a digit run: saw a digit, saw a separator
const DIGIT = 1;
const SEPARATOR = 2;

interface DigitRun {
  readonly digsep: number;
  /** First digit outside the radix, for bases up to 10 */
  readonly invalid: number | undefined;
}

function readDigits(state: ScannerState, base: number): DigitRun {
  let digsep = 0;
  let invalid: number | undefined;
  for (;;) {
    const ch = peek(state);
    if (ch === RUNES.UNDERSCORE) {
      digsep |= SEPARATOR;
    } else if (base <= 10 ? isDecimal(ch) : isHex(ch)) {
      digsep |= DIGIT;
      if (base <= 10 && ch >= RUNES.ZERO + base && invalid === undefined) {
        invalid = ch;
      }
    } else {
      return { digsep, invalid };
    }
    advance(state);
  }
}

/**
 * Index of the first misplaced `_` in a literal, or -1.
 * A separator must sit between two digits, or between a radix prefix and a digit.
 */
export function invalidSeparator(literal: string): number {
  let x1 = 0x20;
  let d: number = RUNES.DOT; // '.' after a non-digit, '0' after a digit, '_' after a separator
  let i = 0;

  if (literal.length >= 2 && literal.charCodeAt(0) === RUNES.ZERO) {
    x1 = lower(literal.charCodeAt(1));
    if (PREFIXES.has(x1)) {
      d = RUNES.ZERO;
      i = 2;
    }
  }

  for (; i < literal.length; i++) {
    const p = d;
    d = literal.charCodeAt(i);
    if (d === RUNES.UNDERSCORE) {
      if (p !== RUNES.ZERO) {
        return i;
      }
    } else if (isDecimal(d) || (x1 === RUNES.LOWER_X && isHex(d))) {
      d = RUNES.ZERO;
    } else {
      if (p === RUNES.UNDERSCORE) {
        return i - 1;
      }
      d = RUNES.DOT;
    }
  }
  if (d === RUNES.UNDERSCORE) {
    return literal.length - 1;
  }
  return -1;
}

/**
 * Scan a numeric literal starting at the lookahead.
 * `seenDot` means a leading `.` has already been consumed.
 * A sign, if any, must already be consumed too.
 */
export function readNumber(state: ScannerState, seenDot: boolean): TokenTag {
  const floats = (state.config.mode & SCAN_FLOATS) !== 0;
  const start = state.text.length;
  let base = 10;
  let prefix: Prefix = '';
  let digsep = 0;
  let invalid: number | undefined;
  let tag: TokenTag = INT;

  const collect = (radix: number): void => {
    const run = readDigits(state, radix);
    digsep |= run.digsep;
    if (invalid === undefined) {
      invalid = run.invalid;
    }
  };

  // Integer part
  if (!seenDot) {
    if (peek(state) === RUNES.ZERO) {
      advance(state);
      const radix = PREFIXES.get(lower(peek(state)));
      if (radix !== undefined) {
        advance(state);
        base = radix.base;
        prefix = radix.prefix;
      } else {
        // Legacy octal; the leading 0 is itself a digit
        base = 8;
        prefix = '0';
        digsep = DIGIT;
      }
    }
    collect(base);
    if (floats && peek(state) === RUNES.DOT) {
      advance(state);
      seenDot = true;
    }
  }

  // Fractional part
  if (seenDot) {
    tag = FLOAT;
    if (prefix === 'o' || prefix === 'b') {
      reportError(state, 'SCAN-L008', { literal: LITERAL_NAMES[prefix] });
    }
    collect(base);
  }

  if ((digsep & DIGIT) === 0) {
    reportError(state, 'SCAN-L004', { literal: LITERAL_NAMES[prefix] });
  }

  // Exponent
  const marker = peek(state);
  const e = lower(marker);
  if (floats && (e === RUNES.LOWER_E || e === RUNES.LOWER_P)) {
    if (e === RUNES.LOWER_E && prefix !== '' && prefix !== '0') {
      reportError(state, 'SCAN-L006', {
        exponent: runeString(marker),
        mantissa: 'decimal',
      });
    } else if (e === RUNES.LOWER_P && prefix !== 'x') {
      reportError(state, 'SCAN-L006', {
        exponent: runeString(marker),
        mantissa: 'hexadecimal',
      });
    }
    advance(state);
    tag = FLOAT;

    const sign = peek(state);
    if (sign === RUNES.PLUS || sign === RUNES.MINUS) {
      advance(state);
    }
    const run = readDigits(state, 10);
    digsep |= run.digsep;
    if ((run.digsep & DIGIT) === 0) {
      reportError(state, 'SCAN-L005');
    }
  } else if (prefix === 'x' && tag === FLOAT) {
    reportError(state, 'SCAN-L007');
  }

  if (tag === INT && invalid !== undefined) {
    reportError(state, 'SCAN-L003', {
      digit: quoteRune(invalid),
      literal: LITERAL_NAMES[prefix],
    });
  }

  if (
    (digsep & SEPARATOR) !== 0 &&
    invalidSeparator(state.text.slice(start)) !== -1
  ) {
    reportError(state, 'SCAN-L009');
  }

  return tag;
}
