/**
 * Tokenizer
 * Dispatch on the lookahead rune and scan one token
 */

import {
  COMMENT,
  EOF,
  IDENT,
  KEYWORD,
  RAW_STRING,
  STRING,
  type Token,
  type TokenTag,
  tokenKind,
} from '../token-types.js';
import { isDecimal } from './helpers.js';
import {
  isWhitespace,
  SCAN_COMMENTS,
  SCAN_FLOATS,
  SCAN_IDENTS,
  SCAN_KEYWORDS,
  SCAN_RAW_STRINGS,
  SCAN_STRINGS,
  scansInts,
  SKIP_COMMENTS,
} from './mode.js';
import { readNumber } from './numbers.js';
import { type ByteInput, EOF_RUNE } from './reader.js';
import {
  readComment,
  readIdentifier,
  readIdentifierTail,
  readRawString,
  readString,
} from './readers.js';
import { READER_MACRO_PAIRS, RUNES } from './runes.js';
import {
  advance,
  createScannerState,
  currentLocation,
  isIdentRune,
  peek,
  type ScannerOptions,
  type ScannerState,
} from './state.js';

function enabled(state: ScannerState, bits: number): boolean {
  return (state.config.mode & bits) !== 0;
}

function skipWhitespace(state: ScannerState): void {
  while (isWhitespace(state.config.whitespace, peek(state))) {
    advance(state);
  }
}

/** Consume the lookahead as a single-character token */
function singleChar(state: ScannerState): TokenTag {
  const ch = peek(state);
  advance(state);
  return ch;
}

// `.5` is a float, `.` an identifier start only if the predicate says so
function scanDot(state: ScannerState): TokenTag {
  advance(state);
  if (enabled(state, SCAN_FLOATS) && isDecimal(peek(state))) {
    return readNumber(state, true);
  }
  if (enabled(state, SCAN_IDENTS) && isIdentRune(state, RUNES.DOT, 0)) {
    readIdentifierTail(state, 1);
    return IDENT;
  }
  return RUNES.DOT;
}

// `-minus`, `-9`, or a bare `-`
function scanMinus(state: ScannerState): TokenTag {
  advance(state);
  const next = peek(state);
  if (isIdentRune(state, next, 0)) {
    if (!enabled(state, SCAN_IDENTS)) {
      return RUNES.MINUS;
    }
    readIdentifier(state);
    return IDENT;
  }
  if (isDecimal(next)) {
    return scansInts(state.config.mode)
      ? readNumber(state, false)
      : RUNES.MINUS;
  }
  return enabled(state, SCAN_IDENTS) ? IDENT : RUNES.MINUS;
}

function scanKeyword(state: ScannerState): TokenTag {
  advance(state); // consume :
  if (!isIdentRune(state, peek(state), 0)) {
    return RUNES.COLON;
  }
  readIdentifier(state);
  return KEYWORD;
}

function scanReaderMacro(
  state: ScannerState,
  first: number,
  second: number
): TokenTag {
  advance(state);
  if (enabled(state, SCAN_IDENTS) && peek(state) === second) {
    advance(state);
    return IDENT;
  }
  return first;
}

function scanLiteral(state: ScannerState, ch: number): TokenTag {
  if (ch === RUNES.DOT) {
    return scanDot(state);
  }

  if (isDecimal(ch)) {
    return scansInts(state.config.mode)
      ? readNumber(state, false)
      : singleChar(state);
  }

  if (isIdentRune(state, ch, 0)) {
    if (!enabled(state, SCAN_IDENTS)) {
      return singleChar(state);
    }
    readIdentifier(state);
    return IDENT;
  }

  if (ch === RUNES.MINUS) {
    return scanMinus(state);
  }

  if (ch === RUNES.QUOTE && enabled(state, SCAN_STRINGS)) {
    readString(state);
    return STRING;
  }

  if (
    ch === state.config.rawStringDelimiter &&
    enabled(state, SCAN_RAW_STRINGS)
  ) {
    readRawString(state);
    return RAW_STRING;
  }

  if (ch === RUNES.COLON && enabled(state, SCAN_KEYWORDS)) {
    return scanKeyword(state);
  }

  const second = READER_MACRO_PAIRS.get(ch);
  if (second !== undefined) {
    return scanReaderMacro(state, ch, second);
  }

  return singleChar(state);
}

/**
 * Scan the next token and return its tag.
 * Leaves the token's text, decoded value and start position on the state.
 */
export function scanToken(state: ScannerState): TokenTag {
  for (;;) {
    skipWhitespace(state);

    state.text = '';
    state.value = '';
    state.position = currentLocation(state);

    const ch = peek(state);
    if (ch === EOF_RUNE) {
      return EOF;
    }

    if (ch === RUNES.SEMICOLON && enabled(state, SCAN_COMMENTS)) {
      readComment(state);
      if (enabled(state, SKIP_COMMENTS)) {
        continue;
      }
      state.value = state.text;
      return COMMENT;
    }

    const tag = scanLiteral(state, ch);
    if (tag !== STRING && tag !== RAW_STRING) {
      state.value = state.text;
    }
    return tag;
  }
}

export function nextToken(state: ScannerState): Token {
  const tag = scanToken(state);
  return {
    tag,
    kind: tokenKind(tag),
    text: state.text,
    value: state.value,
    position: state.position,
  };
}

/** Scan a whole input; the last token is always EOF */
export function tokenize(input: ByteInput, options?: ScannerOptions): Token[] {
  const state = createScannerState(input, options);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.tag !== EOF);

  return tokens;
}
