/**
 * Scanner State
 * Tracks the reader, configuration, current token and error count
 */

import { LexicalError } from '../error-classes.js';
import type { Position } from '../position.js';
import { runeString } from './helpers.js';
import {
  DEFAULT_RAW_STRING_DELIMITER,
  defaultIsIdentRune,
  delimiterRune,
  type IdentRunePredicate,
  LISP_TOKENS,
  LISP_WHITESPACE,
  type ScanConfig,
} from './mode.js';
import {
  type ByteInput,
  type Cursor,
  EOF_RUNE,
  RuneReader,
  toByteSource,
} from './reader.js';

/** Hooks for observing the scan; the library itself never logs */
export interface ScannerCallbacks {
  /** Called once per malformed-input occurrence, after errorCount is bumped */
  onError?: ((error: LexicalError) => void) | undefined;
}

export interface ScannerOptions {
  filename?: string | undefined;
  mode?: number | undefined;
  whitespace?: bigint | undefined;
  isIdentRune?: IdentRunePredicate | undefined;
  rawStringDelimiter?: string | undefined;
  callbacks?: ScannerCallbacks | undefined;
}

export interface ScannerState {
  readonly reader: RuneReader;
  readonly config: ScanConfig;
  readonly callbacks: ScannerCallbacks;
  filename: string;
  errorCount: number;
  /** Verbatim text of the token being scanned */
  text: string;
  /** Decoded literal of the token being scanned */
  value: string;
  /** Start of the most recent token */
  position: Position;
}

export function createScannerState(
  input: ByteInput,
  options: ScannerOptions = {}
): ScannerState {
  const reader = new RuneReader(toByteSource(input), (errorId, at) => {
    reportError(state, errorId, {}, at);
  });
  const filename = options.filename ?? '';
  const state: ScannerState = {
    reader,
    config: {
      mode: options.mode ?? LISP_TOKENS,
      whitespace: options.whitespace ?? LISP_WHITESPACE,
      isIdentRune: options.isIdentRune ?? defaultIsIdentRune,
      rawStringDelimiter: delimiterRune(
        options.rawStringDelimiter ?? DEFAULT_RAW_STRING_DELIMITER
      ),
    },
    callbacks: options.callbacks ?? {},
    filename,
    errorCount: 0,
    text: '',
    value: '',
    position: { filename, offset: 0, line: 0, column: 0 },
  };
  return state;
}

export function locate(state: ScannerState, at: Cursor): Position {
  return {
    filename: state.filename,
    offset: at.offset,
    line: at.line,
    column: at.column,
  };
}

/** Position of the lookahead rune */
export function currentLocation(state: ScannerState): Position {
  return locate(state, state.reader.cursor());
}

export function peek(state: ScannerState): number {
  return state.reader.peek();
}

/** Consume the lookahead rune into the token text */
export function advance(state: ScannerState): number {
  const ch = state.reader.next();
  if (ch !== EOF_RUNE) {
    state.text += runeString(ch);
  }
  return ch;
}

export function isIdentRune(state: ScannerState, ch: number, i: number): boolean {
  return ch !== EOF_RUNE && state.config.isIdentRune(runeString(ch), i);
}

/**
 * Count a malformed-input occurrence and notify the onError callback.
 * Defaults to the lookahead position.
 */
export function reportError(
  state: ScannerState,
  errorId: string,
  context: Record<string, unknown> = {},
  at?: Cursor
): void {
  state.errorCount++;
  const onError = state.callbacks.onError;
  if (onError !== undefined) {
    onError(new LexicalError(errorId, locate(state, at ?? state.reader.cursor()), context));
  }
}
