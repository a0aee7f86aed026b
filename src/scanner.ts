/**
 * Scanner
 * Pull interface over the lexer state: one token per call
 */

import type { Position } from './position.js';
import { EOF, type Token, type TokenTag } from './token-types.js';
import {
  defaultIsIdentRune,
  delimiterRune,
  type IdentRunePredicate,
} from './lexer/mode.js';
import type { ByteInput } from './lexer/reader.js';
import {
  advance,
  createScannerState,
  currentLocation,
  peek,
  type ScannerOptions,
  type ScannerState,
} from './lexer/state.js';
import { nextToken, scanToken } from './lexer/tokenizer.js';

/**
 * Lexical scanner for one input stream.
 *
 * @example
 * const scanner = new Scanner('(def a 10)', { filename: 'core.lisp' });
 * for (let tag = scanner.scan(); tag !== EOF; tag = scanner.scan()) {
 *   console.log(tokenString(tag), scanner.tokenText());
 * }
 */
export class Scanner {
  private readonly state: ScannerState;

  constructor(input: ByteInput, options: ScannerOptions = {}) {
    this.state = createScannerState(input, options);
  }

  /**
   * Skip whitespace and comments per the current masks and scan one token.
   * Returns a class tag or, for a single-character token, its code point.
   */
  scan(): TokenTag {
    return scanToken(this.state);
  }

  /** Scan one token as a record */
  nextToken(): Token {
    return nextToken(this.state);
  }

  /** Tokens up to and including EOF */
  *tokens(): IterableIterator<Token> {
    for (;;) {
      const token = this.nextToken();
      yield token;
      if (token.tag === EOF) {
        return;
      }
    }
  }

  /**
   * Consume and return the next rune, bypassing token recognition.
   * Clears the token text and invalidates `position`.
   */
  next(): number {
    const { state } = this;
    const ch = advance(state);
    state.text = '';
    state.value = '';
    state.position = {
      filename: state.filename,
      offset: state.position.offset,
      line: 0,
      column: 0,
    };
    return ch;
  }

  /** The next rune, without consuming it */
  peek(): number {
    return peek(this.state);
  }

  /** Verbatim source of the most recent token */
  tokenText(): string {
    return this.state.text;
  }

  /** Decoded contents for strings and raw strings; the text for anything else */
  tokenValue(): string {
    return this.state.value;
  }

  /** Start of the most recent token; invalid after `next()` */
  get position(): Position {
    return this.state.position;
  }

  /** Position just past the last consumed rune */
  pos(): Position {
    return currentLocation(this.state);
  }

  /** Malformed-input occurrences so far */
  get errorCount(): number {
    return this.state.errorCount;
  }

  get filename(): string {
    return this.state.filename;
  }

  set filename(name: string) {
    this.state.filename = name;
  }

  get mode(): number {
    return this.state.config.mode;
  }

  setMode(mode: number): void {
    this.state.config.mode = mode;
  }

  get whitespace(): bigint {
    return this.state.config.whitespace;
  }

  setWhitespace(mask: bigint): void {
    this.state.config.whitespace = mask;
  }

  /** Replace the identifier predicate; `undefined` restores the default */
  setIsIdentRune(predicate: IdentRunePredicate | undefined): void {
    this.state.config.isIdentRune = predicate ?? defaultIsIdentRune;
  }

  setRawStringDelimiter(delimiter: string): void {
    this.state.config.rawStringDelimiter = delimiterRune(delimiter);
  }
}
