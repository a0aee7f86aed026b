/**
 * Lexer Module
 */

export {
  type ByteInput,
  type ByteSource,
  EOF_RUNE,
  fromBytes,
  fromChunks,
  fromString,
  REPLACEMENT_RUNE,
  RuneReader,
  toByteSource,
} from './reader.js';
export {
  DEFAULT_RAW_STRING_DELIMITER,
  defaultIsIdentRune,
  type IdentRunePredicate,
  isModeName,
  isWhitespace,
  LISP_TOKENS,
  LISP_WHITESPACE,
  MODE_NAMES,
  type ModeName,
  modeFromNames,
  SCAN_COMMENTS,
  SCAN_FLOATS,
  SCAN_IDENTS,
  SCAN_INTS,
  SCAN_KEYWORDS,
  SCAN_RAW_STRINGS,
  SCAN_STRINGS,
  SKIP_COMMENTS,
  whitespaceMask,
} from './mode.js';
export {
  createScannerState,
  type ScannerCallbacks,
  type ScannerOptions,
  type ScannerState,
} from './state.js';
export { nextToken, scanToken, tokenize } from './tokenizer.js';
