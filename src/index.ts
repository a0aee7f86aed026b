/**
 * lisp-scanner
 * Exports the scanner, token types, configuration and error taxonomy
 */

export { Scanner } from './scanner.js';
export {
  type ByteInput,
  type ByteSource,
  createScannerState,
  DEFAULT_RAW_STRING_DELIMITER,
  defaultIsIdentRune,
  EOF_RUNE,
  fromBytes,
  fromChunks,
  fromString,
  type IdentRunePredicate,
  isModeName,
  isWhitespace,
  LISP_TOKENS,
  LISP_WHITESPACE,
  MODE_NAMES,
  type ModeName,
  modeFromNames,
  nextToken,
  REPLACEMENT_RUNE,
  RuneReader,
  SCAN_COMMENTS,
  SCAN_FLOATS,
  SCAN_IDENTS,
  SCAN_INTS,
  SCAN_KEYWORDS,
  SCAN_RAW_STRINGS,
  SCAN_STRINGS,
  scanToken,
  type ScannerCallbacks,
  type ScannerOptions,
  type ScannerState,
  SKIP_COMMENTS,
  toByteSource,
  tokenize,
  whitespaceMask,
} from './lexer/index.js';
export {
  classifyTag,
  COMMENT,
  EOF,
  FLOAT,
  IDENT,
  INT,
  KEYWORD,
  RAW_STRING,
  STRING,
  tagOf,
  type Token,
  type TokenClass,
  type TokenClassTag,
  type TokenKind,
  tokenKind,
  tokenString,
  type TokenTag,
  TOKEN_TYPES,
} from './token-types.js';
export { formatPosition, isValidPosition, type Position } from './position.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  parseConfig,
  type ScanFileConfig,
  validateConfig,
} from './config.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  createError,
  LexicalError,
  ScanError,
  type ScanErrorData,
  SourceReadError,
} from './error-classes.js';
