#!/usr/bin/env node
/**
 * CLI Scan Entry Point
 *
 * Implements argument parsing for lisp-scan.
 * Prints the token stream of a source file.
 */

import * as fs from 'node:fs';
import {
  createDefaultConfig,
  loadConfig,
  loadConfigFile,
  type ScanFileConfig,
} from './config.js';
import type { LexicalError } from './error-classes.js';
import { SCAN_COMMENTS, SKIP_COMMENTS } from './lexer/mode.js';
import { formatPosition } from './position.js';
import { Scanner } from './scanner.js';
import { EOF, type Token, tokenString } from './token-types.js';

/**
 * Parsed command-line arguments for lisp-scan
 */
export type ParsedScanArgs =
  | {
      mode: 'scan';
      file: string;
      comments: boolean;
      format: 'text' | 'json';
      config: string | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const FLAGS_WITH_VALUE = new Set(['--format', '--config']);

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--comments',
  '--format',
  '--config',
]);

/**
 * Parse command-line arguments for lisp-scan
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on an unknown option, a missing option value or a missing file
 */
export function parseScanArgs(argv: string[]): ParsedScanArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: 'text' | 'json' = 'text';
  let config: string | undefined;
  let comments = false;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      // First non-flag argument is the file
      file ??= arg;
      continue;
    }
    if (!KNOWN_FLAGS.has(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (arg === '--comments') {
      comments = true;
      continue;
    }
    if (!FLAGS_WITH_VALUE.has(arg)) {
      continue;
    }

    const value = argv[i + 1];
    i++;
    if (arg === '--format') {
      if (value === 'text' || value === 'json') {
        format = value;
      } else if (value === undefined || value.startsWith('-')) {
        throw new Error('--format requires argument: text or json');
      } else {
        throw new Error(`Invalid format: ${value}. Expected text or json`);
      }
    } else {
      if (value === undefined || value.startsWith('-')) {
        throw new Error('--config requires a file argument');
      }
      config = value;
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'scan', file, comments, format, config };
}

// ============================================================
// SCANNING
// ============================================================

export interface ScanResult {
  /** Tokens without the trailing EOF */
  readonly tokens: Token[];
  readonly errors: LexicalError[];
}

/** Scan a whole file's bytes with the given configuration */
export function scanSource(
  source: Uint8Array | string,
  file: string,
  config: ScanFileConfig,
  comments: boolean
): ScanResult {
  const errors: LexicalError[] = [];
  const mode = comments
    ? (config.mode | SCAN_COMMENTS) & ~SKIP_COMMENTS
    : config.mode;
  const scanner = new Scanner(source, {
    filename: file,
    mode,
    whitespace: config.whitespace,
    rawStringDelimiter: config.rawStringDelimiter,
    callbacks: { onError: (err) => errors.push(err) },
  });

  const tokens: Token[] = [];
  for (const token of scanner.tokens()) {
    if (token.tag !== EOF) {
      tokens.push(token);
    }
  }
  return { tokens, errors };
}

// ============================================================
// OUTPUT FORMATTING
// ============================================================

/**
 * Format tokens for output
 *
 * Text format: file:line:col: (Kind) text
 * JSON format: array of token records
 */
export function formatTokens(tokens: Token[], format: 'text' | 'json'): string {
  if (format === 'json') {
    return JSON.stringify(
      tokens.map((t) => ({
        kind: t.kind,
        tag: t.tag,
        text: t.text,
        value: t.value,
        line: t.position.line,
        column: t.position.column,
        offset: t.position.offset,
      })),
      null,
      2
    );
  }
  return tokens
    .map((t) => `${formatPosition(t.position)}: (${tokenString(t.tag)}) ${t.text}`)
    .join('\n');
}

/**
 * Format a lexical error as a diagnostic line
 * Pattern: file:line:col: error: message (errorId)
 */
export function formatDiagnostic(err: LexicalError): string {
  return `${formatPosition(err.location)}: error: ${err.toData().message} (${err.errorId})`;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function showHelp(): void {
  console.log(`lisp-scan - Print the tokens of a Lisp source file

Usage: lisp-scan [options] <file>

Options:
  --comments        Emit comment tokens instead of skipping them
  --format <fmt>    Output format: text (default) or json
  --config <path>   Configuration file (default: .lisp-scan.yaml or .lisp-scan.json)
  -h, --help        Show this help message
  -v, --version     Show version number`);
}

function showVersion(): void {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  console.log(`lisp-scan ${packageJson.version}`);
}

function readSource(file: string): Uint8Array {
  try {
    return fs.readFileSync(file);
  } catch (err) {
    const code =
      err instanceof Error && 'code' in err ? String(err.code) : undefined;
    if (code === 'ENOENT') {
      throw new Error(`File not found: ${file}`);
    }
    if (code === 'EISDIR') {
      throw new Error(`Path is a directory: ${file}`);
    }
    throw new Error(`Cannot read file: ${file}`);
  }
}

function exitWithError(err: unknown): never {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(2);
}

/**
 * Main entry point for lisp-scan CLI.
 * Exit codes: 0 clean input, 1 lexical errors, 2 argument, config or file errors.
 */
function main(): void {
  let args: ParsedScanArgs;
  try {
    args = parseScanArgs(process.argv.slice(2));
  } catch (err) {
    exitWithError(err);
  }

  if (args.mode === 'help') {
    showHelp();
    process.exit(0);
  }
  if (args.mode === 'version') {
    showVersion();
    process.exit(0);
  }

  let config: ScanFileConfig;
  let source: Uint8Array;
  try {
    config =
      args.config !== undefined
        ? loadConfigFile(args.config)
        : (loadConfig(process.cwd()) ?? createDefaultConfig());
    source = readSource(args.file);
  } catch (err) {
    exitWithError(err);
  }

  const { tokens, errors } = scanSource(
    source,
    args.file,
    config,
    args.comments
  );

  const output = formatTokens(tokens, args.format);
  if (output !== '') {
    console.log(output);
  }
  for (const err of errors) {
    console.error(formatDiagnostic(err));
  }
  process.exit(errors.length > 0 ? 1 : 0);
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
