/**
 * Configuration Loader for lisp-scan
 * Loads and validates .lisp-scan.yaml / .lisp-scan.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  DEFAULT_RAW_STRING_DELIMITER,
  delimiterRune,
  isModeName,
  LISP_TOKENS,
  LISP_WHITESPACE,
  type ModeName,
  modeFromNames,
  whitespaceMask,
} from './lexer/mode.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order */
export const CONFIG_FILE_NAMES = ['.lisp-scan.yaml', '.lisp-scan.json'] as const;

const KNOWN_KEYS = new Set(['mode', 'whitespace', 'rawStringDelimiter']);

// ============================================================
// TYPES
// ============================================================

export interface ScanFileConfig {
  readonly mode: number;
  readonly whitespace: bigint;
  readonly rawStringDelimiter: string;
}

export function createDefaultConfig(): ScanFileConfig {
  return {
    mode: LISP_TOKENS,
    whitespace: LISP_WHITESPACE,
    rawStringDelimiter: DEFAULT_RAW_STRING_DELIMITER,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSingleChar(value: unknown): value is string {
  return typeof value === 'string' && [...value].length === 1;
}

function parseMode(value: unknown): number {
  if (value === 'all') {
    return LISP_TOKENS;
  }
  if (!Array.isArray(value)) {
    throw new Error(
      'Invalid configuration: mode must be "all" or a list of token classes'
    );
  }
  const names: ModeName[] = [];
  for (const name of value) {
    if (typeof name !== 'string' || !isModeName(name)) {
      throw new Error(
        `Invalid configuration: unknown mode "${String(name)}"`
      );
    }
    names.push(name);
  }
  return modeFromNames(names);
}

function parseWhitespace(value: unknown): bigint {
  if (!Array.isArray(value)) {
    throw new Error(
      'Invalid configuration: whitespace must be a list of characters'
    );
  }
  const chars: string[] = [];
  for (const ch of value) {
    if (!isSingleChar(ch)) {
      throw new Error(
        `Invalid configuration: whitespace entry ${JSON.stringify(ch)} is not a single character`
      );
    }
    chars.push(ch);
  }
  try {
    return whitespaceMask(chars);
  } catch (err) {
    throw new Error(
      `Invalid configuration: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function parseDelimiter(value: unknown): string {
  if (typeof value !== 'string') {
    throw new Error(
      'Invalid configuration: rawStringDelimiter must be a string'
    );
  }
  try {
    delimiterRune(value);
  } catch (err) {
    throw new Error(
      `Invalid configuration: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return value;
}

/**
 * Validate parsed configuration data and merge it over the defaults.
 * An empty document yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function validateConfig(data: unknown): ScanFileConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  return {
    mode: 'mode' in data ? parseMode(data['mode']) : defaults.mode,
    whitespace:
      'whitespace' in data
        ? parseWhitespace(data['whitespace'])
        : defaults.whitespace,
    rawStringDelimiter:
      'rawStringDelimiter' in data
        ? parseDelimiter(data['rawStringDelimiter'])
        : defaults.rawStringDelimiter,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text. YAML is a superset of JSON, so both file kinds
 * go through the YAML parser.
 */
export function parseConfig(content: string): ScanFileConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsed);
}

/** Load configuration from an explicit path */
export function loadConfigFile(configPath: string): ScanFileConfig {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return parseConfig(fileContent);
}

/**
 * Load configuration from the first config file found in `cwd`.
 *
 * @returns ScanFileConfig, or null if no file exists
 */
export function loadConfig(cwd: string): ScanFileConfig | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = join(cwd, name);
    if (existsSync(configPath)) {
      return loadConfigFile(configPath);
    }
  }
  return null;
}
