/**
 * Configuration Tests
 * Validation of parsed data and lookup of .lisp-scan files
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import {
  createDefaultConfig,
  LISP_TOKENS,
  LISP_WHITESPACE,
  loadConfig,
  loadConfigFile,
  parseConfig,
  SCAN_IDENTS,
  SCAN_INTS,
  validateConfig,
} from '../src/index.js';

describe('Configuration', () => {
  describe('validateConfig', () => {
    it('returns the defaults for an empty document', () => {
      expect(validateConfig(null)).toEqual(createDefaultConfig());
      expect(validateConfig({})).toEqual({
        mode: LISP_TOKENS,
        whitespace: LISP_WHITESPACE,
        rawStringDelimiter: '¬',
      });
    });

    it('builds a mode from token class names', () => {
      expect(validateConfig({ mode: ['idents', 'ints'] }).mode).toBe(
        SCAN_IDENTS | SCAN_INTS
      );
      expect(validateConfig({ mode: 'all' }).mode).toBe(LISP_TOKENS);
      expect(validateConfig({ mode: [] }).mode).toBe(0);
    });

    it('builds a whitespace mask from characters', () => {
      expect(validateConfig({ whitespace: [' ', ','] }).whitespace).toBe(
        (1n << 0x20n) | (1n << 0x2cn)
      );
    });

    it('accepts a one-character raw string delimiter', () => {
      expect(validateConfig({ rawStringDelimiter: '|' }).rawStringDelimiter).toBe(
        '|'
      );
    });

    it('rejects malformed documents', () => {
      expect(() => validateConfig([])).toThrow(
        'Invalid configuration: must be an object'
      );
      expect(() => validateConfig({ modes: 'all' })).toThrow(
        'Invalid configuration: unknown key modes'
      );
    });

    it('rejects malformed modes', () => {
      expect(() => validateConfig({ mode: 'some' })).toThrow(
        'Invalid configuration: mode must be "all" or a list of token classes'
      );
      expect(() => validateConfig({ mode: ['idents', 'chars'] })).toThrow(
        'Invalid configuration: unknown mode "chars"'
      );
    });

    it('rejects malformed whitespace', () => {
      expect(() => validateConfig({ whitespace: ' ,' })).toThrow(
        'Invalid configuration: whitespace must be a list of characters'
      );
      expect(() => validateConfig({ whitespace: ['ab'] })).toThrow(
        'Invalid configuration: whitespace entry "ab" is not a single character'
      );
      expect(() => validateConfig({ whitespace: ['a'] })).toThrow(
        'Invalid configuration: Whitespace character out of range: "a"'
      );
    });

    it('rejects malformed delimiters', () => {
      expect(() => validateConfig({ rawStringDelimiter: 1 })).toThrow(
        'Invalid configuration: rawStringDelimiter must be a string'
      );
      expect(() => validateConfig({ rawStringDelimiter: '||' })).toThrow(
        'Invalid configuration: Raw string delimiter must be a single character: "||"'
      );
    });
  });

  describe('parseConfig', () => {
    it('reads YAML', () => {
      const config = parseConfig('mode: [idents, ints]\nrawStringDelimiter: "|"\n');
      expect(config.mode).toBe(SCAN_IDENTS | SCAN_INTS);
      expect(config.rawStringDelimiter).toBe('|');
    });

    it('reads JSON', () => {
      expect(parseConfig('{"whitespace": [" "]}').whitespace).toBe(1n << 0x20n);
    });

    it('reports a syntax error', () => {
      expect(() => parseConfig('mode: [idents')).toThrow(
        /^Invalid configuration: invalid YAML/
      );
    });
  });

  describe('file lookup', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lisp-scan-config-'));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    afterEach(async () => {
      for (const name of ['.lisp-scan.yaml', '.lisp-scan.json']) {
        await fs.rm(path.join(tempDir, name), { force: true });
      }
    });

    it('returns null when no file exists', () => {
      expect(loadConfig(tempDir)).toBeNull();
    });

    it('prefers the YAML file', async () => {
      await fs.writeFile(path.join(tempDir, '.lisp-scan.yaml'), 'mode: [idents]\n');
      await fs.writeFile(path.join(tempDir, '.lisp-scan.json'), '{"mode": "all"}');
      expect(loadConfig(tempDir)?.mode).toBe(SCAN_IDENTS);
    });

    it('falls back to the JSON file', async () => {
      await fs.writeFile(path.join(tempDir, '.lisp-scan.json'), '{"mode": ["ints"]}');
      expect(loadConfig(tempDir)?.mode).toBe(SCAN_INTS);
    });

    it('reports an unreadable explicit path', () => {
      expect(() => loadConfigFile(path.join(tempDir, 'missing.yaml'))).toThrow(
        /^Invalid configuration: failed to read file/
      );
    });
  });
});
