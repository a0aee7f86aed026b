/**
 * Token Type Tests
 * Tag constants, tagged-union conversion and printable names
 */

import { describe, expect, it } from 'vitest';
import {
  classifyTag,
  COMMENT,
  EOF,
  FLOAT,
  IDENT,
  INT,
  KEYWORD,
  RAW_STRING,
  SCAN_COMMENTS,
  SCAN_FLOATS,
  SCAN_IDENTS,
  SCAN_INTS,
  SCAN_KEYWORDS,
  SCAN_RAW_STRINGS,
  SCAN_STRINGS,
  SKIP_COMMENTS,
  LISP_TOKENS,
  STRING,
  tagOf,
  tokenKind,
  tokenString,
} from '../src/index.js';

describe('Token Types', () => {
  it('keeps the integer encoding of the class tags', () => {
    expect([EOF, IDENT, INT, FLOAT, STRING, KEYWORD, RAW_STRING, COMMENT]).toEqual(
      [-1, -2, -3, -4, -5, -6, -7, -8]
    );
  });

  it('places each mode bit at its negated tag', () => {
    expect(SCAN_IDENTS).toBe(4);
    expect(SCAN_INTS).toBe(8);
    expect(SCAN_FLOATS).toBe(16);
    expect(SCAN_STRINGS).toBe(32);
    expect(SCAN_KEYWORDS).toBe(64);
    expect(SCAN_RAW_STRINGS).toBe(128);
    expect(SCAN_COMMENTS).toBe(256);
    expect(SKIP_COMMENTS).toBe(512);
    expect(LISP_TOKENS).toBe(1012);
  });

  describe('classifyTag', () => {
    it('maps class tags to their kinds', () => {
      expect(classifyTag(IDENT)).toEqual({ kind: 'Ident' });
      expect(classifyTag(RAW_STRING)).toEqual({ kind: 'RawString' });
      expect(classifyTag(EOF)).toEqual({ kind: 'EOF' });
    });

    it('maps code points to characters', () => {
      expect(classifyTag(0)).toEqual({ kind: 'Char', rune: 0 });
      expect(classifyTag(0x28)).toEqual({ kind: 'Char', rune: 0x28 });
      expect(classifyTag(0x10ffff)).toEqual({ kind: 'Char', rune: 0x10ffff });
    });

    it('rejects tags outside both ranges', () => {
      expect(() => classifyTag(-9)).toThrow(RangeError);
      expect(() => classifyTag(0x110000)).toThrow('Invalid token tag: 1114112');
    });

    it('round-trips through tagOf', () => {
      for (const tag of [EOF, IDENT, INT, FLOAT, STRING, KEYWORD, RAW_STRING, COMMENT, 0x7b]) {
        expect(tagOf(classifyTag(tag))).toBe(tag);
      }
    });
  });

  it('names tags', () => {
    expect(tokenKind(FLOAT)).toBe('Float');
    expect(tokenKind(0x3a)).toBe('Char');
    expect(tokenString(KEYWORD)).toBe('Keyword');
    expect(tokenString(0x28)).toBe('"("');
    expect(tokenString(0x22)).toBe('"\\""');
    expect(tokenString(-42)).toBe('Token(-42)');
  });
});
