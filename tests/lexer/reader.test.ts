/**
 * Rune Reader Tests
 * UTF-8 decoding, lookahead, cursor tracking and byte source failures
 */

import { describe, expect, it } from 'vitest';
import {
  type ByteSource,
  EOF_RUNE,
  fromBytes,
  fromChunks,
  fromString,
  REPLACEMENT_RUNE,
  RuneReader,
  SourceReadError,
} from '../../src/index.js';

type Reported = [string, number, number, number];

function reader(source: ByteSource): { r: RuneReader; reported: Reported[] } {
  const reported: Reported[] = [];
  const r = new RuneReader(source, (errorId, at) => {
    reported.push([errorId, at.offset, at.line, at.column]);
  });
  return { r, reported };
}

function drain(r: RuneReader): number[] {
  const runes: number[] = [];
  for (let ch = r.next(); ch !== EOF_RUNE; ch = r.next()) {
    runes.push(ch);
  }
  return runes;
}

describe('RuneReader', () => {
  describe('decoding', () => {
    it('decodes ASCII and multi-byte runes', () => {
      const { r, reported } = reader(fromString('aé本😀'));
      expect(drain(r)).toEqual([0x61, 0xe9, 0x672c, 0x1f600]);
      expect(reported).toEqual([]);
    });

    it('decodes a rune split across chunks', () => {
      const { r } = reader(
        fromChunks([
          Uint8Array.of(0xe6),
          new Uint8Array(0),
          Uint8Array.of(0x9c, 0xac, 0x61),
        ])
      );
      expect(drain(r)).toEqual([0x672c, 0x61]);
    });

    it('reads input longer than its buffer', () => {
      const { r, reported } = reader(fromString('é'.repeat(1500)));
      const runes = drain(r);
      expect(runes).toHaveLength(1500);
      expect(runes.every((ch) => ch === 0xe9)).toBe(true);
      expect(r.cursor()).toEqual({ offset: 3000, line: 1, column: 1501 });
      expect(reported).toEqual([]);
    });
  });

  describe('malformed input', () => {
    it('replaces an invalid byte and reports it at its offset', () => {
      const { r, reported } = reader(fromBytes(Uint8Array.of(0x61, 0xff, 0x62)));
      expect(drain(r)).toEqual([0x61, REPLACEMENT_RUNE, 0x62]);
      expect(reported).toEqual([['SCAN-D001', 1, 1, 2]]);
    });

    it('replaces each byte of a truncated sequence at end of input', () => {
      const { r, reported } = reader(fromBytes(Uint8Array.of(0xe6, 0x9c)));
      expect(drain(r)).toEqual([REPLACEMENT_RUNE, REPLACEMENT_RUNE]);
      expect(reported.map((e) => e[0])).toEqual(['SCAN-D001', 'SCAN-D001']);
    });

    it('rejects overlong encodings', () => {
      const { r, reported } = reader(fromBytes(Uint8Array.of(0xc0, 0x80)));
      expect(drain(r)).toEqual([REPLACEMENT_RUNE, REPLACEMENT_RUNE]);
      expect(reported).toHaveLength(2);
    });

    it('rejects encoded surrogates', () => {
      const { r, reported } = reader(
        fromBytes(Uint8Array.of(0xed, 0xa0, 0x80))
      );
      expect(drain(r)).toEqual([
        REPLACEMENT_RUNE,
        REPLACEMENT_RUNE,
        REPLACEMENT_RUNE,
      ]);
      expect(reported).toHaveLength(3);
    });

    it('rejects values above U+10FFFF', () => {
      const { r, reported } = reader(
        fromBytes(Uint8Array.of(0xf4, 0x90, 0x80, 0x80, 0x61))
      );
      const runes = drain(r);
      expect(runes[runes.length - 1]).toBe(0x61);
      expect(runes.slice(0, -1).every((ch) => ch === REPLACEMENT_RUNE)).toBe(
        true
      );
      expect(reported).toHaveLength(4);
    });

    it('returns NUL and reports it', () => {
      const { r, reported } = reader(fromBytes(Uint8Array.of(0x61, 0x00)));
      expect(drain(r)).toEqual([0x61, 0x00]);
      expect(reported).toEqual([['SCAN-D002', 1, 1, 2]]);
    });
  });

  describe('lookahead and cursor', () => {
    it('peek does not consume', () => {
      const { r } = reader(fromString('ab'));
      expect(r.peek()).toBe(0x61);
      expect(r.peek()).toBe(0x61);
      expect(r.next()).toBe(0x61);
      expect(r.peek()).toBe(0x62);
    });

    it('returns EOF on every call at end of input', () => {
      const { r } = reader(fromString(''));
      expect(r.peek()).toBe(EOF_RUNE);
      expect(r.next()).toBe(EOF_RUNE);
      expect(r.next()).toBe(EOF_RUNE);
      expect(r.cursor()).toEqual({ offset: 0, line: 1, column: 1 });
    });

    it('advances offset by encoded width and column by one', () => {
      const { r } = reader(fromString('é\nx'));
      r.next();
      expect(r.cursor()).toEqual({ offset: 2, line: 1, column: 2 });
      r.next();
      expect(r.cursor()).toEqual({ offset: 3, line: 2, column: 1 });
    });

    it('skips a leading byte order mark without taking a column', () => {
      const { r } = reader(fromString('\uFEFFab'));
      expect(r.peek()).toBe(0x61);
      expect(r.cursor()).toEqual({ offset: 3, line: 1, column: 1 });
      r.next();
      expect(r.cursor()).toEqual({ offset: 4, line: 1, column: 2 });
    });

    it('keeps a byte order mark that is not the first rune', () => {
      const { r } = reader(fromString('a\uFEFF'));
      expect(drain(r)).toEqual([0x61, 0xfeff]);
    });
  });

  describe('byte source failures', () => {
    it('throws SourceReadError with the original cause', () => {
      const failure = new Error('disk gone');
      const { r } = reader({
        read() {
          throw failure;
        },
      });
      let caught: unknown;
      try {
        r.peek();
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(SourceReadError);
      if (caught instanceof SourceReadError) {
        expect(caught.errorId).toBe('SCAN-S001');
        expect(caught.message).toBe('failed to read source: disk gone');
        expect(caught.cause).toBe(failure);
      }
    });

    it('retries the source on the next call', () => {
      let calls = 0;
      const { r } = reader({
        read(buffer) {
          calls++;
          if (calls === 1) {
            throw new Error('busy');
          }
          if (calls === 2) {
            buffer.set([0x78]);
            return 1;
          }
          return 0;
        },
      });
      expect(() => r.peek()).toThrow(SourceReadError);
      expect(r.next()).toBe(0x78);
      expect(r.next()).toBe(EOF_RUNE);
    });
  });
});
