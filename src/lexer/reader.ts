/**
 * Rune Reader
 * Decodes UTF-8 from a byte source with one rune of lookahead
 */

import { SourceReadError } from '../error-classes.js';

// ============================================================
// BYTE SOURCES
// ============================================================

/**
 * Sequential byte supplier.
 * `read` fills the front of `buffer` and returns the number of bytes written;
 * 0 means end of input. A thrown error is reported as a SourceReadError.
 */
export interface ByteSource {
  read(buffer: Uint8Array): number;
}

export type ByteInput = ByteSource | Uint8Array | string;

/** Byte source over an iterable of chunks; empty chunks are skipped */
export function fromChunks(chunks: Iterable<Uint8Array>): ByteSource {
  const iterator = chunks[Symbol.iterator]();
  let current: Uint8Array = new Uint8Array(0);
  let done = false;

  return {
    read(buffer: Uint8Array): number {
      while (current.length === 0) {
        if (done) return 0;
        const step = iterator.next();
        if (step.done === true) {
          done = true;
          return 0;
        }
        current = step.value;
      }
      const n = Math.min(buffer.length, current.length);
      buffer.set(current.subarray(0, n));
      current = current.subarray(n);
      return n;
    },
  };
}

export function fromBytes(bytes: Uint8Array): ByteSource {
  return fromChunks([bytes]);
}

export function fromString(text: string): ByteSource {
  return fromBytes(new TextEncoder().encode(text));
}

export function toByteSource(input: ByteInput): ByteSource {
  if (typeof input === 'string') return fromString(input);
  if (input instanceof Uint8Array) return fromBytes(input);
  return input;
}

// ============================================================
// RUNE READER
// ============================================================

export const EOF_RUNE = -1;
export const REPLACEMENT_RUNE = 0xfffd;
const BOM = 0xfeff;
const NO_RUNE = -2;
const BUF_LEN = 1024; // at least 4 (max UTF-8 sequence length)

/** Position of a rune in the byte stream (filename is added by the scanner) */
export interface Cursor {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export type DecodeErrorId = 'SCAN-D001' | 'SCAN-D002';

/** Called for each malformed sequence or NUL, with the rune's start cursor */
export type DecodeErrorHandler = (errorId: DecodeErrorId, at: Cursor) => void;

/** Sequence length from a lead byte; 0 for a byte that cannot start one */
function sequenceLength(b0: number): number {
  if (b0 < 0x80) return 1;
  if (b0 >= 0xc2 && b0 <= 0xdf) return 2;
  if (b0 >= 0xe0 && b0 <= 0xef) return 3;
  if (b0 >= 0xf0 && b0 <= 0xf4) return 4;
  return 0;
}

/** Valid range of the second byte, which also excludes overlongs and surrogates */
function secondByteRange(b0: number): [number, number] {
  switch (b0) {
    case 0xe0:
      return [0xa0, 0xbf];
    case 0xed:
      return [0x80, 0x9f];
    case 0xf0:
      return [0x90, 0xbf];
    case 0xf4:
      return [0x80, 0x8f];
    default:
      return [0x80, 0xbf];
  }
}

export class RuneReader {
  private readonly source: ByteSource;
  private readonly onDecodeError: DecodeErrorHandler;
  private readonly buf = new Uint8Array(BUF_LEN);
  private bufPos = 0;
  private bufEnd = 0;
  private atEnd = false;
  private started = false;

  // Cursor just past the last consumed rune; also where the lookahead starts
  private offset = 0;
  private line = 1;
  private column = 1;

  // One rune of lookahead
  private ahead = NO_RUNE;
  private aheadWidth = 0;

  constructor(source: ByteSource, onDecodeError: DecodeErrorHandler) {
    this.source = source;
    this.onDecodeError = onDecodeError;
  }

  /** Returns the next rune without consuming it */
  peek(): number {
    if (this.ahead === NO_RUNE) {
      this.decode();
    }
    return this.ahead;
  }

  /** Consumes and returns the next rune; EOF_RUNE at end of input, on every call */
  next(): number {
    const ch = this.peek();
    if (ch === EOF_RUNE) {
      return ch;
    }
    this.offset += this.aheadWidth;
    if (ch === 0x0a) {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.ahead = NO_RUNE;
    return ch;
  }

  /** Start of the lookahead rune, i.e. just past everything consumed so far */
  cursor(): Cursor {
    return { offset: this.offset, line: this.line, column: this.column };
  }

  private decode(): void {
    let { rune, width } = this.decodeAt();
    if (!this.started) {
      this.started = true;
      if (rune === BOM) {
        // Discarded: counts toward offsets but not columns
        this.bufPos += width;
        this.offset += width;
        ({ rune, width } = this.decodeAt());
      }
    }
    if (rune === 0) {
      this.onDecodeError('SCAN-D002', this.cursor());
    }
    this.bufPos += width;
    this.ahead = rune;
    this.aheadWidth = width;
  }

  /** Decodes the rune at bufPos without consuming it */
  private decodeAt(): { rune: number; width: number } {
    if (!this.ensure(1)) {
      return { rune: EOF_RUNE, width: 0 };
    }
    const b0 = this.byteAt(0);
    const len = sequenceLength(b0);
    if (len === 1) {
      return { rune: b0, width: 1 };
    }
    if (len === 0 || !this.ensure(len)) {
      return this.invalid();
    }

    const [lo, hi] = secondByteRange(b0);
    const b1 = this.byteAt(1);
    if (b1 < lo || b1 > hi) {
      return this.invalid();
    }
    let rune = len === 2 ? b0 & 0x1f : len === 3 ? b0 & 0x0f : b0 & 0x07;
    rune = (rune << 6) | (b1 & 0x3f);
    for (let i = 2; i < len; i++) {
      const b = this.byteAt(i);
      if (b < 0x80 || b > 0xbf) {
        return this.invalid();
      }
      rune = (rune << 6) | (b & 0x3f);
    }
    return { rune, width: len };
  }

  private invalid(): { rune: number; width: number } {
    this.onDecodeError('SCAN-D001', this.cursor());
    return { rune: REPLACEMENT_RUNE, width: 1 };
  }

  private byteAt(i: number): number {
    return this.buf[this.bufPos + i] ?? 0;
  }

  /** Makes n bytes available at bufPos if the source has them */
  private ensure(n: number): boolean {
    while (this.bufEnd - this.bufPos < n && !this.atEnd) {
      if (this.bufPos > 0) {
        this.buf.copyWithin(0, this.bufPos, this.bufEnd);
        this.bufEnd -= this.bufPos;
        this.bufPos = 0;
      }
      let count: number;
      try {
        count = this.source.read(this.buf.subarray(this.bufEnd));
      } catch (err) {
        throw new SourceReadError(err);
      }
      if (count <= 0) {
        this.atEnd = true;
      } else {
        this.bufEnd += Math.min(count, BUF_LEN - this.bufEnd);
      }
    }
    return this.bufEnd - this.bufPos >= n;
  }
}
