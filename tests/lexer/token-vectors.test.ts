/**
 * Lexer Tests: Token Vectors
 * Every vector scanned in sequence, one per line after leading whitespace
 */

import * as fs from 'node:fs';
import { describe, expect, it } from 'vitest';
import {
  COMMENT,
  LISP_TOKENS,
  SKIP_COMMENTS,
  type TokenKind,
} from '../../src/index.js';
import { scanFull } from '../helpers/scan.js';

interface TokenVector {
  tag: number;
  kind: TokenKind;
  text: string;
}

const vectors: TokenVector[] = JSON.parse(
  fs.readFileSync(
    new URL('../fixtures/token-vectors.json', import.meta.url),
    'utf-8'
  )
) as TokenVector[];

const source = vectors.map((v) => ` \t${v.text}\n`).join('');

/** Expected start line of each vector, counting newlines inside earlier ones */
function expectedLines(): number[] {
  const lines: number[] = [];
  let line = 1;
  for (const v of vectors) {
    lines.push(line);
    line += v.text.split('\n').length;
  }
  return lines;
}

describe('Lexer: Token Vectors', () => {
  it('loads the fixture', () => {
    expect(vectors.length).toBeGreaterThan(100);
  });

  it('scans every vector with comments emitted', () => {
    const { tokens, errors } = scanFull(source, {
      mode: LISP_TOKENS & ~SKIP_COMMENTS,
    });
    const lines = expectedLines();

    expect(errors).toEqual([]);
    expect(tokens).toHaveLength(vectors.length + 1);
    vectors.forEach((v, i) => {
      const token = tokens[i]!;
      expect([token.tag, token.kind, token.text]).toEqual([v.tag, v.kind, v.text]);
      expect(token.position.line).toBe(lines[i]);
      expect(token.position.column).toBe(3);
    });
    expect(tokens[vectors.length]!.kind).toBe('EOF');
  });

  it('scans every vector but the comments by default', () => {
    const { tokens, errors } = scanFull(source);
    const expected = vectors.filter((v) => v.tag !== COMMENT);

    expect(errors).toEqual([]);
    expect(tokens.slice(0, -1).map((t) => [t.tag, t.text])).toEqual(
      expected.map((v) => [v.tag, v.text])
    );
  });
});
