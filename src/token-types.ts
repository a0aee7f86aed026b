import type { Position } from './position.js';

// ============================================================
// TOKEN TAGS
// ============================================================

/**
 * Token class sentinels returned by `Scanner.scan()`.
 * Any non-negative tag is the code point of a single-character token.
 */
export const TOKEN_TYPES = {
  EOF: -1,
  IDENT: -2,
  INT: -3,
  FLOAT: -4,
  STRING: -5,
  KEYWORD: -6,
  RAW_STRING: -7,
  COMMENT: -8,
} as const;

export const EOF = TOKEN_TYPES.EOF;
export const IDENT = TOKEN_TYPES.IDENT;
export const INT = TOKEN_TYPES.INT;
export const FLOAT = TOKEN_TYPES.FLOAT;
export const STRING = TOKEN_TYPES.STRING;
export const KEYWORD = TOKEN_TYPES.KEYWORD;
export const RAW_STRING = TOKEN_TYPES.RAW_STRING;
export const COMMENT = TOKEN_TYPES.COMMENT;

/** A token class sentinel or a code point */
export type TokenTag = number;

export type TokenClassTag = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

// ============================================================
// TOKEN CLASSES
// ============================================================

export type TokenKind =
  | 'EOF'
  | 'Ident'
  | 'Int'
  | 'Float'
  | 'String'
  | 'Keyword'
  | 'RawString'
  | 'Comment'
  | 'Char';

export type TokenClass =
  | { readonly kind: Exclude<TokenKind, 'Char'> }
  | { readonly kind: 'Char'; readonly rune: number };

const KIND_BY_TAG: ReadonlyMap<number, Exclude<TokenKind, 'Char'>> = new Map<
  number,
  Exclude<TokenKind, 'Char'>
>([
  [TOKEN_TYPES.EOF, 'EOF'],
  [TOKEN_TYPES.IDENT, 'Ident'],
  [TOKEN_TYPES.INT, 'Int'],
  [TOKEN_TYPES.FLOAT, 'Float'],
  [TOKEN_TYPES.STRING, 'String'],
  [TOKEN_TYPES.KEYWORD, 'Keyword'],
  [TOKEN_TYPES.RAW_STRING, 'RawString'],
  [TOKEN_TYPES.COMMENT, 'Comment'],
]);

const TAG_BY_KIND: Readonly<Record<Exclude<TokenKind, 'Char'>, TokenClassTag>> =
  {
    EOF: TOKEN_TYPES.EOF,
    Ident: TOKEN_TYPES.IDENT,
    Int: TOKEN_TYPES.INT,
    Float: TOKEN_TYPES.FLOAT,
    String: TOKEN_TYPES.STRING,
    Keyword: TOKEN_TYPES.KEYWORD,
    RawString: TOKEN_TYPES.RAW_STRING,
    Comment: TOKEN_TYPES.COMMENT,
  };

function isCodePoint(tag: number): boolean {
  return Number.isInteger(tag) && tag >= 0 && tag <= 0x10ffff;
}

/**
 * Convert a scan tag into its tagged-union form.
 * Throws RangeError for a negative tag outside the class range or a value above U+10FFFF.
 */
export function classifyTag(tag: TokenTag): TokenClass {
  const kind = KIND_BY_TAG.get(tag);
  if (kind !== undefined) {
    return { kind };
  }
  if (!isCodePoint(tag)) {
    throw new RangeError(`Invalid token tag: ${tag}`);
  }
  return { kind: 'Char', rune: tag };
}

/** Inverse of classifyTag */
export function tagOf(cls: TokenClass): TokenTag {
  if (cls.kind === 'Char') {
    return cls.rune;
  }
  return TAG_BY_KIND[cls.kind];
}

/** Kind name of a tag; code points map to 'Char' */
export function tokenKind(tag: TokenTag): TokenKind {
  return KIND_BY_TAG.get(tag) ?? 'Char';
}

/**
 * Printable form of a tag: the class name, or the quoted character.
 *
 * @example
 * tokenString(IDENT) // 'Ident'
 * tokenString(0x28)  // '"("'
 */
export function tokenString(tag: TokenTag): string {
  const kind = KIND_BY_TAG.get(tag);
  if (kind !== undefined) {
    return kind;
  }
  if (isCodePoint(tag)) {
    return JSON.stringify(String.fromCodePoint(tag));
  }
  return `Token(${tag})`;
}

// ============================================================
// TOKEN RECORD
// ============================================================

export interface Token {
  readonly tag: TokenTag;
  readonly kind: TokenKind;
  /** Verbatim source text */
  readonly text: string;
  /** Decoded literal for String and RawString tokens; equal to text otherwise */
  readonly value: string;
  /** Position of the first rune */
  readonly position: Position;
}
