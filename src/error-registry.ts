/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * decode (D) and lexer (L) errors are counted and scanning continues;
 * source (S) errors are thrown.
 */
export type ErrorCategory = 'decode' | 'lexer' | 'source';

/** A sample input that triggers the error */
export interface ErrorExample {
  readonly description: string;
  /** Scanner input, as source text */
  readonly code: string;
}

/** One malformed-input or source condition the scanner can report */
export interface ErrorDefinition {
  /** SCAN-{D|L|S}{3 digits}, e.g. SCAN-L001 */
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly description: string;
  /** `{name}` placeholders are filled from the error context */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Lookup over every error definition, keyed by ID */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  /** Definitions of one category, in registration order */
  byCategory(category: ErrorCategory): ErrorDefinition[];
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class DefinitionTable implements ErrorRegistry {
  private readonly definitions: ReadonlyMap<string, ErrorDefinition>;

  constructor(list: readonly ErrorDefinition[]) {
    const table = new Map<string, ErrorDefinition>();
    for (const definition of list) {
      if (table.has(definition.errorId)) {
        throw new Error(`Duplicate error ID: ${definition.errorId}`);
      }
      table.set(definition.errorId, definition);
    }
    this.definitions = table;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.definitions.get(errorId);
  }

  has(errorId: string): boolean {
    return this.definitions.has(errorId);
  }

  byCategory(category: ErrorCategory): ErrorDefinition[] {
    return [...this.definitions.values()].filter(
      (definition) => definition.category === category
    );
  }

  get size(): number {
    return this.definitions.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.definitions.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Decode Errors (SCAN-D0xx)
  {
    errorId: 'SCAN-D001',
    category: 'decode',
    description: 'Invalid UTF-8 encoding',
    messageTemplate: 'invalid UTF-8 encoding',
    cause:
      'A byte does not start or continue a well-formed UTF-8 sequence (bad lead byte, overlong form, surrogate, or truncated sequence).',
    resolution:
      'Re-encode the input as UTF-8. Each offending byte is replaced by U+FFFD in the token stream.',
    examples: [
      { description: 'Latin-1 encoded e-acute', code: '\\xE9' },
      { description: 'Truncated three-byte sequence', code: '\\xE6\\x9C' },
    ],
  },
  {
    errorId: 'SCAN-D002',
    category: 'decode',
    description: 'NUL character in input',
    messageTemplate: 'invalid character NUL',
    cause: 'The input contains a U+0000 character.',
    resolution: 'Remove the NUL byte; it usually indicates binary input.',
  },

  // Lexer Errors (SCAN-L0xx)
  {
    errorId: 'SCAN-L001',
    category: 'lexer',
    description: 'Unterminated literal',
    messageTemplate: 'literal not terminated',
    cause:
      'A string reached a newline or end of input, or a raw string reached end of input, before its closing delimiter.',
    resolution:
      'Add the closing delimiter. Use a raw string (¬...¬) for text spanning several lines.',
    examples: [
      { description: 'Missing closing quote', code: '"hello' },
      { description: 'Missing closing raw delimiter', code: '¬hello' },
    ],
  },
  {
    errorId: 'SCAN-L002',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'invalid char escape',
    cause:
      'Backslash followed by an unsupported character, or a numeric escape with too few digits.',
    resolution:
      'Use \\a \\b \\f \\n \\r \\t \\v \\\\ \\" \\0, three octal digits, \\xHH, \\uHHHH or \\UHHHHHHHH.',
    examples: [
      { description: 'Unsupported escape', code: '"a\\qb"' },
      { description: 'Short hex escape', code: '"\\x4"' },
    ],
  },
  {
    errorId: 'SCAN-L003',
    category: 'lexer',
    description: 'Invalid digit for radix',
    messageTemplate: 'invalid digit {digit} in {literal}',
    cause: 'An integer literal contains a digit outside its radix.',
    resolution:
      'Remove the leading 0 for a decimal literal, or use digits valid for the radix.',
    examples: [
      { description: 'Nine in a legacy octal literal', code: '09' },
      { description: 'Two in a binary literal', code: '0b102' },
    ],
  },
  {
    errorId: 'SCAN-L004',
    category: 'lexer',
    description: 'Literal has no digits',
    messageTemplate: '{literal} has no digits',
    cause: 'A radix prefix is not followed by any digit.',
    resolution: 'Add digits after the prefix.',
    examples: [{ description: 'Bare hexadecimal prefix', code: '0x' }],
  },
  {
    errorId: 'SCAN-L005',
    category: 'lexer',
    description: 'Exponent has no digits',
    messageTemplate: 'exponent has no digits',
    cause: 'An exponent marker is not followed by decimal digits.',
    resolution: 'Add the exponent digits or remove the marker.',
    examples: [{ description: 'Sign without digits', code: '1e+' }],
  },
  {
    errorId: 'SCAN-L006',
    category: 'lexer',
    description: 'Exponent does not match mantissa',
    messageTemplate: "'{exponent}' exponent requires {mantissa} mantissa",
    cause:
      "An 'e' exponent follows a non-decimal mantissa, or a 'p' exponent follows a non-hexadecimal one.",
    resolution: "Use 'e' for decimal floats and 'p' for hexadecimal floats.",
    examples: [
      { description: 'Decimal exponent on binary literal', code: '0b1e5' },
      { description: 'Binary exponent on decimal literal', code: '1p3' },
    ],
  },
  {
    errorId: 'SCAN-L007',
    category: 'lexer',
    description: 'Hexadecimal float without exponent',
    messageTemplate: "hexadecimal mantissa requires a 'p' exponent",
    cause: "A hexadecimal literal with a radix point has no 'p' exponent.",
    resolution: "Add a 'p' exponent, e.g. 0x1.8p0.",
    examples: [{ description: 'Missing exponent', code: '0x1.8' }],
  },
  {
    errorId: 'SCAN-L008',
    category: 'lexer',
    description: 'Radix point in integer-only literal',
    messageTemplate: 'invalid radix point in {literal}',
    cause: 'A binary or 0o-octal literal contains a radix point.',
    resolution: 'Use a decimal or hexadecimal literal for fractional values.',
    examples: [{ description: 'Binary fraction', code: '0b1.1' }],
  },
  {
    errorId: 'SCAN-L009',
    category: 'lexer',
    description: 'Misplaced digit separator',
    messageTemplate: "'_' must separate successive digits",
    cause: 'A digit separator is leading, trailing, or doubled.',
    resolution: 'Place each _ between two digits.',
    examples: [
      { description: 'Trailing separator', code: '1_' },
      { description: 'Doubled separator', code: '1__0' },
    ],
  },
  {
    errorId: 'SCAN-L010',
    category: 'lexer',
    description: 'Escape names an invalid code point',
    messageTemplate: 'escape sequence is invalid Unicode code point',
    cause:
      'A \\u or \\U escape names a surrogate or a value above U+10FFFF.',
    resolution: 'Use a Unicode scalar value.',
    examples: [{ description: 'Lone surrogate', code: '"\\uD800"' }],
  },

  // Source Errors (SCAN-S0xx)
  {
    errorId: 'SCAN-S001',
    category: 'source',
    description: 'Byte source read failed',
    messageTemplate: 'failed to read source: {reason}',
    cause: 'The underlying byte source threw while supplying input.',
    resolution:
      'Inspect the error cause. Scanning can resume once the source recovers.',
  },
];

/** Every scanner error, built once at module load */
export const ERROR_REGISTRY: ErrorRegistry = new DefinitionTable(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Fill `{name}` placeholders from `context`.
 * Absent names render empty; other values go through String().
 * A template with an unclosed brace is returned as is.
 *
 * @example
 * renderMessage('invalid digit {digit} in {literal}', { digit: "'9'", literal: 'octal literal' })
 * // "invalid digit '9' in octal literal"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let out = '';
  let from = 0;

  for (;;) {
    const open = template.indexOf('{', from);
    if (open === -1) {
      return out + template.slice(from);
    }
    const close = template.indexOf('}', open + 1);
    if (close === -1) {
      return template;
    }
    out += template.slice(from, open);
    const value = context[template.slice(open + 1, close)];
    if (value !== undefined) {
      out += String(value);
    }
    from = close + 1;
  }
}
