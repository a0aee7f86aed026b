/**
 * Scanner Errors
 * Error classes whose IDs and messages come from the registry
 */

import type { Position } from './position.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Plain-object form of a scanner error */
export interface ScanErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: Position | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

function lookupDefinition(errorId: string): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return definition;
}

function expectCategory(
  definition: ErrorDefinition,
  categories: readonly ErrorCategory[],
  label: string
): void {
  if (!categories.includes(definition.category)) {
    throw new TypeError(
      `Expected ${label} error ID, got: ${definition.errorId}`
    );
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class of every scanner error.
 * The message carries an ` at line:column` suffix when a location is known.
 */
export class ScanError extends Error {
  readonly errorId: string;
  readonly location?: Position | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ScanErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const where =
      data.location !== undefined
        ? ` at ${data.location.line}:${data.location.column}`
        : '';
    super(
      data.message + where,
      data.cause !== undefined ? { cause: data.cause } : undefined
    );
    this.name = 'ScanError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Message without the location suffix, with ID, location and context */
  toData(): ScanErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Render through `formatter`, or return the message */
  format(formatter?: (data: ScanErrorData) => string): string {
    return formatter !== undefined ? formatter(this.toData()) : this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @throws TypeError for an ID the registry does not know
 *
 * @example
 * createError('SCAN-L003', { digit: "'9'", literal: 'octal literal' }, pos)
 * // ScanError: "invalid digit '9' in octal literal at 1:1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: Position | undefined
): ScanError {
  const definition = lookupDefinition(errorId);
  return new ScanError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Malformed input found while scanning (decode and lexer categories).
 * The scanner counts these and keeps going; it never throws one itself.
 */
export class LexicalError extends ScanError {
  override readonly location: Position;

  constructor(
    errorId: string,
    location: Position,
    context: Record<string, unknown> = {}
  ) {
    const definition = lookupDefinition(errorId);
    expectCategory(definition, ['decode', 'lexer'], 'lexical');

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'LexicalError';
    this.location = location;
  }
}

/** The byte source failed; thrown instead of returning a token */
export class SourceReadError extends ScanError {
  constructor(cause: unknown, location?: Position) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const definition = lookupDefinition('SCAN-S001');
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, { reason }),
      location,
      context: { reason },
      cause,
    });
    this.name = 'SourceReadError';
  }
}
