/**
 * Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import type { Token } from './token-types.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

interface ErrorDataBase {
  readonly errorId: string;
  readonly message: string;
}

export interface InvalidLexemeErrorData extends ErrorDataBase {
  readonly kind: 'invalid_lexeme';
  readonly char: string;
  readonly line: number;
  readonly column: number;
  readonly index: number;
}

export interface UnexpectedTokenErrorData extends ErrorDataBase {
  readonly kind: 'unexpected_token';
  readonly token: Token;
  readonly expected: string;
}

export interface ExhaustedTokensErrorData extends ErrorDataBase {
  readonly kind: 'exhausted_tokens';
  readonly expected: string;
}

export interface DefinitionErrorData extends ErrorDataBase {
  readonly kind: 'definition';
  readonly path: string;
  readonly reason: string;
}

/**
 * Plain-data view of every error the library raises.
 * Hosts that prefer result values over exceptions switch on `kind`.
 */
export type CasBenchErrorData =
  | InvalidLexemeErrorData
  | UnexpectedTokenErrorData
  | ExhaustedTokensErrorData
  | DefinitionErrorData;

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all casbench errors. Never raised directly.
 *
 * The message is rendered from the registry template of `errorId` with
 * `context`. Unknown ids and ids of another category throw TypeError.
 */
export abstract class CasBenchError extends Error {
  readonly errorId: string;
  readonly context: Readonly<Record<string, unknown>>;
  readonly location: SourceLocation | undefined;

  protected constructor(
    errorId: string,
    category: ErrorCategory,
    context: Readonly<Record<string, unknown>>,
    location?: SourceLocation,
    options?: ErrorOptions
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== category) {
      throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
    }

    super(renderMessage(definition.messageTemplate, context), options);
    this.name = 'CasBenchError';
    this.errorId = errorId;
    this.context = context;
    this.location = location;
  }

  /** Get structured error data for custom formatting */
  abstract toData(): CasBenchErrorData;

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: CasBenchErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// PARSER ERRORS
// ============================================================

/** Raised by parsers when a token cannot appear at its position */
export class UnexpectedTokenError extends CasBenchError {
  readonly token: Token;
  readonly expected: string;

  constructor(token: Token, expected: string) {
    super('CAS-P001', 'parse', {
      found: token.lexeme ?? 'end of stream',
      column: token.column,
      expected,
    });
    this.name = 'UnexpectedTokenError';
    this.token = token;
    this.expected = expected;
  }

  toData(): UnexpectedTokenErrorData {
    return {
      kind: 'unexpected_token',
      errorId: this.errorId,
      message: this.message,
      token: this.token,
      expected: this.expected,
    };
  }
}

/** Raised by parsers that read past the end-of-stream token */
export class ExhaustedTokensError extends CasBenchError {
  readonly expected: string;

  constructor(expected: string) {
    super('CAS-P002', 'parse', { expected });
    this.name = 'ExhaustedTokensError';
    this.expected = expected;
  }

  toData(): ExhaustedTokensErrorData {
    return {
      kind: 'exhausted_tokens',
      errorId: this.errorId,
      message: this.message,
      expected: this.expected,
    };
  }
}

// ============================================================
// DEFINITION ERRORS
// ============================================================

/** Benchmark definition errors; `path` is the dotted location in the document */
export class DefinitionError extends CasBenchError {
  readonly path: string;
  readonly reason: string;

  constructor(
    errorId: string,
    path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(errorId, 'definition', { path, reason }, undefined, options);
    this.name = 'DefinitionError';
    this.path = path;
    this.reason = reason;
  }

  toData(): DefinitionErrorData {
    return {
      kind: 'definition',
      errorId: this.errorId,
      message: this.message,
      path: this.path,
      reason: this.reason,
    };
  }
}
