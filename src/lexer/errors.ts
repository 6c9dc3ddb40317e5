/**
 * Lexer Errors
 */

import { CasBenchError } from '../types.js';
import type { InvalidLexemeErrorData, SourceLocation } from '../types.js';

/**
 * Raised when a character cannot start any token or breaks the rules of the
 * token it started. Aborts the whole scan.
 */
export class InvalidLexemeError extends CasBenchError {
  readonly char: string;
  readonly line: number;
  readonly column: number;
  readonly index: number;

  constructor(char: string, location: SourceLocation) {
    super(
      'CAS-L001',
      'lexer',
      {
        char,
        line: location.line,
        column: location.column,
        index: location.offset,
      },
      location
    );
    this.name = 'InvalidLexemeError';
    this.char = char;
    this.line = location.line;
    this.column = location.column;
    this.index = location.offset;
  }

  toData(): InvalidLexemeErrorData {
    return {
      kind: 'invalid_lexeme',
      errorId: this.errorId,
      message: this.message,
      char: this.char,
      line: this.line,
      column: this.column,
      index: this.index,
    };
  }
}
