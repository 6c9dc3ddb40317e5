/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  /** Source split into code points so columns count characters */
  readonly chars: readonly string[];
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    chars: Array.from(source),
    pos: 0,
    line: 0,
    column: 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.chars[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.chars.slice(state.pos, state.pos + length).join('');
}

// Expressions are single-line: line never changes.
export function advance(state: LexerState): string {
  const ch = state.chars[state.pos] ?? '';
  state.pos++;
  state.column++;
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}
