/**
 * Lexer Tests: Tokenization
 * Token classification, positions, numerals and invalid lexemes
 */

import { describe, expect, it } from 'vitest';

import {
  createLexerState,
  InvalidLexemeError,
  nextToken,
  TOKEN_TYPES,
  tokenize,
  type LiteralTokenType,
  type SymbolTokenType,
  type Token,
} from '../../src/index.js';

function symbol(
  type: SymbolTokenType,
  lexeme: string,
  column: number
): Token {
  return { type, lexeme, line: 0, column, literal: null };
}

function literal(
  type: LiteralTokenType,
  lexeme: string,
  value: number | bigint,
  column: number
): Token {
  return { type, lexeme, line: 0, column, literal: value };
}

function eof(column: number): Token {
  return { type: TOKEN_TYPES.EOF, lexeme: null, line: 0, column, literal: null };
}

/** Rebuild source by padding each lexeme out to its column */
function reconstruct(tokens: readonly Token[]): string {
  let out = '';
  for (const token of tokens) {
    out = out.padEnd(token.column, ' ');
    if (token.lexeme !== null) out += token.lexeme;
  }
  return out;
}

function captureLexError(source: string): InvalidLexemeError {
  try {
    tokenize(source);
  } catch (err) {
    if (err instanceof InvalidLexemeError) return err;
    throw err;
  }
  throw new Error(`Expected InvalidLexemeError for ${source}`);
}

describe('Lexer: tokenize', () => {
  describe('single tokens', () => {
    it.each([
      ['f', [symbol('IDENTIFIER', 'f', 0), eof(1)]],
      ['sin', [symbol('IDENTIFIER', 'sin', 0), eof(3)]],
      ['0', [literal('INTEGER_LITERAL', '0', 0, 0), eof(1)]],
      ['99', [literal('INTEGER_LITERAL', '99', 99, 0), eof(2)]],
      ['1.0', [literal('FLOAT_LITERAL', '1.0', 1, 0), eof(3)]],
      ['10.00', [literal('FLOAT_LITERAL', '10.00', 10, 0), eof(5)]],
      ['99.999', [literal('FLOAT_LITERAL', '99.999', 99.999, 0), eof(6)]],
      ['(', [symbol('LPAREN', '(', 0), eof(1)]],
      [')', [symbol('RPAREN', ')', 0), eof(1)]],
      [',', [symbol('COMMA', ',', 0), eof(1)]],
      ['==', [symbol('EQ', '==', 0), eof(2)]],
      [' , ', [symbol('COMMA', ',', 1), eof(3)]],
    ])('tokenizes %j', (source, expected) => {
      expect(tokenize(source)).toEqual(expected);
    });

    it('returns only EOF at column 0 for empty source', () => {
      expect(tokenize('')).toEqual([eof(0)]);
    });

    it('returns only EOF at the input length for spaces', () => {
      expect(tokenize('      ')).toEqual([eof(6)]);
    });
  });

  describe('statements', () => {
    it('tokenizes a call', () => {
      expect(tokenize('sin(x)')).toEqual([
        symbol('IDENTIFIER', 'sin', 0),
        symbol('LPAREN', '(', 3),
        symbol('IDENTIFIER', 'x', 4),
        symbol('RPAREN', ')', 5),
        eof(6),
      ]);
    });

    it('tokenizes a call with an integer argument', () => {
      expect(tokenize('diff(expr, x, 10)')).toEqual([
        symbol('IDENTIFIER', 'diff', 0),
        symbol('LPAREN', '(', 4),
        symbol('IDENTIFIER', 'expr', 5),
        symbol('COMMA', ',', 9),
        symbol('IDENTIFIER', 'x', 11),
        symbol('COMMA', ',', 12),
        literal('INTEGER_LITERAL', '10', 10, 14),
        symbol('RPAREN', ')', 16),
        eof(17),
      ]);
    });

    it('tokenizes a comparison of nested calls', () => {
      expect(tokenize('evalf(subs(result, x, 1.0)) == 0.5678')).toEqual([
        symbol('IDENTIFIER', 'evalf', 0),
        symbol('LPAREN', '(', 5),
        symbol('IDENTIFIER', 'subs', 6),
        symbol('LPAREN', '(', 10),
        symbol('IDENTIFIER', 'result', 11),
        symbol('COMMA', ',', 17),
        symbol('IDENTIFIER', 'x', 19),
        symbol('COMMA', ',', 20),
        literal('FLOAT_LITERAL', '1.0', 1, 22),
        symbol('RPAREN', ')', 25),
        symbol('RPAREN', ')', 26),
        symbol('EQ', '==', 28),
        literal('FLOAT_LITERAL', '0.5678', 0.5678, 31),
        eof(37),
      ]);
    });

    it('ends every token list in exactly one EOF', () => {
      const tokens = tokenize('f(a, b) == g(1, 2.5)');
      const eofs = tokens.filter((t) => t.type === TOKEN_TYPES.EOF);

      expect(eofs).toHaveLength(1);
      expect(tokens[tokens.length - 1]).toEqual(eof(20));
    });

    it.each([
      'diff(expr, x)',
      '  subs( result ,x,  1.0 )  ',
      'evalf(subs(result, x, 1.0)) == 0.5678',
      'f()==g(  )',
    ])('reconstructs %j from lexemes and columns', (source) => {
      expect(reconstruct(tokenize(source))).toBe(source);
    });

    it('places each token after the previous lexeme and skipped spaces', () => {
      const source = 'f( a,b ,  12.5 )';
      const tokens = tokenize(source);

      for (let i = 1; i < tokens.length; i++) {
        const prev = tokens[i - 1];
        const next = tokens[i];
        if (prev === undefined || next === undefined) continue;
        const prevEnd = prev.column + (prev.lexeme ?? '').length;
        expect(source.slice(prevEnd, next.column)).toMatch(/^ *$/);
      }
    });

    it('keeps line at 0', () => {
      expect(tokenize('f(x, 1) == 2').every((t) => t.line === 0)).toBe(true);
    });
  });

  describe('identifiers', () => {
    it('accepts digits and underscores after the first letter', () => {
      expect(tokenize('x1_y2 x_')).toEqual([
        symbol('IDENTIFIER', 'x1_y2', 0),
        symbol('IDENTIFIER', 'x_', 6),
        eof(8),
      ]);
    });

    it('counts columns in characters for non-ASCII letters', () => {
      expect(tokenize('f(ξ, 𝑥)')).toEqual([
        symbol('IDENTIFIER', 'f', 0),
        symbol('LPAREN', '(', 1),
        symbol('IDENTIFIER', 'ξ', 2),
        symbol('COMMA', ',', 3),
        symbol('IDENTIFIER', '𝑥', 5),
        symbol('RPAREN', ')', 6),
        eof(7),
      ]);
    });
  });

  describe('numerals', () => {
    it('preserves the raw lexeme of a float', () => {
      const [token] = tokenize('10.00');

      expect(token?.lexeme).toBe('10.00');
      expect(token?.literal).toBe(10);
      expect(token?.type).toBe(TOKEN_TYPES.FLOAT_LITERAL);
    });

    it('accepts a trailing decimal point', () => {
      expect(tokenize('1.')).toEqual([
        literal('FLOAT_LITERAL', '1.', 1, 0),
        eof(2),
      ]);
    });

    it('ends a numeral at a delimiter', () => {
      expect(tokenize('12)')).toEqual([
        literal('INTEGER_LITERAL', '12', 12, 0),
        symbol('RPAREN', ')', 2),
        eof(3),
      ]);
    });

    it('keeps integers beyond the safe range exact', () => {
      expect(tokenize('12345678901234567891')).toEqual([
        literal('INTEGER_LITERAL', '12345678901234567891', 12345678901234567891n, 0),
        eof(20),
      ]);
    });

    it('keeps the largest safe integer as a number', () => {
      const [token] = tokenize('9007199254740991');

      expect(token?.literal).toBe(9007199254740991);
    });

    it('ends a numeral at a non-ASCII digit', () => {
      const error = captureLexError('1٣');

      expect(error.char).toBe('٣');
      expect(error.column).toBe(1);
      expect(error.index).toBe(1);
    });

    it('sets literal only on numeric tokens', () => {
      for (const token of tokenize('f(1, 2.5, x) == 3')) {
        const isNumeric =
          token.type === TOKEN_TYPES.INTEGER_LITERAL ||
          token.type === TOKEN_TYPES.FLOAT_LITERAL;
        expect(token.literal !== null).toBe(isNumeric);
      }
    });
  });

  describe('invalid lexemes', () => {
    it.each(['_', '0.0.0', '100_000', '0x1', '1e5', '3.14abc'])(
      'rejects %j',
      (source) => {
        expect(() => tokenize(source)).toThrow(InvalidLexemeError);
      }
    );

    it('reports a second decimal point against the start of the numeral', () => {
      const error = captureLexError('f(1.2.3)');

      expect(error.char).toBe('1');
      expect(error.line).toBe(0);
      expect(error.column).toBe(2);
      expect(error.index).toBe(2);
      expect(error.message).toBe(
        'Invalid lexeme 1 on line 0 at column 2 (index 2)'
      );
    });

    it('reports a digit separator against the start of the numeral', () => {
      const error = captureLexError('100_000');

      expect(error.message).toBe(
        'Invalid lexeme 1 on line 0 at column 0 (index 0)'
      );
    });

    it('rejects a leading underscore', () => {
      const error = captureLexError('_');

      expect(error.char).toBe('_');
      expect(error.column).toBe(0);
    });

    it('rejects a single equals sign', () => {
      const error = captureLexError('diff(e, x) = 1');

      expect(error.char).toBe('=');
      expect(error.column).toBe(11);
      expect(error.index).toBe(11);
    });

    it('rejects a single equals sign at end of input', () => {
      const error = captureLexError('x =');

      expect(error.char).toBe('=');
      expect(error.column).toBe(2);
    });

    it('accepts an equality operator at end of input', () => {
      expect(tokenize('x ==')).toEqual([
        symbol('IDENTIFIER', 'x', 0),
        symbol('EQ', '==', 2),
        eof(4),
      ]);
    });

    it.each([
      ['x\ty', '\t', 1],
      ['a\nb', '\n', 1],
      ['f(x) + 1', '+', 5],
    ])('rejects %j at the unrecognized character', (source, char, column) => {
      const error = captureLexError(source);

      expect(error.char).toBe(char);
      expect(error.column).toBe(column);
    });
  });

  describe('nextToken', () => {
    it('reads one token at a time from state', () => {
      const state = createLexerState('f (x)');

      expect(nextToken(state)).toEqual(symbol('IDENTIFIER', 'f', 0));
      expect(nextToken(state)).toEqual(symbol('LPAREN', '(', 2));
      expect(state.pos).toBe(3);
      expect(state.column).toBe(3);
    });

    it('returns EOF repeatedly at end of input', () => {
      const state = createLexerState('x');
      nextToken(state);

      expect(nextToken(state)).toEqual(eof(1));
      expect(nextToken(state)).toEqual(eof(1));
    });
  });
});
