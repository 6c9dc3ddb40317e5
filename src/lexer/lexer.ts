/**
 * Lexer
 * Memoized tokenization of a single source string
 */

import type { Token } from '../types.js';
import { tokenize, type TokenizeOptions } from './tokenizer.js';

export class Lexer {
  private readonly _source: string;
  private readonly options: TokenizeOptions;
  /** Null until the first successful scan; failed scans are not cached */
  private cachedTokens: readonly Token[] | null = null;
  private scanning = false;

  constructor(source: string, options: TokenizeOptions = {}) {
    this._source = source;
    this.options = options;
  }

  get source(): string {
    return this._source;
  }

  /**
   * Tokens of the source, scanned on first access.
   * Every later access returns the same array without rescanning.
   *
   * @throws InvalidLexemeError when the source cannot be lexed
   * @throws TypeError when read from a callback of its own scan
   */
  get tokens(): readonly Token[] {
    if (this.cachedTokens !== null) {
      return this.cachedTokens;
    }
    if (this.scanning) {
      throw new TypeError('Lexer tokens read during their own scan');
    }

    this.scanning = true;
    try {
      this.cachedTokens = Object.freeze(tokenize(this._source, this.options));
    } finally {
      this.scanning = false;
    }
    return this.cachedTokens;
  }
}
