/**
 * casbench Module
 * Exports the expression lexer, token types, error taxonomy and benchmark
 * definition support
 */

export {
  createLexerState,
  InvalidLexemeError,
  Lexer,
  nextToken,
  tokenize,
  tryTokenize,
  type LexErrorEvent,
  type LexerCallbacks,
  type LexerState,
  type TokenizeOptions,
  type TokenizeResult,
} from './lexer/index.js';
export {
  lexBenchmarkDefinition,
  parseBenchmarkDefinition,
  type Benchmark,
  type BenchmarkDefinition,
  type BenchmarkSetup,
  type LexedExpression,
  type TimedOperation,
} from './benchmark/index.js';

// ============================================================
// TOKENS
// ============================================================
export {
  TOKEN_TYPES,
  type EofToken,
  type LiteralToken,
  type LiteralTokenType,
  type SourceLocation,
  type SymbolToken,
  type SymbolTokenType,
  type Token,
  type TokenType,
} from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  CasBenchError,
  DefinitionError,
  ERROR_REGISTRY,
  ExhaustedTokensError,
  renderMessage,
  UnexpectedTokenError,
  type CasBenchErrorData,
  type DefinitionErrorData,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type ExhaustedTokensErrorData,
  type InvalidLexemeErrorData,
  type UnexpectedTokenErrorData,
} from './types.js';
