/**
 * Shared Types
 * Re-exports source locations, tokens and the error taxonomy
 */

export type { SourceLocation } from './source-location.js';
export {
  TOKEN_TYPES,
  type EofToken,
  type LiteralToken,
  type LiteralTokenType,
  type SymbolToken,
  type SymbolTokenType,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  CasBenchError,
  DefinitionError,
  ExhaustedTokensError,
  UnexpectedTokenError,
  type CasBenchErrorData,
  type DefinitionErrorData,
  type ExhaustedTokensErrorData,
  type InvalidLexemeErrorData,
  type UnexpectedTokenErrorData,
} from './error-classes.js';
