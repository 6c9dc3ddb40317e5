/**
 * Benchmark Module
 * Benchmark definition documents and their expressions
 */

export {
  lexBenchmarkDefinition,
  parseBenchmarkDefinition,
  type Benchmark,
  type BenchmarkDefinition,
  type BenchmarkSetup,
  type LexedExpression,
  type TimedOperation,
} from './definition.js';
