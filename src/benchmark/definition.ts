/**
 * Benchmark Definitions
 *
 * Reads benchmark definition documents (YAML text) into typed definitions and
 * lexes every expression they carry. Reading files is left to the host.
 */

import * as yaml from 'yaml';
import { DefinitionError, type Token } from '../types.js';
import { InvalidLexemeError, Lexer, type TokenizeOptions } from '../lexer/index.js';

// ============================================================
// TYPES
// ============================================================

export interface BenchmarkSetup {
  /** Variable name to symbol kind, e.g. `x: symbol_real` */
  readonly variables: Readonly<Record<string, string>>;
  /** Function name to implementation key, e.g. `diff: symbolic_diff` */
  readonly functions: Readonly<Record<string, string>>;
}

export interface TimedOperation {
  readonly name: string;
  readonly operation: string;
  readonly assertClose: string | undefined;
}

export interface Benchmark {
  readonly name: string;
  readonly description: string | undefined;
  /** Each entry binds input names to expressions */
  readonly inputs: readonly Readonly<Record<string, string>>[];
  readonly time: readonly TimedOperation[];
}

export interface BenchmarkDefinition {
  readonly schemaVersion: 1;
  readonly name: string;
  readonly setup: BenchmarkSetup;
  readonly benchmarks: readonly Benchmark[];
}

/** An expression from a definition with its tokens */
export interface LexedExpression {
  /** Dotted path of the field, e.g. `benchmarks[0].time[1].operation` */
  readonly path: string;
  readonly source: string;
  readonly tokens: readonly Token[];
}

// ============================================================
// VALIDATION
// ============================================================

const ROOT_PATH = '<root>';

function fail(path: string, reason: string): never {
  throw new DefinitionError('CAS-D001', path, reason);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    fail(path, 'must be a mapping');
  }
  return value;
}

function readList(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    fail(path, 'must be a list');
  }
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    fail(path, 'must be a non-empty string');
  }
  return value;
}

function readOptionalString(value: unknown, path: string): string | undefined {
  return value === undefined || value === null
    ? undefined
    : readString(value, path);
}

function readStringMap(value: unknown, path: string): Record<string, string> {
  if (value === undefined || value === null) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(readRecord(value, path))) {
    result[key] = readString(entry, `${path}.${key}`);
  }
  return result;
}

function readTimedOperation(value: unknown, path: string): TimedOperation {
  const record = readRecord(value, path);
  return {
    name: readString(record['name'], `${path}.name`),
    operation: readString(record['operation'], `${path}.operation`),
    assertClose: readOptionalString(
      record['assert_close'],
      `${path}.assert_close`
    ),
  };
}

function readBenchmark(value: unknown, path: string): Benchmark {
  const record = readRecord(value, path);
  const inputs = record['inputs'] ?? [];
  return {
    name: readString(record['name'], `${path}.name`),
    description: readOptionalString(
      record['description'],
      `${path}.description`
    ),
    inputs: readList(inputs, `${path}.inputs`).map((entry, i) =>
      readStringMap(entry, `${path}.inputs[${i}]`)
    ),
    time: readList(record['time'], `${path}.time`).map((entry, i) =>
      readTimedOperation(entry, `${path}.time[${i}]`)
    ),
  };
}

// ============================================================
// PARSING
// ============================================================

/**
 * Parse and validate a benchmark definition document.
 *
 * @throws DefinitionError (CAS-D001) naming the offending field path; YAML
 * syntax errors are reported at `<root>`
 */
export function parseBenchmarkDefinition(text: string): BenchmarkDefinition {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw new DefinitionError(
      'CAS-D001',
      ROOT_PATH,
      `is not valid YAML (${err instanceof Error ? err.message : String(err)})`,
      { cause: err }
    );
  }

  const root = readRecord(data, ROOT_PATH);

  if (root['schema-version'] !== 1) {
    fail('schema-version', 'must be 1');
  }

  const setup =
    root['setup'] === undefined || root['setup'] === null
      ? {}
      : readRecord(root['setup'], 'setup');

  return {
    schemaVersion: 1,
    name: readString(root['name'], 'name'),
    setup: {
      variables: readStringMap(setup['variables'], 'setup.variables'),
      functions: readStringMap(setup['functions'], 'setup.functions'),
    },
    benchmarks: readList(root['benchmarks'], 'benchmarks').map((entry, i) =>
      readBenchmark(entry, `benchmarks[${i}]`)
    ),
  };
}

// ============================================================
// LEXING
// ============================================================

function lexExpression(
  path: string,
  source: string,
  options: TokenizeOptions | undefined
): LexedExpression {
  try {
    return { path, source, tokens: new Lexer(source, options).tokens };
  } catch (err) {
    if (err instanceof InvalidLexemeError) {
      throw new DefinitionError('CAS-D002', path, err.message, { cause: err });
    }
    throw err;
  }
}

/**
 * Lex every input, operation and assertion expression in document order.
 *
 * @throws DefinitionError (CAS-D002) with the InvalidLexemeError as `cause`
 */
export function lexBenchmarkDefinition(
  definition: BenchmarkDefinition,
  options?: TokenizeOptions
): LexedExpression[] {
  const lexed: LexedExpression[] = [];

  definition.benchmarks.forEach((benchmark, i) => {
    const base = `benchmarks[${i}]`;

    benchmark.inputs.forEach((input, j) => {
      for (const [key, source] of Object.entries(input)) {
        lexed.push(lexExpression(`${base}.inputs[${j}].${key}`, source, options));
      }
    });

    benchmark.time.forEach((timed, k) => {
      const path = `${base}.time[${k}]`;
      lexed.push(lexExpression(`${path}.operation`, timed.operation, options));
      if (timed.assertClose !== undefined) {
        lexed.push(
          lexExpression(`${path}.assert_close`, timed.assertClose, options)
        );
      }
    });
  });

  return lexed;
}
