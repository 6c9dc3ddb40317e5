/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'definition';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: CAS-{category}{3-digit} (e.g., CAS-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (CAS-L0xx)
  {
    errorId: 'CAS-L001',
    category: 'lexer',
    description: 'Invalid lexeme',
    messageTemplate:
      'Invalid lexeme {char} on line {line} at column {column} (index {index})',
  },

  // Parse Errors (CAS-P0xx)
  {
    errorId: 'CAS-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate:
      'Unexpected token {found} at column {column}, expected {expected}',
  },
  {
    errorId: 'CAS-P002',
    category: 'parse',
    description: 'Exhausted tokens',
    messageTemplate: 'Token stream exhausted, expected {expected}',
  },

  // Definition Errors (CAS-D0xx)
  {
    errorId: 'CAS-D001',
    category: 'definition',
    description: 'Invalid benchmark definition field',
    messageTemplate: 'Invalid benchmark definition: {path} {reason}',
  },
  {
    errorId: 'CAS-D002',
    category: 'definition',
    description: 'Invalid benchmark expression',
    messageTemplate: 'Invalid expression at {path}: {reason}',
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} with context values.
 *
 * Missing context values render as empty strings. An unclosed brace returns
 * the template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "(", actual: ","})
 * // Returns: "Expected (, got ,"
 */
export function renderMessage(
  template: string,
  context: Readonly<Record<string, unknown>>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
