/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'config' | 'fix' | 'rule';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: JSTYLE-{category}{3-digit} (e.g., JSTYLE-C001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

/** ID prefix letter for each category */
export const CATEGORY_PREFIX: Readonly<Record<ErrorCategory, string>> = {
  parse: 'P',
  config: 'C',
  fix: 'F',
  rule: 'R',
};

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
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

  constructor(definitions: ErrorDefinition[]) {
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

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (JSTYLE-P0xx)
  {
    errorId: 'JSTYLE-P001',
    category: 'parse',
    description: 'Source could not be parsed',
    messageTemplate: 'Parser produced no syntax tree: {reason}',
    cause:
      'The Java grammar failed before producing any tree, usually because the input is not text or the parser was interrupted.',
    resolution:
      'Check the file encoding and contents. Files containing syntax errors are still analyzed; only a missing tree stops analysis.',
  },

  // Configuration Errors (JSTYLE-C0xx)
  {
    errorId: 'JSTYLE-C001',
    category: 'config',
    description: 'Configuration file unreadable',
    messageTemplate: 'Invalid configuration: failed to read {path} ({reason})',
    cause: 'The configuration file exists but could not be read.',
    resolution: 'Check file permissions, or remove the file to use defaults.',
  },
  {
    errorId: 'JSTYLE-C002',
    category: 'config',
    description: 'Configuration file malformed',
    messageTemplate: 'Invalid configuration: invalid {format} in {path} ({reason})',
    cause: 'The configuration file is not valid JSON or YAML.',
    resolution: 'Fix the syntax error reported by the parser.',
  },
  {
    errorId: 'JSTYLE-C003',
    category: 'config',
    description: 'Configuration has wrong shape',
    messageTemplate: 'Invalid configuration: {reason}',
    cause:
      'A top-level field or a rule property map has the wrong type (objects expected, property values must be strings, numbers or booleans).',
    resolution:
      'Use the shape { rules: {...}, severity: {...}, properties: { Rule: {...} } }.',
  },
  {
    errorId: 'JSTYLE-C004',
    category: 'config',
    description: 'Invalid rule state',
    messageTemplate:
      "Invalid configuration: rule {rule} has invalid state \"{state}\" (must be 'on', 'off', or 'warn')",
    cause: 'A rules entry uses a value other than on, off or warn.',
    resolution: "Set the rule to 'on', 'off', or 'warn'.",
  },
  {
    errorId: 'JSTYLE-C005',
    category: 'config',
    description: 'Invalid severity',
    messageTemplate:
      "Invalid configuration: rule {rule} has invalid severity \"{severity}\" (must be 'error', 'warning', or 'info')",
    cause: 'A severity entry uses a value other than error, warning or info.',
    resolution: "Set the severity to 'error', 'warning', or 'info'.",
  },

  // Fix Errors (JSTYLE-F0xx)
  {
    errorId: 'JSTYLE-F001',
    category: 'fix',
    description: 'Fix creates invalid syntax',
    messageTemplate:
      'Fix would create invalid syntax: {count} syntax error(s) after applying {applied} fix(es)',
    cause:
      'The combined edits of the applied fixes produce source the Java grammar rejects.',
    resolution:
      'Apply fixes one rule at a time and report the failing input as a rule defect.',
  },

  // Rule Errors (JSTYLE-R0xx)
  {
    errorId: 'JSTYLE-R001',
    category: 'rule',
    description: 'Unknown rule',
    messageTemplate: 'Unknown rule module: {rule}',
    cause: 'A rule was requested by a module name that is not registered.',
    resolution:
      'Use one of: FinalLocalVariable, MultipleVariableDeclarations, OneStatementPerLine, UnusedImports.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unknown rule module: {rule}", { rule: "Foo" })
 * // Returns: "Unknown rule module: Foo"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i]!;

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
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

/**
 * True when an error ID has the JSTYLE-{letter}{3-digit} shape and its
 * letter matches a known category.
 */
export function isWellFormedErrorId(errorId: string): boolean {
  const match = /^JSTYLE-([A-Z])\d{3}$/.exec(errorId);
  if (!match) {
    return false;
  }
  return Object.values(CATEGORY_PREFIX).includes(match[1] ?? '');
}
