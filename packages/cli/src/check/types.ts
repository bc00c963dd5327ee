/**
 * Check Types
 * Type definitions for the jstyle-check static analysis tool.
 */

import type {
  CstNode,
  LineIndex,
  SourceSpan,
  TextRange,
} from '@jstyle/core';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// VIOLATIONS AND FIXES
// ============================================================

/** Whether a violation type can be repaired automatically */
export type FixAvailability = 'always' | 'sometimes' | 'none';

/** One violation type a rule can report */
export interface ViolationKind {
  /** Stable key (e.g. `import.unused`) */
  readonly id: string;
  /** Human-readable message */
  readonly message: string;
  readonly fixAvailability: FixAvailability;
}

/** A single text replacement */
export interface Edit {
  readonly range: TextRange;
  readonly replacement: string;
}

/**
 * Fix suggestion for a diagnostic.
 * All edits of a fix are applied together or not at all.
 */
export interface Fix {
  /** Human-readable description of what the fix does */
  readonly description: string;
  readonly edits: readonly Edit[];
}

/** What a rule reports for one violation */
export interface Diagnostic {
  readonly kind: ViolationKind;
  /** Range of the offending construct */
  readonly range: TextRange;
  readonly fix: Fix | null;
}

/**
 * A diagnostic after dispatch: attributed to its rule, given a severity and
 * located in the source.
 */
export interface ReportedDiagnostic {
  /** Module name of the reporting rule */
  readonly rule: string;
  readonly severity: Severity;
  readonly kind: ViolationKind;
  readonly message: string;
  readonly range: TextRange;
  readonly span: SourceSpan;
  /** Trimmed source line containing the start of the range */
  readonly context: string;
  readonly fix: Fix | null;
}

/** Serializable output record of one diagnostic */
export interface DiagnosticRecord {
  readonly rule: string;
  readonly message: string;
  readonly severity: Severity;
  readonly line: number;
  readonly column: number;
  readonly endLine: number;
  readonly endColumn: number;
  readonly fix: {
    readonly description: string;
    readonly edits: ReadonlyArray<{
      readonly range: { readonly start: number; readonly end: number };
      readonly replacement: string;
    }>;
  } | null;
}

// ============================================================
// CHECK CONFIGURATION
// ============================================================

/** Rule options as configured, before typed interpretation */
export type Properties = ReadonlyMap<string, string>;

/**
 * Configuration for check rules, severity overrides and rule options.
 * Keys are rule module names.
 */
export interface CheckConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Readonly<Record<string, RuleState>>;
  /** Severity overrides */
  readonly severity: Readonly<Record<string, Severity>>;
  /** Per-rule option maps */
  readonly properties: Readonly<Record<string, Properties>>;
}

/** A recognised option whose value could not be interpreted */
export interface ConfigWarning {
  readonly rule: string;
  readonly key: string;
  readonly value: string;
  readonly message: string;
}

export type WarningSink = (warning: ConfigWarning) => void;

// ============================================================
// RULES
// ============================================================

/** Per-file context handed to every rule invocation */
export interface CheckContext {
  readonly source: string;
  readonly lineIndex: LineIndex;
  /** Source text of a node */
  text(node: CstNode): string;
}

/**
 * A configured rule instance.
 * Rules hold no mutable state across calls and never mutate the tree.
 */
export interface Rule {
  /** Module name (e.g. `FinalLocalVariable`) */
  readonly name: string;
  /** Node kinds this rule inspects; null inspects every node */
  readonly relevantKinds: readonly string[] | null;
  check(ctx: CheckContext, node: CstNode): Diagnostic[];
}

/** Rule category for grouping and organization */
export type RuleCategory = 'coding' | 'imports';

/** Registry entry that builds a Rule from its configured options */
export interface RuleFactory {
  readonly moduleName: string;
  readonly category: RuleCategory;
  readonly defaultSeverity: Severity;
  readonly description: string;
  fromConfig(properties: Properties, warn?: WarningSink): Rule;
}
