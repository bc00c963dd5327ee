/**
 * Check Module - Static Analysis for Java
 * Public API for the jstyle-check tool.
 */

import type { DiagnosticRecord, ReportedDiagnostic } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================
export type {
  CheckConfig,
  CheckContext,
  ConfigWarning,
  Diagnostic,
  DiagnosticRecord,
  Edit,
  Fix,
  FixAvailability,
  Properties,
  ReportedDiagnostic,
  Rule,
  RuleCategory,
  RuleFactory,
  RuleState,
  Severity,
  ViolationKind,
  WarningSink,
} from './types.js';

// ============================================================
// RULE REGISTRY
// ============================================================
export {
  RULE_FACTORIES,
  createRule,
  findRuleFactory,
  FINAL_LOCAL_VARIABLE,
  MULTIPLE_VARIABLE_DECLARATIONS,
  ONE_STATEMENT_PER_LINE,
  UNUSED_IMPORTS,
} from './rules/index.js';
export { PropertyReader, toProperties, EMPTY_PROPERTIES } from './properties.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  createRules,
  loadConfig,
  parseConfig,
  type ConfiguredRules,
} from './config.js';

// ============================================================
// VALIDATION
// ============================================================
export { walkTree, type TreeVisitor } from './visitor.js';
export {
  checkSource,
  checkTree,
  type CheckTreeResult,
  type FileCheckResult,
  type RuleFailure,
} from './validator.js';
export {
  checkFiles,
  DEFAULT_READ_CONCURRENCY,
  type FileReport,
} from './batch.js';

// ============================================================
// FINALITY ANALYSIS
// ============================================================
export { FinalityAnalyzer } from './finality/analyzer.js';
export type { CandidateVerdict, VariableCandidate } from './finality/types.js';

// ============================================================
// FIX APPLICATION
// ============================================================
export { applyFixes, type ApplyResult } from './fixer.js';

// ============================================================
// OUTPUT RECORDS
// ============================================================

/** Serializable form of a reported diagnostic */
export function toDiagnosticRecord(d: ReportedDiagnostic): DiagnosticRecord {
  return {
    rule: d.rule,
    message: d.message,
    severity: d.severity,
    line: d.span.start.line,
    column: d.span.start.column,
    endLine: d.span.end.line,
    endColumn: d.span.end.column,
    fix:
      d.fix === null
        ? null
        : {
            description: d.fix.description,
            edits: d.fix.edits.map((edit) => ({
              range: { start: edit.range.start, end: edit.range.end },
              replacement: edit.replacement,
            })),
          },
  };
}
