/**
 * Tree Validator
 * Walks a CST once, dispatching nodes to the rules registered for them.
 */

import { LineIndex, tryParseJava, type CstNode } from '@jstyle/core';
import type {
  CheckContext,
  Diagnostic,
  ReportedDiagnostic,
  Rule,
  Severity,
} from './types.js';
import { walkTree } from './visitor.js';
import { extractContextLine } from './rules/helpers.js';

// ============================================================
// RESULT TYPES
// ============================================================

/** A rule that threw while checking one node; the node is skipped for it */
export interface RuleFailure {
  readonly rule: string;
  readonly nodeKind: string;
  readonly offset: number;
  readonly message: string;
}

export interface CheckTreeResult {
  readonly diagnostics: ReportedDiagnostic[];
  readonly ruleFailures: RuleFailure[];
}

export type FileCheckResult =
  | {
      readonly status: 'analyzed';
      readonly diagnostics: ReportedDiagnostic[];
      readonly hasSyntaxErrors: boolean;
      readonly ruleFailures: RuleFailure[];
    }
  | {
      readonly status: 'unanalyzable';
      readonly reason: string;
      readonly diagnostics: [];
    };

// ============================================================
// DISPATCH
// ============================================================

interface Pending {
  readonly diagnostic: Diagnostic;
  readonly ruleIndex: number;
}

/** Severity used for rules without a configured one */
const FALLBACK_SEVERITY: Severity = 'warning';

/**
 * Check a parsed tree against rules in registration order.
 *
 * Each rule runs on every node whose kind it lists (or on every node when
 * it lists none). Output is sorted by range start, then by rule
 * registration order; rule-local emission order is kept for ties.
 */
export function checkTree(
  root: CstNode,
  source: string,
  rules: readonly Rule[],
  severities: Readonly<Record<string, Severity>> = {}
): CheckTreeResult {
  const lineIndex = LineIndex.fromSource(source);
  const ctx: CheckContext = {
    source,
    lineIndex,
    text: (node) => source.slice(node.startOffset, node.endOffset),
  };

  const kindSets = rules.map((rule) =>
    rule.relevantKinds === null ? null : new Set(rule.relevantKinds)
  );
  const pending: Pending[] = [];
  const ruleFailures: RuleFailure[] = [];

  walkTree(root, {
    enter(node: CstNode): void {
      for (let i = 0; i < rules.length; i++) {
        const rule = rules[i]!;
        const kinds = kindSets[i];
        if (kinds && !kinds.has(node.kind)) {
          continue;
        }
        try {
          for (const diagnostic of rule.check(ctx, node)) {
            pending.push({ diagnostic, ruleIndex: i });
          }
        } catch (err) {
          ruleFailures.push({
            rule: rule.name,
            nodeKind: node.kind,
            offset: node.startOffset,
            message: err instanceof Error ? err.message : String(err),
          });
        }
      }
    },
  });

  const diagnostics = sortPending(pending).map(({ diagnostic, ruleIndex }) => {
    const rule = rules[ruleIndex]!;
    const span = lineIndex.span(diagnostic.range);
    return {
      rule: rule.name,
      severity: severities[rule.name] ?? FALLBACK_SEVERITY,
      kind: diagnostic.kind,
      message: diagnostic.kind.message,
      range: diagnostic.range,
      span,
      context: extractContextLine(span.start.line, lineIndex),
      fix: diagnostic.fix,
    };
  });

  return { diagnostics, ruleFailures };
}

/**
 * Parse and check one source.
 * A source the parser cannot turn into a tree is unanalyzable and yields
 * no diagnostics; a tree with syntax errors is still checked.
 */
export function checkSource(
  source: string,
  rules: readonly Rule[],
  severities: Readonly<Record<string, Severity>> = {}
): FileCheckResult {
  const outcome = tryParseJava(source);
  if (!outcome.ok) {
    return {
      status: 'unanalyzable',
      reason: outcome.error.message,
      diagnostics: [],
    };
  }

  const { root, hasErrors } = outcome.result;
  const { diagnostics, ruleFailures } = checkTree(
    root,
    source,
    rules,
    severities
  );
  return {
    status: 'analyzed',
    diagnostics,
    hasSyntaxErrors: hasErrors,
    ruleFailures,
  };
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Sort by range start, then rule index.
 * Array.prototype.sort is stable, so equal keys keep emission order.
 */
function sortPending(pending: Pending[]): Pending[] {
  return [...pending].sort((a, b) => {
    if (a.diagnostic.range.start !== b.diagnostic.range.start) {
      return a.diagnostic.range.start - b.diagnostic.range.start;
    }
    return a.ruleIndex - b.ruleIndex;
  });
}
