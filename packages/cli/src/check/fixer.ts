/**
 * Fix Applier
 * Apply automatic fixes to source code with collision detection.
 */

import {
  createError,
  rangesOverlap,
  tryParseJava,
  walkPreOrder,
  type CstNode,
  type TextRange,
} from '@jstyle/core';
import type { Edit, ReportedDiagnostic } from './types.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Result of applying fixes to source code.
 */
export interface ApplyResult {
  /** Modified source code with fixes applied */
  readonly modified: string;
  /** Number of fixes successfully applied */
  readonly applied: number;
  /** Number of fixes skipped */
  readonly skipped: number;
  /** Reasons for skipped fixes */
  readonly skippedReasons: Array<{ rule: string; reason: string }>;
}

/**
 * Internal representation of a fix to apply.
 */
interface ApplicableFix {
  readonly rule: string;
  readonly edits: readonly Edit[];
  /** Largest edit end; fixes are considered in descending order of it */
  readonly end: number;
}

// ============================================================
// FIX APPLICATION
// ============================================================

/**
 * Apply automatic fixes to source code.
 *
 * Constraints:
 * - All edits of one fix are applied together or not at all
 * - Fixes are considered by their last edit end, descending
 * - A fix with an edit overlapping an accepted edit is skipped with a reason
 * - Accepted edits are applied from end to start so offsets stay valid
 * - A source that parsed cleanly must still parse cleanly afterwards
 *
 * @throws JstyleError JSTYLE-F001 if the applied fixes introduce syntax errors
 */
export function applyFixes(
  source: string,
  diagnostics: readonly ReportedDiagnostic[]
): ApplyResult {
  const fixes: ApplicableFix[] = [];
  for (const d of diagnostics) {
    if (d.fix === null || d.fix.edits.length === 0) {
      continue;
    }
    fixes.push({
      rule: d.rule,
      edits: d.fix.edits,
      end: Math.max(...d.fix.edits.map((edit) => edit.range.end)),
    });
  }

  // If no applicable fixes, return original
  if (fixes.length === 0) {
    return {
      modified: source,
      applied: 0,
      skipped: 0,
      skippedReasons: [],
    };
  }

  const sortedFixes = fixes.slice().sort((a, b) => b.end - a.end);
  const { validFixes, skippedReasons } = filterCollisions(sortedFixes);

  const edits = validFixes
    .flatMap((fix) => fix.edits)
    .sort((a, b) => b.range.start - a.range.start);

  let modified = source;
  for (const edit of edits) {
    modified =
      modified.slice(0, edit.range.start) +
      edit.replacement +
      modified.slice(edit.range.end);
  }

  verifySyntax(source, modified, validFixes.length);

  return {
    modified,
    applied: validFixes.length,
    skipped: sortedFixes.length - validFixes.length,
    skippedReasons,
  };
}

/** Throw when fixes turn an error-free source into one with syntax errors */
function verifySyntax(original: string, modified: string, applied: number): void {
  if (applied === 0) {
    return;
  }
  const before = tryParseJava(original);
  if (!before.ok || before.result.hasErrors) {
    return;
  }
  const after = tryParseJava(modified);
  if (!after.ok) {
    throw createError('JSTYLE-F001', { count: 1, applied });
  }
  if (after.result.hasErrors) {
    throw createError('JSTYLE-F001', {
      count: countErrorNodes(after.result.root),
      applied,
    });
  }
}

function countErrorNodes(root: CstNode): number {
  let count = 0;
  walkPreOrder(root, (node) => {
    if (node.isError) {
      count++;
      return false;
    }
    return true;
  });
  return count;
}

// ============================================================
// COLLISION DETECTION
// ============================================================

/**
 * Filter fixes to remove overlapping ranges.
 *
 * Strategy: Keep first fix in sorted order (end to start),
 * skip subsequent fixes that collide with any kept fix.
 */
function filterCollisions(sortedFixes: ApplicableFix[]): {
  validFixes: ApplicableFix[];
  skippedReasons: Array<{ rule: string; reason: string }>;
} {
  const validFixes: ApplicableFix[] = [];
  const skippedReasons: Array<{ rule: string; reason: string }> = [];

  for (const fix of sortedFixes) {
    const hasCollision = validFixes.some((kept) =>
      kept.edits.some((keptEdit) =>
        fix.edits.some((edit) => editsCollide(edit.range, keptEdit.range))
      )
    );

    if (hasCollision) {
      skippedReasons.push({
        rule: fix.rule,
        reason: 'Fix range overlaps with another fix',
      });
    } else {
      validFixes.push(fix);
    }
  }

  return { validFixes, skippedReasons };
}

/**
 * Two edits collide when their ranges overlap, or when they start at the
 * same offset and either is an insertion.
 */
function editsCollide(a: TextRange, b: TextRange): boolean {
  if (rangesOverlap(a, b)) {
    return true;
  }
  return a.start === b.start && (a.start === a.end || b.start === b.end);
}
