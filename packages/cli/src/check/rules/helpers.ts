/**
 * Shared Helper Functions
 * Common utilities used across rules.
 */

import type { CstNode, LineIndex, TextRange } from '@jstyle/core';
import type { CheckContext, Diagnostic, Fix, ViolationKind } from '../types.js';

/**
 * Extract source line for context display.
 * Retrieves the specified line (1-indexed) and trims it.
 */
export function extractContextLine(line: number, lineIndex: LineIndex): string {
  return lineIndex.lineText(line).trim();
}

/** Build a diagnostic for a node or range */
export function report(
  kind: ViolationKind,
  at: CstNode | TextRange,
  fix: Fix | null = null
): Diagnostic {
  const range = 'kind' in at ? at.range : at;
  return { kind, range, fix };
}

/** Line (1-indexed) on which an offset lies */
export function lineOf(ctx: CheckContext, offset: number): number {
  return ctx.lineIndex.locate(offset).line;
}

/** Leading whitespace of the line on which a node starts */
export function indentAt(ctx: CheckContext, node: CstNode): string {
  return ctx.lineIndex.indentOf(lineOf(ctx, node.startOffset));
}

/**
 * Fix that puts `next` on its own line: replaces the gap between `previous`
 * and `next` with a newline plus the indentation of `previous`.
 */
export function splitLineFix(
  ctx: CheckContext,
  previous: CstNode,
  next: CstNode,
  description: string
): Fix {
  return {
    description,
    edits: [
      {
        range: { start: previous.endOffset, end: next.startOffset },
        replacement: `\n${indentAt(ctx, previous)}`,
      },
    ],
  };
}

/** Kinds that are comments; the grammar lets them appear between any tokens */
export const COMMENT_KINDS: ReadonlySet<string> = new Set([
  'line_comment',
  'block_comment',
]);
