/**
 * Test helpers for rule and dispatcher tests.
 */

import type { CstNode } from '@jstyle/core';
import {
  checkSource,
  toProperties,
  type ReportedDiagnostic,
  type RuleFactory,
} from '../src/check/index.js';

/** Wrap statements in a method of a class */
export function inMethod(body: string): string {
  return `class A {\n  void m(boolean c, int k, int[] items, Object o) {\n${body}\n  }\n}\n`;
}

/** Run one rule over a source and return its diagnostics */
export function runRule(
  factory: RuleFactory,
  source: string,
  properties: Record<string, string | number | boolean> = {}
): ReportedDiagnostic[] {
  const rule = factory.fromConfig(toProperties(properties));
  const result = checkSource(source, [rule]);
  if (result.status !== 'analyzed') {
    throw new Error(`source not analyzable: ${result.reason}`);
  }
  if (result.ruleFailures.length > 0) {
    throw new Error(`rule failed: ${result.ruleFailures[0]?.message}`);
  }
  return result.diagnostics;
}

export function messagesOf(diagnostics: readonly ReportedDiagnostic[]): string[] {
  return diagnostics.map((d) => d.message);
}

// ============================================================
// IN-MEMORY TREE
// ============================================================

/** Hand-built node for dispatcher tests */
export class FakeNode implements CstNode {
  parent: CstNode | null = null;
  readonly isNamed = true;
  readonly isError = false;

  constructor(
    readonly kind: string,
    readonly startOffset: number,
    readonly endOffset: number,
    readonly children: readonly FakeNode[] = []
  ) {
    for (const child of children) {
      child.parent = this;
    }
  }

  get range(): { start: number; end: number } {
    return { start: this.startOffset, end: this.endOffset };
  }

  get namedChildren(): readonly CstNode[] {
    return this.children;
  }

  childByFieldName(): CstNode | null {
    return null;
  }

  childrenByFieldName(): readonly CstNode[] {
    return [];
  }

  text(source: string): string {
    return source.slice(this.startOffset, this.endOffset);
  }
}

export function node(
  kind: string,
  start: number,
  end: number,
  children: FakeNode[] = []
): FakeNode {
  return new FakeNode(kind, start, end, children);
}
