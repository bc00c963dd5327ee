/**
 * CST Types
 * Read-only concrete syntax tree contract consumed by every rule.
 */

import type { TextRange } from '../source-location.js';

// ============================================================
// NODE CONTRACT
// ============================================================

/**
 * A node of the concrete syntax tree.
 *
 * Node identity is object identity: a tree is converted once, so two
 * references to the same syntactic node compare equal with `===`.
 */
export interface CstNode {
  /** Grammar kind (e.g. `local_variable_declaration`, `;`) */
  readonly kind: string;
  /** False for anonymous tokens such as punctuation and keywords */
  readonly isNamed: boolean;
  /** True for ERROR nodes and for tokens the parser inserted as MISSING */
  readonly isError: boolean;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly range: TextRange;
  readonly parent: CstNode | null;
  readonly children: readonly CstNode[];
  readonly namedChildren: readonly CstNode[];
  childByFieldName(name: string): CstNode | null;
  childrenByFieldName(name: string): readonly CstNode[];
  text(source: string): string;
}

/** Result of parsing one Java source */
export interface JavaParseResult {
  readonly root: CstNode;
  /** True when any ERROR or MISSING node occurs in the tree */
  readonly hasErrors: boolean;
}

export type ParseOutcome =
  | { readonly ok: true; readonly result: JavaParseResult }
  | { readonly ok: false; readonly error: Error };

// ============================================================
// TREE HELPERS
// ============================================================

/** Ancestors from the parent up to the root */
export function* ancestors(node: CstNode): Generator<CstNode> {
  let current = node.parent;
  while (current) {
    yield current;
    current = current.parent;
  }
}

/** True when `ancestor` is a strict ancestor of `node` */
export function isAncestorOf(ancestor: CstNode, node: CstNode): boolean {
  for (const candidate of ancestors(node)) {
    if (candidate === ancestor) {
      return true;
    }
  }
  return false;
}

/** Nearest ancestor whose kind is in the given set */
export function closestAncestor(
  node: CstNode,
  kinds: ReadonlySet<string>
): CstNode | null {
  for (const candidate of ancestors(node)) {
    if (kinds.has(candidate.kind)) {
      return candidate;
    }
  }
  return null;
}

/** Pre-order walk; returning false from `fn` skips the node's children */
export function walkPreOrder(
  root: CstNode,
  fn: (node: CstNode) => boolean | void
): void {
  const stack: CstNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (fn(node) === false) continue;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
}

export function firstNamedChild(node: CstNode): CstNode | null {
  return node.namedChildren[0] ?? null;
}

/** Strips any number of `parenthesized_expression` wrappers */
export function unwrapParentheses(node: CstNode): CstNode {
  let current = node;
  while (current.kind === 'parenthesized_expression') {
    const inner = firstNamedChild(current);
    if (!inner) break;
    current = inner;
  }
  return current;
}

/** True when any direct child is the given anonymous token (e.g. `final`) */
export function hasToken(node: CstNode, token: string): boolean {
  return node.children.some((child) => child.kind === token);
}
