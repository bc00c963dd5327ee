/**
 * CST Visitor
 * Pre-order traversal with an enter callback.
 */

import type { CstNode } from '@jstyle/core';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/** Visitor pattern interface for CST traversal. */
export interface TreeVisitor {
  /** Called before visiting node's children. */
  enter(node: CstNode): void;
}

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Visit every node of a tree, parents before children, siblings left to
 * right.
 *
 * The walk keeps an explicit stack, so tree depth is not limited by the
 * call stack.
 */
export function walkTree(root: CstNode, visitor: TreeVisitor): void {
  const stack: CstNode[] = [root];

  for (let node = stack.pop(); node; node = stack.pop()) {
    visitor.enter(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]!);
    }
  }
}
