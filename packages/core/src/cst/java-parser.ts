/**
 * Java Parser
 * Converts tree-sitter-java syntax trees into immutable CstNode trees.
 */

import Parser from 'tree-sitter';
import Java from 'tree-sitter-java';
import { createError } from '../error-classes.js';
import type { TextRange } from '../source-location.js';
import type { CstNode, JavaParseResult, ParseOutcome } from './types.js';

// ============================================================
// NODE IMPLEMENTATION
// ============================================================

const NO_CHILDREN: readonly CstNode[] = [];

class JavaNode implements CstNode {
  readonly range: TextRange;
  parent: JavaNode | null = null;
  readonly children: JavaNode[] = [];
  readonly namedChildren: JavaNode[] = [];
  private fields: Map<string, JavaNode[]> | null = null;

  constructor(
    readonly kind: string,
    readonly isNamed: boolean,
    readonly isError: boolean,
    readonly startOffset: number,
    readonly endOffset: number
  ) {
    this.range = { start: startOffset, end: endOffset };
  }

  append(child: JavaNode, fieldName: string | null): void {
    child.parent = this;
    this.children.push(child);
    if (child.isNamed) {
      this.namedChildren.push(child);
    }
    if (fieldName) {
      this.fields ??= new Map();
      const existing = this.fields.get(fieldName);
      if (existing) {
        existing.push(child);
      } else {
        this.fields.set(fieldName, [child]);
      }
    }
  }

  childByFieldName(name: string): CstNode | null {
    return this.fields?.get(name)?.[0] ?? null;
  }

  childrenByFieldName(name: string): readonly CstNode[] {
    return this.fields?.get(name) ?? NO_CHILDREN;
  }

  text(source: string): string {
    return source.slice(this.startOffset, this.endOffset);
  }
}

// ============================================================
// PARSER
// ============================================================

let sharedParser: Parser | null = null;

function getParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    sharedParser.setLanguage(Java);
  }
  return sharedParser;
}

/**
 * Minimum parse buffer; the binding's default rejects long inputs, so the
 * buffer grows with the source.
 */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Copy a tree-sitter tree into JavaNode wrappers with a single cursor walk.
 * The walk is iterative so deeply nested expressions do not grow the stack.
 */
function convertTree(tree: Parser.Tree): {
  root: JavaNode;
  hasErrors: boolean;
} {
  const cursor = tree.walk();
  const makeNode = (): JavaNode => {
    const isError = cursor.nodeType === 'ERROR' || cursor.nodeIsMissing;
    return new JavaNode(
      cursor.nodeType,
      cursor.nodeIsNamed,
      isError,
      cursor.startIndex,
      cursor.endIndex
    );
  };

  const root = makeNode();
  let hasErrors = root.isError;
  const path: JavaNode[] = [root];

  if (cursor.gotoFirstChild()) {
    for (;;) {
      const parent = path[path.length - 1];
      if (!parent) break;
      const node = makeNode();
      hasErrors ||= node.isError;
      parent.append(node, cursor.currentFieldName || null);

      if (cursor.gotoFirstChild()) {
        path.push(node);
        continue;
      }
      while (!cursor.gotoNextSibling()) {
        if (!cursor.gotoParent() || path.length <= 1) {
          return { root, hasErrors };
        }
        path.pop();
      }
    }
  }

  return { root, hasErrors };
}

/**
 * Parse Java source into a CST.
 *
 * Sources with syntax errors still produce a tree; ERROR and MISSING nodes
 * are marked with `isError` and `hasErrors` is set.
 *
 * @throws ParseError (JSTYLE-P001) when the parser produces no tree
 */
export function parseJava(source: string): JavaParseResult {
  let tree: Parser.Tree;
  try {
    tree = getParser().parse(source, undefined, {
      bufferSize: Math.max(MIN_BUFFER_SIZE, source.length + 1),
    });
  } catch (err) {
    throw createError('JSTYLE-P001', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return convertTree(tree);
}

/** Non-throwing variant of parseJava for batch callers */
export function tryParseJava(source: string): ParseOutcome {
  try {
    return { ok: true, result: parseJava(source) };
  } catch (err) {
    return {
      ok: false,
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }
}
