/**
 * Import Rules
 * Detects imports whose simple name is never referenced.
 */

import { walkPreOrder, type CstNode, type TextRange } from '@jstyle/core';
import type {
  CheckContext,
  Diagnostic,
  Fix,
  Properties,
  Rule,
  RuleFactory,
  ViolationKind,
  WarningSink,
} from '../types.js';
import { PropertyReader } from '../properties.js';
import { report } from './helpers.js';

// ============================================================
// IMPORT INFO
// ============================================================

/** One import declaration as written */
export interface ImportInfo {
  /** Imported path without `.*` (e.g. `java.util.List`) */
  readonly path: string;
  /** Last path segment (e.g. `List`) */
  readonly simpleName: string;
  readonly isStatic: boolean;
  readonly isWildcard: boolean;
  /** Everything before the last segment (e.g. `java.util`) */
  readonly packageName: string;
  readonly range: TextRange;
}

/** Read an import_declaration; null when it has no name */
export function parseImport(
  node: CstNode,
  source: string
): ImportInfo | null {
  const nameNode = node.namedChildren.find(
    (child) => child.kind === 'scoped_identifier' || child.kind === 'identifier'
  );
  if (!nameNode) {
    return null;
  }
  const path = nameNode.text(source).replace(/\s+/g, '');
  const dot = path.lastIndexOf('.');
  return {
    path,
    simpleName: path.slice(dot + 1),
    isStatic: node.children.some((child) => child.kind === 'static'),
    isWildcard: node.children.some(
      (child) => child.kind === 'asterisk' || child.kind === '*'
    ),
    packageName: dot === -1 ? '' : path.slice(0, dot),
    range: node.range,
  };
}

// ============================================================
// REFERENCE COLLECTION
// ============================================================

const SKIPPED_SUBTREES: ReadonlySet<string> = new Set([
  'import_declaration',
  'package_declaration',
]);

const REFERENCE_KINDS: ReadonlySet<string> = new Set([
  'identifier',
  'type_identifier',
]);

/** `{@link Type#member(Arg)}` and `{@linkplain ...}` */
const INLINE_LINK = /\{@link(?:plain)?\s+([^\s}]+)/g;

/** `@see Type`, `@throws Type`, `@exception Type` at the start of a tag */
const BLOCK_TAG = /@(?:see|throws|exception)\s+([^\s]+)/g;

/**
 * Simple names a Javadoc comment refers to: the first segment of each
 * referenced type plus the types named in a member's parameter list.
 */
export function javadocReferences(comment: string): string[] {
  const names: string[] = [];
  const addReference = (reference: string): void => {
    const hash = reference.indexOf('#');
    const typePart = hash === -1 ? reference : reference.slice(0, hash);
    const head = typePart.split(/[.<({]/)[0];
    if (head) {
      names.push(head);
    }
    const open = reference.indexOf('(');
    if (open !== -1) {
      const close = reference.indexOf(')', open);
      const params = reference.slice(open + 1, close === -1 ? undefined : close);
      for (const param of params.split(',')) {
        const paramHead = param.trim().split(/[.<[\s]/)[0];
        if (paramHead) {
          names.push(paramHead);
        }
      }
    }
  };

  for (const match of comment.matchAll(INLINE_LINK)) {
    if (match[1]) addReference(match[1]);
  }
  for (const match of comment.matchAll(BLOCK_TAG)) {
    if (match[1]) addReference(match[1]);
  }
  return names;
}

function collectReferences(
  root: CstNode,
  source: string,
  processJavadoc: boolean
): Set<string> {
  const names = new Set<string>();
  walkPreOrder(root, (node) => {
    if (SKIPPED_SUBTREES.has(node.kind)) {
      return false;
    }
    if (REFERENCE_KINDS.has(node.kind)) {
      names.add(node.text(source));
    } else if (processJavadoc && node.kind === 'block_comment') {
      const text = node.text(source);
      if (text.startsWith('/**')) {
        for (const name of javadocReferences(text)) {
          names.add(name);
        }
      }
    }
    return true;
  });
  return names;
}

// ============================================================
// UNUSED IMPORTS RULE
// ============================================================

const MODULE_NAME = 'UnusedImports';

const UNUSED_IMPORT: ViolationKind = {
  id: 'import.unused',
  message: 'Unused import - {import}.',
  fixAvailability: 'always',
};

/** Delete the declaration together with the line terminator after it */
function deleteImportFix(source: string, range: TextRange): Fix {
  let end = range.end;
  if (source.startsWith('\r\n', end)) {
    end += 2;
  } else if (source.charAt(end) === '\n') {
    end += 1;
  }
  return {
    description: 'Remove unused import',
    edits: [{ range: { start: range.start, end }, replacement: '' }],
  };
}

/**
 * Runs once per file on the program node. Wildcard imports are never
 * reported. With processJavadoc (default true), types named by Javadoc
 * link and block tags count as references.
 */
class UnusedImportsRule implements Rule {
  readonly name = MODULE_NAME;
  readonly relevantKinds = ['program'];

  constructor(private readonly processJavadoc: boolean) {}

  check(ctx: CheckContext, node: CstNode): Diagnostic[] {
    const imports = node.namedChildren
      .filter((child) => child.kind === 'import_declaration')
      .map((child) => parseImport(child, ctx.source))
      .filter((info): info is ImportInfo => info !== null);
    if (imports.length === 0) {
      return [];
    }

    const references = collectReferences(node, ctx.source, this.processJavadoc);
    return imports
      .filter((info) => !info.isWildcard && !references.has(info.simpleName))
      .map((info) =>
        report(
          {
            ...UNUSED_IMPORT,
            message: UNUSED_IMPORT.message.replace('{import}', info.path),
          },
          info.range,
          deleteImportFix(ctx.source, info.range)
        )
      );
  }
}

export const UNUSED_IMPORTS: RuleFactory = {
  moduleName: MODULE_NAME,
  category: 'imports',
  defaultSeverity: 'warning',
  description: 'Imports must be referenced',

  fromConfig(properties: Properties, warn?: WarningSink): Rule {
    const reader = new PropertyReader(MODULE_NAME, properties, warn);
    return new UnusedImportsRule(reader.boolean('processJavadoc', true));
  },
};
