/**
 * Coding Rules
 * Declaration and statement layout: one variable and one statement per line.
 */

import type { CstNode } from '@jstyle/core';
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
import {
  COMMENT_KINDS,
  indentAt,
  lineOf,
  report,
  splitLineFix,
} from './helpers.js';

/** Child immediately before `node` in its parent, tokens and comments included */
function previousSibling(node: CstNode): CstNode | null {
  const siblings = node.parent?.children ?? [];
  const index = siblings.indexOf(node);
  return index > 0 ? (siblings[index - 1] ?? null) : null;
}

/** Next named sibling that is not a comment */
function nextCodeSibling(node: CstNode): CstNode | null {
  const siblings = node.parent?.namedChildren ?? [];
  for (let i = siblings.indexOf(node) + 1; i < siblings.length; i++) {
    const sibling = siblings[i];
    if (sibling && !COMMENT_KINDS.has(sibling.kind)) {
      return sibling;
    }
  }
  return null;
}

// ============================================================
// MULTIPLE VARIABLE DECLARATIONS RULE
// ============================================================

const MULTIPLE_DECLARATIONS_MODULE = 'MultipleVariableDeclarations';

const MULTIPLE_COMMA: ViolationKind = {
  id: 'multiple.variable.declarations.comma',
  message: 'Each variable declaration must be in its own statement.',
  fixAvailability: 'always',
};

const MULTIPLE_SAME_LINE: ViolationKind = {
  id: 'multiple.variable.declarations',
  message: 'Only one variable definition per line allowed.',
  fixAvailability: 'always',
};

const DECLARATION_KINDS = [
  'local_variable_declaration',
  'field_declaration',
  'constant_declaration',
];

/**
 * Flags declarations with several declarators, and declarations followed
 * by another declaration on the same line. Declarations in a `for` header
 * are exempt.
 */
class MultipleVariableDeclarationsRule implements Rule {
  readonly name = MULTIPLE_DECLARATIONS_MODULE;
  readonly relevantKinds = DECLARATION_KINDS;

  check(ctx: CheckContext, node: CstNode): Diagnostic[] {
    if (node.parent?.kind === 'for_statement') {
      return [];
    }

    const diagnostics: Diagnostic[] = [];
    const declarators = node.childrenByFieldName('declarator');
    if (declarators.length > 1) {
      diagnostics.push(
        report(MULTIPLE_COMMA, node, splitDeclaratorsFix(ctx, node, declarators))
      );
    }

    const next = nextCodeSibling(node);
    if (
      next &&
      next.kind === node.kind &&
      lineOf(ctx, next.startOffset) === lineOf(ctx, node.endOffset)
    ) {
      const before = previousSibling(next) ?? node;
      diagnostics.push(
        report(
          MULTIPLE_SAME_LINE,
          node,
          splitLineFix(ctx, before, next, 'Move declaration to its own line')
        )
      );
    }

    return diagnostics;
  }
}

/**
 * One declaration per declarator, each repeating the modifiers and type
 * written before the first declarator.
 */
function splitDeclaratorsFix(
  ctx: CheckContext,
  node: CstNode,
  declarators: readonly CstNode[]
): Fix | null {
  const first = declarators[0];
  if (!first) {
    return null;
  }
  const prefix = ctx.source.slice(node.startOffset, first.startOffset);
  const separator = `\n${indentAt(ctx, node)}`;
  const replacement = declarators
    .map((declarator) => `${prefix}${ctx.text(declarator)};`)
    .join(separator);
  return {
    description: 'Split into one declaration per variable',
    edits: [{ range: node.range, replacement }],
  };
}

export const MULTIPLE_VARIABLE_DECLARATIONS: RuleFactory = {
  moduleName: MULTIPLE_DECLARATIONS_MODULE,
  category: 'coding',
  defaultSeverity: 'warning',
  description: 'One variable per declaration and per line',

  fromConfig(): Rule {
    return new MultipleVariableDeclarationsRule();
  },
};

// ============================================================
// ONE STATEMENT PER LINE RULE
// ============================================================

const ONE_STATEMENT_MODULE = 'OneStatementPerLine';

const ONE_STATEMENT: ViolationKind = {
  id: 'one.statement.line',
  message: 'Only one statement per line allowed.',
  fixAvailability: 'always',
};

/** Nodes whose direct children are statements or member declarations */
const STATEMENT_CONTAINERS = [
  'program',
  'block',
  'constructor_body',
  'switch_block_statement_group',
  'class_body',
  'interface_body',
  'enum_body_declarations',
];

/** Statements terminated by a semicolon */
const SEMICOLON_STATEMENTS: ReadonlySet<string> = new Set([
  'local_variable_declaration',
  'expression_statement',
  'field_declaration',
  'constant_declaration',
  'return_statement',
  'break_statement',
  'continue_statement',
  'throw_statement',
  'yield_statement',
  'assert_statement',
  'do_statement',
]);

/**
 * Flags every semicolon-terminated statement that starts on the line where
 * the previous one ends. Any other statement between them (if, loops,
 * blocks) breaks the chain. With treatTryResourcesAsStatement, resources
 * of one try header are checked the same way.
 */
class OneStatementPerLineRule implements Rule {
  readonly name = ONE_STATEMENT_MODULE;
  readonly relevantKinds: readonly string[];

  constructor(private readonly treatTryResourcesAsStatement: boolean) {
    this.relevantKinds = treatTryResourcesAsStatement
      ? [...STATEMENT_CONTAINERS, 'resource_specification']
      : STATEMENT_CONTAINERS;
  }

  check(ctx: CheckContext, node: CstNode): Diagnostic[] {
    const isResources = node.kind === 'resource_specification';
    if (isResources && !this.treatTryResourcesAsStatement) {
      return [];
    }

    const diagnostics: Diagnostic[] = [];
    let previous: CstNode | null = null;
    for (const child of node.namedChildren) {
      if (COMMENT_KINDS.has(child.kind)) {
        continue;
      }
      if (!isResources && !SEMICOLON_STATEMENTS.has(child.kind)) {
        previous = null;
        continue;
      }
      if (
        previous &&
        lineOf(ctx, child.startOffset) === lineOf(ctx, previous.endOffset)
      ) {
        const before = previousSibling(child) ?? previous;
        diagnostics.push(
          report(
            ONE_STATEMENT,
            child,
            splitLineFix(ctx, before, child, 'Move statement to its own line')
          )
        );
      }
      previous = child;
    }
    return diagnostics;
  }
}

export const ONE_STATEMENT_PER_LINE: RuleFactory = {
  moduleName: ONE_STATEMENT_MODULE,
  category: 'coding',
  defaultSeverity: 'warning',
  description: 'At most one statement per line',

  fromConfig(properties: Properties, warn?: WarningSink): Rule {
    const reader = new PropertyReader(ONE_STATEMENT_MODULE, properties, warn);
    return new OneStatementPerLineRule(
      reader.boolean('treatTryResourcesAsStatement', false)
    );
  },
};
