/**
 * Effective-Finality Analyzer
 * Decides which local variables receive exactly one value on every path.
 *
 * The analysis is a single recursive pass over one entry (method,
 * constructor, initializer or lambda). Bindings live on a scope stack;
 * assignment knowledge lives in a FlowState that is copied at branch entry
 * and joined at merge points. A candidate is disqualified as soon as some
 * path may assign it twice, or a repeating region assigns a candidate
 * declared outside of it.
 */

import { hasToken, unwrapParentheses, type CstNode } from '@jstyle/core';
import { FlowState } from './flow.js';
import { ScopeStack } from './scope.js';
import type {
  CandidateState,
  CandidateVerdict,
  ExclusionReason,
  FinalityOptions,
  VariableCandidate,
} from './types.js';

// ============================================================
// ENTRY DETECTION
// ============================================================

const ENTRY_KINDS: ReadonlySet<string> = new Set([
  'method_declaration',
  'constructor_declaration',
  'compact_constructor_declaration',
  'static_initializer',
  'lambda_expression',
]);

/** Parents under which a bare block is an instance initializer */
const INITIALIZER_PARENTS: ReadonlySet<string> = new Set([
  'class_body',
  'enum_body_declarations',
]);

/** Kinds the finality rule registers for */
export const ENTRY_NODE_KINDS: readonly string[] = [...ENTRY_KINDS, 'block'];

export function isAnalysisEntry(node: CstNode): boolean {
  if (ENTRY_KINDS.has(node.kind)) {
    return true;
  }
  return (
    node.kind === 'block' &&
    node.parent !== null &&
    INITIALIZER_PARENTS.has(node.parent.kind)
  );
}

/**
 * True for an entry no other entry encloses. Nested entries (lambdas,
 * members of local and anonymous classes) are analyzed inline by the
 * enclosing entry.
 */
export function isOutermostEntry(node: CstNode): boolean {
  if (!isAnalysisEntry(node)) {
    return false;
  }
  for (let current = node.parent; current; current = current.parent) {
    if (isAnalysisEntry(current)) {
      return false;
    }
  }
  return true;
}

// ============================================================
// NODE KIND GROUPS
// ============================================================

const TYPE_DECLARATION_KINDS: ReadonlySet<string> = new Set([
  'class_declaration',
  'record_declaration',
  'interface_declaration',
  'enum_declaration',
  'annotation_type_declaration',
]);

const TYPE_BODY_KINDS: ReadonlySet<string> = new Set([
  'class_body',
  'interface_body',
  'enum_body',
  'annotation_type_body',
]);

const LABELABLE_KINDS: ReadonlySet<string> = new Set([
  'while_statement',
  'do_statement',
  'for_statement',
  'enhanced_for_statement',
  'switch_expression',
  'switch_statement',
]);

const FIELD_KINDS: ReadonlySet<string> = new Set([
  'field_declaration',
  'constant_declaration',
]);

// ============================================================
// JUMP TARGETS
// ============================================================

interface JumpTarget {
  readonly kind: 'loop' | 'switch' | 'block';
  readonly label: string | null;
  /** States at the jumps that leave through this target */
  readonly states: FlowState[];
}

// ============================================================
// ANALYZER
// ============================================================

export class FinalityAnalyzer {
  private readonly scopes = new ScopeStack();
  private state = FlowState.initial();
  private repeatDepth = 0;
  private jumpTargets: JumpTarget[] = [];
  private tryCollectors: FlowState[][] = [];
  private pendingLabel: string | null = null;
  private readonly disqualified = new Set<VariableCandidate>();
  private readonly assigned = new Set<VariableCandidate>();
  private readonly verdicts: CandidateVerdict[] = [];

  constructor(
    private readonly source: string,
    private readonly options: FinalityOptions
  ) {}

  /**
   * Analyze one entry and return a verdict for every candidate declared in
   * it, in the order their scopes closed.
   */
  analyze(entry: CstNode): CandidateVerdict[] {
    this.withScope(() => {
      if (entry.kind === 'lambda_expression') {
        this.visitLambda(entry);
      } else {
        this.visit(entry);
      }
    });
    return this.verdicts;
  }

  // ----------------------------------------------------------
  // Dispatch
  // ----------------------------------------------------------

  private visit(node: CstNode): void {
    switch (node.kind) {
      case 'block':
      case 'constructor_body':
        this.withScope(() => this.visitChildren(node));
        return;
      case 'method_declaration':
      case 'constructor_declaration':
      case 'compact_constructor_declaration':
        this.withScope(() => this.visitChildren(node));
        return;
      case 'formal_parameter':
      case 'spread_parameter':
        this.bindExcluded(parameterName(node), 'parameter');
        return;
      case 'local_variable_declaration':
        this.visitDeclaration(node);
        return;
      case 'assignment_expression':
        this.visitAssignment(node);
        return;
      case 'update_expression':
        this.visitUpdate(node);
        return;
      case 'if_statement':
        this.visitIf(node);
        return;
      case 'ternary_expression':
        this.visitTernary(node);
        return;
      case 'while_statement':
        this.visitWhile(node);
        return;
      case 'do_statement':
        this.visitDo(node);
        return;
      case 'for_statement':
        this.visitFor(node);
        return;
      case 'enhanced_for_statement':
        this.visitEnhancedFor(node);
        return;
      case 'switch_expression':
      case 'switch_statement':
        this.visitSwitch(node);
        return;
      case 'try_statement':
      case 'try_with_resources_statement':
        this.visitTry(node);
        return;
      case 'labeled_statement':
        this.visitLabeled(node);
        return;
      case 'return_statement':
      case 'throw_statement':
        this.visitChildren(node);
        this.jump(null);
        return;
      case 'break_statement':
        this.jump(this.breakTarget(node));
        return;
      case 'continue_statement':
        this.jump(null);
        return;
      case 'yield_statement':
        this.visitChildren(node);
        this.jump(this.innermostTarget(['switch']));
        return;
      case 'lambda_expression':
        this.visitLambda(node);
        return;
      case 'instanceof_expression':
        this.visitChildren(node);
        this.bindExcluded(node.childByFieldName('name'), 'pattern');
        return;
      case 'type_pattern':
      case 'record_pattern_component':
        this.visitChildren(node);
        this.bindExcluded(patternName(node), 'pattern');
        return;
      default:
        if (TYPE_DECLARATION_KINDS.has(node.kind)) {
          this.visitTypeDeclaration(node);
        } else if (TYPE_BODY_KINDS.has(node.kind)) {
          this.visitTypeBody(node, []);
        } else {
          this.visitChildren(node);
        }
    }
  }

  private visitChildren(node: CstNode): void {
    for (const child of node.namedChildren) {
      this.visit(child);
    }
  }

  private visitOptional(node: CstNode | null): void {
    if (node) {
      this.visit(node);
    }
  }

  // ----------------------------------------------------------
  // Declarations and assignments
  // ----------------------------------------------------------

  private visitDeclaration(node: CstNode): void {
    const isFinal = hasFinalModifier(node);
    for (const declarator of node.childrenByFieldName('declarator')) {
      const value = declarator.childByFieldName('value');
      this.visitOptional(value);

      const nameNode = declarator.childByFieldName('name');
      if (!nameNode) {
        continue;
      }
      if (isFinal) {
        this.bindExcluded(nameNode, 'final');
      } else if (this.isIgnoredUnnamed(nameNode)) {
        this.bindExcluded(nameNode, 'unnamed');
      } else {
        this.declareCandidate(nameNode, value !== null);
      }
    }
  }

  /** Left subexpressions, then the right side, then the assignment itself */
  private visitAssignment(node: CstNode): void {
    const left = node.childByFieldName('left');
    const target = left ? unwrapParentheses(left) : null;
    if (target && target.kind !== 'identifier') {
      this.visit(target);
    }
    this.visitOptional(node.childByFieldName('right'));
    if (target?.kind === 'identifier') {
      this.assign(this.text(target));
    }
  }

  private visitUpdate(node: CstNode): void {
    const operand = node.namedChildren[0];
    if (!operand) {
      return;
    }
    const target = unwrapParentheses(operand);
    if (target.kind === 'identifier') {
      this.assign(this.text(target));
    } else {
      this.visit(target);
    }
  }

  private declareCandidate(nameNode: CstNode, initialized: boolean): void {
    const candidate: VariableCandidate = {
      name: this.text(nameNode),
      nameRange: nameNode.range,
      initialized,
      repeatDepth: this.repeatDepth,
    };
    this.scopes.bind(candidate.name, { type: 'candidate', candidate });
  }

  private bindExcluded(nameNode: CstNode | null, reason: ExclusionReason): void {
    if (nameNode) {
      this.scopes.bind(this.text(nameNode), { type: 'excluded', reason });
    }
  }

  private isIgnoredUnnamed(nameNode: CstNode): boolean {
    return (
      this.text(nameNode) === '_' && !this.options.validateUnnamedVariables
    );
  }

  /** Record a value-giving action on the nearest binding of a name */
  private assign(name: string): void {
    const binding = this.scopes.lookup(name);
    if (!binding || binding.type !== 'candidate') {
      return;
    }
    const candidate = binding.candidate;
    if (this.disqualified.has(candidate)) {
      return;
    }
    if (
      candidate.initialized ||
      candidate.repeatDepth < this.repeatDepth ||
      this.state.mayBeAssigned(candidate)
    ) {
      this.disqualified.add(candidate);
      return;
    }
    this.state.markAssigned(candidate);
    this.assigned.add(candidate);
  }

  // ----------------------------------------------------------
  // Branches
  // ----------------------------------------------------------

  /** Run `fn` on a copy of `entry` and return the state it ends in */
  private runFrom(entry: FlowState, fn: () => void): FlowState {
    this.state = entry.copy();
    fn();
    return this.state;
  }

  private visitIf(node: CstNode): void {
    this.visitOptional(node.childByFieldName('condition'));
    const entry = this.state;
    const consequence = node.childByFieldName('consequence');
    const alternative = node.childByFieldName('alternative');

    const thenEnd = this.runFrom(entry, () => this.visitOptional(consequence));
    const elseEnd = alternative
      ? this.runFrom(entry, () => this.visit(alternative))
      : entry;
    this.state = FlowState.merge([thenEnd, elseEnd]);
  }

  private visitTernary(node: CstNode): void {
    this.visitOptional(node.childByFieldName('condition'));
    const entry = this.state;
    const consequence = node.childByFieldName('consequence');
    const alternative = node.childByFieldName('alternative');

    this.state = FlowState.merge([
      this.runFrom(entry, () => this.visitOptional(consequence)),
      this.runFrom(entry, () => this.visitOptional(alternative)),
    ]);
  }

  private visitSwitch(node: CstNode): void {
    const label = this.takeLabel();
    this.visitOptional(node.childByFieldName('condition'));
    const body = node.childByFieldName('body');
    if (!body) {
      return;
    }

    const entry = this.state;
    this.withScope(() => {
      const ends: FlowState[] = [];
      const breaks = this.withTarget('switch', label, () => {
        let hasDefault = false;
        let fallthrough: FlowState | null = null;
        for (const child of body.namedChildren) {
          if (child.kind === 'switch_rule') {
            hasDefault ||= hasDefaultLabel(child);
            ends.push(this.runFrom(entry, () => this.visitChildren(child)));
          } else if (child.kind === 'switch_block_statement_group') {
            hasDefault ||= hasDefaultLabel(child);
            // Entered from the selector or by falling through the previous group
            const groupEntry: FlowState =
              fallthrough && fallthrough.live
                ? FlowState.merge([entry, fallthrough])
                : entry;
            fallthrough = this.runFrom(groupEntry, () =>
              this.visitChildren(child)
            );
          }
        }
        if (fallthrough) {
          ends.push(fallthrough);
        }
        if (!hasDefault) {
          ends.push(entry);
        }
      });
      this.state = FlowState.merge([...ends, ...breaks]);
    });
  }

  private visitTry(node: CstNode): void {
    this.withScope(() => {
      const resources = node.childByFieldName('resources');
      if (resources) {
        for (const resource of resources.namedChildren) {
          this.visitResource(resource);
        }
      }

      const tryEntry = this.state;
      const statementJumps: FlowState[] = [];
      const bodyJumps: FlowState[] = [];
      this.tryCollectors.push(statementJumps, bodyJumps);
      this.visitOptional(node.childByFieldName('body'));
      this.tryCollectors.pop();
      const tryEnd = this.state;

      // Any prefix of the try body may have run before a catch starts
      const catchEntry = FlowState.merge([tryEntry, tryEnd, ...bodyJumps]);
      const ends: FlowState[] = [tryEnd];
      for (const clause of node.namedChildren) {
        if (clause.kind === 'catch_clause') {
          ends.push(
            this.runFrom(catchEntry, () => this.visitCatch(clause))
          );
        }
      }
      this.tryCollectors.pop();

      const normal = FlowState.merge(ends);
      const finallyClause = node.namedChildren.find(
        (child) => child.kind === 'finally_clause'
      );
      if (!finallyClause) {
        this.state = normal;
        return;
      }

      this.state = FlowState.merge([normal, ...statementJumps]).revived();
      this.visitChildren(finallyClause);
      if (!normal.live) {
        this.state.terminate();
      }
    });
  }

  private visitResource(resource: CstNode): void {
    const name = resource.childByFieldName('name');
    if (!name) {
      this.visit(resource);
      return;
    }
    this.visitOptional(resource.childByFieldName('value'));
    this.bindExcluded(name, 'resource');
  }

  private visitCatch(clause: CstNode): void {
    this.withScope(() => {
      for (const child of clause.namedChildren) {
        if (child.kind === 'catch_formal_parameter') {
          this.bindExcluded(child.childByFieldName('name'), 'catch-parameter');
        }
      }
      this.visitOptional(clause.childByFieldName('body'));
    });
  }

  // ----------------------------------------------------------
  // Loops (repeating regions)
  // ----------------------------------------------------------

  private visitWhile(node: CstNode): void {
    const label = this.takeLabel();
    this.inRepeat(() => {
      this.visitOptional(node.childByFieldName('condition'));
      this.loopBody(label, () =>
        this.visitOptional(node.childByFieldName('body'))
      );
    });
  }

  private visitDo(node: CstNode): void {
    const label = this.takeLabel();
    this.inRepeat(() => {
      const breaks = this.withTarget('loop', label, () => {
        this.visitOptional(node.childByFieldName('body'));
        // continue jumps to the condition
        this.state = this.state.revived();
        this.visitOptional(node.childByFieldName('condition'));
      });
      this.state = FlowState.merge([this.state, ...breaks]);
    });
  }

  private visitFor(node: CstNode): void {
    const label = this.takeLabel();
    this.withScope(() => {
      for (const init of node.childrenByFieldName('init')) {
        if (init.kind === 'local_variable_declaration') {
          for (const declarator of init.childrenByFieldName('declarator')) {
            this.visitOptional(declarator.childByFieldName('value'));
            this.bindExcluded(declarator.childByFieldName('name'), 'for-init');
          }
        } else {
          this.visit(init);
        }
      }

      this.inRepeat(() => {
        this.visitOptional(node.childByFieldName('condition'));
        this.loopBody(label, () => {
          this.visitOptional(node.childByFieldName('body'));
          for (const update of node.childrenByFieldName('update')) {
            this.visit(update);
          }
        });
      });
    });
  }

  private visitEnhancedFor(node: CstNode): void {
    const label = this.takeLabel();
    this.visitOptional(node.childByFieldName('value'));
    this.withScope(() =>
      this.inRepeat(() => {
        const nameNode = node.childByFieldName('name');
        if (nameNode) {
          if (hasFinalModifier(node)) {
            this.bindExcluded(nameNode, 'final');
          } else if (this.isIgnoredUnnamed(nameNode)) {
            this.bindExcluded(nameNode, 'unnamed');
          } else if (!this.options.validateEnhancedForLoopVariable) {
            this.bindExcluded(nameNode, 'for-each');
          } else {
            this.declareCandidate(nameNode, true);
          }
        }
        this.loopBody(label, () =>
          this.visitOptional(node.childByFieldName('body'))
        );
      })
    );
  }

  /**
   * Body of a loop whose test ran in the current state: the loop may exit
   * before the body, after it, or through a break.
   */
  private loopBody(label: string | null, fn: () => void): void {
    const entry = this.state;
    const breaks = this.withTarget('loop', label, () => {
      this.state = entry.copy();
      fn();
    });
    this.state = FlowState.merge([entry, this.state, ...breaks]);
  }

  private inRepeat(fn: () => void): void {
    this.repeatDepth++;
    fn();
    this.repeatDepth--;
  }

  // ----------------------------------------------------------
  // Jumps
  // ----------------------------------------------------------

  private visitLabeled(node: CstNode): void {
    const [labelNode, statement] = node.namedChildren;
    if (!labelNode || !statement) {
      return;
    }
    const label = this.text(labelNode);
    if (LABELABLE_KINDS.has(statement.kind)) {
      this.pendingLabel = label;
      this.visit(statement);
      return;
    }
    const breaks = this.withTarget('block', label, () => this.visit(statement));
    this.state = FlowState.merge([this.state, ...breaks]);
  }

  private takeLabel(): string | null {
    const label = this.pendingLabel;
    this.pendingLabel = null;
    return label;
  }

  private withTarget(
    kind: JumpTarget['kind'],
    label: string | null,
    fn: () => void
  ): FlowState[] {
    const target: JumpTarget = { kind, label, states: [] };
    this.jumpTargets.push(target);
    fn();
    this.jumpTargets.pop();
    return target.states;
  }

  private breakTarget(node: CstNode): JumpTarget | null {
    const labelNode = node.namedChildren.find((c) => c.kind === 'identifier');
    if (!labelNode) {
      return this.innermostTarget(['loop', 'switch']);
    }
    const label = this.text(labelNode);
    for (let i = this.jumpTargets.length - 1; i >= 0; i--) {
      const target = this.jumpTargets[i];
      if (target?.label === label) {
        return target;
      }
    }
    return null;
  }

  private innermostTarget(
    kinds: ReadonlyArray<JumpTarget['kind']>
  ): JumpTarget | null {
    for (let i = this.jumpTargets.length - 1; i >= 0; i--) {
      const target = this.jumpTargets[i];
      if (target && kinds.includes(target.kind)) {
        return target;
      }
    }
    return null;
  }

  /** End the current path, handing its state to the jump target and to enclosing try statements */
  private jump(target: JumpTarget | null): void {
    target?.states.push(this.state.copy());
    for (const collector of this.tryCollectors) {
      collector.push(this.state.copy());
    }
    this.state.terminate();
  }

  // ----------------------------------------------------------
  // Lambdas and class bodies (isolated repeating regions)
  // ----------------------------------------------------------

  private visitLambda(node: CstNode): void {
    this.isolated(() =>
      this.withScope(() => {
        const parameters = node.childByFieldName('parameters');
        if (parameters?.kind === 'identifier') {
          this.bindExcluded(parameters, 'lambda-parameter');
        } else if (parameters?.kind === 'inferred_parameters') {
          for (const name of parameters.namedChildren) {
            this.bindExcluded(name, 'lambda-parameter');
          }
        } else {
          this.visitOptional(parameters);
        }
        this.visitOptional(node.childByFieldName('body'));
      })
    );
  }

  private visitTypeDeclaration(node: CstNode): void {
    const body = node.childByFieldName('body');
    if (!body) {
      return;
    }
    const components: CstNode[] = [];
    if (node.kind === 'record_declaration') {
      const parameters = node.childByFieldName('parameters');
      for (const parameter of parameters?.namedChildren ?? []) {
        const name = parameterName(parameter);
        if (name) components.push(name);
      }
    }
    this.visitTypeBody(body, components);
  }

  /**
   * Members see the class's fields and record components, which shadow
   * enclosing locals. Code in a class body may run any number of times.
   */
  private visitTypeBody(body: CstNode, components: readonly CstNode[]): void {
    this.isolated(() =>
      this.withScope(() => {
        for (const component of components) {
          this.bindExcluded(component, 'field');
        }
        for (const name of memberFieldNames(body)) {
          this.bindExcluded(name, 'field');
        }
        this.visitChildren(body);
      })
    );
  }

  /**
   * Code that runs at an unknown time: its own paths, no jump targets of
   * the enclosing code, one more repeating region.
   */
  private isolated(fn: () => void): void {
    const saved = {
      state: this.state,
      jumpTargets: this.jumpTargets,
      tryCollectors: this.tryCollectors,
      pendingLabel: this.pendingLabel,
    };
    this.state = saved.state.revived();
    this.jumpTargets = [];
    this.tryCollectors = [];
    this.pendingLabel = null;
    this.repeatDepth++;

    fn();

    this.repeatDepth--;
    this.state = saved.state;
    this.jumpTargets = saved.jumpTargets;
    this.tryCollectors = saved.tryCollectors;
    this.pendingLabel = saved.pendingLabel;
  }

  // ----------------------------------------------------------
  // Scopes and verdicts
  // ----------------------------------------------------------

  private withScope(fn: () => void): void {
    this.scopes.push();
    fn();
    for (const candidate of this.scopes.pop().candidates) {
      this.verdicts.push(this.verdictOf(candidate));
    }
  }

  private verdictOf(candidate: VariableCandidate): CandidateVerdict {
    let state: CandidateState = 'untouched';
    if (this.disqualified.has(candidate)) {
      state = 'disqualified';
    } else if (this.assigned.has(candidate)) {
      state = 'single-assigned';
    }
    const reportable = candidate.initialized
      ? state === 'untouched'
      : state === 'single-assigned';
    return { candidate, state, reportable };
  }

  private text(node: CstNode): string {
    return this.source.slice(node.startOffset, node.endOffset);
  }
}

// ============================================================
// HELPERS
// ============================================================

function hasFinalModifier(node: CstNode): boolean {
  const modifiers = node.namedChildren.find((c) => c.kind === 'modifiers');
  return modifiers !== undefined && hasToken(modifiers, 'final');
}

function hasDefaultLabel(node: CstNode): boolean {
  return node.namedChildren.some(
    (child) => child.kind === 'switch_label' && hasToken(child, 'default')
  );
}

/** Name of a formal or spread parameter; null for receiver parameters */
function parameterName(node: CstNode): CstNode | null {
  const direct = node.childByFieldName('name');
  if (direct) {
    return direct;
  }
  const declarator = node.namedChildren.find(
    (c) => c.kind === 'variable_declarator'
  );
  return declarator?.childByFieldName('name') ?? null;
}

/** Binding introduced by a type pattern or record pattern component */
function patternName(node: CstNode): CstNode | null {
  const named = node.childByFieldName('name');
  if (named) {
    return named;
  }
  const last = node.namedChildren[node.namedChildren.length - 1];
  return last && last.kind === 'identifier' ? last : null;
}

/** Declared names of fields and enum constants of a type body */
function memberFieldNames(body: CstNode): CstNode[] {
  const names: CstNode[] = [];
  const collect = (members: readonly CstNode[]): void => {
    for (const member of members) {
      if (FIELD_KINDS.has(member.kind)) {
        for (const declarator of member.childrenByFieldName('declarator')) {
          const name = declarator.childByFieldName('name');
          if (name) names.push(name);
        }
      } else if (member.kind === 'enum_constant') {
        const name = member.childByFieldName('name');
        if (name) names.push(name);
      } else if (member.kind === 'enum_body_declarations') {
        collect(member.namedChildren);
      }
    }
  };
  collect(body.namedChildren);
  return names;
}
