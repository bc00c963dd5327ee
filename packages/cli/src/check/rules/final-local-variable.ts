/**
 * FinalLocalVariable Rule
 * Reports local variables that receive exactly one value and could be final.
 */

import type { CstNode } from '@jstyle/core';
import type {
  CheckContext,
  Diagnostic,
  Properties,
  Rule,
  RuleFactory,
  ViolationKind,
  WarningSink,
} from '../types.js';
import { PropertyReader } from '../properties.js';
import {
  ENTRY_NODE_KINDS,
  FinalityAnalyzer,
  isOutermostEntry,
} from '../finality/analyzer.js';
import type { FinalityOptions } from '../finality/types.js';
import { report } from './helpers.js';

// ============================================================
// VIOLATIONS
// ============================================================

const MODULE_NAME = 'FinalLocalVariable';

const FINAL_VARIABLE: ViolationKind = {
  id: 'final.variable',
  message: "Variable '{name}' should be declared final.",
  fixAvailability: 'none',
};

function finalVariable(name: string): ViolationKind {
  return {
    ...FINAL_VARIABLE,
    message: FINAL_VARIABLE.message.replace('{name}', name),
  };
}

// ============================================================
// RULE
// ============================================================

/**
 * Runs the finality analysis once per outermost entry (method, constructor,
 * initializer, or a lambda outside any of those). Entries nested in another
 * entry are covered by the enclosing analysis.
 *
 * Options:
 * - validateEnhancedForLoopVariable (default false)
 * - validateUnnamedVariables (default false)
 */
class FinalLocalVariableRule implements Rule {
  readonly name = MODULE_NAME;
  readonly relevantKinds = ENTRY_NODE_KINDS;

  constructor(private readonly options: FinalityOptions) {}

  check(ctx: CheckContext, node: CstNode): Diagnostic[] {
    if (!isOutermostEntry(node)) {
      return [];
    }
    const verdicts = new FinalityAnalyzer(ctx.source, this.options).analyze(
      node
    );
    return verdicts
      .filter((verdict) => verdict.reportable)
      .map(({ candidate }) =>
        report(finalVariable(candidate.name), candidate.nameRange)
      );
  }
}

export const FINAL_LOCAL_VARIABLE: RuleFactory = {
  moduleName: MODULE_NAME,
  category: 'coding',
  defaultSeverity: 'warning',
  description: 'Local variables assigned exactly once should be final',

  fromConfig(properties: Properties, warn?: WarningSink): Rule {
    const reader = new PropertyReader(MODULE_NAME, properties, warn);
    return new FinalLocalVariableRule({
      validateEnhancedForLoopVariable: reader.boolean(
        'validateEnhancedForLoopVariable',
        false
      ),
      validateUnnamedVariables: reader.boolean(
        'validateUnnamedVariables',
        false
      ),
    });
  },
};
