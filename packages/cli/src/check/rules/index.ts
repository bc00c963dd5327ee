/**
 * Rule Registry
 * Barrel export for all rule factories.
 */

import { createError } from '@jstyle/core';
import type { Properties, Rule, RuleFactory, WarningSink } from '../types.js';
import { FINAL_LOCAL_VARIABLE } from './final-local-variable.js';
import {
  MULTIPLE_VARIABLE_DECLARATIONS,
  ONE_STATEMENT_PER_LINE,
} from './coding.js';
import { UNUSED_IMPORTS } from './imports.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export { FINAL_LOCAL_VARIABLE } from './final-local-variable.js';
export {
  MULTIPLE_VARIABLE_DECLARATIONS,
  ONE_STATEMENT_PER_LINE,
} from './coding.js';
export {
  UNUSED_IMPORTS,
  javadocReferences,
  parseImport,
  type ImportInfo,
} from './imports.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/**
 * All registered rule factories, in registration order.
 * Diagnostics at the same offset are reported in this order.
 */
export const RULE_FACTORIES: readonly RuleFactory[] = [
  FINAL_LOCAL_VARIABLE,
  MULTIPLE_VARIABLE_DECLARATIONS,
  ONE_STATEMENT_PER_LINE,
  UNUSED_IMPORTS,
];

export function findRuleFactory(moduleName: string): RuleFactory | undefined {
  return RULE_FACTORIES.find((factory) => factory.moduleName === moduleName);
}

/**
 * Instantiate a rule by module name.
 *
 * @throws JstyleError JSTYLE-R001 if no rule has that name
 */
export function createRule(
  moduleName: string,
  properties: Properties,
  warn?: WarningSink
): Rule {
  const factory = findRuleFactory(moduleName);
  if (!factory) {
    throw createError('JSTYLE-R001', { rule: moduleName });
  }
  return factory.fromConfig(properties, warn);
}
