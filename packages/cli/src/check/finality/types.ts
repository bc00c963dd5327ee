/**
 * Finality Types
 * Candidates, bindings and per-path assignment state.
 */

import type { TextRange } from '@jstyle/core';

// ============================================================
// CANDIDATES AND BINDINGS
// ============================================================

/** A local variable evaluated for `final` eligibility */
export interface VariableCandidate {
  readonly name: string;
  /** Range of the declaring identifier */
  readonly nameRange: TextRange;
  /** True when the declaration carries an initializer */
  readonly initialized: boolean;
  /** Number of repeating regions enclosing the declaration */
  readonly repeatDepth: number;
}

/** Why a binding is never a candidate */
export type ExclusionReason =
  | 'parameter'
  | 'lambda-parameter'
  | 'catch-parameter'
  | 'for-init'
  | 'for-each'
  | 'resource'
  | 'pattern'
  | 'field'
  | 'final'
  | 'unnamed';

/**
 * A name visible in a scope.
 * Excluded bindings shadow outer names so assignments to them never reach
 * an outer candidate.
 */
export type Binding =
  | { readonly type: 'candidate'; readonly candidate: VariableCandidate }
  | { readonly type: 'excluded'; readonly reason: ExclusionReason };

/**
 * Verdict for a candidate once its scope closes.
 *
 * - `untouched`: no assignment after the declaration
 * - `single-assigned`: exactly one assignment on every path
 * - `disqualified`: some path assigns more than once, or assigns from a
 *   repeating region the variable was declared outside of
 */
export type CandidateState = 'untouched' | 'single-assigned' | 'disqualified';

export interface CandidateVerdict {
  readonly candidate: VariableCandidate;
  readonly state: CandidateState;
  /** Exactly one value-giving action: the variable could be final */
  readonly reportable: boolean;
}

export interface FinalityOptions {
  /** Treat enhanced-for loop variables as candidates */
  readonly validateEnhancedForLoopVariable: boolean;
  /** Treat the unnamed variable `_` as a candidate */
  readonly validateUnnamedVariables: boolean;
}
