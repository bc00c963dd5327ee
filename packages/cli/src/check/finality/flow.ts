/**
 * Flow State
 * Which candidates may already hold an assigned value on the current path.
 */

import type { VariableCandidate } from './types.js';

// ============================================================
// FLOW STATE
// ============================================================

/**
 * Per-path assignment state.
 *
 * A candidate absent from the set is definitely unassigned since its
 * declaration. A path that ended in a jump (return, throw, break, continue,
 * yield) is not live and drops out of merges.
 */
export class FlowState {
  private constructor(
    private readonly assigned: Set<VariableCandidate>,
    private reachable: boolean
  ) {}

  static initial(): FlowState {
    return new FlowState(new Set(), true);
  }

  get live(): boolean {
    return this.reachable;
  }

  copy(): FlowState {
    return new FlowState(new Set(this.assigned), this.reachable);
  }

  /** Same assignments on a path that is reachable again */
  revived(): FlowState {
    return new FlowState(new Set(this.assigned), true);
  }

  mayBeAssigned(candidate: VariableCandidate): boolean {
    return this.assigned.has(candidate);
  }

  markAssigned(candidate: VariableCandidate): void {
    this.assigned.add(candidate);
  }

  /** The path ends here */
  terminate(): void {
    this.reachable = false;
  }

  /**
   * Join alternatives at a merge point.
   *
   * A candidate may be assigned after the merge when it may be assigned on
   * any live alternative. When no alternative is live the result is not
   * live either and joins all of them.
   */
  static merge(states: readonly FlowState[]): FlowState {
    const liveStates = states.filter((state) => state.live);
    const sources = liveStates.length > 0 ? liveStates : states;
    const assigned = new Set<VariableCandidate>();
    for (const state of sources) {
      for (const candidate of state.assigned) {
        assigned.add(candidate);
      }
    }
    return new FlowState(assigned, liveStates.length > 0);
  }
}
