/**
 * Flow State and Scope Tests
 */

import { describe, it, expect } from 'vitest';
import { FlowState } from '../../../src/check/finality/flow.js';
import { ScopeStack } from '../../../src/check/finality/scope.js';
import type { VariableCandidate } from '../../../src/check/finality/types.js';

function candidate(name: string): VariableCandidate {
  return {
    name,
    nameRange: { start: 0, end: name.length },
    initialized: false,
    repeatDepth: 0,
  };
}

describe('FlowState', () => {
  it('copies are independent', () => {
    const a = candidate('a');
    const state = FlowState.initial();
    const copy = state.copy();
    copy.markAssigned(a);

    expect(copy.mayBeAssigned(a)).toBe(true);
    expect(state.mayBeAssigned(a)).toBe(false);
  });

  it('merges the assignments of live states only', () => {
    const a = candidate('a');
    const b = candidate('b');
    const left = FlowState.initial();
    left.markAssigned(a);
    const right = FlowState.initial();
    right.markAssigned(b);
    right.terminate();

    const merged = FlowState.merge([left, right]);
    expect(merged.live).toBe(true);
    expect(merged.mayBeAssigned(a)).toBe(true);
    expect(merged.mayBeAssigned(b)).toBe(false);
  });

  it('merges dead states into a dead state', () => {
    const a = candidate('a');
    const only = FlowState.initial();
    only.markAssigned(a);
    only.terminate();

    const merged = FlowState.merge([only]);
    expect(merged.live).toBe(false);
    expect(merged.mayBeAssigned(a)).toBe(true);
    expect(merged.revived().live).toBe(true);
  });
});

describe('ScopeStack', () => {
  it('looks names up from the innermost scope outward', () => {
    const outer = candidate('x');
    const scopes = new ScopeStack();
    scopes.push();
    scopes.bind('x', { type: 'candidate', candidate: outer });
    scopes.push();
    scopes.bind('x', { type: 'excluded', reason: 'field' });

    expect(scopes.lookup('x')).toEqual({ type: 'excluded', reason: 'field' });
    scopes.pop();
    expect(scopes.lookup('x')).toEqual({ type: 'candidate', candidate: outer });
    expect(scopes.lookup('y')).toBeUndefined();
  });

  it('returns the candidates of a popped scope', () => {
    const scopes = new ScopeStack();
    scopes.push();
    scopes.bind('p', { type: 'excluded', reason: 'parameter' });
    scopes.bind('a', { type: 'candidate', candidate: candidate('a') });

    expect(scopes.depth).toBe(1);
    expect(scopes.pop().candidates.map((c) => c.name)).toEqual(['a']);
    expect(scopes.depth).toBe(0);
  });

  it('throws on underflow and on binding without a scope', () => {
    const scopes = new ScopeStack();
    expect(() => scopes.pop()).toThrow('Scope stack underflow');
    expect(() =>
      scopes.bind('x', { type: 'excluded', reason: 'field' })
    ).toThrow('No open scope to bind in');
  });
});
