/**
 * Scope Stack
 * Lexical scopes of bindings for the finality analysis.
 */

import type { Binding, VariableCandidate } from './types.js';

// ============================================================
// SCOPE
// ============================================================

export class Scope {
  private readonly bindings = new Map<string, Binding>();
  private readonly declared: VariableCandidate[] = [];

  bind(name: string, binding: Binding): void {
    this.bindings.set(name, binding);
    if (binding.type === 'candidate') {
      this.declared.push(binding.candidate);
    }
  }

  lookup(name: string): Binding | undefined {
    return this.bindings.get(name);
  }

  /** Candidates in declaration order, including shadowed redeclarations */
  get candidates(): readonly VariableCandidate[] {
    return this.declared;
  }
}

// ============================================================
// SCOPE STACK
// ============================================================

/**
 * Explicit stack of scopes.
 * Declarations bind in the innermost scope; lookups search outward.
 */
export class ScopeStack {
  private readonly scopes: Scope[] = [];

  get depth(): number {
    return this.scopes.length;
  }

  push(): void {
    this.scopes.push(new Scope());
  }

  /** Remove the innermost scope and return it */
  pop(): Scope {
    const scope = this.scopes.pop();
    if (!scope) {
      throw new Error('Scope stack underflow');
    }
    return scope;
  }

  bind(name: string, binding: Binding): void {
    const innermost = this.scopes[this.scopes.length - 1];
    if (!innermost) {
      throw new Error('No open scope to bind in');
    }
    innermost.bind(name, binding);
  }

  lookup(name: string): Binding | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const binding = this.scopes[i]?.lookup(name);
      if (binding) {
        return binding;
      }
    }
    return undefined;
  }
}
