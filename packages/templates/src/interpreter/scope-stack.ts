/**
 * Scope Stack
 *
 * Manages the scope chain for a single render call.
 */

import type { Value } from '../runtime/value';

/** The render data passed by the caller */
export interface RootScope {
  readonly kind: 'root';
  readonly value: Value;
}

/** Pushed by `with`; `name` is set for `with expr as name` */
export interface ObjectScope {
  readonly kind: 'object';
  readonly value: Value;
  readonly name: string | null;
}

/** Pushed by `for`; `index` advances as the loop runs */
export interface LoopScope {
  readonly kind: 'loop';
  readonly binding: string;
  readonly indexBinding: string | null;
  readonly items: readonly Value[];
  index: number;
}

export type Scope = RootScope | ObjectScope | LoopScope;

/**
 * Stack of scopes from root (bottom) to innermost (top).
 *
 * The root scope is pushed on construction and is never popped.
 *
 * @example
 * ```typescript
 * const stack = new ScopeStack(root);
 * stack.push({ kind: 'object', value: user, name: null });
 * stack.getAtDepth(0); // the object scope (current)
 * stack.getAtDepth(1); // the root scope (parent)
 * ```
 */
export class ScopeStack {
  private scopes: Scope[];

  constructor(root: Value) {
    this.scopes = [{ kind: 'root', value: root }];
  }

  /**
   * Add a new scope to the stack.
   */
  push(scope: ObjectScope | LoopScope): void {
    this.scopes.push(scope);
  }

  /**
   * Remove and return the current scope.
   * @throws Error when only the root scope remains
   */
  pop(): ObjectScope | LoopScope {
    const scope = this.scopes[this.scopes.length - 1];
    if (scope.kind === 'root') {
      throw new Error('Cannot pop the root scope');
    }
    this.scopes.pop();
    return scope;
  }

  /**
   * Get the current (innermost) scope.
   */
  getCurrent(): Scope {
    return this.scopes[this.scopes.length - 1];
  }

  /**
   * Get scope at specified depth relative to current.
   *
   * @param depth - Number of levels up from current scope
   *   - 0: current scope
   *   - 1: parent scope
   * @returns Scope at specified depth, or root if depth exceeds stack size
   */
  getAtDepth(depth: number): Scope {
    const index = this.scopes.length - 1 - depth;
    if (index < 0) {
      return this.scopes[0];
    }
    return this.scopes[index];
  }

  getRoot(): RootScope {
    const root = this.scopes[0];
    if (root.kind !== 'root') {
      throw new Error('Scope stack has no root');
    }
    return root;
  }

  /**
   * Get the innermost loop scope, or null outside of loops.
   */
  getLoop(): LoopScope | null {
    for (const scope of this.innermostFirst()) {
      if (scope.kind === 'loop') {
        return scope;
      }
    }
    return null;
  }

  /**
   * Iterate scopes from the current one down to the root.
   */
  *innermostFirst(): IterableIterator<Scope> {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      yield this.scopes[i];
    }
  }

  /**
   * Get the current stack depth.
   * @returns Number of scopes in the stack, root included
   */
  size(): number {
    return this.scopes.length;
  }
}
