import { beforeEach, describe, expect, it } from 'vitest';
import { type LoopScope, ScopeStack } from '../../src/interpreter/scope-stack';
import { NULL, numberValue, stringValue, toValue } from '../../src/runtime/value';

describe('ScopeStack', () => {
  const root = toValue({ name: 'root' });
  let stack: ScopeStack;

  beforeEach(() => {
    stack = new ScopeStack(root);
  });

  function loop(binding: string): LoopScope {
    return { kind: 'loop', binding, indexBinding: null, items: [numberValue(1)], index: 0 };
  }

  it('starts with the root scope', () => {
    expect(stack.size()).toBe(1);
    expect(stack.getCurrent()).toEqual({ kind: 'root', value: root });
    expect(stack.getRoot().value).toBe(root);
  });

  it('push and pop', () => {
    const scope = { kind: 'object' as const, value: stringValue('x'), name: null };

    stack.push(scope);
    expect(stack.size()).toBe(2);
    expect(stack.getCurrent()).toBe(scope);

    expect(stack.pop()).toBe(scope);
    expect(stack.size()).toBe(1);
  });

  it('never pops the root', () => {
    expect(() => stack.pop()).toThrow('Cannot pop the root scope');
    expect(stack.size()).toBe(1);
  });

  it('getAtDepth counts from the current scope', () => {
    const outer = loop('a');
    const inner = { kind: 'object' as const, value: NULL, name: 'n' };
    stack.push(outer);
    stack.push(inner);

    expect(stack.getAtDepth(0)).toBe(inner);
    expect(stack.getAtDepth(1)).toBe(outer);
    expect(stack.getAtDepth(2).kind).toBe('root');
    expect(stack.getAtDepth(10).kind).toBe('root');
  });

  it('getLoop finds the innermost loop', () => {
    expect(stack.getLoop()).toBeNull();

    const outer = loop('a');
    const inner = loop('b');
    stack.push(outer);
    stack.push({ kind: 'object', value: NULL, name: null });
    expect(stack.getLoop()).toBe(outer);

    stack.push(inner);
    expect(stack.getLoop()).toBe(inner);
  });

  it('iterates innermost first', () => {
    stack.push(loop('a'));
    stack.push({ kind: 'object', value: NULL, name: 'n' });

    expect([...stack.innermostFirst()].map((scope) => scope.kind)).toEqual(['object', 'loop', 'root']);
  });
});
