/**
 * Path Resolution
 *
 * Functions for resolving PathExpressions against the scope stack and
 * walking field chains through template values.
 */

import { MissingFieldError } from '../errors';
import type { SourceLocation } from '../lexer/token';
import type { PathExpression } from '../parser/ast-nodes';
import { type Value, NULL, boolValue, numberValue } from '../runtime/value';
import type { ScopeStack } from './scope-stack';

const INDEX_SEGMENT = /^[0-9]+$/;

/**
 * Walk `parts` starting from `value`.
 *
 * Objects are indexed by field name, sequences by digit segments. Returns
 * undefined as soon as a segment does not exist.
 *
 * @example
 * ```typescript
 * walkPath(toValue({ foo: { bar: 'baz' } }), ['foo', 'bar']); // string 'baz'
 * walkPath(toValue({ items: ['a', 'b'] }), ['items', '1']); // string 'b'
 * walkPath(toValue({ foo: null }), ['foo', 'bar']); // undefined
 * walkPath(value, []); // value (empty parts = this)
 * ```
 */
export function walkPath(value: Value, parts: readonly string[]): Value | undefined {
  let current: Value = value;

  for (const part of parts) {
    let next: Value | undefined;

    if (current.kind === 'object') {
      next = current.fields.get(part);
    } else if (current.kind === 'sequence' && INDEX_SEGMENT.test(part)) {
      next = current.items[Number(part)];
    }

    if (next === undefined) {
      return undefined;
    }
    current = next;
  }

  return current;
}

/**
 * Segments of a path as they appear in error reports
 *
 * `@index` keeps its sigil and a `this` path starts with `this`.
 */
export function displayPath(path: PathExpression): string[] {
  switch (path.root) {
    case 'data':
      return path.parts.map((part, i) => (i === 0 ? `@${part}` : part));
    case 'this':
      return ['this', ...path.parts];
    case 'scope':
      return [...path.parts];
  }
}

/**
 * Resolve a PathExpression against the scope stack.
 *
 * Plain names are looked up innermost scope first. Loop bindings and named
 * `with` scopes answer only to their own names; the nearest anonymous `with`
 * value (or the root) ends the lookup, so its missing fields are never read
 * from enclosing scopes.
 *
 * @throws MissingFieldError when the name or any later segment is absent
 */
export function resolvePathExpression(
  path: PathExpression,
  scopes: ScopeStack,
  loc: SourceLocation | null,
): Value {
  const [head, ...rest] = path.parts;
  let start: Value | undefined;
  let tail: readonly string[] = rest;

  switch (path.root) {
    case 'this':
      start = resolveThis(scopes);
      tail = path.parts;
      break;
    case 'data':
      start = resolveDataVariable(head, scopes);
      break;
    case 'scope':
      start = resolveName(head, scopes);
      break;
  }

  const value = start === undefined ? undefined : walkPath(start, tail);
  if (value === undefined) {
    throw new MissingFieldError({ path: displayPath(path), depth: scopes.size(), loc });
  }
  return value;
}

function resolveName(name: string, scopes: ScopeStack): Value | undefined {
  for (const scope of scopes.innermostFirst()) {
    switch (scope.kind) {
      case 'loop':
        if (scope.binding === name) {
          return scope.items[scope.index];
        }
        if (scope.indexBinding === name) {
          return numberValue(scope.index);
        }
        break;

      case 'object':
        if (scope.name !== null) {
          if (scope.name === name) {
            return scope.value;
          }
          break;
        }
        // An anonymous scope ends the lookup
        return scope.value.kind === 'object' ? scope.value.fields.get(name) : undefined;

      case 'root':
        if (scope.value.kind === 'object') {
          return scope.value.fields.get(name);
        }
        break;
    }
  }
  return undefined;
}

/**
 * `this` is the nearest anonymous `with` value, or the root
 */
function resolveThis(scopes: ScopeStack): Value {
  for (const scope of scopes.innermostFirst()) {
    if (scope.kind === 'root' || (scope.kind === 'object' && scope.name === null)) {
      return scope.value;
    }
  }
  return NULL;
}

/**
 * Resolve `@root`, `@index`, `@first` and `@last`
 */
function resolveDataVariable(name: string, scopes: ScopeStack): Value | undefined {
  if (name === 'root') {
    return scopes.getRoot().value;
  }

  const loop = scopes.getLoop();
  if (loop === null) {
    return undefined;
  }

  switch (name) {
    case 'index':
      return numberValue(loop.index);
    case 'first':
      return boolValue(loop.index === 0);
    case 'last':
      return boolValue(loop.index === loop.items.length - 1);
    default:
      return undefined;
  }
}
