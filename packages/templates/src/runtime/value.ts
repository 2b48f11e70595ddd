/**
 * Template values
 *
 * Render data is converted into a closed set of value kinds before a
 * template runs. Every consumer switches on `kind`; nothing inspects raw
 * JavaScript values at render time.
 */

import { InvalidContextError } from '../errors';

export type Value =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'sequence'; readonly items: readonly Value[] }
  | { readonly kind: 'object'; readonly fields: ReadonlyMap<string, Value> };

export type ValueKind = Value['kind'];

export const NULL: Value = Object.freeze({ kind: 'null' });
const TRUE: Value = Object.freeze({ kind: 'bool', value: true });
const FALSE: Value = Object.freeze({ kind: 'bool', value: false });

export function boolValue(value: boolean): Value {
  return value ? TRUE : FALSE;
}

export function numberValue(value: number): Value {
  return { kind: 'number', value };
}

export function stringValue(value: string): Value {
  return { kind: 'string', value };
}

export function sequenceValue(items: readonly Value[]): Value {
  return { kind: 'sequence', items };
}

export function objectValue(fields: Iterable<readonly [string, Value]>): Value {
  return { kind: 'object', fields: new Map(fields) };
}

/**
 * Convert arbitrary render data into a Value.
 *
 * Conversion mirrors JSON: `undefined`, functions and symbols become null
 * inside sequences and are dropped from objects. Dates become ISO strings,
 * bigints become numbers, Maps with string keys and plain objects become
 * objects, Sets and arrays become sequences.
 *
 * @throws {InvalidContextError} For circular data or non-string Map keys
 */
export function toValue(data: unknown): Value {
  return convert(data, [], new Set());
}

function convert(data: unknown, path: string[], seen: Set<object>): Value {
  switch (typeof data) {
    case 'boolean':
      return boolValue(data);
    case 'number':
      return numberValue(data);
    case 'bigint':
      return numberValue(Number(data));
    case 'string':
      return stringValue(data);
  }

  if (typeof data !== 'object' || data === null) {
    return NULL;
  }

  if (data instanceof Date) {
    return Number.isNaN(data.getTime()) ? NULL : stringValue(data.toISOString());
  }

  if (seen.has(data)) {
    throw new InvalidContextError('circular reference', { path, depth: 0 });
  }

  seen.add(data);
  try {
    if (Array.isArray(data) || data instanceof Set) {
      return sequenceValue(
        Array.from(data, (item: unknown, i) => convert(item, [...path, String(i)], seen)),
      );
    }

    const fields = new Map<string, Value>();
    const entries: Iterable<[unknown, unknown]> =
      data instanceof Map ? data.entries() : Object.entries(data);

    for (const [key, item] of entries) {
      if (typeof key !== 'string') {
        throw new InvalidContextError(`unsupported ${typeof key} key`, { path, depth: 0 });
      }
      if (item === undefined || typeof item === 'function' || typeof item === 'symbol') {
        continue;
      }
      fields.set(key, convert(item, [...path, key], seen));
    }

    return { kind: 'object', fields };
  } finally {
    seen.delete(data);
  }
}

/**
 * Convert a Value back into plain JavaScript data
 */
export function fromValue(value: Value): unknown {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'number':
    case 'string':
      return value.value;
    case 'sequence':
      return value.items.map(fromValue);
    case 'object':
      // fromEntries defines own properties, so a `__proto__` key stays a field
      return Object.fromEntries(
        Array.from(value.fields, ([key, item]): [string, unknown] => [key, fromValue(item)]),
      );
  }
}

/**
 * Truthiness used by `if` blocks.
 *
 * Null, false, the empty string, the empty sequence, zero and NaN are falsy.
 * Every object, even an empty one, is truthy.
 */
export function isTruthy(value: Value): boolean {
  switch (value.kind) {
    case 'null':
      return false;
    case 'bool':
      return value.value;
    case 'number':
      return value.value !== 0 && !Number.isNaN(value.value);
    case 'string':
      return value.value.length > 0;
    case 'sequence':
      return value.items.length > 0;
    case 'object':
      return true;
  }
}

/**
 * Equality used by `==` and `!=`.
 *
 * Values of different kinds are never equal, so `1 == "1"` is false.
 * Scalars compare with `===` (NaN is unequal to itself), sequences compare
 * element-wise and objects compare by key set and per-key equality.
 */
export function valuesEqual(left: Value, right: Value): boolean {
  switch (left.kind) {
    case 'null':
      return right.kind === 'null';
    case 'bool':
      return right.kind === 'bool' && right.value === left.value;
    case 'number':
      return right.kind === 'number' && right.value === left.value;
    case 'string':
      return right.kind === 'string' && right.value === left.value;
    case 'sequence': {
      if (right.kind !== 'sequence' || right.items.length !== left.items.length) {
        return false;
      }
      const others = right.items;
      return left.items.every((item, i) => valuesEqual(item, others[i]));
    }
    case 'object': {
      if (right.kind !== 'object' || right.fields.size !== left.fields.size) {
        return false;
      }
      for (const [key, item] of left.fields) {
        const other = right.fields.get(key);
        if (other === undefined || !valuesEqual(item, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

/**
 * Default string form of a scalar value.
 *
 * Returns null for sequences and objects, which have no unambiguous
 * string form.
 */
export function formatScalar(value: Value): string | null {
  switch (value.kind) {
    case 'null':
      return '';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
    case 'sequence':
    case 'object':
      return null;
  }
}
