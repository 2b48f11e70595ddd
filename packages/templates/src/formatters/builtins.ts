/**
 * Built-in formatters
 */

import { escapeExpression } from '../runtime/utils';
import { formatScalar, fromValue, type Value } from '../runtime/value';

function requireScalar(value: Value): string {
  const text = formatScalar(value);
  if (text === null) {
    throw new TypeError(`cannot format a ${value.kind}`);
  }
  return text;
}

/**
 * Default stringifier, identical to emitting a value without a pipe.
 *
 * @example
 * ```text
 * {{ count | format }}
 * ```
 */
export function format(value: Value): string {
  return requireScalar(value);
}

/**
 * HTML-escape a scalar value.
 *
 * @example
 * ```text
 * <p title="{{ title | escape }}">
 * ```
 */
export function escape(value: Value): string {
  return escapeExpression(requireScalar(value));
}

/**
 * Serialize any value as JSON. An optional numeric argument sets the indent.
 *
 * @example
 * ```text
 * {{ user | json }}
 * {{ user | json(2) }}
 * ```
 */
export function json(value: Value, args: readonly Value[]): string {
  const [indent] = args;
  let space: number | undefined;
  if (indent !== undefined) {
    if (indent.kind !== 'number') {
      throw new TypeError(`indent must be a number, got ${indent.kind}`);
    }
    space = indent.value;
  }
  return JSON.stringify(fromValue(value), null, space);
}
