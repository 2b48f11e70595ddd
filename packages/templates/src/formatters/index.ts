/**
 * Formatter Registry
 *
 * Formatters turn a value (plus optional arguments) into text. They are
 * applied with the pipe syntax: `{{ value | name }}` or
 * `{{ value | name(arg1, arg2) }}`.
 */

import type { Value } from '../runtime/value';
import * as builtins from './builtins';

/**
 * A formatter receives the piped value and the evaluated call arguments.
 * Throwing signals failure; the renderer reports it as a FormatterError.
 */
export type Formatter = (value: Value, args: readonly Value[]) => string;

/**
 * Type definition for formatter registry (map of formatter name to function).
 */
export type FormatterRegistry = Readonly<Record<string, Formatter>>;

/**
 * Name of the default stringifier. It is reserved and cannot be replaced.
 */
export const DEFAULT_FORMATTER = 'format';

/**
 * Built-in formatters available by default in all templates.
 *
 * Includes:
 * - format: default string conversion (reserved)
 * - escape: HTML escaping
 * - json: JSON serialization of any value
 */
export const builtInFormatters: FormatterRegistry = {
  [DEFAULT_FORMATTER]: builtins.format,
  escape: builtins.escape,
  json: builtins.json,
};

export function isReservedFormatter(name: string): boolean {
  return name === DEFAULT_FORMATTER;
}

/**
 * Merge user formatters over the built-ins (user formatters win, except for
 * the reserved default).
 */
export function mergeFormatters(formatters?: FormatterRegistry): FormatterRegistry {
  return {
    ...builtInFormatters,
    ...formatters,
    [DEFAULT_FORMATTER]: builtins.format,
  };
}
