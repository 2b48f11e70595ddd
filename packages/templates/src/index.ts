/**
 * @tessera/templates - Main API
 *
 * Compiles templates into flat instruction programs and renders them
 * against caller data and a registry of named formatters.
 */

import type { CompileOptions, RenderOptions } from './config';
import { Template } from './template';

/**
 * Compile a template string into a reusable Template.
 *
 * The compiled template can be rendered multiple times with different data
 * without re-parsing the template.
 *
 * @example
 * ```typescript
 * const template = compile('Hello {{ name }}!');
 * template.render({ name: 'Alice' }); // 'Hello Alice!'
 * template.render({ name: 'Bob' }); // 'Hello Bob!'
 * ```
 */
export function compile(template: string, options?: CompileOptions): Template {
  return Template.compile(template, options);
}

/**
 * Render a template string with the given data.
 *
 * This is a convenience method that compiles and renders in one step.
 * For better performance when rendering the same template multiple times,
 * use `compile()` instead.
 *
 * @example
 * ```typescript
 * render('{{ for x in items }}{{ x }},{{ endfor }}', { items: [1, 2, 3] });
 * // '1,2,3,'
 *
 * // With custom formatters
 * render(
 *   '{{ name | upper }}',
 *   { name: 'alice' },
 *   { formatters: { upper: (value) => format(value).toUpperCase() } }
 * );
 * // 'ALICE'
 * ```
 */
export function render(template: string, data: unknown, options?: RenderOptions): string {
  return compile(template).render(data, options);
}

export { Template } from './template';
export { TemplateRegistry } from './registry';
export { TemplateCompiler } from './compiler/compiler';
export { Interpreter } from './interpreter/interpreter';

export { DEFAULT_LIMITS } from './config';
export type { CompileOptions, Limits, RegistryOptions, RenderOptions } from './config';

export {
  AmbiguousValueError,
  ConfigurationError,
  FormatterError,
  InvalidContextError,
  MissingFieldError,
  NotIterableError,
  RenderError,
  TemplateError,
  UnknownTemplateError,
} from './errors';
export type { RenderErrorKind } from './errors';
export { LexerError } from './lexer/lexer-error';
export { ParserError } from './parser/parser-error';

export {
  NULL,
  boolValue,
  fromValue,
  isTruthy,
  numberValue,
  objectValue,
  sequenceValue,
  stringValue,
  toValue,
  valuesEqual,
} from './runtime/value';
export type { Value, ValueKind } from './runtime/value';

export { builtInFormatters } from './formatters/index';
export { escape, format, json } from './formatters/builtins';
export type { Formatter, FormatterRegistry } from './formatters/index';

export type { CompiledProgram, Instruction } from './compiler/instructions';
export type { Condition, PathExpression, ValueExpression } from './parser/ast-nodes';
