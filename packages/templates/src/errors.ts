/**
 * Error types shared across the template engine
 *
 * Compile-time errors (LexerError, ParserError) live beside the lexer and
 * parser; render-time errors are defined here.
 */

import type { SourceLocation } from './lexer/token';

/**
 * Base class for every error raised by the template engine
 */
export abstract class TemplateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type RenderErrorKind =
  | 'MissingField'
  | 'NotIterable'
  | 'AmbiguousValue'
  | 'FormatterError'
  | 'InvalidContext';

interface RenderErrorDetails {
  path: readonly string[];
  depth: number;
  loc?: SourceLocation | null;
  cause?: unknown;
}

/**
 * Base class for failures raised while rendering a compiled template.
 * Carries the offending path and the scope depth at the time of failure.
 */
export abstract class RenderError extends TemplateError {
  abstract readonly kind: RenderErrorKind;
  /** Path segments of the expression being resolved */
  readonly path: readonly string[];
  /** Number of scopes on the stack when the error occurred */
  readonly depth: number;
  /** Location of the tag that was executing, when known */
  readonly loc: SourceLocation | null;

  constructor(message: string, details: RenderErrorDetails) {
    const position = details.loc?.start;
    super(
      position
        ? `Error at line ${position.line}, column ${position.column + 1}: ${message}`
        : message,
      details.cause === undefined ? undefined : { cause: details.cause },
    );
    this.path = details.path;
    this.depth = details.depth;
    this.loc = details.loc ?? null;
  }
}

/**
 * Thrown when a path names a field that does not exist in any scope
 */
export class MissingFieldError extends RenderError {
  readonly kind = 'MissingField';

  constructor(details: RenderErrorDetails) {
    super(`Missing field '${formatPath(details.path)}' (scope depth ${details.depth})`, details);
  }
}

/**
 * Thrown when a `for` block iterates over something other than a sequence
 */
export class NotIterableError extends RenderError {
  readonly kind = 'NotIterable';
  /** Kind of value that was found instead */
  readonly actual: string;

  constructor(actual: string, details: RenderErrorDetails) {
    super(`Expected '${formatPath(details.path)}' to be a sequence but found ${actual}`, details);
    this.actual = actual;
  }
}

/**
 * Thrown when a sequence or object is emitted without a formatter
 */
export class AmbiguousValueError extends RenderError {
  readonly kind = 'AmbiguousValue';
  readonly actual: string;

  constructor(actual: string, details: RenderErrorDetails) {
    super(
      `Cannot print ${actual} '${formatPath(details.path)}' without a formatter; ` +
        'pipe it through a formatter or select a field',
      details,
    );
    this.actual = actual;
  }
}

/**
 * Thrown when a formatter is not registered or fails
 */
export class FormatterError extends RenderError {
  readonly kind = 'FormatterError';
  /** Name of the formatter that failed */
  readonly formatter: string;
  /** The formatter's own message (or the lookup failure) */
  readonly reason: string;

  constructor(formatter: string, reason: string, details: RenderErrorDetails) {
    super(`Formatter '${formatter}' failed: ${reason}`, details);
    this.formatter = formatter;
    this.reason = reason;
  }
}

/**
 * Thrown when render data cannot be converted to template values
 */
export class InvalidContextError extends RenderError {
  readonly kind = 'InvalidContext';

  constructor(reason: string, details: RenderErrorDetails) {
    super(`Invalid render data at '${formatPath(details.path)}': ${reason}`, details);
  }
}

/**
 * Thrown by TemplateRegistry for names that were never registered
 */
export class UnknownTemplateError extends TemplateError {
  readonly template: string;

  constructor(template: string) {
    super(`Unknown template '${template}'`);
    this.template = template;
  }
}

/**
 * Thrown when compile, render or registry options fail validation
 */
export class ConfigurationError extends TemplateError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

function formatPath(path: readonly string[]): string {
  return path.length === 0 ? 'this' : path.join('.');
}
