/**
 * Options accepted by compile, render and TemplateRegistry, validated with zod
 */

import type { Logger } from '@tessera/logger';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { Formatter, FormatterRegistry } from './formatters/index';

/**
 * Default compile limits
 */
export const DEFAULT_LIMITS = {
  /** Maximum template length in characters */
  maxTemplateLength: 1_000_000,
  /** Maximum number of simultaneously open blocks */
  maxNestingDepth: 100,
} as const;

export type Limits = { readonly [K in keyof typeof DEFAULT_LIMITS]: number };

/**
 * Options for compiling a template
 */
export interface CompileOptions {
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<Limits>;
  /** Receives template_compiled / template_compile_failed events */
  logger?: Logger;
}

/**
 * Options for rendering a compiled template
 */
export interface RenderOptions {
  /** Formatters merged over the built-ins; `format` cannot be replaced */
  formatters?: FormatterRegistry;
}

export interface RegistryOptions extends CompileOptions, RenderOptions {}

export interface ResolvedCompileOptions {
  limits: Limits;
  logger: Logger | null;
}

const LOGGER_METHODS = ['child', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

function isLogger(value: unknown): value is Logger {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return LOGGER_METHODS.every((method) => typeof Reflect.get(value, method) === 'function');
}

function isFormatter(value: unknown): value is Formatter {
  return typeof value === 'function';
}

const limitSchema = z
  .number()
  .positive()
  .refine((n) => Number.isInteger(n) || n === Infinity, 'Expected an integer or Infinity');

const limitsSchema = z
  .object({
    maxTemplateLength: limitSchema.optional(),
    maxNestingDepth: limitSchema.optional(),
  })
  .strict();

const loggerSchema = z.custom<Logger>(isLogger, { message: 'Expected a logger' });

const formattersSchema = z.record(
  z.string(),
  z.custom<Formatter>(isFormatter, { message: 'Expected a formatter function' }),
);

const compileOptionsSchema = z
  .object({
    limits: limitsSchema.optional(),
    logger: loggerSchema.optional(),
  })
  .strict();

const renderOptionsSchema = z
  .object({
    formatters: formattersSchema.optional(),
  })
  .strict();

const registryOptionsSchema = compileOptionsSchema.merge(renderOptionsSchema).strict();

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(options)';
    return `${path}: ${issue.message}`;
  });
}

function resolveLimits(limits: Partial<Limits> | undefined): Limits {
  return {
    maxTemplateLength: limits?.maxTemplateLength ?? DEFAULT_LIMITS.maxTemplateLength,
    maxNestingDepth: limits?.maxNestingDepth ?? DEFAULT_LIMITS.maxNestingDepth,
  };
}

/**
 * Validate compile options and fill in defaults
 * @throws ConfigurationError
 */
export function resolveCompileOptions(options: unknown = {}): ResolvedCompileOptions {
  const parsed = compileOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid compile options', describeIssues(parsed.error));
  }
  return {
    limits: resolveLimits(parsed.data.limits),
    logger: parsed.data.logger ?? null,
  };
}

/**
 * Validate render options
 * @throws ConfigurationError
 */
export function resolveRenderOptions(options: unknown = {}): RenderOptions {
  const parsed = renderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid render options', describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Validate registry options
 * @throws ConfigurationError
 */
export function resolveRegistryOptions(
  options: unknown = {},
): ResolvedCompileOptions & { formatters: FormatterRegistry } {
  const parsed = registryOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid registry options', describeIssues(parsed.error));
  }
  return {
    limits: resolveLimits(parsed.data.limits),
    logger: parsed.data.logger ?? null,
    formatters: parsed.data.formatters ?? {},
  };
}
