/**
 * Template Test Bench
 *
 * Fluent helper for behavioural template tests:
 *
 * expectTemplate('{{ name | upper }}')
 *   .withInput({ name: 'ada' })
 *   .withFormatter('upper', fn)
 *   .withFormatters({ upper: fn1, lower: fn2 })
 *   .withCompileOptions({ limits: { maxNestingDepth: 4 } })
 *   .withMessage('custom assertion message')
 *   .toRenderTo('ADA')
 *   .toThrow(ErrorType, /pattern/)
 */

import { expect } from 'vitest';
import {
  type CompileOptions,
  type Formatter,
  type TemplateError,
  compile,
} from '../../src/index';

type ErrorClass = abstract new (...args: never[]) => TemplateError;

export class TemplateTestBench {
  private readonly templateAsString: string;
  private formatters: Record<string, Formatter> = {};
  private input: unknown = {};
  private message: string;
  private compileOptions: CompileOptions = {};

  constructor(templateAsString: string) {
    this.templateAsString = templateAsString;
    this.message = `Template "${templateAsString}" does not render to expected output`;
  }

  withInput(input: unknown): this {
    this.input = input;
    return this;
  }

  withFormatter(name: string, formatter: Formatter): this {
    this.formatters[name] = formatter;
    return this;
  }

  withFormatters(formatters: Record<string, Formatter>): this {
    Object.assign(this.formatters, formatters);
    return this;
  }

  withCompileOptions(compileOptions: CompileOptions): this {
    Object.assign(this.compileOptions, compileOptions);
    return this;
  }

  withMessage(message: string): this {
    this.message = message;
    return this;
  }

  toRenderTo(expectedOutput: string): void {
    expect(this.compileAndRender(), this.message).toBe(expectedOutput);
  }

  toThrow(errorType: ErrorClass, messageMatcher?: RegExp | string): void {
    let thrown: unknown = null;
    try {
      this.compileAndRender();
    } catch (error) {
      thrown = error;
    }

    expect(thrown, `Template "${this.templateAsString}" did not throw`).toBeInstanceOf(errorType);
    if (messageMatcher !== undefined && thrown instanceof Error) {
      if (typeof messageMatcher === 'string') {
        expect(thrown.message).toContain(messageMatcher);
      } else {
        expect(thrown.message).toMatch(messageMatcher);
      }
    }
  }

  private compileAndRender(): string {
    const template = compile(this.templateAsString, this.compileOptions);
    return template.render(this.input, { formatters: this.formatters });
  }
}

/**
 * Main entry point for template tests
 */
export function expectTemplate(templateAsString: string): TemplateTestBench {
  return new TemplateTestBench(templateAsString);
}
