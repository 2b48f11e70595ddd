import { TemplateCompiler } from './compiler/compiler';
import type { CompiledProgram, Instruction } from './compiler/instructions';
import {
  type CompileOptions,
  type RenderOptions,
  resolveCompileOptions,
  resolveRenderOptions,
} from './config';
import { Interpreter } from './interpreter/interpreter';
import { LexerError } from './lexer/lexer-error';
import { ParserError } from './parser/parser-error';
import { type Value, toValue } from './runtime/value';

/**
 * A compiled template.
 *
 * Immutable once created: the instruction array, its instructions and the
 * literal table are all frozen, so one Template can be rendered any number
 * of times, including from concurrent callers.
 */
export class Template implements CompiledProgram {
  /** The template text this program was compiled from */
  readonly source: string;
  readonly instructions: readonly Instruction[];
  /** Literal text referenced by EmitLiteral instructions */
  readonly literals: readonly string[];

  private constructor(source: string, program: CompiledProgram) {
    this.source = source;
    this.instructions = program.instructions;
    this.literals = program.literals;
    Object.freeze(this);
  }

  /**
   * Compile a template string.
   *
   * @throws LexerError for unclosed tags, comments and raw blocks
   * @throws ParserError for malformed expressions, unbalanced blocks and exceeded limits
   * @throws ConfigurationError for invalid options
   */
  static compile(source: string, options: CompileOptions = {}): Template {
    const { limits, logger } = resolveCompileOptions(options);

    let program: CompiledProgram;
    try {
      program = new TemplateCompiler(limits).compile(source);
    } catch (error) {
      if (error instanceof LexerError || error instanceof ParserError) {
        logger?.warn('template_compile_failed', {
          error: error.name,
          message: error.message,
          line: error.line,
          column: error.column + 1,
        });
      }
      throw error;
    }

    logger?.debug('template_compiled', {
      length: source.length,
      instructions: program.instructions.length,
      literals: program.literals.length,
    });

    return new Template(source, program);
  }

  /**
   * Render with plain JavaScript data.
   *
   * @throws InvalidContextError when the data is circular
   * @throws RenderError for missing fields, non-iterable loops, ambiguous
   *   values and formatter failures
   */
  render(data: unknown, options: RenderOptions = {}): string {
    return this.renderValue(toValue(data), options);
  }

  /**
   * Render with data that is already a template Value.
   */
  renderValue(value: Value, options: RenderOptions = {}): string {
    const { formatters } = resolveRenderOptions(options);
    return new Interpreter(this, { formatters }).evaluate(value);
  }
}
