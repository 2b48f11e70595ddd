/**
 * Template Interpreter
 *
 * Executes a compiled instruction program with a single program counter.
 * There is no recursion over template structure: blocks were flattened into
 * jumps at compile time.
 */

import type { CompiledProgram } from '../compiler/instructions';
import {
  AmbiguousValueError,
  FormatterError,
  NotIterableError,
} from '../errors';
import { type FormatterRegistry, mergeFormatters } from '../formatters/index';
import type { SourceLocation } from '../lexer/token';
import type { Condition, FormatterPipe, ValueExpression } from '../parser/ast-nodes';
import { lookupProperty } from '../runtime/utils';
import { type Value, formatScalar, isTruthy, stringValue, valuesEqual } from '../runtime/value';
import { displayPath, resolvePathExpression } from './path-resolver';
import { ScopeStack } from './scope-stack';

/**
 * Options for configuring the interpreter.
 */
export interface InterpreterOptions {
  /** User formatters, merged over the built-ins */
  formatters?: FormatterRegistry;
}

/**
 * Interpreter for one compiled program.
 *
 * The formatter registry is fixed at construction; every `evaluate` call
 * gets its own scope stack, so one interpreter can render many times.
 *
 * @example
 * ```typescript
 * const program = new TemplateCompiler().compile('Hi {{ name }}');
 * new Interpreter(program).evaluate(toValue({ name: 'Ada' })); // 'Hi Ada'
 * ```
 */
export class Interpreter {
  private readonly program: CompiledProgram;
  private readonly formatters: FormatterRegistry;

  constructor(program: CompiledProgram, options: InterpreterOptions = {}) {
    this.program = program;
    this.formatters = mergeFormatters(options.formatters);
  }

  /**
   * Run the program against a root value and return the output.
   * Output is only returned when the whole program completes.
   *
   * @throws RenderError
   */
  evaluate(root: Value): string {
    const { instructions, literals } = this.program;
    const scopes = new ScopeStack(root);
    let output = '';
    let pc = 0;

    while (pc < instructions.length) {
      const instruction = instructions[pc];
      const loc = instruction.loc;

      switch (instruction.type) {
        case 'EmitLiteral':
          output += literals[instruction.literal];
          pc++;
          break;

        case 'EmitValue': {
          const value = this.evaluateExpression(instruction.expression, scopes, loc);
          output += this.stringify(value, instruction.expression, scopes, loc);
          pc++;
          break;
        }

        case 'Branch':
          pc = this.evaluateCondition(instruction.condition, scopes, loc)
            ? pc + 1
            : instruction.target;
          break;

        case 'Jump':
          pc = instruction.target;
          break;

        case 'IterStart': {
          const collection = this.evaluateExpression(instruction.collection, scopes, loc);
          if (collection.kind !== 'sequence') {
            throw new NotIterableError(collection.kind, {
              path: expressionPath(instruction.collection),
              depth: scopes.size(),
              loc,
            });
          }

          if (collection.items.length === 0) {
            pc = instruction.target;
            break;
          }

          scopes.push({
            kind: 'loop',
            binding: instruction.binding,
            indexBinding: instruction.indexBinding,
            items: collection.items,
            index: 0,
          });
          pc++;
          break;
        }

        case 'IterNext': {
          const scope = scopes.getCurrent();
          if (scope.kind !== 'loop') {
            throw new Error(`Malformed program: IterNext at ${pc} outside of a loop`);
          }

          if (scope.index + 1 < scope.items.length) {
            scope.index++;
            pc = instruction.target;
          } else {
            scopes.pop();
            pc++;
          }
          break;
        }

        case 'IterEnd':
          pc++;
          break;

        case 'PushScope':
          scopes.push({
            kind: 'object',
            value: this.evaluateExpression(instruction.expression, scopes, loc),
            name: instruction.name,
          });
          pc++;
          break;

        case 'PopScope':
          scopes.pop();
          pc++;
          break;
      }
    }

    return output;
  }

  /**
   * Evaluate a value expression: a path lookup, a literal or a formatter pipe.
   */
  private evaluateExpression(
    expression: ValueExpression,
    scopes: ScopeStack,
    loc: SourceLocation,
  ): Value {
    switch (expression.type) {
      case 'PathExpression':
        return resolvePathExpression(expression, scopes, loc);
      case 'Literal':
        return expression.value;
      case 'FormatterPipe':
        return this.applyFormatter(expression, scopes, loc);
    }
  }

  private evaluateCondition(condition: Condition, scopes: ScopeStack, loc: SourceLocation): boolean {
    switch (condition.type) {
      case 'Truthy':
        return isTruthy(this.evaluateExpression(condition.expression, scopes, loc));
      case 'Equals':
        return valuesEqual(
          this.evaluateExpression(condition.left, scopes, loc),
          this.evaluateExpression(condition.right, scopes, loc),
        );
      case 'NotEquals':
        return !valuesEqual(
          this.evaluateExpression(condition.left, scopes, loc),
          this.evaluateExpression(condition.right, scopes, loc),
        );
      case 'Not':
        return !this.evaluateCondition(condition.condition, scopes, loc);
    }
  }

  /**
   * Call a formatter with the evaluated source and arguments.
   *
   * Uses lookupProperty so that only registered names resolve. A thrown
   * error becomes the `cause` of the FormatterError.
   */
  private applyFormatter(pipe: FormatterPipe, scopes: ScopeStack, loc: SourceLocation): Value {
    const source = this.evaluateExpression(pipe.source, scopes, loc);
    const args = pipe.args.map((arg) => this.evaluateExpression(arg, scopes, loc));
    const details = { path: expressionPath(pipe.source), depth: scopes.size(), loc };

    const formatter = lookupProperty(this.formatters, pipe.name);
    if (formatter === undefined) {
      throw new FormatterError(pipe.name, 'Unknown formatter', details);
    }

    let result: unknown;
    try {
      result = formatter(source, args);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FormatterError(pipe.name, reason, { ...details, cause: error });
    }

    if (typeof result !== 'string') {
      throw new FormatterError(pipe.name, `Expected a string result but got ${typeof result}`, details);
    }
    return stringValue(result);
  }

  /**
   * Default string form of an emitted value
   */
  private stringify(
    value: Value,
    expression: ValueExpression,
    scopes: ScopeStack,
    loc: SourceLocation,
  ): string {
    const text = formatScalar(value);
    if (text === null) {
      throw new AmbiguousValueError(value.kind, {
        path: expressionPath(expression),
        depth: scopes.size(),
        loc,
      });
    }
    return text;
  }
}

/**
 * Path reported in errors for an expression: the path it reads, or the
 * literal text for literals
 */
function expressionPath(expression: ValueExpression): string[] {
  switch (expression.type) {
    case 'PathExpression':
      return displayPath(expression);
    case 'Literal':
      return [expression.original];
    case 'FormatterPipe':
      return expressionPath(expression.source);
  }
}
