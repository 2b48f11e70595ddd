/**
 * Instruction set for compiled templates
 *
 * A program is a flat array of instructions. Control flow is expressed only
 * through absolute jump targets (indices into the array); a target equal to
 * the array length halts the program.
 */

import type { SourceLocation } from '../lexer/token';
import type { Condition, ValueExpression } from '../parser/ast-nodes';

interface BaseInstruction {
  readonly loc: SourceLocation;
}

/** Append `literals[literal]` to the output */
export interface EmitLiteral extends BaseInstruction {
  readonly type: 'EmitLiteral';
  readonly literal: number;
}

/** Evaluate an expression and append its string form */
export interface EmitValue extends BaseInstruction {
  readonly type: 'EmitValue';
  readonly expression: ValueExpression;
}

/** Continue when the condition holds, otherwise jump to `target` */
export interface Branch extends BaseInstruction {
  readonly type: 'Branch';
  readonly condition: Condition;
  readonly target: number;
}

export interface Jump extends BaseInstruction {
  readonly type: 'Jump';
  readonly target: number;
}

/**
 * Resolve `collection` and enter the loop body, or jump to `target`
 * (just past the matching IterEnd) when it is empty
 */
export interface IterStart extends BaseInstruction {
  readonly type: 'IterStart';
  readonly collection: ValueExpression;
  readonly binding: string;
  readonly indexBinding: string | null;
  readonly target: number;
}

/** Advance the innermost loop and jump back to `target` while items remain */
export interface IterNext extends BaseInstruction {
  readonly type: 'IterNext';
  readonly target: number;
}

/** Marks the end of a loop body */
export interface IterEnd extends BaseInstruction {
  readonly type: 'IterEnd';
}

/** Push the value of `expression` as an object scope, bound to `name` when given */
export interface PushScope extends BaseInstruction {
  readonly type: 'PushScope';
  readonly expression: ValueExpression;
  readonly name: string | null;
}

export interface PopScope extends BaseInstruction {
  readonly type: 'PopScope';
}

export type Instruction =
  | EmitLiteral
  | EmitValue
  | Branch
  | Jump
  | IterStart
  | IterNext
  | IterEnd
  | PushScope
  | PopScope;

export type InstructionType = Instruction['type'];

/**
 * Output of the compiler
 */
export interface CompiledProgram {
  readonly instructions: readonly Instruction[];
  readonly literals: readonly string[];
}
