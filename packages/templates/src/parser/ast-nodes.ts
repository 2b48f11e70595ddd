/**
 * Expression AST
 *
 * Tag bodies parse into these nodes. The compiler embeds them in
 * instructions; the interpreter evaluates them against the scope stack.
 */

import type { SourceLocation } from '../lexer/token';
import type { Value } from '../runtime/value';

/**
 * Base interface for all AST nodes
 */
export interface Node {
  readonly type: string; // Node type discriminator
  readonly loc: SourceLocation | null; // Position information (null for synthetic nodes)
}

/**
 * PathExpression - a lookup starting at the current scope chain
 *
 * Examples:
 * - {{foo}} → root: 'scope', parts: ['foo']
 * - {{foo.bar.0}} → root: 'scope', parts: ['foo', 'bar', '0']
 * - {{this}} → root: 'this', parts: []
 * - {{this.name}} → root: 'this', parts: ['name']
 * - {{@index}} → root: 'data', parts: ['index']
 * - {{@root.user}} → root: 'data', parts: ['root', 'user']
 *
 * `parts` is empty only for a bare `this`.
 */
export interface PathExpression extends Node {
  readonly type: 'PathExpression';
  readonly root: 'scope' | 'this' | 'data';
  readonly parts: readonly string[]; // Path segments
  readonly original: string; // Raw path string
}

/**
 * Literal - string, number, boolean or null written in the template
 */
export interface Literal extends Node {
  readonly type: 'Literal';
  readonly value: Value;
  readonly original: string; // Source text of the literal
}

/**
 * FormatterPipe - `source | name(args)`
 *
 * Chains nest to the left: `a | f | g` is g(f(a)).
 */
export interface FormatterPipe extends Node {
  readonly type: 'FormatterPipe';
  readonly source: ValueExpression;
  readonly name: string;
  readonly args: readonly ValueExpression[];
}

/**
 * ValueExpression - union of everything that evaluates to a value
 */
export type ValueExpression = PathExpression | Literal | FormatterPipe;

/**
 * Truthy - bare value used as a condition
 */
export interface TruthyCondition extends Node {
  readonly type: 'Truthy';
  readonly expression: ValueExpression;
}

/**
 * Equals / NotEquals - `left == right`, `left != right`
 */
export interface EqualsCondition extends Node {
  readonly type: 'Equals';
  readonly left: ValueExpression;
  readonly right: ValueExpression;
}

export interface NotEqualsCondition extends Node {
  readonly type: 'NotEquals';
  readonly left: ValueExpression;
  readonly right: ValueExpression;
}

/**
 * Not - `not cond` or `!cond`
 */
export interface NotCondition extends Node {
  readonly type: 'Not';
  readonly condition: Condition;
}

export type Condition = TruthyCondition | EqualsCondition | NotEqualsCondition | NotCondition;

/**
 * Header of a `for` tag: `item in items` or `item, i in items`
 */
export interface LoopHeader {
  readonly binding: string;
  readonly indexBinding: string | null;
  readonly collection: ValueExpression;
}

/**
 * Header of a `with` tag: `expr` or `expr as name`
 */
export interface ScopeHeader {
  readonly expression: ValueExpression;
  readonly name: string | null;
}
