import type { Position, SourceLocation } from '../lexer/token';
import { NULL, boolValue, numberValue, stringValue } from '../runtime/value';
import type {
  Condition,
  FormatterPipe,
  Literal,
  LoopHeader,
  PathExpression,
  ScopeHeader,
  ValueExpression,
} from './ast-nodes';
import { ExpressionLexer, type ExpressionToken } from './expression-lexer';
import { ExpressionTokenType } from './expression-token-types';
import { ParserError } from './parser-error';

/**
 * Names that cannot be bound by `for` or `with ... as`
 */
const RESERVED_BINDINGS: ReadonlySet<string> = new Set(['this', 'in', 'as', 'not']);

/**
 * Token types after which `not` is read as a field name rather than negation
 */
const NOT_AS_NAME: ReadonlySet<ExpressionTokenType> = new Set<ExpressionTokenType>([
  ExpressionTokenType.EOF,
  ExpressionTokenType.DOT,
  ExpressionTokenType.PIPE,
  ExpressionTokenType.EQ,
  ExpressionTokenType.NEQ,
  ExpressionTokenType.RPAREN,
]);

const DIGITS = /^[0-9]+$/;

/** Names that may follow `@` */
const DATA_VARIABLES: ReadonlySet<string> = new Set(['root', 'index', 'first', 'last']);

/**
 * Recursive descent parser for tag bodies
 *
 * Grammar:
 *   condition  := ("not" | "!") condition | "(" condition ")" | comparison
 *   comparison := value (("==" | "!=") value)?
 *   value      := primary ("|" name ("(" (value ("," value)*)? ")")?)*
 *   primary    := path | literal
 *   path       := ("this" | "@" name | name) ("." (name | digits))*
 *
 * Every entry point takes the body text and the source position where the
 * body starts; nodes and errors carry absolute template positions.
 */
export class ExpressionParser {
  private readonly lexer = new ExpressionLexer();
  private tokens: ExpressionToken[] = [];
  private current: number = 0;
  private input: string = '';

  /**
   * Parse the body of a value tag: `{{ user.name | upper }}`
   */
  parseValue(body: string, origin: Position): ValueExpression {
    this.begin(body, origin, 'Expected expression');
    const expression = this.valueExpression();
    this.finish();
    return expression;
  }

  /**
   * Parse the body of an `if` tag: `{{ if not user.admin }}`
   */
  parseCondition(body: string, origin: Position): Condition {
    this.begin(body, origin, 'Expected condition');
    const condition = this.condition();
    this.finish();
    return condition;
  }

  /**
   * Parse the body of a `for` tag: `item in items` or `item, i in items`
   */
  parseLoopHeader(body: string, origin: Position): LoopHeader {
    this.begin(body, origin, 'Expected loop variable name');

    const bindingToken = this.peek();
    const binding = this.bindingName('Expected loop variable name');

    let indexBinding: string | null = null;
    if (this.match(ExpressionTokenType.COMMA)) {
      indexBinding = this.bindingName("Expected index variable name after ','");
      if (indexBinding === binding) {
        throw this.errorAt(
          `Loop variable '${binding}' cannot also be the index variable`,
          bindingToken,
        );
      }
    }

    if (!this.checkWord('in')) {
      throw this.error("Expected 'in' after loop variable");
    }
    this.advance();

    if (this.isAtEnd()) {
      throw this.error("Expected collection expression after 'in'");
    }

    const collection = this.valueExpression();
    this.finish();

    return { binding, indexBinding, collection };
  }

  /**
   * Parse the body of a `with` tag: `user` or `user.address as address`
   */
  parseScopeHeader(body: string, origin: Position): ScopeHeader {
    this.begin(body, origin, 'Expected expression');
    const expression = this.valueExpression();

    let name: string | null = null;
    if (this.checkWord('as')) {
      this.advance();
      name = this.bindingName("Expected name after 'as'");
    }

    this.finish();
    return { expression, name };
  }

  // Setup

  private begin(body: string, origin: Position, emptyMessage: string): void {
    this.input = body;
    this.tokens = this.lexer.tokenize(body, origin);
    this.current = 0;

    if (this.isAtEnd()) {
      throw new ParserError(emptyMessage, origin, body);
    }
  }

  private finish(): void {
    if (!this.isAtEnd()) {
      throw this.error(`Unexpected token '${this.peek().value}'`);
    }
  }

  // Token navigation

  private peek(): ExpressionToken {
    return this.tokens[this.current];
  }

  private peekNext(): ExpressionToken {
    return this.tokens[Math.min(this.current + 1, this.tokens.length - 1)];
  }

  private previous(): ExpressionToken {
    return this.tokens[this.current - 1];
  }

  private isAtEnd(): boolean {
    return this.peek().type === ExpressionTokenType.EOF;
  }

  private advance(): ExpressionToken {
    if (!this.isAtEnd()) {
      this.current++;
    }
    return this.previous();
  }

  private check(type: ExpressionTokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private checkWord(word: string): boolean {
    return this.check(ExpressionTokenType.IDENTIFIER) && this.peek().value === word;
  }

  private match(...types: ExpressionTokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private consume(type: ExpressionTokenType, message: string): ExpressionToken {
    if (this.check(type)) return this.advance();
    throw this.error(message);
  }

  private error(message: string): ParserError {
    return this.errorAt(message, this.peek());
  }

  private errorAt(message: string, token: ExpressionToken): ParserError {
    return new ParserError(message, token.loc.start, this.input);
  }

  private makeLoc(start: ExpressionToken, end: ExpressionToken): SourceLocation {
    return {
      start: start.loc.start,
      end: end.loc.end,
    };
  }

  // Conditions

  private condition(): Condition {
    const startToken = this.peek();

    if (this.match(ExpressionTokenType.NOT) || this.matchNotKeyword()) {
      const condition = this.condition();
      return {
        type: 'Not',
        condition,
        loc: this.makeLoc(startToken, this.previous()),
      };
    }

    if (this.match(ExpressionTokenType.LPAREN)) {
      const condition = this.condition();
      this.consume(ExpressionTokenType.RPAREN, "Expected ')' after condition");
      return condition;
    }

    return this.comparison();
  }

  /**
   * `not` negates unless it is used as a plain field name (`{{ if not }}`)
   */
  private matchNotKeyword(): boolean {
    if (!this.checkWord('not') || NOT_AS_NAME.has(this.peekNext().type)) {
      return false;
    }
    this.advance();
    return true;
  }

  private comparison(): Condition {
    const startToken = this.peek();
    const left = this.valueExpression();

    if (this.match(ExpressionTokenType.EQ)) {
      const right = this.valueExpression();
      return { type: 'Equals', left, right, loc: this.makeLoc(startToken, this.previous()) };
    }

    if (this.match(ExpressionTokenType.NEQ)) {
      const right = this.valueExpression();
      return { type: 'NotEquals', left, right, loc: this.makeLoc(startToken, this.previous()) };
    }

    return { type: 'Truthy', expression: left, loc: this.makeLoc(startToken, this.previous()) };
  }

  // Values

  private valueExpression(): ValueExpression {
    const startToken = this.peek();
    let expression: ValueExpression = this.primary();

    while (this.match(ExpressionTokenType.PIPE)) {
      const name = this.consume(ExpressionTokenType.IDENTIFIER, "Expected formatter name after '|'").value;
      const args: ValueExpression[] = [];

      if (this.match(ExpressionTokenType.LPAREN)) {
        if (!this.check(ExpressionTokenType.RPAREN)) {
          do {
            args.push(this.valueExpression());
          } while (this.match(ExpressionTokenType.COMMA));
        }
        this.consume(ExpressionTokenType.RPAREN, "Expected ')' after formatter arguments");
      }

      const pipe: FormatterPipe = {
        type: 'FormatterPipe',
        source: expression,
        name,
        args,
        loc: this.makeLoc(startToken, this.previous()),
      };
      expression = pipe;
    }

    return expression;
  }

  private primary(): PathExpression | Literal {
    const token = this.peek();

    switch (token.type) {
      case ExpressionTokenType.STRING:
        this.advance();
        return this.literal(token, stringValue(token.value), JSON.stringify(token.value));

      case ExpressionTokenType.NUMBER:
        this.advance();
        return this.literal(token, numberValue(Number(token.value)), token.value);

      case ExpressionTokenType.BOOLEAN:
        this.advance();
        return this.literal(token, boolValue(token.value === 'true'), token.value);

      case ExpressionTokenType.NULL:
        this.advance();
        return this.literal(token, NULL, token.value);

      case ExpressionTokenType.DATA: {
        this.advance();
        const name = this.consume(ExpressionTokenType.IDENTIFIER, "Expected identifier after '@'");
        if (!DATA_VARIABLES.has(name.value)) {
          throw this.errorAt(
            `Unknown data variable '@${name.value}'; expected @root, @index, @first or @last`,
            token,
          );
        }
        return this.path(token, 'data', [name.value, ...this.segments()]);
      }

      case ExpressionTokenType.IDENTIFIER:
        this.advance();
        if (token.value === 'this') {
          return this.path(token, 'this', this.segments());
        }
        return this.path(token, 'scope', [token.value, ...this.segments()]);

      case ExpressionTokenType.EOF:
        throw this.error('Expected expression');

      default:
        throw this.error(`Unexpected token '${token.value}'`);
    }
  }

  /**
   * Parse `.segment` repetitions following the head of a path
   */
  private segments(): string[] {
    const parts: string[] = [];

    while (this.match(ExpressionTokenType.DOT)) {
      const token = this.peek();

      if (token.type === ExpressionTokenType.IDENTIFIER) {
        parts.push(this.advance().value);
      } else if (token.type === ExpressionTokenType.NUMBER && DIGITS.test(token.value)) {
        parts.push(this.advance().value);
      } else if (
        token.type === ExpressionTokenType.DOT ||
        token.type === ExpressionTokenType.EOF
      ) {
        throw this.error('Empty path segment');
      } else {
        throw this.error(`Invalid path segment '${token.value}'`);
      }
    }

    return parts;
  }

  private path(
    start: ExpressionToken,
    root: PathExpression['root'],
    parts: string[],
  ): PathExpression {
    const original =
      root === 'data'
        ? `@${parts.join('.')}`
        : root === 'this'
          ? ['this', ...parts].join('.')
          : parts.join('.');

    return {
      type: 'PathExpression',
      root,
      parts,
      original,
      loc: this.makeLoc(start, this.previous()),
    };
  }

  private literal(token: ExpressionToken, value: Literal['value'], original: string): Literal {
    return {
      type: 'Literal',
      value,
      original,
      loc: token.loc,
    };
  }

  private bindingName(message: string): string {
    const token = this.consume(ExpressionTokenType.IDENTIFIER, message);

    if (RESERVED_BINDINGS.has(token.value)) {
      throw this.errorAt(`'${token.value}' cannot be used as a variable name`, token);
    }
    if (this.check(ExpressionTokenType.DOT)) {
      throw this.errorAt(`Variable name must be a plain identifier, found '${token.value}.'`, token);
    }

    return token.value;
  }
}
