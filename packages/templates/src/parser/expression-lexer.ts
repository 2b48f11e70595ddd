import type { Position, SourceLocation } from '../lexer/token';
import { ExpressionTokenType } from './expression-token-types';
import { ParserError } from './parser-error';

/**
 * A token inside a tag body
 */
export interface ExpressionToken {
  type: ExpressionTokenType;
  value: string; // Decoded value (string literals are unescaped)
  loc: SourceLocation; // Absolute position in the template
}

/**
 * Lexer for tag bodies
 *
 * Positions are absolute: tokenizing starts from the body's position in the
 * template, so errors point at the exact character in the source.
 */
export class ExpressionLexer {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;
  private offset: number = 0;
  private tabWidth: number = 4;
  private lastTokenType: ExpressionTokenType | null = null;

  /**
   * Tokenize a tag body starting at the given source position
   */
  tokenize(input: string, origin: Position): ExpressionToken[] {
    this.input = input;
    this.position = 0;
    this.line = origin.line;
    this.column = origin.column;
    this.offset = origin.index;
    this.lastTokenType = null;

    const tokens: ExpressionToken[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;

      const token = this.nextToken();
      this.lastTokenType = token.type;
      tokens.push(token);
    }

    tokens.push(this.makeToken(ExpressionTokenType.EOF, ''));
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else if (char === '\t') {
      this.column += this.tabWidth;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): Position {
    return {
      line: this.line,
      column: this.column,
      index: this.offset + this.position,
    };
  }

  private makeToken(type: ExpressionTokenType, value: string, startPos?: Position): ExpressionToken {
    const start = startPos || this.currentPosition();
    const end = this.currentPosition();
    return {
      type,
      value,
      loc: { start, end },
    };
  }

  private error(message: string, position: Position = this.currentPosition()): never {
    throw new ParserError(message, position, this.input);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private nextToken(): ExpressionToken {
    const start = this.currentPosition();
    const char = this.peek();

    // String literals
    if (char === '"' || char === "'") {
      return this.string(char, start);
    }

    // Numbers (a leading minus only when a digit follows)
    if (this.isDigit(char) || (char === '-' && this.isDigit(this.peekNext()))) {
      return this.number(start);
    }

    // Identifiers and keywords
    if (this.isAlpha(char)) {
      return this.identifier(start);
    }

    // Operators and punctuation
    return this.operator(start);
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_' || char === '$';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private string(quote: string, start: Position): ExpressionToken {
    this.advance(); // consume opening quote
    let value = '';

    while (!this.isAtEnd() && this.peek() !== quote) {
      if (this.peek() === '\\') {
        this.advance(); // consume backslash
        if (this.isAtEnd()) {
          this.error('Unterminated string literal', start);
        }
        const escaped = this.advance();
        switch (escaped) {
          case 'n':
            value += '\n';
            break;
          case 't':
            value += '\t';
            break;
          case 'r':
            value += '\r';
            break;
          default:
            value += escaped;
        }
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      this.error('Unterminated string literal', start);
    }

    this.advance(); // consume closing quote
    return this.makeToken(ExpressionTokenType.STRING, value, start);
  }

  /**
   * Scan a number literal
   * After a dot the digits are a path segment (items.0.1), never a decimal
   */
  private number(start: Position): ExpressionToken {
    let value = '';

    if (this.peek() === '-') {
      value += this.advance();
    }

    // Integer part
    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      value += this.advance();
    }

    // Decimal part
    const inPath = this.lastTokenType === ExpressionTokenType.DOT;
    if (!inPath && this.peek() === '.' && this.isDigit(this.peekNext())) {
      value += this.advance(); // consume '.'
      while (!this.isAtEnd() && this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    return this.makeToken(ExpressionTokenType.NUMBER, value, start);
  }

  private identifier(start: Position): ExpressionToken {
    let value = '';

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    // Keywords are only literals outside paths (user.null is a field)
    if (this.lastTokenType !== ExpressionTokenType.DOT) {
      switch (value) {
        case 'true':
        case 'false':
          return this.makeToken(ExpressionTokenType.BOOLEAN, value, start);
        case 'null':
          return this.makeToken(ExpressionTokenType.NULL, value, start);
      }
    }

    return this.makeToken(ExpressionTokenType.IDENTIFIER, value, start);
  }

  private operator(start: Position): ExpressionToken {
    const char = this.advance();

    switch (char) {
      case '.':
        return this.makeToken(ExpressionTokenType.DOT, char, start);
      case '@':
        return this.makeToken(ExpressionTokenType.DATA, char, start);
      case '(':
        return this.makeToken(ExpressionTokenType.LPAREN, char, start);
      case ')':
        return this.makeToken(ExpressionTokenType.RPAREN, char, start);
      case ',':
        return this.makeToken(ExpressionTokenType.COMMA, char, start);

      case '|':
        if (this.peek() === '|') {
          this.error("Invalid operator '||'; use a formatter pipe '|'", start);
        }
        return this.makeToken(ExpressionTokenType.PIPE, char, start);

      case '=':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(ExpressionTokenType.EQ, '==', start);
        }
        return this.error("Assignment is not allowed; use '==' to compare", start);

      case '!':
        if (this.peek() === '=') {
          this.advance();
          return this.makeToken(ExpressionTokenType.NEQ, '!=', start);
        }
        return this.makeToken(ExpressionTokenType.NOT, char, start);

      default:
        return this.error(`Unexpected character '${char}'`, start);
    }
  }
}
