import { LexerError } from './lexer-error';
import type { Position, StripFlags, Token } from './token';
import { KEYWORDS, TokenType } from './token-types';

const NO_STRIP: StripFlags = Object.freeze({ open: false, close: false });

/**
 * Lexer for templates
 *
 * Splits a template into literal runs and tags. Tokens are produced on demand
 * by `lex()`; the lexer never looks further ahead than the end of the current
 * tag. Tag bodies are delimited and classified here but parsed elsewhere.
 */
export class Lexer implements Iterable<Token> {
  private input: string = '';
  private index: number = 0;
  private line: number = 1;
  private column: number = 0;
  private tabWidth: number = 4; // Number of spaces a tab counts as

  /**
   * Initialize lexer with template string
   */
  setInput(template: string): void {
    this.input = template;
    this.index = 0;
    this.line = 1;
    this.column = 0;
  }

  /**
   * Extract next token from input
   * Returns EOF token when end of input is reached
   */
  lex(): Token {
    if (this.isEOF()) {
      return this.createEOFToken();
    }

    if (this.match('{=')) {
      return this.scanRaw();
    }

    if (this.match('{{')) {
      return this.scanTag();
    }

    return this.scanContent();
  }

  /**
   * Yields every token up to, but not including, EOF
   */
  *[Symbol.iterator](): Iterator<Token> {
    while (true) {
      const token = this.lex();
      if (token.type === TokenType.EOF) {
        return;
      }
      yield token;
    }
  }

  /**
   * Scan plain text until the next opening delimiter
   *
   * A backslash directly before `{{` or `{=` escapes the delimiter: the
   * backslash is dropped and the delimiter becomes part of the text.
   */
  private scanContent(): Token {
    const start = this.getPosition();
    let value = '';

    while (!this.isEOF()) {
      if (this.peek() === '\\' && (this.matchAt(1, '{{') || this.matchAt(1, '{='))) {
        this.advance(); // Drop the backslash
        value += this.advance();
        value += this.advance();
        continue;
      }

      if (this.match('{{') || this.match('{=')) {
        break;
      }

      value += this.advance();
    }

    return this.createToken(TokenType.CONTENT, value, start, start, NO_STRIP);
  }

  /**
   * Scan a raw block ({= ... =}); its body is literal text
   */
  private scanRaw(): Token {
    const start = this.getPosition();
    this.consumeChars(2);

    const bodyStart = this.getPosition();
    const end = this.input.indexOf('=}', this.index);
    if (end === -1) {
      throw new LexerError("Unclosed raw block: expected closing '=}'", start);
    }

    const value = this.consumeUntil(end);
    this.consumeChars(2);

    return this.createToken(TokenType.RAW, value, start, bodyStart, NO_STRIP);
  }

  /**
   * Scan a tag ({{ ... }}) and classify it by its leading keyword
   */
  private scanTag(): Token {
    const start = this.getPosition();
    this.consumeChars(2);

    if (this.peek() === '!') {
      return this.scanComment(start);
    }

    const stripOpen = this.peek() === '-';
    if (stripOpen) {
      this.advance();
    }

    const close = this.findTagClose();
    if (close === -1) {
      throw new LexerError("Unclosed tag: expected closing '}}'", start);
    }

    const stripClose = close > this.index && this.input[close - 1] === '-';
    const bodyEnd = stripClose ? close - 1 : close;

    this.skipWhitespace(bodyEnd);

    let type: TokenType = TokenType.VALUE;
    const keyword = this.matchKeyword(bodyEnd);
    if (keyword !== null) {
      type = keyword.type;
      this.consumeChars(keyword.word.length);
      this.skipWhitespace(bodyEnd);
    }

    const bodyStart = this.getPosition();
    const value = this.consumeUntil(bodyEnd).trimEnd();
    this.consumeChars(close - this.index + 2);

    return this.createToken(type, value, start, bodyStart, {
      open: stripOpen,
      close: stripClose,
    });
  }

  /**
   * Find the index of the `}}` closing the current tag
   *
   * Quoted strings inside the tag are skipped so that `{{ x | f("}}") }}`
   * closes at the final delimiter. Returns -1 when there is no closer.
   */
  private findTagClose(): number {
    let quote: string | null = null;

    for (let i = this.index; i < this.input.length; i++) {
      const char = this.input[i];

      if (quote !== null) {
        if (char === '\\') {
          i++;
        } else if (char === quote) {
          quote = null;
        }
        continue;
      }

      if (char === '"' || char === "'") {
        quote = char;
      } else if (char === '}' && this.input[i + 1] === '}') {
        return i;
      }
    }

    return -1;
  }

  /**
   * Match a block keyword at the current position
   *
   * The keyword must be a whole word: `{{ iffy }}` and `{{ if.x }}` are value tags.
   */
  private matchKeyword(bodyEnd: number): { word: string; type: TokenType } | null {
    let end = this.index;
    while (end < bodyEnd && this.isAlphaNumeric(this.input[end])) {
      end++;
    }

    const word = this.input.slice(this.index, end);
    const type = KEYWORDS.get(word);
    if (type === undefined || (end < bodyEnd && this.input[end] === '.')) {
      return null;
    }

    return { word, type };
  }

  /**
   * Scan a comment token ({{! ... }} or {{!-- ... --}})
   */
  private scanComment(start: Position): Token {
    // Consume !
    this.advance();

    // Check if it's a block comment {{!--
    const isBlockComment = this.match('--');
    if (isBlockComment) {
      this.consumeChars(2);
    }

    const endSequence = isBlockComment ? '--}}' : '}}';
    const end = this.input.indexOf(endSequence, this.index);

    // Check for unclosed comment
    if (end === -1) {
      throw new LexerError(`Unclosed comment: expected closing '${endSequence}'`, start);
    }

    const bodyStart = this.getPosition();
    const value = this.consumeUntil(end);
    this.consumeChars(endSequence.length);

    return this.createToken(TokenType.COMMENT, value, start, bodyStart, NO_STRIP);
  }

  /**
   * Create a token ending at the current position
   */
  private createToken(
    type: TokenType,
    value: string,
    start: Position,
    bodyStart: Position,
    strip: StripFlags,
  ): Token {
    return {
      type,
      value,
      loc: {
        start,
        end: this.getPosition(),
      },
      bodyStart,
      strip,
    };
  }

  /**
   * Create an EOF token at current position
   */
  private createEOFToken(): Token {
    const pos = this.getPosition();
    return {
      type: TokenType.EOF,
      value: '',
      loc: {
        start: pos,
        end: pos,
      },
      bodyStart: pos,
      strip: NO_STRIP,
    };
  }

  /**
   * Consume characters up to (not including) the given index and return them
   */
  private consumeUntil(end: number): string {
    const value = this.input.slice(this.index, end);
    while (this.index < end) {
      this.advance();
    }
    return value;
  }

  /**
   * Consume a specific number of characters (used for delimiters)
   */
  private consumeChars(count: number): void {
    for (let i = 0; i < count; i++) {
      this.advance();
    }
  }

  /**
   * Skip whitespace, stopping at the given index
   */
  private skipWhitespace(limit: number): void {
    while (this.index < limit && this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  /**
   * Look ahead at next character without consuming it
   */
  peek(): string {
    if (this.isEOF()) {
      return '';
    }
    return this.input[this.index];
  }

  /**
   * Consume and return next character
   * Updates position tracking: line, column, and index
   * - Newlines increment line and reset column to 0
   * - Tabs advance column by tabWidth (default 4)
   * - Other characters advance column by 1
   */
  advance(): string {
    if (this.isEOF()) {
      return '';
    }

    const char = this.input[this.index];
    this.index++;

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

  /**
   * Check if next characters match the given string
   */
  match(str: string): boolean {
    return this.matchAt(0, str);
  }

  private matchAt(offset: number, str: string): boolean {
    return this.input.startsWith(str, this.index + offset);
  }

  /**
   * Check if we've reached end of input
   */
  isEOF(): boolean {
    return this.index >= this.input.length;
  }

  private isAlphaNumeric(char: string): boolean {
    return (
      (char >= 'a' && char <= 'z') ||
      (char >= 'A' && char <= 'Z') ||
      (char >= '0' && char <= '9') ||
      char === '_' ||
      char === '$'
    );
  }

  private isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
  }

  /**
   * Get current position
   */
  private getPosition(): Position {
    return {
      line: this.line,
      column: this.column,
      index: this.index,
    };
  }

  /**
   * Convenience method to tokenize an entire template string
   * @param template The template string to tokenize
   * @returns Array of all tokens including EOF token
   */
  tokenize(template: string): Token[] {
    this.setInput(template);
    const tokens: Token[] = [...this];

    // Include EOF token
    tokens.push(this.lex());

    return tokens;
  }
}
