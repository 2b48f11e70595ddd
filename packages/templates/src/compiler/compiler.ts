import { DEFAULT_LIMITS, type Limits } from '../config';
import { Lexer } from '../lexer/lexer';
import type { SourceLocation, Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import { ExpressionParser } from '../parser/expression-parser';
import { ParserError } from '../parser/parser-error';
import type { CompiledProgram, Instruction } from './instructions';

type BlockKind = 'if' | 'else' | 'for' | 'with';

/**
 * An open block awaiting its closing tag
 */
interface OpenBlock {
  kind: BlockKind;
  index: number; // Instruction to patch (Branch, Jump, IterStart) or PushScope
  opener: Token; // The tag that opened the block
}

/**
 * A piece of literal text waiting to be emitted
 */
interface LiteralPiece {
  text: string;
  raw: boolean; // Raw text is never trimmed by whitespace control
  loc: SourceLocation;
}

const CLOSER: Record<BlockKind, string> = {
  if: 'endif',
  else: 'endif',
  for: 'endfor',
  with: 'endwith',
};

const PLACEHOLDER = -1;

/**
 * Compiles template text into a flat instruction program
 *
 * Tokens are pulled from the lexer one at a time. Block tags push onto a
 * block stack; closing tags pop it and patch the forward jump emitted by the
 * opener. Adjacent literal text (content, raw blocks, text around comments)
 * is coalesced into a single EmitLiteral.
 *
 * @example
 * ```typescript
 * const program = new TemplateCompiler().compile('{{ if ok }}yes{{ endif }}');
 * // program.instructions:
 * //   0 Branch(ok, 2)
 * //   1 EmitLiteral(0)   literals[0] === 'yes'
 * ```
 */
export class TemplateCompiler {
  private readonly lexer = new Lexer();
  private readonly parser = new ExpressionParser();
  private readonly limits: Limits;

  private source: string = '';
  private instructions: Instruction[] = [];
  private literals: string[] = [];
  private blocks: OpenBlock[] = [];
  private pending: LiteralPiece[] = [];
  private stripNext: boolean = false;

  constructor(limits: Limits = DEFAULT_LIMITS) {
    this.limits = limits;
  }

  /**
   * Compile a template string
   * @throws LexerError for unclosed tags, comments and raw blocks
   * @throws ParserError for malformed expressions, unbalanced blocks and exceeded limits
   */
  compile(template: string): CompiledProgram {
    if (template.length > this.limits.maxTemplateLength) {
      throw new ParserError(
        `Template exceeds maximum length of ${this.limits.maxTemplateLength} characters`,
        null,
      );
    }

    this.reset(template);

    for (const token of this.lexer) {
      this.visit(token);
    }

    this.flushLiterals();

    const unclosed = this.blocks[this.blocks.length - 1];
    if (unclosed !== undefined) {
      throw this.error(
        `Unclosed '${this.openerKind(unclosed)}' block: expected {{ ${CLOSER[unclosed.kind]} }}`,
        unclosed.opener,
      );
    }

    return Object.freeze({
      instructions: Object.freeze(this.instructions.map((instruction) => deepFreeze(instruction))),
      literals: Object.freeze([...this.literals]),
    });
  }

  private reset(template: string): void {
    this.source = template;
    this.instructions = [];
    this.literals = [];
    this.blocks = [];
    this.pending = [];
    this.stripNext = false;
    this.lexer.setInput(template);
  }

  private visit(token: Token): void {
    const stripNext = this.stripNext;
    this.stripNext = false;

    switch (token.type) {
      case TokenType.CONTENT:
        this.addLiteral({
          text: stripNext ? token.value.trimStart() : token.value,
          raw: false,
          loc: token.loc,
        });
        return;

      case TokenType.RAW:
        this.addLiteral({ text: token.value, raw: true, loc: token.loc });
        return;

      case TokenType.COMMENT:
        // Comments produce nothing; text on both sides stays one literal
        this.stripNext = stripNext;
        return;
    }

    if (token.strip.open) {
      this.trimPending();
    }
    this.flushLiterals();

    switch (token.type) {
      case TokenType.VALUE:
        this.emit({
          type: 'EmitValue',
          expression: this.parser.parseValue(token.value, token.bodyStart),
          loc: token.loc,
        });
        break;

      case TokenType.IF:
        this.openBlock('if', token, {
          type: 'Branch',
          condition: this.parser.parseCondition(token.value, token.bodyStart),
          target: PLACEHOLDER,
          loc: token.loc,
        });
        break;

      case TokenType.ELSE:
        this.compileElse(token);
        break;

      case TokenType.ENDIF: {
        const block = this.closeBlock(token, 'endif', ['if', 'else']);
        this.patch(block.index, this.instructions.length);
        break;
      }

      case TokenType.FOR: {
        const header = this.parser.parseLoopHeader(token.value, token.bodyStart);
        this.openBlock('for', token, {
          type: 'IterStart',
          collection: header.collection,
          binding: header.binding,
          indexBinding: header.indexBinding,
          target: PLACEHOLDER,
          loc: token.loc,
        });
        break;
      }

      case TokenType.ENDFOR: {
        const block = this.closeBlock(token, 'endfor', ['for']);
        this.emit({ type: 'IterNext', target: block.index + 1, loc: token.loc });
        this.emit({ type: 'IterEnd', loc: token.loc });
        this.patch(block.index, this.instructions.length);
        break;
      }

      case TokenType.WITH: {
        const header = this.parser.parseScopeHeader(token.value, token.bodyStart);
        this.openBlock('with', token, {
          type: 'PushScope',
          expression: header.expression,
          name: header.name,
          loc: token.loc,
        });
        break;
      }

      case TokenType.ENDWITH:
        this.closeBlock(token, 'endwith', ['with']);
        this.emit({ type: 'PopScope', loc: token.loc });
        break;
    }

    this.stripNext = token.strip.close;
  }

  /**
   * `else`: close the `if` branch with a Jump over the else part and point
   * the Branch at the instruction following that Jump
   */
  private compileElse(token: Token): void {
    this.assertNoTrailingText(token, 'else');

    const block = this.blocks[this.blocks.length - 1];
    if (block === undefined) {
      throw this.error('Unexpected {{ else }}: not inside an if block', token);
    }
    if (block.kind === 'else') {
      throw this.error(
        `Unexpected second {{ else }} in if block opened at ${this.describePosition(block.opener)}`,
        token,
      );
    }
    if (block.kind !== 'if') {
      throw this.error(`Unexpected {{ else }} inside a '${block.kind}' block`, token);
    }

    const jump = this.emit({ type: 'Jump', target: PLACEHOLDER, loc: token.loc });
    this.patch(block.index, jump + 1);
    this.blocks[this.blocks.length - 1] = { kind: 'else', index: jump, opener: block.opener };
  }

  private openBlock(kind: BlockKind, token: Token, instruction: Instruction): void {
    if (this.blocks.length >= this.limits.maxNestingDepth) {
      throw this.error(
        `Maximum nesting depth of ${this.limits.maxNestingDepth} exceeded`,
        token,
      );
    }
    const index = this.emit(instruction);
    this.blocks.push({ kind, index, opener: token });
  }

  private closeBlock(token: Token, keyword: string, accepts: readonly BlockKind[]): OpenBlock {
    this.assertNoTrailingText(token, keyword);

    const block = this.blocks.pop();
    if (block === undefined) {
      throw this.error(`Unexpected {{ ${keyword} }}: no open block`, token);
    }
    if (!accepts.includes(block.kind)) {
      throw this.error(
        `Mismatched {{ ${keyword} }}: expected {{ ${CLOSER[block.kind]} }} to close ` +
          `'${this.openerKind(block)}' block opened at ${this.describePosition(block.opener)}`,
        token,
      );
    }
    return block;
  }

  private assertNoTrailingText(token: Token, keyword: string): void {
    if (token.value !== '') {
      throw new ParserError(
        `Unexpected text after '${keyword}': '${token.value}'`,
        token.bodyStart,
        token.value,
      );
    }
  }

  /**
   * Append an instruction and return its index
   */
  private emit(instruction: Instruction): number {
    this.instructions.push(instruction);
    return this.instructions.length - 1;
  }

  /**
   * Set the jump target of a previously emitted Branch, Jump or IterStart
   */
  private patch(index: number, target: number): void {
    const instruction = this.instructions[index];
    switch (instruction.type) {
      case 'Branch':
      case 'Jump':
      case 'IterStart':
        this.instructions[index] = { ...instruction, target };
        return;
      default:
        throw new Error(`Cannot patch ${instruction.type} instruction at ${index}`);
    }
  }

  // Literal text

  private addLiteral(piece: LiteralPiece): void {
    this.pending.push(piece);
  }

  /**
   * Trim trailing whitespace of pending content for `{{-`
   * Raw text stops the trim.
   */
  private trimPending(): void {
    while (this.pending.length > 0) {
      const last = this.pending[this.pending.length - 1];
      if (last.raw) {
        return;
      }
      last.text = last.text.trimEnd();
      if (last.text !== '') {
        return;
      }
      this.pending.pop();
    }
  }

  private flushLiterals(): void {
    const pieces = this.pending;
    this.pending = [];

    const text = pieces.map((piece) => piece.text).join('');
    if (text === '') {
      return;
    }

    const literal = this.literals.push(text) - 1;
    this.emit({
      type: 'EmitLiteral',
      literal,
      loc: {
        start: pieces[0].loc.start,
        end: pieces[pieces.length - 1].loc.end,
      },
    });
  }

  // Errors

  private openerKind(block: OpenBlock): string {
    return block.kind === 'else' ? 'if' : block.kind;
  }

  private describePosition(token: Token): string {
    return `line ${token.loc.start.line}, column ${token.loc.start.column + 1}`;
  }

  private error(message: string, token: Token): ParserError {
    return new ParserError(message, token.loc.start, this.tagText(token));
  }

  private tagText(token: Token): string {
    return this.source.slice(token.loc.start.index, token.loc.end.index);
  }
}

/**
 * Freeze an instruction along with the expression nodes, arrays and
 * locations it holds
 */
function deepFreeze<T extends object>(target: T): T {
  const values: unknown[] = Object.values(target);
  for (const value of values) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  Object.freeze(target);
  return target;
}
