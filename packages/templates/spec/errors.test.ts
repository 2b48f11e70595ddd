import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  InvalidContextError,
  LexerError,
  ParserError,
  compile,
  render,
} from '../src/index';
import { expectTemplate } from './helpers/expect-template';

describe('compile errors', () => {
  describe('unclosed delimiters', () => {
    it('tag', () => {
      expectTemplate('ab {{ name').toThrow(
        LexerError,
        "Error at line 1, column 4: Unclosed tag: expected closing '}}'",
      );
    });

    it('raw block', () => {
      expectTemplate('{= abc').toThrow(LexerError, "Unclosed raw block: expected closing '=}'");
    });

    it('comment', () => {
      expectTemplate('{{!-- note }}').toThrow(LexerError, "Unclosed comment: expected closing '--}}'");
    });
  });

  describe('block structure', () => {
    it('closing tag without an opener', () => {
      expectTemplate('a {{ endif }}').toThrow(
        ParserError,
        'Error at line 1, column 3: Unexpected {{ endif }}: no open block',
      );
    });

    it('mismatched closer', () => {
      expectTemplate('{{ for x in xs }}{{ endif }}').toThrow(
        ParserError,
        "Mismatched {{ endif }}: expected {{ endfor }} to close 'for' block opened at line 1, column 1",
      );
    });

    it('else outside of if', () => {
      expectTemplate('{{ else }}').toThrow(ParserError, 'not inside an if block');
      expectTemplate('{{ for x in xs }}{{ else }}{{ endfor }}').toThrow(
        ParserError,
        "Unexpected {{ else }} inside a 'for' block",
      );
      expectTemplate('{{ if a }}{{ with b }}{{ else }}{{ endwith }}{{ endif }}').toThrow(
        ParserError,
        "Unexpected {{ else }} inside a 'with' block",
      );
    });

    it('second else', () => {
      expectTemplate('{{ if a }}1{{ else }}2{{ else }}3{{ endif }}').toThrow(
        ParserError,
        'Unexpected second {{ else }} in if block opened at line 1, column 1',
      );
    });

    it('unclosed block is reported at its opener', () => {
      expectTemplate('x\n{{ if a }}{{ for y in ys }}{{ endfor }}').toThrow(
        ParserError,
        "Error at line 2, column 1: Unclosed 'if' block: expected {{ endif }}",
      );
      expectTemplate('{{ if a }}{{ else }}').toThrow(ParserError, "Unclosed 'if' block");
      expectTemplate('{{ with a }}').toThrow(ParserError, "Unclosed 'with' block");
    });

    it('text after a closing keyword', () => {
      expectTemplate('{{ if a }}{{ endif a }}').toThrow(
        ParserError,
        "Error at line 1, column 20: Unexpected text after 'endif': 'a'",
      );
      expectTemplate('{{ if a }}{{ else if b }}{{ endif }}').toThrow(
        ParserError,
        "Unexpected text after 'else': 'if b'",
      );
    });
  });

  describe('expressions', () => {
    it('empty path segment', () => {
      expectTemplate('{{ a..b }}').toThrow(ParserError, 'Error at line 1, column 6: Empty path segment');
      expectTemplate('{{ a. }}').toThrow(ParserError, 'Empty path segment');
    });

    it('invalid leading character', () => {
      expectTemplate('{{ #a }}').toThrow(ParserError, "Error at line 1, column 4: Unexpected character '#'");
    });

    it('unknown data variable', () => {
      expectTemplate('a {{ @foo }}').toThrow(ParserError, "Error at line 1, column 6: Unknown data variable '@foo'");
      expectTemplate('{{ for x in xs }}{{ @count }}{{ endfor }}').toThrow(ParserError, "'@count'");
    });

    it('empty tags', () => {
      expectTemplate('{{ }}').toThrow(ParserError, 'Expected expression');
      expectTemplate('{{ if }}{{ endif }}').toThrow(ParserError, 'Expected condition');
    });

    it('trailing tokens', () => {
      expectTemplate('{{ name extra }}').toThrow(ParserError, "Unexpected token 'extra'");
    });

    it('malformed for headers', () => {
      expectTemplate('{{ for 1 in xs }}{{ endfor }}').toThrow(ParserError, 'Expected loop variable name');
      expectTemplate('{{ for x xs }}{{ endfor }}').toThrow(ParserError, "Expected 'in' after loop variable");
      expectTemplate('{{ for x in }}{{ endfor }}').toThrow(
        ParserError,
        "Expected collection expression after 'in'",
      );
      expectTemplate('{{ for x in xs. }}{{ endfor }}').toThrow(ParserError, 'Empty path segment');
      expectTemplate('{{ for a.b in xs }}{{ endfor }}').toThrow(
        ParserError,
        "Variable name must be a plain identifier, found 'a.'",
      );
    });

    it('errors point into multi-line templates', () => {
      expectTemplate('line one\n  {{ user.name | }}').toThrow(
        ParserError,
        "Error at line 2, column 17: Expected formatter name after '|'",
      );
    });
  });

  describe('limits', () => {
    it('template length', () => {
      expectTemplate('abcdef')
        .withCompileOptions({ limits: { maxTemplateLength: 5 } })
        .toThrow(ParserError, 'Template exceeds maximum length of 5 characters');
    });

    it('nesting depth', () => {
      const string = '{{ if a }}{{ if b }}{{ if c }}x{{ endif }}{{ endif }}{{ endif }}';

      expectTemplate(string)
        .withCompileOptions({ limits: { maxNestingDepth: 2 } })
        .toThrow(ParserError, 'Error at line 1, column 21: Maximum nesting depth of 2 exceeded');
      expectTemplate(string)
        .withInput({ a: true, b: true, c: true })
        .withCompileOptions({ limits: { maxNestingDepth: 3 } })
        .toRenderTo('x');
    });

    it('limits can be disabled with Infinity', () => {
      expect(compile('abc', { limits: { maxTemplateLength: Infinity } }).render({})).toBe('abc');
    });
  });

  describe('ParserError context', () => {
    it('carries the offending tag', () => {
      let thrown: unknown = null;
      try {
        compile('{{ if a }}');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ParserError);
      if (thrown instanceof ParserError) {
        expect(thrown.line).toBe(1);
        expect(thrown.column).toBe(0);
        expect(thrown.index).toBe(0);
        expect(thrown.context).toBe('{{ if a }}');
      }
    });
  });
});

describe('render errors', () => {
  it('circular data', () => {
    const data: Record<string, unknown> = { name: 'a' };
    data.self = data;

    expect(() => render('{{ name }}', data)).toThrow(InvalidContextError);
    expect(() => render('{{ name }}', data)).toThrow("Invalid render data at 'self': circular reference");
  });
});

describe('options', () => {
  it('rejects invalid limits', () => {
    let thrown: unknown = null;
    try {
      compile('x', { limits: { maxNestingDepth: -1 } });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    if (thrown instanceof ConfigurationError) {
      expect(thrown.issues).toHaveLength(1);
      expect(thrown.issues[0]).toContain('limits.maxNestingDepth');
      expect(thrown.message).toContain('Invalid compile options');
    }
  });

  it('rejects non-integer limits', () => {
    expect(() => compile('x', { limits: { maxTemplateLength: 1.5 } })).toThrow(
      'Expected an integer or Infinity',
    );
  });
});
