/**
 * Token types for the template lexer
 *
 * A template is a sequence of literal runs and tags. Tags are classified by
 * their leading keyword; the tag body itself is left for the expression parser.
 */

export const TokenType = {
  // Literal text
  CONTENT: 'CONTENT', // Plain text between tags
  RAW: 'RAW', // {= ... =} body, emitted verbatim

  // Tags
  VALUE: 'VALUE', // {{ expr }}
  IF: 'IF', // {{ if cond }}
  ELSE: 'ELSE', // {{ else }}
  ENDIF: 'ENDIF', // {{ endif }}
  FOR: 'FOR', // {{ for x in expr }}
  ENDFOR: 'ENDFOR', // {{ endfor }}
  WITH: 'WITH', // {{ with expr [as name] }}
  ENDWITH: 'ENDWITH', // {{ endwith }}
  COMMENT: 'COMMENT', // {{! ... }} or {{!-- ... --}}

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Leading keywords that turn a tag into a block tag
 */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['if', TokenType.IF],
  ['else', TokenType.ELSE],
  ['endif', TokenType.ENDIF],
  ['for', TokenType.FOR],
  ['endfor', TokenType.ENDFOR],
  ['with', TokenType.WITH],
  ['endwith', TokenType.ENDWITH],
]);
