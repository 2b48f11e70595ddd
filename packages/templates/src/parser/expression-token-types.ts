/**
 * Token types for the expression lexer used inside tag bodies
 */

export const ExpressionTokenType = {
  // Literals
  STRING: 'STRING', // 'hello' or "world"
  NUMBER: 'NUMBER', // 42, 3.14, -17
  BOOLEAN: 'BOOLEAN', // true, false
  NULL: 'NULL', // null

  // Identifiers and paths
  IDENTIFIER: 'IDENTIFIER', // foo, user, items
  DATA: 'DATA', // @ prefix for loop and root variables
  DOT: 'DOT', // .

  // Formatters
  PIPE: 'PIPE', // |
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  COMMA: 'COMMA', // ,

  // Conditions
  EQ: 'EQ', // ==
  NEQ: 'NEQ', // !=
  NOT: 'NOT', // !

  // End of input
  EOF: 'EOF',
} as const;

export type ExpressionTokenType = (typeof ExpressionTokenType)[keyof typeof ExpressionTokenType];
