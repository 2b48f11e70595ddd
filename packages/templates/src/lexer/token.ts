import type { TokenType } from './token-types';

/**
 * Position in source code
 */
export interface Position {
  readonly line: number; // Line number (1-based)
  readonly column: number; // Column number (0-based)
  readonly index: number; // Character index (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  readonly start: Position; // Starting position
  readonly end: Position; // Ending position
}

/**
 * Whitespace stripping requested by {{- and -}}
 */
export interface StripFlags {
  open: boolean; // Strip whitespace before the tag
  close: boolean; // Strip whitespace after the tag
}

/**
 * Token produced by lexer
 *
 * For CONTENT and RAW tokens `value` is the literal text. For tags it is the
 * body with the leading keyword and whitespace-control markers removed, and
 * `bodyStart` is the position of its first character.
 */
export interface Token {
  type: TokenType; // The token type
  value: string; // Literal text or tag body
  loc: SourceLocation; // Span of the whole token, delimiters included
  bodyStart: Position; // Where `value` starts in the source
  strip: StripFlags;
}
