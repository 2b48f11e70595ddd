import { TemplateError } from '../errors';
import type { Position } from '../lexer/token';

/**
 * Error thrown for malformed expressions and unbalanced block structure
 * Includes position information and the offending tag body for debugging
 */
export class ParserError extends TemplateError {
  readonly line: number;
  readonly column: number;
  readonly index: number;
  readonly context: string | null;

  constructor(message: string, position: Position | null, context?: string | null) {
    // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
    super(
      position
        ? `Error at line ${position.line}, column ${position.column + 1}: ${message}`
        : message,
    );

    // Store position information (using 0-indexed column internally)
    this.line = position?.line ?? 0;
    this.column = position?.column ?? 0;
    this.index = position?.index ?? 0;
    this.context = ParserError.truncate(context ?? null);
  }

  /**
   * Limit context to 50 characters so messages stay readable
   */
  private static truncate(context: string | null): string | null {
    if (context === null || context.trim() === '') {
      return null;
    }
    return context.length > 50 ? context.slice(0, 50) + '...' : context;
  }
}
