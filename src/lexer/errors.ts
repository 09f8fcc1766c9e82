/**
 * Lexer Errors
 */

import { FORGE_ERROR_CODES, ForgeError } from '../types.js';
import type { ForgeErrorCode, SourceSpan } from '../types.js';

export class LexerError extends ForgeError {
  // Lexer errors always point at source
  override readonly span: SourceSpan;

  constructor(
    message: string,
    span: SourceSpan,
    code: ForgeErrorCode = FORGE_ERROR_CODES.LEX_INVALID_CHARACTER,
    context?: Record<string, unknown>
  ) {
    super({ code, stage: 'lexing', message, span, context });
    this.name = 'LexerError';
    this.span = span;
  }
}
