/**
 * Forge Parser
 * Main entry point and re-exports
 */

import { LexerError, tokenize } from '../lexer/index.js';
import type { ParseResult, ProgramNode, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse Forge source code into an AST.
 *
 * Throws the first LexerError or ParseError.
 *
 * @example
 * ```typescript
 * const ast = parse('var x = 1; print x;');
 * ```
 */
export function parse(source: string): ProgramNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, { source });
  return parser.parse();
}

/**
 * Parse Forge source code, collecting every ParseError.
 *
 * After an error the parser skips to the next statement boundary and
 * continues, so one call can report several independent errors. The AST
 * holds RecoveryError entries where statements were skipped. A LexerError
 * stops scanning and is reported as the only error.
 *
 * @example
 * ```typescript
 * const result = parseWithRecovery(source);
 * if (!result.success) {
 *   console.log('Errors:', result.errors);
 * }
 * ```
 */
export function parseWithRecovery(source: string): ParseResult {
  return parseCollecting(source, false);
}

/**
 * Parse one REPL unit. Like parseWithRecovery, but a trailing expression
 * without `;` is accepted and flagged for echoing.
 */
export function parseReplInput(source: string): ParseResult {
  return parseCollecting(source, true);
}

function parseCollecting(source: string, replMode: boolean): ParseResult {
  let tokens: Token[];
  try {
    tokens = tokenize(source);
  } catch (err) {
    if (!(err instanceof LexerError)) throw err;
    const at = err.span.start;
    return {
      ast: { type: 'Program', statements: [], span: { start: at, end: at } },
      errors: [err],
      success: false,
    };
  }

  const parser = new Parser(tokens, { recoveryMode: true, replMode, source });
  const ast = parser.parse();

  return {
    ast,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
