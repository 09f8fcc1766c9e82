/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ForgeError, ParseOptions, ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, statements, recovery
 * - parser-control.ts: Blocks, conditionals, loops
 * - parser-expr.ts: Precedence chain, assignment, postfix operators
 * - parser-literals.ts: Primaries, list/map literals, function literals
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { recoveryMode: false });
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: Token[], options: ParseOptions & { source?: string } = {}) {
    this.state = createParserState(tokens, {
      recoveryMode: options.recoveryMode ?? false,
      replMode: options.replMode ?? false,
      source: options.source ?? '',
    });
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }

  /**
   * Get collected errors (for recovery mode).
   */
  get errors(): ForgeError[] {
    return this.state.errors;
  }
}
