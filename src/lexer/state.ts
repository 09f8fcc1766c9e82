/**
 * Lexer State
 * Tracks position in source text during tokenization.
 * Positions count Unicode scalars so spans line up with string indexing.
 */

import type { SourceLocation, Token, TokenType } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Source split into code points */
  readonly chars: readonly string[];
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    chars: Array.from(source),
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.chars[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.chars.slice(state.pos, state.pos + length).join('');
}

export function advance(state: LexerState): string {
  const ch = state.chars[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}

/** Token from `start` up to the current position */
export function tokenFrom(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: { start, end: currentLocation(state) } };
}
