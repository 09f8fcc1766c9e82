/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { SourceLocation, Token } from '../types.js';
import { FORGE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  tokenFrom,
} from './state.js';

// Identifiers and numbers are ASCII; strings and chars take any scalar
const DIGIT = /^[0-9]$/;
const IDENTIFIER_START = /^[A-Za-z_]$/;
const IDENTIFIER_PART = /^[A-Za-z0-9_]$/;

export function startsNumber(ch: string): boolean {
  return DIGIT.test(ch);
}

export function startsIdentifier(ch: string): boolean {
  return IDENTIFIER_START.test(ch);
}

/** Consume the longest run of code points matching `pattern` */
function consumeWhile(state: LexerState, pattern: RegExp): string {
  let text = '';
  while (!isAtEnd(state) && pattern.test(peek(state))) {
    text += advance(state);
  }
  return text;
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['0', '\0'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
]);

/** Process escape sequence (backslash at current position) and return the unescaped character */
function processEscape(state: LexerState): string {
  const start = currentLocation(state);
  advance(state); // consume backslash
  if (isAtEnd(state) || peek(state) === '\n') {
    throw new LexerError(
      'Unterminated escape sequence',
      { start, end: currentLocation(state) },
      FORGE_ERROR_CODES.LEX_INVALID_ESCAPE
    );
  }
  const escaped = advance(state);
  const result = ESCAPES.get(escaped);
  if (result === undefined) {
    throw new LexerError(
      `Invalid escape sequence: \\${escaped}`,
      { start, end: currentLocation(state) },
      FORGE_ERROR_CODES.LEX_INVALID_ESCAPE
    );
  }
  return result;
}

function unterminated(kind: string, start: SourceLocation, state: LexerState): LexerError {
  return new LexerError(
    `Unterminated ${kind} literal`,
    { start, end: currentLocation(state) },
    FORGE_ERROR_CODES.LEX_UNTERMINATED_LITERAL
  );
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw unterminated('string', start, state);
    }
    if (peek(state) === '\\') {
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  advance(state); // consume closing "
  return tokenFrom(state, TOKEN_TYPES.STRING, value, start);
}

/** Char literal: exactly one scalar (or one escape) between single quotes */
export function readChar(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening '

  const chars: string[] = [];
  while (peek(state) !== "'") {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw unterminated('char', start, state);
    }
    chars.push(peek(state) === '\\' ? processEscape(state) : advance(state));
  }
  advance(state); // consume closing '

  const [value] = chars;
  if (value === undefined || chars.length > 1) {
    throw new LexerError(
      `Char literal must hold exactly one character, found ${chars.length}`,
      { start, end: currentLocation(state) },
      FORGE_ERROR_CODES.LEX_INVALID_CHAR_LITERAL
    );
  }
  return tokenFrom(state, TOKEN_TYPES.CHAR, value, start);
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = consumeWhile(state, DIGIT);

  // `1..4` is a range, so a dot belongs to the number only before a digit
  if (peek(state) === '.' && DIGIT.test(peek(state, 1))) {
    value += advance(state);
    value += consumeWhile(state, DIGIT);
  }

  return tokenFrom(state, TOKEN_TYPES.NUMBER, value, start);
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = consumeWhile(state, IDENTIFIER_PART);
  return tokenFrom(state, KEYWORDS.get(value) ?? TOKEN_TYPES.IDENTIFIER, value, start);
}
