/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  readChar,
  readIdentifier,
  readNumber,
  readString,
  startsIdentifier,
  startsNumber,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  tokenFrom,
} from './state.js';

const WHITESPACE: ReadonlySet<string> = new Set([' ', '\t', '\r', '\n']);

/** Skip whitespace and `#` comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (WHITESPACE.has(ch)) {
      advance(state);
    } else if (ch === '#') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

/**
 * Scan the next token. Restartable: the state can be saved (it is a plain
 * record) and scanning resumed from any token boundary.
 */
export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    return tokenFrom(state, TOKEN_TYPES.EOF, '', currentLocation(state));
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (ch === "'") {
    return readChar(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (startsNumber(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (startsIdentifier(ch)) {
    return readIdentifier(state);
  }

  // Longest operator first
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
  if (twoCharType) {
    advance(state);
    advance(state);
    return tokenFrom(state, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType) {
    advance(state);
    return tokenFrom(state, singleCharType, ch, start);
  }

  advance(state);
  throw new LexerError(`Unexpected character: ${ch}`, {
    start,
    end: currentLocation(state),
  });
}

/** Lazily yield tokens, ending with EOF */
export function* tokenStream(source: string): Generator<Token, void, undefined> {
  const state = createLexerState(source);
  let token: Token;
  do {
    token = nextToken(state);
    yield token;
  } while (token.type !== TOKEN_TYPES.EOF);
}

export function tokenize(source: string): Token[] {
  return Array.from(tokenStream(source));
}
