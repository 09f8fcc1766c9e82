/**
 * Lexer
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize, tokenStream } from './tokenizer.js';
