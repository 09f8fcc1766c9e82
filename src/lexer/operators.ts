/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['==', TOKEN_TYPES.EQ],
  ['!=', TOKEN_TYPES.NE],
  ['<=', TOKEN_TYPES.LE],
  ['>=', TOKEN_TYPES.GE],
  ['+=', TOKEN_TYPES.PLUS_ASSIGN],
  ['-=', TOKEN_TYPES.MINUS_ASSIGN],
  ['*=', TOKEN_TYPES.STAR_ASSIGN],
  ['/=', TOKEN_TYPES.SLASH_ASSIGN],
  ['%=', TOKEN_TYPES.PERCENT_ASSIGN],
  ['..', TOKEN_TYPES.DOT_DOT],
]);

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['.', TOKEN_TYPES.DOT],
  [':', TOKEN_TYPES.COLON],
  [',', TOKEN_TYPES.COMMA],
  [';', TOKEN_TYPES.SEMICOLON],
  ['!', TOKEN_TYPES.BANG],
  ['=', TOKEN_TYPES.ASSIGN],
  ['<', TOKEN_TYPES.LT],
  ['>', TOKEN_TYPES.GT],
  ['(', TOKEN_TYPES.LPAREN],
  [')', TOKEN_TYPES.RPAREN],
  ['{', TOKEN_TYPES.LBRACE],
  ['}', TOKEN_TYPES.RBRACE],
  ['[', TOKEN_TYPES.LBRACKET],
  [']', TOKEN_TYPES.RBRACKET],
  ['|', TOKEN_TYPES.PIPE_BAR],
  ['+', TOKEN_TYPES.PLUS],
  ['-', TOKEN_TYPES.MINUS],
  ['*', TOKEN_TYPES.STAR],
  ['/', TOKEN_TYPES.SLASH],
  ['%', TOKEN_TYPES.PERCENT],
]);

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['var', TOKEN_TYPES.VAR],
  ['print', TOKEN_TYPES.PRINT],
  ['input', TOKEN_TYPES.INPUT],
  ['if', TOKEN_TYPES.IF],
  ['else', TOKEN_TYPES.ELSE],
  ['while', TOKEN_TYPES.WHILE],
  ['for', TOKEN_TYPES.FOR],
  ['in', TOKEN_TYPES.IN],
  ['return', TOKEN_TYPES.RETURN],
  ['break', TOKEN_TYPES.BREAK],
  ['continue', TOKEN_TYPES.CONTINUE],
  ['clone', TOKEN_TYPES.CLONE],
  ['mirror', TOKEN_TYPES.MIRROR],
  ['as', TOKEN_TYPES.AS],
  ['true', TOKEN_TYPES.TRUE],
  ['false', TOKEN_TYPES.FALSE],
  ['null', TOKEN_TYPES.NULL],
  ['and', TOKEN_TYPES.AND],
  ['or', TOKEN_TYPES.OR],
  ['xor', TOKEN_TYPES.XOR],
]);
