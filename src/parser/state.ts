/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type {
  ForgeError,
  ForgeErrorCode,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Recovery mode: collect errors instead of throwing */
  readonly recoveryMode: boolean;
  /** REPL mode: a trailing expression may omit its `;` and is echoed */
  readonly replMode: boolean;
  /** Errors collected during recovery mode parsing */
  readonly errors: ForgeError[];
  /** Original source text (for error recovery) */
  readonly source: string;
  /** Grammar-rule labels currently being parsed, outermost first */
  readonly contexts: string[];
}

export interface ParserStateOptions {
  recoveryMode?: boolean;
  replMode?: boolean;
  source?: string;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    recoveryMode: options.recoveryMode ?? false,
    replMode: options.replMode ?? false,
    errors: [],
    source: options.source ?? '',
    contexts: [],
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * End of the most recently consumed token.
 * @internal
 */
export function previousEnd(state: ParserState): SourceLocation {
  const token = state.tokens[state.pos - 1];
  return token ? token.span.end : current(state).span.start;
}

/**
 * Consume a token of the given type or fail.
 * @param what - Human-readable description of the expected token
 * @internal
 */
export function expect(state: ParserState, type: TokenType, what: string): Token {
  if (check(state, type)) return advance(state);
  throw unexpected(state, [what], type);
}

// ============================================================
// CONTEXT TRAIL
// ============================================================

/**
 * Run a grammar rule with `label` pushed on the context stack.
 * Errors raised inside record the stack at the point of failure.
 * @internal
 */
export function withContext<T>(state: ParserState, label: string, rule: () => T): T {
  state.contexts.push(label);
  try {
    return rule();
  } finally {
    state.contexts.pop();
  }
}

/** Active labels, innermost first */
function contextTrail(state: ParserState): string[] {
  return [...state.contexts].reverse();
}

// ============================================================
// ERRORS
// ============================================================

/**
 * Describe a token for error messages.
 * @internal
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.IDENTIFIER:
      return `identifier '${token.value}'`;
    case TOKEN_TYPES.NUMBER:
      return `number ${token.value}`;
    case TOKEN_TYPES.STRING:
      return `string ${JSON.stringify(token.value)}`;
    case TOKEN_TYPES.CHAR:
      return `char ${JSON.stringify(token.value)}`;
    default:
      return `'${token.value}'`;
  }
}

/**
 * Build the error for an unexpected current token.
 * @internal
 */
export function unexpected(
  state: ParserState,
  expected: readonly string[],
  expectedType?: TokenType
): ParseError {
  const token = current(state);
  const found = describeToken(token);
  const hint = generateHint(expectedType, token, previousEnd(state));
  const message = `expected ${expected.join(' or ')}, found ${found}`;
  return new ParseError(hint ? `${message}. ${hint}` : message, token.span, {
    expected,
    found,
    contextTrail: contextTrail(state),
  });
}

/**
 * Build an error at an arbitrary span (e.g. an invalid assignment target).
 * @internal
 */
export function errorAt(
  state: ParserState,
  message: string,
  span: SourceSpan,
  code?: ForgeErrorCode
): ParseError {
  return new ParseError(message, span, {
    contextTrail: contextTrail(state),
    ...(code !== undefined ? { code } : {}),
  });
}

const KEYWORD_TYPOS: ReadonlyMap<string, string> = new Map([
  ['pirnt', 'print'],
  ['prnt', 'print'],
  ['retrun', 'return'],
  ['retrn', 'return'],
  ['wihle', 'while'],
  ['whlie', 'while'],
  ['ture', 'true'],
  ['fasle', 'false'],
  ['flase', 'false'],
  ['nul', 'null'],
  ['esle', 'else'],
  ['fro', 'for'],
]);

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expectedType: TokenType | undefined,
  actual: Token,
  previous: SourceLocation
): string | null {
  if (actual.type === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RPAREN) return 'Hint: Check for unclosed parenthesis';
    if (expectedType === TOKEN_TYPES.RBRACE) return 'Hint: Check for unclosed brace';
    if (expectedType === TOKEN_TYPES.RBRACKET) return 'Hint: Check for unclosed bracket';
  }

  if (actual.type === TOKEN_TYPES.IDENTIFIER) {
    const suggestion = KEYWORD_TYPOS.get(actual.value.toLowerCase());
    if (suggestion) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  if (expectedType === TOKEN_TYPES.SEMICOLON && actual.span.start.line > previous.line) {
    return 'Hint: Missing semicolon at the end of the previous statement?';
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}

/**
 * Span from `start` to the end of the last consumed token.
 * @internal
 */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, previousEnd(state));
}
