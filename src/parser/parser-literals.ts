/**
 * Parser Extension: Literal Parsing
 * Primaries, list/map literals, and function literals
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  FunctionLiteralNode,
  MapEntryNode,
  ParamNode,
  SourceLocation,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  spanFrom,
  unexpected,
  withContext,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseBracketLiteral(): ExpressionNode;
    parseListRest(start: SourceLocation, first: ExpressionNode): ExpressionNode;
    parseMapRest(start: SourceLocation, firstKey: ExpressionNode): ExpressionNode;
    parseFunctionLiteral(): FunctionLiteralNode;
  }
}

// ============================================================
// PRIMARIES
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'NumberLiteral', value: Number(token.value), span: token.span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.CHAR:
      advance(this.state);
      return { type: 'CharLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };
    case TOKEN_TYPES.NULL:
      advance(this.state);
      return { type: 'NullLiteral', span: token.span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };
    case TOKEN_TYPES.LPAREN: {
      // Grouping: the node keeps its own span
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "')'");
      return inner;
    }
    case TOKEN_TYPES.LBRACKET:
      return this.parseBracketLiteral();
    case TOKEN_TYPES.PIPE_BAR:
      return this.parseFunctionLiteral();
    default:
      throw unexpected(this.state, ['expression']);
  }
};

// ============================================================
// LIST & MAP LITERALS
// ============================================================

/**
 * Dispatch on what follows the first element:
 *   []  [:]  [a, b]  [a; n]  [k: v, ...]
 */
Parser.prototype.parseBracketLiteral = function (this: Parser): ExpressionNode {
  const start = advance(this.state).span.start; // [

  if (check(this.state, TOKEN_TYPES.RBRACKET)) {
    advance(this.state);
    return { type: 'ListLiteral', items: [], span: spanFrom(this.state, start) };
  }

  if (check(this.state, TOKEN_TYPES.COLON)) {
    return withContext(this.state, 'map', () => {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
      return { type: 'MapLiteral', entries: [], span: spanFrom(this.state, start) };
    });
  }

  const first = this.parseExpression();
  if (check(this.state, TOKEN_TYPES.COLON)) {
    return this.parseMapRest(start, first);
  }
  return this.parseListRest(start, first);
};

Parser.prototype.parseListRest = function (
  this: Parser,
  start: SourceLocation,
  first: ExpressionNode
): ExpressionNode {
  return withContext(this.state, 'list', () => {
    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      const count = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
      return { type: 'ListRepeat', item: first, count, span: spanFrom(this.state, start) };
    }

    const items: ExpressionNode[] = [first];
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.RBRACKET)) break; // trailing comma
      items.push(this.parseExpression());
    }
    if (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      throw unexpected(this.state, ["','", "']'"], TOKEN_TYPES.RBRACKET);
    }
    advance(this.state);
    return { type: 'ListLiteral', items, span: spanFrom(this.state, start) };
  });
};

Parser.prototype.parseMapRest = function (
  this: Parser,
  start: SourceLocation,
  firstKey: ExpressionNode
): ExpressionNode {
  return withContext(this.state, 'map', () => {
    const entries: MapEntryNode[] = [];
    let key = firstKey;
    for (;;) {
      expect(this.state, TOKEN_TYPES.COLON, "':'");
      const value = this.parseExpression();
      entries.push({
        type: 'MapEntry',
        key,
        value,
        span: makeSpan(key.span.start, value.span.end),
      });
      if (!check(this.state, TOKEN_TYPES.COMMA)) break;
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.RBRACKET)) break; // trailing comma
      key = this.parseExpression();
    }
    if (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      throw unexpected(this.state, ["','", "']'"], TOKEN_TYPES.RBRACKET);
    }
    advance(this.state);
    return { type: 'MapLiteral', entries, span: spanFrom(this.state, start) };
  });
};

// ============================================================
// FUNCTION LITERALS
// ============================================================

/** |a, b| { body }  or  || { body } */
Parser.prototype.parseFunctionLiteral = function (this: Parser): FunctionLiteralNode {
  return withContext(this.state, 'function', () => {
    const start = advance(this.state).span.start; // opening |

    const params: ParamNode[] = [];
    while (!check(this.state, TOKEN_TYPES.PIPE_BAR)) {
      const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name');
      params.push({ type: 'Param', name: name.value, span: name.span });
      if (!check(this.state, TOKEN_TYPES.COMMA)) break;
      advance(this.state);
    }
    expect(this.state, TOKEN_TYPES.PIPE_BAR, "'|'");

    const body = this.parseBlock();
    return { type: 'FunctionLiteral', params, body, span: spanFrom(this.state, start) };
  });
};
