/**
 * Parser Extension: Expression Parsing
 * Precedence chain from assignment down to postfix operators
 */

import { Parser } from './parser.js';
import type {
  AssignOp,
  BinaryExprNode,
  BinaryOp,
  ConversionType,
  ExpressionNode,
  LValueNode,
  LogicalOp,
  SourceLocation,
  TokenType,
} from '../types.js';
import { CONVERSION_TYPES, FORGE_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  errorAt,
  expect,
  makeSpan,
  spanFrom,
  unexpected,
  withContext,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseLogical(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parsePrefix(): ExpressionNode;
    parseRange(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseConversion(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parseArguments(): ExpressionNode[];
    toLValue(node: ExpressionNode, message: string): LValueNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const ASSIGN_OPS: ReadonlyMap<TokenType, AssignOp> = new Map([
  [TOKEN_TYPES.ASSIGN, '='],
  [TOKEN_TYPES.PLUS_ASSIGN, '+='],
  [TOKEN_TYPES.MINUS_ASSIGN, '-='],
  [TOKEN_TYPES.STAR_ASSIGN, '*='],
  [TOKEN_TYPES.SLASH_ASSIGN, '/='],
  [TOKEN_TYPES.PERCENT_ASSIGN, '%='],
]);

const LOGICAL_OPS: ReadonlyMap<TokenType, LogicalOp> = new Map([
  [TOKEN_TYPES.AND, 'and'],
  [TOKEN_TYPES.OR, 'or'],
  [TOKEN_TYPES.XOR, 'xor'],
]);

const EQUALITY_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.EQ, '=='],
  [TOKEN_TYPES.NE, '!='],
]);

const COMPARISON_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.LT, '<'],
  [TOKEN_TYPES.LE, '<='],
  [TOKEN_TYPES.GT, '>'],
  [TOKEN_TYPES.GE, '>='],
]);

const ADDITIVE_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.PLUS, '+'],
  [TOKEN_TYPES.MINUS, '-'],
]);

const MULTIPLICATIVE_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map([
  [TOKEN_TYPES.STAR, '*'],
  [TOKEN_TYPES.SLASH, '/'],
  [TOKEN_TYPES.PERCENT, '%'],
]);

/**
 * Left-associative binary level: operand (op operand)*
 */
function parseBinaryLevel(
  parser: Parser,
  ops: ReadonlyMap<TokenType, BinaryOp>,
  operand: () => ExpressionNode
): ExpressionNode {
  let left = operand();
  let op = ops.get(current(parser.state).type);
  while (op !== undefined) {
    const opToken = advance(parser.state);
    const right = operand();
    const node: BinaryExprNode = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      opSpan: opToken.span,
      span: makeSpan(left.span.start, right.span.end),
    };
    left = node;
    op = ops.get(current(parser.state).type);
  }
  return left;
}

// ============================================================
// ASSIGNMENT
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return withContext(this.state, 'expression', () => this.parseAssignment());
};

/**
 * target op value, where the value is a logical expression.
 * Assignment does not chain: `a = b = 1` is rejected.
 */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const left = this.parseLogical();
  const op = ASSIGN_OPS.get(current(this.state).type);
  if (op === undefined) return left;

  const target = this.toLValue(left, 'invalid assignment target');
  advance(this.state); // operator
  const value = this.parseLogical();
  return {
    type: 'Assign',
    target,
    op,
    value,
    span: makeSpan(left.span.start, value.span.end),
  };
};

/**
 * Accept only expressions that name storage: identifiers and index expressions.
 */
Parser.prototype.toLValue = function (
  this: Parser,
  node: ExpressionNode,
  message: string
): LValueNode {
  if (node.type === 'Identifier' || node.type === 'Index') {
    return node;
  }
  throw errorAt(
    this.state,
    `${message}: only variables and indexed elements can be assigned`,
    node.span,
    FORGE_ERROR_CODES.PARSE_INVALID_ASSIGNMENT_TARGET
  );
};

// ============================================================
// BINARY PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseLogical = function (this: Parser): ExpressionNode {
  let left = this.parseEquality();
  let op = LOGICAL_OPS.get(current(this.state).type);
  while (op !== undefined) {
    advance(this.state);
    const right = this.parseEquality();
    left = {
      type: 'LogicalExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
    op = LOGICAL_OPS.get(current(this.state).type);
  }
  return left;
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, COMPARISON_OPS, () => this.parsePrefix());
};

/** input / clone / mirror bind looser than ranges and arithmetic */
Parser.prototype.parsePrefix = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  if (!check(this.state, TOKEN_TYPES.INPUT, TOKEN_TYPES.CLONE, TOKEN_TYPES.MIRROR)) {
    return this.parseRange();
  }

  advance(this.state);
  const operand = this.parsePrefix();
  const span = makeSpan(token.span.start, operand.span.end);
  switch (token.type) {
    case TOKEN_TYPES.INPUT:
      return { type: 'InputExpr', prompt: operand, span };
    case TOKEN_TYPES.CLONE:
      return { type: 'Clone', operand, span };
    default:
      return { type: 'Mirror', operand, span };
  }
};

/** lo..hi (non-associative) */
Parser.prototype.parseRange = function (this: Parser): ExpressionNode {
  const lo = this.parseAdditive();
  if (!check(this.state, TOKEN_TYPES.DOT_DOT)) return lo;
  advance(this.state);
  const hi = this.parseAdditive();
  return { type: 'Range', lo, hi, span: makeSpan(lo.span.start, hi.span.end) };
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, ADDITIVE_OPS, () => this.parseMultiplicative());
};

Parser.prototype.parseMultiplicative = function (this: Parser): ExpressionNode {
  return parseBinaryLevel(this, MULTIPLICATIVE_OPS, () => this.parseUnary());
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (!check(this.state, TOKEN_TYPES.MINUS, TOKEN_TYPES.BANG)) {
    return this.parseConversion();
  }
  const opToken = advance(this.state);
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op: opToken.type === TOKEN_TYPES.MINUS ? '-' : '!',
    operand,
    span: makeSpan(opToken.span.start, operand.span.end),
  };
};

/** operand as type (left-assoc): `x as string as list` */
Parser.prototype.parseConversion = function (this: Parser): ExpressionNode {
  let expr = this.parsePostfix();
  while (check(this.state, TOKEN_TYPES.AS)) {
    advance(this.state);
    const typeToken = current(this.state);
    const targetType = conversionType(typeToken.value);
    if (typeToken.type !== TOKEN_TYPES.IDENTIFIER || targetType === undefined) {
      throw unexpected(this.state, [`type name (${CONVERSION_TYPES.join(', ')})`]);
    }
    advance(this.state);
    expr = {
      type: 'Conversion',
      operand: expr,
      targetType,
      typeSpan: typeToken.span,
      span: makeSpan(expr.span.start, typeToken.span.end),
    };
  }
  return expr;
};

function conversionType(name: string): ConversionType | undefined {
  return CONVERSION_TYPES.find((type) => type === name);
}

// ============================================================
// POSTFIX: CALL, INDEX, MEMBER
// ============================================================

Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();
  const start: SourceLocation = expr.span.start;

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      const args = this.parseArguments();
      expr = { type: 'Call', callee: expr, args, span: spanFrom(this.state, start) };
    } else if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const index = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
      expr = { type: 'Index', target: expr, index, span: spanFrom(this.state, start) };
    } else if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'member name');
      expr = { type: 'Member', target: expr, name: name.value, span: spanFrom(this.state, start) };
    } else {
      return expr;
    }
  }
};

/** ( arg, arg, ... ) with optional trailing comma */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const args: ExpressionNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseExpression());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return args;
};
