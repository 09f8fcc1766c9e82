/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, and loops
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ForNode,
  IfNode,
  StatementNode,
  WhileNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  spanFrom,
  withContext,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockNode;
    parseIf(): IfNode;
    parseWhile(): WhileNode;
    parseFor(): ForNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LBRACE, "'{'");

  const statements: StatementNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    statements.push(this.parseStatement());
  }

  const rbrace = expect(this.state, TOKEN_TYPES.RBRACE, "'}'");

  return {
    type: 'Block',
    statements,
    span: makeSpan(start, rbrace.span.end),
  };
};

// ============================================================
// CONDITIONALS
// ============================================================

/** if cond { } [else if ... | else { }] */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  return withContext(this.state, 'if-else statement', () => {
    const start = advance(this.state).span.start; // if
    const condition = this.parseExpression();
    const thenBlock = this.parseBlock();

    let elseBlock: BlockNode | null = null;
    if (check(this.state, TOKEN_TYPES.ELSE)) {
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.IF)) {
        // else-if chain: wrap the nested conditional in its own block
        const nested = this.parseIf();
        elseBlock = { type: 'Block', statements: [nested], span: nested.span };
      } else {
        elseBlock = this.parseBlock();
      }
    }

    return {
      type: 'If',
      condition,
      thenBlock,
      elseBlock,
      span: spanFrom(this.state, start),
    };
  });
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  return withContext(this.state, 'while statement', () => {
    const start = advance(this.state).span.start; // while
    const condition = this.parseExpression();
    const body = this.parseBlock();
    return { type: 'While', condition, body, span: spanFrom(this.state, start) };
  });
};

/** for binding in iterable { body } */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  return withContext(this.state, 'for statement', () => {
    const start = advance(this.state).span.start; // for
    const binding = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier');
    expect(this.state, TOKEN_TYPES.IN, "'in'");
    const iterable = this.parseExpression();
    const body = this.parseBlock();
    return {
      type: 'For',
      binding: binding.value,
      bindingSpan: binding.span,
      iterable,
      body,
      span: spanFrom(this.state, start),
    };
  });
};
