/**
 * Parser Extension: Program & Statement Parsing
 * Top-level loop, statement dispatch, simple statements, error recovery
 */

import { Parser } from './parser.js';
import type {
  BreakNode,
  ContinueNode,
  ExprStatementNode,
  ExpressionNode,
  InputNode,
  PrintNode,
  ProgramNode,
  RecoveryErrorNode,
  ReturnNode,
  SourceLocation,
  StatementNode,
  TokenType,
  VarDeclNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { LexerError } from '../lexer/index.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  previousEnd,
  spanFrom,
  withContext,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatement(): StatementNode;
    parseVarDecl(): VarDeclNode;
    parsePrint(): PrintNode;
    parseInputStatement(): InputNode;
    parseReturn(): ReturnNode;
    parseLoopJump(): BreakNode | ContinueNode;
    parseExpressionStatement(): ExprStatementNode;
    recoverToNextStatement(startPos: number, error: ParseError | LexerError): RecoveryErrorNode;
  }
}

/** Tokens that begin a statement; recovery stops in front of them */
const STATEMENT_KEYWORDS: readonly TokenType[] = [
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.INPUT,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.RETURN,
  TOKEN_TYPES.BREAK,
  TOKEN_TYPES.CONTINUE,
];

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: (StatementNode | RecoveryErrorNode)[] = [];

  while (!isAtEnd(this.state)) {
    if (this.state.recoveryMode) {
      // Recovery mode: catch errors and create RecoveryErrorNode
      const startPos = this.state.pos;
      try {
        statements.push(this.parseStatement());
      } catch (err) {
        if (err instanceof ParseError || err instanceof LexerError) {
          this.state.errors.push(err);
          statements.push(this.recoverToNextStatement(startPos, err));
        } else {
          throw err; // Re-throw non-parse errors
        }
      }
    } else {
      // Normal mode: let errors propagate
      statements.push(this.parseStatement());
    }
  }

  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Discard tokens after a failed statement until a statement boundary:
 * just past a `;`, in front of a statement keyword, or past the `}` that
 * closes a block the failed statement opened.
 *
 * A statement that is complete except for its `;` ends where the next line
 * begins; parsing resumes at that token without discarding it.
 */
Parser.prototype.recoverToNextStatement = function (
  this: Parser,
  startPos: number,
  error: ParseError | LexerError
): RecoveryErrorNode {
  const state = this.state;
  const startLocation: SourceLocation =
    state.tokens[startPos]?.span.start ?? current(state).span.start;

  // Blocks opened by the failed statement and still unclosed
  let depth = 0;
  for (let i = startPos; i < state.pos; i++) {
    const type = state.tokens[i]?.type;
    if (type === TOKEN_TYPES.LBRACE) depth++;
    if (type === TOKEN_TYPES.RBRACE) depth = Math.max(0, depth - 1);
  }

  const resumeHere = depth === 0 && state.pos > startPos && isMissingTerminator(this, error);

  // Always make progress past a statement that failed on its first token
  if (state.pos === startPos && !isAtEnd(state)) {
    if (check(state, TOKEN_TYPES.LBRACE)) depth++;
    advance(state);
  }

  while (!resumeHere && !isAtEnd(state)) {
    if (depth === 0) {
      if (check(state, TOKEN_TYPES.SEMICOLON, TOKEN_TYPES.RBRACE)) {
        advance(state);
        break;
      }
      if (check(state, ...STATEMENT_KEYWORDS)) break;
    }
    if (check(state, TOKEN_TYPES.LBRACE)) {
      depth++;
    } else if (check(state, TOKEN_TYPES.RBRACE)) {
      depth--;
      if (depth === 0) {
        advance(state);
        if (check(state, TOKEN_TYPES.SEMICOLON)) advance(state);
        break;
      }
    }
    advance(state);
  }

  const endLocation = state.pos > startPos ? previousEnd(state) : startLocation;
  const text = Array.from(state.source)
    .slice(startLocation.offset, endLocation.offset)
    .join('');

  return {
    type: 'RecoveryError',
    message: error.toData().message,
    text,
    span: makeSpan(startLocation, endLocation),
  };
};

/** The error is a `;` expected at a token that opens a new line */
function isMissingTerminator(parser: Parser, error: ParseError | LexerError): boolean {
  if (!(error instanceof ParseError) || error.expected.length !== 1) return false;
  if (error.expected[0] !== "';'") return false;
  const token = current(parser.state);
  return (
    error.span?.start.offset === token.span.start.offset &&
    token.span.start.line > previousEnd(parser.state).line
  );
}

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.VAR:
      return this.parseVarDecl();
    case TOKEN_TYPES.PRINT:
      return this.parsePrint();
    case TOKEN_TYPES.INPUT:
      return this.parseInputStatement();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.BREAK:
    case TOKEN_TYPES.CONTINUE:
      return this.parseLoopJump();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    case TOKEN_TYPES.LBRACE:
      return this.parseBlock();
    default:
      return this.parseExpressionStatement();
  }
};

// ============================================================
// SIMPLE STATEMENTS
// ============================================================

Parser.prototype.parseVarDecl = function (this: Parser): VarDeclNode {
  return withContext(this.state, 'variable declaration', () => {
    const start = advance(this.state).span.start; // var
    const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'identifier');
    expect(this.state, TOKEN_TYPES.ASSIGN, "'='");
    const init = this.parseExpression();
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    return {
      type: 'VarDecl',
      name: name.value,
      nameSpan: name.span,
      init,
      span: spanFrom(this.state, start),
    };
  });
};

Parser.prototype.parsePrint = function (this: Parser): PrintNode {
  return withContext(this.state, 'print statement', () => {
    const start = advance(this.state).span.start; // print
    const expression = this.parseExpression();
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    return { type: 'Print', expression, span: spanFrom(this.state, start) };
  });
};

/** input target;  or  input prompt, target; */
Parser.prototype.parseInputStatement = function (this: Parser): InputNode {
  return withContext(this.state, 'input statement', () => {
    const start = advance(this.state).span.start; // input
    let prompt: ExpressionNode | null = null;
    let targetExpr = this.parseExpression();
    if (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      prompt = targetExpr;
      targetExpr = this.parseExpression();
    }
    const target = this.toLValue(targetExpr, 'invalid input target');
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    return { type: 'Input', prompt, target, span: spanFrom(this.state, start) };
  });
};

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  return withContext(this.state, 'return statement', () => {
    const start = advance(this.state).span.start; // return
    const value = check(this.state, TOKEN_TYPES.SEMICOLON) ? null : this.parseExpression();
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    return { type: 'Return', value, span: spanFrom(this.state, start) };
  });
};

Parser.prototype.parseLoopJump = function (this: Parser): BreakNode | ContinueNode {
  const keyword = advance(this.state);
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
  const span = spanFrom(this.state, keyword.span.start);
  return keyword.type === TOKEN_TYPES.BREAK
    ? { type: 'Break', span }
    : { type: 'Continue', span };
};

Parser.prototype.parseExpressionStatement = function (this: Parser): ExprStatementNode {
  return withContext(this.state, 'expression statement', () => {
    const start = current(this.state).span.start;
    const expression = this.parseExpression();

    // REPL: a bare trailing expression is echoed
    if (this.state.replMode && isAtEnd(this.state)) {
      return {
        type: 'ExprStatement',
        expression,
        echo: true,
        span: spanFrom(this.state, start),
      };
    }

    expect(this.state, TOKEN_TYPES.SEMICOLON, "';'");
    return {
      type: 'ExprStatement',
      expression,
      echo: false,
      span: spanFrom(this.state, start),
    };
  });
};
