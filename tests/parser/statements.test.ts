/**
 * Forge Parser Tests: Statements, Context Trails and Recovery
 */

import { describe, expect, it } from 'vitest';
import {
  FORGE_ERROR_CODES,
  parse,
  ParseError,
  parseReplInput,
  parseWithRecovery,
} from '../../src/index.js';

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a parse error');
}

describe('Forge Parser: statements', () => {
  it('parses every statement form', () => {
    const program = parse(`
      var n = 0;
      print n;
      input "name? ", who;
      if n { } else if !n { } else { }
      while false { break; continue; }
      for i in 0..3 { }
      { return; }
      n;
    `);
    expect(program.statements.map((s) => s.type)).toEqual([
      'VarDecl',
      'Print',
      'Input',
      'If',
      'While',
      'For',
      'Block',
      'ExprStatement',
    ]);
  });

  it('nests else-if chains inside a block', () => {
    const [statement] = parse('if a { } else if b { }').statements;
    if (statement?.type !== 'If') throw new Error('expected an if statement');
    expect(statement.elseBlock?.statements.map((s) => s.type)).toEqual(['If']);
  });

  it('records the binding of a for loop', () => {
    const [statement] = parse('for item in xs { }').statements;
    if (statement?.type !== 'For') throw new Error('expected a for statement');
    expect(statement.binding).toBe('item');
    expect(statement.bindingSpan.start.column).toBe(5);
  });

  it('parses input with and without a prompt', () => {
    const [plain, prompted] = parse('input x; input "> ", xs[0];').statements;
    if (plain?.type !== 'Input' || prompted?.type !== 'Input') {
      throw new Error('expected input statements');
    }
    expect(plain.prompt).toBeNull();
    expect(prompted.prompt?.type).toBe('StringLiteral');
    expect(prompted.target.type).toBe('Index');
  });

  it('requires semicolons outside the REPL', () => {
    const err = parseError('1 + 2');
    expect(err.toData().message).toBe("expected ';', found end of input");
    expect(err.contextTrail).toEqual(['expression statement']);
  });
});

describe('Forge Parser: context trails', () => {
  it('lists the active rules innermost first', () => {
    const err = parseError('var f = |a| { print a };');
    expect(err.toData().message).toBe("expected ';', found '}'");
    expect(err.location).toEqual({ line: 1, column: 23, offset: 22 });
    expect(err.contextTrail).toEqual([
      'print statement',
      'function',
      'expression',
      'variable declaration',
    ]);
  });

  it('hints at a missing semicolon on the previous line', () => {
    const err = parseError('var a = 1\nvar b = 2;');
    expect(err.toData().message).toBe(
      "expected ';', found 'var'. Hint: Missing semicolon at the end of the previous statement?"
    );
    expect(err.contextTrail).toEqual(['variable declaration']);
  });

  it('hints at an unclosed bracket at end of input', () => {
    const err = parseError('var xs = [1, 2');
    expect(err.toData().message).toBe(
      "expected ',' or ']', found end of input. Hint: Check for unclosed bracket"
    );
    expect(err.contextTrail).toEqual(['list', 'expression', 'variable declaration']);
  });

  it('suggests a keyword for a common typo', () => {
    const err = parseError('x = 1 pirnt x;');
    expect(err.toData().message).toBe(
      "expected ';', found identifier 'pirnt'. Hint: Did you mean 'print'?"
    );
  });

  it('reports what was found instead of an expression', () => {
    const err = parseError('print ;');
    expect(err.toData().message).toBe("expected expression, found ';'");
    expect(err.found).toBe("';'");
    expect(err.expected).toEqual(['expression']);
  });
});

describe('Forge Parser: recovery', () => {
  it('reports independent errors from one parse', () => {
    const result = parseWithRecovery('var a = 1\nvar b = 2\nprint a + b;');
    expect(result.success).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors.map((e) => e.location?.line)).toEqual([2, 3]);
    expect(result.ast.statements.map((s) => s.type)).toEqual([
      'RecoveryError',
      'RecoveryError',
      'Print',
    ]);
  });

  it('resumes at the next line after an expression statement missing its semicolon', () => {
    const result = parseWithRecovery('x = 1\ny = 2\nz = 3;');
    expect(result.errors.map((e) => e.location?.line)).toEqual([2, 3]);
    expect(result.ast.statements.map((s) => s.type)).toEqual([
      'RecoveryError',
      'RecoveryError',
      'ExprStatement',
    ]);
    const [first] = result.ast.statements;
    if (first?.type !== 'RecoveryError') throw new Error('expected a recovery node');
    expect(first.text).toBe('x = 1');
  });

  it('reports each unterminated print and assignment', () => {
    const result = parseWithRecovery('var x = 0;\nprint x\nx = 2\nprint x;');
    expect(result.errors.map((e) => e.location?.line)).toEqual([3, 4]);
    expect(result.ast.statements.map((s) => s.type)).toEqual([
      'VarDecl',
      'RecoveryError',
      'RecoveryError',
      'Print',
    ]);
  });

  it('skips to the semicolon when the error is inside the line', () => {
    const result = parseWithRecovery('print 1 2;\nprint 3;');
    expect(result.errors).toHaveLength(1);
    expect(result.ast.statements.map((s) => s.type)).toEqual(['RecoveryError', 'Print']);
  });

  it('keeps the skipped text in the recovery node', () => {
    const result = parseWithRecovery('print );\nprint 2;');
    const [skipped] = result.ast.statements;
    if (skipped?.type !== 'RecoveryError') throw new Error('expected a recovery node');
    expect(skipped.text).toBe('print );');
    expect(skipped.message).toBe("expected expression, found ')'");
    expect(result.errors).toHaveLength(1);
  });

  it('skips past a block opened by the failed statement', () => {
    const result = parseWithRecovery('while x { print ; }\nprint 1;');
    expect(result.errors).toHaveLength(1);
    expect(result.ast.statements.map((s) => s.type)).toEqual(['RecoveryError', 'Print']);
  });

  it('reports a lexer error as the only error', () => {
    const result = parseWithRecovery('print 1;\nprint $;');
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.code).toBe(FORGE_ERROR_CODES.LEX_INVALID_CHARACTER);
    expect(result.ast.statements).toEqual([]);
  });

  it('succeeds on a clean program', () => {
    const result = parseWithRecovery('print 1;');
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });
});

describe('Forge Parser: REPL input', () => {
  it('flags a trailing expression without a semicolon for echo', () => {
    const result = parseReplInput('var x = 2; x * 3');
    const last = result.ast.statements[1];
    if (last?.type !== 'ExprStatement') throw new Error('expected an expression statement');
    expect(last.echo).toBe(true);
  });

  it('does not echo a terminated expression', () => {
    const result = parseReplInput('x * 3;');
    const [only] = result.ast.statements;
    if (only?.type !== 'ExprStatement') throw new Error('expected an expression statement');
    expect(only.echo).toBe(false);
  });
});
