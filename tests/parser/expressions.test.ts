/**
 * Forge Parser Tests: Expressions
 * Precedence, associativity, spans and assignment targets.
 */

import { describe, expect, it } from 'vitest';
import {
  type ExpressionNode,
  FORGE_ERROR_CODES,
  parse,
  ParseError,
} from '../../src/index.js';

/** Parse `source;` and return the expression of its only statement */
function expr(source: string): ExpressionNode {
  const [statement] = parse(`${source};`).statements;
  if (statement?.type !== 'ExprStatement') {
    throw new Error(`expected an expression statement for: ${source}`);
  }
  return statement.expression;
}

/** Compact prefix rendering of an expression tree */
function shape(node: ExpressionNode): string {
  switch (node.type) {
    case 'NumberLiteral':
      return String(node.value);
    case 'Identifier':
      return node.name;
    case 'BinaryExpr':
    case 'LogicalExpr':
      return `(${node.op} ${shape(node.left)} ${shape(node.right)})`;
    case 'UnaryExpr':
      return `(${node.op} ${shape(node.operand)})`;
    case 'Range':
      return `(.. ${shape(node.lo)} ${shape(node.hi)})`;
    case 'Assign':
      return `(${node.op} ${shape(node.target)} ${shape(node.value)})`;
    case 'Call':
      return `(call ${shape(node.callee)}${node.args.map((a) => ` ${shape(a)}`).join('')})`;
    case 'Index':
      return `(index ${shape(node.target)} ${shape(node.index)})`;
    case 'Member':
      return `(. ${shape(node.target)} ${node.name})`;
    case 'Clone':
      return `(clone ${shape(node.operand)})`;
    case 'Conversion':
      return `(as ${shape(node.operand)} ${node.targetType})`;
    default:
      return node.type;
  }
}

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a parse error');
}

describe('Forge Parser: expressions', () => {
  describe('precedence', () => {
    it('binds multiplication tighter than addition', () => {
      expect(shape(expr('1 + 2 * 3'))).toBe('(+ 1 (* 2 3))');
    });

    it('associates arithmetic to the left', () => {
      expect(shape(expr('8 - 4 - 2'))).toBe('(- (- 8 4) 2)');
    });

    it('places comparison above equality and logic', () => {
      expect(shape(expr('a < b == c and d'))).toBe('(and (== (< a b) c) d)');
    });

    it('parses ranges over additive operands', () => {
      expect(shape(expr('a + 1..b - 1'))).toBe('(.. (+ a 1) (- b 1))');
    });

    it('applies unary operators after postfix ones', () => {
      expect(shape(expr('-xs.len'))).toBe('(- (. xs len))');
    });

    it('chains postfix operators left to right', () => {
      expect(shape(expr('f(1)[0].len'))).toBe('(. (index (call f 1) 0) len)');
    });

    it('lets clone take a whole range operand', () => {
      expect(shape(expr('clone xs[1..3]'))).toBe('(clone (index xs (.. 1 3)))');
    });

    it('gives assignment the lowest precedence', () => {
      expect(shape(expr('x += y * 2'))).toBe('(+= x (* y 2))');
    });

    it('keeps grouping out of the tree', () => {
      expect(shape(expr('(1 + 2) * 3'))).toBe('(* (+ 1 2) 3)');
    });

    it('binds a conversion tighter than prefix operators', () => {
      expect(shape(expr('-x as number'))).toBe('(- (as x number))');
    });

    it('binds a conversion tighter than binary operators', () => {
      expect(shape(expr('a as string + b'))).toBe('(+ (as a string) b)');
    });

    it('chains conversions left to right', () => {
      expect(shape(expr('x as string as list'))).toBe('(as (as x string) list)');
    });

    it('converts the result of postfix operators', () => {
      expect(shape(expr('xs[0] as char'))).toBe('(as (index xs 0) char)');
    });
  });

  describe('conversions', () => {
    it('rejects an unknown type name', () => {
      const err = parseError('x as foo;');
      expect(err.code).toBe(FORGE_ERROR_CODES.PARSE_UNEXPECTED_TOKEN);
      expect(err.toData().message).toBe(
        "expected type name (number, string, char, bool, list), found identifier 'foo'"
      );
    });

    it('records the span of the type name', () => {
      const node = expr('x as bool');
      if (node.type !== 'Conversion') throw new Error('expected a conversion');
      expect(node.typeSpan.start.column).toBe(6);
      expect(node.typeSpan.end.column).toBe(10);
    });
  });

  describe('spans', () => {
    it('spans a call from the callee to the closing paren', () => {
      const node = expr('  f(1, 2)');
      expect(node.span.start.column).toBe(3);
      expect(node.span.end.column).toBe(10);
    });

    it('spans a function literal from the first bar to the closing brace', () => {
      const node = expr('|a| { return a; }');
      expect(node.type).toBe('FunctionLiteral');
      expect(node.span.start.column).toBe(1);
      expect(node.span.end.column).toBe(18);
    });

    it('records the operator span of a binary expression', () => {
      const node = expr('a  ==  b');
      if (node.type !== 'BinaryExpr') throw new Error('expected a binary expression');
      expect(node.opSpan.start.column).toBe(4);
      expect(node.opSpan.end.column).toBe(6);
    });
  });

  describe('literals', () => {
    it('distinguishes the empty list from the empty map', () => {
      expect(expr('[]').type).toBe('ListLiteral');
      expect(expr('[:]').type).toBe('MapLiteral');
    });

    it('parses a repeat literal', () => {
      const node = expr('[0; 3]');
      if (node.type !== 'ListRepeat') throw new Error('expected a repeat literal');
      expect(shape(node.item)).toBe('0');
      expect(shape(node.count)).toBe('3');
    });

    it('parses map entries in order', () => {
      const node = expr('["a": 1, "b": 2,]');
      if (node.type !== 'MapLiteral') throw new Error('expected a map literal');
      expect(node.entries.map((e) => shape(e.value))).toEqual(['1', '2']);
    });

    it('parses function parameters', () => {
      const node = expr('|a, b| { }');
      if (node.type !== 'FunctionLiteral') throw new Error('expected a function literal');
      expect(node.params.map((p) => p.name)).toEqual(['a', 'b']);
    });
  });

  describe('assignment targets', () => {
    it('accepts an indexed element', () => {
      expect(shape(expr('xs[0] = 1'))).toBe('(= (index xs 0) 1)');
    });

    it('rejects a call as a target', () => {
      const err = parseError('f() = 1;');
      expect(err.code).toBe(FORGE_ERROR_CODES.PARSE_INVALID_ASSIGNMENT_TARGET);
      expect(err.toData().message).toBe(
        'invalid assignment target: only variables and indexed elements can be assigned'
      );
    });

    it('does not chain assignments', () => {
      const err = parseError('a = b = 1;');
      expect(err.code).toBe(FORGE_ERROR_CODES.PARSE_UNEXPECTED_TOKEN);
      expect(err.toData().message).toBe("expected ';', found '='");
    });

    it('rejects a member as an input target', () => {
      const err = parseError('input xs.len;');
      expect(err.code).toBe(FORGE_ERROR_CODES.PARSE_INVALID_ASSIGNMENT_TARGET);
      expect(err.contextTrail).toEqual(['input statement']);
    });
  });
});
