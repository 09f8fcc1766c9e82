/**
 * ExpressionsMixin: Operators
 *
 * Unary, binary and logical operators, clone/mirror, and `as` conversions.
 *
 * Coercion rules:
 * - `+` adds numbers, concatenates any mix of strings and chars into a
 *   string, and concatenates two lists into a new list
 * - `- * / %` take numbers only (IEEE semantics, no division-by-zero error)
 * - ordering compares number/number, string/string and char/char
 * - `==`/`!=` accept any pair of values
 * - a custom operand may take over any other operator via `coerce`
 *
 * Conversions (`value as type`):
 * - number: from a decimal numeral string, a char (its code point) or a bool (1/0)
 * - string: any value, rendered the way `print` renders it
 * - char: from a one-character string or a code point number
 * - bool: from the strings "true" and "false"
 * - list: copies a list; splits a string into chars; expands a range; turns a
 *   map into [key, value] pairs; collects an iterable custom value
 * Every kind converts to itself. Anything else is a TypeError.
 *
 * Error Handling:
 * - Operand type mismatches throw RuntimeError(RUNTIME_TYPE_ERROR)
 * - Non-Bool operands of `!`, `and`, `or`, `xor` throw RuntimeError(RUNTIME_TYPE_ERROR)
 *
 * @internal
 */

import type {
  BinaryExprNode,
  BinaryOp,
  CloneNode,
  ConversionNode,
  ConversionType,
  LogicalExprNode,
  MirrorNode,
  SourceSpan,
  UnaryExprNode,
} from '../../../../types.js';
import { valuesEqual } from '../../equals.js';
import { rangeItems } from '../../slices.js';
import type { ForgeValue } from '../../values.js';
import {
  char,
  codePoints,
  compareCodePoints,
  deepClone,
  formatValue,
  isChar,
  isCustom,
  isList,
  isMap,
  isRange,
  typeName,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ExpressionsMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class ExpressionsEvaluator extends Base {
    evaluateUnary(node: UnaryExprNode): ForgeValue {
      const operand = this.evaluateExpression(node.operand);
      if (node.op === '!') {
        return !this.requireBool(operand, node.operand.span);
      }
      if (typeof operand !== 'number') {
        throw this.typeError(`cannot negate value of type '${typeName(operand)}'`, node.span);
      }
      return -operand;
    }

    evaluateBinary(node: BinaryExprNode): ForgeValue {
      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);
      return this.applyBinary(node.op, left, right, node.span);
    }

    /** `and` and `or` short-circuit; `xor` evaluates both sides */
    evaluateLogical(node: LogicalExprNode): boolean {
      const left = this.requireBool(this.evaluateExpression(node.left), node.left.span);
      if (node.op === 'and' && !left) return false;
      if (node.op === 'or' && left) return true;
      const right = this.requireBool(this.evaluateExpression(node.right), node.right.span);
      return node.op === 'xor' ? left !== right : right;
    }

    /**
     * Apply a binary operator to evaluated operands.
     * Shared with compound assignment.
     */
    applyBinary(op: BinaryOp, left: ForgeValue, right: ForgeValue, span: SourceSpan): ForgeValue {
      if (op === '==') return valuesEqual(left, right);
      if (op === '!=') return !valuesEqual(left, right);

      if (isCustom(left) || isCustom(right)) {
        const coerced = this.coerceCustom(op, left, right);
        if (coerced !== undefined) return coerced;
        throw this.operatorError(op, left, right, span);
      }

      switch (op) {
        case '+':
          return this.add(left, right, span);
        case '-':
        case '*':
        case '/':
        case '%':
          if (typeof left !== 'number' || typeof right !== 'number') {
            throw this.operatorError(op, left, right, span);
          }
          return arithmetic(op, left, right);
        case '<':
          return this.compare(left, right, span) < 0;
        case '<=':
          return this.compare(left, right, span) <= 0;
        case '>':
          return this.compare(left, right, span) > 0;
        case '>=':
          return this.compare(left, right, span) >= 0;
      }
    }

    coerceCustom(op: BinaryOp, left: ForgeValue, right: ForgeValue): ForgeValue | undefined {
      if (isCustom(left) && left.ops.coerce) {
        const result = left.ops.coerce(left.payload, op, right, 'left');
        if (result !== undefined) return result;
      }
      if (isCustom(right) && right.ops.coerce) {
        return right.ops.coerce(right.payload, op, left, 'right');
      }
      return undefined;
    }

    add(left: ForgeValue, right: ForgeValue, span: SourceSpan): ForgeValue {
      if (typeof left === 'number' && typeof right === 'number') {
        return left + right;
      }
      const leftText = textOf(left);
      const rightText = textOf(right);
      if (leftText !== undefined && rightText !== undefined) {
        return leftText + rightText;
      }
      if (isList(left) && isList(right)) {
        return [...left, ...right];
      }
      throw this.operatorError('+', left, right, span);
    }

    /** Negative, zero or positive like a sort comparator */
    compare(left: ForgeValue, right: ForgeValue, span: SourceSpan): number {
      if (typeof left === 'number' && typeof right === 'number') {
        // NaN compares false on every ordering operator
        return left < right ? -1 : left > right ? 1 : left === right ? 0 : NaN;
      }
      if (typeof left === 'string' && typeof right === 'string') {
        return compareCodePoints(left, right);
      }
      if (isChar(left) && isChar(right)) {
        return compareCodePoints(left.value, right.value);
      }
      throw this.typeError(
        `cannot compare values of type '${typeName(left)}' and '${typeName(right)}'`,
        span
      );
    }

    operatorError(op: BinaryOp, left: ForgeValue, right: ForgeValue, span: SourceSpan) {
      return this.typeError(
        `cannot apply '${op}' to values of type '${typeName(left)}' and '${typeName(right)}'`,
        span
      );
    }

    evaluateClone(node: CloneNode): ForgeValue {
      return deepClone(this.evaluateExpression(node.operand));
    }

    /** Same storage handle; lists and maps are already shared by reference */
    evaluateMirror(node: MirrorNode): ForgeValue {
      return this.evaluateExpression(node.operand);
    }

    evaluateConversion(node: ConversionNode): ForgeValue {
      const value = this.evaluateExpression(node.operand);
      const converted = convert(value, node.targetType);
      if (converted === undefined) {
        throw this.typeError(
          `cannot convert ${describeOperand(value)} to ${node.targetType}`,
          node.span
        );
      }
      return converted;
    }
  };
}

function arithmetic(op: '-' | '*' | '/' | '%', left: number, right: number): number {
  switch (op) {
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
    case '%':
      return left % right;
  }
}

/** String content of a string or char operand */
function textOf(value: ForgeValue): string | undefined {
  if (typeof value === 'string') return value;
  if (isChar(value)) return value.value;
  return undefined;
}

const DECIMAL_NUMERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Converted value, or undefined when `value` has no form of that type */
function convert(value: ForgeValue, type: ConversionType): ForgeValue | undefined {
  switch (type) {
    case 'number':
      if (typeof value === 'number') return value;
      if (typeof value === 'boolean') return value ? 1 : 0;
      if (isChar(value)) return value.value.codePointAt(0);
      if (typeof value === 'string') {
        const text = value.trim();
        return DECIMAL_NUMERAL.test(text) ? Number(text) : undefined;
      }
      return undefined;
    case 'string':
      return typeof value === 'string' ? value : formatValue(value);
    case 'char':
      if (isChar(value)) return value;
      if (typeof value === 'string') {
        const [only, extra] = codePoints(value);
        return only !== undefined && extra === undefined ? char(only) : undefined;
      }
      if (typeof value === 'number' && isScalarValue(value)) {
        return char(String.fromCodePoint(value));
      }
      return undefined;
    case 'bool':
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      return undefined;
    case 'list':
      if (isList(value)) return [...value];
      if (typeof value === 'string') return codePoints(value).map(char);
      if (isRange(value)) return rangeItems(value);
      if (isMap(value)) return value.entries().map(([k, v]) => [k, v]);
      if (isCustom(value) && value.ops.iterate) return [...value.ops.iterate(value.payload)];
      return undefined;
  }
}

/** Unicode scalar value: an integer code point outside the surrogate block */
function isScalarValue(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 0x10ffff && (n < 0xd800 || n > 0xdfff);
}

function describeOperand(value: ForgeValue): string {
  return typeof value === 'string'
    ? `string ${JSON.stringify(value)}`
    : `value of type '${typeName(value)}'`;
}
