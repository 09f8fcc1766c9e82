/**
 * LiteralsMixin: List, Map, Range and Function Literals
 *
 * Builds container values and function values from literal syntax.
 *
 * Error Handling:
 * - Non-integer range bounds throw RuntimeError(RUNTIME_TYPE_ERROR)
 * - Invalid repeat counts throw RuntimeError(RUNTIME_TYPE_ERROR)
 *
 * @internal
 */

import type {
  ExpressionNode,
  FunctionLiteralNode,
  ListLiteralNode,
  ListRepeatNode,
  MapLiteralNode,
  RangeNode,
} from '../../../../types.js';
import { createScriptFunction, type ScriptFunction } from '../../callable.js';
import type { ForgeRange, ForgeValue } from '../../values.js';
import { deepClone, ForgeMap, range, typeName } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function LiteralsMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class LiteralsEvaluator extends Base {
    evaluateListLiteral(node: ListLiteralNode): ForgeValue[] {
      return node.items.map((item) => this.evaluateExpression(item));
    }

    /**
     * [item; count]: the item is evaluated once and each slot gets its own
     * deep copy, so nested lists are not shared between slots.
     */
    evaluateListRepeat(node: ListRepeatNode): ForgeValue[] {
      const item = this.evaluateExpression(node.item);
      const count = this.evaluateExpression(node.count);
      if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
        throw this.typeError(
          typeof count === 'number'
            ? `repeat count must be a non-negative integer, found ${count}`
            : `repeat count must be a number, found value of type '${typeName(count)}'`,
          node.count.span
        );
      }
      const items: ForgeValue[] = [];
      for (let i = 0; i < count; i++) items.push(deepClone(item));
      return items;
    }

    /** Later duplicate keys overwrite earlier ones */
    evaluateMapLiteral(node: MapLiteralNode): ForgeMap {
      const map = new ForgeMap();
      for (const entry of node.entries) {
        const key = this.evaluateExpression(entry.key);
        map.set(key, this.evaluateExpression(entry.value));
      }
      return map;
    }

    evaluateRange(node: RangeNode): ForgeRange {
      const lo = this.evaluateRangeBound(node.lo);
      const hi = this.evaluateRangeBound(node.hi);
      return range(lo, hi);
    }

    evaluateRangeBound(expr: ExpressionNode): number {
      const bound = this.evaluateExpression(expr);
      if (typeof bound !== 'number' || !Number.isInteger(bound)) {
        throw this.typeError(
          typeof bound === 'number'
            ? `range bounds must be integers, found ${bound}`
            : `range bounds must be numbers, found value of type '${typeName(bound)}'`,
          expr.span
        );
      }
      return bound;
    }

    /** Capture the current scope by reference */
    createFunction(node: FunctionLiteralNode): ScriptFunction {
      return createScriptFunction(
        node.params.map((p) => p.name),
        node.body,
        this.scope,
        node.span
      );
    }
  };
}
