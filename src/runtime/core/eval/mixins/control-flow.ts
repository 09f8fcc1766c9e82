/**
 * ControlFlowMixin: Blocks, Conditionals, and Loops
 *
 * Every block runs in a fresh child scope. Loops consume `break` and
 * `continue` completions; `return` passes through to the enclosing call.
 *
 * Error Handling:
 * - Non-boolean conditions throw RuntimeError(RUNTIME_TYPE_ERROR)
 * - Iterating a value with no iteration order throws RuntimeError(RUNTIME_TYPE_ERROR)
 *
 * @internal
 */

import type {
  BlockNode,
  ForNode,
  IfNode,
  SourceSpan,
  WhileNode,
} from '../../../../types.js';
import type { Environment } from '../../environment.js';
import { NORMAL, type Completion } from '../../signals.js';
import type { ForgeValue } from '../../values.js';
import { char, isCustom, isList, isRange, typeName } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ControlFlowMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class ControlFlowEvaluator extends Base {
    /**
     * Run a block in `scope`, a fresh child of the current scope unless the
     * caller supplies one (function bodies, loop iterations).
     */
    executeBlock(node: BlockNode, scope: Environment = this.scope.child()): Completion {
      const saved = this.scope;
      this.scope = scope;
      try {
        for (const statement of node.statements) {
          const completion = this.executeStatement(statement);
          if (completion.kind !== 'normal') return completion;
        }
        return NORMAL;
      } finally {
        this.scope = saved;
      }
    }

    executeIf(node: IfNode): Completion {
      const condition = this.requireBool(
        this.evaluateExpression(node.condition),
        node.condition.span
      );
      if (condition) return this.executeBlock(node.thenBlock);
      return node.elseBlock ? this.executeBlock(node.elseBlock) : NORMAL;
    }

    /** Condition is re-checked before every iteration */
    executeWhile(node: WhileNode): Completion {
      for (;;) {
        const condition = this.requireBool(
          this.evaluateExpression(node.condition),
          node.condition.span
        );
        if (!condition) return NORMAL;

        const completion = this.executeBlock(node.body);
        if (completion.kind === 'break') return NORMAL;
        if (completion.kind === 'return') return completion;
      }
    }

    /** The binding lives in its own scope for each iteration */
    executeFor(node: ForNode): Completion {
      const iterable = this.evaluateExpression(node.iterable);
      for (const item of this.iterate(iterable, node.iterable.span)) {
        const iterationScope = this.scope.child();
        iterationScope.define(node.binding, item);
        const completion = this.executeBlock(node.body, iterationScope);
        if (completion.kind === 'break') break;
        if (completion.kind === 'return') return completion;
      }
      return NORMAL;
    }

    /**
     * Iteration order of a value:
     * ranges lo..hi-1, lists by index (reading the list live, so elements
     * appended by the body are visited), strings by character, custom
     * values through `iterate`.
     */
    *iterate(value: ForgeValue, span: SourceSpan): Generator<ForgeValue, void, undefined> {
      if (isRange(value)) {
        for (let i = value.lo; i < value.hi; i++) yield i;
      } else if (isList(value)) {
        for (let i = 0; i < value.length; i++) yield value[i] ?? null;
      } else if (typeof value === 'string') {
        for (const ch of value) yield char(ch);
      } else if (isCustom(value) && value.ops.iterate) {
        yield* value.ops.iterate(value.payload);
      } else {
        throw this.typeError(`cannot iterate over value of type '${typeName(value)}'`, span);
      }
    }
  };
}
