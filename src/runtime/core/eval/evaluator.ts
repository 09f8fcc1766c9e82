/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Scope handling and shared checks
 * 2. LiteralsMixin - List, map, range and function literals
 * 3. ExpressionsMixin - Unary, binary and logical operators, clone, mirror
 * 4. VariablesMixin - Names, assignment places, indexing, members, input
 * 5. ControlFlowMixin - Blocks, conditionals, loops
 * 6. ClosuresMixin - Function calls
 * 7. CoreMixin - Node dispatch and program execution (outermost)
 *
 * Each mixin constrains its base to the methods it calls, so a
 * misordered composition fails to type-check.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { LiteralsMixin } from './mixins/literals.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { VariablesMixin } from './mixins/variables.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { ClosuresMixin } from './mixins/closures.js';
import { CoreMixin } from './mixins/core.js';
import type { RuntimeContext } from '../types.js';

export const Evaluator = CoreMixin(
  ClosuresMixin(
    ControlFlowMixin(VariablesMixin(ExpressionsMixin(LiteralsMixin(EvaluatorBase))))
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * Evaluator instances keyed by context. Entries go away with their
 * context, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator for a context.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
