/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Holds the current scope and the checks shared by all mixins, plus the
 * dispatch entry points that lower mixins call before the outermost
 * CoreMixin supplies them.
 *
 * @internal
 */

import type { ExpressionNode, SourceSpan, StatementNode } from '../../../types.js';
import { FORGE_ERROR_CODES, RuntimeError } from '../../../types.js';
import type { Environment } from '../environment.js';
import type { Completion } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import type { ForgeValue } from '../values.js';
import { typeName } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 */
export class EvaluatorBase {
  /** Innermost scope of the code being evaluated */
  scope: Environment;

  constructor(readonly ctx: RuntimeContext) {
    this.scope = ctx.globals;
  }

  /** TypeError at a span */
  typeError(message: string, span?: SourceSpan): RuntimeError {
    return new RuntimeError(FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR, message, span);
  }

  /**
   * Conditions and logical operands must be Bool.
   */
  requireBool(value: ForgeValue, span: SourceSpan): boolean {
    if (typeof value !== 'boolean') {
      throw this.typeError(
        `cannot determine truthiness of value of type '${typeName(value)}'`,
        span
      );
    }
    return value;
  }

  /**
   * Evaluate an expression.
   *
   * NOTE: Stub implementation - the real dispatch lives in CoreMixin,
   * the outermost layer of the composed Evaluator.
   */
  evaluateExpression(_node: ExpressionNode): ForgeValue {
    throw new Error('evaluateExpression requires full Evaluator composition with CoreMixin');
  }

  /**
   * Execute a statement.
   *
   * NOTE: Stub implementation - see evaluateExpression.
   */
  executeStatement(_node: StatementNode): Completion {
    throw new Error('executeStatement requires full Evaluator composition with CoreMixin');
  }
}
