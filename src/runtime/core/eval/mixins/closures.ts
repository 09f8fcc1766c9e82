/**
 * ClosuresMixin: Function Calls
 *
 * Handles every call site: script functions, host natives and custom
 * values that declare a `call` capability.
 *
 * Script functions run their body in a fresh environment whose parent is
 * the environment captured when the function literal was evaluated, so
 * calls see the bindings of their definition site, not of the caller.
 *
 * Error Handling:
 * - Argument count mismatches throw ArityError (RUNTIME_ARITY_MISMATCH)
 * - Calling a non-function throws RuntimeError(RUNTIME_TYPE_ERROR)
 * - Exceeding the call depth limit throws RuntimeError(RUNTIME_LIMIT_EXCEEDED)
 * - `break`/`continue` escaping a function body throws RuntimeError(RUNTIME_INVALID_CONTROL)
 *
 * @internal
 */

import type { CallNode, SourceSpan } from '../../../../types.js';
import { ArityError, FORGE_ERROR_CODES, RuntimeError } from '../../../../types.js';
import type { NativeFunction, ScriptFunction } from '../../callable.js';
import { isNativeFunction, isScriptFunction } from '../../callable.js';
import { invalidControl } from '../../signals.js';
import type { CustomOps, CustomValue, NativeCallContext } from '../../types.js';
import type { ForgeValue } from '../../values.js';
import { isCustom, typeName } from '../../values.js';
import type { BlockEvaluator, EvaluatorConstructor } from '../types.js';

export function ClosuresMixin<TBase extends EvaluatorConstructor<BlockEvaluator>>(Base: TBase) {
  return class ClosuresEvaluator extends Base {
    /** Callee first, then arguments left to right */
    evaluateCall(node: CallNode): ForgeValue {
      const callee = this.evaluateExpression(node.callee);
      const args = node.args.map((arg) => this.evaluateExpression(arg));
      return this.callFunction(callee, args, node.span, node.callee.span);
    }

    /**
     * Invoke any callable value. Also the entry point for natives calling
     * back into script code.
     *
     * Call nesting is tracked here. The host stack can run out before the
     * configured limit; that overflow is reported as the same error.
     */
    callFunction(
      callee: ForgeValue,
      args: ForgeValue[],
      span: SourceSpan | undefined,
      calleeSpan: SourceSpan | undefined = span
    ): ForgeValue {
      if (!isScriptFunction(callee) && !isNativeFunction(callee) && !isCallableCustom(callee)) {
        throw this.typeError(`value of type '${typeName(callee)}' is not callable`, calleeSpan);
      }
      if (this.ctx.callDepth >= this.ctx.maxCallDepth) {
        throw callDepthExceeded(this.ctx.maxCallDepth, span);
      }

      this.ctx.callDepth++;
      try {
        if (isScriptFunction(callee)) return this.invokeScript(callee, args, span);
        if (isNativeFunction(callee)) return this.invokeNative(callee, args, span);
        return callee.ops.call(callee.payload, args);
      } catch (error) {
        if (error instanceof RangeError && isStackOverflow(error)) {
          throw callDepthExceeded(this.ctx.maxCallDepth, span);
        }
        throw error;
      } finally {
        this.ctx.callDepth--;
      }
    }

    invokeScript(fn: ScriptFunction, args: ForgeValue[], span: SourceSpan | undefined): ForgeValue {
      if (args.length !== fn.params.length) {
        throw new ArityError(fn.params.length, args.length, span, fn.declarationSpan);
      }

      const frame = fn.closure.child();
      fn.params.forEach((param, i) => frame.define(param, args[i] ?? null));

      const completion = this.executeBlock(fn.body, frame);
      switch (completion.kind) {
        case 'return':
          return completion.value;
        case 'break':
        case 'continue':
          throw invalidControl(completion);
        case 'normal':
          return null;
      }
    }

    invokeNative(fn: NativeFunction, args: ForgeValue[], span: SourceSpan | undefined): ForgeValue {
      if (fn.arity !== 'variadic' && args.length !== fn.arity) {
        throw new ArityError(fn.arity, args.length, span);
      }
      const context: NativeCallContext = {
        runtime: this.ctx,
        span,
        call: (target, callArgs) => this.callFunction(target, callArgs, span),
      };
      return fn.fn(args, context);
    }
  };
}

type CallableCustom = CustomValue & {
  readonly ops: { readonly call: NonNullable<CustomOps['call']> };
};

function isCallableCustom(value: ForgeValue): value is CallableCustom {
  return isCustom(value) && value.ops.call !== undefined;
}

/**
 * V8 reports an exhausted stack as a RangeError. The check may itself run
 * out of stack; the resulting RangeError reaches the next frame up, which
 * retries with more room.
 */
function isStackOverflow(error: RangeError): boolean {
  return error.message.includes('call stack');
}

function callDepthExceeded(limit: number, span: SourceSpan | undefined): RuntimeError {
  return new RuntimeError(
    FORGE_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED,
    `maximum call depth of ${limit} exceeded`,
    span,
    { limit }
  );
}
