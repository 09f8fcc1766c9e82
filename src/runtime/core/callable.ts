/**
 * Callable Types
 *
 * Function values: script functions created by `|params| { body }` and
 * native functions registered by the host.
 */

import type { BlockNode, SourceSpan } from '../../types.js';
import type { Environment } from './environment.js';
import type { NativeCallContext } from './types.js';
import type { ForgeValue } from './values.js';
import { isFunction } from './values.js';

/**
 * Function defined in Forge source.
 * Captures its defining environment by reference, so the scope outlives
 * the block that created it while the function is reachable.
 */
export interface ScriptFunction {
  readonly __type: 'function';
  readonly kind: 'script';
  readonly params: readonly string[];
  readonly body: BlockNode;
  readonly closure: Environment;
  /** Span of the function literal; used for declaration-site diagnostics */
  readonly declarationSpan: SourceSpan;
}

/** Fixed parameter count, or any count */
export type NativeArity = number | 'variadic';

export type NativeFn = (args: ForgeValue[], ctx: NativeCallContext) => ForgeValue;

/** Host callback exposed as a function value */
export interface NativeFunction {
  readonly __type: 'function';
  readonly kind: 'native';
  readonly name: string;
  readonly arity: NativeArity;
  readonly fn: NativeFn;
}

export type ForgeFunction = ScriptFunction | NativeFunction;

/**
 * Wrap a host callback as a Forge function value.
 * Calls are arity-checked like script functions unless `arity` is 'variadic'.
 *
 * @example
 * ```typescript
 * const clock = createNativeFunction('clock', 0, () => Date.now());
 * ```
 */
export function createNativeFunction(
  name: string,
  arity: NativeArity,
  fn: NativeFn
): NativeFunction {
  if (arity !== 'variadic' && (!Number.isInteger(arity) || arity < 0)) {
    throw new TypeError(
      `Native function '${name}' must have a non-negative integer arity, got ${arity}`
    );
  }
  return { __type: 'function', kind: 'native', name, arity, fn };
}

export function createScriptFunction(
  params: readonly string[],
  body: BlockNode,
  closure: Environment,
  declarationSpan: SourceSpan
): ScriptFunction {
  return { __type: 'function', kind: 'script', params, body, closure, declarationSpan };
}

export function isScriptFunction(value: ForgeValue): value is ScriptFunction {
  return isFunction(value) && value.kind === 'script';
}

export function isNativeFunction(value: ForgeValue): value is NativeFunction {
  return isFunction(value) && value.kind === 'native';
}
