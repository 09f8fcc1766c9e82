/**
 * Forge Runtime
 *
 * Public API for executing Forge programs.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, host boundary)
 *   - values.ts: ForgeValue, ForgeMap and value utilities
 *   - callable.ts: Script and native function values
 *   - environment.ts: Lexical scopes
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution
 *   - io.ts: Console and scripted line sources
 *   - eval/: Mixin-composed evaluator (internal)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CustomOps,
  CustomValue,
  ExecutionResult,
  ForgeIO,
  NativeCallContext,
  RuntimeContext,
  RuntimeOptions,
} from './core/types.js';

// ============================================================
// FUNCTION VALUES
// ============================================================

export type {
  ForgeFunction,
  NativeArity,
  NativeFn,
  NativeFunction,
  ScriptFunction,
} from './core/callable.js';

export {
  createNativeFunction,
  isNativeFunction,
  isScriptFunction,
} from './core/callable.js';

// ============================================================
// VALUES
// ============================================================

export type { ForgeChar, ForgeList, ForgeRange, ForgeValue } from './core/values.js';

export {
  char,
  createCustomValue,
  deepClone,
  ForgeMap,
  formatValue,
  inspectValue,
  isChar,
  isCustom,
  isFunction,
  isList,
  isMap,
  isRange,
  range,
  typeName,
} from './core/values.js';

export { valuesEqual } from './core/equals.js';

// ============================================================
// EXECUTION
// ============================================================

export { Environment } from './core/environment.js';
export { createRuntimeContext, DEFAULT_MAX_CALL_DEPTH } from './core/context.js';
export { evaluateSource, execute } from './core/execute.js';
export {
  createArrayLineSource,
  createConsoleIO,
  createFdLineSource,
  type LineSource,
  stdinLineSource,
} from './core/io.js';

// ============================================================
// VERSION
// ============================================================

export { VERSION } from '../version.js';
