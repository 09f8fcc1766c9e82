/**
 * Runtime Types
 * Public types for host applications: options, context, I/O and the
 * capability table for custom values.
 */

import type { BinaryOp, SourceSpan } from '../../types.js';
import type { Environment } from './environment.js';
import type { ForgeValue } from './values.js';
import type { NativeFunction } from './callable.js';

// ============================================================
// HOST I/O
// ============================================================

/**
 * Program I/O. The core never touches the console directly.
 */
export interface ForgeIO {
  /** Emit one line of program output (`print`) */
  write(line: string): void;
  /** Show `prompt` and block until one line is read; null at end of input */
  readLine(prompt: string): string | null;
}

// ============================================================
// CUSTOM VALUES
// ============================================================

/**
 * Operation table supplied by the host for a custom value type.
 * Every capability except `typeName` is optional; using a value in a way
 * its table does not support raises a TypeError.
 */
export interface CustomOps<P = unknown> {
  /** Name reported in type errors and by `:env` */
  readonly typeName: string;
  /** Equality against any value. Defaults to identity. */
  equals?(self: P, other: ForgeValue): boolean;
  /** Text used by `print` and the REPL. Defaults to `<typeName>`. */
  display?(self: P): string;
  /** Values produced by `for x in value` */
  iterate?(self: P): Iterable<ForgeValue>;
  /** Read `value[index]` */
  index?(self: P, index: ForgeValue): ForgeValue;
  /** Read `value.name`; undefined when the member does not exist */
  member?(self: P, name: string): ForgeValue | undefined;
  /**
   * Apply a binary operator where this value is one operand.
   * `side` tells which operand it is. Return undefined to decline.
   */
  coerce?(
    self: P,
    op: BinaryOp,
    other: ForgeValue,
    side: 'left' | 'right'
  ): ForgeValue | undefined;
  /** Make the value callable */
  call?(self: P, args: ForgeValue[]): ForgeValue;
}

export interface CustomValue<P = unknown> {
  readonly __type: 'custom';
  readonly payload: P;
  readonly ops: CustomOps<P>;
}

// ============================================================
// NATIVE CALLBACKS
// ============================================================

/**
 * Context handed to native callbacks. `call` re-enters the evaluator
 * synchronously, e.g. to invoke a script function passed as an argument.
 */
export interface NativeCallContext {
  readonly runtime: RuntimeContext;
  /** Span of the call expression that invoked the native */
  readonly span: SourceSpan | undefined;
  call(fn: ForgeValue, args: ForgeValue[]): ForgeValue;
}

// ============================================================
// RUNTIME OPTIONS & CONTEXT
// ============================================================

export interface RuntimeOptions {
  /** Native functions bound as globals under their map key */
  natives?: Record<string, NativeFunction>;
  /** Initial global variables */
  values?: Record<string, ForgeValue>;
  /** Output/input callbacks; missing members fall back to the console */
  io?: Partial<ForgeIO>;
  /** Maximum nesting of function calls (default 200) */
  maxCallDepth?: number;
}

/**
 * State of one interpreter session. The global environment is owned by
 * the context and survives across `execute` calls, which is how the REPL
 * keeps its variables.
 */
export interface RuntimeContext {
  readonly globals: Environment;
  readonly io: ForgeIO;
  readonly maxCallDepth: number;
  /** Current function-call nesting */
  callDepth: number;
}

/** Result of executing a program */
export interface ExecutionResult {
  /** Value of the last expression statement or top-level return, else null */
  readonly value: ForgeValue;
  /** Values of REPL expression statements flagged for echo, in order */
  readonly echoed: readonly ForgeValue[];
}
