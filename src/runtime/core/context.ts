/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { Environment } from './environment.js';
import { createConsoleIO } from './io.js';
import type { ForgeIO, RuntimeContext, RuntimeOptions } from './types.js';

export const DEFAULT_MAX_CALL_DEPTH = 200;

/**
 * Create a runtime context with an empty global scope plus host bindings.
 * Reuse one context across `execute` calls to keep state (REPL).
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const ctx = createRuntimeContext({ io: { write: (l) => lines.push(l) } });
 * ```
 */
export function createRuntimeContext(options: RuntimeOptions = {}): RuntimeContext {
  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new RangeError(`maxCallDepth must be a positive integer, got ${maxCallDepth}`);
  }

  const globals = new Environment();

  // Set native functions
  if (options.natives) {
    for (const [name, native] of Object.entries(options.natives)) {
      globals.define(name, native);
    }
  }

  // Set initial variables (can shadow natives of the same name)
  if (options.values) {
    for (const [name, value] of Object.entries(options.values)) {
      globals.define(name, value);
    }
  }

  const fallback = createConsoleIO();
  const io: ForgeIO = {
    write: options.io?.write ?? fallback.write,
    readLine: options.io?.readLine ?? fallback.readLine,
  };

  return { globals, io, maxCallDepth, callDepth: 0 };
}
