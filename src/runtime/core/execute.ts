/**
 * Program Execution
 *
 * Public entry points for running parsed programs against a context.
 */

import { parse } from '../../parser/index.js';
import type { ProgramNode } from '../../types.js';
import { getEvaluator } from './eval/evaluator.js';
import type { ExecutionResult, RuntimeContext } from './types.js';

/**
 * Execute a parsed program in the context's global environment.
 *
 * Bindings made at top level stay in the context, so executing several
 * programs against one context behaves like one REPL session. A program
 * that still holds RecoveryError nodes is refused with a ParseError.
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext();
 * const { value } = execute(parse('var x = 2; x * 21;'), ctx);
 * ```
 */
export function execute(program: ProgramNode, ctx: RuntimeContext): ExecutionResult {
  return getEvaluator(ctx).executeProgram(program);
}

/**
 * Parse and execute source text. Throws the first LexerError or
 * ParseError, or the RuntimeError that aborted execution.
 */
export function evaluateSource(source: string, ctx: RuntimeContext): ExecutionResult {
  return execute(parse(source), ctx);
}
