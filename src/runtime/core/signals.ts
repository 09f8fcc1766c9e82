/**
 * Control Flow Completions
 *
 * Statements report how they finished instead of throwing: `return`,
 * `break` and `continue` travel outward as values until the enclosing
 * call or loop consumes them. Errors are the only thing thrown.
 */

import type { BreakNode, ContinueNode, ReturnNode } from '../../types.js';
import { FORGE_ERROR_CODES, RuntimeError } from '../../types.js';
import type { ForgeValue } from './values.js';

export type Completion =
  | { readonly kind: 'normal' }
  | { readonly kind: 'return'; readonly value: ForgeValue; readonly node: ReturnNode }
  | { readonly kind: 'break'; readonly node: BreakNode }
  | { readonly kind: 'continue'; readonly node: ContinueNode };

export const NORMAL: Completion = { kind: 'normal' };

/**
 * Error for a `break`/`continue` that escaped every loop, or a completion
 * that crossed a function boundary.
 */
export function invalidControl(
  completion: Extract<Completion, { kind: 'break' | 'continue' }>
): RuntimeError {
  return RuntimeError.fromNode(
    FORGE_ERROR_CODES.RUNTIME_INVALID_CONTROL,
    `'${completion.kind}' outside of a loop`,
    completion.node
  );
}
