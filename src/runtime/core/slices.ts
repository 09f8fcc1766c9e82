/**
 * Index & Slice Helpers
 *
 * Bounds rules shared by reads and writes on lists and strings.
 * Strings are handled as arrays of code points.
 */

import { IndexError, RuntimeError, FORGE_ERROR_CODES } from '../../types.js';
import type { SourceSpan } from '../../types.js';
import type { ForgeRange, ForgeValue } from './values.js';
import { typeName } from './values.js';

export interface SliceBounds {
  readonly lo: number;
  readonly hi: number;
}

/**
 * Validate a scalar index against a sequence length.
 * @returns The index as an array position
 */
export function scalarIndex(
  index: ForgeValue,
  length: number,
  what: string,
  span?: SourceSpan
): number {
  if (typeof index !== 'number' || !Number.isInteger(index)) {
    throw new RuntimeError(
      FORGE_ERROR_CODES.RUNTIME_TYPE_ERROR,
      typeof index === 'number'
        ? `index must be an integer, found ${index}`
        : `cannot index ${what} with value of type '${typeName(index)}'`,
      span
    );
  }
  if (index < 0 || index >= length) {
    throw new IndexError(
      `index ${index} out of bounds for ${what} of length ${length}`,
      span,
      { index, length }
    );
  }
  return index;
}

/**
 * Resolve a range against a sequence length.
 * `hi` is clamped to the length; `lo` must lie within 0..length.
 * A range with lo >= hi selects nothing and splices at `lo`.
 */
export function sliceBounds(
  range: ForgeRange,
  length: number,
  what: string,
  span?: SourceSpan
): SliceBounds {
  if (range.lo < 0 || range.lo > length) {
    throw new IndexError(
      `slice start ${range.lo} out of bounds for ${what} of length ${length}`,
      span,
      { index: range.lo, length }
    );
  }
  const hi = Math.min(Math.max(range.hi, range.lo), length);
  return { lo: range.lo, hi };
}

/**
 * Replace items[lo, hi) with `replacement`, in place.
 * Copies element by element; replacements may be longer than the host's
 * argument limit.
 */
export function spliceList(
  items: ForgeValue[],
  bounds: SliceBounds,
  replacement: readonly ForgeValue[]
): void {
  const tail = items.slice(bounds.hi);
  items.length = bounds.lo;
  for (const item of replacement) items.push(item);
  for (const item of tail) items.push(item);
}

/** New string with code points [lo, hi) replaced */
export function spliceString(
  chars: readonly string[],
  bounds: SliceBounds,
  replacement: string
): string {
  return chars.slice(0, bounds.lo).join('') + replacement + chars.slice(bounds.hi).join('');
}

/** Integers lo, lo+1, ..., hi-1 */
export function rangeItems(range: ForgeRange): number[] {
  const items: number[] = [];
  for (let i = range.lo; i < range.hi; i++) items.push(i);
  return items;
}
