/**
 * Forge Values
 *
 * The closed set of runtime values. Scalars and strings are plain
 * JavaScript primitives; the remaining kinds are tagged objects.
 *
 * Lists and maps are shared by reference: every binding to the same list
 * sees the same storage. Strings have value semantics.
 */

import type { CustomOps, CustomValue } from './types.js';
import type { ForgeFunction } from './callable.js';
import { valuesEqual } from './equals.js';

/** One Unicode scalar */
export interface ForgeChar {
  readonly __type: 'char';
  readonly value: string;
}

/** Half-open integer range lo..hi */
export interface ForgeRange {
  readonly __type: 'range';
  readonly lo: number;
  readonly hi: number;
}

export type ForgeList = ForgeValue[];

export type ForgeValue =
  | number
  | boolean
  | null
  | string
  | ForgeChar
  | ForgeRange
  | ForgeList
  | ForgeMap
  | ForgeFunction
  | CustomValue;

/**
 * Insertion-ordered map keyed by value equality.
 * Lookups are linear: keys may be lists, maps or custom values, which have
 * no hash.
 */
export class ForgeMap {
  readonly __type = 'map' as const;
  private readonly items: [ForgeValue, ForgeValue][] = [];

  constructor(entries: Iterable<readonly [ForgeValue, ForgeValue]> = []) {
    for (const [k, v] of entries) this.set(k, v);
  }

  get size(): number {
    return this.items.length;
  }

  private find(key: ForgeValue): [ForgeValue, ForgeValue] | undefined {
    return this.items.find(([k]) => valuesEqual(k, key));
  }

  has(key: ForgeValue): boolean {
    return this.find(key) !== undefined;
  }

  /** Value for key, or undefined when absent (null is a valid stored value) */
  get(key: ForgeValue): ForgeValue | undefined {
    return this.find(key)?.[1];
  }

  /** Insert or overwrite; new keys go to the end */
  set(key: ForgeValue, value: ForgeValue): void {
    const entry = this.find(key);
    if (entry) {
      entry[1] = value;
    } else {
      this.items.push([key, value]);
    }
  }

  keys(): ForgeValue[] {
    return this.items.map(([k]) => k);
  }

  values(): ForgeValue[] {
    return this.items.map(([, v]) => v);
  }

  entries(): [ForgeValue, ForgeValue][] {
    return this.items.map(([k, v]) => [k, v]);
  }
}

// ============================================================
// CONSTRUCTORS & GUARDS
// ============================================================

export function char(value: string): ForgeChar {
  return { __type: 'char', value };
}

export function range(lo: number, hi: number): ForgeRange {
  return { __type: 'range', lo, hi };
}

export function createCustomValue<P>(payload: P, ops: CustomOps<P>): CustomValue<P> {
  return { __type: 'custom', payload, ops };
}

type Tagged = Exclude<ForgeValue, number | boolean | null | string | ForgeList>;

function tagOf(value: ForgeValue): Tagged['__type'] | undefined {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return value.__type;
}

export function isChar(value: ForgeValue): value is ForgeChar {
  return tagOf(value) === 'char';
}

export function isRange(value: ForgeValue): value is ForgeRange {
  return tagOf(value) === 'range';
}

export function isList(value: ForgeValue): value is ForgeList {
  return Array.isArray(value);
}

export function isMap(value: ForgeValue): value is ForgeMap {
  return value instanceof ForgeMap;
}

export function isFunction(value: ForgeValue): value is ForgeFunction {
  return tagOf(value) === 'function';
}

export function isCustom(value: ForgeValue): value is CustomValue {
  return tagOf(value) === 'custom';
}

/**
 * Type name used in diagnostics.
 */
export function typeName(value: ForgeValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'string';
  if (Array.isArray(value)) return 'list';
  switch (value.__type) {
    case 'char':
      return 'char';
    case 'range':
      return 'range';
    case 'map':
      return 'map';
    case 'function':
      return 'function';
    case 'custom':
      return value.ops.typeName;
  }
}

// ============================================================
// STRINGS BY CODE POINT
// ============================================================

/** Split a string into Unicode scalars */
export function codePoints(text: string): string[] {
  return Array.from(text);
}

/** Length in Unicode scalars */
export function codePointLength(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

/** Order two strings by code point, not UTF-16 unit */
export function compareCodePoints(a: string, b: string): number {
  const left = codePoints(a);
  const right = codePoints(b);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    const x = left[i]?.codePointAt(0) ?? 0;
    const y = right[i]?.codePointAt(0) ?? 0;
    if (x !== y) return x - y;
  }
  return left.length - right.length;
}

// ============================================================
// DISPLAY
// ============================================================

const QUOTE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
  ['\0', '\\0'],
  ['\\', '\\\\'],
]);

function quote(text: string, delimiter: '"' | "'"): string {
  let out = delimiter;
  for (const ch of text) {
    out += ch === delimiter ? `\\${ch}` : (QUOTE_ESCAPES.get(ch) ?? ch);
  }
  return out + delimiter;
}

/**
 * Render a value for `print`.
 * Strings and chars print raw at the top level and quoted inside containers.
 */
export function formatValue(value: ForgeValue): string {
  return format(value, false, new Set());
}

/** Like formatValue, but strings and chars are quoted at the top level too */
export function inspectValue(value: ForgeValue): string {
  return format(value, true, new Set());
}

function format(value: ForgeValue, nested: boolean, seen: Set<object>): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'string') return nested ? quote(value, '"') : value;

  if (Array.isArray(value)) {
    if (seen.has(value)) return '[...]';
    seen.add(value);
    const text = `[${value.map((v) => format(v, true, seen)).join(', ')}]`;
    seen.delete(value);
    return text;
  }

  switch (value.__type) {
    case 'char':
      return nested ? quote(value.value, "'") : value.value;
    case 'range':
      return `${value.lo}..${value.hi}`;
    case 'map': {
      if (value.size === 0) return '[:]';
      if (seen.has(value)) return '[...]';
      seen.add(value);
      const parts = value
        .entries()
        .map(([k, v]) => `${format(k, true, seen)}: ${format(v, true, seen)}`);
      seen.delete(value);
      return `[${parts.join(', ')}]`;
    }
    case 'function':
      return value.kind === 'script'
        ? `<function(${value.params.join(', ')})>`
        : `<native ${value.name}>`;
    case 'custom':
      return value.ops.display
        ? value.ops.display(value.payload)
        : `<${value.ops.typeName}>`;
  }
}

// ============================================================
// COPYING
// ============================================================

/**
 * Deep copy of lists and maps, transitively. Other values are returned
 * as they are: scalars and strings are immutable, and functions and custom
 * values keep their identity. Shared or cyclic structure is preserved in
 * the copy.
 */
export function deepClone(value: ForgeValue): ForgeValue {
  return cloneInto(value, new Map());
}

function cloneInto(value: ForgeValue, copies: Map<object, ForgeValue>): ForgeValue {
  if (Array.isArray(value)) {
    const existing = copies.get(value);
    if (existing !== undefined) return existing;
    const copy: ForgeValue[] = [];
    copies.set(value, copy);
    for (const item of value) copy.push(cloneInto(item, copies));
    return copy;
  }
  if (value instanceof ForgeMap) {
    const existing = copies.get(value);
    if (existing !== undefined) return existing;
    const copy = new ForgeMap();
    copies.set(value, copy);
    for (const [k, v] of value.entries()) copy.set(cloneInto(k, copies), cloneInto(v, copies));
    return copy;
  }
  return value;
}
