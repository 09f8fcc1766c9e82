/**
 * Value Equality
 *
 * Structural equality used by `==`, `!=` and map key lookup.
 * Lists and maps compare element-wise (maps ignore insertion order),
 * functions by identity, custom values through their `equals` capability.
 */

import type { ForgeValue } from './values.js';

/** Pairs already under comparison; a revisited pair is assumed equal */
type Visiting = Map<object, Set<object>>;

export function valuesEqual(a: ForgeValue, b: ForgeValue): boolean {
  return equals(a, b, new Map());
}

function equals(a: ForgeValue, b: ForgeValue, visiting: Visiting): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    if (enter(a, b, visiting)) return true;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && equals(item, other, visiting);
    });
  }

  if (a.__type === 'custom') {
    return a.ops.equals ? a.ops.equals(a.payload, b) : false;
  }
  if (b.__type === 'custom') {
    return b.ops.equals ? b.ops.equals(b.payload, a) : false;
  }

  switch (a.__type) {
    case 'char':
      return b.__type === 'char' && a.value === b.value;
    case 'range':
      return b.__type === 'range' && a.lo === b.lo && a.hi === b.hi;
    case 'function':
      // Identity only; a === b was handled above
      return false;
    case 'map': {
      if (b.__type !== 'map' || a.size !== b.size) return false;
      if (enter(a, b, visiting)) return true;
      return a.entries().every(([key, value]) => {
        const other = b.get(key);
        return other !== undefined && equals(value, other, visiting);
      });
    }
  }
}

/** Record the pair; true when it was already being compared */
function enter(a: object, b: object, visiting: Visiting): boolean {
  let partners = visiting.get(a);
  if (!partners) {
    partners = new Set();
    visiting.set(a, partners);
  }
  if (partners.has(b)) return true;
  partners.add(b);
  return false;
}
