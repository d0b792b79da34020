/**
 * Element ordering and lexicographic comparison over live ranges
 */

import type { Comparator, Slots } from './types';

/**
 * Natural order for primitives of the same type.
 * Values that are `Object.is`-equal compare as 0; anything else is unordered.
 */
export function defaultCompare(a: unknown, b: unknown): number {
  if (Object.is(a, b)) return 0;
  if (typeof a === 'number' && typeof b === 'number') {
    if (a < b) return -1;
    if (a > b) return 1;
    // 0 vs -0; NaN falls through as unordered
    if (a === b) return 0;
  } else if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : 1;
  } else if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : 1;
  } else if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a ? 1 : -1;
  }
  throw new TypeError(`No natural ordering between ${String(a)} and ${String(b)}`);
}

/**
 * Three-way lexicographic comparison; a proper prefix compares as less.
 * Capacity never takes part.
 */
export function slotsCompare<T>(a: Slots<T>, b: Slots<T>, cmp: Comparator<T>): number {
  const n = Math.min(a.size, b.size);
  const ab = a.buf;
  const bb = b.buf;
  if (n > 0 && ab !== null && bb !== null) {
    for (let i = 0; i < n; i++) {
      const c = cmp(ab[i], bb[i]);
      if (c !== 0) return c < 0 ? -1 : 1;
    }
  }
  if (a.size === b.size) return 0;
  return a.size < b.size ? -1 : 1;
}
