/**
 * Capacity arithmetic and range guards
 */

import { MAX_CAPACITY } from './constants';

export function isPow2(n: number): boolean {
  return Number.isInteger(n) && n > 0 && 2 ** Math.round(Math.log2(n)) === n;
}

/**
 * Smallest power of two ≥ n, or 0 for n === 0.
 * Every growth and shrink path goes through here.
 */
export function nextPow2(n: number): number {
  assertCount(n, 'size');
  if (n === 0) return 0;
  if (n > MAX_CAPACITY) {
    throw new RangeError(`Capacity ${n} exceeds maximum ${MAX_CAPACITY}`);
  }
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

export function assertCount(n: number, what: string): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Invalid ${what}: ${n}`);
  }
}

// lo ≤ i ≤ hi
export function assertIndex(i: number, lo: number, hi: number): void {
  if (!Number.isInteger(i) || i < lo || i > hi) {
    throw new RangeError(`Index ${i} out of range [${lo}, ${hi}]`);
  }
}
