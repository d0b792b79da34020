/**
 * Slots - owned contiguous storage with power-of-two capacity
 *
 * Every function edits the record in place. Reallocation builds the new
 * buffer completely before touching `size`, `capacity` or `buf`, so a
 * throw during allocation leaves the record as it was.
 */

import type { Slots } from './types';
import { nextPow2 } from './utils';

export function slotsEmpty<T>(): Slots<T> {
  return { size: 0, capacity: 0, buf: null };
}

export function slotsFilled<T>(count: number, value: T): Slots<T> {
  const capacity = nextPow2(count);
  if (capacity === 0) return slotsEmpty();
  const buf = new Array<T>(capacity);
  buf.fill(value, 0, count);
  return { size: count, capacity, buf };
}

// Narrowing copy: capacity is recomputed from the live size
export function slotsCopy<T>(src: Slots<T>): Slots<T> {
  const capacity = nextPow2(src.size);
  if (capacity === 0 || src.buf === null) return slotsEmpty();
  const buf = new Array<T>(capacity);
  for (let i = 0; i < src.size; i++) {
    buf[i] = src.buf[i];
  }
  return { size: src.size, capacity, buf };
}

/**
 * Move the live range into a fresh buffer of `capacity` slots.
 * `capacity` must be 0 or a power of two ≥ size.
 */
export function slotsRealloc<T>(s: Slots<T>, capacity: number): void {
  if (capacity === s.capacity) return;
  if (capacity === 0) {
    s.buf = null;
    s.capacity = 0;
    return;
  }
  const buf = new Array<T>(capacity);
  const old = s.buf;
  if (old !== null) {
    for (let i = 0; i < s.size; i++) {
      buf[i] = old[i];
    }
  }
  s.buf = buf;
  s.capacity = capacity;
}

// Grow so that `required` elements fit
export function slotsEnsure<T>(s: Slots<T>, required: number): T[] {
  if (required > s.capacity) {
    slotsRealloc(s, nextPow2(required));
  }
  // required > 0 here whenever callers write, so buf is allocated
  if (s.buf === null) {
    throw new RangeError('Storage not allocated');
  }
  return s.buf;
}

export function slotsPush<T>(s: Slots<T>, value: T): void {
  const buf = slotsEnsure(s, s.size + 1);
  buf[s.size] = value;
  s.size++;
}

export function slotsPop<T>(s: Slots<T>): T {
  if (s.size === 0 || s.buf === null) {
    throw new RangeError('Cannot pop from an empty array');
  }
  s.size--;
  return s.buf[s.size];
}

/**
 * Open a gap of `count` slots at `pos` and fill it with `value`.
 * On growth the gap is laid out directly in the new buffer.
 */
export function slotsInsertFill<T>(s: Slots<T>, pos: number, count: number, value: T): void {
  if (count === 0) return;
  const { size } = s;
  const newSize = size + count;

  if (newSize > s.capacity) {
    const capacity = nextPow2(newSize);
    const buf = new Array<T>(capacity);
    const old = s.buf;
    if (old !== null) {
      for (let i = 0; i < pos; i++) buf[i] = old[i];
      for (let i = pos; i < size; i++) buf[i + count] = old[i];
    }
    buf.fill(value, pos, pos + count);
    s.buf = buf;
    s.capacity = capacity;
    s.size = newSize;
    return;
  }

  const buf = slotsEnsure(s, newSize);
  buf.copyWithin(pos + count, pos, size);
  buf.fill(value, pos, pos + count);
  s.size = newSize;
}

// Remove [first, last); capacity is kept
export function slotsErase<T>(s: Slots<T>, first: number, last: number): void {
  if (first === last || s.buf === null) return;
  s.buf.copyWithin(first, last, s.size);
  s.size -= last - first;
}

export function slotsResize<T>(s: Slots<T>, size: number, fill: () => T): void {
  if (size <= s.size) {
    s.size = size;
    return;
  }
  const value = fill();
  slotsInsertFill(s, s.size, size - s.size, value);
}

export function slotsReserve<T>(s: Slots<T>, capacity: number): void {
  if (capacity <= s.capacity) return;
  slotsRealloc(s, nextPow2(capacity));
}

export function slotsShrink<T>(s: Slots<T>): void {
  slotsRealloc(s, nextPow2(s.size));
}

export function slotsClear<T>(s: Slots<T>): void {
  s.size = 0;
  slotsRealloc(s, 0);
}

// O(1): exchanges ownership, never copies elements
export function slotsSwap<T>(a: Slots<T>, b: Slots<T>): void {
  const { size, capacity, buf } = a;
  a.size = b.size;
  a.capacity = b.capacity;
  a.buf = b.buf;
  b.size = size;
  b.capacity = capacity;
  b.buf = buf;
}

export function* slotsIter<T>(s: Slots<T>): IterableIterator<T> {
  const { buf } = s;
  if (buf === null) return;
  for (let i = 0; i < s.size; i++) {
    yield buf[i];
  }
}
