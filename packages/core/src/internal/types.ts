/**
 * Core type definitions
 */

// Owned contiguous storage of a DynArray
export interface Slots<T> {
  size: number;
  capacity: number;
  // null iff capacity === 0; otherwise buf.length === capacity
  buf: T[] | null;
}

// Three-way element comparison: negative, zero or positive
export type Comparator<T> = (a: T, b: T) => number;

export interface DynArrayOptions<T> {
  compare?: Comparator<T>;
  defaultValue?: () => T;
}
