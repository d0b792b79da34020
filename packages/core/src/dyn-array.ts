/**
 * DynArray - growable contiguous array with power-of-two capacity
 *
 * - Growth goes to the next power of two ≥ the required size
 * - Capacity only shrinks through shrinkToFit() and clear()
 * - Copies are deep and narrowing; swap() is O(1)
 *
 * Not safe for concurrent mutation; callers serialize access themselves.
 */

import {
  type Slots,
  type Comparator,
  type DynArrayOptions,
  assertCount,
  assertIndex,
  defaultCompare,
  slotsEmpty,
  slotsFilled,
  slotsCopy,
  slotsPush,
  slotsPop,
  slotsInsertFill,
  slotsErase,
  slotsResize,
  slotsReserve,
  slotsShrink,
  slotsClear,
  slotsSwap,
  slotsIter,
  slotsCompare,
} from './internal';

export class DynArray<T> implements Iterable<T> {
  private readonly slots: Slots<T>;
  private readonly options: DynArrayOptions<T>;

  constructor(options: DynArrayOptions<T> = {}) {
    this.slots = slotsEmpty();
    this.options = options;
  }

  // =====================================================
  // Construction
  // =====================================================

  /**
   * `count` copies of `value`; capacity is the next power of two ≥ count.
   */
  static filled<T>(count: number, value: T, options?: DynArrayOptions<T>): DynArray<T> {
    assertCount(count, 'count');
    const arr = new DynArray<T>(options);
    arr.adopt(slotsFilled(count, value));
    return arr;
  }

  static from<T>(items: Iterable<T>, options?: DynArrayOptions<T>): DynArray<T> {
    const arr = new DynArray<T>(options);
    for (const item of items) {
      slotsPush(arr.slots, item);
    }
    return arr;
  }

  static of<T>(...items: T[]): DynArray<T> {
    return DynArray.from(items);
  }

  /**
   * Three-way comparison usable as an `Array.prototype.sort` callback.
   */
  static compare<T>(a: DynArray<T>, b: DynArray<T>): number {
    return a.compare(b);
  }

  /**
   * Independent copy of the live range. Capacity is narrowed to the next
   * power of two ≥ size, so excess capacity is never carried over.
   */
  clone(): DynArray<T> {
    const copy = new DynArray<T>(this.options);
    copy.adopt(slotsCopy(this.slots));
    return copy;
  }

  /**
   * Copy-assignment: build the copy first, then swap it in.
   * Assigning an array to itself leaves it unchanged.
   */
  assign(other: DynArray<T>): this {
    if (other === this) return this;
    const tmp = other.clone();
    this.swap(tmp);
    return this;
  }

  private adopt(slots: Slots<T>): void {
    slotsSwap(this.slots, slots);
  }

  // =====================================================
  // Accessors
  // =====================================================

  get size(): number {
    return this.slots.size;
  }

  get capacity(): number {
    return this.slots.capacity;
  }

  get empty(): boolean {
    return this.slots.size === 0;
  }

  /**
   * Unchecked read. Out-of-range indices are caller error: they yield
   * `undefined` or a stale slot value.
   */
  get(index: number): T | undefined {
    return this.slots.buf?.[index];
  }

  /** Checked read. */
  at(index: number): T {
    const { buf, size } = this.slots;
    if (buf === null || size === 0) {
      throw new RangeError(`Index ${index} out of range for empty array`);
    }
    assertIndex(index, 0, size - 1);
    return buf[index];
  }

  /** Checked write; the index must address a live element. */
  set(index: number, value: T): void {
    const { buf, size } = this.slots;
    if (buf === null || size === 0) {
      throw new RangeError(`Index ${index} out of range for empty array`);
    }
    assertIndex(index, 0, size - 1);
    buf[index] = value;
  }

  front(): T {
    return this.at(0);
  }

  back(): T {
    return this.at(this.slots.size - 1);
  }

  /**
   * The owned storage (`capacity` slots, the first `size` live), or `null`
   * when nothing is allocated. Reads and writes go straight to the buffer.
   * Only write indices below `size`; changing the array's length or writing
   * at or past `capacity` breaks the container. The reference goes stale
   * after any operation that changes capacity, and after swap() or assign().
   */
  data(): T[] | null {
    return this.slots.buf;
  }

  // =====================================================
  // Mutators
  // =====================================================

  pushBack(value: T): void {
    slotsPush(this.slots, value);
  }

  popBack(): T {
    return slotsPop(this.slots);
  }

  /**
   * Insert `value` before `pos`, or `count` copies of it.
   */
  insert(pos: number, value: T): void;
  insert(pos: number, count: number, value: T): void;
  insert(pos: number, ...rest: [value: T] | [count: number, value: T]): void {
    assertIndex(pos, 0, this.slots.size);
    if (rest.length === 1) {
      slotsInsertFill(this.slots, pos, 1, rest[0]);
      return;
    }
    const [count, value] = rest;
    assertCount(count, 'count');
    slotsInsertFill(this.slots, pos, count, value);
  }

  /**
   * Remove the element at `first`, or the range [first, last).
   */
  erase(first: number, last?: number): void {
    const { size } = this.slots;
    if (last === undefined) {
      if (size === 0) {
        throw new RangeError(`Index ${first} out of range for empty array`);
      }
      assertIndex(first, 0, size - 1);
      slotsErase(this.slots, first, first + 1);
      return;
    }
    assertIndex(first, 0, size);
    assertIndex(last, first, size);
    slotsErase(this.slots, first, last);
  }

  /**
   * Truncate, or extend with copies of `value` (or the `defaultValue`
   * option when no value is given).
   */
  resize(size: number): void;
  resize(size: number, value: T): void;
  resize(size: number, ...rest: [] | [value: T]): void {
    assertCount(size, 'size');
    if (rest.length === 1) {
      const [value] = rest;
      slotsResize(this.slots, size, () => value);
      return;
    }
    // Only called when extending, before anything is moved
    const fill =
      this.options.defaultValue ??
      ((): never => {
        throw new TypeError('resize() without a value needs the defaultValue option');
      });
    slotsResize(this.slots, size, fill);
  }

  reserve(capacity: number): void {
    assertCount(capacity, 'capacity');
    slotsReserve(this.slots, capacity);
  }

  shrinkToFit(): void {
    slotsShrink(this.slots);
  }

  /** Drop every element and release the buffer. */
  clear(): void {
    slotsClear(this.slots);
  }

  /**
   * Exchange contents with `other` without copying elements.
   * Options stay with their arrays.
   */
  swap(other: DynArray<T>): void {
    slotsSwap(this.slots, other.slots);
  }

  // =====================================================
  // Comparison
  // =====================================================

  /**
   * Lexicographic three-way comparison of the live elements: -1, 0 or 1.
   * All relational helpers below derive from this.
   */
  /**
   * Uses this array's comparator, else the other's, else the default, so
   * `a.compare(b)` and `b.compare(a)` agree when only one side has one.
   */
  compare(other: DynArray<T>): number {
    const cmp: Comparator<T> = this.options.compare ?? other.options.compare ?? defaultCompare;
    return slotsCompare(this.slots, other.slots, cmp);
  }

  equals(other: DynArray<T>): boolean {
    return this.compare(other) === 0;
  }

  lt(other: DynArray<T>): boolean {
    return this.compare(other) < 0;
  }

  le(other: DynArray<T>): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: DynArray<T>): boolean {
    return this.compare(other) > 0;
  }

  ge(other: DynArray<T>): boolean {
    return this.compare(other) >= 0;
  }

  // =====================================================
  // Iteration
  // =====================================================

  [Symbol.iterator](): IterableIterator<T> {
    return slotsIter(this.slots);
  }

  values(): IterableIterator<T> {
    return slotsIter(this.slots);
  }

  toArray(): T[] {
    return [...slotsIter(this.slots)];
  }

  toString(): string {
    return `DynArray(${this.slots.size}/${this.slots.capacity}) [${this.toArray().join(', ')}]`;
  }
}

/**
 * Detect a DynArray instance.
 */
export function isDynArray(value: unknown): value is DynArray<unknown> {
  return value instanceof DynArray;
}
