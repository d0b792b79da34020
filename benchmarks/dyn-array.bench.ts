/**
 * Benchmark: DynArray vs native arrays vs Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { DynArray } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;

function createArray(size: number): number[] {
  return Array.from({ length: size }, (_, i) => i);
}

// ===== Push =====
describe('Push 10000 items', () => {
  bench('Native', () => {
    const arr: number[] = [];
    for (let i = 0; i < 10000; i++) arr.push(i);
    return arr;
  });

  bench('DynArray', () => {
    const arr = new DynArray<number>();
    for (let i = 0; i < 10000; i++) arr.pushBack(i);
    return arr;
  });

  bench('DynArray (reserved)', () => {
    const arr = new DynArray<number>();
    arr.reserve(10000);
    for (let i = 0; i < 10000; i++) arr.pushBack(i);
    return arr;
  });
});

// ===== Insert in the middle =====
describe('Insert 10 items at index 500', () => {
  const native = createArray(SIZE);
  const dyn = DynArray.from(native);

  bench('Native (copy + splice)', () => {
    const copy = native.slice();
    copy.splice(500, 0, ...new Array<number>(10).fill(7));
    return copy;
  });

  bench('DynArray (clone + insert)', () => {
    const copy = dyn.clone();
    copy.insert(500, 10, 7);
    return copy;
  });

  bench('Immer produce()', () => {
    return immerProduce(native, draft => {
      draft.splice(500, 0, ...new Array<number>(10).fill(7));
    });
  });
});

// ===== Erase a range =====
describe('Erase [100, 900) from 1000 items', () => {
  const native = createArray(SIZE);
  const dyn = DynArray.from(native);

  bench('Native (copy + splice)', () => {
    const copy = native.slice();
    copy.splice(100, 800);
    return copy;
  });

  bench('DynArray (clone + erase)', () => {
    const copy = dyn.clone();
    copy.erase(100, 900);
    return copy;
  });

  bench('Immer produce()', () => {
    return immerProduce(native, draft => {
      draft.splice(100, 800);
    });
  });
});

// ===== Compare =====
describe('Compare two equal 1000-item arrays', () => {
  const a = DynArray.from(createArray(SIZE));
  const b = a.clone();
  const na = createArray(SIZE);
  const nb = createArray(SIZE);

  bench('Native (every)', () => {
    return na.length === nb.length && na.every((v, i) => v === nb[i]);
  });

  bench('DynArray equals()', () => {
    return a.equals(b);
  });
});
