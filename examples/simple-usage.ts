/**
 * Simple usage - DynArray capacity policy and copies
 */

import { DynArray } from '../packages/core/src/index';

console.log('=== slotvec: DynArray ===\n');

// ===== Growth =====
console.log('1️⃣ Capacity grows to the next power of two');
const arr = new DynArray<number>();
for (let i = 0; i < 5; i++) {
  arr.pushBack(i);
  console.log(`push ${i} → size ${arr.size}, capacity ${arr.capacity}`);
}

// ===== Fill =====
console.log('\n2️⃣ Filled construction');
const words = DynArray.filled(10, 'hello');
console.log(String(words));

// ===== No shrink =====
console.log('\n3️⃣ Erase keeps capacity, shrinkToFit gives it back');
words.erase(6, 10);
console.log('after erase(6, 10):', words.size, words.capacity);
words.shrinkToFit();
console.log('after shrinkToFit():', words.size, words.capacity);

// ===== Narrowing copy =====
console.log('\n4️⃣ Copies are deep and narrowed');
const big = DynArray.filled(10, 'x');
big.erase(6, 10);
const copy = big.clone();
console.log('source capacity:', big.capacity, 'copy capacity:', copy.capacity);
copy.set(0, 'changed');
console.log('source[0]:', big.get(0), 'copy[0]:', copy.get(0));

// ===== Swap =====
console.log('\n5️⃣ swap() moves buffers, not elements');
const a = DynArray.of(1, 2, 3);
const b = DynArray.filled(9, 0);
const aData = a.data();
a.swap(b);
console.log('b owns a\'s old buffer:', b.data() === aData);

// ===== Ordering =====
console.log('\n6️⃣ Lexicographic ordering');
console.log('[] < [0]:', new DynArray<number>().lt(DynArray.of(0)));
console.log('[1, 2] vs [1, 3]:', DynArray.of(1, 2).compare(DynArray.of(1, 3)));
