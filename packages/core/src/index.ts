/**
 * slotvec – growable contiguous arrays with power-of-two capacity
 *
 * - DynArray<T>          → owned buffer, explicit capacity policy
 * - DynArray.filled(...) → n copies of a value
 * - clone() / assign()   → deep, narrowing copies
 * - checkField / solveSudoku → 9×9 puzzle checker and backtracking solver
 */

// =====================================================
// Container
// =====================================================

export { DynArray, isDynArray } from './dyn-array';
export type { Comparator, DynArrayOptions } from './internal';
export { nextPow2, isPow2, defaultCompare, MAX_CAPACITY } from './internal';

// =====================================================
// Sudoku
// =====================================================

export { checkField } from './sudoku/checker';
export { candidates, solveSudoku, type SolveOptions, type SolveResult } from './sudoku/solver';
export { parseGrid, formatGrid, cloneGrid, assertGrid, isGridShape, type Grid } from './sudoku/grid';
