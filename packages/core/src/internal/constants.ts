/**
 * Core constants for slotvec containers
 */

// Largest power of two a JS array length can hold (max length is 2^32 - 1)
export const MAX_CAPACITY = 2 ** 31;

// Sudoku geometry (9×9 grid of 3×3 blocks)
export const BLOCK_SIZE = 3;
export const GRID_SIZE = BLOCK_SIZE * BLOCK_SIZE; // 9
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;  // 81
export const EMPTY_CELL = 0;
