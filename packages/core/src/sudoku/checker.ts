/**
 * Validates a filled grid against the puzzle it claims to solve
 */

import { BLOCK_SIZE, GRID_SIZE, EMPTY_CELL } from '../internal';
import { isGridShape, type Grid } from './grid';

function hasDuplicates(values: number[]): boolean {
  return new Set(values).size !== values.length;
}

/**
 * True when `solution` keeps every given of `initial`, holds only 1..9,
 * and no row, column or block repeats a value. Malformed input is false.
 */
export function checkField(initial: Grid, solution: Grid): boolean {
  if (!isGridShape(initial) || !isGridShape(solution)) return false;

  for (let r = 0; r < GRID_SIZE; r++) {
    for (let c = 0; c < GRID_SIZE; c++) {
      const v = solution[r][c];
      if (v <= EMPTY_CELL || v > GRID_SIZE) return false;
      const given = initial[r][c];
      if (given !== EMPTY_CELL && given !== v) return false;
    }
  }

  for (let r = 0; r < GRID_SIZE; r++) {
    if (hasDuplicates(solution[r])) return false;
  }

  for (let c = 0; c < GRID_SIZE; c++) {
    if (hasDuplicates(solution.map(row => row[c]))) return false;
  }

  for (let br = 0; br < GRID_SIZE; br += BLOCK_SIZE) {
    for (let bc = 0; bc < GRID_SIZE; bc += BLOCK_SIZE) {
      const block: number[] = [];
      for (let i = 0; i < BLOCK_SIZE; i++) {
        for (let j = 0; j < BLOCK_SIZE; j++) {
          block.push(solution[br + i][bc + j]);
        }
      }
      if (hasDuplicates(block)) return false;
    }
  }

  return true;
}
