/**
 * Exhaustive backtracking over the first empty cell in row-major order
 */

import { BLOCK_SIZE, GRID_SIZE, EMPTY_CELL, assertIndex } from '../internal';
import { DynArray } from '../dyn-array';
import { assertGrid, cloneGrid, type Grid } from './grid';
import { checkField } from './checker';

export interface SolveOptions {
  // Stop once this many completions have been counted
  limit?: number;
}

export interface SolveResult {
  count: number;
  // First completion found, null when there is none
  solution: Grid | null;
}

/**
 * Values 1..9 not yet used in the cell's row, column or block, ascending.
 */
export function candidates(grid: Grid, row: number, col: number): DynArray<number> {
  assertIndex(row, 0, GRID_SIZE - 1);
  assertIndex(col, 0, GRID_SIZE - 1);
  const used = new Array<boolean>(GRID_SIZE + 1).fill(false);
  for (let i = 0; i < GRID_SIZE; i++) {
    used[grid[row][i]] = true;
    used[grid[i][col]] = true;
  }
  const r0 = row - (row % BLOCK_SIZE);
  const c0 = col - (col % BLOCK_SIZE);
  for (let r = r0; r < r0 + BLOCK_SIZE; r++) {
    for (let c = c0; c < c0 + BLOCK_SIZE; c++) {
      used[grid[r][c]] = true;
    }
  }

  const out = new DynArray<number>();
  for (let v = 1; v <= GRID_SIZE; v++) {
    if (!used[v]) out.pushBack(v);
  }
  return out;
}

function findEmpty(grid: Grid): [number, number] | null {
  for (let r = 0; r < GRID_SIZE; r++) {
    for (let c = 0; c < GRID_SIZE; c++) {
      if (grid[r][c] === EMPTY_CELL) return [r, c];
    }
  }
  return null;
}

/**
 * Count the completions of `grid` and return the first one.
 * The input grid is left untouched.
 */
export function solveSudoku(grid: Grid, options: SolveOptions = {}): SolveResult {
  assertGrid(grid);
  const limit = options.limit ?? Infinity;
  if (!(limit >= 1)) {
    throw new RangeError(`Invalid limit: ${limit}`);
  }

  const result: SolveResult = { count: 0, solution: null };
  const work = cloneGrid(grid);

  const search = (): void => {
    const pos = findEmpty(work);
    if (pos === null) {
      // A full grid only counts when it is consistent
      if (checkField(grid, work)) {
        result.count++;
        if (result.solution === null) result.solution = cloneGrid(work);
      }
      return;
    }
    const [row, col] = pos;
    for (const v of candidates(work, row, col)) {
      work[row][col] = v;
      search();
      if (result.count >= limit) break;
    }
    work[row][col] = EMPTY_CELL;
  };

  search();
  return result;
}
