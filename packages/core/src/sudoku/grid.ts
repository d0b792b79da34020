/**
 * 9×9 grid helpers: shape guard, parse, format, clone
 */

import { GRID_SIZE, CELL_COUNT, EMPTY_CELL } from '../internal';

// Row-major, GRID_SIZE rows of GRID_SIZE cells; EMPTY_CELL marks a blank
export type Grid = number[][];

export function isGridShape(value: unknown): value is Grid {
  if (!Array.isArray(value) || value.length !== GRID_SIZE) return false;
  for (const row of value) {
    if (!Array.isArray(row) || row.length !== GRID_SIZE) return false;
    for (const cell of row) {
      if (!Number.isInteger(cell)) return false;
    }
  }
  return true;
}

/**
 * Throws unless `value` is a 9×9 grid of integers in 0..9.
 */
export function assertGrid(value: unknown): asserts value is Grid {
  if (!isGridShape(value)) {
    throw new RangeError(`Grid must be ${GRID_SIZE}×${GRID_SIZE} integers`);
  }
  for (let r = 0; r < GRID_SIZE; r++) {
    for (let c = 0; c < GRID_SIZE; c++) {
      const cell = value[r][c];
      if (cell < EMPTY_CELL || cell > GRID_SIZE) {
        throw new RangeError(`Cell (${r}, ${c}) out of range: ${cell}`);
      }
    }
  }
}

export function cloneGrid(grid: Grid): Grid {
  return grid.map(row => row.slice());
}

/**
 * Parse 81 cells in row-major order. Digits 1-9 are givens; `0` and `.`
 * are blanks. Whitespace is ignored.
 */
export function parseGrid(text: string): Grid {
  const cells = text.replace(/\s+/g, '');
  if (cells.length !== CELL_COUNT) {
    throw new RangeError(`Expected ${CELL_COUNT} cells, got ${cells.length}`);
  }
  const grid: Grid = [];
  for (let r = 0; r < GRID_SIZE; r++) {
    const row: number[] = [];
    for (let c = 0; c < GRID_SIZE; c++) {
      const ch = cells[r * GRID_SIZE + c];
      if (ch === '.') {
        row.push(EMPTY_CELL);
      } else if (ch >= '0' && ch <= '9') {
        row.push(ch.charCodeAt(0) - 48);
      } else {
        throw new RangeError(`Invalid cell '${ch}' at (${r}, ${c})`);
      }
    }
    grid.push(row);
  }
  return grid;
}

// One line per row, blanks as '.'
export function formatGrid(grid: Grid): string {
  return grid
    .map(row => row.map(cell => (cell === EMPTY_CELL ? '.' : String(cell))).join(''))
    .join('\n');
}
