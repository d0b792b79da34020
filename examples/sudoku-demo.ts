/**
 * Sudoku demo - check and solve a 9×9 grid
 */

import { parseGrid, formatGrid, solveSudoku, checkField } from '../packages/core/src/index';

console.log('=== slotvec: sudoku ===\n');

// Every 1 and 2 blanked out of a rotated-rows grid: two completions
const puzzle = parseGrid(`
  ..3456789
  456789..3
  789..3456
  .3456789.
  56789..34
  89..34567
  3456789..
  6789..345
  9..345678
`);

console.log('Puzzle:');
console.log(formatGrid(puzzle));

const { count, solution } = solveSudoku(puzzle);
console.log(`\nCompletions: ${count}`);

if (solution) {
  console.log('First completion:');
  console.log(formatGrid(solution));
  console.log('Valid:', checkField(puzzle, solution) ? '✅' : '❌');
}

const capped = solveSudoku(parseGrid('.'.repeat(81)), { limit: 5 });
console.log(`\nEmpty grid, stopping at 5: ${capped.count} completions counted`);
