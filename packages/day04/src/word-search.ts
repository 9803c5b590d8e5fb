import { defineSolver } from '@advent/shared';
import { ok } from 'neverthrow';

import { cellAt, parseInput, type Grid } from './grid.js';

export const TARGET = 'XMAS';

export const DIRECTIONS: readonly (readonly [rowDelta: number, colDelta: number])[] = [
  [0, 1],
  [0, -1],
  [1, 0],
  [-1, 0],
  [1, 1],
  [-1, -1],
  [1, -1],
  [-1, 1],
];

/**
 * Whether {@link TARGET} reads from (startRow, startCol) stepping by the given deltas. Stepping off
 * the grid, or past the end of a shorter row, is a miss.
 */
export function checkDirection(
  grid: Grid,
  startRow: number,
  startCol: number,
  rowDelta: number,
  colDelta: number
): boolean {
  return Array.from(TARGET).every(
    (char, i) => cellAt(grid, startRow + i * rowDelta, startCol + i * colDelta) === char
  );
}

export function countXmasAtPosition(grid: Grid, row: number, col: number): number {
  return DIRECTIONS.filter(([rowDelta, colDelta]) => checkDirection(grid, row, col, rowDelta, colDelta)).length;
}

export const solvePart1 = defineSolver({ day: 4, part: 1 }, (input: string) => {
  const grid = parseInput(input);
  let total = 0;

  grid.forEach((cells, row) => {
    for (let col = 0; col < cells.length; col++) {
      total += countXmasAtPosition(grid, row, col);
    }
  });

  return ok(total);
});
