import { parseLines } from '@advent/shared';

export type Grid = readonly (readonly string[])[];

/** Rows of single characters; rows may differ in length. */
export function parseInput(input: string): Grid {
  return parseLines(input).map((line) => Array.from(line));
}

export function cellAt(grid: Grid, row: number, col: number): string | undefined {
  if (row < 0 || col < 0) return undefined;
  return grid[row]?.[col];
}
