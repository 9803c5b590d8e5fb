import { defineSolver } from '@advent/shared';

import { parseInput, type Report } from './parser.js';
import { isSafe, isSafeFunctional, isSafeWithDampener } from './safety.js';

const countWhere = (predicate: (report: Report) => boolean) => (input: string) =>
  parseInput(input).map((reports) => reports.filter(predicate).length);

export const solvePart1 = defineSolver({ day: 2, part: 1 }, countWhere(isSafe));

export const solvePart1Functional = defineSolver(
  { day: 2, part: 1, variant: 'functional' },
  countWhere(isSafeFunctional)
);

export const solvePart2 = defineSolver({ day: 2, part: 2 }, countWhere(isSafeWithDampener));
