import { defineSolver } from '@advent/shared';

import { parseInput } from './parser.js';

const ascending = (a: number, b: number) => a - b;

export function buildFrequencyMap(nums: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const num of nums) {
    counts.set(num, (counts.get(num) ?? 0) + 1);
  }
  return counts;
}

/**
 * Pairs the smallest left id with the smallest right id, and so on, and sums the gaps.
 */
export const solvePart1 = defineSolver({ day: 1, part: 1 }, (input: string) =>
  parseInput(input).map(({ left, right }) => {
    const sortedLeft = [...left].sort(ascending);
    const sortedRight = [...right].sort(ascending);
    return sortedLeft.reduce((total, value, index) => total + Math.abs(value - (sortedRight[index] ?? value)), 0);
  })
);

/**
 * Similarity score: each left id times the number of times it appears in the right list. Counting
 * both sides first makes this linear; repeated left ids are folded into one multiplication.
 */
export const solvePart2 = defineSolver({ day: 1, part: 2 }, (input: string) =>
  parseInput(input).map(({ left, right }) => {
    const rightCounts = buildFrequencyMap(right);
    let score = 0;
    for (const [value, leftCount] of buildFrequencyMap(left)) {
      score += value * leftCount * (rightCounts.get(value) ?? 0);
    }
    return score;
  })
);

/** Compares every left id with every right id. */
export const solvePart2Naive = defineSolver({ day: 1, part: 2, variant: 'naive' }, (input: string) =>
  parseInput(input).map(({ left, right }) => {
    let score = 0;
    for (const leftValue of left) {
      for (const rightValue of right) {
        if (leftValue === rightValue) score += leftValue;
      }
    }
    return score;
  })
);
