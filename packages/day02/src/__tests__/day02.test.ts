import { NumberFormatError } from '@advent/shared';
import { describe, expect, it } from 'vitest';

import { parseInput, type Report } from '../parser.js';
import { isSafe, isSafeFunctional, isSafeWithDampener } from '../safety.js';
import { solvePart1, solvePart1Functional, solvePart2 } from '../solve.js';

const SAMPLE = `10 8 7 5
2 3 8 9
9 6 5 1
3 5 4 6
6 6 4 2
4 5 7 10`;

describe('parseInput', () => {
  it('should parse each non-blank line into a report', () => {
    expect(parseInput('1 2 3\n\n4   5 6\n')._unsafeUnwrap()).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('should fail on a non-numeric level', () => {
    expect(parseInput('1 2 x')._unsafeUnwrapErr()).toBeInstanceOf(NumberFormatError);
  });
});

const safetyCases: [Report, boolean][] = [
  [[10, 8, 7, 5], true],
  [[2, 3, 8, 9], false],
  [[9, 6, 5, 1], false],
  [[3, 5, 4, 6], false],
  [[6, 6, 4, 2], false],
  [[4, 5, 7, 10], true],
  [[], true],
  [[1], true],
  [[1, 2], true],
  [[1, 5], false],
  [[5, 5], false],
];

describe('isSafe', () => {
  it('should require a steady direction and steps of 1 to 3', () => {
    for (const [report, expected] of safetyCases) {
      expect(isSafe(report), JSON.stringify(report)).toBe(expected);
    }
  });
});

describe('isSafeFunctional', () => {
  it('should agree with the single-pass check', () => {
    for (const [report, expected] of safetyCases) {
      expect(isSafeFunctional(report), JSON.stringify(report)).toBe(expected);
    }
  });
});

describe('isSafeWithDampener', () => {
  it('should tolerate removing one bad level', () => {
    const cases: [Report, boolean][] = [
      [[10, 8, 7, 5], true],
      [[2, 3, 8, 9], false],
      [[9, 6, 5, 1], true],
      [[3, 5, 4, 6], true],
      [[6, 6, 4, 2], true],
      [[4, 5, 7, 10], true],
      [[], true],
      [[1, 5], true],
      [[5, 5], true],
      [[1, 4, 3], true],
      [[1, 9, 2, 8], false],
    ];

    for (const [report, expected] of cases) {
      expect(isSafeWithDampener(report), JSON.stringify(report)).toBe(expected);
    }
  });
});

describe('solvers', () => {
  it('should count safe reports with both part 1 variants', () => {
    expect(solvePart1(SAMPLE)._unsafeUnwrap()).toBe(2);
    expect(solvePart1Functional(SAMPLE)._unsafeUnwrap()).toBe(2);
  });

  it('should count dampened safe reports for part 2', () => {
    expect(solvePart2(SAMPLE)._unsafeUnwrap()).toBe(5);
  });

  it('should propagate parse errors', () => {
    expect(solvePart1('1 2\n3 four').isErr()).toBe(true);
  });
});
