import { performance } from 'node:perf_hooks';

import { getLogger } from '@advent/logger';
import type { Result } from 'neverthrow';

import type { PuzzleError } from './errors.js';

/** Every day's answer is a pure function of the raw puzzle text. */
export type Solver = (input: string) => Result<number, PuzzleError>;

export interface SolverInfo {
  day: number;
  part: 1 | 2;
  /** Distinguishes alternative implementations of the same part, e.g. `naive`. */
  variant?: string | undefined;
}

export function dayCategory(day: number): string {
  return `day${String(day).padStart(2, '0')}`;
}

/**
 * Wraps a solver so each call logs its outcome under the day's category. The result is passed
 * through untouched.
 */
export function defineSolver<TArgs extends unknown[]>(
  info: SolverInfo,
  solve: (input: string, ...args: TArgs) => Result<number, PuzzleError>
): (input: string, ...args: TArgs) => Result<number, PuzzleError> {
  const logger = getLogger(dayCategory(info.day)).child({
    part: info.part,
    variant: info.variant ?? 'default',
  });

  return (input, ...args) => {
    const startedAt = performance.now();
    const result = solve(input, ...args);
    const durationMs = Number((performance.now() - startedAt).toFixed(3));

    if (result.isErr()) {
      logger.warn({ code: result.error.code, error: result.error.message, durationMs }, 'Solve failed');
    } else {
      logger.debug({ answer: result.value, durationMs, inputLength: input.length }, 'Solved');
    }

    return result;
  };
}
