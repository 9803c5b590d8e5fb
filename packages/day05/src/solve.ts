import { defineSolver, parseOptions, safeSum, type PuzzleError } from '@advent/shared';
import { Result } from 'neverthrow';

import { getMiddlePage } from './middle-page.js';
import { parseInput } from './parser.js';
import { SolveOptionsSchema, type SolveOptions, type SolveOptionsInput } from './schemas.js';
import type { Rule, Sequence } from './types.js';
import { isValidSequence, isValidSequenceNaive } from './validation.js';

type Validator = (sequence: Sequence, rules: readonly Rule[]) => boolean;

function selectValidator(options: SolveOptions): Validator {
  if (options.validator === 'position-map') {
    return isValidSequence;
  }
  return (sequence, rules) => isValidSequenceNaive(sequence, rules, options.ruleLookup);
}

function sumValidMiddlePages(input: string, validator: Validator): Result<number, PuzzleError> {
  return parseInput(input).andThen(({ rules, sequences }) =>
    Result.combine(sequences.filter((sequence) => validator(sequence, rules)).map(getMiddlePage)).andThen(safeSum)
  );
}

/**
 * Sum of the middle pages of every sequence that satisfies all rules, using the validator the options
 * select. Invalid options fail before the input is parsed.
 */
export const solve = defineSolver(
  { day: 5, part: 1, variant: 'configurable' },
  (input: string, options: SolveOptionsInput = {}): Result<number, PuzzleError> =>
    parseOptions(SolveOptionsSchema, options).andThen((parsed) =>
      sumValidMiddlePages(input, selectValidator(parsed))
    )
);

export const solvePart1 = defineSolver({ day: 5, part: 1 }, (input: string) =>
  sumValidMiddlePages(input, isValidSequence)
);

export const solvePart1Naive = defineSolver({ day: 5, part: 1, variant: 'naive' }, (input: string) =>
  sumValidMiddlePages(input, isValidSequenceNaive)
);
