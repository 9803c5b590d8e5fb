import { parseLines, parseSignedInt, splitWhitespace, type PuzzleError } from '@advent/shared';
import { Result } from 'neverthrow';

export type Report = readonly number[];

export function parseInput(input: string): Result<Report[], PuzzleError> {
  return Result.combine(parseLines(input).map((line) => Result.combine(splitWhitespace(line).map(parseSignedInt))));
}
