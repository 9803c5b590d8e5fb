import { MalformedLineError, parseSignedInt, splitWhitespace, type PuzzleError } from '@advent/shared';
import { err, ok, type Result } from 'neverthrow';

export interface LocationLists {
  left: number[];
  right: number[];
}

/**
 * Each non-blank line holds a left and a right location id separated by whitespace.
 */
export function parseInput(input: string): Result<LocationLists, PuzzleError> {
  const left: number[] = [];
  const right: number[] = [];

  for (const line of input.split(/\r?\n/)) {
    const tokens = splitWhitespace(line);
    if (tokens.length === 0) continue;

    const [leftToken, rightToken] = tokens;
    if (tokens.length !== 2 || leftToken === undefined || rightToken === undefined) {
      return err(new MalformedLineError(`Line must contain exactly two numbers: '${line}'`, line));
    }

    const leftValue = parseSignedInt(leftToken);
    if (leftValue.isErr()) return err(leftValue.error);
    const rightValue = parseSignedInt(rightToken);
    if (rightValue.isErr()) return err(rightValue.error);

    left.push(leftValue.value);
    right.push(rightValue.value);
  }

  return ok({ left, right });
}
