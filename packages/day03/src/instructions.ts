import { defineSolver } from '@advent/shared';
import { ok } from 'neverthrow';

export type MulInstruction = readonly [x: number, y: number];

const MUL_PATTERN = /mul\((\d{1,3}),(\d{1,3})\)/g;
const INSTRUCTION_PATTERN = /mul\((\d{1,3}),(\d{1,3})\)|do\(\)|don't\(\)/g;

/**
 * Every well-formed `mul(X,Y)` in the corrupted memory, where X and Y have one to three digits.
 */
export function extractMulInstructions(memory: string): MulInstruction[] {
  return Array.from(memory.matchAll(MUL_PATTERN), (match): MulInstruction => [Number(match[1]), Number(match[2])]);
}

/**
 * Like {@link extractMulInstructions}, but `don't()` switches collection off until the next `do()`.
 * Collection starts enabled.
 */
export function extractEnabledMulInstructions(memory: string): MulInstruction[] {
  const instructions: MulInstruction[] = [];
  let enabled = true;

  for (const match of memory.matchAll(INSTRUCTION_PATTERN)) {
    switch (match[0]) {
      case 'do()':
        enabled = true;
        break;
      case "don't()":
        enabled = false;
        break;
      default:
        if (enabled) {
          instructions.push([Number(match[1]), Number(match[2])]);
        }
    }
  }

  return instructions;
}

function sumProducts(instructions: readonly MulInstruction[]): number {
  return instructions.reduce((total, [x, y]) => total + x * y, 0);
}

export const solvePart1 = defineSolver({ day: 3, part: 1 }, (input: string) =>
  ok(sumProducts(extractMulInstructions(input)))
);

export const solvePart2 = defineSolver({ day: 3, part: 2 }, (input: string) =>
  ok(sumProducts(extractEnabledMulInstructions(input)))
);
