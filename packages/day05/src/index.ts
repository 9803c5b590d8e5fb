export type { PrintQueue, Rule, Sequence } from './types.js';
export { parseInput, parseRule, parseSequence } from './parser.js';
export { isValidSequence, isValidSequenceNaive, type RuleLookup } from './validation.js';
export { getMiddlePage } from './middle-page.js';
export { SolveOptionsSchema, type SolveOptions, type SolveOptionsInput } from './schemas.js';
export { solve, solvePart1, solvePart1Naive } from './solve.js';
