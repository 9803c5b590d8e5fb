export { parseInput, type Report } from './parser.js';
export { isSafe, isSafeFunctional, isSafeWithDampener } from './safety.js';
export { solvePart1, solvePart1Functional, solvePart2 } from './solve.js';
