export { cellAt, parseInput, type Grid } from './grid.js';
export { checkDirection, countXmasAtPosition, DIRECTIONS, solvePart1, TARGET } from './word-search.js';
