export { parseInput, type LocationLists } from './parser.js';
export { buildFrequencyMap, solvePart1, solvePart2, solvePart2Naive } from './similarity.js';
