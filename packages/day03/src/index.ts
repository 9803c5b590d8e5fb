export {
  extractEnabledMulInstructions,
  extractMulInstructions,
  solvePart1,
  solvePart2,
  type MulInstruction,
} from './instructions.js';
