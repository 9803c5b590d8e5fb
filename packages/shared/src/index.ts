export * from './errors.js';
export * from './input.js';
export * from './numbers.js';
export * from './solver.js';
export * from './zod-utils.js';
