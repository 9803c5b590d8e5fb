import type { Rule, Sequence } from '../types.js';

// Mulberry32: small deterministic PRNG so generated cases are stable across runs
export function mulberry32(seed: number): () => number {
  let state = seed;
  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface GeneratedCase {
  sequence: Sequence;
  rules: Rule[];
}

/**
 * Random sequences and rule sets over a small page alphabet, so repeats, absent pages and self rules
 * all show up.
 */
export function generateCases(count: number, seed: number, alphabet = 8): GeneratedCase[] {
  const rng = mulberry32(seed);
  const page = () => 1 + Math.floor(rng() * alphabet);

  return Array.from({ length: count }, () => {
    const sequence = Array.from({ length: Math.floor(rng() * 11) }, page);
    const rules = Array.from({ length: Math.floor(rng() * 13) }, (): Rule => [page(), page()]);
    return { sequence, rules };
  });
}

export const SAMPLE_INPUT = `11|22
11|33
22|33
44|11
44|33

44,11,22,33,55
11,44,22
22,11,33
55,44,33
33,22
66,77,88,99`;
