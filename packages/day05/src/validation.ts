import type { Rule, Sequence } from './types.js';

/** How the pairwise check finds a rule for a pair of pages. */
export type RuleLookup = 'scan' | 'indexed';

/**
 * Checks a sequence against precedence rules in O(n + r).
 *
 * Only the extremes matter: a rule holds when the last occurrence of `before` comes before the first
 * occurrence of `after`, so one pass records first and last positions per page and each rule is then
 * a pair of lookups. Rules naming a page the sequence lacks hold vacuously.
 */
export function isValidSequence(sequence: Sequence, rules: readonly Rule[]): boolean {
  const firstPos = new Map<number, number>();
  const lastPos = new Map<number, number>();

  sequence.forEach((page, index) => {
    if (!firstPos.has(page)) {
      firstPos.set(page, index);
    }
    lastPos.set(page, index);
  });

  return rules.every(([before, after]) => {
    const lastBefore = lastPos.get(before);
    const firstAfter = firstPos.get(after);
    if (lastBefore === undefined || firstAfter === undefined) {
      return true;
    }
    // x|x can only hold when x occurs once
    if (before === after) {
      return firstPos.get(before) === lastBefore;
    }
    return lastBefore < firstAfter;
  });
}

/**
 * Reference check: for every pair of positions i < j, the sequence is invalid if some rule says
 * `sequence[j]` must come before `sequence[i]`.
 *
 * With `'scan'` every pair walks the whole rule list, O(n² · r). `'indexed'` builds a before → afters
 * map once and makes each pair a lookup, O(n² + r).
 */
export function isValidSequenceNaive(
  sequence: Sequence,
  rules: readonly Rule[],
  ruleLookup: RuleLookup = 'scan'
): boolean {
  const mustPrecede = ruleLookup === 'indexed' ? indexRules(rules) : scanRules(rules);

  for (let i = 0; i < sequence.length; i++) {
    for (let j = i + 1; j < sequence.length; j++) {
      const earlier = sequence[i];
      const later = sequence[j];
      if (earlier === undefined || later === undefined) continue;
      if (mustPrecede(later, earlier)) {
        return false;
      }
    }
  }

  return true;
}

function scanRules(rules: readonly Rule[]): (before: number, after: number) => boolean {
  return (page, other) => rules.some(([before, after]) => before === page && after === other);
}

function indexRules(rules: readonly Rule[]): (before: number, after: number) => boolean {
  const afters = new Map<number, Set<number>>();
  for (const [before, after] of rules) {
    const set = afters.get(before) ?? new Set<number>();
    set.add(after);
    afters.set(before, set);
  }
  return (page, other) => afters.get(page)?.has(other) ?? false;
}
