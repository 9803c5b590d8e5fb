import type { Report } from './parser.js';

const MIN_STEP = 1;
const MAX_STEP = 3;

/**
 * A report is safe when it moves strictly in one direction and every step changes the level by 1 to 3.
 * Single pass; stops at the first bad step.
 */
export function isSafe(report: Report): boolean {
  let increasing: boolean | undefined;

  for (let i = 1; i < report.length; i++) {
    const diff = (report[i] ?? 0) - (report[i - 1] ?? 0);
    const step = Math.abs(diff);
    if (step < MIN_STEP || step > MAX_STEP) {
      return false;
    }

    const rising = diff > 0;
    if (increasing === undefined) {
      increasing = rising;
    } else if (increasing !== rising) {
      return false;
    }
  }

  return true;
}

/** Same predicate as {@link isSafe}, computed from the full list of differences. */
export function isSafeFunctional(report: Report): boolean {
  const diffs = report.slice(1).map((level, i) => level - (report[i] ?? level));

  const inRange = diffs.every((d) => Math.abs(d) >= MIN_STEP && Math.abs(d) <= MAX_STEP);
  const monotonic = diffs.every((d) => d > 0) || diffs.every((d) => d < 0);

  return inRange && monotonic;
}

/**
 * Safe as is, or safe once any single level is removed.
 */
export function isSafeWithDampener(report: Report): boolean {
  if (isSafe(report)) {
    return true;
  }
  return report.some((_, skip) => isSafe(report.filter((__, i) => i !== skip)));
}
