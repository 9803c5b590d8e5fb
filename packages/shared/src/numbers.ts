import { err, ok, type Result } from 'neverthrow';

import { NumberFormatError, OverflowError } from './errors.js';

const UNSIGNED = /^\+?\d+$/;
const SIGNED = /^[+-]?\d+$/;

/**
 * Parses a trimmed token of decimal digits with an optional leading `+`. A minus sign, fractions and
 * values past `Number.MAX_SAFE_INTEGER` are rejected.
 */
export function parseUnsignedInt(token: string): Result<number, NumberFormatError> {
  const trimmed = token.trim();
  if (!UNSIGNED.test(trimmed)) {
    return err(new NumberFormatError(trimmed, 'unsigned'));
  }
  return toSafeInteger(trimmed, 'unsigned');
}

/**
 * Parses a trimmed token of decimal digits with an optional leading sign.
 */
export function parseSignedInt(token: string): Result<number, NumberFormatError> {
  const trimmed = token.trim();
  if (!SIGNED.test(trimmed)) {
    return err(new NumberFormatError(trimmed, 'signed'));
  }
  return toSafeInteger(trimmed, 'signed');
}

function toSafeInteger(token: string, kind: 'unsigned' | 'signed'): Result<number, NumberFormatError> {
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    return err(new NumberFormatError(token, kind));
  }
  // -0 from "-0"
  return ok(value === 0 ? 0 : value);
}

/**
 * Adds the values left to right, failing on the first partial sum that is no longer a safe integer.
 */
export function safeSum(values: readonly number[]): Result<number, OverflowError> {
  let total = 0;
  for (const value of values) {
    const next = total + value;
    if (!Number.isSafeInteger(next)) {
      return err(new OverflowError(total, value));
    }
    total = next;
  }
  return ok(total);
}
