import { EmptySequenceError } from '@advent/shared';
import { err, ok, type Result } from 'neverthrow';

import type { Sequence } from './types.js';

/**
 * Element at index `⌊length / 2⌋`. Even-length sequences yield the upper of the two middle pages.
 */
export function getMiddlePage(sequence: Sequence): Result<number, EmptySequenceError> {
  const middle = sequence[Math.floor(sequence.length / 2)];
  return middle === undefined ? err(new EmptySequenceError()) : ok(middle);
}
