import { EmptySequenceError } from '@advent/shared';
import { describe, expect, it } from 'vitest';

import { getMiddlePage } from '../middle-page.js';

describe('getMiddlePage', () => {
  it('should return the true middle of an odd-length sequence', () => {
    expect(getMiddlePage([75, 47, 61, 53, 29])._unsafeUnwrap()).toBe(61);
  });

  it('should return the upper middle of an even-length sequence', () => {
    expect(getMiddlePage([1, 2, 3, 4])._unsafeUnwrap()).toBe(3);
    expect(getMiddlePage([1, 2])._unsafeUnwrap()).toBe(2);
  });

  it('should return the only element of a singleton', () => {
    expect(getMiddlePage([42])._unsafeUnwrap()).toBe(42);
  });

  it('should fail with EmptySequence on an empty sequence', () => {
    const result = getMiddlePage([]);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(EmptySequenceError);
    expect(result._unsafeUnwrapErr().message).toBe('Cannot get middle page of empty sequence');
  });
});
