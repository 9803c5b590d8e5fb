import { describe, expect, it } from 'vitest';

import {
  EmptySequenceError,
  InvalidOptionsError,
  MalformedInputError,
  MalformedLineError,
  MalformedRuleError,
  NumberFormatError,
  OverflowError,
  PuzzleError,
} from '../errors.js';

describe('PuzzleError', () => {
  it('should carry a code, the subclass name and the offending fragment', () => {
    const error = new MalformedRuleError('47');

    expect(error).toBeInstanceOf(PuzzleError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MalformedRuleError');
    expect(error.code).toBe('MALFORMED_RULE');
    expect(error.line).toBe('47');
    expect(error.message).toBe("Rule must have format 'X|Y', found: 47");
  });

  it('should serialize to JSON with code and context', () => {
    const error = new MalformedLineError("Line must contain exactly two numbers: '1 2 3'", '1 2 3');

    expect(error.toJSON()).toEqual({
      code: 'MALFORMED_LINE',
      context: { line: '1 2 3' },
      message: "Line must contain exactly two numbers: '1 2 3'",
      name: 'MalformedLineError',
    });
  });

  it('should expose distinct codes per kind', () => {
    expect(new MalformedInputError('Input must have exactly 2 sections, found 1', 1).code).toBe('MALFORMED_INPUT');
    expect(new NumberFormatError('abc', 'unsigned').code).toBe('NUMBER_FORMAT');
    expect(new EmptySequenceError().code).toBe('EMPTY_SEQUENCE');
    expect(new InvalidOptionsError(['validator: bad']).code).toBe('INVALID_OPTIONS');
    expect(new OverflowError(9007199254740991, 1).code).toBe('ARITHMETIC_OVERFLOW');
  });

  it('should name both operands of an overflowing sum', () => {
    const error = new OverflowError(9007199254740991, 2);

    expect(error.message).toBe('Sum exceeds Number.MAX_SAFE_INTEGER: 9007199254740991 + 2');
    expect(error.context).toEqual({ operand: 2, total: 9007199254740991 });
  });

  it('should omit context when a malformed input error has no section count', () => {
    expect(new MalformedInputError('no input').context).toBeUndefined();
  });
});
