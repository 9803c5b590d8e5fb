/**
 * Error hierarchy shared by every puzzle day.
 *
 * Errors are returned inside neverthrow Results rather than thrown; each carries a stable code and the
 * offending input fragment so callers can report it.
 */

export type PuzzleErrorCode =
  | 'MALFORMED_INPUT'
  | 'MALFORMED_RULE'
  | 'MALFORMED_LINE'
  | 'NUMBER_FORMAT'
  | 'EMPTY_SEQUENCE'
  | 'ARITHMETIC_OVERFLOW'
  | 'INVALID_OPTIONS';

export abstract class PuzzleError extends Error {
  abstract readonly code: PuzzleErrorCode;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/** Input does not split into the expected sections. */
export class MalformedInputError extends PuzzleError {
  readonly code = 'MALFORMED_INPUT';

  constructor(
    message: string,
    public readonly sectionCount?: number
  ) {
    super(message, sectionCount === undefined ? undefined : { sectionCount });
  }
}

export class MalformedRuleError extends PuzzleError {
  readonly code = 'MALFORMED_RULE';

  constructor(public readonly line: string) {
    super(`Rule must have format 'X|Y', found: ${line}`, { line });
  }
}

export class MalformedLineError extends PuzzleError {
  readonly code = 'MALFORMED_LINE';

  constructor(
    message: string,
    public readonly line: string
  ) {
    super(message, { line });
  }
}

export class NumberFormatError extends PuzzleError {
  readonly code = 'NUMBER_FORMAT';

  constructor(
    public readonly token: string,
    kind: 'unsigned' | 'signed'
  ) {
    super(`Expected ${kind === 'unsigned' ? 'a non-negative integer' : 'an integer'}, found: '${token}'`, { token });
  }
}

export class EmptySequenceError extends PuzzleError {
  readonly code = 'EMPTY_SEQUENCE';

  constructor() {
    super('Cannot get middle page of empty sequence');
  }
}

/** An accumulated answer left the range a `number` holds exactly. */
export class OverflowError extends PuzzleError {
  readonly code = 'ARITHMETIC_OVERFLOW';

  constructor(
    public readonly total: number,
    public readonly operand: number
  ) {
    super(`Sum exceeds Number.MAX_SAFE_INTEGER: ${String(total)} + ${String(operand)}`, { operand, total });
  }
}

export class InvalidOptionsError extends PuzzleError {
  readonly code = 'INVALID_OPTIONS';

  constructor(public readonly issues: string[]) {
    super(`Invalid solver options: ${issues.join('; ')}`, { issues });
  }
}
