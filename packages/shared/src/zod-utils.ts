import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { InvalidOptionsError } from './errors.js';

/**
 * Validates solver options against a Zod schema, mapping every issue to a readable
 * `path: message` line.
 */
export function parseOptions<TOutput, TInput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  input: unknown
): Result<TOutput, InvalidOptionsError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issues = parsed.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  return err(new InvalidOptionsError(issues));
}
