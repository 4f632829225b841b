import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodSchema } from 'zod';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 */
export function fromZod<T>(schema: ZodSchema<T>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * Joins the issue messages of a ZodError into one line
 */
export function describeZodError(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}
