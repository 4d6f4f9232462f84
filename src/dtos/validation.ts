import type { z } from 'zod';
import { ValidationError, type FieldErrors } from '../errors';

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const details: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    (details[field] ??= []).push(issue.message);
  }
  return details;
}

/** Parses `input` with `schema`, throwing a ValidationError that lists every failing field. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid input', toFieldErrors(result.error));
  }
  return result.data;
}
