import type { z } from 'zod';
import { ValidationError } from '../errors/domain-error';

/**
 * Parses a transport payload with a zod schema. The first issue becomes a
 * ValidationError so REST and RPC report schema failures the same way the
 * domain layer reports its own.
 */
export function parseRequest<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  rootField = 'body',
): z.output<TSchema> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : rootField;
  throw new ValidationError(field, issue?.message ?? 'invalid request');
}
