import { z } from 'zod';
import { ValidationError } from './errors';

/** Parses request input, turning zod issues into a 400 ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join(', ')
    );
  }
  return parsed.data;
}
