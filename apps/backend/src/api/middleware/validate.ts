import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../../lib/errors.js';

/**
 * Collapse zod issues into one line, e.g.
 * "title: Expected string, received number".
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse a request body against a schema.
 *
 * @throws ValidationError (400) describing every failed field
 */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }
  return result.data;
}
