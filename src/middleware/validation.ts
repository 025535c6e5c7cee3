import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../utils';

export function formatZodError(error: ZodError): string {
  return error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Parse request input with a schema, raising ValidationError (400) on failure
 */
export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }

  return result.data;
}
