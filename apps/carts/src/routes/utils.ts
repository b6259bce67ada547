import type { ZodType } from 'zod';

import { createValidationError } from '../http/problem';

export function parseBody<T>(schema: ZodType<T>, body: unknown, message?: string): T {
  return parseWithSchema(schema, body, message ?? 'Invalid request body.');
}

export function parseQuery<T>(schema: ZodType<T>, query: unknown, message?: string): T {
  return parseWithSchema(schema, query, message ?? 'Invalid query parameters.');
}

export function parseParams<T>(schema: ZodType<T>, params: unknown, message?: string): T {
  return parseWithSchema(schema, params, message ?? 'Invalid route parameters.');
}

function parseWithSchema<T>(schema: ZodType<T>, value: unknown, message: string): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const flattened = parsed.error.flatten();

  throw createValidationError(message, {
    fieldErrors: flattened.fieldErrors,
    formErrors: flattened.formErrors,
  });
}
