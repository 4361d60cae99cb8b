import type { z } from 'zod';
import { ValidationError } from './errors.js';

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  fieldName = 'data'
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const firstError = result.error.errors[0];
    const path = firstError?.path.join('.') || fieldName;
    throw new ValidationError(firstError?.message || 'Validation failed', path, data);
  }
  return result.data;
}

export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Lower-cased alphanumeric tokens, deduplicated, in first-seen order.
 */
export function tokenize(text: string): string[] {
  const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return [...new Set(tokens)];
}
