/**
 * Input Validation Utilities
 *
 * Runs zod schemas and reports failures as ValidationError.
 */

import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Parse `value` with `schema`, throwing a ValidationError that names every failing field
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  context: { component: string; operation: string }
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
  const field = result.error.errors[0]?.path.join('.') || undefined;

  throw new ValidationError(`Invalid ${context.operation} input: ${issues.join('; ')}`, {
    component: context.component,
    operation: context.operation,
    field,
    constraints: issues,
  });
}
