// ============================================================================
// Validation Helpers
// ============================================================================
// Common validation utilities for tool handlers.
// ============================================================================

import { z } from 'zod';
import { ValidationError } from '../../arcgis/errors.js';

/**
 * Parse tool arguments against a zod schema.
 * Throws a ValidationError listing every failing field.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const problems = result.error.issues.map(issue => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid arguments: ${problems.join('; ')}`);
  }
  return result.data;
}

/**
 * Validate that a field matches one of the allowed values.
 */
export function requireOneOf<T>(
  value: T,
  fieldName: string,
  allowed: readonly T[]
): void {
  if (!allowed.includes(value)) {
    throw new ValidationError(`Invalid ${fieldName}: "${String(value)}". Must be one of: ${allowed.join(', ')}`);
  }
}
