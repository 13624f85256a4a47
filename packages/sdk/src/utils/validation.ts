/**
 * Validation helper utilities
 *
 * Provides consistent validation and error handling for API responses
 */

import { z } from 'zod';
import { ValidationError } from '../types';

/**
 * Validates data against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Additional context for error messages
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const message = context
    ? `Validation failed for ${context}: ${formatZodError(result.error)}`
    : `Validation failed: ${formatZodError(result.error)}`;

  throw new ValidationError(message, result.error.errors, {
    validationErrors: result.error.errors,
    receivedData: data,
  });
}

/**
 * Validates data against a Zod schema, returning null on failure instead of throwing
 */
export function validateSafe<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> | null {
  const result = schema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Formats Zod validation errors into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join('; ');
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
