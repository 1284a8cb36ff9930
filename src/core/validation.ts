/**
 * Runtime validation of records read back from disk.
 */

import { z } from 'zod';
import { IndexFormatError } from './errors.js';

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate data against a schema, throwing IndexFormatError on failure.
 *
 * @param source - What is being read, for the error message (e.g. "semantic index")
 */
export function parseRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, source: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new IndexFormatError(source, formatZodError(result.error).join('; '));
  }
  return result.data;
}
