/**
 * Payload validation at the component boundary: zod failures become
 * ValidationError carrying the issue list, so callers and the HTTP layer
 * see one error type.
 */

import type { z } from 'zod';
import { validateWithDetails } from '@pipeline/config';
import { ValidationError } from '@pipeline/core';

export function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context: string): T {
  const result = validateWithDetails(schema, data);
  if (result.success) {
    return result.data;
  }
  throw new ValidationError(`Invalid ${context}`, { issues: result.errors, context: { payload: context } });
}
