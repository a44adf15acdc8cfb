import { ErrorCode, TransientError, ValidationError, getErrorMessage } from '@pipeline/core';
import type { PipelineError } from '@pipeline/core';

const RETRYABLE_STATUSES = new Set([408, 425, 429]);

/**
 * Map a non-2xx response to the error taxonomy: 5xx and throttling are
 * transient, any other 4xx is permanent.
 */
export function errorForStatus(
  status: number,
  operation: string,
  body: string,
  rejectedCode: ErrorCode = ErrorCode.VALIDATION_FAILED
): PipelineError {
  const context = { status, body: body.slice(0, 500) };
  if (status >= 500 || RETRYABLE_STATUSES.has(status)) {
    return new TransientError(`${operation} failed with HTTP ${status}`, { context });
  }
  return new ValidationError(`${operation} rejected with HTTP ${status}`, {
    code: rejectedCode,
    context,
  });
}

export function networkError(operation: string, cause: unknown): TransientError {
  return new TransientError(`${operation} request failed: ${getErrorMessage(cause)}`, { cause });
}

/** Body text of a failed response; an unreadable body reads as empty. */
export async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${getErrorMessage(error)}>`;
  }
}
