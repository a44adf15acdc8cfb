/**
 * Shared Error Handling
 *
 * Error taxonomy for the pipeline. Every component throws one of these (or
 * lets a foreign error pass through classifyError) so retry decisions and
 * API responses are made in one place.
 *
 * - ValidationError: malformed input. Rejected, logged, never retried.
 * - TransientError: timeouts and flaky collaborators. Retried per component policy.
 * - ConflictError: optimistic-concurrency version mismatch. Retried by the orchestrator.
 * - TerminalError: retry budget exhausted. Turned into a state transition.
 * - NotFoundError: unknown id on a read or an inbound event.
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General (1000-1999)
  UNKNOWN_ERROR = 1000,
  NOT_FOUND = 1002,
  INVALID_STATE = 1005,
  OPERATION_CANCELLED = 1006,

  // Concurrency (2000-2999)
  VERSION_CONFLICT = 2000,
  LOCK_TIMEOUT = 2001,

  // Collaborators (3000-3999)
  OPERATION_TIMEOUT = 3000,
  COLLABORATOR_UNAVAILABLE = 3001,
  DELIVERY_FAILED = 3002,
  RATE_LIMITED = 3003,

  // Persistence (4000-4999)
  REDIS_OPERATION_ERROR = 4000,

  // Retry budget (5000-5999)
  RETRIES_EXHAUSTED = 5000,

  // Validation (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,
  DELIVERY_REJECTED = 6003,
}

export enum ErrorSeverity {
  /** Expected, no action needed */
  INFO = 'info',
  /** Unexpected but recoverable */
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

export interface PipelineErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base error carrying a code, a severity and structured context for logs.
 */
export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, options: PipelineErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
      stack: this.stack,
    };
  }
}

export interface ValidationIssueDetail {
  path: string;
  message: string;
}

export class ValidationError extends PipelineError {
  readonly issues: ReadonlyArray<ValidationIssueDetail>;

  constructor(
    message: string,
    options: { issues?: ValidationIssueDetail[]; code?: ErrorCode; context?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.code ?? ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      context: options.context,
      cause: options.cause,
    });
    this.name = 'ValidationError';
    this.issues = options.issues ?? [];
  }
}

export class TransientError extends PipelineError {
  constructor(
    message: string,
    options: { code?: ErrorCode; context?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.code ?? ErrorCode.COLLABORATOR_UNAVAILABLE, {
      severity: ErrorSeverity.WARNING,
      context: options.context,
      cause: options.cause,
    });
    this.name = 'TransientError';
  }
}

/**
 * An operation did not settle within its deadline.
 */
export class TimeoutError extends TransientError {
  readonly timeoutMs: number;
  readonly operationName?: string;

  constructor(timeoutMs: number, operationName?: string) {
    super(`Operation${operationName ? ` '${operationName}'` : ''} timed out after ${timeoutMs}ms`, {
      code: ErrorCode.OPERATION_TIMEOUT,
      context: { timeoutMs, operationName },
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.operationName = operationName;
  }
}

export class ConflictError extends PipelineError {
  readonly expectedVersion: number;
  readonly actualVersion?: number;

  constructor(entity: string, id: string, expectedVersion: number, actualVersion?: number) {
    super(`${entity} ${id} version conflict: expected ${expectedVersion}, found ${actualVersion ?? 'none'}`, ErrorCode.VERSION_CONFLICT, {
      severity: ErrorSeverity.INFO,
      context: { entity, id, expectedVersion, actualVersion },
    });
    this.name = 'ConflictError';
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * Retry budget exhausted. Callers convert it into a failure state.
 */
export class TerminalError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, ErrorCode.RETRIES_EXHAUSTED, {
      severity: ErrorSeverity.ERROR,
      context: { ...options.context, attempts },
      cause: options.cause,
    });
    this.name = 'TerminalError';
    this.attempts = attempts;
  }
}

export class NotFoundError extends PipelineError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, ErrorCode.NOT_FOUND, {
      severity: ErrorSeverity.INFO,
      context: { entity, id },
    });
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Message of anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

export function formatErrorForResponse(error: unknown): {
  code: number;
  message: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof PipelineError) {
    return { code: error.code, message: error.message, details: error.context };
  }
  return { code: ErrorCode.UNKNOWN_ERROR, message: getErrorMessage(error) };
}

// =============================================================================
// Classification
// =============================================================================

export enum ErrorCategory {
  TRANSIENT = 'transient',
  PERMANENT = 'permanent',
  UNKNOWN = 'unknown',
}

const PERMANENT_ERROR_NAMES = new Set([
  'ValidationError',
  'NotFoundError',
  'TerminalError',
  'AuthenticationError',
  'AuthorizationError',
  'SyntaxError',
  'TypeError',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const TRANSIENT_MESSAGES = [
  'timeout',
  'timed out',
  'connection',
  'network',
  'temporary',
  'rate limit',
  'too many requests',
  'service unavailable',
  'fetch failed',
];

/**
 * Decide whether an error is worth retrying.
 *
 * Taxonomy classes answer directly. Foreign errors are judged by HTTP status
 * (`status` / `statusCode`), then network error code, then message.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error === null || error === undefined) return ErrorCategory.PERMANENT;

  if (error instanceof TransientError || error instanceof ConflictError) {
    return ErrorCategory.TRANSIENT;
  }
  if (error instanceof ValidationError || error instanceof NotFoundError || error instanceof TerminalError) {
    return ErrorCategory.PERMANENT;
  }

  const name = readProperty(error, 'name');
  if (typeof name === 'string' && PERMANENT_ERROR_NAMES.has(name)) {
    return ErrorCategory.PERMANENT;
  }

  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  if (typeof status === 'number') {
    if (TRANSIENT_STATUSES.has(status)) return ErrorCategory.TRANSIENT;
    if (status >= 400 && status < 500) return ErrorCategory.PERMANENT;
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) {
    return ErrorCategory.TRANSIENT;
  }

  const message = getErrorMessage(error).toLowerCase();
  if (TRANSIENT_MESSAGES.some(fragment => message.includes(fragment))) {
    return ErrorCategory.TRANSIENT;
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Unknown errors are retried; only permanent ones stop a retry loop.
 */
export function isRetryableError(error: unknown): boolean {
  return classifyError(error) !== ErrorCategory.PERMANENT;
}
