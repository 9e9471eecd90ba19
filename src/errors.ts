/**
 * Application error hierarchy.
 * Every error carries a stable code and an HTTP-style status so it can be
 * logged, classified for the run summary, or rendered by the error handler.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number = 500,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ConfigError extends AppError {
  constructor(readonly problems: string[]) {
    super(
      'INVALID_CONFIG',
      `Invalid configuration: ${problems.join('; ')}`,
      500,
      { problems }
    );
  }
}

export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('STORAGE_ERROR', message, 500, details);
  }
}

// ── Data integrity ──

export class DuplicateMessageError extends AppError {
  constructor(chatId: number, messageId: number) {
    super(
      'DUPLICATE_MESSAGE',
      `Message ${messageId} already stored for chat ${chatId}`,
      409,
      { chatId, messageId }
    );
  }
}

// ── Analysis provider ──

/** Credentials rejected by the analysis provider. Aborts the whole run. */
export class AuthenticationError extends AppError {
  constructor(message = 'Analysis provider rejected the credentials') {
    super('AUTHENTICATION_FAILED', message, 401);
  }
}

export class RateLimitedError extends AppError {
  constructor(
    message: string,
    readonly retryAfterSeconds: number | null = null
  ) {
    super(
      'RATE_LIMITED',
      message,
      429,
      retryAfterSeconds !== null ? { retryAfter: retryAfterSeconds } : undefined
    );
  }
}

export class TransientFailureError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRANSIENT_FAILURE', message, 503, details);
  }
}

/** The provider answered, but the payload is not a valid analysis result. */
export class MalformedResponseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_RESPONSE', message, 502, details);
  }
}

/** Provider refused the request for a reason other than auth or rate limits. */
export class AnalysisRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ANALYSIS_REQUEST_FAILED', message, 502, details);
  }
}

// ── Delivery ──

export class DeliveryError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DELIVERY_FAILED', message, 502, details);
  }
}

// ── Control flow ──

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, 504, {
      timeoutMs,
    });
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message, 499);
  }
}

// ── Classification ──

export type FailureKind =
  | 'authentication'
  | 'rate_limited'
  | 'transient'
  | 'malformed_response'
  | 'analysis_request'
  | 'delivery'
  | 'timeout'
  | 'cancelled'
  | 'storage'
  | 'unknown';

export function isRetryable(err: unknown): boolean {
  return err instanceof RateLimitedError || err instanceof TransientFailureError;
}

export function failureKind(err: unknown): FailureKind {
  if (err instanceof AuthenticationError) return 'authentication';
  if (err instanceof RateLimitedError) return 'rate_limited';
  if (err instanceof TransientFailureError) return 'transient';
  if (err instanceof MalformedResponseError) return 'malformed_response';
  if (err instanceof AnalysisRequestError) return 'analysis_request';
  if (err instanceof DeliveryError) return 'delivery';
  if (err instanceof TimeoutError) return 'timeout';
  if (err instanceof CancelledError) return 'cancelled';
  if (err instanceof StorageError) return 'storage';
  return 'unknown';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
