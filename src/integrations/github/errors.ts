/**
 * GitHub Integration Errors
 *
 * Every failure the client can surface extends ApiError, so callers can branch
 * on `instanceof` to decide whether to retry later, abort, or ask for a token.
 */

// =============================================================================
// BASE
// =============================================================================

export type ApiErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'TRANSIENT'
  | 'FORBIDDEN'
  | 'INVALID_RESPONSE'
  | 'GITHUB_API_ERROR';

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: ApiErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

// =============================================================================
// SPECIFIC FAILURES
// =============================================================================

/** The credential is invalid or missing. Retrying cannot help. */
export class AuthError extends ApiError {
  constructor(message = 'Bad credentials') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'AuthError';
  }
}

export class NotFoundError extends ApiError {
  constructor(
    public resource: string,
    message = `Not found: ${resource}`
  ) {
    super(message, 404, 'NOT_FOUND', { resource });
    this.name = 'NotFoundError';
  }
}

export interface RateLimitErrorDetails {
  statusCode?: number;
  resetAt?: Date | null;
  limit?: number | null;
  retryAfterMs?: number | null;
  secondary?: boolean;
  /** Quota bucket from x-ratelimit-resource; `core` unless GitHub says otherwise */
  resource?: string;
}

/**
 * Quota exhausted while waiting is disabled, the wait would exceed its bound,
 * or a secondary limit persisted after its single retry.
 */
export class RateLimitError extends ApiError {
  public resetAt: Date | null;
  public limit: number | null;
  public retryAfterMs: number | null;
  public secondary: boolean;
  public resource: string;

  constructor(message: string, details: RateLimitErrorDetails = {}) {
    super(message, details.statusCode ?? 403, 'RATE_LIMITED', {
      resetAt: details.resetAt?.toISOString() ?? null,
      limit: details.limit ?? null,
      secondary: details.secondary ?? false,
      resource: details.resource ?? 'core',
    });
    this.name = 'RateLimitError';
    this.resetAt = details.resetAt ?? null;
    this.limit = details.limit ?? null;
    this.retryAfterMs = details.retryAfterMs ?? null;
    this.secondary = details.secondary ?? false;
    this.resource = details.resource ?? 'core';
  }
}

/** 5xx or network failure that outlived the retry budget. */
export class TransientApiError extends ApiError {
  constructor(
    message: string,
    statusCode: number,
    public attempts: number
  ) {
    super(message, statusCode, 'TRANSIENT', { attempts });
    this.name = 'TransientApiError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Errors that make every further request with the same client fail the same way.
 * An exhausted search quota only blocks search, so it is not one of them.
 */
export function isRunFatal(error: unknown): error is AuthError | RateLimitError {
  return error instanceof AuthError || (error instanceof RateLimitError && error.resource === 'core');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
