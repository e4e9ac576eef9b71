/**
 * Error hierarchy.
 * AppError carries an HTTP status and a stable machine-readable code so the
 * error handler middleware can map it to a structured JSON response.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: ErrorCode,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super('Rate limit exceeded', 429, 'RATE_LIMITED', { retryAfter });
  }
}

/** The context was cancelled before the work finished. */
export class ContextCanceledError extends AppError {
  constructor() {
    super('context canceled', 503, 'CONTEXT_CANCELED');
  }
}

/** The context's deadline passed before the work finished. */
export class DeadlineExceededError extends AppError {
  constructor() {
    super('context deadline exceeded', 504, 'DEADLINE_EXCEEDED');
  }
}
