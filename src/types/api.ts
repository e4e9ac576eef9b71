/**
 * Response payload shapes shared by the bundled middleware.
 */

// ── Errors ──

export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'CONTEXT_CANCELED'
  | 'DEADLINE_EXCEEDED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
