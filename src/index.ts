export * from './context/index.js';
export * from './middleware/index.js';
export * from './providers/index.js';
export { ServeMux, defaultServeMux, notFound } from './http/serveMux.js';
export { headerValue, requestPath } from './http/request.js';
export { sendError, sendJson } from './http/respond.js';
export {
  AppError,
  ContextCanceledError,
  DeadlineExceededError,
  RateLimitError,
  UnauthorizedError,
} from './errors.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createContainer } from './container.js';
export type { Container } from './container.js';
export type { IRateLimitStore, RateLimitWindow } from './stores/IRateLimitStore.js';
export { InMemoryRateLimitStore } from './stores/InMemoryRateLimitStore.js';
export type { ApiErrorResponse, ErrorCode } from './types/api.js';
