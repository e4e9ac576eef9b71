export { Chain, createChain, pipeline } from './pipeline.js';
export { adaptTransport, handlerFunc } from './handler.js';
export type {
  Constructor,
  Handler,
  HandlerFunc,
  HandlerResult,
  TransportHandler,
} from './handler.js';
export { createRootHandler } from './root.js';
export { adaptConnect } from './connect.js';
export type { ConnectMiddleware, ConnectNext } from './connect.js';
export { errorHandler } from './error-handler.js';
export { createAuthMiddleware, principalKey } from './authenticate.js';
export type { Authenticator, Principal } from './authenticate.js';
export { createLoggingMiddleware } from './logging.js';
export { requestId, requestIdKey, REQUEST_ID_HEADER } from './request-id.js';
export {
  createRateLimitMiddleware,
  globalKey,
  ipKey,
  principalRateKey,
} from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createTimeoutMiddleware } from './timeout.js';
