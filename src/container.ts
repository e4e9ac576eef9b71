/**
 * Dependency wiring.
 * Constructs the standard middleware with its dependencies and assembles the
 * base chains. Swap the store, authenticator and log provider for fakes in tests.
 */

import type { AppConfig } from './config.js';
import type { Constructor } from './middleware/handler.js';
import { Chain, createChain } from './middleware/pipeline.js';
import { createAuthMiddleware, type Authenticator } from './middleware/authenticate.js';
import { errorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createRateLimitMiddleware, principalRateKey } from './middleware/rate-limit.js';
import { requestId } from './middleware/request-id.js';
import { createTimeoutMiddleware } from './middleware/timeout.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { InMemoryRateLimitStore } from './stores/InMemoryRateLimitStore.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';

export interface Container {
  config: Readonly<AppConfig>;
  logProvider: ILogProvider;
  requestId: Constructor;
  logging: Constructor;
  errorHandler: Constructor;
  timeout: Constructor;
  authenticate: Constructor;
  rateLimit: Constructor;
  /** requestId → logging → errorHandler → timeout */
  baseChain: Chain;
  /** baseChain, then authenticate → rateLimit */
  protectedChain: Chain;
}

export function createContainer(deps: {
  config: Readonly<AppConfig>;
  authenticator: Authenticator;
  logProvider?: ILogProvider;
  rateLimitStore?: IRateLimitStore;
}): Container {
  const { config } = deps;
  const logProvider =
    deps.logProvider ??
    new ConsoleLogProvider({ outputToConsole: config.logToConsole, minLevel: config.logLevel });
  const rateLimitStore = deps.rateLimitStore ?? new InMemoryRateLimitStore();

  const requestIdMw = requestId();
  const logging = createLoggingMiddleware(logProvider);
  const timeout = createTimeoutMiddleware(config.requestTimeoutMs);
  const authenticate = createAuthMiddleware(deps.authenticator);
  const rateLimit = createRateLimitMiddleware(rateLimitStore, {
    key: principalRateKey('request'),
    limit: config.rateLimit.limit,
    windowSeconds: config.rateLimit.windowSeconds,
  });

  const baseChain = createChain(requestIdMw, logging, errorHandler, timeout);

  return {
    config,
    logProvider,
    requestId: requestIdMw,
    logging,
    errorHandler,
    timeout,
    authenticate,
    rateLimit,
    baseChain,
    protectedChain: baseChain.append(authenticate, rateLimit),
  };
}
