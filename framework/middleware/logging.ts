/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging.
 */

import type { Middleware } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logger?: Logger;
  excludePaths?: string[];
}

const DEFAULT_EXCLUDED = ['/favicon.ico'];

/**
 * Create logging middleware. Logs one line per response with the status
 * and the time spent in the rest of the chain.
 */
export function loggingMiddleware(options: LoggingOptions = {}): Middleware {
  const excluded = options.excludePaths ?? DEFAULT_EXCLUDED;

  return async function requestLogger(ctx, next) {
    if (excluded.some((path) => ctx.url.pathname.startsWith(path))) {
      return await next();
    }

    const logger = options.logger ?? getLogger();
    const startTime = performance.now();
    const response = await next();
    const duration = Math.round((performance.now() - startTime) * 100) / 100;

    const entry = {
      method: ctx.method,
      path: ctx.url.pathname,
      status: response.status,
      duration,
    };
    const message = `${ctx.method} ${ctx.url.pathname} ${response.status}`;

    if (response.status >= 500) {
      logger.error(message, undefined, entry);
    } else if (response.status >= 400) {
      logger.warn(message, entry);
    } else {
      logger.info(message, entry);
    }

    return response;
  };
}
