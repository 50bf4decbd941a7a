/**
 * @subledger/server - Request Logger Middleware
 * HTTP request/response logging
 */

import type { HonoContext, HonoNext } from "../context.js";

/**
 * Request logger options
 */
export interface RequestLoggerOptions {
  /** Skip logging for certain paths */
  skip?: (c: HonoContext) => boolean;
}

/**
 * Request logger middleware
 *
 * @example
 * ```typescript
 * app.use('*', requestLogger({
 *   skip: (c) => c.req.path === '/health',
 * }));
 * ```
 */
export function requestLogger(options: RequestLoggerOptions = {}) {
  const { skip } = options;

  return async (c: HonoContext, next: HonoNext): Promise<void> => {
    if (skip?.(c)) {
      await next();
      return;
    }

    const start = Date.now();
    const logger = c.get("logger");
    const method = c.req.method;
    const path = c.req.path;

    logger.debug("Request started", { method, path });

    await next();

    const status = c.res.status;
    const logData = { method, path, status, duration: `${Date.now() - start}ms` };

    if (status >= 500) {
      logger.error("Request completed", undefined, logData);
    } else if (status >= 400) {
      logger.warn("Request completed", logData);
    } else {
      logger.info("Request completed", logData);
    }
  };
}
