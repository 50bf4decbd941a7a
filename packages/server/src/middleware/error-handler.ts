/**
 * @subledger/server - Error Handler Middleware
 * Maps thrown errors to JSON responses
 */

import { ErrorCodes, ValidationError, isSubledgerError, type ValidationErrorDetail } from "@subledger/core";
import type { HonoContext } from "../context.js";

/**
 * Error response body
 */
export interface ErrorResponseBody {
  error: string;
  code: string;
  /** Per-field failures of a validation error */
  errors?: ValidationErrorDetail[] | undefined;
}

/**
 * Error handler options
 */
export interface ErrorHandlerOptions {
  /** Include the stack of unexpected errors in the response (development only) */
  includeStack?: boolean;
  /** Called for every error after it has been logged */
  onError?: (error: Error, c: HonoContext) => void;
}

type ErrorStatus = 400 | 404 | 409 | 500 | 502 | 503;

function toStatus(statusCode: number): ErrorStatus {
  switch (statusCode) {
    case 400:
    case 404:
    case 409:
    case 502:
    case 503:
      return statusCode;
    default:
      return 500;
  }
}

/**
 * Build the `app.onError` handler
 *
 * `SubledgerError`s answer with their own status and `{error, code}`;
 * anything else is a 500 with a generic message.
 *
 * @example
 * ```typescript
 * app.onError(errorHandler({ includeStack: isDevelopment() }));
 * ```
 */
export function errorHandler(options: ErrorHandlerOptions = {}) {
  const { includeStack = false, onError } = options;

  return (err: Error, c: HonoContext): Response => {
    const logger = c.get("logger");
    const status = isSubledgerError(err) ? toStatus(err.statusCode) : 500;
    const context = {
      method: c.req.method,
      path: c.req.path,
      status,
    };

    if (status >= 500) {
      logger.error("Request failed", err, context);
    } else {
      logger.warn(`Request rejected: ${err.message}`, context);
    }

    onError?.(err, c);

    if (isSubledgerError(err)) {
      const body: ErrorResponseBody = { error: err.message, code: err.code };
      if (err instanceof ValidationError && err.errors.length > 0) {
        body.errors = err.errors;
      }
      return c.json(body, status);
    }

    return c.json(
      {
        error: "An unexpected error occurred",
        code: ErrorCodes.INTERNAL_ERROR,
        ...(includeStack && err.stack ? { stack: err.stack } : {}),
      },
      500
    );
  };
}

/**
 * Not found handler
 *
 * @example
 * ```typescript
 * app.notFound(notFoundHandler);
 * ```
 */
export function notFoundHandler(c: HonoContext): Response {
  return c.json(
    { error: `Route ${c.req.method} ${c.req.path} not found`, code: ErrorCodes.NOT_FOUND },
    404
  );
}
