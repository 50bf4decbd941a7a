/**
 * @subledger/server - Middleware Exports
 */

// Error Handler
export {
  errorHandler,
  notFoundHandler,
  type ErrorHandlerOptions,
  type ErrorResponseBody,
} from "./error-handler.js";

// Request Logger
export { requestLogger, type RequestLoggerOptions } from "./request-logger.js";
