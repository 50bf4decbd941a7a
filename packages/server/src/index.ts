/**
 * @module
 * HTTP surface for Subledger, built on Hono.
 *
 * @example
 * ```typescript
 * import { createServer } from '@subledger/server';
 *
 * const app = createServer({ engine, webhooks, paymentVerifier, defaultAppId: 'marketfit' });
 * const res = await app.request('/api/subscriptions/plans');
 * ```
 */

// Context
export {
  generateRequestId,
  type ServerConfig,
  type ServerContextVariables,
  type ServerEnv,
  type HonoApp,
  type HonoContext,
  type HonoNext,
} from "./context.js";

// App
export { createServer, type CreateServerOptions } from "./app.js";
export { createRuntime, type Runtime } from "./bootstrap.js";

// Routes
export { createSubscriptionRoutes } from "./routes/subscriptions.js";

// Middleware
export * from "./middleware/index.js";

// Validation
export * from "./validation/index.js";

// Serializers
export * from "./utils/index.js";
