/**
 * @subledger/server - App Factory
 * Create and configure the Hono server
 */

import { Hono } from "hono";
import { createLogger, isDevelopment } from "@subledger/core";
import type { HonoApp, ServerConfig, ServerEnv } from "./context.js";
import { generateRequestId } from "./context.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { requestLogger } from "./middleware/request-logger.js";
import { createSubscriptionRoutes } from "./routes/subscriptions.js";

/**
 * Extended server options
 */
export interface CreateServerOptions extends ServerConfig {
  /** Enable request logging */
  logging?: boolean;
  /** Strict mode - trailing slashes matter */
  strict?: boolean;
}

/**
 * Create the subscription server
 *
 * @example
 * ```typescript
 * const app = createServer({
 *   engine,
 *   webhooks: createWebhookProcessor(engine, { razorpayVerifier, paypalVerifier }),
 *   paymentVerifier: razorpayVerifier,
 * });
 *
 * const res = await app.request('/api/subscriptions/plans?app_id=marketfit');
 * ```
 */
export function createServer(options: CreateServerOptions): HonoApp {
  const app = new Hono<ServerEnv>({
    strict: options.strict ?? false,
  });

  const logger = options.logger ?? createLogger({ name: "subledger-server" });
  const defaultAppId = options.defaultAppId ?? "marketfit";

  app.use("*", async (c, next) => {
    const requestId = c.req.header("x-request-id") ?? generateRequestId();

    c.set("engine", options.engine);
    c.set("webhooks", options.webhooks);
    c.set("paymentVerifier", options.paymentVerifier);
    c.set("defaultAppId", defaultAppId);
    c.set("requestId", requestId);
    c.set("logger", logger.child({ requestId }));
    c.header("x-request-id", requestId);

    await next();
  });

  if (options.logging !== false) {
    app.use("*", requestLogger({ skip: (c) => c.req.path === "/health" }));
  }

  app.onError(errorHandler({ includeStack: isDevelopment() }));
  app.notFound(notFoundHandler);

  app.get("/health", (c) => c.json({ status: "ok" }));
  app.route(options.basePath ?? "/api/subscriptions", createSubscriptionRoutes());

  return app;
}
