#!/usr/bin/env tsx
/**
 * @subledger/server - Entry Point
 * Creates missing tables, seeds the free plans and serves the API on Node
 */

import { serve } from "@hono/node-server";
import { createLogger } from "@subledger/core";
import { ensureSchema, loadBillingConfig, loadPlanDefinitions, seedPlans } from "@subledger/billing";
import { createServer } from "./app.js";
import { createRuntime } from "./bootstrap.js";

const logger = createLogger({ name: "subledger" });

async function main(): Promise<void> {
  const config = loadBillingConfig();
  const runtime = createRuntime(config, logger);

  await ensureSchema(runtime.db, logger.child({ component: "schema" }));
  await seedPlans(runtime.store, loadPlanDefinitions(), logger.child({ component: "seed" }));

  const app = createServer({
    engine: runtime.engine,
    webhooks: runtime.webhooks,
    paymentVerifier: runtime.paymentVerifier,
    defaultAppId: config.defaultAppId,
    logger: logger.child({ component: "http" }),
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info("Server listening", { port: info.port });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close();
    runtime.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Failed to close database pool", err);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.fatal("Server failed to start", err);
  process.exit(1);
});
