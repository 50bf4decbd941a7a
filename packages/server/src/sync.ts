#!/usr/bin/env tsx
/**
 * @subledger/server - Sync CLI
 * Pulls provider statuses into local subscription rows
 *
 * Usage: npm run sync -- [--app <app_id>] [--dry-run]
 */

import { createLogger } from "@subledger/core";
import { createSubscriptionSync, loadBillingConfig } from "@subledger/billing";
import { createRuntime } from "./bootstrap.js";

const logger = createLogger({ name: "subledger-sync" });

const args = process.argv.slice(2);

let appId: string | undefined;
let dryRun = false;

for (let i = 0; i < args.length; i++) {
  const arg = args[i];
  if (arg === "--app" && args[i + 1]) {
    appId = args[++i];
  } else if (arg === "--dry-run") {
    dryRun = true;
  }
}

async function run(): Promise<void> {
  const runtime = createRuntime(loadBillingConfig(), logger);
  try {
    const sync = createSubscriptionSync({
      store: runtime.store,
      providers: runtime.providers,
      logger,
    });
    const report = await sync.sync({ appId, dryRun });
    logger.info("Sync finished", { ...report, appId, dryRun });
  } finally {
    await runtime.close();
  }
}

run().catch((err: unknown) => {
  logger.fatal("Sync failed", err);
  process.exit(1);
});
