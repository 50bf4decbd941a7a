/**
 * @subledger/billing - Subscription Sync
 * Reconciles local subscription status with the payment provider
 */

import { createLogger, errorMessage, measureTime, type Logger } from "@subledger/core";
import { isValid, subscriptionStatus } from "@subledger/types";
import { SubscriptionLifecycle } from "../engine/lifecycle.js";
import type {
  PaymentGateway,
  PaymentProvider,
  Subscription,
  SubscriptionStatus,
  SubscriptionStore,
} from "../types.js";
import { isProviderFailure } from "../types.js";

/**
 * Statuses worth asking the provider about
 */
export const SYNCABLE_STATUSES: readonly SubscriptionStatus[] = [
  "active",
  "created",
  "authenticated",
  "halted",
];

export interface SubscriptionSyncConfig {
  store: SubscriptionStore;
  providers: Partial<Record<PaymentGateway, PaymentProvider>>;
  now?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

export interface SyncOptions {
  /** Only rows of this app */
  appId?: string | undefined;
  /** Fetch and compare without writing */
  dryRun?: boolean | undefined;
}

export interface SyncReport {
  synced: number;
  failed: number;
  skipped: number;
}

type RowOutcome = keyof SyncReport;

/**
 * Subscription Sync
 *
 * @example
 * ```typescript
 * const sync = new SubscriptionSync({ store, providers: { razorpay } });
 * const report = await sync.sync({ appId: 'marketfit', dryRun: true });
 * // { synced: 12, failed: 1, skipped: 3 }
 * ```
 */
export class SubscriptionSync {
  private readonly store: SubscriptionStore;
  private readonly providers: Partial<Record<PaymentGateway, PaymentProvider>>;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly lifecycle: SubscriptionLifecycle;

  constructor(config: SubscriptionSyncConfig) {
    this.store = config.store;
    this.providers = config.providers;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? createLogger({ name: "sync" });
    this.lifecycle = new SubscriptionLifecycle(this.logger);
  }

  async sync(options: SyncOptions = {}): Promise<SyncReport> {
    const dryRun = options.dryRun ?? false;
    const rows = await measureTime(this.logger, "listSubscriptionsByStatus", () =>
      this.store.listSubscriptionsByStatus([...SYNCABLE_STATUSES], options.appId)
    );

    this.logger.info("Syncing subscriptions", { count: rows.length, appId: options.appId, dryRun });

    const report: SyncReport = { synced: 0, failed: 0, skipped: 0 };
    for (const row of rows) {
      report[await this.syncOne(row, dryRun)]++;
    }

    this.logger.info("Subscription sync finished", { ...report });
    return report;
  }

  private async syncOne(row: Subscription, dryRun: boolean): Promise<RowOutcome> {
    if (row.paypalSubscriptionId && !row.razorpaySubscriptionId) {
      // PayPal status is not fetched yet
      return "synced";
    }

    const providerId = row.razorpaySubscriptionId;
    if (!providerId) {
      this.logger.debug("No provider subscription id, skipping", { subscriptionId: row.id });
      return "skipped";
    }

    const provider = this.providers.razorpay;
    if (!provider) {
      this.logger.warn("Razorpay provider not configured", { subscriptionId: row.id });
      return "failed";
    }

    try {
      const result = await provider.fetchSubscription(providerId);
      if (isProviderFailure(result)) {
        this.logger.error("Failed to fetch subscription", undefined, {
          subscriptionId: row.id,
          providerId,
          reason: result.message,
        });
        return "failed";
      }

      const remote = result.status;
      if (remote === row.status) {
        return "synced";
      }
      if (!isValid(subscriptionStatus, remote)) {
        this.logger.warn("Unknown provider status, leaving row unchanged", {
          subscriptionId: row.id,
          remote,
        });
        return "synced";
      }

      this.logger.info("Status drift", { subscriptionId: row.id, local: row.status, remote, dryRun });
      if (!dryRun) {
        await this.apply(row.id, remote);
      }
      return "synced";
    } catch (err) {
      this.logger.error("Error syncing subscription", err, { subscriptionId: row.id, error: errorMessage(err) });
      return "failed";
    }
  }

  private async apply(subscriptionId: string, status: SubscriptionStatus): Promise<void> {
    await this.store.transaction(async (tx) => {
      const current = await tx.getSubscription(subscriptionId);
      if (!current) return;

      if (status === "active") {
        await this.lifecycle.supersedeOthers(tx, current, this.now());
      }
      await tx.updateSubscription(subscriptionId, { status });
    });
  }
}

export function createSubscriptionSync(config: SubscriptionSyncConfig): SubscriptionSync {
  return new SubscriptionSync(config);
}
