/**
 * @subledger/billing - Usage Tracker
 * Per-period resource counters scoped to a user's active subscription
 */

import { ValidationError, createLogger, generatePrefixedId, type Logger } from "@subledger/core";
import { isValid, positiveInt, resourceType } from "@subledger/types";
import { periodContains, periodFrom, type BillingPeriod } from "../period.js";
import type {
  NewResourceUsage,
  ResourceType,
  ResourceUsage,
  Subscription,
  SubscriptionStore,
  UsageCounters,
} from "../types.js";

/**
 * Metered resource types
 */
export const RESOURCE_TYPES: readonly ResourceType[] = ["document_pages", "perplexity_requests"];

/**
 * Usage tracker configuration
 */
export interface UsageTrackerConfig {
  store: SubscriptionStore;
  /** Clock; defaults to the system time */
  now?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

/**
 * Zero-filled counters for a usage row, or all zeros without one
 */
export function toCounters(row: ResourceUsage | null): UsageCounters {
  return {
    document_pages: row?.documentPagesCount ?? 0,
    perplexity_requests: row?.perplexityRequestsCount ?? 0,
  };
}

/**
 * Narrow a resource type name, throwing a ValidationError for unknown names
 */
export function parseResourceType(value: string): ResourceType {
  if (!isValid(resourceType, value)) {
    throw new ValidationError("Invalid resource type", [
      { field: "resource_type", message: `must be one of ${RESOURCE_TYPES.join(", ")}` },
    ]);
  }
  return value;
}

/**
 * A fresh usage row for a subscription's billing window; counters start at zero
 */
export function newUsageRow(
  subscription: Pick<Subscription, "id" | "userId" | "appId">,
  period: BillingPeriod
): NewResourceUsage {
  return {
    id: generatePrefixedId("usage_"),
    userId: subscription.userId,
    subscriptionId: subscription.id,
    appId: subscription.appId,
    billingPeriodStart: period.start,
    billingPeriodEnd: period.end,
  };
}

/**
 * Usage Tracker
 *
 * @example
 * ```typescript
 * const usage = new UsageTracker({ store });
 *
 * await usage.increment('user_1', 'marketfit', 'document_pages', 12);
 * await usage.get('user_1', 'marketfit');
 * // { document_pages: 12, perplexity_requests: 0 }
 * ```
 */
export class UsageTracker {
  private readonly store: SubscriptionStore;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(config: UsageTrackerConfig) {
    this.store = config.store;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? createLogger({ name: "usage" });
  }

  /**
   * Add `count` to a counter of the user's active subscription.
   * Returns false when the user has no active subscription in the app.
   */
  async increment(
    userId: string,
    appId: string,
    resource: string,
    count: number = 1
  ): Promise<boolean> {
    const kind = parseResourceType(resource);
    if (!isValid(positiveInt, count)) {
      throw new ValidationError("Invalid usage count", [
        { field: "count", message: "must be a positive integer" },
      ]);
    }

    return this.store.transaction(async (tx) => {
      const subscription = await tx.findLatestSubscription({ userId, appId, status: "active" });
      if (!subscription) {
        this.logger.debug("No active subscription, usage not tracked", { userId, appId, resource });
        return false;
      }

      const row = await this.currentRow(tx, subscription);
      await tx.incrementUsage(row.id, kind, count);

      this.logger.info("Usage incremented", {
        userId,
        appId,
        resource: kind,
        count,
        subscriptionId: subscription.id,
      });
      return true;
    });
  }

  /**
   * Counters for the period containing now; every counter defaults to zero
   */
  async get(userId: string, appId: string): Promise<UsageCounters> {
    return this.store.transaction(async (tx) => {
      const subscription = await tx.findLatestSubscription({ userId, appId, status: "active" });
      if (!subscription) {
        return toCounters(null);
      }
      return toCounters(await tx.findUsageAt(subscription.id, this.now()));
    });
  }

  /**
   * The usage row whose window contains now, created when missing.
   * A new row takes the subscription's period when that period is current,
   * otherwise a period of the plan's length starting now.
   */
  async currentRow(tx: SubscriptionStore, subscription: Subscription): Promise<ResourceUsage> {
    const now = this.now();
    const existing = await tx.findUsageAt(subscription.id, now);
    if (existing) {
      return existing;
    }

    let period: BillingPeriod | null = null;
    if (subscription.currentPeriodStart && subscription.currentPeriodEnd) {
      const current = { start: subscription.currentPeriodStart, end: subscription.currentPeriodEnd };
      if (periodContains(current, now)) {
        period = current;
      }
    }
    if (!period) {
      period = periodFrom(now, await tx.getPlan(subscription.planId));
    }

    return tx.insertUsage(newUsageRow(subscription, period));
  }
}

export function createUsageTracker(config: UsageTrackerConfig): UsageTracker {
  return new UsageTracker(config);
}
