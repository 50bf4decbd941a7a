/**
 * @subledger/billing - Subscription Lifecycle
 * Writes shared by webhook transitions, direct operations and provider sync
 */

import { NotFoundError, createLogger, type Logger } from "@subledger/core";
import { mergeMetadata } from "../metadata.js";
import type { BillingPeriod } from "../period.js";
import type { Subscription, SubscriptionPatch, SubscriptionStore } from "../types.js";
import { newUsageRow } from "../usage/usage-tracker.js";

export class SubscriptionLifecycle {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ name: "lifecycle" });
  }

  /**
   * Cancel every other active subscription of the same user and app.
   * Keeps at most one active row per (user, app).
   */
  async supersedeOthers(tx: SubscriptionStore, keep: Subscription, at: Date): Promise<string[]> {
    const active = await tx.listSubscriptions({
      userId: keep.userId,
      appId: keep.appId,
      status: "active",
    });

    const superseded: string[] = [];
    for (const other of active) {
      if (other.id === keep.id) continue;

      await tx.updateSubscription(other.id, {
        status: "cancelled",
        metadata: mergeMetadata(other.metadata, {
          superseded_by: keep.id,
          superseded_at: at.toISOString(),
        }),
      });
      superseded.push(other.id);
    }

    if (superseded.length > 0) {
      this.logger.info("Superseded active subscriptions", {
        userId: keep.userId,
        appId: keep.appId,
        activeSubscriptionId: keep.id,
        superseded,
      });
    }
    return superseded;
  }

  /**
   * Move a subscription into a new active billing period and start
   * fresh usage counters for it
   */
  async activate(
    tx: SubscriptionStore,
    subscription: Subscription,
    period: BillingPeriod,
    at: Date,
    patch: SubscriptionPatch = {}
  ): Promise<Subscription> {
    await this.supersedeOthers(tx, subscription, at);

    const updated = await tx.updateSubscription(subscription.id, {
      ...patch,
      status: "active",
      currentPeriodStart: period.start,
      currentPeriodEnd: period.end,
    });
    if (!updated) {
      throw new NotFoundError("Subscription", undefined, { subscriptionId: subscription.id });
    }

    await tx.insertUsage(newUsageRow(updated, period));

    this.logger.debug("Billing period started", {
      subscriptionId: updated.id,
      periodStart: period.start.toISOString(),
      periodEnd: period.end.toISOString(),
    });
    return updated;
  }
}
