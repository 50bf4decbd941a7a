/**
 * @subledger/billing - Razorpay Event Handlers
 * State transitions driven by Razorpay subscription notifications
 */

import { generatePrefixedId, type Logger } from "@subledger/core";
import type { RazorpaySubscriptionEntity } from "@subledger/types";
import { mergeMetadata } from "../metadata.js";
import { parseEpochSeconds, periodFrom } from "../period.js";
import type { Metadata, Subscription, SubscriptionStatus, SubscriptionStore } from "../types.js";
import {
  RAZORPAY_SUBSCRIPTION_EVENTS,
  type HandlerResult,
  type RazorpayEvent,
  type RazorpaySubscriptionEvent,
  type WebhookHandler,
  type WebhookHandlerRegistry,
} from "../webhooks/registry.js";
import type { SubscriptionLifecycle } from "./lifecycle.js";

export interface RazorpayHandlerDeps {
  lifecycle: SubscriptionLifecycle;
  now: () => Date;
  logger: Logger;
}

type Located =
  | { ok: true; subscription: Subscription; entity: RazorpaySubscriptionEntity }
  | { ok: false; result: HandlerResult };

/**
 * Resolve the local row a notification refers to
 */
async function locate(event: RazorpayEvent, tx: SubscriptionStore, logger: Logger): Promise<Located> {
  const entity = event.subscription;
  const providerId = entity?.id;

  if (!entity || !providerId) {
    logger.error("No subscription ID in webhook", { event: event.event });
    return { ok: false, result: { status: "error", message: "Missing subscription ID" } };
  }

  const subscription = await tx.findSubscriptionByProviderId("razorpay", providerId);
  if (!subscription) {
    logger.error("Subscription not found for Razorpay ID", {
      event: event.event,
      razorpaySubscriptionId: providerId,
    });
    return { ok: false, result: { status: "error", message: "Subscription not found" } };
  }

  return { ok: true, subscription, entity };
}

function snapshot(entity: RazorpaySubscriptionEntity): Metadata {
  return { ...entity };
}

function authenticated(deps: RazorpayHandlerDeps): WebhookHandler {
  return async (event, tx) => {
    const found = await locate(event, tx, deps.logger);
    if (!found.ok) return found.result;

    const { subscription, entity } = found;
    const updated = await tx.updateSubscription(
      subscription.id,
      { status: "authenticated", metadata: mergeMetadata(subscription.metadata, snapshot(entity)) },
      { unlessStatus: "active" }
    );

    if (!updated) {
      deps.logger.info("Authentication for active subscription ignored", {
        subscriptionId: subscription.id,
      });
      return { status: "success", message: "Subscription authenticated", unchanged: true };
    }

    deps.logger.info("Subscription authenticated", { subscriptionId: subscription.id });
    return { status: "success", message: "Subscription authenticated" };
  };
}

function activated(deps: RazorpayHandlerDeps): WebhookHandler {
  return async (event, tx) => {
    const found = await locate(event, tx, deps.logger);
    if (!found.ok) return found.result;

    const { subscription, entity } = found;
    const now = deps.now();

    let start = now;
    if (entity.start_at !== undefined && entity.start_at !== null) {
      const parsed = parseEpochSeconds(entity.start_at);
      if (parsed) {
        start = parsed;
      } else {
        deps.logger.warn("Invalid start_at value, using current time", { startAt: entity.start_at });
      }
    }

    const plan = await tx.getPlan(subscription.planId);
    // without a plan the window is 30 days from now, whatever start_at said
    const period = plan ? periodFrom(start, plan) : { start, end: periodFrom(now, null).end };

    await deps.lifecycle.activate(tx, subscription, period, now, {
      metadata: mergeMetadata(subscription.metadata, snapshot(entity)),
    });

    deps.logger.info("Subscription activated", { subscriptionId: subscription.id });
    return {
      status: "success",
      message: "Subscription activated",
      period_start: period.start.toISOString(),
      period_end: period.end.toISOString(),
    };
  };
}

function charged(deps: RazorpayHandlerDeps): WebhookHandler {
  return async (event, tx) => {
    const found = await locate(event, tx, deps.logger);
    if (!found.ok) return found.result;

    const { subscription, entity } = found;
    const payment = event.payment;
    const now = deps.now();
    const period = periodFrom(now, await tx.getPlan(subscription.planId));

    await deps.lifecycle.activate(tx, subscription, period, now, {
      metadata: mergeMetadata(subscription.metadata, { subscription: snapshot(entity) }),
    });

    let invoiceId: string | null = null;
    let duplicate = false;
    const providerInvoiceId = payment?.invoice_id;

    if (payment && providerInvoiceId) {
      const status = payment.status === "captured" ? "Paid" : (payment.status ?? "pending");
      const invoice = await tx.insertInvoice({
        id: generatePrefixedId("inv_"),
        subscriptionId: subscription.id,
        userId: subscription.userId,
        appId: subscription.appId,
        razorpayInvoiceId: providerInvoiceId,
        paypalInvoiceId: null,
        amount: payment.amount ?? 0,
        currency: payment.currency ?? "INR",
        status,
        paymentId: payment.id ?? null,
        invoiceDate: now,
        paidAt: status === "Paid" ? now : null,
      });

      if (invoice) {
        invoiceId = invoice.id;
      } else {
        duplicate = true;
        deps.logger.info("Invoice already recorded", { razorpayInvoiceId: providerInvoiceId });
      }
    }

    deps.logger.info("Subscription charged processed", {
      subscriptionId: subscription.id,
      razorpayInvoiceId: providerInvoiceId ?? null,
    });
    return {
      status: "success",
      message: "Subscription renewed and usage reset",
      new_period_start: period.start.toISOString(),
      new_period_end: period.end.toISOString(),
      invoice_id: invoiceId,
      duplicate_invoice: duplicate,
    };
  };
}

function terminal(
  deps: RazorpayHandlerDeps,
  status: Extract<SubscriptionStatus, "completed" | "cancelled">,
  message: string
): WebhookHandler {
  return async (event, tx) => {
    const found = await locate(event, tx, deps.logger);
    if (!found.ok) return found.result;

    const { subscription, entity } = found;
    await tx.updateSubscription(subscription.id, {
      status,
      metadata: mergeMetadata(subscription.metadata, snapshot(entity)),
    });

    deps.logger.info(message, { subscriptionId: subscription.id });
    return { status: "success", message };
  };
}

/**
 * Handler for every subscription lifecycle event
 */
export function razorpayHandlers(
  deps: RazorpayHandlerDeps
): Record<RazorpaySubscriptionEvent, WebhookHandler> {
  return {
    "subscription.authenticated": authenticated(deps),
    "subscription.activated": activated(deps),
    "subscription.charged": charged(deps),
    "subscription.completed": terminal(deps, "completed", "Subscription marked as completed"),
    "subscription.cancelled": terminal(deps, "cancelled", "Subscription marked as cancelled"),
  };
}

/**
 * Register the lifecycle handlers on a registry
 */
export function registerRazorpayHandlers(
  registry: WebhookHandlerRegistry,
  deps: RazorpayHandlerDeps
): WebhookHandlerRegistry {
  const handlers = razorpayHandlers(deps);
  for (const event of RAZORPAY_SUBSCRIPTION_EVENTS) {
    registry.on(event, handlers[event]);
  }
  return registry;
}
