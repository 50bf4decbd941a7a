/**
 * @subledger/billing - Subscription Engine
 * Subscription lifecycle state machine with webhook reconciliation
 */

import {
  NotFoundError,
  ProviderError,
  ValidationError,
  createLogger,
  errorMessage,
  generatePrefixedId,
  type Logger,
} from "@subledger/core";
import {
  isValid,
  paymentGateway,
  type PaypalWebhookPayload,
  type RazorpayWebhookPayload,
} from "@subledger/types";
import { DEFAULT_FREE_PLAN_IDS } from "../config.js";
import { createEventLog, type EventLog } from "../events/event-log.js";
import { mergeMetadata } from "../metadata.js";
import { periodFrom } from "../period.js";
import { MANUAL_ACTIVATION_INVOICE_ID } from "../store/schema.js";
import type {
  CustomerDirectory,
  Invoice,
  PaymentGateway,
  PaymentProvider,
  Plan,
  Subscription,
  SubscriptionStore,
  SubscriptionWithPlan,
  UsageCounters,
} from "../types.js";
import { isProviderFailure } from "../types.js";
import { UsageTracker, newUsageRow } from "../usage/usage-tracker.js";
import type { WebhookResult, WebhookSink } from "../webhooks/processor.js";
import {
  createWebhookHandlerRegistry,
  toRazorpayEvent,
  type WebhookHandlerRegistry,
  type HandlerResult,
} from "../webhooks/registry.js";
import { SubscriptionLifecycle } from "./lifecycle.js";
import { registerRazorpayHandlers } from "./razorpay-handlers.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Subscription engine configuration
 */
export interface SubscriptionEngineConfig {
  store: SubscriptionStore;
  /** Gateway name → provider; a plan whose gateway is missing here cannot be sold */
  providers: Partial<Record<PaymentGateway, PaymentProvider>>;
  customers: CustomerDirectory;
  /** App id → free plan id provisioned for users without a subscription */
  freePlanIds?: Readonly<Record<string, string>> | undefined;
  eventLog?: EventLog | undefined;
  usage?: UsageTracker | undefined;
  /** Clock; defaults to the system time */
  now?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

/**
 * Result of `createSubscription`
 */
export interface CreatedSubscription {
  subscription: Subscription;
  /** Gateway the checkout runs through; null for free plans */
  gateway: PaymentGateway | null;
  checkoutUrl: string | null;
}

export interface CancellationResult {
  id: string;
  /** Access continues until the period ends */
  status: "active";
  cancellation_scheduled: true;
  end_date: string | null;
  message: string;
}

export interface ActivationResult {
  status: "success";
  message: string;
  subscription_id: string;
  period_start: string;
  period_end: string;
  invoice_id: string | null;
}

const PENDING_CANCEL_MESSAGE =
  "Subscription will remain active until the end of the current billing period";

function notesUserId(notes: object | null | undefined): string | null {
  if (!notes || !("user_id" in notes)) return null;
  return typeof notes.user_id === "string" ? notes.user_id : null;
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Subscription Engine
 *
 * Owns every subscription state change. Each operation runs in one store
 * transaction; provider calls happen outside it.
 *
 * @example
 * ```typescript
 * const engine = new SubscriptionEngine({
 *   store: createMemorySubscriptionStore(),
 *   providers: { razorpay: createRazorpayProvider(config.razorpay) },
 *   customers: new MemoryCustomerDirectory([{ userId: 'user_1', email: 'a@example.com', displayName: null }]),
 * });
 *
 * // Free plan is provisioned on first read
 * const subscription = await engine.getUserSubscription('user_1', 'marketfit');
 *
 * // Paid plan returns a checkout URL; the row stays `created` until a webhook activates it
 * const { checkoutUrl } = await engine.createSubscription('user_1', 'plan_pro', 'marketfit');
 * ```
 */
export class SubscriptionEngine implements WebhookSink {
  private readonly store: SubscriptionStore;
  private readonly providers: Partial<Record<PaymentGateway, PaymentProvider>>;
  private readonly customers: CustomerDirectory;
  private readonly freePlanIds: Readonly<Record<string, string>>;
  private readonly eventLog: EventLog;
  private readonly usage: UsageTracker;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly lifecycle: SubscriptionLifecycle;
  private readonly registry: WebhookHandlerRegistry;

  constructor(config: SubscriptionEngineConfig) {
    this.store = config.store;
    this.providers = config.providers;
    this.customers = config.customers;
    this.freePlanIds = config.freePlanIds ?? DEFAULT_FREE_PLAN_IDS;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? createLogger({ name: "subscriptions" });
    this.eventLog = config.eventLog ?? createEventLog(this.store, this.logger.child({ component: "event-log" }));
    this.usage =
      config.usage ??
      new UsageTracker({
        store: this.store,
        now: this.now,
        logger: this.logger.child({ component: "usage" }),
      });
    this.lifecycle = new SubscriptionLifecycle(this.logger);
    this.registry = registerRazorpayHandlers(createWebhookHandlerRegistry(), {
      lifecycle: this.lifecycle,
      now: this.now,
      logger: this.logger,
    });
  }

  // ============================================================================
  // Plans & Reads
  // ============================================================================

  /**
   * Active plans of an app, cheapest first
   */
  async getAvailablePlans(appId: string): Promise<Plan[]> {
    return this.store.listActivePlans(appId);
  }

  /**
   * The user's current subscription joined with its plan.
   * Prefers an active row, then one awaiting checkout; with neither, the
   * app's free plan is provisioned.
   */
  async getUserSubscription(userId: string, appId: string): Promise<SubscriptionWithPlan> {
    const existing = await this.store.transaction(async (tx) => {
      const subscription =
        (await tx.findLatestSubscription({ userId, appId, status: "active" })) ??
        (await tx.findLatestSubscription({ userId, appId, status: "created" }));
      return subscription ? this.withPlan(tx, subscription) : null;
    });
    if (existing) {
      return existing;
    }

    const freePlanId = this.freePlanIds[appId];
    if (!freePlanId) {
      throw new NotFoundError("Plan", `No free plan configured for app ${appId}`, { appId });
    }

    this.logger.info("Provisioning free plan", { userId, appId, planId: freePlanId });
    const { subscription } = await this.createSubscription(userId, freePlanId, appId);
    return this.store.transaction((tx) => this.withPlan(tx, subscription));
  }

  /**
   * Invoices of the user in an app, newest first
   */
  async getBillingHistory(userId: string, appId: string): Promise<Invoice[]> {
    return this.store.listInvoices(userId, appId);
  }

  async getUsageStats(userId: string, appId: string): Promise<UsageCounters> {
    return this.usage.get(userId, appId);
  }

  async incrementUsage(
    userId: string,
    appId: string,
    resourceType: string,
    count: number = 1
  ): Promise<boolean> {
    return this.usage.increment(userId, appId, resourceType, count);
  }

  // ============================================================================
  // Direct Operations
  // ============================================================================

  /**
   * Subscribe a user to a plan.
   *
   * Free plans become active immediately. Paid plans are opened at the
   * plan's first gateway and stored as `created` until a webhook arrives.
   */
  async createSubscription(userId: string, planId: string, appId: string): Promise<CreatedSubscription> {
    const plan = await this.store.getPlan(planId);
    if (!plan) {
      throw new NotFoundError("Plan", `Plan with ID ${planId} not found`, { planId });
    }

    if (plan.amount === 0) {
      return this.store.transaction((tx) => this.provisionFree(tx, userId, plan, appId));
    }

    const customer = await this.customers.getCustomer(userId);
    if (!customer) {
      throw new NotFoundError("User", `User with ID ${userId} not found`, { userId });
    }

    const gateway = plan.paymentGateways[0] ?? "razorpay";
    if (!isValid(paymentGateway, gateway)) {
      throw new ValidationError(`Unsupported payment gateway: ${gateway}`, [
        { field: "payment_gateways", message: `unsupported gateway ${gateway}` },
      ]);
    }
    const provider = this.providers[gateway];
    if (!provider) {
      throw new ValidationError(`Unsupported payment gateway: ${gateway}`, [
        { field: "payment_gateways", message: `gateway ${gateway} is not configured` },
      ]);
    }

    let planRef: string;
    if (gateway === "paypal") {
      if (!plan.paypalPlanId) {
        throw new ValidationError("PayPal plan ID not found for this plan", [
          { field: "paypal_plan_id", message: "required for PayPal plans" },
        ]);
      }
      planRef = plan.paypalPlanId;
    } else {
      planRef = plan.razorpayPlanId ?? plan.id;
    }

    const response = await provider.createSubscription(planRef, customer, appId);
    if (isProviderFailure(response)) {
      this.logger.error("Provider rejected subscription", undefined, {
        gateway,
        planId,
        userId,
        reason: response.message,
      });
      throw new ProviderError(response.message, gateway, { planId, userId, code: response.code });
    }

    const subscription = await this.store.transaction(async (tx) => {
      const created = await tx.insertSubscription({
        id: generatePrefixedId("sub_"),
        userId,
        planId,
        appId,
        status: "created",
        razorpaySubscriptionId: gateway === "razorpay" ? response.id : null,
        paypalSubscriptionId: gateway === "paypal" ? response.id : null,
        currentPeriodStart: null,
        currentPeriodEnd: null,
        metadata: response.raw,
      });

      await this.eventLog.record(
        { eventType: "subscription_created", gateway, entityId: response.id, userId, data: response.raw },
        tx
      );
      return created;
    });

    this.logger.info("Subscription created", {
      subscriptionId: subscription.id,
      gateway,
      providerSubscriptionId: response.id,
    });
    return { subscription, gateway, checkoutUrl: response.checkoutUrl ?? null };
  }

  private async provisionFree(
    tx: SubscriptionStore,
    userId: string,
    plan: Plan,
    appId: string
  ): Promise<CreatedSubscription> {
    const now = this.now();
    const existing = await tx.findLatestSubscription({ userId, appId, status: "active" });

    if (existing && existing.planId === plan.id) {
      await this.usage.currentRow(tx, existing);
      return { subscription: existing, gateway: null, checkoutUrl: null };
    }

    const period = periodFrom(now, plan);

    if (existing) {
      const switched = await this.lifecycle.activate(tx, existing, period, now, { planId: plan.id });
      this.logger.info("Switched active subscription to free plan", {
        subscriptionId: switched.id,
        planId: plan.id,
      });
      return { subscription: switched, gateway: null, checkoutUrl: null };
    }

    const subscription = await tx.insertSubscription({
      id: generatePrefixedId("sub_"),
      userId,
      planId: plan.id,
      appId,
      status: "active",
      razorpaySubscriptionId: null,
      paypalSubscriptionId: null,
      currentPeriodStart: period.start,
      currentPeriodEnd: period.end,
      metadata: {},
    });
    await tx.insertUsage(newUsageRow(subscription, period));

    this.logger.info("Free subscription created", { subscriptionId: subscription.id, userId, appId });
    return { subscription, gateway: null, checkoutUrl: null };
  }

  /**
   * Record a subscription approved in PayPal's own checkout and make it active
   */
  async recordPayPalSubscription(
    userId: string,
    planId: string,
    paypalSubscriptionId: string,
    appId: string
  ): Promise<SubscriptionWithPlan> {
    return this.store.transaction(async (tx) => {
      const plan = await tx.getPlan(planId);
      if (!plan || plan.appId !== appId) {
        throw new NotFoundError("Plan", undefined, { planId, appId });
      }

      const now = this.now();
      const period = periodFrom(now, plan);
      const existing = await tx.findLatestSubscription({ userId, appId, status: "active" });

      let subscription: Subscription;
      if (existing) {
        subscription = await this.lifecycle.activate(tx, existing, period, now, {
          planId,
          paypalSubscriptionId,
        });
      } else {
        subscription = await tx.insertSubscription({
          id: generatePrefixedId("sub_"),
          userId,
          planId,
          appId,
          status: "active",
          razorpaySubscriptionId: null,
          paypalSubscriptionId,
          currentPeriodStart: period.start,
          currentPeriodEnd: period.end,
          metadata: {},
        });
        await tx.insertUsage(newUsageRow(subscription, period));
      }

      await this.eventLog.record(
        {
          eventType: "paypal_subscription_recorded",
          gateway: "paypal",
          entityId: paypalSubscriptionId,
          userId,
          data: { subscription_id: subscription.id, plan_id: planId, app_id: appId },
        },
        tx
      );

      this.logger.info("PayPal subscription recorded", { subscriptionId: subscription.id, paypalSubscriptionId });
      return this.withPlan(tx, subscription, plan);
    });
  }

  /**
   * Schedule cancellation at the end of the current period.
   * The row stays active; a provider failure only gets logged.
   */
  async cancelSubscription(userId: string, subscriptionId: string): Promise<CancellationResult> {
    const subscription = await this.store.getSubscription(subscriptionId);
    if (!subscription || subscription.userId !== userId) {
      throw new NotFoundError("Subscription", "Subscription not found or not owned by user", {
        subscriptionId,
        userId,
      });
    }

    await this.cancelAtProviders(subscription);

    const cancelledAt = this.now();
    await this.store.transaction(async (tx) => {
      const current = await tx.getSubscription(subscription.id);
      if (!current) {
        throw new NotFoundError("Subscription", undefined, { subscriptionId });
      }
      await tx.updateSubscription(current.id, {
        metadata: mergeMetadata(current.metadata, {
          cancellation_scheduled: true,
          cancelled_at: cancelledAt.toISOString(),
        }),
      });
    });

    this.logger.info("Cancellation scheduled", { subscriptionId, userId });
    return {
      id: subscription.id,
      status: "active",
      cancellation_scheduled: true,
      end_date: subscription.currentPeriodEnd?.toISOString() ?? null,
      message: PENDING_CANCEL_MESSAGE,
    };
  }

  private async cancelAtProviders(subscription: Subscription): Promise<void> {
    const targets: [PaymentGateway, string | null][] = [
      ["razorpay", subscription.razorpaySubscriptionId],
      ["paypal", subscription.paypalSubscriptionId],
    ];

    for (const [gateway, providerId] of targets) {
      if (!providerId) continue;

      const provider = this.providers[gateway];
      if (!provider) {
        this.logger.warn("No provider configured, cancelling locally only", { gateway, providerId });
        continue;
      }

      try {
        const result = await provider.cancelSubscription(providerId, true);
        if (isProviderFailure(result)) {
          this.logger.error("Error scheduling cancellation with provider", undefined, {
            gateway,
            providerId,
            reason: result.message,
          });
        } else {
          this.logger.info("Provider cancellation scheduled", { gateway, providerId });
        }
      } catch (err) {
        this.logger.error("Error scheduling cancellation with provider", err, { gateway, providerId });
      }
    }
  }

  /**
   * Activate a Razorpay subscription after its checkout signature was verified.
   * Records a manual invoice when a payment id is given.
   */
  async activateSubscription(
    userId: string,
    razorpaySubscriptionId: string,
    paymentId?: string | null
  ): Promise<ActivationResult> {
    return this.store.transaction(async (tx) => {
      const subscription = await tx.findSubscriptionByProviderId("razorpay", razorpaySubscriptionId);
      if (!subscription || subscription.userId !== userId) {
        throw new NotFoundError("Subscription", undefined, { razorpaySubscriptionId, userId });
      }

      const plan = await tx.getPlan(subscription.planId);
      if (!plan) {
        throw new NotFoundError("Plan", undefined, { planId: subscription.planId });
      }

      const now = this.now();
      const period = periodFrom(now, plan);
      const activated = await this.lifecycle.activate(tx, subscription, period, now);

      let invoiceId: string | null = null;
      if (paymentId) {
        const invoice = await tx.insertInvoice({
          id: generatePrefixedId("inv_"),
          subscriptionId: activated.id,
          userId,
          appId: activated.appId,
          razorpayInvoiceId: MANUAL_ACTIVATION_INVOICE_ID,
          paypalInvoiceId: null,
          amount: plan.amount,
          currency: plan.currency,
          status: "paid",
          paymentId,
          invoiceDate: now,
          paidAt: now,
        });
        invoiceId = invoice?.id ?? null;
      }

      await this.eventLog.record(
        {
          eventType: "manual_activation",
          gateway: "razorpay",
          entityId: razorpaySubscriptionId,
          userId,
          data: { payment_id: paymentId ?? null },
        },
        tx
      );

      this.logger.info("Subscription manually activated", { subscriptionId: activated.id, razorpaySubscriptionId });
      return {
        status: "success",
        message: "Subscription activated",
        subscription_id: activated.id,
        period_start: period.start.toISOString(),
        period_end: period.end.toISOString(),
        invoice_id: invoiceId,
      };
    });
  }

  // ============================================================================
  // Webhooks
  // ============================================================================

  /**
   * Apply a verified Razorpay notification.
   * Logs the delivery, runs its handler in a transaction and logs the outcome.
   */
  async handleRazorpayEvent(payload: RazorpayWebhookPayload): Promise<WebhookResult> {
    const event = toRazorpayEvent(payload);
    const entityId = event.payment?.id ?? event.subscription?.id ?? null;
    const userId = notesUserId(event.subscription?.notes);
    const context = { event: event.event, entityId, userId };

    this.logger.info("Handling Razorpay event", context);
    await this.eventLog.received("razorpay", event.event, entityId, userId, payload);

    let result: HandlerResult;
    try {
      result = await this.store.transaction((tx) => this.registry.handle(event, tx));
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error("Razorpay event handler failed", err, context);
      await this.eventLog
        .processed("razorpay", event.event, entityId, userId, { status: "error", message }, message)
        .catch((logErr: unknown) => {
          this.logger.error("Failed to log webhook outcome", logErr, context);
        });
      throw err;
    }

    await this.eventLog.processed(
      "razorpay",
      event.event,
      entityId,
      userId,
      result,
      result.status === "error" ? result.message : null
    );

    if (result.status === "success") {
      return { status: "success", message: `Processed ${event.event} event`, result };
    }
    if (result.status === "error") {
      this.logger.warn("Razorpay event not applied", { ...context, reason: result.message });
    }
    return { status: result.status, message: result.message, result };
  }

  /**
   * PayPal notifications are logged but not yet acted on
   */
  async handlePayPalEvent(payload: PaypalWebhookPayload): Promise<WebhookResult> {
    const resourceId = payload.resource && "id" in payload.resource ? payload.resource.id : undefined;
    const entityId = typeof resourceId === "string" ? resourceId : (payload.id ?? null);
    const eventType = payload.event_type;

    await this.eventLog.received("paypal", eventType, entityId, null, payload);

    const result: HandlerResult = { status: "ignored", message: "PayPal webhook handling not implemented" };
    await this.eventLog.processed("paypal", eventType, entityId, null, result);

    this.logger.info("PayPal event logged", { eventType, entityId });
    return { status: "ignored", message: result.message, result };
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async withPlan(
    tx: SubscriptionStore,
    subscription: Subscription,
    knownPlan?: Plan
  ): Promise<SubscriptionWithPlan> {
    const plan = knownPlan ?? (await tx.getPlan(subscription.planId));
    if (!plan) {
      throw new NotFoundError("Plan", undefined, { planId: subscription.planId });
    }
    return {
      ...subscription,
      planName: plan.name,
      features: plan.features,
      amount: plan.amount,
      currency: plan.currency,
      interval: plan.interval,
    };
  }
}

/**
 * Create a subscription engine
 */
export function createSubscriptionEngine(config: SubscriptionEngineConfig): SubscriptionEngine {
  return new SubscriptionEngine(config);
}
