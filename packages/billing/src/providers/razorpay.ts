/**
 * @subledger/billing - Razorpay Provider
 * Razorpay Subscriptions over the REST API using fetch
 */

import { createLogger, errorMessage, isPlainObject, type Logger } from "@subledger/core";
import type {
  CustomerInfo,
  Metadata,
  PaymentProvider,
  ProviderFailure,
  ProviderResult,
  ProviderSubscription,
  ProviderSubscriptionStatus,
} from "../types.js";
import { isProviderFailure } from "../types.js";

/**
 * Razorpay provider configuration
 */
export interface RazorpayProviderConfig {
  /** API key id; without it every operation reports "not initialized" */
  keyId?: string | undefined;
  /** API key secret */
  keySecret?: string | undefined;
  /** Override the API base URL */
  baseUrl?: string | undefined;
  /** Per-request timeout in milliseconds (default 15000) */
  timeoutMs?: number | undefined;
  /** Billing cycles per subscription (default 12) */
  totalCount?: number | undefined;
  logger?: Logger | undefined;
}

const NOT_INITIALIZED: ProviderFailure = {
  error: true,
  message: "Razorpay client not initialized",
};

/**
 * Razorpay Payment Provider
 *
 * @example
 * ```typescript
 * const razorpay = new RazorpayProvider({
 *   keyId: process.env.RAZORPAY_KEY_ID,
 *   keySecret: process.env.RAZORPAY_KEY_SECRET,
 * });
 *
 * const result = await razorpay.createSubscription('plan_rzp_123', customer, 'marketfit');
 * if (!isProviderFailure(result)) {
 *   redirect(result.checkoutUrl);
 * }
 * ```
 */
export class RazorpayProvider implements PaymentProvider {
  readonly gateway = "razorpay" as const;

  private readonly authHeader: string | null;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly totalCount: number;
  private readonly logger: Logger;

  constructor(config: RazorpayProviderConfig = {}) {
    this.authHeader =
      config.keyId && config.keySecret
        ? `Basic ${Buffer.from(`${config.keyId}:${config.keySecret}`).toString("base64")}`
        : null;
    this.baseUrl = config.baseUrl ?? "https://api.razorpay.com/v1";
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.totalCount = config.totalCount ?? 12;
    this.logger = config.logger ?? createLogger({ name: "razorpay" });

    if (!this.authHeader) {
      this.logger.warn("Razorpay credentials missing; provider calls will be refused");
    }
  }

  /**
   * Whether credentials were supplied
   */
  get initialized(): boolean {
    return this.authHeader !== null;
  }

  // ============================================================================
  // HTTP
  // ============================================================================

  private async request(
    endpoint: string,
    options: { method?: string; body?: Record<string, unknown> } = {}
  ): Promise<ProviderResult<Metadata>> {
    if (!this.authHeader) {
      return NOT_INITIALIZED;
    }

    const { method = "GET", body } = options;

    const init: RequestInit = {
      method,
      headers: {
        Authorization: this.authHeader,
        "Content-Type": "application/json",
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    if (body) {
      init.body = JSON.stringify(body);
    }

    try {
      const response = await fetch(`${this.baseUrl}${endpoint}`, init);
      const data: unknown = await response.json();

      if (!isPlainObject(data)) {
        return { error: true, message: `Razorpay API error: unexpected response (HTTP ${response.status})` };
      }

      if (!response.ok) {
        const apiError = data["error"];
        const description =
          isPlainObject(apiError) && typeof apiError["description"] === "string"
            ? apiError["description"]
            : `HTTP ${response.status}`;
        const code =
          isPlainObject(apiError) && typeof apiError["code"] === "string" ? apiError["code"] : undefined;
        return { error: true, message: `Razorpay API error: ${description}`, code };
      }

      return data;
    } catch (err) {
      if (err instanceof Error && err.name === "TimeoutError") {
        return { error: true, message: `Razorpay request timed out after ${this.timeoutMs}ms` };
      }
      return { error: true, message: errorMessage(err) };
    }
  }

  private fail(operation: string, failure: ProviderFailure, context: Record<string, unknown>): ProviderFailure {
    this.logger.error(`Razorpay ${operation} failed`, {
      ...context,
      reason: failure.message,
      code: failure.code,
    });
    return failure;
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  async createSubscription(
    planRef: string,
    customer: CustomerInfo,
    appId: string,
    additionalNotes: Record<string, string> = {}
  ): Promise<ProviderResult<ProviderSubscription>> {
    this.logger.info("Creating Razorpay subscription", { userId: customer.userId, planRef, appId });

    const result = await this.request("/subscriptions", {
      method: "POST",
      body: {
        plan_id: planRef,
        customer_notify: 1,
        quantity: 1,
        total_count: this.totalCount,
        notes: {
          user_id: customer.userId,
          app_id: appId,
          ...additionalNotes,
        },
      },
    });

    if (isProviderFailure(result)) {
      return this.fail("create", result, { userId: customer.userId, planRef });
    }

    const id = result["id"];
    if (typeof id !== "string") {
      return this.fail(
        "create",
        { error: true, message: "Razorpay API error: response has no subscription id" },
        { userId: customer.userId, planRef }
      );
    }

    const shortUrl = result["short_url"];
    return {
      id,
      status: typeof result["status"] === "string" ? result["status"] : "created",
      checkoutUrl: typeof shortUrl === "string" ? shortUrl : undefined,
      raw: result,
    };
  }

  async cancelSubscription(
    subscriptionId: string,
    cancelAtCycleEnd: boolean = true
  ): Promise<ProviderResult<ProviderSubscriptionStatus>> {
    this.logger.info("Cancelling Razorpay subscription", { subscriptionId, cancelAtCycleEnd });

    const result = await this.request(`/subscriptions/${encodeURIComponent(subscriptionId)}/cancel`, {
      method: "POST",
      body: { cancel_at_cycle_end: cancelAtCycleEnd ? 1 : 0 },
    });

    if (isProviderFailure(result)) {
      return this.fail("cancel", result, { subscriptionId });
    }

    return this.toStatus(result);
  }

  async fetchSubscription(subscriptionId: string): Promise<ProviderResult<ProviderSubscriptionStatus>> {
    const result = await this.request(`/subscriptions/${encodeURIComponent(subscriptionId)}`);

    if (isProviderFailure(result)) {
      return this.fail("fetch", result, { subscriptionId });
    }

    return this.toStatus(result);
  }

  private toStatus(raw: Metadata): ProviderSubscriptionStatus {
    const status = raw["status"];
    return {
      status: typeof status === "string" ? status : "unknown",
      raw,
    };
  }
}

/**
 * Create a Razorpay provider
 */
export function createRazorpayProvider(config?: RazorpayProviderConfig): RazorpayProvider {
  return new RazorpayProvider(config);
}
