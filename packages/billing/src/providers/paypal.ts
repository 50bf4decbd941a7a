/**
 * @subledger/billing - PayPal Provider
 * Placeholder: holds the capability boundary without speaking PayPal's API
 */

import { createLogger, type Logger } from "@subledger/core";
import type {
  PaymentProvider,
  ProviderFailure,
  ProviderResult,
  ProviderSubscription,
  ProviderSubscriptionStatus,
} from "../types.js";

/**
 * PayPal provider configuration
 */
export interface PayPalProviderConfig {
  clientId?: string | undefined;
  clientSecret?: string | undefined;
  logger?: Logger | undefined;
}

/**
 * PayPal Payment Provider (stub)
 *
 * Without credentials every call reports "PayPal client not initialized";
 * with them, every call reports that the integration is not implemented.
 * Subscriptions created in PayPal's own checkout are recorded through
 * `SubscriptionEngine.recordPayPalSubscription`.
 */
export class PayPalProvider implements PaymentProvider {
  readonly gateway = "paypal" as const;

  private readonly initialized: boolean;
  private readonly logger: Logger;

  constructor(config: PayPalProviderConfig = {}) {
    this.initialized = Boolean(config.clientId && config.clientSecret);
    this.logger = config.logger ?? createLogger({ name: "paypal" });
  }

  private unavailable(operation: string, subject: string): ProviderFailure {
    if (!this.initialized) {
      return { error: true, message: "PayPal client not initialized" };
    }
    this.logger.warn(`PayPal ${operation} requested but not implemented`, { subject });
    return { error: true, message: "PayPal integration not fully implemented" };
  }

  async createSubscription(
    planRef: string
  ): Promise<ProviderResult<ProviderSubscription>> {
    return this.unavailable("create", planRef);
  }

  async cancelSubscription(subscriptionId: string): Promise<ProviderResult<ProviderSubscriptionStatus>> {
    return this.unavailable("cancel", subscriptionId);
  }

  async fetchSubscription(subscriptionId: string): Promise<ProviderResult<ProviderSubscriptionStatus>> {
    return this.unavailable("fetch", subscriptionId);
  }

  /**
   * Confirm a subscription approved in PayPal's checkout
   */
  async verifySubscription(subscriptionId: string): Promise<ProviderResult<ProviderSubscriptionStatus>> {
    return this.unavailable("verify", subscriptionId);
  }
}

/**
 * Create a PayPal provider
 */
export function createPayPalProvider(config?: PayPalProviderConfig): PayPalProvider {
  return new PayPalProvider(config);
}
