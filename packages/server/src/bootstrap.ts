/**
 * @subledger/server - Bootstrap
 * Wires the Postgres store, providers and engine from configuration
 */

import postgres from "postgres";
import { drizzle } from "drizzle-orm/postgres-js";
import { ValidationError, type Logger } from "@subledger/core";
import {
  DrizzleCustomerDirectory,
  createDrizzleSubscriptionStore,
  createPayPalProvider,
  createRazorpayProvider,
  createRazorpayWebhookVerifier,
  createSubscriptionEngine,
  createWebhookProcessor,
  PayPalWebhookVerifier,
  type BillingConfig,
  type DrizzleDb,
  type DrizzleSubscriptionStore,
  type PaymentGateway,
  type PaymentProvider,
  type SubscriptionEngine,
  type WebhookProcessor,
  type RazorpayWebhookVerifier,
} from "@subledger/billing";

export interface Runtime {
  db: DrizzleDb;
  store: DrizzleSubscriptionStore;
  providers: Partial<Record<PaymentGateway, PaymentProvider>>;
  engine: SubscriptionEngine;
  webhooks: WebhookProcessor;
  paymentVerifier: RazorpayWebhookVerifier;
  /** Close the database pool */
  close(): Promise<void>;
}

/**
 * Build every long-lived service from configuration
 */
export function createRuntime(config: BillingConfig, logger: Logger): Runtime {
  if (!config.databaseUrl) {
    throw new ValidationError("DATABASE_URL is not set", [
      { field: "DATABASE_URL", message: "required" },
    ]);
  }

  const sql = postgres(config.databaseUrl);
  const db = drizzle(sql);
  const store = createDrizzleSubscriptionStore({ db });

  const providers: Partial<Record<PaymentGateway, PaymentProvider>> = {
    razorpay: createRazorpayProvider({
      keyId: config.razorpay.keyId,
      keySecret: config.razorpay.keySecret,
      timeoutMs: config.providerTimeoutMs,
      logger: logger.child({ provider: "razorpay" }),
    }),
    paypal: createPayPalProvider({
      clientId: config.paypal.clientId,
      clientSecret: config.paypal.clientSecret,
      logger: logger.child({ provider: "paypal" }),
    }),
  };

  const engine = createSubscriptionEngine({
    store,
    providers,
    customers: new DrizzleCustomerDirectory({ db }),
    freePlanIds: config.freePlanIds,
    logger: logger.child({ component: "engine" }),
  });

  const paymentVerifier = createRazorpayWebhookVerifier({
    webhookSecret: config.razorpay.webhookSecret,
    logger,
  });

  const webhooks = createWebhookProcessor(engine, {
    razorpayVerifier: paymentVerifier,
    paypalVerifier: new PayPalWebhookVerifier({ logger }),
    allowUnsigned: config.allowUnsignedWebhooks,
    logger: logger.child({ component: "webhooks" }),
  });

  return {
    db,
    store,
    providers,
    engine,
    webhooks,
    paymentVerifier,
    close: () => sql.end(),
  };
}
