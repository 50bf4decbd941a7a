/**
 * @subledger/billing - Configuration
 * Reads billing settings from the environment
 */

import {
  ValidationError,
  getEnv,
  getEnvBoolean,
  getEnvJson,
  getEnvNumber,
} from "@subledger/core";
import { freePlanMapping, safeValidate, type FreePlanMapping } from "@subledger/types";

/**
 * App id → plan id provisioned for users with no subscription
 */
export const DEFAULT_FREE_PLAN_IDS: Readonly<FreePlanMapping> = {
  marketfit: "plan_free_marketfit",
  saleswit: "plan_free_saleswit",
};

export interface BillingConfig {
  databaseUrl: string | undefined;
  razorpay: {
    keyId: string | undefined;
    keySecret: string | undefined;
    webhookSecret: string | undefined;
  };
  paypal: {
    clientId: string | undefined;
    clientSecret: string | undefined;
  };
  freePlanIds: FreePlanMapping;
  defaultAppId: string;
  providerTimeoutMs: number;
  /** Accept Razorpay webhooks without a signature header */
  allowUnsignedWebhooks: boolean;
  port: number;
}

/**
 * Build the billing configuration from environment variables
 *
 * @example
 * ```typescript
 * const config = loadBillingConfig();
 * const razorpay = createRazorpayProvider({ ...config.razorpay, timeoutMs: config.providerTimeoutMs });
 * ```
 */
export function loadBillingConfig(): BillingConfig {
  return {
    databaseUrl: getEnv("DATABASE_URL"),
    razorpay: {
      keyId: getEnv("RAZORPAY_KEY_ID"),
      keySecret: getEnv("RAZORPAY_KEY_SECRET"),
      webhookSecret: getEnv("RAZORPAY_WEBHOOK_SECRET"),
    },
    paypal: {
      clientId: getEnv("PAYPAL_CLIENT_ID"),
      clientSecret: getEnv("PAYPAL_CLIENT_SECRET"),
    },
    freePlanIds: readFreePlanIds(),
    defaultAppId: getEnv("DEFAULT_APP_ID", "marketfit") ?? "marketfit",
    providerTimeoutMs: getEnvNumber("PROVIDER_TIMEOUT_MS", 15_000),
    allowUnsignedWebhooks: getEnvBoolean("ALLOW_UNSIGNED_WEBHOOKS", false),
    port: getEnvNumber("PORT", 5000),
  };
}

function readFreePlanIds(): FreePlanMapping {
  const raw = getEnvJson("FREE_PLAN_IDS");
  if (raw === undefined) {
    return { ...DEFAULT_FREE_PLAN_IDS };
  }

  const result = safeValidate(freePlanMapping, raw);
  if (!result.success) {
    throw new ValidationError(
      "FREE_PLAN_IDS must map app ids to plan ids",
      result.errors.map((e) => ({ field: `FREE_PLAN_IDS.${e.path}`, message: e.message }))
    );
  }
  return result.data;
}
