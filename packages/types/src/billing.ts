/**
 * @module
 * Schemas for plan definitions and billing configuration.
 *
 * @example
 * ```typescript
 * import { planDefinition, validateWithSchema } from '@subledger/types';
 *
 * const plan = validateWithSchema(planDefinition, seedJson);
 * ```
 */

import { type } from "arktype";
import { billingInterval, nonNegativeInt, paymentGateway, positiveInt } from "./common.js";

// ============================================================================
// Plan Schemas
// ============================================================================

/** Feature name → limit or flag */
export const planFeatures = type("Record<string, number | string | boolean>");

/** Plan as written in seed files and admin tooling */
export const planDefinition = type({
  id: "string >= 1",
  name: "string >= 1",
  "description?": "string | null",
  amount: nonNegativeInt,
  "currency?": "string == 3",
  interval: billingInterval,
  "interval_count?": positiveInt,
  features: planFeatures,
  app_id: "string >= 1",
  "payment_gateways?": paymentGateway.array(),
  "razorpay_plan_id?": "string | null",
  "paypal_plan_id?": "string | null",
  "plan_type?": "string",
  "is_active?": "boolean",
});

// ============================================================================
// Configuration Schemas
// ============================================================================

/** App id → free plan id */
export const freePlanMapping = type("Record<string, string>");

// ============================================================================
// Type Exports
// ============================================================================

export type PlanFeatures = typeof planFeatures.infer;
export type PlanDefinition = typeof planDefinition.infer;
export type FreePlanMapping = typeof freePlanMapping.infer;
