/**
 * @module
 * Request schemas for the subscription HTTP surface.
 * Field names are snake_case to match the wire format clients already send.
 */

import { type } from "arktype";
import { resourceType } from "./common.js";

// ============================================================================
// Query Schemas
// ============================================================================

/** `?app_id=` */
export const appQuery = type({
  "app_id?": "string >= 1",
});

/** `?user_id=&app_id=` */
export const userAppQuery = type({
  user_id: "string >= 1",
  "app_id?": "string >= 1",
});

// ============================================================================
// Body Schemas
// ============================================================================

/** POST /create */
export const createSubscriptionBody = type({
  user_id: "string >= 1",
  plan_id: "string >= 1",
  "app_id?": "string >= 1",
});

/** POST /cancel/:subscription_id */
export const cancelSubscriptionBody = type({
  user_id: "string >= 1",
});

/** POST /verify-payment */
export const verifyPaymentBody = type({
  razorpay_payment_id: "string >= 1",
  razorpay_subscription_id: "string >= 1",
  razorpay_signature: "string >= 1",
  user_id: "string >= 1",
});

/** POST /increment-usage */
export const incrementUsageBody = type({
  user_id: "string >= 1",
  "app_id?": "string >= 1",
  resource_type: resourceType,
  "count?": "number.integer > 0",
});

/** POST /record-paypal */
export const recordPaypalBody = type({
  user_id: "string >= 1",
  plan_id: "string >= 1",
  paypal_subscription_id: "string >= 1",
  "app_id?": "string >= 1",
});

// ============================================================================
// Type Exports
// ============================================================================

export type AppQuery = typeof appQuery.infer;
export type UserAppQuery = typeof userAppQuery.infer;
export type CreateSubscriptionBody = typeof createSubscriptionBody.infer;
export type CancelSubscriptionBody = typeof cancelSubscriptionBody.infer;
export type VerifyPaymentBody = typeof verifyPaymentBody.infer;
export type IncrementUsageBody = typeof incrementUsageBody.infer;
export type RecordPaypalBody = typeof recordPaypalBody.infer;
