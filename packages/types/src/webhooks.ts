/**
 * @module
 * Schemas for inbound provider webhook payloads.
 *
 * Razorpay delivers `{ event, payload: { subscription: { entity }, payment: { entity } } }`.
 * Entities are validated loosely: undeclared keys are kept so the full entity
 * can be snapshotted into subscription metadata.
 *
 * @example
 * ```typescript
 * import { razorpayWebhookPayload, safeValidate } from '@subledger/types';
 *
 * const result = safeValidate(razorpayWebhookPayload, JSON.parse(rawBody));
 * if (!result.success) {
 *   // "Invalid webhook payload"
 * }
 * ```
 */

import { type } from "arktype";

// ============================================================================
// Razorpay
// ============================================================================

/** Razorpay subscription entity (fields the engine reads) */
export const razorpaySubscriptionEntity = type({
  "id?": "string",
  "status?": "string",
  "plan_id?": "string",
  "start_at?": "number | string | null",
  "current_start?": "number | null",
  "current_end?": "number | null",
  "short_url?": "string | null",
  "notes?": "object | null",
});

/** Razorpay payment entity (fields the engine reads) */
export const razorpayPaymentEntity = type({
  "id?": "string",
  "invoice_id?": "string | null",
  "amount?": "number",
  "currency?": "string",
  "status?": "string",
});

/**
 * Envelope of a Razorpay webhook. The entity containers are `object`
 * because Razorpay sometimes sends the entity directly instead of under `entity`.
 */
export const razorpayWebhookPayload = type({
  event: "string >= 1",
  "payload?": {
    "subscription?": "object",
    "payment?": "object",
  },
  "created_at?": "number",
});

// ============================================================================
// PayPal
// ============================================================================

/** PayPal webhook envelope */
export const paypalWebhookPayload = type({
  event_type: "string >= 1",
  "id?": "string",
  "resource?": "object",
});

// ============================================================================
// Type Exports
// ============================================================================

export type RazorpaySubscriptionEntity = typeof razorpaySubscriptionEntity.infer;
export type RazorpayPaymentEntity = typeof razorpayPaymentEntity.infer;
export type RazorpayWebhookPayload = typeof razorpayWebhookPayload.infer;
export type PaypalWebhookPayload = typeof paypalWebhookPayload.infer;
