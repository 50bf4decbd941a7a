/**
 * @module
 * Common validation schemas shared across Subledger packages.
 *
 * @example
 * ```typescript
 * import { billingInterval, resourceType } from '@subledger/types';
 *
 * const interval = billingInterval('month');
 * ```
 */

import { type } from "arktype";

// ============================================================================
// Primitive Schemas
// ============================================================================

/** ISO 8601 timestamp string */
export const timestamp = type("string.date.iso");

/** Non-empty string */
export const nonEmptyString = type("string >= 1");

/** Positive integer */
export const positiveInt = type("number.integer > 0");

/** Non-negative integer */
export const nonNegativeInt = type("number.integer >= 0");

/** Currency code (ISO 4217) */
export const currencyCode = type("string == 3");

// ============================================================================
// Billing Enumerations
// ============================================================================

/** Billing interval unit */
export const billingInterval = type("'month' | 'year'");

/** Payment gateway name */
export const paymentGateway = type("'razorpay' | 'paypal'");

/** Subscription lifecycle status, including states only a provider sync can report */
export const subscriptionStatus = type(
  "'created' | 'authenticated' | 'active' | 'pending' | 'halted' | 'paused' | 'completed' | 'cancelled' | 'expired'"
);

/** Metered resource type */
export const resourceType = type("'document_pages' | 'perplexity_requests'");

// ============================================================================
// Error Schemas
// ============================================================================

/** Error body returned by the HTTP surface */
export const errorBody = type({
  error: "string",
  code: "string",
  "details?": "unknown",
});

// ============================================================================
// Type Exports
// ============================================================================

export type Timestamp = typeof timestamp.infer;
export type NonEmptyString = typeof nonEmptyString.infer;
export type PositiveInt = typeof positiveInt.infer;
export type NonNegativeInt = typeof nonNegativeInt.infer;
export type CurrencyCode = typeof currencyCode.infer;
export type BillingInterval = typeof billingInterval.infer;
export type PaymentGateway = typeof paymentGateway.infer;
export type SubscriptionStatus = typeof subscriptionStatus.infer;
export type ResourceType = typeof resourceType.infer;
export type ErrorBody = typeof errorBody.infer;
