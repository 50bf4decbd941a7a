/**
 * @subledger/billing
 * Subscription lifecycle engine with webhook reconciliation
 *
 * Features:
 * - Razorpay provider over REST, PayPal placeholder
 * - Signed webhook verification and idempotent-by-convergence handlers
 * - Per-period usage counters
 * - Drizzle (Postgres) and in-memory storage
 *
 * @example
 * ```typescript
 * import {
 *   createSubscriptionEngine,
 *   createRazorpayProvider,
 *   createMemorySubscriptionStore,
 *   MemoryCustomerDirectory,
 * } from '@subledger/billing';
 *
 * const engine = createSubscriptionEngine({
 *   store: createMemorySubscriptionStore(),
 *   providers: { razorpay: createRazorpayProvider({ keyId, keySecret }) },
 *   customers: new MemoryCustomerDirectory(),
 * });
 *
 * const plans = await engine.getAvailablePlans('marketfit');
 * ```
 */

// Types
export type {
  Metadata,
  Plan,
  NewPlan,
  Subscription,
  NewSubscription,
  SubscriptionPatch,
  SubscriptionWithPlan,
  Invoice,
  NewInvoice,
  ResourceUsage,
  NewResourceUsage,
  UsageCounters,
  EventLogEntry,
  NewEventLogEntry,
  CustomerInfo,
  ProviderFailure,
  ProviderResult,
  ProviderSubscription,
  ProviderSubscriptionStatus,
  PaymentProvider,
  FindSubscriptionFilter,
  SubscriptionStore,
  CustomerDirectory,
  PaymentGateway,
  PlanFeatures,
  ResourceType,
  SubscriptionStatus,
} from "./types.js";
export { isProviderFailure } from "./types.js";

// Configuration
export { loadBillingConfig, DEFAULT_FREE_PLAN_IDS, type BillingConfig } from "./config.js";

// Periods & metadata
export {
  INTERVAL_DAYS,
  calculatePeriodEnd,
  periodFrom,
  periodContains,
  parseEpochSeconds,
  type BillingPeriod,
} from "./period.js";
export { mergeMetadata } from "./metadata.js";

// Providers
export * from "./providers/index.js";

// Webhooks
export * from "./webhooks/index.js";

// Storage
export * from "./store/index.js";

// Event log
export { EventLog, createEventLog, type EventRecord } from "./events/event-log.js";

// Usage
export {
  UsageTracker,
  createUsageTracker,
  RESOURCE_TYPES,
  parseResourceType,
  toCounters,
  type UsageTrackerConfig,
} from "./usage/usage-tracker.js";

// Engine
export {
  SubscriptionEngine,
  createSubscriptionEngine,
  type SubscriptionEngineConfig,
  type CreatedSubscription,
  type CancellationResult,
  type ActivationResult,
} from "./engine/subscription-engine.js";
export { SubscriptionLifecycle } from "./engine/lifecycle.js";

// Sync
export {
  SubscriptionSync,
  createSubscriptionSync,
  SYNCABLE_STATUSES,
  type SubscriptionSyncConfig,
  type SyncOptions,
  type SyncReport,
} from "./sync/subscription-sync.js";
