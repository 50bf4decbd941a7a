/**
 * @subledger/billing - Type Definitions
 * Domain records, provider capability and storage contracts
 */

import type {
  PaymentGateway,
  PlanFeatures,
  ResourceType,
  SubscriptionStatus,
} from "@subledger/types";

export type { PaymentGateway, PlanFeatures, ResourceType, SubscriptionStatus };

/**
 * Free-form JSON map stored alongside subscriptions and events
 */
export type Metadata = Record<string, unknown>;

// ============================================================================
// Domain Records
// ============================================================================

/**
 * Billing plan
 */
export interface Plan {
  id: string;
  name: string;
  description: string | null;
  /** Smallest currency unit; 0 marks a free tier */
  amount: number;
  currency: string;
  /** "month" | "year"; anything else falls back to 30 days */
  interval: string;
  intervalCount: number;
  features: PlanFeatures;
  appId: string;
  /** First entry is the default dispatch target */
  paymentGateways: string[];
  razorpayPlanId: string | null;
  paypalPlanId: string | null;
  planType: string;
  isActive: boolean;
  createdAt: Date;
}

export type NewPlan = Omit<Plan, "createdAt">;

/**
 * A user's subscription to a plan within one app
 */
export interface Subscription {
  id: string;
  userId: string;
  planId: string;
  appId: string;
  status: SubscriptionStatus;
  razorpaySubscriptionId: string | null;
  paypalSubscriptionId: string | null;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  metadata: Metadata;
  createdAt: Date;
  updatedAt: Date;
}

export type NewSubscription = Omit<Subscription, "createdAt" | "updatedAt">;

/**
 * Fields an update may touch
 */
export type SubscriptionPatch = Partial<
  Pick<
    Subscription,
    | "planId"
    | "status"
    | "razorpaySubscriptionId"
    | "paypalSubscriptionId"
    | "currentPeriodStart"
    | "currentPeriodEnd"
    | "metadata"
  >
>;

/**
 * Subscription joined with the plan fields clients display
 */
export interface SubscriptionWithPlan extends Subscription {
  planName: string;
  features: PlanFeatures;
  amount: number;
  currency: string;
  interval: string;
}

/**
 * Invoice recorded for a charge or manual activation
 */
export interface Invoice {
  id: string;
  subscriptionId: string;
  userId: string;
  appId: string;
  razorpayInvoiceId: string | null;
  paypalInvoiceId: string | null;
  amount: number;
  currency: string;
  status: string;
  paymentId: string | null;
  invoiceDate: Date;
  paidAt: Date | null;
  createdAt: Date;
}

export type NewInvoice = Omit<Invoice, "createdAt">;

/**
 * Usage counters for one subscription billing period
 */
export interface ResourceUsage {
  id: string;
  userId: string;
  subscriptionId: string;
  appId: string;
  billingPeriodStart: Date;
  billingPeriodEnd: Date;
  documentPagesCount: number;
  perplexityRequestsCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewResourceUsage = Pick<
  ResourceUsage,
  "id" | "userId" | "subscriptionId" | "appId" | "billingPeriodStart" | "billingPeriodEnd"
>;

/**
 * Zero-defaulted usage snapshot keyed by resource type
 */
export type UsageCounters = Record<ResourceType, number>;

/**
 * Audit trail entry
 */
export interface EventLogEntry {
  id: string;
  eventType: string;
  razorpayEntityId: string | null;
  paypalEntityId: string | null;
  userId: string | null;
  data: Metadata;
  processed: boolean;
  error: string | null;
  createdAt: Date;
}

export type NewEventLogEntry = Omit<EventLogEntry, "id" | "createdAt">;

/**
 * Contact details needed to open a paid subscription at a provider
 */
export interface CustomerInfo {
  userId: string;
  email: string;
  displayName: string | null;
}

// ============================================================================
// Payment Provider
// ============================================================================

/**
 * Tagged provider failure; providers never throw through to callers
 */
export interface ProviderFailure {
  error: true;
  message: string;
  /** Provider error code when the API returned one */
  code?: string | undefined;
}

export type ProviderResult<T> = T | ProviderFailure;

export interface ProviderSubscription {
  id: string;
  status: string;
  checkoutUrl?: string | undefined;
  raw: Metadata;
}

export interface ProviderSubscriptionStatus {
  status: string;
  raw: Metadata;
}

/**
 * Payment processor capability
 */
export interface PaymentProvider {
  readonly gateway: PaymentGateway;

  createSubscription(
    planRef: string,
    customer: CustomerInfo,
    appId: string,
    additionalNotes?: Record<string, string>
  ): Promise<ProviderResult<ProviderSubscription>>;

  cancelSubscription(
    subscriptionId: string,
    cancelAtCycleEnd?: boolean
  ): Promise<ProviderResult<ProviderSubscriptionStatus>>;

  fetchSubscription(subscriptionId: string): Promise<ProviderResult<ProviderSubscriptionStatus>>;
}

/**
 * Narrow a provider result to its failure branch
 */
export function isProviderFailure<T>(result: ProviderResult<T>): result is ProviderFailure {
  return typeof result === "object" && result !== null && "error" in result && result.error === true;
}

// ============================================================================
// Storage
// ============================================================================

export interface FindSubscriptionFilter {
  userId: string;
  appId: string;
  status: SubscriptionStatus;
}

/**
 * Transactional repository for plans, subscriptions, invoices, usage and events
 */
export interface SubscriptionStore {
  /**
   * Run `fn` in a transaction. Nested calls join the outer transaction.
   * A thrown error rolls back every write made through `tx`.
   */
  transaction<T>(fn: (tx: SubscriptionStore) => Promise<T>): Promise<T>;

  // Plans
  getPlan(planId: string): Promise<Plan | null>;
  /** Active plans of an app ordered by amount ascending */
  listActivePlans(appId: string): Promise<Plan[]>;
  /** Insert unless a plan with the same id exists; returns true when inserted */
  insertPlanIfAbsent(plan: NewPlan): Promise<boolean>;

  // Subscriptions
  getSubscription(id: string): Promise<Subscription | null>;
  findSubscriptionByProviderId(
    gateway: PaymentGateway,
    providerSubscriptionId: string
  ): Promise<Subscription | null>;
  /** Newest matching row by creation time */
  findLatestSubscription(filter: FindSubscriptionFilter): Promise<Subscription | null>;
  listSubscriptions(filter: FindSubscriptionFilter): Promise<Subscription[]>;
  listSubscriptionsByStatus(statuses: SubscriptionStatus[], appId?: string): Promise<Subscription[]>;
  insertSubscription(subscription: NewSubscription): Promise<Subscription>;
  /**
   * Apply a patch. With `unlessStatus`, the row is left alone when it is
   * already in that status and null is returned.
   */
  updateSubscription(
    id: string,
    patch: SubscriptionPatch,
    options?: { unlessStatus?: SubscriptionStatus }
  ): Promise<Subscription | null>;

  // Invoices
  /** Returns null when the provider invoice id was already recorded */
  insertInvoice(invoice: NewInvoice): Promise<Invoice | null>;
  /** Invoices of a user within an app, newest invoice date first */
  listInvoices(userId: string, appId: string): Promise<Invoice[]>;

  // Usage
  insertUsage(usage: NewResourceUsage): Promise<ResourceUsage>;
  /** Row whose window contains `at` */
  findUsageAt(subscriptionId: string, at: Date): Promise<ResourceUsage | null>;
  incrementUsage(usageId: string, resource: ResourceType, count: number): Promise<void>;

  // Event log
  appendEvent(entry: NewEventLogEntry): Promise<void>;
}

/**
 * Source of user contact details
 */
export interface CustomerDirectory {
  getCustomer(userId: string): Promise<CustomerInfo | null>;
}
