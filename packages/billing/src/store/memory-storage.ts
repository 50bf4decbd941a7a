/**
 * @subledger/billing - In-Memory Subscription Store
 * Default storage implementation for development and testing
 */

import { generatePrefixedId } from "@subledger/core";
import type {
  EventLogEntry,
  FindSubscriptionFilter,
  Invoice,
  NewEventLogEntry,
  NewInvoice,
  NewPlan,
  NewResourceUsage,
  NewSubscription,
  PaymentGateway,
  Plan,
  ResourceType,
  ResourceUsage,
  Subscription,
  SubscriptionPatch,
  SubscriptionStatus,
  SubscriptionStore,
} from "../types.js";
import { MANUAL_ACTIVATION_INVOICE_ID } from "./schema.js";

/**
 * Rows held by a memory store. Shared between a store and its transaction views.
 */
export interface MemoryState {
  plans: Map<string, Plan>;
  subscriptions: Map<string, Subscription>;
  invoices: Map<string, Invoice>;
  usage: Map<string, ResourceUsage>;
  events: EventLogEntry[];
}

function emptyState(): MemoryState {
  return {
    plans: new Map(),
    subscriptions: new Map(),
    invoices: new Map(),
    usage: new Map(),
    events: [],
  };
}

function matches(sub: Subscription, filter: FindSubscriptionFilter): boolean {
  return sub.userId === filter.userId && sub.appId === filter.appId && sub.status === filter.status;
}

type TableName = "plans" | "subscriptions" | "invoices" | "usage";

/**
 * Prior values of the rows a transaction touched, restored on rollback.
 * Rows written by anyone else while the transaction runs are left alone.
 */
class UndoLog {
  private readonly touched = new Set<string>();
  private readonly steps: Array<() => void> = [];

  row<V>(name: TableName, table: Map<string, V>, key: string): void {
    const mark = `${name}:${key}`;
    if (this.touched.has(mark)) {
      return;
    }
    this.touched.add(mark);
    const previous = table.get(key);
    this.steps.push(() => {
      if (previous === undefined) {
        table.delete(key);
      } else {
        table.set(key, previous);
      }
    });
  }

  event(events: EventLogEntry[], entry: EventLogEntry): void {
    this.steps.push(() => {
      const index = events.indexOf(entry);
      if (index !== -1) {
        events.splice(index, 1);
      }
    });
  }

  rollback(): void {
    for (const step of this.steps.reverse()) {
      step();
    }
  }
}

/**
 * In-memory subscription store
 * For development, testing, and single-instance deployments.
 *
 * Transactions run one at a time. A failed transaction undoes its own
 * writes only; entries appended outside it in the meantime survive.
 */
export class MemorySubscriptionStore implements SubscriptionStore {
  private readonly state: MemoryState;
  private undo: UndoLog | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(state: MemoryState = emptyState()) {
    this.state = state;
  }

  async transaction<T>(fn: (tx: SubscriptionStore) => Promise<T>): Promise<T> {
    if (this.undo) {
      return fn(this);
    }

    const run = async (): Promise<T> => {
      const undo = new UndoLog();
      const view = new MemorySubscriptionStore(this.state);
      view.undo = undo;
      try {
        return await fn(view);
      } catch (err) {
        undo.rollback();
        throw err;
      }
    };

    const result = this.queue.then(run);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private setRow<V>(name: TableName, table: Map<string, V>, key: string, value: V): void {
    this.undo?.row(name, table, key);
    table.set(key, value);
  }

  // ============================================================================
  // Plans
  // ============================================================================

  async getPlan(planId: string): Promise<Plan | null> {
    const plan = this.state.plans.get(planId);
    return plan ? { ...plan } : null;
  }

  async listActivePlans(appId: string): Promise<Plan[]> {
    return Array.from(this.state.plans.values())
      .filter((p) => p.appId === appId && p.isActive)
      .sort((a, b) => a.amount - b.amount)
      .map((p) => ({ ...p }));
  }

  async insertPlanIfAbsent(plan: NewPlan): Promise<boolean> {
    if (this.state.plans.has(plan.id)) {
      return false;
    }
    this.setRow("plans", this.state.plans, plan.id, { ...plan, createdAt: new Date() });
    return true;
  }

  /**
   * Add or replace a plan (for testing/setup)
   */
  addPlan(plan: NewPlan): Plan {
    const stored: Plan = { ...plan, createdAt: new Date() };
    this.setRow("plans", this.state.plans, plan.id, stored);
    return { ...stored };
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  async getSubscription(id: string): Promise<Subscription | null> {
    const sub = this.state.subscriptions.get(id);
    return sub ? { ...sub } : null;
  }

  async findSubscriptionByProviderId(
    gateway: PaymentGateway,
    providerSubscriptionId: string
  ): Promise<Subscription | null> {
    for (const sub of this.state.subscriptions.values()) {
      const providerId =
        gateway === "razorpay" ? sub.razorpaySubscriptionId : sub.paypalSubscriptionId;
      if (providerId === providerSubscriptionId) {
        return { ...sub };
      }
    }
    return null;
  }

  async findLatestSubscription(filter: FindSubscriptionFilter): Promise<Subscription | null> {
    let latest: Subscription | null = null;
    for (const sub of this.state.subscriptions.values()) {
      if (matches(sub, filter) && (!latest || sub.createdAt >= latest.createdAt)) {
        latest = sub;
      }
    }
    return latest ? { ...latest } : null;
  }

  async listSubscriptions(filter: FindSubscriptionFilter): Promise<Subscription[]> {
    return Array.from(this.state.subscriptions.values())
      .filter((sub) => matches(sub, filter))
      .map((sub) => ({ ...sub }));
  }

  async listSubscriptionsByStatus(
    statuses: SubscriptionStatus[],
    appId?: string
  ): Promise<Subscription[]> {
    return Array.from(this.state.subscriptions.values())
      .filter((sub) => statuses.includes(sub.status) && (!appId || sub.appId === appId))
      .map((sub) => ({ ...sub }));
  }

  async insertSubscription(subscription: NewSubscription): Promise<Subscription> {
    const now = new Date();
    const stored: Subscription = { ...subscription, createdAt: now, updatedAt: now };
    this.setRow("subscriptions", this.state.subscriptions, stored.id, stored);
    return { ...stored };
  }

  async updateSubscription(
    id: string,
    patch: SubscriptionPatch,
    options: { unlessStatus?: SubscriptionStatus } = {}
  ): Promise<Subscription | null> {
    const existing = this.state.subscriptions.get(id);
    if (!existing) {
      return null;
    }
    if (options.unlessStatus !== undefined && existing.status === options.unlessStatus) {
      return null;
    }

    const updated: Subscription = { ...existing, ...patch, updatedAt: new Date() };
    this.setRow("subscriptions", this.state.subscriptions, id, updated);
    return { ...updated };
  }

  // ============================================================================
  // Invoices
  // ============================================================================

  async insertInvoice(invoice: NewInvoice): Promise<Invoice | null> {
    const providerId = invoice.razorpayInvoiceId;
    if (providerId && providerId !== MANUAL_ACTIVATION_INVOICE_ID) {
      for (const existing of this.state.invoices.values()) {
        if (existing.razorpayInvoiceId === providerId) {
          return null;
        }
      }
    }

    const stored: Invoice = { ...invoice, createdAt: new Date() };
    this.setRow("invoices", this.state.invoices, stored.id, stored);
    return { ...stored };
  }

  async listInvoices(userId: string, appId: string): Promise<Invoice[]> {
    return Array.from(this.state.invoices.values())
      .filter((inv) => inv.userId === userId && inv.appId === appId)
      .sort((a, b) => b.invoiceDate.getTime() - a.invoiceDate.getTime())
      .map((inv) => ({ ...inv }));
  }

  // ============================================================================
  // Usage
  // ============================================================================

  async insertUsage(usage: NewResourceUsage): Promise<ResourceUsage> {
    const now = new Date();
    const stored: ResourceUsage = {
      ...usage,
      documentPagesCount: 0,
      perplexityRequestsCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.setRow("usage", this.state.usage, stored.id, stored);
    return { ...stored };
  }

  async findUsageAt(subscriptionId: string, at: Date): Promise<ResourceUsage | null> {
    const t = at.getTime();
    let found: ResourceUsage | null = null;
    for (const row of this.state.usage.values()) {
      if (
        row.subscriptionId === subscriptionId &&
        row.billingPeriodStart.getTime() <= t &&
        t < row.billingPeriodEnd.getTime() &&
        (!found || row.billingPeriodStart >= found.billingPeriodStart)
      ) {
        found = row;
      }
    }
    return found ? { ...found } : null;
  }

  async incrementUsage(usageId: string, resource: ResourceType, count: number): Promise<void> {
    const row = this.state.usage.get(usageId);
    if (!row) {
      return;
    }
    const updated: ResourceUsage =
      resource === "document_pages"
        ? { ...row, documentPagesCount: row.documentPagesCount + count }
        : { ...row, perplexityRequestsCount: row.perplexityRequestsCount + count };
    this.setRow("usage", this.state.usage, usageId, { ...updated, updatedAt: new Date() });
  }

  /**
   * Usage rows of a subscription in insertion order (for testing)
   */
  listUsage(subscriptionId: string): ResourceUsage[] {
    return Array.from(this.state.usage.values())
      .filter((row) => row.subscriptionId === subscriptionId)
      .map((row) => ({ ...row }));
  }

  // ============================================================================
  // Event Log
  // ============================================================================

  async appendEvent(entry: NewEventLogEntry): Promise<void> {
    const stored: EventLogEntry = { ...entry, id: generatePrefixedId("evt_"), createdAt: new Date() };
    this.undo?.event(this.state.events, stored);
    this.state.events.push(stored);
  }

  /**
   * Every logged event in order (for testing)
   */
  listEvents(): EventLogEntry[] {
    return this.state.events.map((e) => ({ ...e }));
  }

  /**
   * Every subscription row (for testing)
   */
  listAllSubscriptions(): Subscription[] {
    return Array.from(this.state.subscriptions.values()).map((sub) => ({ ...sub }));
  }

  /**
   * Every invoice row (for testing)
   */
  listAllInvoices(): Invoice[] {
    return Array.from(this.state.invoices.values()).map((inv) => ({ ...inv }));
  }
}

/**
 * Create an in-memory subscription store
 */
export function createMemorySubscriptionStore(): MemorySubscriptionStore {
  return new MemorySubscriptionStore();
}
