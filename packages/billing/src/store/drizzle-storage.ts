/**
 * @subledger/billing - Drizzle Subscription Store
 * Database-backed storage implementation using Drizzle ORM
 *
 * @example
 * ```typescript
 * import { createDrizzleSubscriptionStore } from "@subledger/billing";
 * import { drizzle } from "drizzle-orm/postgres-js";
 * import postgres from "postgres";
 *
 * const client = postgres(process.env.DATABASE_URL);
 * const store = createDrizzleSubscriptionStore({ db: drizzle(client) });
 * ```
 */

import { and, desc, eq, gt, inArray, lte, ne, sql } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import { PersistenceError, generatePrefixedId, isSubledgerError } from "@subledger/core";

import type {
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

import {
  resourceUsage,
  subscriptionEventsLog,
  subscriptionInvoices,
  subscriptionPlans,
  userSubscriptions,
} from "./schema.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A postgres-js Drizzle database or an open transaction on one
 */
export type DrizzleDb = PgDatabase<PostgresJsQueryResultHKT>;

/**
 * Drizzle storage configuration
 */
export interface DrizzleSubscriptionStoreConfig {
  /** Drizzle database instance */
  db: DrizzleDb;
}

function toPersistenceError(operation: string, err: unknown): Error {
  if (isSubledgerError(err)) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new PersistenceError(`${operation} failed: ${message}`, { operation }, { cause: err });
}

/**
 * Run `fn` inside a transaction opened by `begin`.
 * Errors raised by `fn` pass through unchanged; only failures of the
 * driver itself (begin, commit, rollback) become PersistenceErrors.
 */
export async function runInTransaction<Tx, T>(
  begin: (body: (tx: Tx) => Promise<T>) => Promise<T>,
  fn: (tx: Tx) => Promise<T>
): Promise<T> {
  const raised: unknown[] = [];
  try {
    return await begin(async (tx) => {
      try {
        return await fn(tx);
      } catch (err) {
        raised.push(err);
        throw err;
      }
    });
  } catch (err) {
    if (raised.includes(err)) {
      throw err;
    }
    throw toPersistenceError("transaction", err);
  }
}

// ============================================================================
// Drizzle Subscription Store
// ============================================================================

/**
 * Drizzle-backed subscription store
 * Persists plans, subscriptions, invoices, usage and events to PostgreSQL
 */
export class DrizzleSubscriptionStore implements SubscriptionStore {
  private readonly db: DrizzleDb;
  private readonly joined: boolean;

  constructor(config: DrizzleSubscriptionStoreConfig, joined = false) {
    this.db = config.db;
    this.joined = joined;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toPersistenceError(operation, err);
    }
  }

  async transaction<T>(fn: (tx: SubscriptionStore) => Promise<T>): Promise<T> {
    if (this.joined) {
      return fn(this);
    }
    return runInTransaction<DrizzleDb, T>(
      (body) => this.db.transaction(body),
      (tx) => fn(new DrizzleSubscriptionStore({ db: tx }, true))
    );
  }

  // ============================================================================
  // Plans
  // ============================================================================

  async getPlan(planId: string): Promise<Plan | null> {
    return this.run("getPlan", async () => {
      const rows = await this.db
        .select()
        .from(subscriptionPlans)
        .where(eq(subscriptionPlans.id, planId))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async listActivePlans(appId: string): Promise<Plan[]> {
    return this.run("listActivePlans", () =>
      this.db
        .select()
        .from(subscriptionPlans)
        .where(and(eq(subscriptionPlans.appId, appId), eq(subscriptionPlans.isActive, true)))
        .orderBy(subscriptionPlans.amount)
    );
  }

  async insertPlanIfAbsent(plan: NewPlan): Promise<boolean> {
    return this.run("insertPlanIfAbsent", async () => {
      const rows = await this.db
        .insert(subscriptionPlans)
        .values(plan)
        .onConflictDoNothing({ target: subscriptionPlans.id })
        .returning({ id: subscriptionPlans.id });
      return rows.length > 0;
    });
  }

  // ============================================================================
  // Subscriptions
  // ============================================================================

  async getSubscription(id: string): Promise<Subscription | null> {
    return this.run("getSubscription", async () => {
      const rows = await this.db
        .select()
        .from(userSubscriptions)
        .where(eq(userSubscriptions.id, id))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async findSubscriptionByProviderId(
    gateway: PaymentGateway,
    providerSubscriptionId: string
  ): Promise<Subscription | null> {
    const column =
      gateway === "razorpay"
        ? userSubscriptions.razorpaySubscriptionId
        : userSubscriptions.paypalSubscriptionId;

    return this.run("findSubscriptionByProviderId", async () => {
      const rows = await this.db
        .select()
        .from(userSubscriptions)
        .where(eq(column, providerSubscriptionId))
        .orderBy(desc(userSubscriptions.createdAt))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  private filterCondition(filter: FindSubscriptionFilter) {
    return and(
      eq(userSubscriptions.userId, filter.userId),
      eq(userSubscriptions.appId, filter.appId),
      eq(userSubscriptions.status, filter.status)
    );
  }

  async findLatestSubscription(filter: FindSubscriptionFilter): Promise<Subscription | null> {
    return this.run("findLatestSubscription", async () => {
      const rows = await this.db
        .select()
        .from(userSubscriptions)
        .where(this.filterCondition(filter))
        .orderBy(desc(userSubscriptions.createdAt))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async listSubscriptions(filter: FindSubscriptionFilter): Promise<Subscription[]> {
    return this.run("listSubscriptions", () =>
      this.db.select().from(userSubscriptions).where(this.filterCondition(filter))
    );
  }

  async listSubscriptionsByStatus(
    statuses: SubscriptionStatus[],
    appId?: string
  ): Promise<Subscription[]> {
    if (statuses.length === 0) {
      return [];
    }
    return this.run("listSubscriptionsByStatus", () =>
      this.db
        .select()
        .from(userSubscriptions)
        .where(
          and(
            inArray(userSubscriptions.status, statuses),
            appId ? eq(userSubscriptions.appId, appId) : undefined
          )
        )
        .orderBy(userSubscriptions.createdAt)
    );
  }

  async insertSubscription(subscription: NewSubscription): Promise<Subscription> {
    return this.run("insertSubscription", async () => {
      const rows = await this.db.insert(userSubscriptions).values(subscription).returning();
      const row = rows[0];
      if (!row) {
        throw new PersistenceError("Subscription insert returned no row", {
          subscriptionId: subscription.id,
        });
      }
      return row;
    });
  }

  async updateSubscription(
    id: string,
    patch: SubscriptionPatch,
    options: { unlessStatus?: SubscriptionStatus } = {}
  ): Promise<Subscription | null> {
    return this.run("updateSubscription", async () => {
      const rows = await this.db
        .update(userSubscriptions)
        .set({ ...patch, updatedAt: new Date() })
        .where(
          and(
            eq(userSubscriptions.id, id),
            options.unlessStatus !== undefined
              ? ne(userSubscriptions.status, options.unlessStatus)
              : undefined
          )
        )
        .returning();
      return rows[0] ?? null;
    });
  }

  // ============================================================================
  // Invoices
  // ============================================================================

  async insertInvoice(invoice: NewInvoice): Promise<Invoice | null> {
    return this.run("insertInvoice", async () => {
      // The partial unique index on razorpay_invoice_id turns replays into no-ops
      const rows = await this.db
        .insert(subscriptionInvoices)
        .values(invoice)
        .onConflictDoNothing()
        .returning();
      return rows[0] ?? null;
    });
  }

  async listInvoices(userId: string, appId: string): Promise<Invoice[]> {
    return this.run("listInvoices", () =>
      this.db
        .select()
        .from(subscriptionInvoices)
        .where(and(eq(subscriptionInvoices.userId, userId), eq(subscriptionInvoices.appId, appId)))
        .orderBy(desc(subscriptionInvoices.invoiceDate))
    );
  }

  // ============================================================================
  // Usage
  // ============================================================================

  async insertUsage(usage: NewResourceUsage): Promise<ResourceUsage> {
    return this.run("insertUsage", async () => {
      const rows = await this.db
        .insert(resourceUsage)
        .values({ ...usage, documentPagesCount: 0, perplexityRequestsCount: 0 })
        .returning();
      const row = rows[0];
      if (!row) {
        throw new PersistenceError("Usage insert returned no row", { usageId: usage.id });
      }
      return row;
    });
  }

  async findUsageAt(subscriptionId: string, at: Date): Promise<ResourceUsage | null> {
    return this.run("findUsageAt", async () => {
      const rows = await this.db
        .select()
        .from(resourceUsage)
        .where(
          and(
            eq(resourceUsage.subscriptionId, subscriptionId),
            lte(resourceUsage.billingPeriodStart, at),
            gt(resourceUsage.billingPeriodEnd, at)
          )
        )
        .orderBy(desc(resourceUsage.billingPeriodStart), desc(resourceUsage.createdAt))
        .limit(1);
      return rows[0] ?? null;
    });
  }

  async incrementUsage(usageId: string, resource: ResourceType, count: number): Promise<void> {
    const patch =
      resource === "document_pages"
        ? { documentPagesCount: sql`${resourceUsage.documentPagesCount} + ${count}` }
        : { perplexityRequestsCount: sql`${resourceUsage.perplexityRequestsCount} + ${count}` };

    await this.run("incrementUsage", () =>
      this.db
        .update(resourceUsage)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(resourceUsage.id, usageId))
    );
  }

  // ============================================================================
  // Event Log
  // ============================================================================

  async appendEvent(entry: NewEventLogEntry): Promise<void> {
    await this.run("appendEvent", () =>
      this.db.insert(subscriptionEventsLog).values({ ...entry, id: generatePrefixedId("evt_") })
    );
  }
}

/**
 * Create a Drizzle subscription store
 */
export function createDrizzleSubscriptionStore(
  config: DrizzleSubscriptionStoreConfig
): DrizzleSubscriptionStore {
  return new DrizzleSubscriptionStore(config);
}
