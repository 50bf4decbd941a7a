/**
 * @subledger/billing - Customer Directories
 * Contact details for opening paid subscriptions at a provider
 */

import { eq, or } from "drizzle-orm";
import { PersistenceError, errorMessage } from "@subledger/core";
import type { CustomerDirectory, CustomerInfo } from "../types.js";
import type { DrizzleDb } from "./drizzle-storage.js";
import { users } from "./schema.js";

/**
 * Reads the host application's `users` table; `userId` may be the row id or the Google uid
 */
export class DrizzleCustomerDirectory implements CustomerDirectory {
  private readonly db: DrizzleDb;

  constructor(config: { db: DrizzleDb }) {
    this.db = config.db;
  }

  async getCustomer(userId: string): Promise<CustomerInfo | null> {
    let rows: { email: string | null; displayName: string | null }[];
    try {
      rows = await this.db
        .select({ email: users.email, displayName: users.displayName })
        .from(users)
        .where(or(eq(users.id, userId), eq(users.googleUid, userId)))
        .limit(1);
    } catch (err) {
      throw new PersistenceError(`getCustomer failed: ${errorMessage(err)}`, { userId }, { cause: err });
    }

    const row = rows[0];
    if (!row?.email) return null;

    return { userId, email: row.email, displayName: row.displayName };
  }
}

/**
 * In-memory customer directory (for development and testing)
 */
export class MemoryCustomerDirectory implements CustomerDirectory {
  private customers = new Map<string, CustomerInfo>();

  constructor(customers: CustomerInfo[] = []) {
    for (const customer of customers) {
      this.customers.set(customer.userId, customer);
    }
  }

  add(customer: CustomerInfo): this {
    this.customers.set(customer.userId, customer);
    return this;
  }

  async getCustomer(userId: string): Promise<CustomerInfo | null> {
    return this.customers.get(userId) ?? null;
  }
}
