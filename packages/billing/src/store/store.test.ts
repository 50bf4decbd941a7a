import { describe, it, expect, beforeEach, vi } from "vitest";
import type { SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { PersistenceError, createNullLogger } from "@subledger/core";
import type { NewInvoice, NewPlan, NewSubscription } from "../types.js";
import { MemoryCustomerDirectory } from "./customers.js";
import { runInTransaction } from "./drizzle-storage.js";
import { MemorySubscriptionStore } from "./memory-storage.js";
import { ensureSchema, schemaStatements } from "./migrate.js";
import { MANUAL_ACTIVATION_INVOICE_ID } from "./schema.js";
import { loadPlanDefinitions, seedPlans, toNewPlan } from "./seed.js";

const plan: NewPlan = {
  id: "plan_pro",
  name: "Pro",
  description: null,
  amount: 49900,
  currency: "INR",
  interval: "month",
  intervalCount: 1,
  features: { documents: 100 },
  appId: "marketfit",
  paymentGateways: ["razorpay"],
  razorpayPlanId: "plan_rzp_pro",
  paypalPlanId: null,
  planType: "domestic",
  isActive: true,
};

function subscription(overrides: Partial<NewSubscription> = {}): NewSubscription {
  return {
    id: "sub_1",
    userId: "user_1",
    planId: "plan_pro",
    appId: "marketfit",
    status: "active",
    razorpaySubscriptionId: "sub_rzp_1",
    paypalSubscriptionId: null,
    currentPeriodStart: new Date("2024-01-01T00:00:00Z"),
    currentPeriodEnd: new Date("2024-01-31T00:00:00Z"),
    metadata: {},
    ...overrides,
  };
}

function invoice(overrides: Partial<NewInvoice> = {}): NewInvoice {
  return {
    id: "inv_1",
    subscriptionId: "sub_1",
    userId: "user_1",
    appId: "marketfit",
    razorpayInvoiceId: "inv_rzp_1",
    paypalInvoiceId: null,
    amount: 49900,
    currency: "INR",
    status: "Paid",
    paymentId: "pay_1",
    invoiceDate: new Date("2024-01-01T00:00:00Z"),
    paidAt: new Date("2024-01-01T00:00:00Z"),
    ...overrides,
  };
}

describe("@subledger/billing - MemorySubscriptionStore", () => {
  let store: MemorySubscriptionStore;

  beforeEach(() => {
    store = new MemorySubscriptionStore();
    store.addPlan(plan);
  });

  describe("plans", () => {
    it("should list active plans of an app cheapest first", async () => {
      store.addPlan({ ...plan, id: "plan_free", amount: 0 });
      store.addPlan({ ...plan, id: "plan_old", amount: 100, isActive: false });
      store.addPlan({ ...plan, id: "plan_other_app", amount: 0, appId: "saleswit" });

      const plans = await store.listActivePlans("marketfit");

      expect(plans.map((p) => p.id)).toEqual(["plan_free", "plan_pro"]);
    });

    it("should insert a plan only once", async () => {
      expect(await store.insertPlanIfAbsent({ ...plan, id: "plan_new" })).toBe(true);
      expect(await store.insertPlanIfAbsent({ ...plan, id: "plan_new", name: "Changed" })).toBe(false);
      expect((await store.getPlan("plan_new"))?.name).toBe("Pro");
    });
  });

  describe("subscriptions", () => {
    it("should find a subscription by provider id", async () => {
      await store.insertSubscription(subscription({ paypalSubscriptionId: "I-PAYPAL" }));

      expect((await store.findSubscriptionByProviderId("razorpay", "sub_rzp_1"))?.id).toBe("sub_1");
      expect((await store.findSubscriptionByProviderId("paypal", "I-PAYPAL"))?.id).toBe("sub_1");
      expect(await store.findSubscriptionByProviderId("razorpay", "sub_rzp_other")).toBeNull();
    });

    it("should return copies that do not alias stored rows", async () => {
      await store.insertSubscription(subscription());

      const read = await store.getSubscription("sub_1");
      if (read) read.status = "cancelled";

      expect((await store.getSubscription("sub_1"))?.status).toBe("active");
    });

    it("should skip the update when the row is in the excluded status", async () => {
      await store.insertSubscription(subscription());

      const result = await store.updateSubscription(
        "sub_1",
        { status: "authenticated" },
        { unlessStatus: "active" }
      );

      expect(result).toBeNull();
      expect((await store.getSubscription("sub_1"))?.status).toBe("active");
    });

    it("should return null when updating an unknown row", async () => {
      expect(await store.updateSubscription("sub_missing", { status: "cancelled" })).toBeNull();
    });
  });

  describe("invoices", () => {
    it("should refuse a second invoice with the same provider invoice id", async () => {
      expect(await store.insertInvoice(invoice())).not.toBeNull();
      expect(await store.insertInvoice(invoice({ id: "inv_2" }))).toBeNull();
      expect(store.listAllInvoices()).toHaveLength(1);
    });

    it("should allow repeated manual activation invoices", async () => {
      await store.insertInvoice(invoice({ razorpayInvoiceId: MANUAL_ACTIVATION_INVOICE_ID }));
      const second = await store.insertInvoice(
        invoice({ id: "inv_2", razorpayInvoiceId: MANUAL_ACTIVATION_INVOICE_ID })
      );

      expect(second?.id).toBe("inv_2");
    });

    it("should list a user's invoices newest first", async () => {
      await store.insertInvoice(invoice({ id: "inv_old", razorpayInvoiceId: "a" }));
      await store.insertInvoice(
        invoice({ id: "inv_new", razorpayInvoiceId: "b", invoiceDate: new Date("2024-02-01T00:00:00Z") })
      );
      await store.insertInvoice(invoice({ id: "inv_other_app", razorpayInvoiceId: "c", appId: "saleswit" }));

      const invoices = await store.listInvoices("user_1", "marketfit");

      expect(invoices.map((i) => i.id)).toEqual(["inv_new", "inv_old"]);
    });
  });

  describe("usage", () => {
    it("should find the row whose window contains the instant, end exclusive", async () => {
      await store.insertUsage({
        id: "usage_1",
        userId: "user_1",
        subscriptionId: "sub_1",
        appId: "marketfit",
        billingPeriodStart: new Date("2024-01-01T00:00:00Z"),
        billingPeriodEnd: new Date("2024-01-31T00:00:00Z"),
      });

      expect((await store.findUsageAt("sub_1", new Date("2024-01-01T00:00:00Z")))?.id).toBe("usage_1");
      expect((await store.findUsageAt("sub_1", new Date("2024-01-30T23:59:59Z")))?.id).toBe("usage_1");
      expect(await store.findUsageAt("sub_1", new Date("2024-01-31T00:00:00Z"))).toBeNull();
    });

    it("should add to a single counter", async () => {
      const row = await store.insertUsage({
        id: "usage_1",
        userId: "user_1",
        subscriptionId: "sub_1",
        appId: "marketfit",
        billingPeriodStart: new Date("2024-01-01T00:00:00Z"),
        billingPeriodEnd: new Date("2024-01-31T00:00:00Z"),
      });

      await store.incrementUsage(row.id, "perplexity_requests", 3);
      await store.incrementUsage(row.id, "perplexity_requests", 2);

      const [stored] = store.listUsage("sub_1");
      expect(stored?.perplexityRequestsCount).toBe(5);
      expect(stored?.documentPagesCount).toBe(0);
    });
  });

  describe("transaction", () => {
    it("should roll back every write when the callback throws", async () => {
      await expect(
        store.transaction(async (tx) => {
          await tx.insertSubscription(subscription());
          await tx.appendEvent({
            eventType: "subscription_created",
            razorpayEntityId: "sub_rzp_1",
            paypalEntityId: null,
            userId: "user_1",
            data: {},
            processed: true,
            error: null,
          });
          throw new Error("abort");
        })
      ).rejects.toThrow("abort");

      expect(await store.getSubscription("sub_1")).toBeNull();
      expect(store.listEvents()).toEqual([]);
    });

    it("should keep writes of a committed transaction", async () => {
      const result = await store.transaction(async (tx) => {
        await tx.insertSubscription(subscription());
        return "done";
      });

      expect(result).toBe("done");
      expect((await store.getSubscription("sub_1"))?.status).toBe("active");
    });

    it("should keep events appended outside a transaction that rolls back", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let markStarted: () => void = () => undefined;
      const started = new Promise<void>((resolve) => {
        markStarted = resolve;
      });

      const failing = store.transaction(async (tx) => {
        await tx.insertSubscription(subscription());
        markStarted();
        await gate;
        throw new Error("insertInvoice failed");
      });

      await started;
      await store.appendEvent({
        eventType: "subscription.completed",
        razorpayEntityId: "sub_rzp_2",
        paypalEntityId: null,
        userId: null,
        data: {},
        processed: false,
        error: null,
      });
      release();

      await expect(failing).rejects.toThrow("insertInvoice failed");
      expect(await store.getSubscription("sub_1")).toBeNull();
      expect(store.listEvents().map((e) => e.eventType)).toEqual(["subscription.completed"]);
    });

    it("should let nested transactions join the outer one", async () => {
      await expect(
        store.transaction(async (tx) => {
          await tx.transaction(async (inner) => {
            await inner.insertSubscription(subscription());
          });
          throw new Error("outer failed");
        })
      ).rejects.toThrow("outer failed");

      expect(await store.getSubscription("sub_1")).toBeNull();
    });
  });
});

describe("@subledger/billing - runInTransaction", () => {
  const tx = { name: "tx" };

  it("should rethrow errors raised by the callback unchanged", async () => {
    const failure = new RangeError("Invalid time value");

    const result = runInTransaction(
      (body: (t: typeof tx) => Promise<string>) => body(tx),
      async () => {
        throw failure;
      }
    );

    await expect(result).rejects.toBe(failure);
  });

  it("should wrap driver failures as persistence errors", async () => {
    const result = runInTransaction(
      async (_body: (t: typeof tx) => Promise<string>) => {
        throw new Error("connection terminated");
      },
      async () => "unreached"
    );

    await expect(result).rejects.toBeInstanceOf(PersistenceError);
    await expect(result).rejects.toThrow("transaction failed: connection terminated");
  });

  it("should return the callback result", async () => {
    const result = await runInTransaction(
      (body: (t: typeof tx) => Promise<string>) => body(tx),
      async (t) => `done in ${t.name}`
    );

    expect(result).toBe("done in tx");
  });
});

describe("@subledger/billing - Schema Bootstrap", () => {
  it("should create every billing table before indexing it", () => {
    const statements = schemaStatements();
    const tables = statements
      .filter((s) => s.startsWith("CREATE TABLE IF NOT EXISTS"))
      .map((s) => s.split(/\s+/)[5]);

    expect(tables).toEqual([
      "subscription_plans",
      "user_subscriptions",
      "subscription_invoices",
      "subscription_events_log",
      "resource_usage",
    ]);
    for (const statement of statements) {
      expect(statement).toMatch(/^CREATE (UNIQUE )?(TABLE|INDEX) IF NOT EXISTS /);
    }
  });

  it("should keep the partial unique indexes", () => {
    const statements = schemaStatements();

    expect(statements).toContain(
      "CREATE UNIQUE INDEX IF NOT EXISTS user_subscriptions_one_active_idx ON user_subscriptions (user_id, app_id) WHERE status = 'active'"
    );
    expect(statements).toContain(
      "CREATE UNIQUE INDEX IF NOT EXISTS subscription_invoices_razorpay_invoice_idx ON subscription_invoices (razorpay_invoice_id) WHERE razorpay_invoice_id <> 'manual_activation'"
    );
  });

  it("should run each statement in order", async () => {
    const dialect = new PgDialect();
    const execute = vi.fn(async (_query: SQL) => undefined);

    await ensureSchema({ execute }, createNullLogger());

    const executed = execute.mock.calls.map(([query]) => dialect.sqlToQuery(query).sql);
    expect(executed).toEqual(schemaStatements());
  });
});

describe("@subledger/billing - Plan Seeding", () => {
  it("should ship a free plan for each default app", () => {
    const definitions = loadPlanDefinitions();

    expect(definitions.map((d) => d.id).sort()).toEqual(["plan_free_marketfit", "plan_free_saleswit"]);
    expect(definitions.every((d) => d.amount === 0)).toBe(true);
  });

  it("should fill defaults when converting a definition", () => {
    const converted = toNewPlan({
      id: "plan_free_x",
      name: "Free Plan",
      amount: 0,
      interval: "month",
      features: { documents: 5 },
      app_id: "x",
    });

    expect(converted).toEqual({
      id: "plan_free_x",
      name: "Free Plan",
      description: null,
      amount: 0,
      currency: "INR",
      interval: "month",
      intervalCount: 1,
      features: { documents: 5 },
      appId: "x",
      paymentGateways: ["razorpay"],
      razorpayPlanId: null,
      paypalPlanId: null,
      planType: "domestic",
      isActive: true,
    });
  });

  it("should insert missing plans only", async () => {
    const store = new MemorySubscriptionStore();
    const definitions = loadPlanDefinitions();

    expect(await seedPlans(store, definitions, createNullLogger())).toBe(2);
    expect(await seedPlans(store, definitions, createNullLogger())).toBe(0);
    expect((await store.getPlan("plan_free_saleswit"))?.features).toEqual({
      documents: 5,
      queries: 10,
      users: 1,
      document_pages: 50,
      perplexity_requests: 20,
    });
  });
});

describe("@subledger/billing - MemoryCustomerDirectory", () => {
  it("should return known customers and null otherwise", async () => {
    const directory = new MemoryCustomerDirectory([
      { userId: "user_1", email: "user@example.com", displayName: "Test User" },
    ]);

    expect(await directory.getCustomer("user_1")).toEqual({
      userId: "user_1",
      email: "user@example.com",
      displayName: "Test User",
    });
    expect(await directory.getCustomer("user_2")).toBeNull();
  });
});
