import { describe, it, expect, vi, beforeEach } from "vitest";
import { createNullLogger } from "@subledger/core";
import { MemorySubscriptionStore } from "../store/memory-storage.js";
import type { NewSubscription, PaymentProvider } from "../types.js";
import { SubscriptionSync } from "./subscription-sync.js";

function row(overrides: Partial<NewSubscription>): NewSubscription {
  return {
    id: "sub_1",
    userId: "user_1",
    planId: "plan_pro",
    appId: "marketfit",
    status: "created",
    razorpaySubscriptionId: null,
    paypalSubscriptionId: null,
    currentPeriodStart: null,
    currentPeriodEnd: null,
    metadata: {},
    ...overrides,
  };
}

describe("@subledger/billing - SubscriptionSync", () => {
  let store: MemorySubscriptionStore;
  const fetchSubscription = vi.fn<PaymentProvider["fetchSubscription"]>();
  let sync: SubscriptionSync;

  beforeEach(() => {
    store = new MemorySubscriptionStore();
    fetchSubscription.mockReset();
    const razorpay: PaymentProvider = {
      gateway: "razorpay",
      createSubscription: vi.fn<PaymentProvider["createSubscription"]>(),
      cancelSubscription: vi.fn<PaymentProvider["cancelSubscription"]>(),
      fetchSubscription,
    };
    sync = new SubscriptionSync({
      store,
      providers: { razorpay },
      now: () => new Date("2024-03-01T00:00:00Z"),
      logger: createNullLogger(),
    });
  });

  it("should apply a differing provider status", async () => {
    await store.insertSubscription(row({ razorpaySubscriptionId: "sub_rzp_1" }));
    fetchSubscription.mockResolvedValue({ status: "halted", raw: {} });

    const report = await sync.sync();

    expect(fetchSubscription).toHaveBeenCalledWith("sub_rzp_1");
    expect(report).toEqual({ synced: 1, failed: 0, skipped: 0 });
    expect((await store.getSubscription("sub_1"))?.status).toBe("halted");
  });

  it("should leave rows untouched in a dry run", async () => {
    await store.insertSubscription(row({ razorpaySubscriptionId: "sub_rzp_1" }));
    fetchSubscription.mockResolvedValue({ status: "active", raw: {} });

    const report = await sync.sync({ dryRun: true });

    expect(report.synced).toBe(1);
    expect((await store.getSubscription("sub_1"))?.status).toBe("created");
  });

  it("should count rows without a provider id as skipped and PayPal rows as synced", async () => {
    await store.insertSubscription(row({ id: "sub_free", status: "active" }));
    await store.insertSubscription(row({ id: "sub_pp", status: "active", paypalSubscriptionId: "I-1", userId: "user_2" }));

    const report = await sync.sync();

    expect(report).toEqual({ synced: 1, failed: 0, skipped: 1 });
    expect(fetchSubscription).not.toHaveBeenCalled();
  });

  it("should keep going after a failure", async () => {
    await store.insertSubscription(row({ id: "sub_a", razorpaySubscriptionId: "sub_rzp_a" }));
    await store.insertSubscription(row({ id: "sub_b", razorpaySubscriptionId: "sub_rzp_b", userId: "user_2" }));
    await store.insertSubscription(row({ id: "sub_c", razorpaySubscriptionId: "sub_rzp_c", userId: "user_3" }));
    fetchSubscription
      .mockResolvedValueOnce({ error: true, message: "Razorpay API error: not found" })
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce({ status: "created", raw: {} });

    const report = await sync.sync();

    expect(report).toEqual({ synced: 1, failed: 2, skipped: 0 });
  });

  it("should ignore rows outside the syncable statuses and other apps", async () => {
    await store.insertSubscription(row({ id: "sub_done", status: "completed", razorpaySubscriptionId: "a" }));
    await store.insertSubscription(row({ id: "sub_other", appId: "saleswit", razorpaySubscriptionId: "b" }));
    fetchSubscription.mockResolvedValue({ status: "created", raw: {} });

    const report = await sync.sync({ appId: "marketfit" });

    expect(report).toEqual({ synced: 0, failed: 0, skipped: 0 });
  });

  it("should supersede other active rows when a row turns active", async () => {
    await store.insertSubscription(row({ id: "sub_free", status: "active" }));
    await store.insertSubscription(row({ id: "sub_paid", status: "authenticated", razorpaySubscriptionId: "sub_rzp_1" }));
    fetchSubscription.mockResolvedValue({ status: "active", raw: {} });

    await sync.sync();

    expect((await store.getSubscription("sub_paid"))?.status).toBe("active");
    expect((await store.getSubscription("sub_free"))?.status).toBe("cancelled");
  });

  it("should leave unknown provider statuses alone", async () => {
    await store.insertSubscription(row({ razorpaySubscriptionId: "sub_rzp_1" }));
    fetchSubscription.mockResolvedValue({ status: "on_hold", raw: {} });

    const report = await sync.sync();

    expect(report.synced).toBe(1);
    expect((await store.getSubscription("sub_1"))?.status).toBe("created");
  });
});
