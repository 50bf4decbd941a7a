import { describe, it, expect, vi, beforeEach } from "vitest";
import { createNullLogger } from "@subledger/core";
import {
  MANUAL_ACTIVATION_INVOICE_ID,
  MemoryCustomerDirectory,
  MemorySubscriptionStore,
  PayPalWebhookVerifier,
  RazorpayWebhookVerifier,
  SubscriptionEngine,
  WebhookProcessor,
  computeHmacSignature,
  loadPlanDefinitions,
  toNewPlan,
  type NewPlan,
  type NewSubscription,
  type PaymentProvider,
} from "@subledger/billing";
import { createServer } from "../app.js";
import type { HonoApp } from "../context.js";

const SECRET = "test-secret";
const NOW = new Date("2024-03-01T00:00:00Z");

const proPlan: NewPlan = {
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

const paypalPlan: NewPlan = {
  ...proPlan,
  id: "plan_pp",
  name: "Pro (International)",
  amount: 1900,
  currency: "USD",
  paymentGateways: ["paypal"],
  razorpayPlanId: null,
  paypalPlanId: "P-123",
  planType: "international",
};

function pending(overrides: Partial<NewSubscription> = {}): NewSubscription {
  return {
    id: "sub_1",
    userId: "user_1",
    planId: "plan_pro",
    appId: "marketfit",
    status: "created",
    razorpaySubscriptionId: "sub_rzp_1",
    paypalSubscriptionId: null,
    currentPeriodStart: null,
    currentPeriodEnd: null,
    metadata: {},
    ...overrides,
  };
}

function mockRazorpay() {
  return {
    gateway: "razorpay",
    createSubscription: vi.fn<PaymentProvider["createSubscription"]>(),
    cancelSubscription: vi.fn<PaymentProvider["cancelSubscription"]>(),
    fetchSubscription: vi.fn<PaymentProvider["fetchSubscription"]>(),
  } satisfies PaymentProvider;
}

describe("@subledger/server - Subscription Routes", () => {
  let store: MemorySubscriptionStore;
  let razorpay: ReturnType<typeof mockRazorpay>;
  let app: HonoApp;

  beforeEach(() => {
    store = new MemorySubscriptionStore();
    for (const definition of loadPlanDefinitions()) {
      store.addPlan(toNewPlan(definition));
    }
    store.addPlan(proPlan);
    store.addPlan(paypalPlan);

    razorpay = mockRazorpay();

    const logger = createNullLogger();
    const engine = new SubscriptionEngine({
      store,
      providers: { razorpay },
      customers: new MemoryCustomerDirectory([
        { userId: "user_1", email: "user@example.com", displayName: "Test User" },
      ]),
      now: () => NOW,
      logger,
    });
    const verifier = new RazorpayWebhookVerifier({ webhookSecret: SECRET, logger });

    app = createServer({
      engine,
      webhooks: new WebhookProcessor(engine, {
        razorpayVerifier: verifier,
        paypalVerifier: new PayPalWebhookVerifier({ logger }),
        logger,
      }),
      paymentVerifier: verifier,
      logger,
      logging: false,
    });
  });

  function get(path: string) {
    return app.request(`/api/subscriptions${path}`);
  }

  function post(path: string, body: unknown, headers: Record<string, string> = {}) {
    return app.request(`/api/subscriptions${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
  }

  describe("GET /health", () => {
    it("should report ok with a request id", async () => {
      const res = await app.request("/health", { headers: { "x-request-id": "req-1" } });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok" });
      expect(res.headers.get("x-request-id")).toBe("req-1");
    });
  });

  describe("GET /plans", () => {
    it("should list the default app's plans cheapest first", async () => {
      const res = await get("/plans");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        plans: [
          { id: "plan_free_marketfit", amount: 0, app_id: "marketfit", interval_count: 1 },
          { id: "plan_pp", amount: 1900, paypal_plan_id: "P-123" },
          { id: "plan_pro", amount: 49900, razorpay_plan_id: "plan_rzp_pro", payment_gateways: ["razorpay"] },
        ],
      });
    });

    it("should filter by app_id", async () => {
      const res = await get("/plans?app_id=saleswit");

      expect(await res.json()).toMatchObject({ plans: [{ id: "plan_free_saleswit" }] });
    });
  });

  describe("GET /user/:user_id", () => {
    it("should provision the free plan on first read", async () => {
      const res = await get("/user/user_2");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        subscription: {
          user_id: "user_2",
          plan_id: "plan_free_marketfit",
          app_id: "marketfit",
          status: "active",
          plan_name: "Free Plan",
          amount: 0,
          current_period_start: "2024-03-01T00:00:00.000Z",
          current_period_end: "2024-03-31T00:00:00.000Z",
        },
      });
    });

    it("should return 404 for an app without a free plan", async () => {
      const res = await get("/user/user_1?app_id=unknown");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "No free plan configured for app unknown",
        code: "NOT_FOUND",
      });
    });
  });

  describe("POST /create", () => {
    it("should open a paid subscription at the provider", async () => {
      razorpay.createSubscription.mockResolvedValue({
        id: "sub_rzp_1",
        status: "created",
        checkoutUrl: "https://rzp.io/i/test",
        raw: { id: "sub_rzp_1", status: "created" },
      });

      const res = await post("/create", { user_id: "user_1", plan_id: "plan_pro" });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        subscription: {
          user_id: "user_1",
          plan_id: "plan_pro",
          status: "created",
          razorpay_subscription_id: "sub_rzp_1",
          current_period_start: null,
          gateway: "razorpay",
          short_url: "https://rzp.io/i/test",
          metadata: { id: "sub_rzp_1", status: "created" },
        },
      });
      expect(razorpay.createSubscription).toHaveBeenCalledWith(
        "plan_rzp_pro",
        { userId: "user_1", email: "user@example.com", displayName: "Test User" },
        "marketfit"
      );
    });

    it("should require user_id and plan_id", async () => {
      const res = await post("/create", { user_id: "user_1" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "User ID and Plan ID are required",
        code: "VALIDATION_ERROR",
      });
    });

    it("should treat a malformed body as missing fields", async () => {
      const res = await post("/create", "not json");

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "User ID and Plan ID are required" });
    });

    it("should return 404 for an unknown plan", async () => {
      const res = await post("/create", { user_id: "user_1", plan_id: "plan_missing" });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Plan with ID plan_missing not found", code: "NOT_FOUND" });
    });

    it("should return 502 when the provider rejects the subscription", async () => {
      razorpay.createSubscription.mockResolvedValue({ error: true, message: "Razorpay API error: bad plan" });

      const res = await post("/create", { user_id: "user_1", plan_id: "plan_pro" });

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: "Razorpay API error: bad plan", code: "PROVIDER_ERROR" });
      expect(store.listAllSubscriptions()).toEqual([]);
    });
  });

  describe("POST /cancel/:subscription_id", () => {
    it("should schedule cancellation at the end of the period", async () => {
      await store.insertSubscription(
        pending({
          status: "active",
          currentPeriodStart: NOW,
          currentPeriodEnd: new Date("2024-03-31T00:00:00Z"),
        })
      );
      razorpay.cancelSubscription.mockResolvedValue({ status: "active", raw: {} });

      const res = await post("/cancel/sub_1", { user_id: "user_1" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        result: {
          id: "sub_1",
          status: "active",
          cancellation_scheduled: true,
          end_date: "2024-03-31T00:00:00.000Z",
          message: "Subscription will remain active until the end of the current billing period",
        },
      });
      expect(razorpay.cancelSubscription).toHaveBeenCalledWith("sub_rzp_1", true);
    });

    it("should not cancel another user's subscription", async () => {
      await store.insertSubscription(pending({ status: "active" }));

      const res = await post("/cancel/sub_1", { user_id: "user_2" });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "Subscription not found or not owned by user",
        code: "NOT_FOUND",
      });
    });

    it("should require user_id", async () => {
      const res = await post("/cancel/sub_1", {});

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "User ID is required" });
    });
  });

  describe("POST /razorpay-webhook", () => {
    const body = JSON.stringify({
      event: "subscription.activated",
      payload: { subscription: { entity: { id: "sub_rzp_1", status: "active" } } },
    });

    it("should apply a signed delivery", async () => {
      await store.insertSubscription(pending());

      const res = await post("/razorpay-webhook", body, {
        "X-Razorpay-Signature": await computeHmacSignature(body, SECRET),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: "success",
        message: "Processed subscription.activated event",
      });
      expect((await store.getSubscription("sub_1"))?.status).toBe("active");
    });

    it("should reject a bad signature", async () => {
      await store.insertSubscription(pending());

      const res = await post("/razorpay-webhook", body, { "X-Razorpay-Signature": "0".repeat(64) });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid signature" });
      expect((await store.getSubscription("sub_1"))?.status).toBe("created");
    });

    it("should reject an unsigned delivery", async () => {
      const res = await post("/razorpay-webhook", body);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Missing webhook signature" });
    });

    it("should acknowledge an event for an unknown subscription", async () => {
      const res = await post("/razorpay-webhook", body, {
        "X-Razorpay-Signature": await computeHmacSignature(body, SECRET),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "error", message: "Subscription not found" });
    });
  });

  describe("POST /paypal-webhook", () => {
    it("should log and ignore PayPal events", async () => {
      const res = await post("/paypal-webhook", {
        event_type: "BILLING.SUBSCRIPTION.ACTIVATED",
        resource: { id: "I-PAYPAL1" },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: "ignored",
        message: "PayPal webhook handling not implemented",
      });
      expect(store.listEvents().map((e) => e.paypalEntityId)).toEqual(["I-PAYPAL1", "I-PAYPAL1"]);
    });

    it("should require an event type", async () => {
      const res = await post("/paypal-webhook", { id: "WH-1" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid webhook payload" });
    });
  });

  describe("POST /verify-payment", () => {
    const request = {
      razorpay_payment_id: "pay_1",
      razorpay_subscription_id: "sub_rzp_1",
      user_id: "user_1",
    };

    it("should activate the subscription and record a manual invoice", async () => {
      await store.insertSubscription(pending());

      const res = await post("/verify-payment", {
        ...request,
        razorpay_signature: await computeHmacSignature("pay_1|sub_rzp_1", SECRET),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        result: {
          status: "success",
          message: "Subscription activated",
          subscription_id: "sub_1",
          period_start: "2024-03-01T00:00:00.000Z",
          period_end: "2024-03-31T00:00:00.000Z",
        },
      });

      const history = await get("/billing-history?user_id=user_1");
      expect(await history.json()).toMatchObject({
        invoices: [
          {
            subscription_id: "sub_1",
            razorpay_invoice_id: MANUAL_ACTIVATION_INVOICE_ID,
            amount: 49900,
            currency: "INR",
            status: "paid",
            payment_id: "pay_1",
            paid_at: "2024-03-01T00:00:00.000Z",
          },
        ],
      });
    });

    it("should reject a signature that does not match", async () => {
      await store.insertSubscription(pending());

      const res = await post("/verify-payment", { ...request, razorpay_signature: "ab".repeat(32) });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid signature", code: "INVALID_SIGNATURE" });
      expect((await store.getSubscription("sub_1"))?.status).toBe("created");
    });

    it("should require every parameter", async () => {
      const res = await post("/verify-payment", request);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "Missing required parameters" });
    });
  });

  describe("usage", () => {
    it("should count usage against the active subscription", async () => {
      await get("/user/user_1");

      const increment = await post("/increment-usage", {
        user_id: "user_1",
        resource_type: "document_pages",
        count: 3,
      });
      expect(await increment.json()).toEqual({ success: true });

      const res = await get("/usage-stats?user_id=user_1");
      expect(await res.json()).toEqual({ usage: { document_pages: 3, perplexity_requests: 0 } });
    });

    it("should report false without an active subscription", async () => {
      const res = await post("/increment-usage", { user_id: "user_1", resource_type: "perplexity_requests" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: false });
    });

    it("should reject unknown resource types", async () => {
      const res = await post("/increment-usage", { user_id: "user_1", resource_type: "tokens" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
    });

    it("should require user_id for usage stats and billing history", async () => {
      for (const path of ["/usage-stats", "/billing-history"]) {
        const res = await get(path);
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: "User ID is required" });
      }
    });
  });

  describe("POST /record-paypal", () => {
    it("should record an approved PayPal subscription as active", async () => {
      const res = await post("/record-paypal", {
        user_id: "user_1",
        plan_id: "plan_pp",
        paypal_subscription_id: "I-PAYPAL1",
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        subscription: {
          user_id: "user_1",
          plan_id: "plan_pp",
          status: "active",
          paypal_subscription_id: "I-PAYPAL1",
          plan_name: "Pro (International)",
          currency: "USD",
        },
      });
    });

    it("should require every parameter", async () => {
      const res = await post("/record-paypal", { user_id: "user_1", plan_id: "plan_pp" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "Missing required parameters" });
    });
  });

  describe("errors", () => {
    it("should answer unknown routes with 404", async () => {
      const res = await get("/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "Route GET /api/subscriptions/nope not found",
        code: "NOT_FOUND",
      });
    });

    it("should hide unexpected errors behind a generic 500", async () => {
      vi.spyOn(store, "listActivePlans").mockRejectedValueOnce(new Error("connection refused"));

      const res = await get("/plans");

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({
        error: "An unexpected error occurred",
        code: "INTERNAL_ERROR",
      });
    });
  });
});
