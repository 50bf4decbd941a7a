import { describe, it, expect, vi } from "vitest";
import { createNullLogger } from "@subledger/core";
import type { PaypalWebhookPayload, RazorpayWebhookPayload } from "@subledger/types";
import { createMemorySubscriptionStore } from "../store/memory-storage.js";
import { WebhookProcessor, type WebhookResult, type WebhookSink } from "./processor.js";
import { SubscriptionLifecycle } from "../engine/lifecycle.js";
import { registerRazorpayHandlers } from "../engine/razorpay-handlers.js";
import {
  RAZORPAY_SUBSCRIPTION_EVENTS,
  WebhookHandlerRegistry,
  createWebhookHandlerRegistry,
  toRazorpayEvent,
} from "./registry.js";
import {
  PayPalWebhookVerifier,
  RazorpayWebhookVerifier,
  computeHmacSignature,
} from "./verifier.js";

const SECRET = "test-secret";

describe("@subledger/billing - Webhooks", () => {
  describe("RazorpayWebhookVerifier", () => {
    const verifier = new RazorpayWebhookVerifier({ webhookSecret: SECRET, logger: createNullLogger() });
    const body = JSON.stringify({ event: "subscription.charged" });

    it("should accept the HMAC of the raw body", async () => {
      const signature = await computeHmacSignature(body, SECRET);

      expect(signature).toMatch(/^[0-9a-f]{64}$/);
      expect(await verifier.verify(body, signature)).toBe(true);
    });

    it("should accept an uppercase hex signature", async () => {
      const signature = await computeHmacSignature(body, SECRET);

      expect(await verifier.verify(body, signature.toUpperCase())).toBe(true);
    });

    it("should accept a byte payload", async () => {
      const signature = await computeHmacSignature(body, SECRET);

      expect(await verifier.verify(new TextEncoder().encode(body), signature)).toBe(true);
    });

    it("should reject a signature over a different body", async () => {
      const signature = await computeHmacSignature(body, SECRET);

      expect(await verifier.verify(`${body} `, signature)).toBe(false);
    });

    it("should reject a signature made with another secret", async () => {
      const signature = await computeHmacSignature(body, "other-secret");

      expect(await verifier.verify(body, signature)).toBe(false);
    });

    it("should reject malformed signatures", async () => {
      expect(await verifier.verify(body, "")).toBe(false);
      expect(await verifier.verify(body, "not-a-signature")).toBe(false);
      expect(await verifier.verify(body, "ab".repeat(31))).toBe(false);
    });

    it("should fail closed without a secret", async () => {
      const unconfigured = new RazorpayWebhookVerifier({ logger: createNullLogger() });
      const signature = await computeHmacSignature(body, SECRET);

      expect(await unconfigured.verify(body, signature)).toBe(false);
    });

    it("should verify checkout payment signatures over payment and subscription ids", async () => {
      const signature = await computeHmacSignature("pay_1|sub_rzp_1", SECRET);

      expect(await verifier.verifyPaymentSignature("pay_1", "sub_rzp_1", signature)).toBe(true);
      expect(await verifier.verifyPaymentSignature("pay_2", "sub_rzp_1", signature)).toBe(false);
    });
  });

  describe("PayPalWebhookVerifier", () => {
    it("should accept every notification", async () => {
      const verifier = new PayPalWebhookVerifier({ logger: createNullLogger() });

      expect(await verifier.verify("{}", "")).toBe(true);
    });
  });

  describe("toRazorpayEvent", () => {
    it("should unwrap entities nested under entity", () => {
      const event = toRazorpayEvent({
        event: "subscription.charged",
        payload: {
          subscription: { entity: { id: "sub_rzp_1", status: "active" } },
          payment: { entity: { id: "pay_1", invoice_id: "inv_rzp_1", amount: 49900 } },
        },
      });

      expect(event.subscription).toEqual({ id: "sub_rzp_1", status: "active" });
      expect(event.payment).toEqual({ id: "pay_1", invoice_id: "inv_rzp_1", amount: 49900 });
    });

    it("should accept a subscription sent without the entity wrapper", () => {
      const event = toRazorpayEvent({
        event: "subscription.charged",
        payload: { subscription: { id: "sub_rzp_1" } },
      });

      expect(event.subscription).toEqual({ id: "sub_rzp_1" });
      expect(event.payment).toBeNull();
    });

    it("should drop entities that fail validation", () => {
      const event = toRazorpayEvent({
        event: "subscription.activated",
        payload: { subscription: { entity: { id: 42 } } },
      });

      expect(event.subscription).toBeNull();
    });
  });

  describe("WebhookHandlerRegistry", () => {
    it("should dispatch to the registered handler", async () => {
      const store = createMemorySubscriptionStore();
      const handler = vi.fn(async () => ({ status: "success" as const, message: "done" }));
      const registry = new WebhookHandlerRegistry().on("subscription.completed", handler);
      const event = toRazorpayEvent({ event: "subscription.completed" });

      expect(await registry.handle(event, store)).toEqual({ status: "success", message: "done" });
      expect(handler).toHaveBeenCalledWith(event, store);
    });

    it("should ignore unregistered event types", async () => {
      const registry = new WebhookHandlerRegistry();

      const result = await registry.handle(
        toRazorpayEvent({ event: "payment.authorized" }),
        createMemorySubscriptionStore()
      );

      expect(result).toEqual({ status: "ignored", message: "Unhandled event type: payment.authorized" });
    });

    it("should replace a handler registered twice", async () => {
      const first = vi.fn(async () => ({ status: "success" as const, message: "first" }));
      const second = vi.fn(async () => ({ status: "success" as const, message: "second" }));
      const registry = new WebhookHandlerRegistry().on("x", first).on("x", second);

      const result = await registry.handle(toRazorpayEvent({ event: "x" }), createMemorySubscriptionStore());

      expect(result.message).toBe("second");
      expect(first).not.toHaveBeenCalled();
      expect(registry.eventTypes).toEqual(["x"]);
    });

    it("should register a handler for every subscription lifecycle event", () => {
      const logger = createNullLogger();
      const registry = registerRazorpayHandlers(createWebhookHandlerRegistry(), {
        lifecycle: new SubscriptionLifecycle(logger),
        now: () => new Date("2024-03-01T00:00:00Z"),
        logger,
      });

      expect(registry.eventTypes).toEqual([...RAZORPAY_SUBSCRIPTION_EVENTS]);
      expect(registry.has("payment.authorized")).toBe(false);
    });
  });

  describe("WebhookProcessor", () => {
    const ok: WebhookResult = { status: "success", message: "Processed subscription.charged event" };

    function setup(options: { allowUnsigned?: boolean } = {}) {
      const sink = {
        handleRazorpayEvent: vi.fn(async (_payload: RazorpayWebhookPayload): Promise<WebhookResult> => ok),
        handlePayPalEvent: vi.fn(
          async (_payload: PaypalWebhookPayload): Promise<WebhookResult> => ({
            status: "ignored",
            message: "PayPal webhook handling not implemented",
          })
        ),
      } satisfies WebhookSink;

      const processor = new WebhookProcessor(sink, {
        razorpayVerifier: new RazorpayWebhookVerifier({ webhookSecret: SECRET, logger: createNullLogger() }),
        paypalVerifier: new PayPalWebhookVerifier({ logger: createNullLogger() }),
        allowUnsigned: options.allowUnsigned,
        logger: createNullLogger(),
      });

      return { sink, processor };
    }

    const body = JSON.stringify({
      event: "subscription.charged",
      payload: { subscription: { entity: { id: "sub_rzp_1" } } },
    });

    it("should dispatch a signed delivery and return 200", async () => {
      const { sink, processor } = setup();
      const signature = await computeHmacSignature(body, SECRET);

      const response = await processor.processRazorpay(body, signature);

      expect(response).toEqual({ statusCode: 200, body: ok });
      expect(sink.handleRazorpayEvent).toHaveBeenCalledWith({
        event: "subscription.charged",
        payload: { subscription: { entity: { id: "sub_rzp_1" } } },
      });
    });

    it("should reject a bad signature with 400 before parsing", async () => {
      const { sink, processor } = setup();

      const response = await processor.processRazorpay(body, "0".repeat(64));

      expect(response).toEqual({ statusCode: 400, body: { error: "Invalid signature" } });
      expect(sink.handleRazorpayEvent).not.toHaveBeenCalled();
    });

    it("should reject an unsigned delivery by default", async () => {
      const { processor } = setup();

      const response = await processor.processRazorpay(body, undefined);

      expect(response).toEqual({ statusCode: 400, body: { error: "Missing webhook signature" } });
    });

    it("should process an unsigned delivery when allowed", async () => {
      const { sink, processor } = setup({ allowUnsigned: true });

      const response = await processor.processRazorpay(body, null);

      expect(response.statusCode).toBe(200);
      expect(sink.handleRazorpayEvent).toHaveBeenCalledTimes(1);
    });

    it("should reject a body that is not JSON", async () => {
      const { processor } = setup();
      const raw = "not json";

      const response = await processor.processRazorpay(raw, await computeHmacSignature(raw, SECRET));

      expect(response).toEqual({ statusCode: 400, body: { error: "Invalid webhook payload" } });
    });

    it("should reject a payload without an event type", async () => {
      const { processor } = setup();
      const raw = JSON.stringify({ payload: {} });

      const response = await processor.processRazorpay(raw, await computeHmacSignature(raw, SECRET));

      expect(response).toEqual({ statusCode: 400, body: { error: "Invalid webhook payload" } });
    });

    it("should return 500 with the message when handling throws", async () => {
      const { sink, processor } = setup();
      sink.handleRazorpayEvent.mockRejectedValueOnce(new Error("connection reset"));

      const response = await processor.processRazorpay(body, await computeHmacSignature(body, SECRET));

      expect(response).toEqual({ statusCode: 500, body: { error: "connection reset" } });
    });

    it("should pass PayPal deliveries with an event type to the sink", async () => {
      const { sink, processor } = setup();
      const raw = JSON.stringify({ event_type: "BILLING.SUBSCRIPTION.ACTIVATED", resource: { id: "I-1" } });

      const response = await processor.processPayPal(raw, undefined);

      expect(response).toEqual({
        statusCode: 200,
        body: { status: "ignored", message: "PayPal webhook handling not implemented" },
      });
      expect(sink.handlePayPalEvent).toHaveBeenCalledWith({
        event_type: "BILLING.SUBSCRIPTION.ACTIVATED",
        resource: { id: "I-1" },
      });
    });

    it("should reject PayPal deliveries without an event type", async () => {
      const { processor } = setup();

      const response = await processor.processPayPal(JSON.stringify({ id: "WH-1" }), undefined);

      expect(response).toEqual({ statusCode: 400, body: { error: "Invalid webhook payload" } });
    });
  });
});
