/**
 * @subledger/server - Subscription Routes
 * Plans, subscriptions, usage, billing history and provider webhooks
 */

import { Hono } from "hono";
import { SignatureError } from "@subledger/core";
import {
  appQuery,
  cancelSubscriptionBody,
  createSubscriptionBody,
  incrementUsageBody,
  recordPaypalBody,
  userAppQuery,
  verifyPaymentBody,
} from "@subledger/types";
import type { ServerEnv } from "../context.js";
import {
  serializeCreatedSubscription,
  serializeInvoice,
  serializePlan,
  serializeSubscriptionWithPlan,
} from "../utils/response.js";
import { validateBody, validateQuery } from "../validation/index.js";

const USER_ID_REQUIRED = "User ID is required";
const MISSING_PARAMETERS = "Missing required parameters";

/**
 * Create the subscription router, mounted at `/api/subscriptions`
 *
 * @example
 * ```typescript
 * app.route('/api/subscriptions', createSubscriptionRoutes());
 * ```
 */
export function createSubscriptionRoutes(): Hono<ServerEnv> {
  const router = new Hono<ServerEnv>();

  router.get("/plans", validateQuery(appQuery), async (c) => {
    const appId = c.get("validatedQuery").app_id ?? c.get("defaultAppId");
    const plans = await c.get("engine").getAvailablePlans(appId);
    return c.json({ plans: plans.map(serializePlan) });
  });

  router.get("/user/:user_id", validateQuery(appQuery), async (c) => {
    const appId = c.get("validatedQuery").app_id ?? c.get("defaultAppId");
    const subscription = await c.get("engine").getUserSubscription(c.req.param("user_id"), appId);
    return c.json({ subscription: serializeSubscriptionWithPlan(subscription) });
  });

  router.post(
    "/create",
    validateBody(createSubscriptionBody, { message: "User ID and Plan ID are required" }),
    async (c) => {
      const body = c.get("validatedBody");
      const created = await c
        .get("engine")
        .createSubscription(body.user_id, body.plan_id, body.app_id ?? c.get("defaultAppId"));
      return c.json({ subscription: serializeCreatedSubscription(created) });
    }
  );

  router.post(
    "/cancel/:subscription_id",
    validateBody(cancelSubscriptionBody, { message: USER_ID_REQUIRED }),
    async (c) => {
      const result = await c
        .get("engine")
        .cancelSubscription(c.get("validatedBody").user_id, c.req.param("subscription_id"));
      return c.json({ result });
    }
  );

  // Webhooks read the raw body: the signature covers the exact bytes sent
  router.post("/razorpay-webhook", async (c) => {
    const { statusCode, body } = await c
      .get("webhooks")
      .processRazorpay(await c.req.text(), c.req.header("X-Razorpay-Signature"));
    return c.json(body, statusCode);
  });

  router.post("/paypal-webhook", async (c) => {
    const { statusCode, body } = await c
      .get("webhooks")
      .processPayPal(await c.req.text(), c.req.header("PayPal-Transmission-Sig"));
    return c.json(body, statusCode);
  });

  router.post(
    "/verify-payment",
    validateBody(verifyPaymentBody, { message: MISSING_PARAMETERS }),
    async (c) => {
      const body = c.get("validatedBody");
      const verified = await c
        .get("paymentVerifier")
        .verifyPaymentSignature(
          body.razorpay_payment_id,
          body.razorpay_subscription_id,
          body.razorpay_signature
        );
      if (!verified) {
        throw new SignatureError("Invalid signature", {
          razorpaySubscriptionId: body.razorpay_subscription_id,
        });
      }

      const result = await c
        .get("engine")
        .activateSubscription(body.user_id, body.razorpay_subscription_id, body.razorpay_payment_id);
      return c.json({ result });
    }
  );

  router.get(
    "/usage-stats",
    validateQuery(userAppQuery, { message: USER_ID_REQUIRED }),
    async (c) => {
      const query = c.get("validatedQuery");
      const usage = await c
        .get("engine")
        .getUsageStats(query.user_id, query.app_id ?? c.get("defaultAppId"));
      return c.json({ usage });
    }
  );

  router.post(
    "/increment-usage",
    validateBody(incrementUsageBody, { message: "User ID and a valid resource type are required" }),
    async (c) => {
      const body = c.get("validatedBody");
      const success = await c
        .get("engine")
        .incrementUsage(
          body.user_id,
          body.app_id ?? c.get("defaultAppId"),
          body.resource_type,
          body.count ?? 1
        );
      return c.json({ success });
    }
  );

  router.get(
    "/billing-history",
    validateQuery(userAppQuery, { message: USER_ID_REQUIRED }),
    async (c) => {
      const query = c.get("validatedQuery");
      const invoices = await c
        .get("engine")
        .getBillingHistory(query.user_id, query.app_id ?? c.get("defaultAppId"));
      return c.json({ invoices: invoices.map(serializeInvoice) });
    }
  );

  router.post(
    "/record-paypal",
    validateBody(recordPaypalBody, { message: MISSING_PARAMETERS }),
    async (c) => {
      const body = c.get("validatedBody");
      const subscription = await c
        .get("engine")
        .recordPayPalSubscription(
          body.user_id,
          body.plan_id,
          body.paypal_subscription_id,
          body.app_id ?? c.get("defaultAppId")
        );
      return c.json({ subscription: serializeSubscriptionWithPlan(subscription) });
    }
  );

  return router;
}
