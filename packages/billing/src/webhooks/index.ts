/**
 * @subledger/billing - Webhooks
 */

export {
  RazorpayWebhookVerifier,
  PayPalWebhookVerifier,
  computeHmacSignature,
  createRazorpayWebhookVerifier,
  type WebhookVerifier,
  type RazorpayWebhookVerifierConfig,
} from "./verifier.js";

export {
  WebhookHandlerRegistry,
  RAZORPAY_SUBSCRIPTION_EVENTS,
  createWebhookHandlerRegistry,
  toRazorpayEvent,
  type RazorpaySubscriptionEvent,
  type RazorpayEvent,
  type HandlerResult,
  type HandlerStatus,
  type WebhookHandler,
} from "./registry.js";

export {
  WebhookProcessor,
  createWebhookProcessor,
  type WebhookResult,
  type WebhookSink,
  type WebhookResponse,
  type WebhookErrorBody,
  type WebhookProcessorConfig,
} from "./processor.js";
