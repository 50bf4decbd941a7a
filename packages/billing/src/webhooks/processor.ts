/**
 * @subledger/billing - Webhook Processor
 * Verifies, parses and dispatches raw webhook deliveries, always producing
 * a status code and a body
 */

import { createLogger, errorMessage, type Logger } from "@subledger/core";
import {
  paypalWebhookPayload,
  razorpayWebhookPayload,
  safeValidate,
  type PaypalWebhookPayload,
  type RazorpayWebhookPayload,
} from "@subledger/types";
import type { HandlerResult, HandlerStatus } from "./registry.js";
import type { WebhookVerifier } from "./verifier.js";

/**
 * What the engine reports for one delivery
 */
export interface WebhookResult {
  status: HandlerStatus;
  message: string;
  result?: HandlerResult | undefined;
}

/**
 * Receiver of verified, schema-checked payloads
 */
export interface WebhookSink {
  handleRazorpayEvent(payload: RazorpayWebhookPayload): Promise<WebhookResult>;
  handlePayPalEvent(payload: PaypalWebhookPayload): Promise<WebhookResult>;
}

export interface WebhookErrorBody {
  error: string;
}

/**
 * Webhook process result
 */
export interface WebhookResponse {
  statusCode: 200 | 400 | 500;
  body: WebhookResult | WebhookErrorBody;
}

export interface WebhookProcessorConfig {
  razorpayVerifier: WebhookVerifier;
  paypalVerifier: WebhookVerifier;
  /** Process Razorpay deliveries that carry no signature header (development only) */
  allowUnsigned?: boolean | undefined;
  logger?: Logger | undefined;
}

function reject(statusCode: 400 | 500, error: string): WebhookResponse {
  return { statusCode, body: { error } };
}

/**
 * Webhook processor for handling incoming webhooks
 *
 * @example
 * ```typescript
 * const processor = new WebhookProcessor(engine, { razorpayVerifier, paypalVerifier });
 * const { statusCode, body } = await processor.processRazorpay(rawBody, signature);
 * return c.json(body, statusCode);
 * ```
 */
export class WebhookProcessor {
  private readonly sink: WebhookSink;
  private readonly razorpayVerifier: WebhookVerifier;
  private readonly paypalVerifier: WebhookVerifier;
  private readonly allowUnsigned: boolean;
  private readonly logger: Logger;

  constructor(sink: WebhookSink, config: WebhookProcessorConfig) {
    this.sink = sink;
    this.razorpayVerifier = config.razorpayVerifier;
    this.paypalVerifier = config.paypalVerifier;
    this.allowUnsigned = config.allowUnsigned ?? false;
    this.logger = config.logger ?? createLogger({ name: "webhooks" });
  }

  /**
   * Process a raw Razorpay delivery and its `X-Razorpay-Signature` header
   */
  async processRazorpay(
    payload: string | Uint8Array,
    signature: string | null | undefined
  ): Promise<WebhookResponse> {
    this.logger.info("Received Razorpay webhook", { length: payload.length });

    if (signature) {
      if (!(await this.razorpayVerifier.verify(payload, signature))) {
        this.logger.warn("Invalid Razorpay webhook signature");
        return reject(400, "Invalid signature");
      }
    } else if (this.allowUnsigned) {
      this.logger.warn("Processing unsigned Razorpay webhook");
    } else {
      this.logger.warn("Razorpay webhook without signature rejected");
      return reject(400, "Missing webhook signature");
    }

    const parsed = safeValidate(razorpayWebhookPayload, parseJson(payload));
    if (!parsed.success) {
      this.logger.error("Invalid Razorpay webhook payload", { issues: parsed.errors });
      return reject(400, "Invalid webhook payload");
    }

    return this.dispatch("razorpay", parsed.data.event, () => this.sink.handleRazorpayEvent(parsed.data));
  }

  /**
   * Process a raw PayPal delivery
   */
  async processPayPal(
    payload: string | Uint8Array,
    signature: string | null | undefined
  ): Promise<WebhookResponse> {
    this.logger.info("Received PayPal webhook");

    if (!(await this.paypalVerifier.verify(payload, signature ?? ""))) {
      this.logger.warn("Invalid PayPal webhook signature");
      return reject(400, "Invalid signature");
    }

    const parsed = safeValidate(paypalWebhookPayload, parseJson(payload));
    if (!parsed.success) {
      this.logger.error("No event type in PayPal webhook", { issues: parsed.errors });
      return reject(400, "Invalid webhook payload");
    }

    return this.dispatch("paypal", parsed.data.event_type, () => this.sink.handlePayPalEvent(parsed.data));
  }

  private async dispatch(
    provider: string,
    eventType: string,
    run: () => Promise<WebhookResult>
  ): Promise<WebhookResponse> {
    try {
      const result = await run();
      this.logger.info("Webhook processed", { provider, eventType, status: result.status });
      return { statusCode: 200, body: result };
    } catch (err) {
      this.logger.error("Error handling webhook", err, { provider, eventType });
      return reject(500, errorMessage(err));
    }
  }
}

function parseJson(payload: string | Uint8Array): unknown {
  const text = typeof payload === "string" ? payload : new TextDecoder().decode(payload);
  try {
    return JSON.parse(text);
  } catch {
    // an unparseable body fails schema validation like any other bad payload
    return undefined;
  }
}

/**
 * Create a webhook processor
 */
export function createWebhookProcessor(
  sink: WebhookSink,
  config: WebhookProcessorConfig
): WebhookProcessor {
  return new WebhookProcessor(sink, config);
}
