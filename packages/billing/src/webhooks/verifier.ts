/**
 * @subledger/billing - Webhook Verification
 * Shared-secret signature checks for inbound provider notifications
 */

import { constantTimeEquals, createLogger, type Logger } from "@subledger/core";

/**
 * Authenticates the raw body of a provider notification
 */
export interface WebhookVerifier {
  verify(payload: string | Uint8Array, signature: string): Promise<boolean>;
}

export interface RazorpayWebhookVerifierConfig {
  /** Webhook secret from the Razorpay dashboard; absent means every check fails */
  webhookSecret?: string | undefined;
  logger?: Logger | undefined;
}

const HEX_SHA256 = /^[0-9a-f]{64}$/i;

/**
 * HMAC-SHA256 (hex) over the raw request body.
 *
 * @example
 * ```typescript
 * const verifier = new RazorpayWebhookVerifier({ webhookSecret: process.env.RAZORPAY_WEBHOOK_SECRET });
 * const ok = await verifier.verify(rawBody, c.req.header('X-Razorpay-Signature') ?? '');
 * ```
 */
export class RazorpayWebhookVerifier implements WebhookVerifier {
  private readonly secret: string | null;
  private readonly logger: Logger;

  constructor(config: RazorpayWebhookVerifierConfig = {}) {
    this.secret = config.webhookSecret || null;
    this.logger = config.logger ?? createLogger({ name: "webhook-verifier" });
  }

  async verify(payload: string | Uint8Array, signature: string): Promise<boolean> {
    if (!this.secret) {
      this.logger.warn("Razorpay webhook secret not configured");
      return false;
    }
    if (!HEX_SHA256.test(signature)) {
      return false;
    }

    const expected = await computeHmacSignature(payload, this.secret);
    return constantTimeEquals(expected, signature.toLowerCase());
  }

  /**
   * Check the checkout callback signature, computed over `"{paymentId}|{subscriptionId}"`
   */
  async verifyPaymentSignature(
    paymentId: string,
    subscriptionId: string,
    signature: string
  ): Promise<boolean> {
    return this.verify(`${paymentId}|${subscriptionId}`, signature);
  }
}

/**
 * PayPal verification placeholder: accepts every notification.
 * PayPal webhooks are acknowledged but not acted on.
 */
export class PayPalWebhookVerifier implements WebhookVerifier {
  private readonly logger: Logger;

  constructor(config: { logger?: Logger | undefined } = {}) {
    this.logger = config.logger ?? createLogger({ name: "webhook-verifier" });
  }

  async verify(_payload: string | Uint8Array, _signature: string): Promise<boolean> {
    this.logger.debug("PayPal webhook signature verification skipped");
    return true;
  }
}

/**
 * Lowercase hex HMAC-SHA256 of `payload`
 */
export async function computeHmacSignature(
  payload: string | Uint8Array,
  secret: string
): Promise<string> {
  const encoder = new TextEncoder();
  const messageData = typeof payload === "string" ? encoder.encode(payload) : payload;

  const cryptoKey = await crypto.subtle.importKey(
    "raw",
    encoder.encode(secret),
    { name: "HMAC", hash: "SHA-256" },
    false,
    ["sign"]
  );

  const signature = await crypto.subtle.sign("HMAC", cryptoKey, messageData);

  return Array.from(new Uint8Array(signature))
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function createRazorpayWebhookVerifier(
  config?: RazorpayWebhookVerifierConfig
): RazorpayWebhookVerifier {
  return new RazorpayWebhookVerifier(config);
}
