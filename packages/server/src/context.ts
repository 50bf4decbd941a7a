/**
 * @subledger/server - Server Context
 * Type definitions for server context and configuration
 */

import type { Hono, Context } from "hono";
import type { Logger } from "@subledger/core";
import type { RazorpayWebhookVerifier, SubscriptionEngine, WebhookProcessor } from "@subledger/billing";

/**
 * Server configuration
 */
export interface ServerConfig {
  /** Subscription engine backing every route */
  engine: SubscriptionEngine;
  /** Verifies and dispatches webhook deliveries */
  webhooks: WebhookProcessor;
  /** Checks checkout signatures for `/verify-payment` */
  paymentVerifier: RazorpayWebhookVerifier;
  /** App used when a request omits `app_id` */
  defaultAppId?: string | undefined;
  /** Mount point of the subscription routes */
  basePath?: string | undefined;
  logger?: Logger | undefined;
}

/**
 * Server context variables
 * Available in Hono context via c.get()
 */
export interface ServerContextVariables {
  engine: SubscriptionEngine;
  webhooks: WebhookProcessor;
  paymentVerifier: RazorpayWebhookVerifier;
  defaultAppId: string;
  /** Request logger, bound to the request id */
  logger: Logger;
  requestId: string;
}

/**
 * Hono environment with server context
 */
export interface ServerEnv {
  Variables: ServerContextVariables;
}

/**
 * Hono app type with server context
 */
export type HonoApp = Hono<ServerEnv>;

/**
 * Hono context type with server context
 */
export type HonoContext = Context<ServerEnv>;

/**
 * Middleware next function
 */
export type HonoNext = () => Promise<void>;

/**
 * Generate a request ID
 */
export function generateRequestId(): string {
  return crypto.randomUUID();
}
