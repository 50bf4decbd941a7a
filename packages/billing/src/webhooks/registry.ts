/**
 * @subledger/billing - Webhook Handler Registry
 * Maps provider event types to state-transition handlers
 */

import { isPlainObject } from "@subledger/core";
import {
  razorpayPaymentEntity,
  razorpaySubscriptionEntity,
  safeValidate,
  type RazorpayPaymentEntity,
  type RazorpaySubscriptionEntity,
  type RazorpayWebhookPayload,
  type Type,
} from "@subledger/types";
import type { SubscriptionStore } from "../types.js";

/**
 * Razorpay subscription lifecycle events the engine acts on
 */
export const RAZORPAY_SUBSCRIPTION_EVENTS = [
  "subscription.authenticated",
  "subscription.activated",
  "subscription.charged",
  "subscription.completed",
  "subscription.cancelled",
] as const;

export type RazorpaySubscriptionEvent = (typeof RAZORPAY_SUBSCRIPTION_EVENTS)[number];

export type HandlerStatus = "success" | "error" | "ignored";

/**
 * Outcome of one handler. Extra keys (period bounds, ids) travel to the caller.
 */
export interface HandlerResult {
  status: HandlerStatus;
  message: string;
  [key: string]: unknown;
}

/**
 * A Razorpay notification with its entities unwrapped
 */
export interface RazorpayEvent {
  event: string;
  /** `payload.subscription.entity`, or the container itself when sent flat */
  subscription: RazorpaySubscriptionEntity | null;
  /** `payload.payment.entity` */
  payment: RazorpayPaymentEntity | null;
  raw: RazorpayWebhookPayload;
}

export type WebhookHandler = (event: RazorpayEvent, tx: SubscriptionStore) => Promise<HandlerResult>;

function unwrapEntity<T extends Type>(schema: T, container: unknown): T["infer"] | null {
  if (!isPlainObject(container)) return null;
  const entity = container["entity"];
  const parsed = safeValidate(schema, isPlainObject(entity) ? entity : container);
  return parsed.success ? parsed.data : null;
}

/**
 * Build a handler-facing event from a validated payload
 */
export function toRazorpayEvent(payload: RazorpayWebhookPayload): RazorpayEvent {
  return {
    event: payload.event,
    subscription: unwrapEntity(razorpaySubscriptionEntity, payload.payload?.subscription),
    payment: unwrapEntity(razorpayPaymentEntity, payload.payload?.payment),
    raw: payload,
  };
}

/**
 * Webhook event handler registry
 *
 * @example
 * ```typescript
 * const registry = new WebhookHandlerRegistry()
 *   .on('subscription.charged', async (event, tx) => renew(event, tx));
 *
 * await registry.handle(event, store); // { status: 'ignored', ... } for unregistered types
 * ```
 */
export class WebhookHandlerRegistry {
  private handlers = new Map<string, WebhookHandler>();

  /**
   * Register the handler for an event type, replacing any previous one
   */
  on(type: string, handler: WebhookHandler): this {
    this.handlers.set(type, handler);
    return this;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  get eventTypes(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Run the handler for an event; unregistered types resolve to `ignored`
   */
  async handle(event: RazorpayEvent, tx: SubscriptionStore): Promise<HandlerResult> {
    const handler = this.handlers.get(event.event);

    if (!handler) {
      return { status: "ignored", message: `Unhandled event type: ${event.event}` };
    }

    return handler(event, tx);
  }
}

export function createWebhookHandlerRegistry(): WebhookHandlerRegistry {
  return new WebhookHandlerRegistry();
}
