/**
 * @subledger/billing - Event Log
 * Append-only audit trail of inbound and outbound billing events
 */

import { createLogger, type Logger } from "@subledger/core";
import type { Metadata, PaymentGateway, SubscriptionStore } from "../types.js";

export interface EventRecord {
  eventType: string;
  gateway?: PaymentGateway | undefined;
  /** Provider id of the entity the event concerns */
  entityId?: string | null | undefined;
  userId?: string | null | undefined;
  data: Metadata;
  processed?: boolean | undefined;
  error?: string | null | undefined;
}

/**
 * Writes `subscription_events_log` rows. Entries are never read back by the engine.
 */
export class EventLog {
  private readonly store: SubscriptionStore;
  private readonly logger: Logger;

  constructor(store: SubscriptionStore, logger?: Logger) {
    this.store = store;
    this.logger = logger ?? createLogger({ name: "event-log" });
  }

  /**
   * Append one entry. Pass `tx` to write inside an open transaction.
   */
  async record(entry: EventRecord, tx: SubscriptionStore = this.store): Promise<void> {
    const gateway = entry.gateway ?? "razorpay";
    const entityId = entry.entityId ?? null;

    await tx.appendEvent({
      eventType: entry.eventType,
      razorpayEntityId: gateway === "razorpay" ? entityId : null,
      paypalEntityId: gateway === "paypal" ? entityId : null,
      userId: entry.userId ?? null,
      data: entry.data,
      processed: entry.processed ?? true,
      error: entry.error ?? null,
    });

    this.logger.debug("Event logged", { eventType: entry.eventType, entityId, gateway });
  }

  /**
   * Receipt of a provider notification, before any handling
   */
  async received(
    gateway: PaymentGateway,
    eventType: string,
    entityId: string | null,
    userId: string | null,
    payload: Metadata
  ): Promise<void> {
    await this.record({ eventType, gateway, entityId, userId, data: payload, processed: false });
  }

  /**
   * Completion of a notification, successful or not; `eventType` gains a `_processed` suffix
   */
  async processed(
    gateway: PaymentGateway,
    eventType: string,
    entityId: string | null,
    userId: string | null,
    result: Metadata,
    error: string | null = null
  ): Promise<void> {
    await this.record({
      eventType: `${eventType}_processed`,
      gateway,
      entityId,
      userId,
      data: result,
      processed: true,
      error,
    });
  }
}

export function createEventLog(store: SubscriptionStore, logger?: Logger): EventLog {
  return new EventLog(store, logger);
}
