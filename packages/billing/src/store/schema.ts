/**
 * @subledger/billing - Database Schema
 * Drizzle ORM schema for subscription billing tables
 *
 * These tables store:
 * - Plans offered per client application
 * - User subscriptions and their billing windows
 * - Invoices recorded from charges and manual activations
 * - Per-period resource usage counters
 * - The webhook and operation audit log
 */

import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import type { Metadata, PlanFeatures, SubscriptionStatus } from "../types.js";

/**
 * Provider invoice id stamped on invoices written by manual activation
 */
export const MANUAL_ACTIVATION_INVOICE_ID = "manual_activation";

// ============================================================================
// Plans
// ============================================================================

export const subscriptionPlans = pgTable(
  "subscription_plans",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    description: text("description"),
    amount: integer("amount").notNull(), // smallest currency unit, 0 = free
    currency: text("currency").notNull().default("INR"),
    interval: text("interval").notNull().default("month"),
    intervalCount: integer("interval_count").notNull().default(1),
    features: jsonb("features").$type<PlanFeatures>().notNull().default({}),
    appId: text("app_id").notNull(),
    planType: text("plan_type").notNull().default("domestic"),
    paymentGateways: jsonb("payment_gateways").$type<string[]>().notNull().default(["razorpay"]),
    paypalPlanId: text("paypal_plan_id"),
    razorpayPlanId: text("razorpay_plan_id"),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    appIdx: index("subscription_plans_app_idx").on(table.appId),
  })
);

// ============================================================================
// Subscriptions
// ============================================================================

export const userSubscriptions = pgTable(
  "user_subscriptions",
  {
    id: text("id").primaryKey(),
    userId: text("user_id").notNull(),
    planId: text("plan_id")
      .notNull()
      .references(() => subscriptionPlans.id),
    razorpaySubscriptionId: text("razorpay_subscription_id"),
    paypalSubscriptionId: text("paypal_subscription_id"),
    status: text("status").$type<SubscriptionStatus>().notNull(),
    currentPeriodStart: timestamp("current_period_start"),
    currentPeriodEnd: timestamp("current_period_end"),
    appId: text("app_id").notNull(),
    metadata: jsonb("metadata").$type<Metadata>().notNull().default({}),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    userAppStatusIdx: index("user_subscriptions_user_app_status_idx").on(
      table.userId,
      table.appId,
      table.status
    ),
    oneActiveIdx: uniqueIndex("user_subscriptions_one_active_idx")
      .on(table.userId, table.appId)
      .where(sql`${table.status} = 'active'`),
    razorpayIdx: index("user_subscriptions_razorpay_idx").on(table.razorpaySubscriptionId),
    paypalIdx: index("user_subscriptions_paypal_idx").on(table.paypalSubscriptionId),
  })
);

// ============================================================================
// Invoices
// ============================================================================

export const subscriptionInvoices = pgTable(
  "subscription_invoices",
  {
    id: text("id").primaryKey(),
    subscriptionId: text("subscription_id")
      .notNull()
      .references(() => userSubscriptions.id),
    userId: text("user_id").notNull(),
    razorpayInvoiceId: text("razorpay_invoice_id"),
    paypalInvoiceId: text("paypal_invoice_id"),
    amount: integer("amount").notNull(),
    currency: text("currency").notNull().default("INR"),
    status: text("status").notNull(),
    paymentId: text("payment_id"),
    invoiceDate: timestamp("invoice_date").defaultNow().notNull(),
    paidAt: timestamp("paid_at"),
    appId: text("app_id").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    subscriptionIdx: index("subscription_invoices_subscription_idx").on(table.subscriptionId),
    userAppIdx: index("subscription_invoices_user_app_idx").on(table.userId, table.appId),
    // One invoice per provider invoice; replayed charge webhooks insert nothing
    razorpayInvoiceIdx: uniqueIndex("subscription_invoices_razorpay_invoice_idx")
      .on(table.razorpayInvoiceId)
      .where(sql`${table.razorpayInvoiceId} <> 'manual_activation'`),
  })
);

// ============================================================================
// Event Log
// ============================================================================

export const subscriptionEventsLog = pgTable(
  "subscription_events_log",
  {
    id: text("id").primaryKey(),
    eventType: text("event_type").notNull(),
    razorpayEntityId: text("razorpay_entity_id"),
    paypalEntityId: text("paypal_entity_id"),
    userId: text("user_id"),
    data: jsonb("data").$type<Metadata>().notNull().default({}),
    processed: boolean("processed").notNull().default(false),
    error: text("error"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    eventTypeIdx: index("subscription_events_log_event_type_idx").on(table.eventType),
    razorpayEntityIdx: index("subscription_events_log_razorpay_entity_idx").on(table.razorpayEntityId),
  })
);

// ============================================================================
// Resource Usage
// ============================================================================

export const resourceUsage = pgTable(
  "resource_usage",
  {
    id: text("id").primaryKey(),
    userId: text("user_id").notNull(),
    subscriptionId: text("subscription_id")
      .notNull()
      .references(() => userSubscriptions.id),
    appId: text("app_id").notNull(),
    billingPeriodStart: timestamp("billing_period_start").notNull(),
    billingPeriodEnd: timestamp("billing_period_end").notNull(),
    documentPagesCount: integer("document_pages_count").notNull().default(0),
    perplexityRequestsCount: integer("perplexity_requests_count").notNull().default(0),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    subscriptionPeriodIdx: index("resource_usage_subscription_period_idx").on(
      table.subscriptionId,
      table.billingPeriodStart
    ),
    userAppIdx: index("resource_usage_user_app_idx").on(table.userId, table.appId),
  })
);

// ============================================================================
// Host Application Tables (read-only)
// ============================================================================

/**
 * Users table owned by the host application; read for checkout contact details
 */
export const users = pgTable("users", {
  id: text("id").primaryKey(),
  googleUid: text("google_uid"),
  email: text("email"),
  displayName: text("display_name"),
});

// ============================================================================
// Type Exports
// ============================================================================

export type PlanRow = typeof subscriptionPlans.$inferSelect;
export type SubscriptionRow = typeof userSubscriptions.$inferSelect;
export type InvoiceRow = typeof subscriptionInvoices.$inferSelect;
export type EventLogRow = typeof subscriptionEventsLog.$inferSelect;
export type ResourceUsageRow = typeof resourceUsage.$inferSelect;
export type UserRow = typeof users.$inferSelect;
