/**
 * @subledger/billing - Schema Bootstrap
 * Idempotent DDL for the billing tables declared in schema.ts
 */

import { sql, type SQL } from "drizzle-orm";
import { createLogger, type Logger } from "@subledger/core";
import { MANUAL_ACTIVATION_INVOICE_ID } from "./schema.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS subscription_plans (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  amount INTEGER NOT NULL,
  currency TEXT NOT NULL DEFAULT 'INR',
  interval TEXT NOT NULL DEFAULT 'month',
  interval_count INTEGER NOT NULL DEFAULT 1,
  features JSONB NOT NULL DEFAULT '{}'::jsonb,
  app_id TEXT NOT NULL,
  plan_type TEXT NOT NULL DEFAULT 'domestic',
  payment_gateways JSONB NOT NULL DEFAULT '["razorpay"]'::jsonb,
  paypal_plan_id TEXT,
  razorpay_plan_id TEXT,
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  created_at TIMESTAMP NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS subscription_plans_app_idx ON subscription_plans (app_id);

CREATE TABLE IF NOT EXISTS user_subscriptions (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  plan_id TEXT NOT NULL REFERENCES subscription_plans (id),
  razorpay_subscription_id TEXT,
  paypal_subscription_id TEXT,
  status TEXT NOT NULL,
  current_period_start TIMESTAMP,
  current_period_end TIMESTAMP,
  app_id TEXT NOT NULL,
  metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
  created_at TIMESTAMP NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMP NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS user_subscriptions_user_app_status_idx ON user_subscriptions (user_id, app_id, status);
CREATE UNIQUE INDEX IF NOT EXISTS user_subscriptions_one_active_idx ON user_subscriptions (user_id, app_id) WHERE status = 'active';
CREATE INDEX IF NOT EXISTS user_subscriptions_razorpay_idx ON user_subscriptions (razorpay_subscription_id);
CREATE INDEX IF NOT EXISTS user_subscriptions_paypal_idx ON user_subscriptions (paypal_subscription_id);

CREATE TABLE IF NOT EXISTS subscription_invoices (
  id TEXT PRIMARY KEY,
  subscription_id TEXT NOT NULL REFERENCES user_subscriptions (id),
  user_id TEXT NOT NULL,
  razorpay_invoice_id TEXT,
  paypal_invoice_id TEXT,
  amount INTEGER NOT NULL,
  currency TEXT NOT NULL DEFAULT 'INR',
  status TEXT NOT NULL,
  payment_id TEXT,
  invoice_date TIMESTAMP NOT NULL DEFAULT NOW(),
  paid_at TIMESTAMP,
  app_id TEXT NOT NULL,
  created_at TIMESTAMP NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS subscription_invoices_subscription_idx ON subscription_invoices (subscription_id);
CREATE INDEX IF NOT EXISTS subscription_invoices_user_app_idx ON subscription_invoices (user_id, app_id);
CREATE UNIQUE INDEX IF NOT EXISTS subscription_invoices_razorpay_invoice_idx ON subscription_invoices (razorpay_invoice_id) WHERE razorpay_invoice_id <> '${MANUAL_ACTIVATION_INVOICE_ID}';

CREATE TABLE IF NOT EXISTS subscription_events_log (
  id TEXT PRIMARY KEY,
  event_type TEXT NOT NULL,
  razorpay_entity_id TEXT,
  paypal_entity_id TEXT,
  user_id TEXT,
  data JSONB NOT NULL DEFAULT '{}'::jsonb,
  processed BOOLEAN NOT NULL DEFAULT FALSE,
  error TEXT,
  created_at TIMESTAMP NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS subscription_events_log_event_type_idx ON subscription_events_log (event_type);
CREATE INDEX IF NOT EXISTS subscription_events_log_razorpay_entity_idx ON subscription_events_log (razorpay_entity_id);

CREATE TABLE IF NOT EXISTS resource_usage (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  subscription_id TEXT NOT NULL REFERENCES user_subscriptions (id),
  app_id TEXT NOT NULL,
  billing_period_start TIMESTAMP NOT NULL,
  billing_period_end TIMESTAMP NOT NULL,
  document_pages_count INTEGER NOT NULL DEFAULT 0,
  perplexity_requests_count INTEGER NOT NULL DEFAULT 0,
  created_at TIMESTAMP NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMP NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS resource_usage_subscription_period_idx ON resource_usage (subscription_id, billing_period_start);
CREATE INDEX IF NOT EXISTS resource_usage_user_app_idx ON resource_usage (user_id, app_id);
`;

/**
 * Anything that runs a raw statement, such as a Drizzle database
 */
export interface SqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
}

/**
 * The DDL split into single statements, tables before their indexes
 */
export function schemaStatements(): string[] {
  return SCHEMA_SQL.split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Create missing billing tables and indexes. Safe to run on every start.
 * The host application's `users` table is never created here.
 */
export async function ensureSchema(
  db: SqlExecutor,
  logger: Logger = createLogger({ name: "schema" })
): Promise<void> {
  const statements = schemaStatements();
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
  logger.info("Billing schema ensured", { statements: statements.length });
}
