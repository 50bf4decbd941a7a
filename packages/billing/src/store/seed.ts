/**
 * @subledger/billing - Plan Seeding
 */

import { readFileSync } from "node:fs";
import { createLogger, type Logger } from "@subledger/core";
import { planDefinition, validateWithSchema, type PlanDefinition } from "@subledger/types";
import type { NewPlan, SubscriptionStore } from "../types.js";

/**
 * Free plans shipped with the service
 */
export const DEFAULT_PLANS_FILE = new URL("./free-plans.json", import.meta.url);

const planDefinitions = planDefinition.array();

/**
 * Read and validate plan definitions from a JSON file
 */
export function loadPlanDefinitions(file: string | URL = DEFAULT_PLANS_FILE): PlanDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return validateWithSchema(planDefinitions, raw);
}

/**
 * Convert a snake_case definition into a plan row
 */
export function toNewPlan(definition: PlanDefinition): NewPlan {
  return {
    id: definition.id,
    name: definition.name,
    description: definition.description ?? null,
    amount: definition.amount,
    currency: definition.currency ?? "INR",
    interval: definition.interval,
    intervalCount: definition.interval_count ?? 1,
    features: definition.features,
    appId: definition.app_id,
    paymentGateways: definition.payment_gateways ?? ["razorpay"],
    razorpayPlanId: definition.razorpay_plan_id ?? null,
    paypalPlanId: definition.paypal_plan_id ?? null,
    planType: definition.plan_type ?? "domestic",
    isActive: definition.is_active ?? true,
  };
}

/**
 * Insert plans that do not exist yet. Returns how many were inserted.
 *
 * @example
 * ```typescript
 * await seedPlans(store, loadPlanDefinitions());
 * ```
 */
export async function seedPlans(
  store: SubscriptionStore,
  definitions: PlanDefinition[],
  logger: Logger = createLogger({ name: "seed" })
): Promise<number> {
  let inserted = 0;
  for (const definition of definitions) {
    if (await store.insertPlanIfAbsent(toNewPlan(definition))) {
      inserted++;
    }
  }
  logger.info("Plans seeded", { inserted, total: definitions.length });
  return inserted;
}
