/**
 * @subledger/billing - Storage
 */

export * as schema from "./schema.js";
export { MANUAL_ACTIVATION_INVOICE_ID } from "./schema.js";
export {
  MemorySubscriptionStore,
  createMemorySubscriptionStore,
  type MemoryState,
} from "./memory-storage.js";
export {
  DrizzleSubscriptionStore,
  createDrizzleSubscriptionStore,
  type DrizzleDb,
  type DrizzleSubscriptionStoreConfig,
} from "./drizzle-storage.js";
export { DrizzleCustomerDirectory, MemoryCustomerDirectory } from "./customers.js";
export { ensureSchema, schemaStatements, type SqlExecutor } from "./migrate.js";
export { DEFAULT_PLANS_FILE, loadPlanDefinitions, toNewPlan, seedPlans } from "./seed.js";
