/**
 * @subledger/server - Utils Exports
 */

export {
  serializePlan,
  serializeSubscription,
  serializeSubscriptionWithPlan,
  serializeCreatedSubscription,
  serializeInvoice,
} from "./response.js";
