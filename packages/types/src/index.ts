/**
 * @module
 * Validation schemas for Subledger.
 * Uses ArkType for runtime validation with automatic TypeScript type inference.
 *
 * @example
 * ```typescript
 * import { createSubscriptionBody, safeValidate } from '@subledger/types';
 *
 * const result = safeValidate(createSubscriptionBody, input);
 * if (result.success) {
 *   console.log(result.data.plan_id);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */

import { type, type Type } from "arktype";

// Re-export ArkType for convenience
export { type } from "arktype";
export type { Type } from "arktype";

// ============================================================================
// Common Schemas & Types
// ============================================================================
export * from "./common.js";

// ============================================================================
// Billing Schemas & Types
// ============================================================================
export * from "./billing.js";

// ============================================================================
// Webhook Schemas & Types
// ============================================================================
export * from "./webhooks.js";

// ============================================================================
// Request Schemas & Types
// ============================================================================
export * from "./requests.js";

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * A single failed constraint, keyed by its path
 */
export interface SchemaIssue {
  path: string;
  message: string;
}

function toIssues(errors: type.errors): SchemaIssue[] {
  return errors.map((e) => ({
    path: String(e.path) || "root",
    message: e.message,
  }));
}

/**
 * Validate data against an ArkType schema, throwing on failure.
 *
 * @example
 * ```typescript
 * const plan = validateWithSchema(planDefinition, input);
 * ```
 */
export function validateWithSchema<T extends Type>(schema: T, data: unknown): T["infer"] {
  const result = schema(data);

  if (result instanceof type.errors) {
    const errors = toIssues(result)
      .map((e) => `${e.path}: ${e.message}`)
      .join("\n");
    throw new Error(`Validation failed:\n${errors}`);
  }

  return result;
}

/**
 * Safely validate data against an ArkType schema.
 * Returns a result object instead of throwing.
 */
export function safeValidate<T extends Type>(
  schema: T,
  data: unknown
): { success: true; data: T["infer"] } | { success: false; errors: SchemaIssue[] } {
  const result = schema(data);

  if (result instanceof type.errors) {
    return {
      success: false,
      errors: toIssues(result),
    };
  }

  return {
    success: true,
    data: result,
  };
}

/**
 * Check if data matches an ArkType schema (type guard).
 */
export function isValid<T extends Type>(schema: T, data: unknown): data is T["infer"] {
  return !(schema(data) instanceof type.errors);
}
