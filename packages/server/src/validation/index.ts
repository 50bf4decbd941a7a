/**
 * @subledger/server - ArkType Validation
 * Request validation with ArkType schemas from @subledger/types
 */

import { createMiddleware } from "hono/factory";
import { ValidationError } from "@subledger/core";
import { safeValidate, type SchemaIssue, type Type } from "@subledger/types";
import type { ServerContextVariables } from "../context.js";

/**
 * Infer type from ArkType schema
 */
export type Infer<T extends Type> = T["infer"];

/**
 * Validation options
 */
export interface ValidateOptions {
  /** Error message returned to the client */
  message?: string;
}

function toFieldErrors(issues: SchemaIssue[]) {
  return issues.map((issue) => ({ field: issue.path, message: issue.message }));
}

/**
 * Validate data against a schema, throwing a 400 `ValidationError` on failure
 */
export function parseWith<T extends Type>(schema: T, data: unknown, message: string): T["infer"] {
  const result = safeValidate(schema, data);
  if (!result.success) {
    throw new ValidationError(message, toFieldErrors(result.errors));
  }
  return result.data;
}

/**
 * Validate the JSON request body
 *
 * A missing or malformed body is validated as `{}`, so required fields
 * report the configured message.
 *
 * @example
 * ```typescript
 * router.post('/create', validateBody(createSubscriptionBody), async (c) => {
 *   const { user_id, plan_id } = c.get('validatedBody');
 * });
 * ```
 */
export function validateBody<T extends Type>(schema: T, options: ValidateOptions = {}) {
  const message = options.message ?? "Validation failed";

  return createMiddleware<{
    Variables: ServerContextVariables & { validatedBody: T["infer"] };
  }>(async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      body = {};
    }

    c.set("validatedBody", parseWith(schema, body ?? {}, message));
    await next();
  });
}

/**
 * Validate query parameters
 *
 * @example
 * ```typescript
 * router.get('/usage-stats', validateQuery(userAppQuery), async (c) => {
 *   const { user_id, app_id } = c.get('validatedQuery');
 * });
 * ```
 */
export function validateQuery<T extends Type>(schema: T, options: ValidateOptions = {}) {
  const message = options.message ?? "Invalid query parameters";

  return createMiddleware<{
    Variables: ServerContextVariables & { validatedQuery: T["infer"] };
  }>(async (c, next) => {
    c.set("validatedQuery", parseWith(schema, c.req.query(), message));
    await next();
  });
}
