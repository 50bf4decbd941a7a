/**
 * @module
 * Error classes shared by every Subledger package.
 *
 * @example
 * ```typescript
 * import { NotFoundError, ValidationError } from '@subledger/core';
 *
 * throw new NotFoundError('Plan', undefined, { planId });
 * throw new ValidationError('Invalid resource type', [
 *   { field: 'resource_type', message: 'must be document_pages or perplexity_requests' },
 * ]);
 * ```
 */

/**
 * Error codes used across the taxonomy
 */
export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  PROVIDER_ERROR: "PROVIDER_ERROR",
  PERSISTENCE_ERROR: "PERSISTENCE_ERROR",
  INVALID_SIGNATURE: "INVALID_SIGNATURE",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all Subledger errors.
 * Carries a machine-readable code, an HTTP status and optional details.
 */
export class SubledgerError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SubledgerError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/** Details about a single validation error */
export interface ValidationErrorDetail {
  /** Field path that failed validation */
  field: string;
  message: string;
}

/** Input failed validation (HTTP 400) */
export class ValidationError extends SubledgerError {
  constructor(
    message: string = "Validation failed",
    public readonly errors: ValidationErrorDetail[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, { ...details, errors });
    this.name = "ValidationError";
  }
}

// ============================================
// NOT FOUND ERRORS
// ============================================

/** Requested resource was not found (HTTP 404) */
export class NotFoundError extends SubledgerError {
  constructor(
    public readonly resource: string = "Resource",
    message?: string,
    details?: Record<string, unknown>
  ) {
    super(message ?? `${resource} not found`, ErrorCodes.NOT_FOUND, 404, {
      ...details,
      resource,
    });
    this.name = "NotFoundError";
  }
}

// ============================================
// PROVIDER ERRORS
// ============================================

/** A payment processor rejected or failed a request (HTTP 502) */
export class ProviderError extends SubledgerError {
  constructor(
    message: string,
    public readonly provider: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.PROVIDER_ERROR, 502, { ...details, provider }, options);
    this.name = "ProviderError";
  }
}

// ============================================
// PERSISTENCE ERRORS
// ============================================

/** Storage failed; the surrounding transaction has been rolled back (HTTP 500) */
export class PersistenceError extends SubledgerError {
  constructor(
    message: string = "Persistence failure",
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, ErrorCodes.PERSISTENCE_ERROR, 500, details, options);
    this.name = "PersistenceError";
  }
}

// ============================================
// SIGNATURE ERRORS
// ============================================

/** Webhook or payment signature did not verify (HTTP 400) */
export class SignatureError extends SubledgerError {
  constructor(message: string = "Invalid signature", details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_SIGNATURE, 400, details);
    this.name = "SignatureError";
  }
}

/**
 * Type guard for errors from this taxonomy
 */
export function isSubledgerError(error: unknown): error is SubledgerError {
  return error instanceof SubledgerError;
}
