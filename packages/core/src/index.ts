/**
 * @module
 * Core utilities for Subledger: environment access, structured logging,
 * the shared error taxonomy and a few small helpers.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnv, NotFoundError } from '@subledger/core';
 *
 * const log = createLogger({ name: 'billing' });
 * log.info('Service started', { port: getEnv('PORT', '3000') });
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export {
  getEnv,
  requireEnv,
  getEnvNumber,
  getEnvBoolean,
  getEnvArray,
  getEnvJson,
  setEnvSource,
  resetEnvSource,
  getEnvMode,
  isDevelopment,
  isProduction,
  isTest,
  type EnvMode,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  LogLevel,
  createLogger,
  createNullLogger,
  logger,
  measureTime,
  isLogLevelName,
  ConsoleTransport,
  type ConsoleTransportOptions,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type ErrorInfo,
  type LoggerConfig,
  type LogTransport,
} from "./logger.js";

export type { BaseTransportOptions } from "./transports/index.js";

// ============================================
// ERRORS
// ============================================

export * from "./errors.js";

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Generate a prefixed identifier: the prefix followed by 32 lowercase hex characters.
 *
 * @example
 * ```typescript
 * generatePrefixedId('sub_'); // "sub_3f2b8c1e9d4a4b7f8e6c5d4a3b2c1e0f"
 * ```
 */
export function generatePrefixedId(prefix: string): string {
  return `${prefix}${crypto.randomUUID().replace(/-/g, "")}`;
}

/**
 * Constant-time string comparison.
 * Use this when comparing signatures or other secrets.
 */
export function constantTimeEquals(a: string, b: string): boolean {
  const aBytes = new TextEncoder().encode(a);
  const bBytes = new TextEncoder().encode(b);

  if (aBytes.length !== bBytes.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < aBytes.length; i++) {
    result |= (aBytes[i] ?? 0) ^ (bBytes[i] ?? 0);
  }

  return result === 0;
}

/**
 * Check if value is a plain object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
