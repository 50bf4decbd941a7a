/**
 * @module
 * Structured, leveled logging with pluggable transports and redaction.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@subledger/core';
 *
 * const log = createLogger({ name: 'subscription-engine', level: 'DEBUG' });
 *
 * log.info('Subscription activated', { subscriptionId: 'sub_123' });
 * log.error('Provider call failed', error, { gateway: 'razorpay' });
 *
 * const webhookLog = log.child({ eventType: 'subscription.charged' });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name string literal type */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value type */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Narrow an arbitrary string (e.g. LOG_LEVEL) to a level name
 */
export function isLogLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LogLevel, value);
}

/**
 * Structured error information included in log entries.
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
  /** Machine-readable code for errors that carry one */
  code?: string | undefined;
}

/**
 * Structured log entry passed to transports.
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerConfig {
  /** Minimum log level (defaults to LOG_LEVEL, then INFO) */
  level?: LogLevelName | undefined;
  /** Logger name, emitted as `module` */
  name?: string | undefined;
  /** Base context added to all logs */
  context?: Record<string, unknown> | undefined;
  /** Custom transports */
  transports?: LogTransport[] | undefined;
  /** Pretty print (defaults to true in development) */
  pretty?: boolean | undefined;
  /** Extra field names to redact */
  redact?: string[] | undefined;
  /** Timestamp format */
  timestamp?: boolean | (() => string) | undefined;
}

const REDACTED = "[REDACTED]";

/**
 * Default redact fields. Matching is case-insensitive on the key name.
 */
const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "authorization",
  "keySecret",
  "webhookSecret",
  "clientSecret",
  "cookie",
  "cardNumber",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive fields from context, descending into nested objects
 */
function redactFields(
  obj: Record<string, unknown>,
  fields: ReadonlySet<string>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (fields.has(key.toLowerCase())) {
      result[key] = REDACTED;
    } else if (isRecord(value) && depth < 5) {
      result[key] = redactFields(value, fields, depth + 1);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function toErrorInfo(error: Error): ErrorInfo {
  const info: ErrorInfo = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if ("code" in error && typeof error.code === "string") {
    info.code = error.code;
  }
  return info;
}

/**
 * Structured logger with support for multiple transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'api', level: 'DEBUG' });
 * logger.info('Request received', { path: '/plans' });
 * ```
 */
export class Logger {
  private readonly levelName: LogLevelName;
  private readonly level: LogLevelValue;
  private readonly name: string | undefined;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];
  private readonly redactSet: ReadonlySet<string>;
  private readonly redactList: string[];
  private readonly timestampFn: () => string;

  constructor(config: LoggerConfig = {}) {
    const envLevel = getEnv("LOG_LEVEL")?.toUpperCase();
    this.levelName = config.level ?? (isLogLevelName(envLevel) ? envLevel : "INFO");
    this.level = LogLevel[this.levelName];
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty !== undefined ? { pretty: config.pretty } : {}),
    ];
    this.redactList = [...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])];
    this.redactSet = new Set(this.redactList.map((f) => f.toLowerCase()));

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactList,
      timestamp: this.timestampFn,
    });
  }

  /**
   * Whether a level would currently be emitted
   */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level;
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const levelValue = LogLevel[level];
    if (levelValue < this.level) return;

    let finalContext: Record<string, unknown> = { ...this.context };
    if (this.name) {
      finalContext["module"] = this.name;
    }
    if (context) {
      finalContext = { ...finalContext, ...context };
    }

    finalContext = redactFields(finalContext, this.redactSet);

    const entry: LogEntry = {
      level,
      levelValue,
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error ? toErrorInfo(error) : undefined,
    };

    for (const transport of this.transports) {
      const written = transport.log(entry);
      if (written instanceof Promise) {
        written.catch((transportError: unknown) => {
          console.error(`[logger] transport "${transport.name}" failed`, transportError);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error message with an optional Error object.
   * When the second argument is not an Error it is treated as context.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else if (isRecord(error)) {
      this.log("ERROR", message, { ...error, ...context });
    } else if (error !== undefined) {
      this.log("ERROR", message, { error: String(error), ...context });
    } else {
      this.log("ERROR", message, context);
    }
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else if (isRecord(error)) {
      this.log("FATAL", message, { ...error, ...context });
    } else {
      this.log("FATAL", message, context);
    }
  }
}

/**
 * Create a new Logger instance with the specified configuration.
 */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Default logger instance. Level follows LOG_LEVEL.
 */
export const logger = createLogger({ name: "subledger" });

/**
 * Logger that drops everything; handy as a default in tests
 */
export function createNullLogger(): Logger {
  return new Logger({ level: "SILENT", transports: [] });
}

/**
 * Measure and log the execution time of an async operation.
 * Logs completion at DEBUG on success and the error on failure, then rethrows.
 */
export async function measureTime<T>(
  log: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.debug(`${operation} completed`, { operation, durationMs: Date.now() - start });
    return result;
  } catch (error) {
    log.error(`${operation} failed`, error, { operation, durationMs: Date.now() - start });
    throw error;
  }
}
