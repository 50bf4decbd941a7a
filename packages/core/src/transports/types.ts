/**
 * @subledger/core - Transport Types
 */

import type { LogEntry, LogLevelName } from "../logger.js";

/**
 * Log transport interface
 * Implement this to create custom log destinations
 */
export interface LogTransport {
  /** Transport name for identification */
  readonly name: string;

  /**
   * Log an entry.
   * Async transports handle their own buffering; rejections are reported by the logger.
   */
  log(entry: LogEntry): void | Promise<void>;

  /**
   * Flush any buffered logs on graceful shutdown
   */
  flush?(): Promise<void>;
}

/**
 * Options common to all transports
 */
export interface BaseTransportOptions {
  /** Minimum log level to transport */
  minLevel?: Exclude<LogLevelName, "SILENT"> | undefined;
}
