/**
 * @subledger/core - Console Transport
 *
 * Default log transport. Pretty, colored lines in development and
 * one JSON object per line everywhere else.
 */

import { isDevelopment } from "../env.js";
import { LogLevel, type LogEntry, type LogLevelName } from "../logger.js";
import type { BaseTransportOptions, LogTransport } from "./types.js";

/**
 * Console transport options
 */
export interface ConsoleTransportOptions extends BaseTransportOptions {
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean | undefined;
  /** Enable ANSI colors (default: stdout is a TTY) */
  colors?: boolean | undefined;
}

const LEVEL_COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m",
  DEBUG: "\x1b[36m",
  INFO: "\x1b[32m",
  WARN: "\x1b[33m",
  ERROR: "\x1b[31m",
  FATAL: "\x1b[35m",
  SILENT: "",
};

const RESET = "\x1b[0m";

/**
 * Console transport
 */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;
  private readonly minLevel: number;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.minLevel = options.minLevel ? LogLevel[options.minLevel] : 0;
  }

  log(entry: LogEntry): void {
    if (entry.levelValue < this.minLevel) return;

    if (this.pretty) {
      this.logPretty(entry);
    } else {
      this.logJson(entry);
    }
  }

  private logJson(entry: LogEntry): void {
    const { level, message, timestamp, context, error } = entry;

    const output: Record<string, unknown> = {
      level,
      time: timestamp,
      msg: message,
    };

    if (context) {
      Object.assign(output, context);
    }

    if (error) {
      output["err"] = error;
    }

    console.log(JSON.stringify(output));
  }

  private logPretty(entry: LogEntry): void {
    const { level, message, timestamp, context, error } = entry;

    const color = this.colors ? LEVEL_COLORS[level] : "";
    const reset = this.colors ? RESET : "";

    const timePart = timestamp.split("T")[1];
    const time = timePart ? timePart.slice(0, 8) : timestamp;

    let output = `${color}[${time}] ${level.padEnd(5)}${reset} ${message}`;

    if (context) {
      output += ` ${JSON.stringify(context)}`;
    }

    if (level === "ERROR" || level === "FATAL") {
      console.error(output);
      if (error?.stack) {
        console.error(error.stack);
      }
    } else if (level === "WARN") {
      console.warn(output);
    } else if (level === "DEBUG" || level === "TRACE") {
      console.debug(output);
    } else {
      console.log(output);
    }
  }
}
