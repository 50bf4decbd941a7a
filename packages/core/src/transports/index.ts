/**
 * @subledger/core - Transports
 */

export type { LogTransport, BaseTransportOptions } from "./types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";
