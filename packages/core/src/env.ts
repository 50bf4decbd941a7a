/**
 * @subledger/core - Environment Variables
 * Typed access to process.env with defaults
 */

/**
 * Environment source used by the getters.
 * Tests swap this out with `setEnvSource` instead of mutating process.env.
 */
let envSource: Record<string, string | undefined> = process.env;

/**
 * Replace the environment source (tests, embedded hosts)
 */
export function setEnvSource(source: Record<string, string | undefined>): void {
  envSource = source;
}

/**
 * Restore process.env as the environment source
 */
export function resetEnvSource(): void {
  envSource = process.env;
}

/**
 * Get an environment variable value
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = envSource[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value;
}

/**
 * Get an environment variable, throwing if not found
 */
export function requireEnv(key: string): string {
  const value = getEnv(key);
  if (value === undefined) {
    throw new Error(`Required environment variable "${key}" is not set`);
  }
  return value;
}

/**
 * Get an environment variable as an integer
 */
export function getEnvNumber(key: string, defaultValue: number): number;
export function getEnvNumber(key: string, defaultValue?: number): number | undefined;
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get an environment variable as a boolean
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  return value === "true" || value === "1" || value === "yes";
}

/**
 * Get an environment variable as an array (comma-separated)
 */
export function getEnvArray(key: string, defaultValue: string[] = []): string[] {
  const value = getEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

/**
 * Get an environment variable parsed as JSON.
 * Unset returns undefined; a malformed value throws.
 */
export function getEnvJson(key: string): unknown {
  const value = getEnv(key);
  if (value === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch {
    throw new Error(`Environment variable "${key}" is not valid JSON`);
  }
}

/**
 * Environment mode
 */
export type EnvMode = "development" | "production" | "test";

/**
 * Get current environment mode
 */
export function getEnvMode(): EnvMode {
  const env = getEnv("NODE_ENV");
  if (env === "production") return "production";
  if (env === "test") return "test";
  return "development";
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  return getEnvMode() === "development";
}

/**
 * Check if running in production mode
 */
export function isProduction(): boolean {
  return getEnvMode() === "production";
}

/**
 * Check if running in test mode
 */
export function isTest(): boolean {
  return getEnvMode() === "test";
}
