/**
 * @subledger/billing - Billing Period Calculation
 * Fixed-day period arithmetic: a month is 30 days, a year is 365
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Days per interval unit
 */
export const INTERVAL_DAYS: Readonly<Record<string, number>> = {
  month: 30,
  year: 365,
};

/**
 * End of a billing period starting at `start`.
 * Unrecognized intervals fall back to a single 30-day month, ignoring `count`.
 *
 * @example
 * ```typescript
 * calculatePeriodEnd(new Date("2024-01-01T00:00:00Z"), "month", 1);
 * // 2024-01-31T00:00:00.000Z
 * ```
 */
export function calculatePeriodEnd(start: Date, interval: string, count: number = 1): Date {
  const days = Object.hasOwn(INTERVAL_DAYS, interval) ? INTERVAL_DAYS[interval] : undefined;
  const span = days === undefined ? 30 : days * count;
  return new Date(start.getTime() + span * DAY_MS);
}

/**
 * A [start, end) billing window
 */
export interface BillingPeriod {
  start: Date;
  end: Date;
}

/**
 * Period starting at `start` for a plan-like interval
 */
export function periodFrom(
  start: Date,
  plan: { interval: string; intervalCount: number } | null
): BillingPeriod {
  if (!plan) {
    return { start, end: calculatePeriodEnd(start, "month", 1) };
  }
  return { start, end: calculatePeriodEnd(start, plan.interval, plan.intervalCount) };
}

/**
 * Whether `at` falls inside [start, end)
 */
export function periodContains(period: BillingPeriod, at: Date): boolean {
  const t = at.getTime();
  return period.start.getTime() <= t && t < period.end.getTime();
}

/**
 * Parse a provider epoch-seconds value (integer or integer string).
 * Returns null when absent, fractional, or outside the Date range.
 */
export function parseEpochSeconds(value: unknown): Date | null {
  let seconds: number;
  if (typeof value === "number") {
    seconds = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    seconds = Number(value);
  } else {
    return null;
  }
  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    return null;
  }
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}
