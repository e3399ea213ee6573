import type { LimitPolicy } from "./limit-policy.js";

export const RATE_UNITS_MS = {
  millisecond: 1,
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
} as const;
export type RateUnit = keyof typeof RATE_UNITS_MS;

// "10 per minute", "200/day", "2 per 30 seconds", "1 per 1500ms"
const RATE_PATTERN = /^\s*(\d+)\s*(?:per|\/)\s*(?:(\d+)\s*)?(millisecond|ms|second|minute|hour|day)s?\s*$/i;

function isRateUnit(value: string): value is RateUnit {
  return value in RATE_UNITS_MS;
}

/**
 * Parse a rate string such as `"10 per minute"` into a LimitPolicy.
 * Returns null when the string is not a rate or describes a zero limit.
 */
export function parseRate(rate: string): LimitPolicy | null {
  const match = RATE_PATTERN.exec(rate);
  if (!match?.[1] || !match[3]) return null;

  const word = match[3].toLowerCase();
  const unit = word === "ms" ? "millisecond" : word;
  if (!isRateUnit(unit)) return null;

  const maxRequests = parseInt(match[1], 10);
  const multiplier = match[2] ? parseInt(match[2], 10) : 1;
  if (maxRequests <= 0 || multiplier <= 0) return null;

  return { maxRequests, windowMs: multiplier * RATE_UNITS_MS[unit] };
}

/**
 * Render a policy in rate-string notation, using the largest unit that
 * divides the window evenly. Sub-second windows fall back to milliseconds.
 * The result always parses back to the same policy.
 */
export function formatRate(policy: LimitPolicy): string {
  const units: RateUnit[] = ["day", "hour", "minute", "second"];
  for (const unit of units) {
    const size = RATE_UNITS_MS[unit];
    if (policy.windowMs % size !== 0) continue;
    const count = policy.windowMs / size;
    return count === 1
      ? `${policy.maxRequests} per ${unit}`
      : `${policy.maxRequests} per ${count} ${unit}s`;
  }
  return `${policy.maxRequests} per ${policy.windowMs}ms`;
}
