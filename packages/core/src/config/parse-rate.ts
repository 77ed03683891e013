import { ConfigurationError } from '../errors/gateway-error.js';
import type { RateLimitConfig } from '../stores/rate-limit-config.js';

const PERIOD_MS: Record<string, number> = {
  s: 1000,
  sec: 1000,
  second: 1000,
  m: 60_000,
  min: 60_000,
  minute: 60_000,
  h: 3_600_000,
  hour: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
};

const RATE_REGEX = /^\s*(\d+)\s*\/\s*([a-z]+)\s*$/i;

/**
 * Parses a rate such as `10/hour` or `5/m` into a limit and window length.
 */
export function parseRate(rate: string): RateLimitConfig {
  const match = RATE_REGEX.exec(rate);
  const count = match?.[1];
  const period = match?.[2]?.toLowerCase();
  const windowMs =
    period !== undefined && Object.hasOwn(PERIOD_MS, period)
      ? PERIOD_MS[period]
      : undefined;

  if (count === undefined || windowMs === undefined) {
    throw new ConfigurationError(
      `Invalid rate "${rate}"; expected "<count>/<second|minute|hour|day>"`,
    );
  }

  return { limit: Number.parseInt(count, 10), windowMs };
}
