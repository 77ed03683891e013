import type {
  ConsumeResult,
  RateLimitKey,
  RateLimitWindow,
} from '../types/rate-limit.js';

/** Ceiling and window length for one operation class. */
export interface RateLimitConfig {
  /** Number of operations allowed per window */
  limit: number;
  /** Duration of the window in milliseconds */
  windowMs: number;
}

export function isWindowLive(
  window: RateLimitWindow,
  config: RateLimitConfig,
  now: number,
): boolean {
  return now < window.windowStart + config.windowMs;
}

/**
 * Applies one fixed-window attempt to the current window state.
 *
 * Stores that can hold a lock or a transaction around the read and the write
 * call this and persist the returned window. The function itself is pure.
 */
export function consumeFixedWindow(
  current: RateLimitWindow | undefined,
  key: RateLimitKey,
  config: RateLimitConfig,
  now: number,
): ConsumeResult {
  const live =
    current !== undefined && isWindowLive(current, config, now)
      ? current
      : undefined;
  const base: RateLimitWindow = live
    ? { ...live }
    : {
        principalId: key.principalId,
        operationClass: key.operationClass,
        windowStart: now,
        count: 0,
      };

  if (base.count < config.limit) {
    return { allowed: true, window: { ...base, count: base.count + 1 } };
  }

  return { allowed: false, window: base };
}
