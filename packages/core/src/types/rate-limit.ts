export interface RateLimitKey {
  principalId: string;
  operationClass: string;
}

/** Fixed-window counter for one principal and operation class. */
export interface RateLimitWindow extends RateLimitKey {
  /** Epoch milliseconds at which the current window opened. */
  windowStart: number;
  /** Slots consumed in the current window. */
  count: number;
}

export interface ConsumeResult {
  allowed: boolean;
  /** The window as it stands after this attempt. */
  window: RateLimitWindow;
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  resetTime: Date;
}

/** Map key for a window; unambiguous whatever characters the ids hold. */
export function rateLimitWindowKey(key: RateLimitKey): string {
  return JSON.stringify([key.principalId, key.operationClass]);
}
