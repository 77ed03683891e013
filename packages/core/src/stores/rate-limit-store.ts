import type {
  ConsumeResult,
  RateLimitKey,
  RateLimitWindow,
} from '../types/rate-limit.js';
import type { RateLimitConfig } from './rate-limit-config.js';

export interface RateLimitStore {
  /**
   * Check and increment the window for `key` as one atomic step. Two
   * concurrent calls must never both observe `count < limit` for the last
   * free slot.
   */
  consume(
    key: RateLimitKey,
    config: RateLimitConfig,
    now: number,
  ): Promise<ConsumeResult>;
  getWindow(key: RateLimitKey): Promise<RateLimitWindow | undefined>;
  reset(key: RateLimitKey): Promise<void>;
  /**
   * Drop windows that opened more than `idleForMs` before `now`.
   * @returns the number of windows removed
   */
  cleanup(idleForMs: number, now: number): Promise<number>;
}
