import {
  consumeFixedWindow,
  rateLimitWindowKey,
  type ConsumeResult,
  type RateLimitConfig,
  type RateLimitKey,
  type RateLimitStore,
  type RateLimitWindow,
} from '@tokengate/core';

export interface InMemoryRateLimitStoreOptions {
  /** Run `cleanup` on this interval. Off when omitted. */
  cleanupIntervalMs?: number;
  /** Windows idle for longer than this are removed by the interval. */
  idleForMs?: number;
}

const DEFAULT_IDLE_FOR_MS = 24 * 60 * 60 * 1000;

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>();
  private cleanupTimer?: NodeJS.Timeout;

  constructor({
    cleanupIntervalMs,
    idleForMs = DEFAULT_IDLE_FOR_MS,
  }: InMemoryRateLimitStoreOptions = {}) {
    if (cleanupIntervalMs !== undefined && cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(() => {
        this.removeIdle(idleForMs, Date.now());
      }, cleanupIntervalMs);
      this.cleanupTimer.unref();
    }
  }

  async consume(
    key: RateLimitKey,
    config: RateLimitConfig,
    now: number,
  ): Promise<ConsumeResult> {
    const id = rateLimitWindowKey(key);
    const result = consumeFixedWindow(this.windows.get(id), key, config, now);
    if (result.allowed) {
      this.windows.set(id, result.window);
    }
    return { allowed: result.allowed, window: { ...result.window } };
  }

  async getWindow(key: RateLimitKey): Promise<RateLimitWindow | undefined> {
    const window = this.windows.get(rateLimitWindowKey(key));
    return window && { ...window };
  }

  async reset(key: RateLimitKey): Promise<void> {
    this.windows.delete(rateLimitWindowKey(key));
  }

  async cleanup(idleForMs: number, now: number): Promise<number> {
    return this.removeIdle(idleForMs, now);
  }

  size(): number {
    return this.windows.size;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.windows.clear();
  }

  private removeIdle(idleForMs: number, now: number): number {
    let removed = 0;
    for (const [id, window] of this.windows) {
      if (window.windowStart + idleForMs <= now) {
        this.windows.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
