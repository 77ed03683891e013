import type { Logger } from 'pino';
import type { OperationClassConfig } from '../config/governance-config.js';
import {
  ConfigurationError,
  type RateLimitDenialReason,
} from '../errors/gateway-error.js';
import { isWindowLive } from '../stores/rate-limit-config.js';
import type { RateLimitStore } from '../stores/rate-limit-store.js';
import type {
  ConsumeResult,
  RateLimitKey,
  RateLimitStatus,
} from '../types/rate-limit.js';
import { createLogger } from '../utils/logger.js';

export const DEFAULT_UNAVAILABLE_RETRY_SECONDS = 30;

export interface RateLimitAllowed {
  allowed: true;
  operationClass: string;
  limit: number;
  remaining: number;
  resetTime: Date;
  /** Admitted by a fail-open policy while the store was unreachable. */
  degraded: boolean;
}

export interface RateLimitDenied {
  allowed: false;
  operationClass: string;
  limit: number;
  retryAfterSeconds: number;
  resetTime: Date;
  reason: RateLimitDenialReason;
}

export type RateLimitDecision = RateLimitAllowed | RateLimitDenied;

export type RateLimitVerdict =
  | { allowed: true; decisions: Array<RateLimitAllowed> }
  | {
      allowed: false;
      decisions: Array<RateLimitDecision>;
      denial: RateLimitDenied;
    };

export interface RateLimiterOptions {
  store: RateLimitStore;
  classes: Readonly<Record<string, OperationClassConfig>>;
  /** Retry hint sent with fail-closed denials. */
  unavailableRetryAfterSeconds?: number;
  logger?: Logger;
}

/**
 * Fixed-window quota per principal and operation class. Every check
 * consumes a slot atomically in the store, before the gated work starts.
 */
export class RateLimiter {
  private readonly store: RateLimitStore;
  private readonly classes: Readonly<Record<string, OperationClassConfig>>;
  private readonly unavailableRetryAfterSeconds: number;
  private readonly logger: Logger;

  constructor({
    store,
    classes,
    unavailableRetryAfterSeconds = DEFAULT_UNAVAILABLE_RETRY_SECONDS,
    logger,
  }: RateLimiterOptions) {
    this.store = store;
    this.classes = classes;
    this.unavailableRetryAfterSeconds = unavailableRetryAfterSeconds;
    this.logger = logger ?? createLogger('rate-limiter');
  }

  getClassConfig(operationClass: string): OperationClassConfig {
    const config = Object.hasOwn(this.classes, operationClass)
      ? this.classes[operationClass]
      : undefined;
    if (!config) {
      throw new ConfigurationError(
        `Unknown operation class "${operationClass}"`,
      );
    }
    return config;
  }

  async check(
    principalId: string,
    operationClass: string,
  ): Promise<RateLimitDecision> {
    const config = this.getClassConfig(operationClass);
    const key: RateLimitKey = { principalId, operationClass };
    const now = Date.now();

    let result: ConsumeResult;
    try {
      result = await this.store.consume(key, config, now);
    } catch (error: unknown) {
      this.logger.error(
        {
          err: error,
          principalId,
          operationClass,
          policy: config.onStoreError,
        },
        'Rate limit store unavailable',
      );
      return this.storeFailureDecision(operationClass, config, now);
    }

    const resetTime = new Date(result.window.windowStart + config.windowMs);

    if (result.allowed) {
      return {
        allowed: true,
        operationClass,
        limit: config.limit,
        remaining: Math.max(0, config.limit - result.window.count),
        resetTime,
        degraded: false,
      };
    }

    const retryAfterSeconds = Math.max(
      1,
      Math.ceil((resetTime.getTime() - now) / 1000),
    );
    this.logger.info(
      { principalId, operationClass, retryAfterSeconds },
      'Rate limit exceeded',
    );
    return {
      allowed: false,
      operationClass,
      limit: config.limit,
      retryAfterSeconds,
      resetTime,
      reason: 'limit_exceeded',
    };
  }

  /**
   * Checks each class in order and stops at the first denial. Slots taken
   * by classes checked before the denial stay consumed.
   */
  async checkAll(
    principalId: string,
    operationClasses: ReadonlyArray<string>,
  ): Promise<RateLimitVerdict> {
    for (const operationClass of operationClasses) {
      this.getClassConfig(operationClass);
    }

    const decisions: Array<RateLimitAllowed> = [];
    for (const operationClass of operationClasses) {
      const decision = await this.check(principalId, operationClass);
      if (!decision.allowed) {
        return {
          allowed: false,
          decisions: [...decisions, decision],
          denial: decision,
        };
      }
      decisions.push(decision);
    }
    return { allowed: true, decisions };
  }

  /** Current quota without consuming a slot. */
  async getStatus(
    principalId: string,
    operationClass: string,
  ): Promise<RateLimitStatus> {
    const config = this.getClassConfig(operationClass);
    const now = Date.now();
    const window = await this.store.getWindow({ principalId, operationClass });

    if (!window || !isWindowLive(window, config, now)) {
      return {
        limit: config.limit,
        remaining: config.limit,
        resetTime: new Date(now + config.windowMs),
      };
    }

    return {
      limit: config.limit,
      remaining: Math.max(0, config.limit - window.count),
      resetTime: new Date(window.windowStart + config.windowMs),
    };
  }

  async reset(principalId: string, operationClass: string): Promise<void> {
    this.getClassConfig(operationClass);
    await this.store.reset({ principalId, operationClass });
    this.logger.info(
      { principalId, operationClass },
      'Rate limit window reset',
    );
  }

  private storeFailureDecision(
    operationClass: string,
    config: OperationClassConfig,
    now: number,
  ): RateLimitDecision {
    if (config.onStoreError === 'allow') {
      return {
        allowed: true,
        operationClass,
        limit: config.limit,
        remaining: 0,
        resetTime: new Date(now + config.windowMs),
        degraded: true,
      };
    }

    return {
      allowed: false,
      operationClass,
      limit: config.limit,
      retryAfterSeconds: this.unavailableRetryAfterSeconds,
      resetTime: new Date(now + this.unavailableRetryAfterSeconds * 1000),
      reason: 'store_unavailable',
    };
  }
}
