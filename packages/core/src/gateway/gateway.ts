import type { Logger } from 'pino';
import type { OperationClassConfig } from '../config/governance-config.js';
import {
  GatewayError,
  GatewayInternalError,
  LedgerUnavailableError,
  OperationFailedError,
  RateLimitedError,
  errorMessage,
} from '../errors/gateway-error.js';
import type { UsageLedger, UsageRecordInput } from '../ledger/usage-ledger.js';
import { parseUsageMetadata } from '../ledger/usage-metadata.js';
import type {
  RateLimitVerdict,
  RateLimiter,
} from '../rate-limit/rate-limiter.js';
import type { Principal } from '../types/principal.js';
import type { UsageRecord } from '../types/usage-record.js';
import { createLogger } from '../utils/logger.js';
import { withRetries, type RetryOptions } from '../utils/retry.js';
import {
  OperationError,
  type GatedOperation,
  type OperationUsage,
} from './operation.js';

export const DEFAULT_ABORT_GRACE_MS = 1000;

export type InvocationState =
  | 'pending'
  | 'rate_checked'
  | 'executed'
  | 'rejected'
  | 'recorded'
  | 'done';

export interface GatewayOptions {
  rateLimiter: RateLimiter;
  ledger: UsageLedger;
  /** Backoff for ledger writes of classes configured as `deferred`. */
  deferredRetry?: RetryOptions;
  /**
   * How long an aborted or timed-out operation may take to report its usage
   * before the failure is recorded without it.
   */
  abortGraceMs?: number;
  logger?: Logger;
}

export interface InvokeOptions {
  /** Caller cancellation. The ledger write still happens. */
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Copied onto the usage record. Must be plain JSON. */
  metadata?: Record<string, unknown>;
}

type Execution<O> =
  | { ok: true; output: O; usage?: OperationUsage }
  | { ok: false; error: OperationFailedError; usage?: OperationUsage };

/**
 * The single entry point for gated operations: rate check, execute, record.
 * Every call leaves exactly one usage record behind, whatever its outcome.
 */
export class Gateway {
  private readonly rateLimiter: RateLimiter;
  private readonly ledger: UsageLedger;
  private readonly deferredRetry: RetryOptions;
  private readonly abortGraceMs: number;
  private readonly logger: Logger;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor({
    rateLimiter,
    ledger,
    deferredRetry = {},
    abortGraceMs = DEFAULT_ABORT_GRACE_MS,
    logger,
  }: GatewayOptions) {
    this.rateLimiter = rateLimiter;
    this.ledger = ledger;
    this.deferredRetry = deferredRetry;
    this.abortGraceMs = abortGraceMs;
    this.logger = logger ?? createLogger('gateway');
  }

  async invoke<I, O>(
    principal: Principal,
    operationClass: string,
    operation: GatedOperation<I, O>,
    input: I,
    options: InvokeOptions = {},
  ): Promise<O> {
    const trace = this.logger.child({
      principalId: principal.id,
      operationClass,
    });
    trace.debug({ state: 'pending' satisfies InvocationState }, 'Invocation received');

    const config = this.rateLimiter.getClassConfig(operationClass);
    const requiredClasses = [
      operationClass,
      ...config.alsoRequires.filter((name) => name !== operationClass),
    ];
    // Bad metadata is rejected before any quota is spent.
    const baseRecord = {
      principalId: principal.id,
      operationClass,
      metadata: parseUsageMetadata(options.metadata),
    };

    const verdict = await this.checkQuota(principal.id, requiredClasses);
    trace.debug(
      { state: 'rate_checked' satisfies InvocationState, allowed: verdict.allowed },
      'Quota checked',
    );

    if (!verdict.allowed) {
      const { denial } = verdict;
      const rejection = new RateLimitedError(
        denial.operationClass,
        denial.retryAfterSeconds,
        denial.reason,
      );
      trace.debug({ state: 'rejected' satisfies InvocationState }, 'Invocation rejected');
      await this.writeRecord(
        config,
        {
          ...baseRecord,
          outcome: 'rate_limited',
          errorMessage: rejection.message,
        },
        trace,
        rejection,
      );
      throw rejection;
    }

    const execution = await this.execute(operationClass, operation, input, options);
    trace.debug(
      { state: 'executed' satisfies InvocationState, ok: execution.ok },
      'Operation finished',
    );

    await this.writeRecord(
      config,
      execution.ok
        ? { ...baseRecord, outcome: 'success', usage: execution.usage }
        : {
            ...baseRecord,
            outcome: 'failure',
            usage: execution.usage,
            errorMessage: execution.error.message,
          },
      trace,
      execution.ok ? undefined : execution.error,
    );

    trace.debug({ state: 'done' satisfies InvocationState }, 'Invocation complete');
    if (!execution.ok) {
      throw execution.error;
    }
    return execution.output;
  }

  /** Resolves once every deferred ledger write has settled. */
  async flush(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all([...this.pendingWrites]);
    }
  }

  private async checkQuota(
    principalId: string,
    operationClasses: ReadonlyArray<string>,
  ): Promise<RateLimitVerdict> {
    try {
      return await this.rateLimiter.checkAll(principalId, operationClasses);
    } catch (error: unknown) {
      if (error instanceof GatewayError) {
        throw error;
      }
      throw new GatewayInternalError('Rate limit check failed', {
        cause: error,
      });
    }
  }

  /**
   * Runs the operation against the caller's signal and the timeout. On an
   * abort the operation's signal fires and the invocation fails, but it
   * still waits up to `abortGraceMs` for the usage the operation reports.
   */
  private execute<I, O>(
    operationClass: string,
    operation: GatedOperation<I, O>,
    input: I,
    { signal, timeoutMs }: InvokeOptions,
  ): Promise<Execution<O>> {
    const graceMs = this.abortGraceMs;

    return new Promise<Execution<O>>((resolve) => {
      const controller = new AbortController();
      let settled = false;
      let interruption: OperationFailedError | undefined;
      let timer: ReturnType<typeof setTimeout> | undefined;
      let graceTimer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        interrupt(
          new OperationFailedError(operationClass, 'cancelled', {
            cause: signal?.reason,
          }),
          signal?.reason,
        );
      };

      function finish(execution: Execution<O>): void {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(graceTimer);
        signal?.removeEventListener('abort', onAbort);
        resolve(execution);
      }

      function interrupt(error: OperationFailedError, reason: unknown): void {
        if (settled || interruption !== undefined) return;
        interruption = error;
        clearTimeout(timer);
        controller.abort(reason);
        graceTimer = setTimeout(() => finish({ ok: false, error }), graceMs);
      }

      if (signal?.aborted) {
        finish({
          ok: false,
          error: new OperationFailedError(operationClass, 'cancelled', {
            cause: signal.reason,
          }),
        });
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          interrupt(
            new OperationFailedError(operationClass, 'timeout'),
            new Error('timed out'),
          );
        }, timeoutMs);
      }

      Promise.resolve()
        .then(() => operation.invoke(input, { signal: controller.signal }))
        .then(
          (result) =>
            finish(
              interruption === undefined
                ? { ok: true, output: result.output, usage: result.usage }
                : { ok: false, error: interruption, usage: result.usage },
            ),
          (error: unknown) =>
            finish({
              ok: false,
              error:
                interruption ??
                new OperationFailedError(operationClass, 'provider_error', {
                  cause: error,
                }),
              usage: error instanceof OperationError ? error.usage : undefined,
            }),
        );
    });
  }

  private async writeRecord(
    config: OperationClassConfig,
    input: UsageRecordInput,
    trace: Logger,
    outcomeError?: GatewayError,
  ): Promise<void> {
    const record = this.ledger.prepare(input);

    if (config.ledgerWrite === 'deferred') {
      this.deferAppend(record, trace);
      return;
    }

    try {
      await this.ledger.append(record);
    } catch (error: unknown) {
      throw new LedgerUnavailableError('Usage could not be recorded', {
        cause: error instanceof LedgerUnavailableError ? error.cause : error,
        outcomeError,
      });
    }
    trace.debug(
      { state: 'recorded' satisfies InvocationState, recordId: record.id },
      'Usage recorded',
    );
  }

  private deferAppend(record: UsageRecord, trace: Logger): void {
    const write = withRetries(() => this.ledger.append(record), this.deferredRetry)
      .then(() => {
        trace.debug(
          { state: 'recorded' satisfies InvocationState, recordId: record.id },
          'Usage recorded',
        );
      })
      .catch((error: unknown) => {
        trace.error(
          { err: error, recordId: record.id, outcome: record.outcome },
          `Deferred usage record dropped: ${errorMessage(error)}`,
        );
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }
}
