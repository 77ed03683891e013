import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { LedgerUnavailableError } from '../errors/gateway-error.js';
import type { OperationUsage } from '../gateway/operation.js';
import type {
  UsageLedgerStore,
  UsageRecordPage,
} from '../stores/usage-ledger-store.js';
import {
  ZERO_COST,
  type UsageOutcome,
  type UsageQuery,
  type UsageRecord,
  type UsageSummary,
} from '../types/usage-record.js';
import { createLogger } from '../utils/logger.js';
import {
  DEFAULT_PRICE_TABLE,
  normalizeUsage,
  type ModelPrice,
} from './cost-estimator.js';
import { parseUsageMetadata } from './usage-metadata.js';

export const DEFAULT_MAX_ERROR_MESSAGE_LENGTH = 1000;
export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;

export interface UsageLedgerOptions {
  store: UsageLedgerStore;
  pricing?: ReadonlyArray<ModelPrice>;
  maxErrorMessageLength?: number;
  logger?: Logger;
}

export interface UsageRecordInput {
  principalId: string;
  operationClass: string;
  outcome: UsageOutcome;
  usage?: OperationUsage;
  errorMessage?: string;
  metadata?: Record<string, unknown>;
}

export interface UsageListQuery extends UsageQuery {
  /** Zero-based page index. */
  page?: number;
  limit?: number;
}

export interface UsageListResult extends UsageRecordPage {
  page: number;
  limit: number;
}

export class UsageLedger {
  private readonly store: UsageLedgerStore;
  private readonly pricing: ReadonlyArray<ModelPrice>;
  private readonly maxErrorMessageLength: number;
  private readonly logger: Logger;

  constructor({
    store,
    pricing = DEFAULT_PRICE_TABLE,
    maxErrorMessageLength = DEFAULT_MAX_ERROR_MESSAGE_LENGTH,
    logger,
  }: UsageLedgerOptions) {
    this.store = store;
    this.pricing = pricing;
    this.maxErrorMessageLength = maxErrorMessageLength;
    this.logger = logger ?? createLogger('usage-ledger');
  }

  /**
   * Builds the immutable record for `input` without writing it. Throws
   * `InvalidInputError` for metadata that is not plain JSON.
   */
  prepare(input: UsageRecordInput): UsageRecord {
    const record: UsageRecord = {
      id: randomUUID(),
      principalId: input.principalId,
      operationClass: input.operationClass,
      timestamp: new Date(),
      outcome: input.outcome,
      cost:
        input.outcome === 'rate_limited'
          ? { ...ZERO_COST }
          : normalizeUsage(input.usage, this.pricing),
      metadata: parseUsageMetadata(input.metadata),
    };

    if (input.usage?.model) {
      record.model = input.usage.model;
    }
    if (input.errorMessage) {
      record.errorMessage = input.errorMessage.slice(
        0,
        this.maxErrorMessageLength,
      );
    }
    return record;
  }

  /**
   * Writes a prepared record. Safe to retry with the same record: stores
   * ignore an id they already hold.
   */
  async append(record: UsageRecord): Promise<void> {
    try {
      await this.store.append(record);
    } catch (error: unknown) {
      this.logger.error(
        {
          err: error,
          recordId: record.id,
          principalId: record.principalId,
          operationClass: record.operationClass,
          outcome: record.outcome,
        },
        'Failed to append usage record',
      );
      throw new LedgerUnavailableError('Usage ledger write failed', {
        cause: error,
      });
    }
  }

  async record(input: UsageRecordInput): Promise<UsageRecord> {
    const record = this.prepare(input);
    await this.append(record);
    return record;
  }

  async list(query: UsageListQuery = {}): Promise<UsageListResult> {
    const { page = 0, limit = DEFAULT_PAGE_SIZE, ...filter } = query;
    const pageSize = Math.min(Math.max(1, limit), MAX_PAGE_SIZE);
    const pageIndex = Math.max(0, page);

    const result = await this.store.query(filter, {
      offset: pageIndex * pageSize,
      limit: pageSize,
    });
    return { ...result, page: pageIndex, limit: pageSize };
  }

  async summarize(filter: UsageQuery = {}): Promise<UsageSummary> {
    const summary: UsageSummary = {
      total: 0,
      byOutcome: { success: 0, failure: 0, rate_limited: 0 },
      tokensIn: 0,
      tokensOut: 0,
      estimatedCost: 0,
    };

    for (let offset = 0; ; offset += MAX_PAGE_SIZE) {
      const { records } = await this.store.query(filter, {
        offset,
        limit: MAX_PAGE_SIZE,
      });
      for (const record of records) {
        summary.total += 1;
        summary.byOutcome[record.outcome] += 1;
        summary.tokensIn += record.cost.tokensIn;
        summary.tokensOut += record.cost.tokensOut;
        summary.estimatedCost += record.cost.estimatedCost;
      }
      if (records.length < MAX_PAGE_SIZE) {
        return summary;
      }
    }
  }
}
