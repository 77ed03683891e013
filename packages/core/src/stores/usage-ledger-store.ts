import type { UsageQuery, UsageRecord } from '../types/usage-record.js';

export interface UsageRecordPage {
  records: Array<UsageRecord>;
  total: number;
}

/** Append-only storage for usage records. */
export interface UsageLedgerStore {
  /**
   * Append a record. Appending an id that is already stored is a no-op, so a
   * retried write never produces a second row.
   */
  append(record: UsageRecord): Promise<void>;
  /** Matching records, newest first, plus the total match count. */
  query(
    filter: UsageQuery,
    page: { offset: number; limit: number },
  ): Promise<UsageRecordPage>;
}
