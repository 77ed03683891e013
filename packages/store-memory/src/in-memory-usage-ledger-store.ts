import {
  matchesUsageQuery,
  type UsageLedgerStore,
  type UsageQuery,
  type UsageRecord,
  type UsageRecordPage,
} from '@tokengate/core';

function cloneRecord(record: UsageRecord): UsageRecord {
  return {
    ...record,
    timestamp: new Date(record.timestamp),
    cost: { ...record.cost },
    metadata: structuredClone(record.metadata),
  };
}

export class InMemoryUsageLedgerStore implements UsageLedgerStore {
  private readonly records: Array<UsageRecord> = [];
  private readonly ids = new Set<string>();

  async append(record: UsageRecord): Promise<void> {
    if (this.ids.has(record.id)) {
      return;
    }
    // Clone before claiming the id so a failed copy leaves nothing behind.
    const stored = cloneRecord(record);
    this.ids.add(record.id);
    this.records.push(stored);
  }

  async query(
    filter: UsageQuery,
    { offset, limit }: { offset: number; limit: number },
  ): Promise<UsageRecordPage> {
    // Stable sort keeps insertion order reversed for equal timestamps.
    const matching = this.records
      .filter((record) => matchesUsageQuery(record, filter))
      .reverse()
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());

    return {
      records: matching.slice(offset, offset + limit).map(cloneRecord),
      total: matching.length,
    };
  }

  size(): number {
    return this.records.length;
  }
}
