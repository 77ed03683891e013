import type {
  UsageLedgerStore,
  UsageQuery,
  UsageRecord,
  UsageRecordPage,
} from '@tokengate/core';
import { and, count, desc, eq, gte, lte, sql } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';
import type Database from 'better-sqlite3';
import {
  openConnection,
  type SQLiteConnectionOptions,
} from './connection.js';
import { createUsageRecordsTable, usageRecordsTable } from './schema.js';

export type SQLiteUsageLedgerStoreOptions = SQLiteConnectionOptions;

type UsageRecordRow = typeof usageRecordsTable.$inferSelect;

function toUsageRecord(row: UsageRecordRow): UsageRecord {
  const record: UsageRecord = {
    id: row.id,
    principalId: row.principalId,
    operationClass: row.operationClass,
    timestamp: new Date(row.timestamp),
    outcome: row.outcome,
    cost: {
      tokensIn: row.tokensIn,
      tokensOut: row.tokensOut,
      estimatedCost: row.estimatedCost,
    },
    metadata: row.metadata,
  };
  if (row.model !== null) record.model = row.model;
  if (row.errorMessage !== null) record.errorMessage = row.errorMessage;
  return record;
}

function matching(filter: UsageQuery) {
  return and(
    filter.principalId !== undefined
      ? eq(usageRecordsTable.principalId, filter.principalId)
      : undefined,
    filter.operationClass !== undefined
      ? eq(usageRecordsTable.operationClass, filter.operationClass)
      : undefined,
    filter.outcome !== undefined
      ? eq(usageRecordsTable.outcome, filter.outcome)
      : undefined,
    filter.from !== undefined
      ? gte(usageRecordsTable.timestamp, filter.from.getTime())
      : undefined,
    filter.to !== undefined
      ? lte(usageRecordsTable.timestamp, filter.to.getTime())
      : undefined,
  );
}

/**
 * Usage records in SQLite. Triggers on the table reject every UPDATE and
 * DELETE, including ones issued outside this class.
 */
export class SQLiteUsageLedgerStore implements UsageLedgerStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  private readonly ownsConnection: boolean;

  constructor({ database }: SQLiteUsageLedgerStoreOptions = {}) {
    const connection = openConnection(database);
    this.sqlite = connection.sqlite;
    this.ownsConnection = connection.owned;
    this.db = drizzle(this.sqlite);
    createUsageRecordsTable(this.sqlite);
  }

  async append(record: UsageRecord): Promise<void> {
    this.db
      .insert(usageRecordsTable)
      .values({
        id: record.id,
        principalId: record.principalId,
        operationClass: record.operationClass,
        timestamp: record.timestamp.getTime(),
        outcome: record.outcome,
        tokensIn: record.cost.tokensIn,
        tokensOut: record.cost.tokensOut,
        estimatedCost: record.cost.estimatedCost,
        model: record.model ?? null,
        errorMessage: record.errorMessage ?? null,
        metadata: record.metadata,
      })
      .onConflictDoNothing({ target: usageRecordsTable.id })
      .run();
  }

  async query(
    filter: UsageQuery,
    { offset, limit }: { offset: number; limit: number },
  ): Promise<UsageRecordPage> {
    const where = matching(filter);
    const rows = this.db
      .select()
      .from(usageRecordsTable)
      .where(where)
      .orderBy(desc(usageRecordsTable.timestamp), desc(sql`rowid`))
      .limit(limit)
      .offset(offset)
      .all();
    const totals = this.db
      .select({ total: count() })
      .from(usageRecordsTable)
      .where(where)
      .get();

    return { records: rows.map(toUsageRecord), total: totals?.total ?? 0 };
  }

  async close(): Promise<void> {
    if (this.ownsConnection) {
      this.sqlite.close();
    }
  }
}
