import {
  consumeFixedWindow,
  type ConsumeResult,
  type RateLimitConfig,
  type RateLimitKey,
  type RateLimitStore,
  type RateLimitWindow,
} from '@tokengate/core';
import { and, eq, lte } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';
import type Database from 'better-sqlite3';
import {
  openConnection,
  type SQLiteConnectionOptions,
} from './connection.js';
import {
  createRateLimitWindowsTable,
  rateLimitWindowsTable,
} from './schema.js';

export type SQLiteRateLimitStoreOptions = SQLiteConnectionOptions;

function windowOf(key: RateLimitKey) {
  return and(
    eq(rateLimitWindowsTable.principalId, key.principalId),
    eq(rateLimitWindowsTable.operationClass, key.operationClass),
  );
}

export class SQLiteRateLimitStore implements RateLimitStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  private readonly ownsConnection: boolean;

  constructor({ database }: SQLiteRateLimitStoreOptions = {}) {
    const connection = openConnection(database);
    this.sqlite = connection.sqlite;
    this.ownsConnection = connection.owned;
    this.db = drizzle(this.sqlite);
    createRateLimitWindowsTable(this.sqlite);
  }

  async consume(
    key: RateLimitKey,
    config: RateLimitConfig,
    now: number,
  ): Promise<ConsumeResult> {
    return this.db.transaction(
      (tx) => {
        const current = tx
          .select()
          .from(rateLimitWindowsTable)
          .where(windowOf(key))
          .get();
        const result = consumeFixedWindow(current, key, config, now);

        if (result.allowed) {
          const { windowStart, count } = result.window;
          tx.insert(rateLimitWindowsTable)
            .values({ ...key, windowStart, count })
            .onConflictDoUpdate({
              target: [
                rateLimitWindowsTable.principalId,
                rateLimitWindowsTable.operationClass,
              ],
              set: { windowStart, count },
            })
            .run();
        }
        return result;
      },
      { behavior: 'immediate' },
    );
  }

  async getWindow(key: RateLimitKey): Promise<RateLimitWindow | undefined> {
    return this.db
      .select()
      .from(rateLimitWindowsTable)
      .where(windowOf(key))
      .get();
  }

  async reset(key: RateLimitKey): Promise<void> {
    this.db.delete(rateLimitWindowsTable).where(windowOf(key)).run();
  }

  async cleanup(idleForMs: number, now: number): Promise<number> {
    const result = this.db
      .delete(rateLimitWindowsTable)
      .where(lte(rateLimitWindowsTable.windowStart, now - idleForMs))
      .run();
    return result.changes;
  }

  async close(): Promise<void> {
    if (this.ownsConnection) {
      this.sqlite.close();
    }
  }
}
