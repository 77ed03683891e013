import Database from 'better-sqlite3';
import { SQLiteRateLimitStore } from './sqlite-rate-limit-store.js';
import { SQLiteShareLinkStore } from './sqlite-share-link-store.js';
import { SQLiteUsageLedgerStore } from './sqlite-usage-ledger-store.js';

export interface CreateSQLiteStoresOptions {
  /** File path for the shared database. Defaults to `':memory:'`. */
  database?: string;
}

export interface SQLiteStores {
  shareLinks: SQLiteShareLinkStore;
  rateLimit: SQLiteRateLimitStore;
  ledger: SQLiteUsageLedgerStore;
  /** Close all stores and the shared database connection. */
  close(): Promise<void>;
}

/**
 * Creates all SQLite-backed stores sharing a single database connection.
 *
 * The factory owns the `better-sqlite3` connection and will close it when
 * `close()` is called. Individual stores receive the shared instance so
 * they will **not** close the underlying connection themselves.
 */
export function createSQLiteStores(
  options: CreateSQLiteStoresOptions = {},
): SQLiteStores {
  const database = options.database ?? ':memory:';
  const db = new Database(database);
  if (database !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  const shareLinks = new SQLiteShareLinkStore({ database: db });
  const rateLimit = new SQLiteRateLimitStore({ database: db });
  const ledger = new SQLiteUsageLedgerStore({ database: db });

  return {
    shareLinks,
    rateLimit,
    ledger,
    async close() {
      await shareLinks.close();
      await rateLimit.close();
      await ledger.close();
      db.close();
    },
  };
}
