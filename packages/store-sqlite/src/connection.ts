import Database from 'better-sqlite3';

export interface SQLiteConnectionOptions {
  /**
   * File path or an open connection. Defaults to `':memory:'`. A connection
   * passed in is shared and never closed by the store.
   */
  database?: string | Database.Database;
}

export interface SQLiteConnection {
  sqlite: Database.Database;
  /** Whether the store opened the connection and must close it. */
  owned: boolean;
}

export function openConnection(
  database: string | Database.Database = ':memory:',
): SQLiteConnection {
  if (typeof database !== 'string') {
    return { sqlite: database, owned: false };
  }
  const sqlite = new Database(database);
  if (database !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  return { sqlite, owned: true };
}
