import type Database from 'better-sqlite3';
import {
  integer,
  primaryKey,
  real,
  sqliteTable,
  text,
} from 'drizzle-orm/sqlite-core';
import { RESOURCE_TYPES, USAGE_OUTCOMES } from '@tokengate/core';

export const shareLinksTable = sqliteTable('share_links', {
  token: text('token').primaryKey(),
  resourceType: text('resource_type', { enum: RESOURCE_TYPES }).notNull(),
  resourceId: text('resource_id').notNull(),
  ownerId: text('owner_id').notNull(),
  createdAt: integer('created_at').notNull(),
  expiresAt: integer('expires_at'),
  revokedAt: integer('revoked_at'),
  lastAccessedAt: integer('last_accessed_at'),
});

export const rateLimitWindowsTable = sqliteTable(
  'rate_limit_windows',
  {
    principalId: text('principal_id').notNull(),
    operationClass: text('operation_class').notNull(),
    windowStart: integer('window_start').notNull(),
    count: integer('count').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.principalId, table.operationClass] }),
  ],
);

export const usageRecordsTable = sqliteTable('usage_records', {
  id: text('id').primaryKey(),
  principalId: text('principal_id').notNull(),
  operationClass: text('operation_class').notNull(),
  timestamp: integer('timestamp').notNull(),
  outcome: text('outcome', { enum: USAGE_OUTCOMES }).notNull(),
  tokensIn: real('tokens_in').notNull(),
  tokensOut: real('tokens_out').notNull(),
  estimatedCost: real('estimated_cost').notNull(),
  model: text('model'),
  errorMessage: text('error_message'),
  metadata: text('metadata', { mode: 'json' })
    .$type<Record<string, unknown>>()
    .notNull(),
});

const SHARE_LINKS_DDL = `
  CREATE TABLE IF NOT EXISTS share_links (
    token TEXT PRIMARY KEY,
    resource_type TEXT NOT NULL,
    resource_id TEXT NOT NULL,
    owner_id TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    expires_at INTEGER,
    revoked_at INTEGER,
    last_accessed_at INTEGER
  );
  CREATE INDEX IF NOT EXISTS share_links_resource_idx
    ON share_links (resource_type, resource_id);
`;

const RATE_LIMIT_WINDOWS_DDL = `
  CREATE TABLE IF NOT EXISTS rate_limit_windows (
    principal_id TEXT NOT NULL,
    operation_class TEXT NOT NULL,
    window_start INTEGER NOT NULL,
    count INTEGER NOT NULL,
    PRIMARY KEY (principal_id, operation_class)
  );
`;

// Ledger rows can be added and read, nothing else.
const USAGE_RECORDS_DDL = `
  CREATE TABLE IF NOT EXISTS usage_records (
    id TEXT PRIMARY KEY,
    principal_id TEXT NOT NULL,
    operation_class TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    outcome TEXT NOT NULL,
    tokens_in REAL NOT NULL,
    tokens_out REAL NOT NULL,
    estimated_cost REAL NOT NULL,
    model TEXT,
    error_message TEXT,
    metadata TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS usage_records_timestamp_idx
    ON usage_records (timestamp);
  CREATE INDEX IF NOT EXISTS usage_records_principal_idx
    ON usage_records (principal_id, timestamp);
  CREATE TRIGGER IF NOT EXISTS usage_records_no_update
    BEFORE UPDATE ON usage_records
    BEGIN SELECT RAISE(ABORT, 'usage_records is append-only'); END;
  CREATE TRIGGER IF NOT EXISTS usage_records_no_delete
    BEFORE DELETE ON usage_records
    BEGIN SELECT RAISE(ABORT, 'usage_records is append-only'); END;
`;

export function createShareLinksTable(sqlite: Database.Database): void {
  sqlite.exec(SHARE_LINKS_DDL);
}

export function createRateLimitWindowsTable(sqlite: Database.Database): void {
  sqlite.exec(RATE_LIMIT_WINDOWS_DDL);
}

export function createUsageRecordsTable(sqlite: Database.Database): void {
  sqlite.exec(USAGE_RECORDS_DDL);
}
