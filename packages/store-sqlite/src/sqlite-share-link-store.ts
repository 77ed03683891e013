import type {
  CreateShareLinkResult,
  ResourceType,
  ShareLink,
  ShareLinkStore,
} from '@tokengate/core';
import { and, desc, eq, gt, isNull, or, sql } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';
import type Database from 'better-sqlite3';
import {
  openConnection,
  type SQLiteConnectionOptions,
} from './connection.js';
import { createShareLinksTable, shareLinksTable } from './schema.js';

export type SQLiteShareLinkStoreOptions = SQLiteConnectionOptions;

type ShareLinkRow = typeof shareLinksTable.$inferSelect;

function toDate(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

function toShareLink(row: ShareLinkRow): ShareLink {
  return {
    token: row.token,
    resourceType: row.resourceType,
    resourceId: row.resourceId,
    ownerId: row.ownerId,
    createdAt: new Date(row.createdAt),
    expiresAt: toDate(row.expiresAt),
    revokedAt: toDate(row.revokedAt),
    lastAccessedAt: toDate(row.lastAccessedAt),
  };
}

function ofResource(resourceType: ResourceType, resourceId: string) {
  return and(
    eq(shareLinksTable.resourceType, resourceType),
    eq(shareLinksTable.resourceId, resourceId),
  );
}

function isActiveAt(now: number) {
  return and(
    isNull(shareLinksTable.revokedAt),
    or(isNull(shareLinksTable.expiresAt), gt(shareLinksTable.expiresAt, now)),
  );
}

/**
 * Share links in SQLite. Create-if-no-active runs inside an `IMMEDIATE`
 * transaction, which takes the write lock before the read, so two
 * connections cannot both find the resource without a link.
 */
export class SQLiteShareLinkStore implements ShareLinkStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  private readonly ownsConnection: boolean;

  constructor({ database }: SQLiteShareLinkStoreOptions = {}) {
    const connection = openConnection(database);
    this.sqlite = connection.sqlite;
    this.ownsConnection = connection.owned;
    this.db = drizzle(this.sqlite);
    createShareLinksTable(this.sqlite);
  }

  async createIfNoActive(
    candidate: ShareLink,
    now: number,
  ): Promise<CreateShareLinkResult> {
    return this.db.transaction(
      (tx): CreateShareLinkResult => {
        const active = tx
          .select()
          .from(shareLinksTable)
          .where(
            and(
              ofResource(candidate.resourceType, candidate.resourceId),
              isActiveAt(now),
            ),
          )
          .orderBy(desc(shareLinksTable.createdAt))
          .limit(1)
          .get();
        if (active) {
          return { status: 'existing', link: toShareLink(active) };
        }

        const clash = tx
          .select({ token: shareLinksTable.token })
          .from(shareLinksTable)
          .where(eq(shareLinksTable.token, candidate.token))
          .get();
        if (clash) {
          return { status: 'token_conflict' };
        }

        const row: ShareLinkRow = {
          token: candidate.token,
          resourceType: candidate.resourceType,
          resourceId: candidate.resourceId,
          ownerId: candidate.ownerId,
          createdAt: candidate.createdAt.getTime(),
          expiresAt: candidate.expiresAt?.getTime() ?? null,
          revokedAt: candidate.revokedAt?.getTime() ?? null,
          lastAccessedAt: candidate.lastAccessedAt?.getTime() ?? null,
        };
        tx.insert(shareLinksTable).values(row).run();
        return { status: 'created', link: toShareLink(row) };
      },
      { behavior: 'immediate' },
    );
  }

  async findByToken(token: string): Promise<ShareLink | undefined> {
    const row = this.db
      .select()
      .from(shareLinksTable)
      .where(eq(shareLinksTable.token, token))
      .get();
    return row && toShareLink(row);
  }

  async findActive(
    resourceType: ResourceType,
    resourceId: string,
    now: number,
  ): Promise<ShareLink | undefined> {
    const row = this.db
      .select()
      .from(shareLinksTable)
      .where(and(ofResource(resourceType, resourceId), isActiveAt(now)))
      .orderBy(desc(shareLinksTable.createdAt))
      .limit(1)
      .get();
    return row && toShareLink(row);
  }

  async listByResource(
    resourceType: ResourceType,
    resourceId: string,
  ): Promise<Array<ShareLink>> {
    return this.db
      .select()
      .from(shareLinksTable)
      .where(ofResource(resourceType, resourceId))
      .orderBy(desc(shareLinksTable.createdAt), desc(sql`rowid`))
      .all()
      .map(toShareLink);
  }

  async revokeAll(
    resourceType: ResourceType,
    resourceId: string,
    revokedAt: Date,
  ): Promise<number> {
    const result = this.db
      .update(shareLinksTable)
      .set({ revokedAt: revokedAt.getTime() })
      .where(
        and(
          ofResource(resourceType, resourceId),
          isNull(shareLinksTable.revokedAt),
        ),
      )
      .run();
    return result.changes;
  }

  async touch(token: string, accessedAt: Date): Promise<void> {
    this.db
      .update(shareLinksTable)
      .set({ lastAccessedAt: accessedAt.getTime() })
      .where(eq(shareLinksTable.token, token))
      .run();
  }

  async close(): Promise<void> {
    if (this.ownsConnection) {
      this.sqlite.close();
    }
  }
}
