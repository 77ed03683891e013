import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  GetCommand,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  RESOURCE_TYPES,
  isActiveShareLink,
  type CreateShareLinkResult,
  type ResourceType,
  type ShareLink,
  type ShareLinkStore,
} from '@tokengate/core';
import { z } from 'zod';
import {
  DynamoDBStoreBase,
  type DynamoDBStoreOptions,
} from './dynamodb-store-base.js';
import {
  assertDynamoKeyPart,
  cancellationCodes,
  isConditionalTransactionFailure,
  queryItemsAllPages,
  sortableNumber,
} from './dynamodb-utils.js';

export type DynamoDBShareLinkStoreOptions = DynamoDBStoreOptions;

/** Rounds of create, find stale pointer, clear it, before giving up. */
const MAX_CREATE_ATTEMPTS = 5;
const MAX_REVOKE_ATTEMPTS = 5;
const MAX_TRANSACTION_ITEMS = 100;

const ACTIVE_SK = 'ACTIVE';
const LINK_SK = 'LINK';

const epochOrNull = z.number().nullable();

const linkItemSchema = z.object({
  token: z.string(),
  resourceType: z.enum(RESOURCE_TYPES),
  resourceId: z.string(),
  ownerId: z.string(),
  createdAt: z.number(),
  expiresAt: epochOrNull,
  revokedAt: epochOrNull,
  lastAccessedAt: epochOrNull,
});

const activePointerSchema = z.object({
  token: z.string(),
});

function linkPk(token: string): string {
  return `SHARE#${token}`;
}

function resourcePk(resourceType: ResourceType, resourceId: string): string {
  return `RESOURCE#${resourceType}#${resourceId}`;
}

function toDate(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

function toShareLink(item: Record<string, unknown>): ShareLink {
  const parsed = linkItemSchema.parse(item);
  return {
    ...parsed,
    createdAt: new Date(parsed.createdAt),
    expiresAt: toDate(parsed.expiresAt),
    revokedAt: toDate(parsed.revokedAt),
    lastAccessedAt: toDate(parsed.lastAccessedAt),
  };
}

/**
 * Share links in a single DynamoDB table.
 *
 * Each resource with an active link also has an `ACTIVE` pointer item. Create
 * writes the pointer and the link in one transaction, conditioned on the
 * pointer being absent or expired, so two creators cannot both succeed.
 * Revoke deletes the pointer and stamps the links in one transaction.
 */
export class DynamoDBShareLinkStore
  extends DynamoDBStoreBase
  implements ShareLinkStore
{
  constructor(options: DynamoDBShareLinkStoreOptions = {}) {
    super('Share link store', options);
  }

  async createIfNoActive(
    candidate: ShareLink,
    now: number,
  ): Promise<CreateShareLinkResult> {
    assertDynamoKeyPart(candidate.token, 'Share token');
    assertDynamoKeyPart(candidate.resourceId, 'Resource id');

    return this.run(async () => {
      for (let attempt = 0; attempt < MAX_CREATE_ATTEMPTS; attempt++) {
        const codes = await this.tryCreate(candidate, now);
        if (codes === undefined) {
          return { status: 'created', link: candidate };
        }

        if (codes[0] === 'ConditionalCheckFailed') {
          const existing = await this.readActive(
            candidate.resourceType,
            candidate.resourceId,
            now,
          );
          if (existing) {
            return { status: 'existing', link: existing };
          }
          // The pointer went stale or vanished between the write and the read.
          continue;
        }

        if (codes[1] === 'ConditionalCheckFailed') {
          return { status: 'token_conflict' };
        }
      }

      throw new Error(
        `Could not create a share link for ${candidate.resourceType} ${candidate.resourceId} after ${MAX_CREATE_ATTEMPTS} attempts`,
      );
    });
  }

  async findByToken(token: string): Promise<ShareLink | undefined> {
    return this.run(() => this.getLink(token));
  }

  async findActive(
    resourceType: ResourceType,
    resourceId: string,
    now: number,
  ): Promise<ShareLink | undefined> {
    return this.run(() => this.readActive(resourceType, resourceId, now));
  }

  async listByResource(
    resourceType: ResourceType,
    resourceId: string,
  ): Promise<Array<ShareLink>> {
    return this.run(() => this.listLinks(resourceType, resourceId));
  }

  async revokeAll(
    resourceType: ResourceType,
    resourceId: string,
    revokedAt: Date,
  ): Promise<number> {
    return this.run(async () => {
      for (let attempt = 0; attempt < MAX_REVOKE_ATTEMPTS; attempt++) {
        // The index lags behind writes, so the pointer is read consistently
        // and its link is always stamped even when the query misses it.
        const pointer = await this.readPointer(resourceType, resourceId);
        const links = await this.listLinks(resourceType, resourceId);
        const tokens = new Set(
          links
            .filter((link) => link.revokedAt === null)
            .map((link) => link.token),
        );
        if (pointer !== undefined && !tokens.has(pointer)) {
          const link = await this.getLink(pointer);
          if (link && link.revokedAt === null) {
            tokens.add(pointer);
          }
        }

        try {
          await this.revokeTokens(
            resourceType,
            resourceId,
            pointer,
            [...tokens],
            revokedAt,
          );
          return tokens.size;
        } catch (error: unknown) {
          // A concurrent create or revoke changed what we read; re-read.
          if (!isConditionalTransactionFailure(error)) {
            throw error;
          }
        }
      }

      throw new Error(
        `Could not revoke share links for ${resourceType} ${resourceId} after ${MAX_REVOKE_ATTEMPTS} attempts`,
      );
    });
  }

  async touch(token: string, accessedAt: Date): Promise<void> {
    await this.run(async () => {
      try {
        await this.docClient.send(
          new UpdateCommand({
            TableName: this.tableName,
            Key: { pk: linkPk(token), sk: LINK_SK },
            UpdateExpression: 'SET lastAccessedAt = :at',
            ConditionExpression: 'attribute_exists(pk)',
            ExpressionAttributeValues: { ':at': accessedAt.getTime() },
          }),
        );
      } catch (error: unknown) {
        if (!(error instanceof ConditionalCheckFailedException)) {
          throw error;
        }
      }
    });
  }

  /**
   * @returns `undefined` when written, otherwise the per-item cancellation
   * codes: index 0 for the active pointer, index 1 for the link.
   */
  private async tryCreate(
    candidate: ShareLink,
    now: number,
  ): Promise<Array<string | undefined> | undefined> {
    const pk = resourcePk(candidate.resourceType, candidate.resourceId);
    const expiresAt = candidate.expiresAt?.getTime() ?? null;

    try {
      await this.docClient.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Put: {
                TableName: this.tableName,
                Item: { pk, sk: ACTIVE_SK, token: candidate.token, expiresAt },
                ConditionExpression:
                  'attribute_not_exists(pk) OR expiresAt <= :now',
                ExpressionAttributeValues: { ':now': now },
              },
            },
            {
              Put: {
                TableName: this.tableName,
                Item: {
                  pk: linkPk(candidate.token),
                  sk: LINK_SK,
                  gsi1pk: pk,
                  gsi1sk: `${sortableNumber(candidate.createdAt.getTime())}#${candidate.token}`,
                  token: candidate.token,
                  resourceType: candidate.resourceType,
                  resourceId: candidate.resourceId,
                  ownerId: candidate.ownerId,
                  createdAt: candidate.createdAt.getTime(),
                  expiresAt,
                  revokedAt: candidate.revokedAt?.getTime() ?? null,
                  lastAccessedAt: candidate.lastAccessedAt?.getTime() ?? null,
                },
                ConditionExpression: 'attribute_not_exists(pk)',
              },
            },
          ],
        }),
      );
      return undefined;
    } catch (error: unknown) {
      const codes = cancellationCodes(error);
      if (codes === undefined) {
        throw error;
      }
      return codes;
    }
  }

  /**
   * Deletes the active pointer and stamps `revokedAt` on each token, in
   * transactions of at most {@link MAX_TRANSACTION_ITEMS} items. The pointer
   * goes in the first one, conditioned on still naming `pointer` (or still
   * being absent), so a link created after the read is not orphaned.
   */
  private async revokeTokens(
    resourceType: ResourceType,
    resourceId: string,
    pointer: string | undefined,
    tokens: Array<string>,
    revokedAt: Date,
  ): Promise<void> {
    const pointerKey = {
      pk: resourcePk(resourceType, resourceId),
      sk: ACTIVE_SK,
    };
    const pointerDelete = {
      Delete:
        pointer === undefined
          ? {
              TableName: this.tableName,
              Key: pointerKey,
              ConditionExpression: 'attribute_not_exists(pk)',
            }
          : {
              TableName: this.tableName,
              Key: pointerKey,
              ConditionExpression: '#token = :token',
              ExpressionAttributeNames: { '#token': 'token' },
              ExpressionAttributeValues: { ':token': pointer },
            },
    };
    const updates = tokens.map((token) => ({
      Update: {
        TableName: this.tableName,
        Key: { pk: linkPk(token), sk: LINK_SK },
        UpdateExpression: 'SET revokedAt = :revokedAt',
        ConditionExpression: 'attribute_type(revokedAt, :null)',
        ExpressionAttributeValues: {
          ':revokedAt': revokedAt.getTime(),
          ':null': 'NULL',
        },
      },
    }));

    const first = updates.slice(0, MAX_TRANSACTION_ITEMS - 1);
    await this.docClient.send(
      new TransactWriteCommand({ TransactItems: [pointerDelete, ...first] }),
    );

    for (
      let i = first.length;
      i < updates.length;
      i += MAX_TRANSACTION_ITEMS
    ) {
      await this.docClient.send(
        new TransactWriteCommand({
          TransactItems: updates.slice(i, i + MAX_TRANSACTION_ITEMS),
        }),
      );
    }
  }

  private async getLink(token: string): Promise<ShareLink | undefined> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: linkPk(token), sk: LINK_SK },
        ConsistentRead: true,
      }),
    );
    return result.Item && toShareLink(result.Item);
  }

  /**
   * Follows the active pointer. A pointer whose link is no longer active is
   * deleted so the next create can proceed.
   */
  private async readActive(
    resourceType: ResourceType,
    resourceId: string,
    now: number,
  ): Promise<ShareLink | undefined> {
    const pk = resourcePk(resourceType, resourceId);
    const token = await this.readPointer(resourceType, resourceId);
    if (token === undefined) {
      return undefined;
    }

    const link = await this.getLink(token);
    if (link && isActiveShareLink(link, now)) {
      return link;
    }

    try {
      await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { pk, sk: ACTIVE_SK },
          ConditionExpression: '#token = :token',
          ExpressionAttributeNames: { '#token': 'token' },
          ExpressionAttributeValues: { ':token': token },
        }),
      );
    } catch (error: unknown) {
      if (!(error instanceof ConditionalCheckFailedException)) {
        throw error;
      }
    }
    return undefined;
  }

  private async readPointer(
    resourceType: ResourceType,
    resourceId: string,
  ): Promise<string | undefined> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: resourcePk(resourceType, resourceId), sk: ACTIVE_SK },
        ConsistentRead: true,
      }),
    );
    return result.Item && activePointerSchema.parse(result.Item).token;
  }

  private async listLinks(
    resourceType: ResourceType,
    resourceId: string,
  ): Promise<Array<ShareLink>> {
    const items = await queryItemsAllPages(this.docClient, {
      TableName: this.tableName,
      IndexName: 'gsi1',
      KeyConditionExpression: 'gsi1pk = :pk',
      ExpressionAttributeValues: { ':pk': resourcePk(resourceType, resourceId) },
      ScanIndexForward: false,
    });
    return items.map(toShareLink);
  }
}
