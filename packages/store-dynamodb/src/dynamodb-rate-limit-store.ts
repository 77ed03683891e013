import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import {
  consumeFixedWindow,
  type ConsumeResult,
  type RateLimitConfig,
  type RateLimitKey,
  type RateLimitStore,
  type RateLimitWindow,
} from '@tokengate/core';
import { z } from 'zod';
import {
  DynamoDBStoreBase,
  type DynamoDBStoreOptions,
} from './dynamodb-store-base.js';
import {
  assertDynamoKeyPart,
  batchDeleteWithRetries,
  scanItemsAllPages,
} from './dynamodb-utils.js';
import { TTL_ATTRIBUTE } from './table.js';

export type DynamoDBRateLimitStoreOptions = DynamoDBStoreOptions;

const MAX_CONSUME_ATTEMPTS = 5;

const windowItemSchema = z.object({
  principalId: z.string(),
  operationClass: z.string(),
  windowStart: z.number(),
  count: z.number(),
});

function windowKey({ principalId, operationClass }: RateLimitKey) {
  return { pk: `RATELIMIT#${principalId}`, sk: `CLASS#${operationClass}` };
}

function toWindow(item: Record<string, unknown>): RateLimitWindow {
  return windowItemSchema.parse(item);
}

function isConditionFailure(error: unknown): boolean {
  return error instanceof ConditionalCheckFailedException;
}

/**
 * Fixed-window counters, one item per principal and operation class.
 *
 * `consume` never reads before it writes: it first tries a conditional
 * increment of a live window, then a conditional replacement of a missing or
 * elapsed one, and only reads when both conditions fail.
 */
export class DynamoDBRateLimitStore
  extends DynamoDBStoreBase
  implements RateLimitStore
{
  constructor(options: DynamoDBRateLimitStoreOptions = {}) {
    super('Rate limit store', options);
  }

  async consume(
    key: RateLimitKey,
    config: RateLimitConfig,
    now: number,
  ): Promise<ConsumeResult> {
    assertDynamoKeyPart(key.principalId, 'Principal id');
    assertDynamoKeyPart(key.operationClass, 'Operation class');

    return this.run(async () => {
      for (let attempt = 0; attempt < MAX_CONSUME_ATTEMPTS; attempt++) {
        if (config.limit > 0) {
          const incremented = await this.tryIncrement(key, config, now);
          if (incremented) {
            return { allowed: true, window: incremented };
          }

          const opened = await this.tryOpenWindow(key, config, now);
          if (opened) {
            return { allowed: true, window: opened };
          }
        }

        const current = await this.readWindow(key);
        const result = consumeFixedWindow(current, key, config, now);
        if (!result.allowed) {
          return result;
        }
        // A slot freed up between the writes and the read; try again.
      }

      throw new Error(
        `Rate limit window for ${key.principalId}/${key.operationClass} kept changing after ${MAX_CONSUME_ATTEMPTS} attempts`,
      );
    });
  }

  async getWindow(key: RateLimitKey): Promise<RateLimitWindow | undefined> {
    return this.run(() => this.readWindow(key));
  }

  async reset(key: RateLimitKey): Promise<void> {
    await this.run(() =>
      this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: windowKey(key),
        }),
      ),
    );
  }

  async cleanup(idleForMs: number, now: number): Promise<number> {
    return this.run(async () => {
      const items = await scanItemsAllPages(this.docClient, {
        TableName: this.tableName,
        FilterExpression: 'begins_with(pk, :prefix) AND windowStart <= :cutoff',
        ExpressionAttributeValues: {
          ':prefix': 'RATELIMIT#',
          ':cutoff': now - idleForMs,
        },
        ProjectionExpression: 'pk, sk',
      });

      await batchDeleteWithRetries(
        this.docClient,
        this.tableName,
        items.map((item) => ({ pk: item['pk'], sk: item['sk'] })),
      );
      return items.length;
    });
  }

  private async tryIncrement(
    key: RateLimitKey,
    config: RateLimitConfig,
    now: number,
  ): Promise<RateLimitWindow | undefined> {
    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: windowKey(key),
          UpdateExpression: 'SET #count = #count + :one',
          ConditionExpression:
            'attribute_exists(pk) AND windowStart > :elapsedBefore AND #count < :limit',
          ExpressionAttributeNames: { '#count': 'count' },
          ExpressionAttributeValues: {
            ':one': 1,
            ':elapsedBefore': now - config.windowMs,
            ':limit': config.limit,
          },
          ReturnValues: 'ALL_NEW',
        }),
      );
      return result.Attributes && toWindow(result.Attributes);
    } catch (error: unknown) {
      if (isConditionFailure(error)) return undefined;
      throw error;
    }
  }

  private async tryOpenWindow(
    key: RateLimitKey,
    config: RateLimitConfig,
    now: number,
  ): Promise<RateLimitWindow | undefined> {
    const window: RateLimitWindow = { ...key, windowStart: now, count: 1 };
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...windowKey(key),
            ...window,
            [TTL_ATTRIBUTE]: Math.ceil((now + config.windowMs) / 1000),
          },
          ConditionExpression:
            'attribute_not_exists(pk) OR windowStart <= :elapsedBefore',
          ExpressionAttributeValues: {
            ':elapsedBefore': now - config.windowMs,
          },
        }),
      );
      return window;
    } catch (error: unknown) {
      if (isConditionFailure(error)) return undefined;
      throw error;
    }
  }

  private async readWindow(
    key: RateLimitKey,
  ): Promise<RateLimitWindow | undefined> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: windowKey(key),
        ConsistentRead: true,
      }),
    );
    return result.Item && toWindow(result.Item);
  }
}
