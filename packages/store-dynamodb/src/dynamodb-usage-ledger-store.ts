import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { PutCommand } from '@aws-sdk/lib-dynamodb';
import {
  USAGE_OUTCOMES,
  type UsageLedgerStore,
  type UsageQuery,
  type UsageRecord,
  type UsageRecordPage,
} from '@tokengate/core';
import { z } from 'zod';
import {
  DynamoDBStoreBase,
  type DynamoDBStoreOptions,
} from './dynamodb-store-base.js';
import {
  assertDynamoKeyPart,
  queryItemsAllPages,
  sortableNumber,
} from './dynamodb-utils.js';

export type DynamoDBUsageLedgerStoreOptions = DynamoDBStoreOptions;

const USAGE_PARTITION = 'USAGE';
/** Sorts after every `<timestamp>#<id>` key with the same timestamp. */
const KEY_CEILING = '~';

const metadataSchema = z.record(z.unknown());

const recordItemSchema = z.object({
  id: z.string(),
  principalId: z.string(),
  operationClass: z.string(),
  timestamp: z.number(),
  outcome: z.enum(USAGE_OUTCOMES),
  tokensIn: z.number(),
  tokensOut: z.number(),
  estimatedCost: z.number(),
  model: z.string().optional(),
  errorMessage: z.string().optional(),
  metadata: z.string().transform((json) => metadataSchema.parse(JSON.parse(json))),
});

function toUsageRecord(item: Record<string, unknown>): UsageRecord {
  const parsed = recordItemSchema.parse(item);
  const record: UsageRecord = {
    id: parsed.id,
    principalId: parsed.principalId,
    operationClass: parsed.operationClass,
    timestamp: new Date(parsed.timestamp),
    outcome: parsed.outcome,
    cost: {
      tokensIn: parsed.tokensIn,
      tokensOut: parsed.tokensOut,
      estimatedCost: parsed.estimatedCost,
    },
    metadata: parsed.metadata,
  };
  if (parsed.model !== undefined) record.model = parsed.model;
  if (parsed.errorMessage !== undefined) {
    record.errorMessage = parsed.errorMessage;
  }
  return record;
}

function filterExpression(filter: UsageQuery) {
  const clauses: Array<string> = [];
  const values: Record<string, unknown> = {};

  if (filter.principalId !== undefined) {
    clauses.push('principalId = :principalId');
    values[':principalId'] = filter.principalId;
  }
  if (filter.operationClass !== undefined) {
    clauses.push('operationClass = :operationClass');
    values[':operationClass'] = filter.operationClass;
  }
  if (filter.outcome !== undefined) {
    clauses.push('outcome = :outcome');
    values[':outcome'] = filter.outcome;
  }

  return {
    expression: clauses.length > 0 ? clauses.join(' AND ') : undefined,
    values,
  };
}

/**
 * Usage records in DynamoDB. Every record lives under one `gsi1` partition
 * sorted by timestamp, so queries read newest first without a scan. Writes
 * are conditional puts and nothing here updates or deletes a record.
 */
export class DynamoDBUsageLedgerStore
  extends DynamoDBStoreBase
  implements UsageLedgerStore
{
  constructor(options: DynamoDBUsageLedgerStoreOptions = {}) {
    super('Usage ledger store', options);
  }

  async append(record: UsageRecord): Promise<void> {
    assertDynamoKeyPart(record.id, 'Usage record id');

    await this.run(async () => {
      try {
        await this.docClient.send(
          new PutCommand({
            TableName: this.tableName,
            Item: {
              pk: `USAGE#${record.id}`,
              sk: 'RECORD',
              gsi1pk: USAGE_PARTITION,
              gsi1sk: `${sortableNumber(record.timestamp.getTime())}#${record.id}`,
              id: record.id,
              principalId: record.principalId,
              operationClass: record.operationClass,
              timestamp: record.timestamp.getTime(),
              outcome: record.outcome,
              tokensIn: record.cost.tokensIn,
              tokensOut: record.cost.tokensOut,
              estimatedCost: record.cost.estimatedCost,
              ...(record.model !== undefined ? { model: record.model } : {}),
              ...(record.errorMessage !== undefined
                ? { errorMessage: record.errorMessage }
                : {}),
              metadata: JSON.stringify(record.metadata),
            },
            ConditionExpression: 'attribute_not_exists(pk)',
          }),
        );
      } catch (error: unknown) {
        // Already stored under this id: a retried write.
        if (!(error instanceof ConditionalCheckFailedException)) {
          throw error;
        }
      }
    });
  }

  async query(
    filter: UsageQuery,
    { offset, limit }: { offset: number; limit: number },
  ): Promise<UsageRecordPage> {
    if (filter.from && filter.to && filter.from > filter.to) {
      return { records: [], total: 0 };
    }

    return this.run(async () => {
      const { expression, values } = filterExpression(filter);
      const lower = sortableNumber(filter.from?.getTime() ?? 0);
      const upper = `${sortableNumber(filter.to?.getTime() ?? Number.MAX_SAFE_INTEGER)}#${KEY_CEILING}`;

      const items = await queryItemsAllPages(this.docClient, {
        TableName: this.tableName,
        IndexName: 'gsi1',
        KeyConditionExpression:
          'gsi1pk = :partition AND gsi1sk BETWEEN :lower AND :upper',
        FilterExpression: expression,
        ExpressionAttributeValues: {
          ':partition': USAGE_PARTITION,
          ':lower': lower,
          ':upper': upper,
          ...values,
        },
        ScanIndexForward: false,
      });

      return {
        records: items.slice(offset, offset + limit).map(toUsageRecord),
        total: items.length,
      };
    });
  }
}
