import {
  CreateTableCommand,
  DescribeTableCommand,
  ResourceNotFoundException,
  UpdateTimeToLiveCommand,
  type AttributeDefinition,
  type DynamoDBClient,
  type GlobalSecondaryIndex,
  type KeySchemaElement,
  type TableStatus,
} from '@aws-sdk/client-dynamodb';
import { sleep } from '@tokengate/core';

export const DEFAULT_TABLE_NAME = 'tokengate';

/** Epoch-seconds attribute that DynamoDB TTL deletes expired items by. */
export const TTL_ATTRIBUTE = 'ttl';

/**
 * Single-table layout shared by every store:
 *
 * | item              | pk                     | sk           | gsi1pk                 | gsi1sk               |
 * | ----------------- | ---------------------- | ------------ | ---------------------- | -------------------- |
 * | share link        | `SHARE#<token>`        | `LINK`       | `RESOURCE#<type>#<id>` | `<createdAt>#<token>` |
 * | active link       | `RESOURCE#<type>#<id>` | `ACTIVE`     |                        |                      |
 * | rate limit window | `RATELIMIT#<principal>`| `CLASS#<op>` |                        |                      |
 * | usage record      | `USAGE#<id>`           | `RECORD`     | `USAGE`                | `<timestamp>#<id>`   |
 */
export const TABLE_SCHEMA: {
  KeySchema: Array<KeySchemaElement>;
  AttributeDefinitions: Array<AttributeDefinition>;
  GlobalSecondaryIndexes: Array<GlobalSecondaryIndex>;
} = {
  KeySchema: [
    { AttributeName: 'pk', KeyType: 'HASH' },
    { AttributeName: 'sk', KeyType: 'RANGE' },
  ],
  AttributeDefinitions: [
    { AttributeName: 'pk', AttributeType: 'S' },
    { AttributeName: 'sk', AttributeType: 'S' },
    { AttributeName: 'gsi1pk', AttributeType: 'S' },
    { AttributeName: 'gsi1sk', AttributeType: 'S' },
  ],
  GlobalSecondaryIndexes: [
    {
      IndexName: 'gsi1',
      KeySchema: [
        { AttributeName: 'gsi1pk', KeyType: 'HASH' },
        { AttributeName: 'gsi1sk', KeyType: 'RANGE' },
      ],
      Projection: { ProjectionType: 'ALL' },
    },
  ],
};

export interface TableWaitOptions {
  /** Gives up once the table has not turned `ACTIVE` for this long. */
  timeoutMs?: number;
  pollMs?: number;
}

type TableState = TableStatus | 'MISSING' | 'UNKNOWN';

async function tableState(
  client: DynamoDBClient,
  tableName: string,
): Promise<TableState> {
  try {
    const response = await client.send(
      new DescribeTableCommand({ TableName: tableName }),
    );
    return response.Table?.TableStatus ?? 'UNKNOWN';
  } catch (error: unknown) {
    if (error instanceof ResourceNotFoundException) {
      return 'MISSING';
    }
    throw error;
  }
}

async function waitUntilActive(
  client: DynamoDBClient,
  tableName: string,
  { timeoutMs = 30_000, pollMs = 1000 }: TableWaitOptions = {},
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while ((await tableState(client, tableName)) !== 'ACTIVE') {
    if (Date.now() >= deadline) {
      throw new Error(
        `Table ${tableName} did not become active within ${timeoutMs}ms`,
      );
    }
    await sleep(pollMs);
  }
}

/** Creates the on-demand table, waits for it, then turns on item expiry. */
export async function createTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options?: TableWaitOptions,
): Promise<void> {
  await client.send(
    new CreateTableCommand({
      TableName: tableName,
      BillingMode: 'PAY_PER_REQUEST',
      ...TABLE_SCHEMA,
    }),
  );
  await waitUntilActive(client, tableName, options);
  await client.send(
    new UpdateTimeToLiveCommand({
      TableName: tableName,
      TimeToLiveSpecification: { AttributeName: TTL_ATTRIBUTE, Enabled: true },
    }),
  );
}

export async function ensureTable(
  client: DynamoDBClient,
  tableName: string = DEFAULT_TABLE_NAME,
  options?: TableWaitOptions,
): Promise<void> {
  const state = await tableState(client, tableName);
  if (state === 'MISSING') {
    await createTable(client, tableName, options);
  } else if (state !== 'ACTIVE') {
    await waitUntilActive(client, tableName, options);
  }
}
