import {
  DescribeTableCommand,
  DynamoDBClient,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand } from '@aws-sdk/lib-dynamodb';
import { mockClient } from 'aws-sdk-client-mock';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDynamoDBStores } from './create-stores.js';
import { DynamoDBRateLimitStore } from './dynamodb-rate-limit-store.js';
import { DynamoDBShareLinkStore } from './dynamodb-share-link-store.js';
import { DynamoDBUsageLedgerStore } from './dynamodb-usage-ledger-store.js';

const ddbMock = mockClient(DynamoDBDocumentClient);
const rawMock = mockClient(DynamoDBClient);

describe('createDynamoDBStores', () => {
  beforeEach(() => {
    ddbMock.reset();
    rawMock.reset();
  });

  afterEach(() => {
    ddbMock.reset();
    rawMock.reset();
  });

  it('returns all three store instances', async () => {
    const stores = createDynamoDBStores({ region: 'us-east-1' });
    expect(stores.shareLinks).toBeInstanceOf(DynamoDBShareLinkStore);
    expect(stores.rateLimit).toBeInstanceOf(DynamoDBRateLimitStore);
    expect(stores.ledger).toBeInstanceOf(DynamoDBUsageLedgerStore);
    await stores.close();
  });

  it('shares the table name across stores', async () => {
    ddbMock.on(GetCommand).resolves({});
    const stores = createDynamoDBStores({
      region: 'us-east-1',
      tableName: 'custom',
    });

    await stores.shareLinks.findByToken('token-a');
    await stores.rateLimit.getWindow({
      principalId: 'user-1',
      operationClass: 'user',
    });

    expect(
      ddbMock
        .commandCalls(GetCommand)
        .map((call) => call.args[0].input.TableName),
    ).toEqual(['custom', 'custom']);
    await stores.close();
  });

  it('does not destroy a client it was given', async () => {
    const rawClient = new DynamoDBClient({ region: 'us-east-1' });
    const destroy = vi.spyOn(rawClient, 'destroy');

    const stores = createDynamoDBStores({ client: rawClient });
    await stores.close();

    expect(destroy).not.toHaveBeenCalled();
  });

  it('accepts an existing DynamoDBDocumentClient', async () => {
    const docClient = DynamoDBDocumentClient.from(
      new DynamoDBClient({ region: 'us-east-1' }),
    );

    const stores = createDynamoDBStores({ client: docClient });
    expect(stores.ledger).toBeInstanceOf(DynamoDBUsageLedgerStore);
    await stores.close();
  });

  it('checks the table once when ensureTableExists is set', async () => {
    rawMock
      .on(DescribeTableCommand)
      .resolves({ Table: { TableStatus: 'ACTIVE' } });
    const rawClient = new DynamoDBClient({ region: 'us-east-1' });

    const stores = createDynamoDBStores({
      client: rawClient,
      ensureTableExists: true,
    });
    await stores.ready;

    expect(rawMock.commandCalls(DescribeTableCommand)).toHaveLength(1);
    await stores.close();
  });

  it('close() marks all stores as destroyed', async () => {
    const stores = createDynamoDBStores({ region: 'us-east-1' });
    await stores.close();

    await expect(stores.shareLinks.findByToken('token-a')).rejects.toThrow(
      'Share link store has been destroyed',
    );
    await expect(
      stores.ledger.query({}, { offset: 0, limit: 1 }),
    ).rejects.toThrow('Usage ledger store has been destroyed');
  });
});
