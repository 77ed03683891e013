import {
  DynamoDBClient,
  ResourceNotFoundException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  BatchWriteCommand,
  QueryCommand,
  ScanCommand,
} from '@aws-sdk/lib-dynamodb';
import { mockClient } from 'aws-sdk-client-mock';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  assertDynamoKeyPart,
  batchDeleteWithRetries,
  cancellationCodes,
  describeMissingTable,
  isConditionalTransactionFailure,
  queryItemsAllPages,
  scanItemsAllPages,
  sortableNumber,
} from './dynamodb-utils.js';

const ddbMock = mockClient(DynamoDBDocumentClient);
const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({}));
const TABLE_NAME = 'test-table';

function cancelled(codes: Array<string>): TransactionCanceledException {
  return new TransactionCanceledException({
    message: 'Transaction cancelled',
    $metadata: {},
    CancellationReasons: codes.map((Code) => ({ Code })),
  });
}

beforeEach(() => {
  ddbMock.reset();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('batchDeleteWithRetries', () => {
  it('deletes all items in a single attempt when no unprocessed items', async () => {
    ddbMock.on(BatchWriteCommand).resolvesOnce({ UnprocessedItems: {} });

    await batchDeleteWithRetries(docClient, TABLE_NAME, [
      { pk: 'k1', sk: 's1' },
    ]);

    expect(ddbMock.commandCalls(BatchWriteCommand)).toHaveLength(1);
  });

  it('splits keys into batches of 25', async () => {
    ddbMock.on(BatchWriteCommand).resolves({ UnprocessedItems: {} });

    await batchDeleteWithRetries(
      docClient,
      TABLE_NAME,
      Array.from({ length: 30 }, (_, i) => ({ pk: `k${i}`, sk: 's' })),
    );

    const sizes = ddbMock
      .commandCalls(BatchWriteCommand)
      .map((call) => call.args[0].input.RequestItems?.[TABLE_NAME]?.length);
    expect(sizes).toEqual([25, 5]);
  });

  it('retries when UnprocessedItems are returned and succeeds', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);

    ddbMock
      .on(BatchWriteCommand)
      .resolvesOnce({
        UnprocessedItems: {
          [TABLE_NAME]: [{ DeleteRequest: { Key: { pk: 'k1', sk: 's1' } } }],
        },
      })
      .resolvesOnce({ UnprocessedItems: {} });

    await batchDeleteWithRetries(docClient, TABLE_NAME, [
      { pk: 'k1', sk: 's1' },
      { pk: 'k2', sk: 's2' },
    ]);

    const calls = ddbMock.commandCalls(BatchWriteCommand);
    expect(calls).toHaveLength(2);
    expect(calls[1]?.args[0].input.RequestItems?.[TABLE_NAME]).toEqual([
      { DeleteRequest: { Key: { pk: 'k1', sk: 's1' } } },
    ]);
  });

  it('throws after exceeding MAX_BATCH_WRITE_RETRIES (8)', async () => {
    vi.useFakeTimers();
    vi.spyOn(Math, 'random').mockReturnValue(0);
    ddbMock.on(BatchWriteCommand).resolves({
      UnprocessedItems: {
        [TABLE_NAME]: [{ DeleteRequest: { Key: { pk: 'k1', sk: 's1' } } }],
      },
    });

    const result = expect(
      batchDeleteWithRetries(docClient, TABLE_NAME, [{ pk: 'k1', sk: 's1' }]),
    ).rejects.toThrow(
      `Failed to delete all items from table "${TABLE_NAME}" after 9 attempts`,
    );
    await vi.runAllTimersAsync();
    await result;

    expect(ddbMock.commandCalls(BatchWriteCommand)).toHaveLength(9);
  });
});

describe('queryItemsAllPages', () => {
  it('follows LastEvaluatedKey across pages', async () => {
    ddbMock
      .on(QueryCommand)
      .resolvesOnce({ Items: [{ id: 1 }], LastEvaluatedKey: { pk: 'next' } })
      .resolvesOnce({ Items: [{ id: 2 }] });

    const items = await queryItemsAllPages(docClient, {
      TableName: TABLE_NAME,
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': 'test' },
    });

    expect(items).toEqual([{ id: 1 }, { id: 2 }]);
    expect(
      ddbMock.commandCalls(QueryCommand)[1]?.args[0].input.ExclusiveStartKey,
    ).toEqual({ pk: 'next' });
  });

  it('returns an empty list when nothing matches', async () => {
    ddbMock.on(QueryCommand).resolvesOnce({});

    await expect(
      queryItemsAllPages(docClient, { TableName: TABLE_NAME }),
    ).resolves.toEqual([]);
  });
});

describe('scanItemsAllPages', () => {
  it('follows LastEvaluatedKey across pages', async () => {
    ddbMock
      .on(ScanCommand)
      .resolvesOnce({ Items: [{ id: 1 }], LastEvaluatedKey: { pk: 'next' } })
      .resolvesOnce({ Items: [{ id: 2 }, { id: 3 }] });

    const items = await scanItemsAllPages(docClient, { TableName: TABLE_NAME });

    expect(items).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(ddbMock.commandCalls(ScanCommand)).toHaveLength(2);
  });
});

describe('cancellationCodes', () => {
  it('lists codes in request order', () => {
    expect(
      cancellationCodes(cancelled(['None', 'ConditionalCheckFailed'])),
    ).toEqual(['None', 'ConditionalCheckFailed']);
  });

  it('returns undefined for other errors', () => {
    expect(cancellationCodes(new Error('boom'))).toBeUndefined();
    expect(cancellationCodes(undefined)).toBeUndefined();
  });
});

describe('isConditionalTransactionFailure', () => {
  it('returns true when a condition check failed', () => {
    expect(
      isConditionalTransactionFailure(
        cancelled(['None', 'ConditionalCheckFailed']),
      ),
    ).toBe(true);
  });

  it('returns false for other cancellation reasons', () => {
    expect(
      isConditionalTransactionFailure(cancelled(['TransactionConflict'])),
    ).toBe(false);
  });

  it('returns false for non-transaction errors', () => {
    expect(isConditionalTransactionFailure(new Error('x'))).toBe(false);
    expect(isConditionalTransactionFailure(null)).toBe(false);
  });
});

describe('describeMissingTable', () => {
  it('names the table when it is missing', () => {
    const cause = new ResourceNotFoundException({
      message: 'Requested resource not found',
      $metadata: {},
    });

    const error = describeMissingTable(cause, 'tokengate');

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({
      message:
        'DynamoDB table "tokengate" was not found. Create the table using your infrastructure, or pass ensureTableExists: true.',
      cause,
    });
  });

  it('passes other errors through', () => {
    const other = new Error('throttled');

    expect(describeMissingTable(other, 'tokengate')).toBe(other);
  });
});

describe('assertDynamoKeyPart', () => {
  it('throws for an empty value', () => {
    expect(() => assertDynamoKeyPart('', 'pk')).toThrow('pk must not be empty');
  });

  describe('control character validation', () => {
    it('throws for a string containing a null character (0x00)', () => {
      expect(() => assertDynamoKeyPart('abc\x00def', 'pk')).toThrow(
        'pk contains unsupported control characters',
      );
    });

    it('throws for a string containing a newline character (0x0a)', () => {
      expect(() => assertDynamoKeyPart('abc\ndef', 'pk')).toThrow(
        'pk contains unsupported control characters',
      );
    });

    it('throws for a string containing the DEL character (0x7f)', () => {
      expect(() => assertDynamoKeyPart('abc\x7fdef', 'pk')).toThrow(
        'pk contains unsupported control characters',
      );
    });

    it('allows a string with character 0x20 (space)', () => {
      expect(() => assertDynamoKeyPart('abc def', 'pk')).not.toThrow();
    });
  });

  it('throws when the value exceeds the byte limit', () => {
    expect(() => assertDynamoKeyPart('é'.repeat(3), 'pk', 5)).toThrow(
      'pk exceeds maximum length of 5 bytes',
    );
  });
});

describe('sortableNumber', () => {
  it('pads to sixteen digits', () => {
    expect(sortableNumber(1_700_000_000_000)).toBe('0001700000000000');
  });

  it('keeps lexical order equal to numeric order', () => {
    const values = [9, 1_000, 85, 1_700_000_000_000];
    const sorted = values.map(sortableNumber).sort();

    expect(sorted).toEqual([9, 85, 1_000, 1_700_000_000_000].map(sortableNumber));
  });
});
