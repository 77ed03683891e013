import {
  ResourceNotFoundException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  BatchWriteCommand,
  QueryCommand,
  ScanCommand,
  type DynamoDBDocumentClient,
  type QueryCommandInput,
  type ScanCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { getRetryDelayMs, sleep } from '@tokengate/core';

type DynamoItem = Record<string, unknown>;

const MAX_BATCH_WRITE_RETRIES = 8;
const MAX_DYNAMO_KEY_PART_BYTES = 512;

/** Width that keeps epoch milliseconds sorting correctly as strings. */
const SORTABLE_NUMBER_WIDTH = 16;

export async function batchDeleteWithRetries(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: Array<DynamoItem>,
): Promise<void> {
  for (let i = 0; i < keys.length; i += 25) {
    const batch = keys.slice(i, i + 25);

    let pendingWrites = batch.map((key) => ({ DeleteRequest: { Key: key } }));

    for (let attempt = 0; pendingWrites.length > 0; attempt++) {
      const response = await docClient.send(
        new BatchWriteCommand({
          RequestItems: {
            [tableName]: pendingWrites,
          },
        }),
      );

      const unprocessed = response.UnprocessedItems?.[tableName] ?? [];

      if (unprocessed.length === 0) {
        break;
      }

      if (attempt >= MAX_BATCH_WRITE_RETRIES) {
        throw new Error(
          `Failed to delete all items from table "${tableName}" after ${MAX_BATCH_WRITE_RETRIES + 1} attempts`,
        );
      }

      pendingWrites = unprocessed
        .map((request) => request.DeleteRequest?.Key)
        .filter((key): key is DynamoItem => Boolean(key))
        .map((key) => ({ DeleteRequest: { Key: key } }));
      await sleep(getRetryDelayMs(attempt));
    }
  }
}

export async function queryItemsAllPages(
  docClient: DynamoDBDocumentClient,
  input: QueryCommandInput,
): Promise<Array<DynamoItem>> {
  const items: Array<DynamoItem> = [];
  let lastEvaluatedKey: DynamoItem | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        ...input,
        ExclusiveStartKey: lastEvaluatedKey,
      }),
    );

    if (result.Items?.length) {
      items.push(...result.Items);
    }

    lastEvaluatedKey = result.LastEvaluatedKey;
  } while (lastEvaluatedKey);

  return items;
}

export async function scanItemsAllPages(
  docClient: DynamoDBDocumentClient,
  input: ScanCommandInput,
): Promise<Array<DynamoItem>> {
  const items: Array<DynamoItem> = [];
  let lastEvaluatedKey: DynamoItem | undefined;

  do {
    const result = await docClient.send(
      new ScanCommand({
        ...input,
        ExclusiveStartKey: lastEvaluatedKey,
      }),
    );

    if (result.Items?.length) {
      items.push(...result.Items);
    }

    lastEvaluatedKey = result.LastEvaluatedKey;
  } while (lastEvaluatedKey);

  return items;
}

/**
 * Per-item cancellation codes of a failed `TransactWriteItems`, in request
 * order. `undefined` when the error is not a transaction cancellation.
 */
export function cancellationCodes(
  error: unknown,
): Array<string | undefined> | undefined {
  if (!(error instanceof TransactionCanceledException)) {
    return undefined;
  }
  return (error.CancellationReasons ?? []).map((reason) => reason.Code);
}

export function isConditionalTransactionFailure(error: unknown): boolean {
  return (
    cancellationCodes(error)?.some(
      (code) => code === 'ConditionalCheckFailed',
    ) ?? false
  );
}

/**
 * Swaps the SDK's bare "resource not found" for one that names the table.
 */
export function describeMissingTable(error: unknown, tableName: string): unknown {
  if (error instanceof ResourceNotFoundException) {
    return new Error(
      `DynamoDB table "${tableName}" was not found. Create the table using your infrastructure, or pass ensureTableExists: true.`,
      { cause: error },
    );
  }
  return error;
}

export function assertDynamoKeyPart(
  value: string,
  label: string,
  maxBytes = MAX_DYNAMO_KEY_PART_BYTES,
): void {
  if (value.length === 0) {
    throw new Error(`${label} must not be empty`);
  }

  for (let i = 0; i < value.length; i++) {
    const charCode = value.charCodeAt(i);
    if (charCode < 0x20 || charCode === 0x7f) {
      throw new Error(`${label} contains unsupported control characters`);
    }
  }

  if (Buffer.byteLength(value, 'utf8') > maxBytes) {
    throw new Error(`${label} exceeds maximum length of ${maxBytes} bytes`);
  }
}

/** Zero-pads a non-negative integer so lexical order matches numeric order. */
export function sortableNumber(value: number): string {
  return Math.max(0, Math.trunc(value))
    .toString()
    .padStart(SORTABLE_NUMBER_WIDTH, '0');
}
