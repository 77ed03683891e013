import { describe, it, expect } from 'vitest';
import * as dynamodb from './index.js';

describe('store-dynamodb index exports', () => {
  it('re-exports store classes and the factory', () => {
    expect(dynamodb.DynamoDBShareLinkStore).toBeTypeOf('function');
    expect(dynamodb.DynamoDBRateLimitStore).toBeTypeOf('function');
    expect(dynamodb.DynamoDBUsageLedgerStore).toBeTypeOf('function');
    expect(dynamodb.createDynamoDBStores).toBeTypeOf('function');
  });

  it('re-exports table helpers', () => {
    expect(dynamodb.DEFAULT_TABLE_NAME).toBe('tokengate');
    expect(dynamodb.ensureTable).toBeTypeOf('function');
  });
});
