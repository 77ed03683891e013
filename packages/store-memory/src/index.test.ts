import { describe, it, expect } from 'vitest';
import * as memory from './index.js';

describe('store-memory index exports', () => {
  it('re-exports in-memory store classes', () => {
    expect(memory.InMemoryShareLinkStore).toBeTypeOf('function');
    expect(memory.InMemoryRateLimitStore).toBeTypeOf('function');
    expect(memory.InMemoryUsageLedgerStore).toBeTypeOf('function');
    expect(memory.createInMemoryStores).toBeTypeOf('function');
  });
});
