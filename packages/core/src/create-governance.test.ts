import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  createInMemoryStores,
  type InMemoryStores,
} from '@tokengate/store-memory';
import { loadGovernanceConfigFromEnv } from './config/env.js';
import { validateGovernanceConfig } from './config/governance-config.js';
import { createGovernance } from './create-governance.js';
import {
  createMockOperation,
  createStaticResourceDirectory,
  silentLogger,
} from './testing/index.js';

const owner = { id: 'user-1' };

describe('createGovernance', () => {
  let stores: InMemoryStores;

  function build(config = validateGovernanceConfig()) {
    stores = createInMemoryStores();
    return createGovernance({
      config,
      stores,
      resources: createStaticResourceDirectory({
        resume: { 'resume-1': 'user-1' },
      }),
      logger: silentLogger(),
    });
  }

  afterEach(() => {
    stores.destroy();
  });

  it('should mint tokens of the configured byte length', async () => {
    const { shareRegistry } = build(
      loadGovernanceConfigFromEnv({ TOKENGATE_TOKEN_BYTES: '48' }),
    );

    const link = await shareRegistry.createOrGetLink(
      'resume',
      'resume-1',
      owner,
    );

    expect(link.token).toHaveLength(64);
  });

  it('should apply the configured default lifetime', async () => {
    const { shareRegistry } = build(
      loadGovernanceConfigFromEnv({ TOKENGATE_SHARE_TTL_DAYS: '0' }),
    );

    const link = await shareRegistry.createOrGetLink(
      'resume',
      'resume-1',
      owner,
    );

    expect(link.expiresAt).toBeNull();
  });

  it('should price usage and trim errors as configured', async () => {
    const { ledger } = build(
      validateGovernanceConfig({
        pricing: [{ prefix: 'house', inputPer1k: 1, outputPer1k: 2 }],
        ledger: { maxErrorMessageLength: 5 },
      }),
    );

    const record = await ledger.record({
      principalId: 'user-1',
      operationClass: 'ai_generation',
      outcome: 'failure',
      usage: { tokensIn: 1000, tokensOut: 500, model: 'house-1' },
      errorMessage: 'abcdefgh',
    });

    expect(record.cost.estimatedCost).toBe(2);
    expect(record.errorMessage).toBe('abcde');
  });

  it('should retry deferred writes the configured number of times', async () => {
    const { gateway } = build(
      validateGovernanceConfig({ ledger: { deferredRetries: 1 } }),
    );
    const append = vi
      .spyOn(stores.ledger, 'append')
      .mockRejectedValue(new Error('offline'));

    await expect(
      gateway.invoke(
        owner,
        'user',
        createMockOperation({ respond: () => 'ok' }),
        1,
      ),
    ).resolves.toBe('ok');
    await gateway.flush();

    expect(append).toHaveBeenCalledTimes(2);
  });

  it('should apply the configured operation classes', async () => {
    const { rateLimiter } = build(
      loadGovernanceConfigFromEnv({ TOKENGATE_RATE_USER: '1/hour' }),
    );

    await expect(rateLimiter.check('user-1', 'user')).resolves.toMatchObject({
      allowed: true,
    });
    await expect(rateLimiter.check('user-1', 'user')).resolves.toMatchObject({
      allowed: false,
    });
  });
});
