import {
  createGovernance,
  validateGovernanceConfig,
  type RateLimiter,
  type ShareRegistry,
  type UsageLedger,
} from '@tokengate/core';
import {
  createStaticResourceDirectory,
  silentLogger,
  type StaticResourceDirectory,
} from '@tokengate/core/testing';
import { createInMemoryStores, type InMemoryStores } from '@tokengate/store-memory';
import type { ServerOptions } from './config.js';

export const ADMIN_HEADER = 'x-staff-token';
export const ADMIN_TOKEN = 'test-secret';

export interface ServerFixture {
  stores: InMemoryStores;
  resources: StaticResourceDirectory;
  shareRegistry: ShareRegistry;
  rateLimiter: RateLimiter;
  ledger: UsageLedger;
  options: ServerOptions;
}

/**
 * Wires the three services over in-memory stores, with one resume and one
 * cover letter owned by `user-1`. Admin requests pass when they carry
 * {@link ADMIN_HEADER} set to {@link ADMIN_TOKEN}.
 */
export function createServerFixture(
  overrides: Partial<ServerOptions> = {},
): ServerFixture {
  const logger = silentLogger();
  const stores = createInMemoryStores();
  const resources = createStaticResourceDirectory({
    resume: { 'resume-1': 'user-1' },
    cover_letter: { 'letter-1': 'user-1' },
  });

  const { shareRegistry, rateLimiter, ledger } = createGovernance({
    config: validateGovernanceConfig(),
    stores,
    resources,
    logger,
  });

  const options: ServerOptions = {
    shareRegistry,
    rateLimiter,
    ledger,
    renderers: {
      resume: {
        render: async (resourceId) => ({ kind: 'resume', id: resourceId }),
      },
      cover_letter: {
        render: async (resourceId) => ({ kind: 'cover_letter', id: resourceId }),
      },
    },
    authorize: (request) => request.header(ADMIN_HEADER) === ADMIN_TOKEN,
    logger,
    ...overrides,
  };

  return { stores, resources, shareRegistry, rateLimiter, ledger, options };
}
