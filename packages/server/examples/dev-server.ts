import { createGovernance, loadGovernanceConfigFromEnv } from '@tokengate/core';
import {
  createMockOperation,
  createStaticResourceDirectory,
} from '@tokengate/core/testing';
import { createInMemoryStores } from '@tokengate/store-memory';
import { startServer } from '../src/index.js';

// No provider key here: the mock operation stands in for the generator.
const config = loadGovernanceConfigFromEnv();
const stores = createInMemoryStores();
const resources = createStaticResourceDirectory({
  resume: { 'resume-1': 'user-1' },
  cover_letter: { 'letter-1': 'user-1' },
});

const { shareRegistry, rateLimiter, ledger, gateway } = createGovernance({
  config,
  stores,
  resources,
});

const generate = createMockOperation({
  respond: (prompt: string) => `Draft for: ${prompt}`,
  usage: { tokensIn: 120, tokensOut: 480, model: 'gpt-4o-mini' },
});

// Seed some usage and a share link
const owner = { id: 'user-1' };
for (const prompt of ['summary', 'experience', 'skills']) {
  await gateway.invoke(owner, 'ai_generation', generate, prompt);
}
const link = await shareRegistry.createOrGetLink('resume', 'resume-1', owner);

const { url } = await startServer({
  shareRegistry,
  rateLimiter,
  ledger,
  renderers: {
    resume: {
      render: async (resourceId) => ({ id: resourceId, headline: 'Engineer' }),
    },
    cover_letter: {
      render: async (resourceId) => ({ id: resourceId, body: 'Dear team,' }),
    },
  },
  authorize: (request) => request.header('x-staff-token') === 'dev-token',
  port: 4000,
});

console.log(`Shared resume: ${url}/public/r/${link.token}`);
console.log(`Usage: curl -H 'x-staff-token: dev-token' ${url}/api/admin/usage`);
