import {
  createLogger,
  type RateLimiter,
  type ShareRegistry,
  type UsageLedger,
} from '@tokengate/core';
import type { Logger } from 'pino';
import type {
  AuthorizeAdmin,
  PublicRenderers,
  ResolvedServerOptions,
} from '../../config.js';

export interface ServerContext {
  shareRegistry: ShareRegistry;
  rateLimiter: RateLimiter;
  ledger: UsageLedger;
  renderers: PublicRenderers;
  authorize: AuthorizeAdmin;
  logger: Logger;
}

export function createServerContext(
  options: ResolvedServerOptions,
): ServerContext {
  return {
    shareRegistry: options.shareRegistry,
    rateLimiter: options.rateLimiter,
    ledger: options.ledger,
    renderers: options.renderers,
    authorize: options.authorize,
    logger: options.logger ?? createLogger('server'),
  };
}
