import {
  RateLimiter,
  ShareRegistry,
  UsageLedger,
  type ResourceType,
} from '@tokengate/core';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { RouteRequest } from './server/request-helpers.js';

export interface PublicRenderer {
  /**
   * Public representation of a shared resource. Resolve to `undefined` when
   * the resource has nothing to show; the route then answers 404.
   */
  render(resourceId: string): Promise<unknown>;
}

export type PublicRenderers = Readonly<Record<ResourceType, PublicRenderer>>;

/** Staff check run before every admin route. */
export type AuthorizeAdmin = (
  request: RouteRequest,
) => boolean | Promise<boolean>;

const BASE_PATH_REGEX = /^\/[a-zA-Z0-9/_-]*$/;

const RendererSchema = z.custom<PublicRenderer>(
  (val) =>
    val != null &&
    typeof val === 'object' &&
    'render' in val &&
    typeof val.render === 'function',
  'Must be a PublicRenderer',
);

export const ServerOptionsSchema = z.object({
  shareRegistry: z.instanceof(ShareRegistry, {
    message: 'Must be a ShareRegistry instance',
  }),
  rateLimiter: z.instanceof(RateLimiter, {
    message: 'Must be a RateLimiter instance',
  }),
  ledger: z.instanceof(UsageLedger, {
    message: 'Must be a UsageLedger instance',
  }),
  renderers: z.object({
    resume: RendererSchema,
    cover_letter: RendererSchema,
  }),
  authorize: z.custom<AuthorizeAdmin>(
    (val) => typeof val === 'function',
    'authorize must be a function',
  ),
  basePath: z
    .string()
    .regex(BASE_PATH_REGEX, 'basePath must be an absolute URL path')
    .default('/')
    .transform((path) =>
      path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path,
    ),
  logger: z
    .custom<Logger>(
      (val) =>
        val != null &&
        typeof val === 'object' &&
        'info' in val &&
        'error' in val,
      'Must be a pino Logger',
    )
    .optional(),
});

const StandaloneServerOptionsSchema = ServerOptionsSchema.extend({
  port: z.number().int().nonnegative().default(4000),
  host: z.string().default('localhost'),
});

export type ServerOptions = z.input<typeof ServerOptionsSchema>;
export type ResolvedServerOptions = z.output<typeof ServerOptionsSchema>;
export type StandaloneServerOptions = z.input<
  typeof StandaloneServerOptionsSchema
>;

export function validateServerOptions(
  options: ServerOptions,
): ResolvedServerOptions {
  return ServerOptionsSchema.parse(options);
}

export function validateStandaloneOptions(options: StandaloneServerOptions) {
  return StandaloneServerOptionsSchema.parse(options);
}
