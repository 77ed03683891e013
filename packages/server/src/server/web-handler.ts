import { validateServerOptions, type ServerOptions } from '../config.js';
import { createApiRouter } from './api-router.js';
import { createServerContext } from './handlers/context.js';
import { fromFetchRequest } from './request-helpers.js';
import {
  errorResponse,
  notFound,
  toWebResponse,
} from './response-helpers.js';

export type TokengateFetchHandler = (request: Request) => Promise<Response>;

/**
 * The same routes as {@link createMiddleware} for runtimes built on the
 * WHATWG `Request`/`Response` pair.
 */
export function createFetchHandler(
  options: ServerOptions,
): TokengateFetchHandler {
  const opts = validateServerOptions(options);
  const ctx = createServerContext(opts);
  const apiRouter = createApiRouter(ctx);

  return async (request: Request): Promise<Response> => {
    try {
      const response = await apiRouter(
        fromFetchRequest(request, opts.basePath),
      );
      return toWebResponse(response ?? notFound());
    } catch (error: unknown) {
      ctx.logger.error(
        { err: error, method: request.method },
        'Unhandled request failure',
      );
      return toWebResponse(errorResponse('Internal server error', 500));
    }
  };
}
