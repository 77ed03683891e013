import type { IncomingMessage, ServerResponse } from 'http';
import { validateServerOptions, type ServerOptions } from '../config.js';
import { createApiRouter } from './api-router.js';
import { createServerContext } from './handlers/context.js';
import { fromIncomingMessage } from './request-helpers.js';
import {
  errorResponse,
  notFound,
  sendResponse,
} from './response-helpers.js';

export type TokengateMiddleware = (
  req: IncomingMessage,
  res: ServerResponse,
  next?: () => void,
) => void;

/**
 * Node `http` middleware serving the public share routes and the admin API.
 * Paths it does not own go to `next` when given, otherwise answer 404.
 */
export function createMiddleware(options: ServerOptions): TokengateMiddleware {
  const opts = validateServerOptions(options);
  const ctx = createServerContext(opts);
  const apiRouter = createApiRouter(ctx);

  return (req, res, next) => {
    const request = fromIncomingMessage(req, opts.basePath);

    apiRouter(request)
      .then((response) => {
        if (response) {
          sendResponse(res, response);
        } else if (next) {
          next();
        } else {
          sendResponse(res, notFound());
        }
      })
      /* v8 ignore start -- the router turns handler errors into responses */
      .catch((error: unknown) => {
        ctx.logger.error(
          { err: error, method: request.method },
          'Unhandled request failure',
        );
        sendResponse(res, errorResponse('Internal server error', 500));
      });
    /* v8 ignore stop */
  };
}
