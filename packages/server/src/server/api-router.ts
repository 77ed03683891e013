import type { ServerContext } from './handlers/context.js';
import { handleHealth } from './handlers/health.js';
import { PUBLIC_ROUTE_TYPES, handlePublicRead } from './handlers/public.js';
import {
  handleRateLimitStatus,
  handleResetRateLimit,
} from './handlers/rate-limit.js';
import { handleUsageList, handleUsageSummary } from './handlers/usage.js';
import { extractParams, type RouteRequest } from './request-helpers.js';
import {
  forbidden,
  fromError,
  methodNotAllowed,
  notFound,
  type RouteResponse,
} from './response-helpers.js';

/** Resolves to `undefined` when the path belongs to neither surface. */
export type ApiRouter = (
  request: RouteRequest,
) => Promise<RouteResponse | undefined>;

const RATE_LIMIT_ROUTE = '/api/admin/rate-limits/:principalId/:operationClass';

export function createApiRouter(ctx: ServerContext): ApiRouter {
  return async (request) => {
    const { method, pathname } = request;

    if (pathname.startsWith('/public/')) {
      return routePublic(ctx, request);
    }

    try {
      if (pathname === '/api/health') {
        return method === 'GET' ? handleHealth() : methodNotAllowed();
      }

      if (pathname === '/api/admin' || pathname.startsWith('/api/admin/')) {
        return await routeAdmin(ctx, request);
      }
    } catch (error: unknown) {
      const response = fromError(error);
      if (response.status >= 500) {
        ctx.logger.error({ err: error, method, pathname }, 'Request failed');
      }
      return response;
    }

    if (pathname.startsWith('/api/')) {
      return notFound();
    }

    return undefined;
  };
}

async function routePublic(
  ctx: ServerContext,
  request: RouteRequest,
): Promise<RouteResponse> {
  const params = extractParams(request.pathname, '/public/:kind/:token');
  const resourceType =
    params?.['kind'] === undefined
      ? undefined
      : PUBLIC_ROUTE_TYPES.get(params['kind']);
  const token = params?.['token'];

  if (resourceType === undefined || token === undefined) {
    return notFound();
  }
  if (request.method !== 'GET') {
    return methodNotAllowed();
  }
  return handlePublicRead(ctx, resourceType, token);
}

async function routeAdmin(
  ctx: ServerContext,
  request: RouteRequest,
): Promise<RouteResponse> {
  if (!(await ctx.authorize(request))) {
    return forbidden();
  }

  const { method, pathname, query } = request;

  if (pathname === '/api/admin/usage') {
    return method === 'GET' ? handleUsageList(ctx, query) : methodNotAllowed();
  }

  if (pathname === '/api/admin/usage/summary') {
    return method === 'GET'
      ? handleUsageSummary(ctx, query)
      : methodNotAllowed();
  }

  const resetParams = extractParams(pathname, `${RATE_LIMIT_ROUTE}/reset`);
  if (resetParams) {
    return method === 'POST'
      ? handleResetRateLimit(ctx, resetParams)
      : methodNotAllowed();
  }

  const statusParams = extractParams(pathname, RATE_LIMIT_ROUTE);
  if (statusParams) {
    return method === 'GET'
      ? handleRateLimitStatus(ctx, statusParams)
      : methodNotAllowed();
  }

  return notFound();
}
