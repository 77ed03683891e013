import type { IncomingMessage } from 'http';

/** Surface-neutral view of an incoming request. */
export interface RouteRequest {
  method: string;
  /** Path with the mount point already removed. */
  pathname: string;
  query: URLSearchParams;
  header(name: string): string | undefined;
}

export function parseUrl(
  rawUrl: string | undefined,
  basePath: string,
): { pathname: string; query: URLSearchParams } {
  const url = new URL(rawUrl ?? '/', 'http://localhost');

  let pathname = url.pathname;
  if (
    basePath !== '/' &&
    pathname.startsWith(basePath) &&
    (pathname.length === basePath.length || pathname[basePath.length] === '/')
  ) {
    pathname = pathname.slice(basePath.length) || '/';
  }

  return { pathname, query: url.searchParams };
}

export function fromIncomingMessage(
  req: IncomingMessage,
  basePath: string,
): RouteRequest {
  const { pathname, query } = parseUrl(req.url, basePath);
  return {
    /* v8 ignore next -- req.method is always present in Node.js HTTP */
    method: req.method?.toUpperCase() ?? 'GET',
    pathname,
    query,
    header(name) {
      const value = req.headers[name.toLowerCase()];
      return Array.isArray(value) ? value.join(', ') : value;
    },
  };
}

export function fromFetchRequest(
  request: Request,
  basePath: string,
): RouteRequest {
  const { pathname, query } = parseUrl(request.url, basePath);
  return {
    method: request.method.toUpperCase(),
    pathname,
    query,
    header(name) {
      return request.headers.get(name) ?? undefined;
    },
  };
}

/**
 * Matches `pathname` against a pattern like
 * `/api/admin/rate-limits/:principalId/:operationClass` and returns the
 * decoded parameters. Empty or undecodable segments never match.
 */
export function extractParams(
  pathname: string,
  pattern: string,
): Record<string, string> | undefined {
  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');

  if (patternParts.length !== pathParts.length) return undefined;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const pp = patternParts[i] ?? '';
    const part = pathParts[i] ?? '';

    if (!pp.startsWith(':')) {
      if (pp !== part) return undefined;
      continue;
    }

    if (part === '') return undefined;
    try {
      params[pp.slice(1)] = decodeURIComponent(part);
    } catch {
      return undefined;
    }
  }

  return params;
}
