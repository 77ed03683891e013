import type { ServerResponse } from 'http';
import { toHttpError } from '@tokengate/core';

/** What a route answers, before it is written to either surface. */
export interface RouteResponse {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

const JSON_HEADERS = {
  'Content-Type': 'application/json',
  'Cache-Control': 'no-store',
} as const;

export function json(
  data: unknown,
  status: number = 200,
  headers?: Record<string, string>,
): RouteResponse {
  return headers ? { status, body: data, headers } : { status, body: data };
}

export function errorResponse(
  message: string,
  status: number = 500,
): RouteResponse {
  return json({ error: message }, status);
}

/** The one not-found answer, whatever the cause. */
export function notFound(): RouteResponse {
  return errorResponse('Not found', 404);
}

export function methodNotAllowed(): RouteResponse {
  return errorResponse('Method not allowed', 405);
}

export function forbidden(): RouteResponse {
  return errorResponse('Forbidden', 403);
}

export function fromError(error: unknown): RouteResponse {
  const { status, body, headers } = toHttpError(error);
  return json(body, status, headers);
}

export function sendJson(
  res: ServerResponse,
  data: unknown,
  status: number = 200,
  headers: Record<string, string> = {},
): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    ...JSON_HEADERS,
    ...headers,
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

export function sendResponse(res: ServerResponse, response: RouteResponse) {
  sendJson(res, response.body, response.status, response.headers);
}

export function toWebResponse(response: RouteResponse): Response {
  return new Response(JSON.stringify(response.body), {
    status: response.status,
    headers: { ...JSON_HEADERS, ...response.headers },
  });
}
