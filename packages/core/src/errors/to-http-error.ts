import { GatewayError, RateLimitedError } from './gateway-error.js';

export interface HttpErrorResponse {
  status: number;
  body: { error: string; code?: string; retryAfterSeconds?: number };
  headers: Record<string, string>;
}

/**
 * Maps any thrown value onto the status, body and headers an HTTP surface
 * should send. Unknown errors never leak their message.
 */
export function toHttpError(error: unknown): HttpErrorResponse {
  if (!(error instanceof GatewayError)) {
    return {
      status: 500,
      body: { error: 'Internal server error' },
      headers: {},
    };
  }

  switch (error.code) {
    case 'NOT_FOUND':
      return { status: 404, body: { error: 'Not found' }, headers: {} };
    case 'NOT_OWNER':
      return {
        status: 403,
        body: { error: error.message, code: error.code },
        headers: {},
      };
    case 'RATE_LIMITED': {
      const retryAfterSeconds =
        error instanceof RateLimitedError ? error.retryAfterSeconds : 1;
      return {
        status: 429,
        body: { error: error.message, code: error.code, retryAfterSeconds },
        headers: { 'Retry-After': String(retryAfterSeconds) },
      };
    }
    case 'OPERATION_FAILED':
      return {
        status: 502,
        body: { error: error.message, code: error.code },
        headers: {},
      };
    case 'LEDGER_UNAVAILABLE':
      return {
        status: 503,
        body: { error: 'Usage could not be recorded', code: error.code },
        headers: {},
      };
    case 'INVALID_INPUT':
      return {
        status: 400,
        body: { error: error.message, code: error.code },
        headers: {},
      };
    case 'CONFIGURATION':
    case 'INTERNAL':
      return {
        status: 500,
        body: { error: 'Internal server error', code: error.code },
        headers: {},
      };
  }
}
