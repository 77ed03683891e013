import {
  LedgerUnavailableError,
  NotFoundError,
  RateLimitedError,
} from '@tokengate/core';
import { describe, it, expect } from 'vitest';
import {
  errorResponse,
  forbidden,
  fromError,
  json,
  methodNotAllowed,
  notFound,
  toWebResponse,
} from './response-helpers.js';

describe('json', () => {
  it('should default to 200 without extra headers', () => {
    expect(json({ hello: 'world' })).toEqual({
      status: 200,
      body: { hello: 'world' },
    });
  });

  it('should carry a status and headers', () => {
    expect(json({ a: 1 }, 429, { 'Retry-After': '5' })).toEqual({
      status: 429,
      body: { a: 1 },
      headers: { 'Retry-After': '5' },
    });
  });
});

describe('error responses', () => {
  it('errorResponse should default to 500', () => {
    expect(errorResponse('boom')).toEqual({
      status: 500,
      body: { error: 'boom' },
    });
  });

  it('notFound should send the generic message', () => {
    expect(notFound()).toEqual({ status: 404, body: { error: 'Not found' } });
  });

  it('methodNotAllowed should send 405', () => {
    expect(methodNotAllowed()).toEqual({
      status: 405,
      body: { error: 'Method not allowed' },
    });
  });

  it('forbidden should send 403', () => {
    expect(forbidden()).toEqual({ status: 403, body: { error: 'Forbidden' } });
  });
});

describe('fromError', () => {
  it('should map NotFoundError to the generic 404', () => {
    expect(fromError(new NotFoundError())).toEqual({
      status: 404,
      body: { error: 'Not found' },
      headers: {},
    });
  });

  it('should map a ledger outage to 503', () => {
    const response = fromError(new LedgerUnavailableError('write failed'));
    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      error: 'Usage could not be recorded',
      code: 'LEDGER_UNAVAILABLE',
    });
  });

  it('should carry Retry-After for rate-limit denials', () => {
    const response = fromError(
      new RateLimitedError('ai_generation', 42),
    );
    expect(response.status).toBe(429);
    expect(response.headers).toEqual({ 'Retry-After': '42' });
  });

  it('should hide the message of unknown errors', () => {
    expect(fromError(new Error('password=test-secret'))).toEqual({
      status: 500,
      body: { error: 'Internal server error' },
      headers: {},
    });
  });
});

describe('toWebResponse', () => {
  it('should serialize the body with JSON headers', async () => {
    const res = toWebResponse(json({ ok: true }, 201));

    expect(res.status).toBe(201);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(await res.text()).toBe('{"ok":true}');
  });

  it('should merge route headers', () => {
    const res = toWebResponse(json({}, 429, { 'Retry-After': '7' }));
    expect(res.headers.get('retry-after')).toBe('7');
  });
});
