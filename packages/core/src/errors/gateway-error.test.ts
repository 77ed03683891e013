import { describe, it, expect } from 'vitest';
import {
  GatewayError,
  NotFoundError,
  OperationFailedError,
  RateLimitedError,
  errorMessage,
} from './gateway-error.js';

describe('GatewayError', () => {
  it('should keep the subclass prototype chain', () => {
    const error = new RateLimitedError('user', 5);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RateLimitedError');
  });

  it('should word store-unavailable denials differently', () => {
    expect(new RateLimitedError('ai_generation', 30, 'store_unavailable').message).toBe(
      'Rate limiting for "ai_generation" is temporarily unavailable',
    );
  });

  it('should use a fixed message for NotFound', () => {
    expect(new NotFoundError().message).toBe('Not found');
  });

  it('should describe each operation failure reason', () => {
    expect(new OperationFailedError('x', 'cancelled').message).toBe(
      'Operation "x" failed: cancelled',
    );
    expect(new OperationFailedError('x', 'provider_error').message).toBe(
      'Operation "x" failed: provider error',
    );
    const cause = new Error('quota exhausted');
    const error = new OperationFailedError('x', 'provider_error', { cause });
    expect(error.message).toBe('Operation "x" failed: quota exhausted');
    expect(error.cause).toBe(cause);
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and strings', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('Unknown error');
  });
});
