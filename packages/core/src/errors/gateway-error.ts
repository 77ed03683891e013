export type GatewayErrorCode =
  | 'NOT_OWNER'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'OPERATION_FAILED'
  | 'LEDGER_UNAVAILABLE'
  | 'INVALID_INPUT'
  | 'CONFIGURATION'
  | 'INTERNAL';

export interface GatewayErrorOptions {
  /** Underlying error, exposed as the standard `cause` property. */
  cause?: unknown;
}

/**
 * Base error class for governance failures.
 * Callers switch on `code` rather than on the subclass.
 */
export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;

  constructor(
    message: string,
    code: GatewayErrorCode,
    options?: GatewayErrorOptions,
  ) {
    super(
      message,
      options?.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = 'GatewayError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotOwnerError extends GatewayError {
  constructor(
    message = 'Only the owner may manage share links for this resource',
  ) {
    super(message, 'NOT_OWNER');
    this.name = 'NotOwnerError';
  }
}

/**
 * Raised for every unresolvable share token. The message is fixed so that
 * missing, revoked and expired tokens cannot be told apart.
 */
export class NotFoundError extends GatewayError {
  constructor() {
    super('Not found', 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export type RateLimitDenialReason = 'limit_exceeded' | 'store_unavailable';

export class RateLimitedError extends GatewayError {
  public readonly operationClass: string;
  /** Whole seconds the caller should wait before retrying. */
  public readonly retryAfterSeconds: number;
  public readonly reason: RateLimitDenialReason;

  constructor(
    operationClass: string,
    retryAfterSeconds: number,
    reason: RateLimitDenialReason = 'limit_exceeded',
  ) {
    super(
      reason === 'store_unavailable'
        ? `Rate limiting for "${operationClass}" is temporarily unavailable`
        : `Rate limit exceeded for "${operationClass}"; retry in ${retryAfterSeconds}s`,
      'RATE_LIMITED',
    );
    this.name = 'RateLimitedError';
    this.operationClass = operationClass;
    this.retryAfterSeconds = retryAfterSeconds;
    this.reason = reason;
  }
}

export type OperationFailureReason = 'provider_error' | 'timeout' | 'cancelled';

export class OperationFailedError extends GatewayError {
  public readonly operationClass: string;
  public readonly reason: OperationFailureReason;

  constructor(
    operationClass: string,
    reason: OperationFailureReason,
    options?: GatewayErrorOptions,
  ) {
    super(
      `Operation "${operationClass}" failed: ${describeFailure(reason, options?.cause)}`,
      'OPERATION_FAILED',
      options,
    );
    this.name = 'OperationFailedError';
    this.operationClass = operationClass;
    this.reason = reason;
  }
}

export interface LedgerUnavailableErrorOptions extends GatewayErrorOptions {
  /** The error the caller would have received had the write succeeded. */
  outcomeError?: GatewayError;
}

export class LedgerUnavailableError extends GatewayError {
  public readonly outcomeError?: GatewayError;

  constructor(message: string, options?: LedgerUnavailableErrorOptions) {
    super(message, 'LEDGER_UNAVAILABLE', options);
    this.name = 'LedgerUnavailableError';
    this.outcomeError = options?.outcomeError;
  }
}

export class InvalidInputError extends GatewayError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class GatewayInternalError extends GatewayError {
  constructor(message: string, options?: GatewayErrorOptions) {
    super(message, 'INTERNAL', options);
    this.name = 'GatewayInternalError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

function describeFailure(
  reason: OperationFailureReason,
  cause: unknown,
): string {
  switch (reason) {
    case 'timeout':
      return 'timed out';
    case 'cancelled':
      return 'cancelled';
    case 'provider_error':
      return cause === undefined ? 'provider error' : errorMessage(cause);
  }
}
