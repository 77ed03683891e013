/** Usage an operation reports back, in whatever detail it has. */
export interface OperationUsage {
  tokensIn?: number;
  tokensOut?: number;
  /** Overrides the price-table estimate when the provider reports a cost. */
  estimatedCost?: number;
  model?: string;
}

export interface OperationResult<O> {
  output: O;
  usage?: OperationUsage;
}

export interface OperationContext {
  /** Aborted when the caller cancels or the invocation times out. */
  signal: AbortSignal;
}

/**
 * An expensive call made on a principal's behalf, such as a request to a
 * text-generation provider.
 */
export interface GatedOperation<I, O> {
  invoke(input: I, context: OperationContext): Promise<OperationResult<O>>;
}

/**
 * Thrown by an operation that failed after it had already consumed provider
 * quota, so the partial cost still reaches the ledger.
 */
export class OperationError extends Error {
  public readonly usage?: OperationUsage;

  constructor(
    message: string,
    usage?: OperationUsage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'OperationError';
    this.usage = usage;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
