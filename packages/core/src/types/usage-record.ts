export const USAGE_OUTCOMES = ['success', 'failure', 'rate_limited'] as const;

export type UsageOutcome = (typeof USAGE_OUTCOMES)[number];

export function isUsageOutcome(value: unknown): value is UsageOutcome {
  return (
    typeof value === 'string' &&
    USAGE_OUTCOMES.some((outcome) => outcome === value)
  );
}

export interface UsageCost {
  tokensIn: number;
  tokensOut: number;
  /** Estimated monetary cost in the price table's currency. */
  estimatedCost: number;
}

export const ZERO_COST: Readonly<UsageCost> = Object.freeze({
  tokensIn: 0,
  tokensOut: 0,
  estimatedCost: 0,
});

/** One immutable ledger row. Exactly one exists per gateway invocation. */
export interface UsageRecord {
  id: string;
  principalId: string;
  operationClass: string;
  timestamp: Date;
  outcome: UsageOutcome;
  cost: UsageCost;
  model?: string;
  errorMessage?: string;
  /** Operation-specific details, opaque to the ledger. */
  metadata: Record<string, unknown>;
}

export interface UsageQuery {
  principalId?: string;
  operationClass?: string;
  outcome?: UsageOutcome;
  /** Inclusive lower bound on `timestamp`. */
  from?: Date;
  /** Inclusive upper bound on `timestamp`. */
  to?: Date;
}

export interface UsageSummary {
  total: number;
  byOutcome: Record<UsageOutcome, number>;
  tokensIn: number;
  tokensOut: number;
  estimatedCost: number;
}

export function matchesUsageQuery(
  record: UsageRecord,
  query: UsageQuery,
): boolean {
  if (
    query.principalId !== undefined &&
    record.principalId !== query.principalId
  ) {
    return false;
  }
  if (
    query.operationClass !== undefined &&
    record.operationClass !== query.operationClass
  ) {
    return false;
  }
  if (query.outcome !== undefined && record.outcome !== query.outcome) {
    return false;
  }
  const time = record.timestamp.getTime();
  if (query.from !== undefined && time < query.from.getTime()) {
    return false;
  }
  if (query.to !== undefined && time > query.to.getTime()) {
    return false;
  }
  return true;
}
