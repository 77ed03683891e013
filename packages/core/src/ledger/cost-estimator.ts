import type { OperationUsage } from '../gateway/operation.js';
import type { UsageCost } from '../types/usage-record.js';

/** Prices per 1000 tokens for models whose name starts with `prefix`. */
export interface ModelPrice {
  prefix: string;
  inputPer1k: number;
  outputPer1k: number;
}

export const DEFAULT_PRICE_TABLE: ReadonlyArray<ModelPrice> = [
  { prefix: 'gpt-4', inputPer1k: 0.03, outputPer1k: 0.06 },
  { prefix: 'gpt-3.5', inputPer1k: 0.0005, outputPer1k: 0.0015 },
];

export function estimateCost(
  model: string | undefined,
  tokensIn: number,
  tokensOut: number,
  priceTable: ReadonlyArray<ModelPrice> = DEFAULT_PRICE_TABLE,
): number {
  if (!model) {
    return 0;
  }
  const price = priceTable.find((entry) => model.startsWith(entry.prefix));
  if (!price) {
    return 0;
  }
  return (tokensIn * price.inputPer1k + tokensOut * price.outputPer1k) / 1000;
}

/**
 * Turns whatever an operation reported into a complete cost. A reported
 * `estimatedCost` wins over the price table.
 */
export function normalizeUsage(
  usage: OperationUsage | undefined,
  priceTable: ReadonlyArray<ModelPrice> = DEFAULT_PRICE_TABLE,
): UsageCost {
  const tokensIn = nonNegative(usage?.tokensIn);
  const tokensOut = nonNegative(usage?.tokensOut);
  const estimatedCost =
    usage?.estimatedCost !== undefined
      ? nonNegative(usage.estimatedCost)
      : estimateCost(usage?.model, tokensIn, tokensOut, priceTable);

  return { tokensIn, tokensOut, estimatedCost };
}

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}
