import { z } from 'zod';
import { InvalidInputError } from '../errors/gateway-error.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | Array<JsonValue>
  | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

/** Metadata every ledger store can persist as JSON. */
export const UsageMetadataSchema = z.record(JsonValueSchema);

export type UsageMetadata = z.infer<typeof UsageMetadataSchema>;

/**
 * Returns a detached copy of `metadata`, or throws `InvalidInputError` when
 * it holds something JSON cannot carry (functions, symbols, `undefined`,
 * non-finite numbers, `Date`s).
 */
export function parseUsageMetadata(
  metadata: Record<string, unknown> | undefined,
): UsageMetadata {
  if (metadata === undefined) {
    return {};
  }
  const result = UsageMetadataSchema.safeParse(metadata);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new InvalidInputError(
      `Usage metadata must be JSON-serialisable (at "${path}")`,
    );
  }
  return result.data;
}
