import { z } from 'zod';
import { DEFAULT_PRICE_TABLE } from '../ledger/cost-estimator.js';
import { DEFAULT_MAX_ERROR_MESSAGE_LENGTH } from '../ledger/usage-ledger.js';
import { DEFAULT_SHARE_TTL_MS } from '../share/share-registry.js';
import { MIN_TOKEN_BYTES } from '../tokens/token-generator.js';

const OPERATION_CLASS_REGEX = /^[a-z0-9_]+$/;

export type FailurePolicy = 'deny' | 'allow';
export type LedgerWriteMode = 'blocking' | 'deferred';

export interface OperationClassConfig {
  limit: number;
  windowMs: number;
  /** Billed classes fail closed and ledger synchronously by default. */
  billed: boolean;
  /** What the rate limiter answers when its store is unreachable. */
  onStoreError: FailurePolicy;
  ledgerWrite: LedgerWriteMode;
  /** Further classes whose quota an invocation must also pass. */
  alsoRequires: Array<string>;
}

const OperationClassSchema = z
  .object({
    limit: z.number().int().nonnegative(),
    windowMs: z.number().int().positive(),
    billed: z.boolean().default(false),
    onStoreError: z.enum(['deny', 'allow']).optional(),
    ledgerWrite: z.enum(['blocking', 'deferred']).optional(),
    alsoRequires: z.array(z.string()).default([]),
  })
  .transform(
    (value): OperationClassConfig => ({
      limit: value.limit,
      windowMs: value.windowMs,
      billed: value.billed,
      onStoreError: value.onStoreError ?? (value.billed ? 'deny' : 'allow'),
      ledgerWrite:
        value.ledgerWrite ?? (value.billed ? 'blocking' : 'deferred'),
      alsoRequires: value.alsoRequires,
    }),
  );

export type OperationClassInput = z.input<typeof OperationClassSchema>;

const HOUR_MS = 3_600_000;

export const DEFAULT_OPERATION_CLASSES: Record<string, OperationClassInput> = {
  ai_generation: {
    limit: 10,
    windowMs: HOUR_MS,
    billed: true,
    alsoRequires: ['user'],
  },
  ai_rewrite: {
    limit: 30,
    windowMs: HOUR_MS,
    billed: true,
    alsoRequires: ['user'],
  },
  user: { limit: 100, windowMs: HOUR_MS },
};

const ModelPriceSchema = z.object({
  prefix: z.string().min(1),
  inputPer1k: z.number().nonnegative(),
  outputPer1k: z.number().nonnegative(),
});

const GovernanceConfigSchema = z
  .object({
    operationClasses: z
      .record(
        z
          .string()
          .regex(
            OPERATION_CLASS_REGEX,
            'Operation class names must be lowercase snake_case',
          ),
        OperationClassSchema,
      )
      .default(() => ({ ...DEFAULT_OPERATION_CLASSES })),
    share: z
      .object({
        defaultTtlMs: z
          .number()
          .int()
          .positive()
          .nullable()
          .default(DEFAULT_SHARE_TTL_MS),
        tokenBytes: z.number().int().min(MIN_TOKEN_BYTES).default(MIN_TOKEN_BYTES),
      })
      .default({}),
    pricing: z
      .array(ModelPriceSchema)
      .default(() => DEFAULT_PRICE_TABLE.map((price) => ({ ...price }))),
    ledger: z
      .object({
        maxErrorMessageLength: z
          .number()
          .int()
          .positive()
          .default(DEFAULT_MAX_ERROR_MESSAGE_LENGTH),
        deferredRetries: z.number().int().nonnegative().default(3),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    for (const [name, operationClass] of Object.entries(
      config.operationClasses,
    )) {
      for (const required of operationClass.alsoRequires) {
        if (!(required in config.operationClasses)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['operationClasses', name, 'alsoRequires'],
            message: `Unknown operation class "${required}"`,
          });
        }
      }
    }
  });

export type GovernanceConfigInput = z.input<typeof GovernanceConfigSchema>;
export type GovernanceConfig = z.output<typeof GovernanceConfigSchema>;

export function validateGovernanceConfig(
  input: GovernanceConfigInput = {},
): GovernanceConfig {
  return GovernanceConfigSchema.parse(input);
}
