import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  USAGE_OUTCOMES,
} from '@tokengate/core';
import { z } from 'zod';
import { errorResponse, json, type RouteResponse } from '../response-helpers.js';
import type { ServerContext } from './context.js';

const UsageFilterSchema = z.object({
  principalId: z.string().min(1).optional(),
  operationClass: z.string().min(1).optional(),
  outcome: z.enum(USAGE_OUTCOMES).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

const UsageListQuerySchema = UsageFilterSchema.extend({
  page: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_PAGE_SIZE)
    .default(DEFAULT_PAGE_SIZE),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

export async function handleUsageList(
  ctx: ServerContext,
  query: URLSearchParams,
): Promise<RouteResponse> {
  const parsed = UsageListQuerySchema.safeParse(Object.fromEntries(query));
  if (!parsed.success) {
    return errorResponse(describeIssues(parsed.error), 400);
  }
  return json(await ctx.ledger.list(parsed.data));
}

export async function handleUsageSummary(
  ctx: ServerContext,
  query: URLSearchParams,
): Promise<RouteResponse> {
  const parsed = UsageFilterSchema.safeParse(Object.fromEntries(query));
  if (!parsed.success) {
    return errorResponse(describeIssues(parsed.error), 400);
  }
  return json(await ctx.ledger.summarize(parsed.data));
}
