import { ConfigurationError } from '@tokengate/core';
import { z } from 'zod';
import {
  errorResponse,
  json,
  notFound,
  type RouteResponse,
} from '../response-helpers.js';
import type { ServerContext } from './context.js';

const RateLimitTargetSchema = z.object({
  principalId: z.string().min(1),
  operationClass: z.string().min(1),
});

type RateLimitTarget = z.infer<typeof RateLimitTargetSchema>;

async function withTarget(
  params: Record<string, string>,
  run: (target: RateLimitTarget) => Promise<RouteResponse>,
): Promise<RouteResponse> {
  const parsed = RateLimitTargetSchema.safeParse(params);
  if (!parsed.success) return notFound();

  try {
    return await run(parsed.data);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return errorResponse(
        `Unknown operation class: ${parsed.data.operationClass}`,
        404,
      );
    }
    throw error;
  }
}

export async function handleRateLimitStatus(
  ctx: ServerContext,
  params: Record<string, string>,
): Promise<RouteResponse> {
  return withTarget(params, async ({ principalId, operationClass }) => {
    const status = await ctx.rateLimiter.getStatus(principalId, operationClass);
    return json({ principalId, operationClass, ...status });
  });
}

export async function handleResetRateLimit(
  ctx: ServerContext,
  params: Record<string, string>,
): Promise<RouteResponse> {
  return withTarget(params, async ({ principalId, operationClass }) => {
    await ctx.rateLimiter.reset(principalId, operationClass);
    ctx.logger.info(
      { principalId, operationClass },
      'Rate limit reset by administrator',
    );
    return json({ reset: true });
  });
}
