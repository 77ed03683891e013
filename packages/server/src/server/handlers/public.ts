import { NotFoundError, type ResourceType } from '@tokengate/core';
import { json, notFound, type RouteResponse } from '../response-helpers.js';
import type { ServerContext } from './context.js';

/** Path segment after `/public/` for each shareable resource type. */
export const PUBLIC_ROUTE_TYPES: ReadonlyMap<string, ResourceType> = new Map<
  string,
  ResourceType
>([
  ['r', 'resume'],
  ['c', 'cover_letter'],
]);

/**
 * Serves the public view of a shared resource. Any failure, including a
 * broken store or renderer, answers with the same 404 so a caller cannot
 * tell an unknown token from a revoked, expired or mistyped one.
 */
export async function handlePublicRead(
  ctx: ServerContext,
  resourceType: ResourceType,
  token: string,
): Promise<RouteResponse> {
  try {
    const { resourceId } = await ctx.shareRegistry.resolve(token, resourceType);
    const view = await ctx.renderers[resourceType].render(resourceId);
    return view === undefined ? notFound() : json(view);
  } catch (error: unknown) {
    if (!(error instanceof NotFoundError)) {
      ctx.logger.error({ err: error, resourceType }, 'Public share read failed');
    }
    return notFound();
  }
}
