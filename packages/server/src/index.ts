export { createMiddleware } from './server/middleware.js';
export type { TokengateMiddleware } from './server/middleware.js';
export { createFetchHandler } from './server/web-handler.js';
export type { TokengateFetchHandler } from './server/web-handler.js';
export { startServer } from './server/standalone.js';
export type { StandaloneServer } from './server/standalone.js';
export { PUBLIC_ROUTE_TYPES } from './server/handlers/public.js';
export type { RouteRequest } from './server/request-helpers.js';
export { validateServerOptions, validateStandaloneOptions } from './config.js';
export type {
  AuthorizeAdmin,
  PublicRenderer,
  PublicRenderers,
  ServerOptions,
  StandaloneServerOptions,
} from './config.js';
