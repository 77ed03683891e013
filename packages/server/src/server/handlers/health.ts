import { json, type RouteResponse } from '../response-helpers.js';

export function handleHealth(): RouteResponse {
  return json({ status: 'ok' });
}
