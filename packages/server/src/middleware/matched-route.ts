/**
 * Route pattern of the handler that answered a request.
 */

import type { Context } from "hono";
import { routePath } from "hono/route";

/** Label for requests no route matched */
export const UNMATCHED_ROUTE = "unmatched";

/**
 * Read after `next()`: the pattern of the last handler dispatched
 * (e.g. `/block/:hash`), or UNMATCHED_ROUTE when only the global
 * middleware ran.
 */
export function matchedRoute(c: Context): string {
  const pattern = routePath(c);
  return pattern === "*" || pattern === "/*" ? UNMATCHED_ROUTE : pattern;
}
