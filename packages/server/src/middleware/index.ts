/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export {
  requestContextMiddleware,
  resolveRequestId,
  REQUEST_ID_HEADER,
} from "./request-context.js";
export { matchedRoute, UNMATCHED_ROUTE } from "./matched-route.js";
