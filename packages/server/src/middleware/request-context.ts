/**
 * Per-request id and logger.
 *
 * An incoming X-Request-Id is kept when it is a short token of safe
 * characters; anything else is replaced with a fresh UUID. Handlers log
 * through `c.get("logger")`, a child bound to the request id, and one
 * line per request is written when the response is ready.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { matchedRoute } from "./matched-route.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveRequestId(incoming: string | undefined): string {
  return incoming !== undefined && ACCEPTED_REQUEST_ID.test(incoming) ? incoming : randomUUID();
}

export function requestContextMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    const requestId = resolveRequestId(c.req.header(REQUEST_ID_HEADER));
    const requestLogger = logger.child({ requestId });
    c.set("requestId", requestId);
    c.set("logger", requestLogger);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);

    const status = c.res.status;
    const entry = {
      method: c.req.method,
      path: c.req.path,
      route: matchedRoute(c),
      status,
      durationMs: Math.round(performance.now() - start),
    };
    if (status >= 500) {
      requestLogger.warn(entry, "request failed");
    } else {
      requestLogger.info(entry, "request completed");
    }
  };
}
