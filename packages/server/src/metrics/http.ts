/**
 * HTTP side of the metrics: the recording middleware and GET /metrics.
 */

import { Hono } from "hono";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { matchedRoute } from "../middleware/matched-route.js";
import type { ExplorerMetrics } from "./explorer-metrics.js";

const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export function metricsMiddleware(metrics: ExplorerMetrics): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    metrics.recordRequest(c.req.method, matchedRoute(c), c.res.status, performance.now() - start);
  };
}

export function createMetricsRoute(metrics: ExplorerMetrics): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) =>
    c.text(metrics.render(), 200, { "Content-Type": PROMETHEUS_CONTENT_TYPE }),
  );

  return routes;
}
