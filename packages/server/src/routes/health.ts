/**
 * Health check routes.
 *
 * GET /health: Liveness check (always 200 if the server is running)
 * GET /ready: Readiness check (the node answers getblockchaininfo)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const node = await c.get("explorer").checkNode();
    const timestamp = new Date().toISOString();

    if (!node.reachable) {
      return c.json({ status: "not_ready", node, timestamp }, 503);
    }
    return c.json({ status: "ready", node, timestamp });
  });

  return routes;
}
