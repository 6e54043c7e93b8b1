/**
 * Block routes.
 *
 * GET /block/:hash: Block by hash
 *   400 "Invalid block hash" | 500 "Failed to retrieve block information"
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createBlockRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/block/:hash", async (c) => {
    const block = await c.get("explorer").blocks.resolve(c.req.param("hash"));
    return c.json(block);
  });

  return routes;
}
