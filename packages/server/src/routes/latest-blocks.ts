/**
 * Latest blocks route.
 *
 * GET /latest_blocks: The 10 most recent blocks, newest first
 *   (fewer near genesis)
 *   500 "Failed to retrieve latest blocks", never a partial array
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createLatestBlocksRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/latest_blocks", async (c) => {
    const blocks = await c.get("explorer").latestBlocks.list();
    return c.json(blocks);
  });

  return routes;
}
