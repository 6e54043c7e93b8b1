/**
 * Transaction routes.
 *
 * GET /tx/:txid: Transaction by id
 *   500 "Failed to retrieve transaction information"
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/tx/:txid", async (c) => {
    const transaction = await c
      .get("explorer")
      .transactions.resolve(c.req.param("txid"));
    return c.json(transaction);
  });

  return routes;
}
