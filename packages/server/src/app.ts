/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability: tests create the app
 * against an in-process node without starting the HTTP server.
 */

import { Hono } from "hono";
import { pino } from "pino";
import type { Logger } from "pino";
import type { BitcoinNode } from "@btc-lens/bitcoin-rpc";
import type { AppEnv } from "./types/api-contract.js";
import { ExplorerService } from "./services/explorer-service.js";
import type { FetchMode } from "./services/latest-blocks.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestContextMiddleware } from "./middleware/request-context.js";
import { ExplorerMetrics } from "./metrics/explorer-metrics.js";
import { metricsMiddleware, createMetricsRoute } from "./metrics/http.js";
import { createHealthRoutes } from "./routes/health.js";
import { createBlockRoutes } from "./routes/blocks.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createLatestBlocksRoutes } from "./routes/latest-blocks.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** The node every lookup is served from */
  readonly node: BitcoinNode;
  readonly latestBlocksFetchMode?: FetchMode | undefined;
  readonly verifyTxid?: boolean | undefined;
  /** Parent of every per-request logger. Default: silent */
  readonly logger?: Logger | undefined;
  /** Enable metrics collection and GET /metrics. Default: true */
  readonly enableMetrics?: boolean | undefined;
  /** Metric set to record into; lets the RPC client share it */
  readonly metrics?: ExplorerMetrics | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly explorer: ExplorerService;
  readonly metrics: ExplorerMetrics;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const explorer = new ExplorerService({
    node: options.node,
    latestBlocksFetchMode: options.latestBlocksFetchMode,
    verifyTxid: options.verifyTxid,
  });
  const metrics = options.metrics ?? new ExplorerMetrics();
  const logger = options.logger ?? pino({ level: "silent" });
  const enableMetrics = options.enableMetrics !== false;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContextMiddleware(logger));

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metrics));
  }

  app.use("*", async (c, next) => {
    c.set("explorer", explorer);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler());

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  if (enableMetrics) {
    app.route("/", createMetricsRoute(metrics));
  }

  // ─── Explorer API ───────────────────────────────────────────────
  app.route("/", createBlockRoutes());
  app.route("/", createTransactionRoutes());
  app.route("/", createLatestBlocksRoutes());

  return { app, explorer, metrics };
}
