/**
 * @btc-lens/server: Entry point.
 *
 * Loads config, connects the RPC client, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { BitcoinRpcClient } from "@btc-lens/bitcoin-rpc";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { ExplorerMetrics } from "./metrics/explorer-metrics.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const metrics = new ExplorerMetrics();
  const node = new BitcoinRpcClient({
    url: config.BITCOIN_RPC_URL,
    username: config.BITCOIN_RPC_USER,
    password: config.BITCOIN_RPC_PASSWORD,
    timeoutMs: config.BITCOIN_RPC_TIMEOUT_MS,
    logger: logger.child({ component: "bitcoin-rpc" }),
    onCall: (method, outcome) => {
      metrics.recordRpcCall(method, outcome);
    },
  });

  if (config.BITCOIN_RPC_USER === "") {
    logger.warn("BITCOIN_RPC_USER is empty; the node will likely refuse calls");
  }

  const { app } = createApp({
    node,
    latestBlocksFetchMode: config.LATEST_BLOCKS_FETCH_MODE,
    verifyTxid: config.VERIFY_TXID,
    enableMetrics: config.METRICS_ENABLED,
    metrics,
    logger: logger.child({ component: "http" }),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, rpcUrl: config.BITCOIN_RPC_URL },
    "btc-lens server started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
