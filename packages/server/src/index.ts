/**
 * @btc-lens/server: Bitcoin block explorer HTTP API.
 *
 * Public API for embedding the explorer; `main.ts` is the process entry.
 */

export { ExplorerService } from "./services/explorer-service.js";
export type { ExplorerServiceConfig, NodeStatus } from "./services/explorer-service.js";
export { BlockResolver, toBlock } from "./services/block-resolver.js";
export {
  TransactionResolver,
  toTransaction,
  assertTxidMatches,
} from "./services/transaction-resolver.js";
export type { TransactionResolverOptions } from "./services/transaction-resolver.js";
export {
  LatestBlocksAggregator,
  LATEST_BLOCKS_COUNT,
  windowHeights,
} from "./services/latest-blocks.js";
export type { FetchMode, LatestBlocksOptions } from "./services/latest-blocks.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./metrics/index.js";
