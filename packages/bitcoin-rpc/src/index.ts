/**
 * @btc-lens/bitcoin-rpc: Read-only access to a Bitcoin full node.
 *
 * Design rules:
 * - READ-ONLY: no wallet calls, no broadcast
 * - One attempt per call; failures are classified, never swallowed
 * - Results are decoded against zod schemas before they leave this package
 */

// Node interface
export type { BitcoinNode } from "./node.js";

// JSON-RPC client
export { BitcoinRpcClient } from "./rpc-client.js";
export type { JsonValue } from "./rpc-client.js";

// Configuration
export { DEFAULT_RPC_TIMEOUT_MS } from "./rpc-config.js";
export type { RpcClientConfig, RpcCallOutcome } from "./rpc-config.js";

// Errors
export { RpcError, isRpcError } from "./errors.js";
export type { RpcErrorCode, RpcErrorDetails } from "./errors.js";

// Node result schemas
export {
  JsonRpcResponseSchema,
  NodeBlockSchema,
  NodeBlockHeaderSchema,
  NodeTransactionSchema,
  BlockchainInfoSchema,
} from "./schemas.js";
export type {
  JsonRpcResponse,
  NodeBlock,
  NodeBlockHeader,
  NodeTransaction,
  BlockchainInfo,
} from "./schemas.js";
