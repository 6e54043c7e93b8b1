/**
 * @btc-lens/types: Shared domain types for the btc-lens stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Field names mirror the node's verbose decode
 */

// Chain types
export type {
  BlockHash,
  TxId,
  BlockHeight,
  Block,
  ScriptSig,
  CoinbaseInput,
  PrevoutInput,
  TxInput,
  ScriptPubKey,
  TxOutput,
  ConfirmationStatus,
  Transaction,
  LatestBlocksResult,
} from "./chain.js";

// Runtime guards
export {
  isHexHash,
  parseBlockHash,
  parseTxId,
} from "./guards.js";
