/**
 * Bitcoin Node Interface
 *
 * The read-only surface of a Bitcoin full node that the explorer uses.
 * BitcoinRpcClient implements it over JSON-RPC; tests substitute an
 * in-process chain.
 *
 * Design rules:
 * - All methods are read-only
 * - All methods return Promises (every query is a network round trip)
 * - Errors are thrown as RpcError, never returned
 */

import type {
  NodeBlock,
  NodeBlockHeader,
  NodeTransaction,
  BlockchainInfo,
} from "./schemas.js";

export interface BitcoinNode {
  /** Height of the most-work fully validated chain (`getblockcount`) */
  getBlockCount(): Promise<number>;

  /** Hash of the main-chain block at the given height (`getblockhash`) */
  getBlockHash(height: number): Promise<string>;

  /** Verbose block decode (`getblock <hash> 1`) */
  getBlock(hash: string): Promise<NodeBlock>;

  /** Verbose block header (`getblockheader <hash> true`) */
  getBlockHeader(hash: string): Promise<NodeBlockHeader>;

  /** Verbose transaction decode (`getrawtransaction <txid> 2`) */
  getRawTransaction(txid: string): Promise<NodeTransaction>;

  /** Chain state summary (`getblockchaininfo`) */
  getBlockchainInfo(): Promise<BlockchainInfo>;
}
