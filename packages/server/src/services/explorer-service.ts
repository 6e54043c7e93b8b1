/**
 * ExplorerService: composition root for the lookup services.
 *
 * Route handlers delegate to this service; they never talk to the node
 * directly. Holds no chain state: every call goes to the node.
 */

import type { BitcoinNode } from "@btc-lens/bitcoin-rpc";
import { isRpcError } from "@btc-lens/bitcoin-rpc";
import { BlockResolver } from "./block-resolver.js";
import { TransactionResolver } from "./transaction-resolver.js";
import { LatestBlocksAggregator, type FetchMode } from "./latest-blocks.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ExplorerServiceConfig {
  readonly node: BitcoinNode;
  readonly latestBlocksFetchMode?: FetchMode | undefined;
  readonly verifyTxid?: boolean | undefined;
}

export type NodeStatus =
  | {
      readonly reachable: true;
      readonly chain: string;
      readonly blocks: number;
      readonly headers: number;
      readonly initialBlockDownload: boolean;
    }
  | {
      readonly reachable: false;
      readonly detail: string;
    };

// =============================================================================
// Service
// =============================================================================

export class ExplorerService {
  readonly blocks: BlockResolver;
  readonly transactions: TransactionResolver;
  readonly latestBlocks: LatestBlocksAggregator;

  private readonly node: BitcoinNode;

  constructor(config: ExplorerServiceConfig) {
    this.node = config.node;
    this.blocks = new BlockResolver(config.node);
    this.transactions = new TransactionResolver(config.node, {
      verifyTxid: config.verifyTxid,
    });
    this.latestBlocks = new LatestBlocksAggregator(config.node, this.blocks, {
      fetchMode: config.latestBlocksFetchMode,
    });
  }

  /**
   * Check the node for readiness. Node failures become an unreachable
   * status; anything else propagates.
   */
  async checkNode(): Promise<NodeStatus> {
    try {
      const info = await this.node.getBlockchainInfo();
      return {
        reachable: true,
        chain: info.chain,
        blocks: info.blocks,
        headers: info.headers,
        initialBlockDownload: info.initialblockdownload ?? false,
      };
    } catch (error) {
      if (isRpcError(error)) {
        return { reachable: false, detail: error.code };
      }
      throw error;
    }
  }
}
