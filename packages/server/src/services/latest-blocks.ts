/**
 * Latest-Blocks Aggregator
 *
 * Assembles the most recent blocks as one snapshot of a chain whose tip
 * may advance while the lookups are in flight.
 *
 * Rules:
 * - The tip height is read exactly once per call
 * - Blocks are returned newest first, heights strictly descending
 * - Any failed lookup fails the whole call; never a partial list
 * - No retries
 */

import type { Block, BlockHeight, LatestBlocksResult } from "@btc-lens/types";
import type { BitcoinNode } from "@btc-lens/bitcoin-rpc";
import { ApiError, LATEST_BLOCKS_FAILED } from "../types/error.js";
import type { BlockResolver } from "./block-resolver.js";

export const LATEST_BLOCKS_COUNT = 10;

/**
 * - sequential: one height after another
 * - parallel: all heights at once; order still follows height
 */
export type FetchMode = "sequential" | "parallel";

export interface LatestBlocksOptions {
  readonly count?: number | undefined;
  readonly fetchMode?: FetchMode | undefined;
}

/**
 * Heights to fetch for a given tip: tip, tip-1, ... down to at most
 * `count` entries, stopping at genesis.
 */
export function windowHeights(tip: BlockHeight, count: number): BlockHeight[] {
  const heights: BlockHeight[] = [];
  for (let i = 0; i < count && tip - i >= 0; i++) {
    heights.push(tip - i);
  }
  return heights;
}

export class LatestBlocksAggregator {
  private readonly node: BitcoinNode;
  private readonly blocks: BlockResolver;
  private readonly count: number;
  private readonly fetchMode: FetchMode;

  constructor(node: BitcoinNode, blocks: BlockResolver, options: LatestBlocksOptions = {}) {
    this.node = node;
    this.blocks = blocks;
    this.count = options.count ?? LATEST_BLOCKS_COUNT;
    this.fetchMode = options.fetchMode ?? "sequential";
  }

  /**
   * @throws {ApiError} UPSTREAM (500) if the height read or any block lookup fails
   */
  async list(): Promise<LatestBlocksResult> {
    try {
      return await this.collect();
    } catch (error) {
      throw new ApiError("UPSTREAM", LATEST_BLOCKS_FAILED, { cause: error });
    }
  }

  private async collect(): Promise<Block[]> {
    const tip = await this.node.getBlockCount();
    const heights = windowHeights(tip, this.count);

    if (this.fetchMode === "parallel") {
      return Promise.all(heights.map((height) => this.fetchAt(height)));
    }

    const result: Block[] = [];
    for (const height of heights) {
      result.push(await this.fetchAt(height));
    }
    return result;
  }

  private async fetchAt(height: BlockHeight): Promise<Block> {
    const hash = await this.node.getBlockHash(height);
    const block = await this.blocks.fetch(hash);

    // A hash names one block forever; a different height means the node
    // answered for something other than what was asked.
    if (block.height !== height) {
      throw new Error(
        `Block ${hash} reports height ${block.height}, requested ${height}`,
      );
    }
    return block;
  }
}
