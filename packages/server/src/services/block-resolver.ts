/**
 * Block Resolver: block hash → public Block.
 *
 * `resolve` is the HTTP-facing lookup: it validates the hash and
 * translates failures into ApiError. `fetch` is the bare lookup used by
 * the latest-blocks aggregator, which applies its own translation.
 */

import type { Block, BlockHash } from "@btc-lens/types";
import { parseBlockHash } from "@btc-lens/types";
import type { BitcoinNode, NodeBlock } from "@btc-lens/bitcoin-rpc";
import { ApiError, INVALID_BLOCK_HASH, BLOCK_LOOKUP_FAILED } from "../types/error.js";
import { toUpstreamError } from "./upstream.js";

/**
 * Map the node's decode into the public representation, field for field.
 */
export function toBlock(raw: NodeBlock): Block {
  return {
    hash: raw.hash,
    height: raw.height,
    previousblockhash: raw.previousblockhash,
    nextblockhash: raw.nextblockhash,
    confirmations: raw.confirmations,
    time: raw.time,
    mediantime: raw.mediantime,
    nTx: raw.nTx,
    tx: raw.tx,
    size: raw.size,
    strippedsize: raw.strippedsize,
    weight: raw.weight,
    difficulty: raw.difficulty,
    nonce: raw.nonce,
    bits: raw.bits,
    merkleroot: raw.merkleroot,
    version: raw.version,
    versionHex: raw.versionHex,
    chainwork: raw.chainwork,
  };
}

export class BlockResolver {
  private readonly node: BitcoinNode;

  constructor(node: BitcoinNode) {
    this.node = node;
  }

  /**
   * Fetch and map a block by (already normalized) hash.
   *
   * @throws {RpcError} when the node call fails
   */
  async fetch(hash: BlockHash): Promise<Block> {
    return toBlock(await this.node.getBlock(hash));
  }

  /**
   * Validate a client-supplied hash and fetch the block.
   *
   * @throws {ApiError} INVALID_INPUT (400) for a malformed hash,
   *   otherwise a 500 with the block endpoint's fixed message
   */
  async resolve(rawHash: string): Promise<Block> {
    const hash = parseBlockHash(rawHash);
    if (hash === undefined) {
      throw new ApiError("INVALID_INPUT", INVALID_BLOCK_HASH);
    }

    try {
      return await this.fetch(hash);
    } catch (error) {
      throw toUpstreamError(error, BLOCK_LOOKUP_FAILED);
    }
  }
}
