/**
 * Runtime Type Guards
 *
 * Identifier validation at the API boundary. Path parameters arrive as
 * arbitrary strings; these decide whether one names a block or
 * transaction before anything is sent to the node.
 */

import type { BlockHash, TxId } from "./chain.js";

const HASH_PATTERN = /^[0-9a-fA-F]{64}$/;

/**
 * True when the value is a 64-character hex string (either case).
 */
export function isHexHash(value: unknown): value is string {
  return typeof value === "string" && HASH_PATTERN.test(value);
}

/**
 * Validate and normalize a block hash. Returns undefined when malformed.
 */
export function parseBlockHash(raw: string): BlockHash | undefined {
  return isHexHash(raw) ? raw.toLowerCase() : undefined;
}

/**
 * Validate and normalize a transaction id. Returns undefined when malformed.
 */
export function parseTxId(raw: string): TxId | undefined {
  return isHexHash(raw) ? raw.toLowerCase() : undefined;
}
