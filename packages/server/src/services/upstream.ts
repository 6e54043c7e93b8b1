/**
 * Node failure → ApiError translation shared by the resolvers.
 */

import { isRpcError } from "@btc-lens/bitcoin-rpc";
import { ApiError } from "../types/error.js";

/**
 * Collapse a failed lookup into the endpoint's fixed message.
 *
 * A node-side rejection (unknown hash, unknown txid) becomes
 * NOT_FOUND_OR_UPSTREAM; everything else is UPSTREAM. Both are 500.
 */
export function toUpstreamError(error: unknown, message: string): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (isRpcError(error) && error.code === "NODE_REJECTED") {
    return new ApiError("NOT_FOUND_OR_UPSTREAM", message, { cause: error });
  }
  return new ApiError("UPSTREAM", message, { cause: error });
}
