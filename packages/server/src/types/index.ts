/**
 * Type barrel: re-exports all public types from @btc-lens/server.
 */

// Error
export {
  ApiError,
  INVALID_BLOCK_HASH,
  BLOCK_LOOKUP_FAILED,
  TRANSACTION_LOOKUP_FAILED,
  LATEST_BLOCKS_FAILED,
  INTERNAL_ERROR,
} from "./error.js";
export type { ApiErrorCode, ApiErrorStatus, ApiErrorOptions } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
