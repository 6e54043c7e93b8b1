/**
 * API error taxonomy.
 *
 * Every failure a client can see is an ApiError carrying one of the
 * fixed, endpoint-specific messages below. The underlying cause (an
 * RpcError, a mapping failure) is kept on `cause` for logs and never
 * reaches the response body.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * - INVALID_INPUT: malformed client-supplied identifier
 * - NOT_FOUND_OR_UPSTREAM: the node rejected the lookup (e.g. unknown hash)
 * - UPSTREAM: transport or decode failure talking to the node
 */
export type ApiErrorCode = "INVALID_INPUT" | "NOT_FOUND_OR_UPSTREAM" | "UPSTREAM";

export type ApiErrorStatus = 400 | 500;

const STATUS_BY_CODE: Record<ApiErrorCode, ApiErrorStatus> = {
  INVALID_INPUT: 400,
  NOT_FOUND_OR_UPSTREAM: 500,
  UPSTREAM: 500,
};

// =============================================================================
// Public Messages
// =============================================================================

export const INVALID_BLOCK_HASH = "Invalid block hash";
export const BLOCK_LOOKUP_FAILED = "Failed to retrieve block information";
export const TRANSACTION_LOOKUP_FAILED = "Failed to retrieve transaction information";
export const LATEST_BLOCKS_FAILED = "Failed to retrieve latest blocks";
export const INTERNAL_ERROR = "Internal server error";

// =============================================================================
// Error
// =============================================================================

export interface ApiErrorOptions {
  /** Overrides the status implied by the code */
  readonly status?: ApiErrorStatus | undefined;
  readonly cause?: unknown;
}

export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly status: ApiErrorStatus;

  constructor(code: ApiErrorCode, message: string, options: ApiErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ApiError";
    this.code = code;
    this.status = options.status ?? STATUS_BY_CODE[code];
  }
}
