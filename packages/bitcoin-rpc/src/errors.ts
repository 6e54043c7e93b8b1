/**
 * Classified RPC failures.
 *
 * - TRANSPORT: the node could not be reached, timed out, or answered
 *   with a non-2xx HTTP status and no JSON-RPC error
 * - NODE_REJECTED: the node answered with a JSON-RPC error object,
 *   whatever the HTTP status
 * - DECODE: the body was not JSON, not a JSON-RPC response, or the
 *   result did not have the shape the method returns
 */

export type RpcErrorCode = "TRANSPORT" | "NODE_REJECTED" | "DECODE";

export interface RpcErrorDetails {
  /** RPC method that failed */
  readonly method: string;
  /** HTTP status, for non-2xx answers */
  readonly httpStatus?: number | undefined;
  /** JSON-RPC error code reported by the node (e.g. -5 for unknown block) */
  readonly nodeCode?: number | undefined;
  readonly cause?: unknown;
}

/**
 * Structured error from the RPC client.
 * Always thrown: a call either returns its decoded result or throws this.
 */
export class RpcError extends Error {
  readonly code: RpcErrorCode;
  readonly method: string;
  readonly httpStatus: number | undefined;
  readonly nodeCode: number | undefined;

  constructor(code: RpcErrorCode, message: string, details: RpcErrorDetails) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = "RpcError";
    this.code = code;
    this.method = details.method;
    this.httpStatus = details.httpStatus;
    this.nodeCode = details.nodeCode;
  }
}

export function isRpcError(error: unknown): error is RpcError {
  return error instanceof RpcError;
}
