/**
 * Bitcoin RPC Configuration
 *
 * Connection settings for a node's JSON-RPC endpoint.
 *
 * Rules:
 * - Credentials are sent on every call (HTTP basic auth)
 * - A single attempt per call; no retry
 * - All types are immutable (readonly)
 */

import type { Logger } from "pino";
import type { RpcErrorCode } from "./errors.js";

/**
 * Outcome of a single RPC call, reported to the `onCall` hook.
 */
export type RpcCallOutcome = "ok" | RpcErrorCode;

/**
 * Configuration for a Bitcoin JSON-RPC client.
 */
export interface RpcClientConfig {
  /** Node endpoint (e.g. "http://127.0.0.1:8332") */
  readonly url: string;

  /** RPC username (rpcuser) */
  readonly username: string;

  /** RPC password (rpcpassword) */
  readonly password: string;

  /**
   * Request timeout in milliseconds.
   * Default: 30000 (30 seconds).
   */
  readonly timeoutMs?: number | undefined;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;

  /** Logger for per-call tracing; silent when omitted */
  readonly logger?: Logger | undefined;

  /** Invoked once per call with its outcome (metrics) */
  readonly onCall?: ((method: string, outcome: RpcCallOutcome) => void) | undefined;
}

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;
