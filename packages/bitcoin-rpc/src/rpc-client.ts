/**
 * Bitcoin JSON-RPC client.
 *
 * Wraps native fetch() with:
 * - HTTP basic auth on every call
 * - JSON-RPC 2.0 request framing with a per-client request id
 * - One deadline covering the response headers and body
 * - Failure classification (RpcError: TRANSPORT / NODE_REJECTED / DECODE)
 * - Zod decoding of typed results
 *
 * One attempt per call. Safe to share between concurrent requests.
 */

import type { z } from "zod";
import type { Logger } from "pino";
import type { BitcoinNode } from "./node.js";
import {
  DEFAULT_RPC_TIMEOUT_MS,
  type RpcCallOutcome,
  type RpcClientConfig,
} from "./rpc-config.js";
import { RpcError } from "./errors.js";
import {
  JsonRpcResponseSchema,
  BlockCountSchema,
  BlockHashSchema,
  NodeBlockSchema,
  NodeBlockHeaderSchema,
  NodeTransactionSchema,
  BlockchainInfoSchema,
  type NodeBlock,
  type NodeBlockHeader,
  type NodeTransaction,
  type BlockchainInfo,
} from "./schemas.js";

/**
 * Any value that survives JSON.stringify unchanged.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface HttpExchange {
  readonly ok: boolean;
  readonly status: number;
  readonly body: string;
}

type ParsedBody =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: unknown };

function parseJson(body: string): ParsedBody {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, error };
  }
}

function rejectedByNode(
  method: string,
  rpcError: { readonly code: number; readonly message: string },
  httpStatus?: number,
): RpcError {
  return new RpcError(
    "NODE_REJECTED",
    `${method} rejected by node (${rpcError.code}): ${rpcError.message}`,
    { method, nodeCode: rpcError.code, httpStatus },
  );
}

function decodeResult<S extends z.ZodTypeAny>(
  method: string,
  schema: S,
  result: unknown,
): z.output<S> {
  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
      .join("; ");
    throw new RpcError("DECODE", `Unexpected result for ${method}: ${issues}`, {
      method,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

// =============================================================================
// Client
// =============================================================================

export class BitcoinRpcClient implements BitcoinNode {
  private readonly url: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger | undefined;
  private readonly onCall: ((method: string, outcome: RpcCallOutcome) => void) | undefined;
  private nextId = 1;

  constructor(config: RpcClientConfig) {
    this.url = config.url;
    this.authorization =
      "Basic " +
      Buffer.from(`${config.username}:${config.password}`).toString("base64");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.logger = config.logger;
    this.onCall = config.onCall;
  }

  // ─── Chain queries ────────────────────────────────────────────────

  getBlockCount(): Promise<number> {
    return this.request("getblockcount", [], BlockCountSchema);
  }

  getBlockHash(height: number): Promise<string> {
    return this.request("getblockhash", [height], BlockHashSchema);
  }

  getBlock(hash: string): Promise<NodeBlock> {
    return this.request("getblock", [hash, 1], NodeBlockSchema);
  }

  getBlockHeader(hash: string): Promise<NodeBlockHeader> {
    return this.request("getblockheader", [hash, true], NodeBlockHeaderSchema);
  }

  // Nodes that predate verbosity 2 treat any non-zero value as `true`
  getRawTransaction(txid: string): Promise<NodeTransaction> {
    return this.request("getrawtransaction", [txid, 2], NodeTransactionSchema);
  }

  getBlockchainInfo(): Promise<BlockchainInfo> {
    return this.request("getblockchaininfo", [], BlockchainInfoSchema);
  }

  // ─── Core ─────────────────────────────────────────────────────────

  /**
   * Issue one JSON-RPC call and return the raw `result`.
   *
   * @throws {RpcError} on any failure
   */
  call(method: string, params: readonly JsonValue[] = []): Promise<unknown> {
    return this.invoke(method, params, (result) => result);
  }

  /**
   * Call and decode the result with a schema. A result of the wrong
   * shape is a DECODE failure.
   */
  private request<S extends z.ZodTypeAny>(
    method: string,
    params: readonly JsonValue[],
    schema: S,
  ): Promise<z.output<S>> {
    return this.invoke(method, params, (result) => decodeResult(method, schema, result));
  }

  private async invoke<T>(
    method: string,
    params: readonly JsonValue[],
    decode: (result: unknown) => T,
  ): Promise<T> {
    try {
      const value = decode(await this.send(method, params));
      this.onCall?.(method, "ok");
      return value;
    } catch (error) {
      if (error instanceof RpcError) {
        this.onCall?.(method, error.code);
        this.logger?.warn(
          {
            method,
            code: error.code,
            httpStatus: error.httpStatus,
            nodeCode: error.nodeCode,
            err: error,
          },
          "RPC call failed",
        );
      }
      throw error;
    }
  }

  private async send(method: string, params: readonly JsonValue[]): Promise<unknown> {
    const id = this.nextId++;
    this.logger?.debug({ method, params, id }, "RPC call");

    let exchange: HttpExchange;
    try {
      exchange = await this.post(method, JSON.stringify({ jsonrpc: "2.0", id, method, params }));
    } catch (error) {
      if (error instanceof RpcError) {
        throw error;
      }
      throw new RpcError(
        "TRANSPORT",
        `RPC connection error: ${describeError(error)}`,
        { method, cause: error },
      );
    }

    const parsed = parseJson(exchange.body);

    if (!exchange.ok) {
      // Nodes before v28 answer rejected calls with HTTP 500 and an error envelope
      const envelope = parsed.ok ? JsonRpcResponseSchema.safeParse(parsed.value) : undefined;
      const rejected = envelope?.success === true ? envelope.data.error : undefined;
      if (rejected !== null && rejected !== undefined) {
        throw rejectedByNode(method, rejected, exchange.status);
      }
      throw new RpcError(
        "TRANSPORT",
        `RPC server error. Status: ${exchange.status}`,
        { method, httpStatus: exchange.status },
      );
    }

    if (!parsed.ok) {
      throw new RpcError(
        "DECODE",
        `Failed to parse RPC response: ${describeError(parsed.error)}`,
        { method, cause: parsed.error },
      );
    }

    const envelope = JsonRpcResponseSchema.safeParse(parsed.value);
    if (!envelope.success) {
      throw new RpcError("DECODE", "Response is not a JSON-RPC object", {
        method,
        cause: envelope.error,
      });
    }

    const rpcError = envelope.data.error;
    if (rpcError !== null && rpcError !== undefined) {
      throw rejectedByNode(method, rpcError);
    }

    this.logger?.debug({ method, id }, "RPC call succeeded");
    return envelope.data.result;
  }

  /**
   * POST and read the whole body under one deadline. The timer stays armed
   * until the body is complete, so a node that sends headers and then
   * stalls still times out.
   */
  private async post(method: string, body: string): Promise<HttpExchange> {
    const controller = new AbortController();
    const deadline = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener("abort", () => {
        reject(
          new RpcError("TRANSPORT", `RPC request timed out after ${this.timeoutMs}ms`, {
            method,
            cause: controller.signal.reason,
          }),
        );
      });
    });
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await Promise.race([
        this.fetchFn(this.url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: this.authorization,
          },
          body,
          signal: controller.signal,
        }),
        deadline,
      ]);
      const text = await Promise.race([response.text(), deadline]);
      return { ok: response.ok, status: response.status, body: text };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
