/**
 * Test helpers for @btc-lens/server.
 *
 * Provides a test app factory that wires the real RPC client to an
 * in-process node, with all middleware and routes but no HTTP server.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { BitcoinRpcClient } from "@btc-lens/bitcoin-rpc";
import type { RpcCallOutcome } from "@btc-lens/bitcoin-rpc";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import { FakeBitcoinNode } from "./fake-node.js";

export interface TestApp extends AppInstance {
  readonly node: FakeBitcoinNode;
  readonly rpcOutcomes: Array<{ method: string; outcome: RpcCallOutcome }>;
}

/**
 * Create a test app over a fake chain whose tip is at `tip`.
 */
export function createTestApp(
  tip = 105,
  options: Omit<CreateAppOptions, "node"> = {},
): TestApp {
  const node = new FakeBitcoinNode(tip);
  const rpcOutcomes: Array<{ method: string; outcome: RpcCallOutcome }> = [];
  const client = new BitcoinRpcClient({
    url: "http://fake-node:8332",
    username: "test-user",
    password: "test-secret",
    fetchFn: node.fetch,
    onCall: (method, outcome) => {
      rpcOutcomes.push({ method, outcome });
    },
  });

  return { ...createApp({ ...options, node: client }), node, rpcOutcomes };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  headers?: Record<string, string>,
): Request {
  return new Request(`http://localhost${path}`, {
    method,
    headers: {
      Accept: "application/json",
      ...headers,
    },
  });
}

export type LogLine = Record<string, unknown>;

/**
 * Logger that keeps every line it writes, parsed, for assertions.
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write: (line: string) => {
        const parsed: LogLine = JSON.parse(line);
        lines.push(parsed);
      },
    },
  );
  return { logger, lines };
}
