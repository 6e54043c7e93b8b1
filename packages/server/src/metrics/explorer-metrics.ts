/**
 * The explorer's metric set.
 *
 * - http_requests_total{method,route,status}
 * - http_request_duration_seconds{method,route}
 * - btc_lens_rpc_calls_total{method,outcome}
 *
 * `route` is the matched route pattern, never the raw path.
 */

import type { RpcCallOutcome } from "@btc-lens/bitcoin-rpc";
import { CounterFamily, HistogramFamily } from "./registry.js";

const KNOWN_METHODS = new Set(["GET", "HEAD", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"]);

/** Collapse non-standard HTTP methods into one label value */
export function methodLabel(method: string): string {
  return KNOWN_METHODS.has(method) ? method : "OTHER";
}

export class ExplorerMetrics {
  private readonly requests = new CounterFamily(
    "http_requests_total",
    "Total HTTP requests",
    ["method", "route", "status"],
  );
  private readonly durations = new HistogramFamily(
    "http_request_duration_seconds",
    "HTTP request duration in seconds",
    ["method", "route"],
  );
  private readonly rpcCalls = new CounterFamily(
    "btc_lens_rpc_calls_total",
    "Node RPC calls by method and outcome",
    ["method", "outcome"],
  );

  recordRequest(method: string, route: string, status: number, durationMs: number): void {
    const m = methodLabel(method);
    this.requests.inc({ method: m, route, status: String(status) });
    this.durations.observe({ method: m, route }, durationMs / 1000);
  }

  recordRpcCall(method: string, outcome: RpcCallOutcome): void {
    this.rpcCalls.inc({ method, outcome });
  }

  /** Number of http_requests_total series */
  get requestSeries(): number {
    return this.requests.size;
  }

  render(): string {
    const lines = [
      ...this.requests.render(),
      ...this.durations.render(),
      ...this.rpcCalls.render(),
    ];
    return lines.join("\n") + "\n";
  }

  clear(): void {
    this.requests.clear();
    this.durations.clear();
    this.rpcCalls.clear();
  }
}
