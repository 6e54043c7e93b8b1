/**
 * Tests for GET /metrics.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";
import { fakeBlockHash } from "../fake-node.js";

function requestLines(text: string): string[] {
  return text.split("\n").filter((line) => line.startsWith("http_requests_total{"));
}

describe("GET /metrics", () => {
  it("counts requests under their route pattern", async () => {
    const { app } = createTestApp(105);
    await app.request(`/block/${fakeBlockHash(1)}`);
    await app.request(`/block/${fakeBlockHash(2)}`);
    await app.request("/block/nope");

    const res = await app.request("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8");

    const text = await res.text();
    expect(requestLines(text)).toEqual([
      'http_requests_total{method="GET",route="/block/:hash",status="200"} 2',
      'http_requests_total{method="GET",route="/block/:hash",status="400"} 1',
    ]);
  });

  it("keeps one series however many junk paths are requested", async () => {
    const { app, metrics } = createTestApp(105);
    for (let i = 0; i < 5; i++) {
      await app.request(`/block/junk${i}`);
    }
    await app.request(
      "/block/x%22%7D%201%0Afake_metric%7Bpwned%3D%22yes%22%7D%20999%0A%23",
    );

    const text = await (await app.request("/metrics")).text();

    expect(requestLines(text)).toEqual([
      'http_requests_total{method="GET",route="/block/:hash",status="400"} 6',
    ]);
    expect(text.split("\n").some((line) => line.startsWith("fake_metric"))).toBe(false);
    expect(metrics.requestSeries).toBe(2);
  });

  it("aggregates unknown paths and methods", async () => {
    const { app } = createTestApp(105);
    await app.request("/wp-admin/setup.php");
    await app.request("/nope/1");
    await app.request("/health", { method: "PROPFIND" });

    const text = await (await app.request("/metrics")).text();

    expect(requestLines(text)).toEqual([
      'http_requests_total{method="GET",route="unmatched",status="404"} 2',
      'http_requests_total{method="OTHER",route="unmatched",status="404"} 1',
    ]);
  });

  it("records RPC call outcomes in a shared metric set", async () => {
    const { app, metrics } = createTestApp(105);
    metrics.recordRpcCall("getblock", "ok");

    const text = await (await app.request("/metrics")).text();

    expect(text).toContain("# TYPE btc_lens_rpc_calls_total counter");
    expect(text).toContain('btc_lens_rpc_calls_total{method="getblock",outcome="ok"} 1');
  });

  it("is absent when metrics are disabled", async () => {
    const { app } = createTestApp(105, { enableMetrics: false });
    const res = await app.request("/metrics");

    expect(res.status).toBe(404);
  });
});
