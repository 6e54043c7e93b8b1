/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reflects whether the node answers
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app, node } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
    expect(node.calls).toHaveLength(0);
  });

  it("mints an X-Request-Id when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("sets X-Request-Id on error responses too", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/block/zz", "GET", { "X-Request-Id": "test-req-400" }),
    );

    expect(res.status).toBe(400);
    expect(res.headers.get("X-Request-Id")).toBe("test-req-400");
  });
});

describe("GET /ready", () => {
  it("returns 200 ready with the node's chain state", async () => {
    const { app } = createTestApp(105);
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; node: unknown };
    expect(body.status).toBe("ready");
    expect(body.node).toEqual({
      reachable: true,
      chain: "regtest",
      blocks: 105,
      headers: 105,
      initialBlockDownload: false,
    });
  });

  it("returns 503 not_ready when the node is unreachable", async () => {
    const { app, node } = createTestApp(105);
    node.failOn("getblockchaininfo", { kind: "network" });

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as { status: string; node: unknown };
    expect(body.status).toBe("not_ready");
    expect(body.node).toEqual({ reachable: false, detail: "TRANSPORT" });
  });

  it("returns 503 when the node rejects the call", async () => {
    const { app, node } = createTestApp(105);
    node.failOn("getblockchaininfo", {
      kind: "reject",
      code: -28,
      message: "Verifying blocks...",
    });

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as { node: unknown };
    expect(body.node).toEqual({ reachable: false, detail: "NODE_REJECTED" });
  });
});
