/**
 * Tests for the request-context middleware: request ids and the
 * per-request log line.
 */

import { describe, it, expect } from "vitest";
import { captureLogger, createTestApp, jsonRequest } from "../setup.js";
import { resolveRequestId } from "../../src/middleware/request-context.js";
import { fakeBlockHash } from "../fake-node.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("requestContextMiddleware", () => {
  it("logs one completed line bound to the request id", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp(105, { logger });

    await app.request(jsonRequest("/health", "GET", { "X-Request-Id": "log-req-1" }));

    expect(lines).toHaveLength(1);
    const line = lines[0]!;
    expect(line.level).toBe(30);
    expect(line.msg).toBe("request completed");
    expect(line.requestId).toBe("log-req-1");
    expect(line.method).toBe("GET");
    expect(line.path).toBe("/health");
    expect(line.route).toBe("/health");
    expect(line.status).toBe(200);
    expect(line.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs a failed lookup as an error line and a failed request", async () => {
    const { logger, lines } = captureLogger();
    const { app, node } = createTestApp(105, { logger });
    node.failOn("getblock", { kind: "network" });

    await app.request(
      jsonRequest(`/block/${fakeBlockHash(1)}`, "GET", { "X-Request-Id": "log-req-2" }),
    );

    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      [50, "Lookup failed"],
      [40, "request failed"],
    ]);
    expect(lines[0]!.code).toBe("UPSTREAM");
    expect(lines[0]!.requestId).toBe("log-req-2");
    expect(lines[1]!.route).toBe("/block/:hash");
    expect(lines[1]!.status).toBe(500);
  });

  it("writes no error line for a client error", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp(105, { logger });

    const res = await app.request("/block/zz");

    expect(res.status).toBe(400);
    expect(lines.map((l) => l.msg)).toEqual(["request completed"]);
    expect(lines[0]!.path).toBe("/block/zz");
    expect(lines[0]!.route).toBe("/block/:hash");
  });

  it("replaces an unusable incoming request id", async () => {
    const { logger, lines } = captureLogger();
    const { app } = createTestApp(105, { logger });

    const res = await app.request(
      jsonRequest("/health", "GET", { "X-Request-Id": "bad id\twith spaces" }),
    );

    const echoed = res.headers.get("X-Request-Id");
    expect(echoed).toMatch(UUID);
    expect(lines[0]!.requestId).toBe(echoed);
  });
});

describe("resolveRequestId", () => {
  it("keeps short tokens of safe characters", () => {
    expect(resolveRequestId("abc-123_x.y:z")).toBe("abc-123_x.y:z");
  });

  it("mints a UUID for missing, empty or oversized ids", () => {
    expect(resolveRequestId(undefined)).toMatch(UUID);
    expect(resolveRequestId("")).toMatch(UUID);
    expect(resolveRequestId("a".repeat(129))).toMatch(UUID);
    expect(resolveRequestId('x"}\n')).toMatch(UUID);
  });
});
