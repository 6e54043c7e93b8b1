/**
 * Tests for config.ts: loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      BITCOIN_RPC_URL: "http://127.0.0.1:8332",
      BITCOIN_RPC_USER: "",
      BITCOIN_RPC_PASSWORD: "",
      BITCOIN_RPC_TIMEOUT_MS: 30000,
      LATEST_BLOCKS_FETCH_MODE: "sequential",
      VERIFY_TXID: true,
      METRICS_ENABLED: true,
    });
  });

  it("reads node settings and coerces numbers", () => {
    const config = loadConfig({
      PORT: "8080",
      BITCOIN_RPC_URL: "http://bitcoind:18443",
      BITCOIN_RPC_USER: "test-user",
      BITCOIN_RPC_PASSWORD: "test-secret",
      BITCOIN_RPC_TIMEOUT_MS: "5000",
    });

    expect(config.PORT).toBe(8080);
    expect(config.BITCOIN_RPC_URL).toBe("http://bitcoind:18443");
    expect(config.BITCOIN_RPC_USER).toBe("test-user");
    expect(config.BITCOIN_RPC_PASSWORD).toBe("test-secret");
    expect(config.BITCOIN_RPC_TIMEOUT_MS).toBe(5000);
  });

  it("parses boolean flags", () => {
    const config = loadConfig({ VERIFY_TXID: "false", METRICS_ENABLED: "false" });

    expect(config.VERIFY_TXID).toBe(false);
    expect(config.METRICS_ENABLED).toBe(false);
  });

  it("accepts parallel fetch mode", () => {
    expect(loadConfig({ LATEST_BLOCKS_FETCH_MODE: "parallel" }).LATEST_BLOCKS_FETCH_MODE).toBe(
      "parallel",
    );
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow();
    expect(() => loadConfig({ BITCOIN_RPC_URL: "not a url" })).toThrow();
    expect(() => loadConfig({ BITCOIN_RPC_TIMEOUT_MS: "10" })).toThrow();
    expect(() => loadConfig({ LATEST_BLOCKS_FETCH_MODE: "random" })).toThrow();
    expect(() => loadConfig({ VERIFY_TXID: "yes" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
