/**
 * Runtime guard tests for @btc-lens/types
 *
 * Path parameters are untrusted; these guards decide what reaches the node.
 */
import { describe, it, expect } from "vitest";
import {
  isHexHash,
  parseBlockHash,
  parseTxId,
} from "../src/guards.js";

const GENESIS = "000000000019d6689c085ae165831e934ff763ae46a2a6c172b3f1b60a8ce26f";

describe("isHexHash", () => {
  it("accepts 64 lowercase hex characters", () => {
    expect(isHexHash(GENESIS)).toBe(true);
  });

  it("accepts uppercase and mixed case", () => {
    expect(isHexHash(GENESIS.toUpperCase())).toBe(true);
    expect(isHexHash("AbCdEf" + GENESIS.slice(6))).toBe(true);
  });

  it("rejects wrong lengths", () => {
    expect(isHexHash(GENESIS.slice(1))).toBe(false);
    expect(isHexHash(GENESIS + "0")).toBe(false);
    expect(isHexHash("")).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isHexHash("g" + GENESIS.slice(1))).toBe(false);
    expect(isHexHash(" " + GENESIS.slice(1))).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isHexHash(null)).toBe(false);
    expect(isHexHash(undefined)).toBe(false);
    expect(isHexHash(123)).toBe(false);
  });
});

describe("parseBlockHash", () => {
  it("normalizes to lowercase", () => {
    expect(parseBlockHash(GENESIS.toUpperCase())).toBe(GENESIS);
  });

  it("returns undefined for malformed input", () => {
    expect(parseBlockHash("not-a-hash")).toBeUndefined();
  });
});

describe("parseTxId", () => {
  it("normalizes to lowercase", () => {
    const txid = "4A5E1E4BAAB89F3A32518A88C31BC87F618F76673E2CC77AB2127B7AFDEDA33B";
    expect(parseTxId(txid)).toBe(txid.toLowerCase());
  });

  it("returns undefined for a 63-character id", () => {
    expect(parseTxId("a".repeat(63))).toBeUndefined();
  });
});
