/**
 * Tests for configuration loading and component option mapping.
 */

import { describe, it, expect } from "vitest";
import { buildEndpoints } from "@pft-node/chain-observer";
import { loadConfig, toRuntimeOptions } from "../src/config.js";

const REQUIRED = {
  NODE_WALLET_SEED: "test-seed",
  OPENAI_API_KEY: "test-key",
};

describe("loadConfig", () => {
  it("applies defaults for everything but the secrets", () => {
    const config = loadConfig(REQUIRED);

    expect(config.PORT).toBe(3000);
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.LOCAL_NODE_URL).toBe("ws://127.0.0.1:6006");
    expect(config.PUBLIC_NODE_URL).toBe("wss://s2.ripple.com");
    expect(config.RIPPLED_URL).toBeUndefined();
    expect(config.TOKEN_CURRENCY).toBe("PFT");
    expect(config.RESPONSE_AMOUNT).toBe("1");
    expect(config.ANALYSIS_MODEL).toBe("gpt-3.5-turbo");
    expect(config.ANALYSIS_MAX_ATTEMPTS).toBe(3);
    expect(config.DEDUP_REBUILD_FROM_HISTORY).toBe(false);
    expect(config.ENSURE_TRUST_LINE).toBe(true);
    expect(config.TRUST_LINE_LIMIT).toBe("100000000");
  });

  it("rejects a ledger URL that is not a websocket", () => {
    expect(() => loadConfig({ ...REQUIRED, RIPPLED_URL: "http://127.0.0.1:5005" })).toThrow(
      "RIPPLED_URL must be a ws:// or wss:// URL",
    );
    expect(() => loadConfig({ ...REQUIRED, PUBLIC_NODE_URL: "s2.ripple.com" })).toThrow(
      "PUBLIC_NODE_URL must be a ws:// or wss:// URL",
    );
  });

  it("accepts an empty ledger URL as disabled", () => {
    expect(loadConfig({ ...REQUIRED, LOCAL_NODE_URL: "" }).LOCAL_NODE_URL).toBe("");
  });

  it("turns the trust line check off only for false", () => {
    expect(loadConfig({ ...REQUIRED, ENSURE_TRUST_LINE: "false" }).ENSURE_TRUST_LINE).toBe(false);
    expect(() => loadConfig({ ...REQUIRED, TRUST_LINE_LIMIT: "lots" })).toThrow(
      "TRUST_LINE_LIMIT must be a positive decimal",
    );
  });

  it("rejects a missing wallet seed", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-key" })).toThrow(
      "NODE_WALLET_SEED is required",
    );
  });

  it("rejects a missing API key", () => {
    expect(() => loadConfig({ NODE_WALLET_SEED: "test-seed" })).toThrow(
      "OPENAI_API_KEY is required",
    );
  });

  it("rejects a blank seed", () => {
    expect(() => loadConfig({ ...REQUIRED, NODE_WALLET_SEED: "  \n" })).toThrow(
      "NODE_WALLET_SEED is required",
    );
  });

  it("trims whitespace around secrets", () => {
    const config = loadConfig({ NODE_WALLET_SEED: " test-seed\n", OPENAI_API_KEY: "test-key " });

    expect(config.NODE_WALLET_SEED).toBe("test-seed");
    expect(config.OPENAI_API_KEY).toBe("test-key");
  });

  it("coerces numeric settings from strings", () => {
    const config = loadConfig({ ...REQUIRED, PORT: "8080", CONNECT_TIMEOUT_MS: "2500" });

    expect(config.PORT).toBe(8080);
    expect(config.CONNECT_TIMEOUT_MS).toBe(2500);
  });

  it("rejects a negative response amount", () => {
    expect(() => loadConfig({ ...REQUIRED, RESPONSE_AMOUNT: "-1" })).toThrow(
      "RESPONSE_AMOUNT must be a positive decimal",
    );
  });

  it("parses the history rebuild flag", () => {
    expect(loadConfig({ ...REQUIRED, DEDUP_REBUILD_FROM_HISTORY: "true" }).DEDUP_REBUILD_FROM_HISTORY).toBe(true);
    expect(loadConfig({ ...REQUIRED, DEDUP_REBUILD_FROM_HISTORY: "yes" }).DEDUP_REBUILD_FROM_HISTORY).toBe(false);
  });
});

describe("toRuntimeOptions", () => {
  it("maps reconnect and analysis retry settings", () => {
    const options = toRuntimeOptions(
      loadConfig({
        ...REQUIRED,
        RECONNECT_BASE_DELAY_MS: "100",
        RECONNECT_MAX_DELAY_MS: "5000",
        RECONNECT_MAX_FAILURES: "4",
        ANALYSIS_BASE_DELAY_MS: "500",
        ANALYSIS_MAX_ATTEMPTS: "5",
      }),
    );

    expect(options.connection.reconnect).toEqual({
      maxConsecutiveFailures: 4,
      baseDelayMs: 100,
      maxDelayMs: 5000,
      jitterMs: 100,
    });
    expect(options.analysisRetry).toEqual({
      maxAttempts: 5,
      baseDelayMs: 500,
      maxDelayMs: 4000,
      jitterMs: 200,
    });
  });

  it("shares the token between responder and filter", () => {
    const options = toRuntimeOptions(
      loadConfig({ ...REQUIRED, TOKEN_CURRENCY: "ABC", TOKEN_ISSUER: "rTestIssuer" }),
    );

    expect(options.token).toEqual({ currency: "ABC", issuer: "rTestIssuer" });
    expect(options.responder).toEqual({
      seed: "test-seed",
      token: { currency: "ABC", issuer: "rTestIssuer" },
      amount: "1",
      trustLineLimit: "100000000",
    });
  });

  it("treats an empty dedup file as in-memory", () => {
    expect(toRuntimeOptions(loadConfig({ ...REQUIRED, DEDUP_FILE: "" })).dedup.file).toBeUndefined();
    expect(
      toRuntimeOptions(loadConfig({ ...REQUIRED, DEDUP_FILE: "./data/dedup.jsonl" })).dedup.file,
    ).toBe("./data/dedup.jsonl");
  });

  it("maps the history rebuild only when enabled", () => {
    expect(toRuntimeOptions(loadConfig(REQUIRED)).dedup.rebuild).toBeUndefined();
    expect(
      toRuntimeOptions(
        loadConfig({
          ...REQUIRED,
          DEDUP_REBUILD_FROM_HISTORY: "true",
          DEDUP_REBUILD_MAX_PAGES: "4",
          DEDUP_REBUILD_MAX_ATTEMPTS: "2",
        }),
      ).dedup.rebuild,
    ).toEqual({ maxPages: 4, maxAttempts: 2 });
  });

  it("orders endpoints local, configured, public and drops disabled ones", () => {
    const options = toRuntimeOptions(
      loadConfig({ ...REQUIRED, LOCAL_NODE_URL: "", RIPPLED_URL: "wss://rippled.test" }),
    );

    expect(buildEndpoints(options.endpoints)).toEqual([
      { url: "wss://rippled.test", rank: 0, label: "configured" },
      { url: "wss://s2.ripple.com", rank: 1, label: "public" },
    ]);
  });
});
