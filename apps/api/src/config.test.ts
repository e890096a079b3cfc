import path from "path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "@reelgen/shared";
import { loadSettings } from "./config";

const base = { OPENAI_API_KEY: "test-key" };

describe("loadSettings", () => {
  it("applies documented defaults", () => {
    const s = loadSettings(base);
    expect(s).toEqual({
      openaiApiKey: "test-key",
      openaiBaseUrl: "https://api.openai.com/v1",
      openaiTimeoutMs: 30000,
      llmModel: "gpt-4-turbo-preview",
      embeddingModel: "text-embedding-3-small",
      temperature: 0.7,
      maxTokens: 1500,
      llmRetry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 },
      generationMaxAttempts: 2,
      topK: 5,
      indexPath: path.resolve("data/reel_index.json"),
      port: 4000,
      requestTimeoutMs: 120000,
      logLevel: "info",
      adminToken: undefined,
    });
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.llmRetry)).toBe(true);
  });

  it("reads overrides", () => {
    const s = loadSettings({
      ...base,
      OPENAI_LLM_MODEL: "gpt-test",
      LLM_TEMPERATURE: "0.2",
      LLM_MAX_TOKENS: "800",
      RAG_TOP_K: "0",
      GENERATION_MAX_ATTEMPTS: "3",
      LOG_LEVEL: "DEBUG",
      ADMIN_TOKEN: " test-admin ",
      INDEX_PATH: "/tmp/reels/index.json",
    });
    expect(s.llmModel).toBe("gpt-test");
    expect(s.temperature).toBe(0.2);
    expect(s.maxTokens).toBe(800);
    expect(s.topK).toBe(0);
    expect(s.generationMaxAttempts).toBe(3);
    expect(s.logLevel).toBe("debug");
    expect(s.adminToken).toBe("test-admin");
    expect(s.indexPath).toBe("/tmp/reels/index.json");
  });

  it("requires an API key", () => {
    expect(() => loadSettings({})).toThrow(new ConfigError("OPENAI_API_KEY", "is required"));
    expect(() => loadSettings({ OPENAI_API_KEY: "   " })).toThrow("OPENAI_API_KEY: is required");
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadSettings({ ...base, LLM_TEMPERATURE: "warm" })).toThrow(
      'LLM_TEMPERATURE: expected a number, got "warm"',
    );
  });

  it("rejects out-of-range values", () => {
    expect(() => loadSettings({ ...base, RAG_TOP_K: "51" })).toThrow("RAG_TOP_K: must be <= 50");
    expect(() => loadSettings({ ...base, LLM_TEMPERATURE: "-1" })).toThrow(
      "LLM_TEMPERATURE: must be >= 0",
    );
  });

  it("rejects fractional counts", () => {
    expect(() => loadSettings({ ...base, LLM_MAX_TOKENS: "1.5" })).toThrow(
      'LLM_MAX_TOKENS: expected an integer, got "1.5"',
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadSettings({ ...base, LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });

  it("rejects a max backoff below the base backoff", () => {
    expect(() =>
      loadSettings({ ...base, LLM_RETRY_BASE_MS: "5000", LLM_RETRY_MAX_MS: "100" }),
    ).toThrow("LLM_RETRY_MAX_MS: must be >= LLM_RETRY_BASE_MS");
  });
});
