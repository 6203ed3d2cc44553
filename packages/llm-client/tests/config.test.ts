import { describe, it, expect } from "vitest";
import { loadLoggingConfig, parseModelConfigs } from "../src/config/index.js";
import { InvalidConfigError } from "../src/types/errors.js";
import { createLogger, silentLogger } from "../src/logging/logger.js";

// ===========================================================================
// parseModelConfigs
// ===========================================================================

describe("parseModelConfigs", () => {
  it("fills in defaults for credential and extra", () => {
    expect(parseModelConfigs([{ handle: "local", provider: "openai_chat" }])).toEqual([
      { handle: "local", provider: "openai_chat", credential: { type: "none" }, extra: {} },
    ]);
  });

  it("keeps a full entry", () => {
    const entry = {
      handle: "claude",
      provider: "anthropic_messages",
      credential: { type: "api_key", key: "test-secret" },
      default_model: "claude-test",
      base_url: "https://api.example.com",
      extra: { version: "2023-06-01" },
      patch: { headers: { "X-Team": "search", "X-Old": null }, remove_fields: ["metadata"] },
    };

    expect(parseModelConfigs([entry])).toEqual([entry]);
  });

  function fieldOf(input: unknown): string | undefined {
    try {
      parseModelConfigs(input);
    } catch (err) {
      if (err instanceof InvalidConfigError) return err.field;
      throw err;
    }
    return undefined;
  }

  it("names the path of the first problem", () => {
    expect(
      fieldOf([
        { handle: "ok", provider: "openai_chat" },
        { handle: "bad", provider: "anthropic_messages", credential: { type: "api_key" } },
      ]),
    ).toBe("[1].credential.key");
    expect(fieldOf([{ handle: "x", provider: "azure" }])).toBe("[0].provider");
    expect(fieldOf([{ handle: "x", provider: "openai_chat", patch: { url: "not a url" } }])).toBe(
      "[0].patch.url",
    );
    expect(fieldOf([{ handle: "", provider: "openai_chat" }])).toBe("[0].handle");
  });

  it("reports a non-list input as `models`", () => {
    expect(fieldOf({ handle: "x" })).toBe("models");
  });

  it("accepts an empty list", () => {
    expect(parseModelConfigs([])).toEqual([]);
  });
});

// ===========================================================================
// loadLoggingConfig
// ===========================================================================

describe("loadLoggingConfig", () => {
  it("defaults to info, not pretty", () => {
    expect(loadLoggingConfig({})).toEqual({ level: "info", pretty: false, name: undefined });
  });

  it("pretty-prints in development unless LOG_PRETTY says otherwise", () => {
    expect(loadLoggingConfig({ NODE_ENV: "development" }).pretty).toBe(true);
    expect(loadLoggingConfig({ NODE_ENV: "development", LOG_PRETTY: "false" }).pretty).toBe(false);
    expect(loadLoggingConfig({ NODE_ENV: "production", LOG_PRETTY: "true" }).pretty).toBe(true);
  });

  it("reads the level and keeps the name", () => {
    expect(loadLoggingConfig({ LOG_LEVEL: "debug" }, "router")).toEqual({
      level: "debug",
      pretty: false,
      name: "router",
    });
  });

  it("rejects an unknown level", () => {
    expect(() => loadLoggingConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});

// ===========================================================================
// Logger
// ===========================================================================

describe("createLogger", () => {
  it("uses the configured level and bindings", () => {
    const logger = createLogger({ level: "warn", pretty: false }, { component: "router" });

    expect(logger.level).toBe("warn");
    expect(logger.bindings()).toMatchObject({ component: "router" });
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  it("silentLogger writes nothing", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
