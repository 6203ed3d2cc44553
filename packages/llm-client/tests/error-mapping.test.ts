import { describe, it, expect } from "vitest";
import {
  extractErrorCode,
  extractMessage,
  extractModelIdentifier,
  looksLikeTokenLimitError,
  mapHttpError,
  parseRetryAfter,
} from "../src/utils/error-mapping.js";
import {
  AuthError,
  ModelNotFoundError,
  ProviderError,
  RateLimitError,
  TokenLimitExceededError,
  ValidationError,
} from "../src/types/errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Standard provider error body, serialized. */
function errorBody(message: string, code?: string): string {
  return JSON.stringify({ error: { message, ...(code ? { code } : {}) } });
}

// ---------------------------------------------------------------------------
// Tests: status code mapping
// ---------------------------------------------------------------------------

describe("mapHttpError — status code mapping", () => {
  it("401 and 403 → AuthError", () => {
    expect(mapHttpError(401, errorBody("invalid api key"), "openai_chat")).toBeInstanceOf(AuthError);
    expect(mapHttpError(403, errorBody("forbidden"), "openai_chat")).toBeInstanceOf(AuthError);
  });

  it("429 → RateLimitError with retry_after from the header", () => {
    const err = mapHttpError(429, errorBody("too many requests"), "openai_chat", {
      "retry-after": "12",
    });
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toMatchObject({ message: "too many requests", retry_after: 12 });
    expect(err.retryable).toBe(true);
  });

  it("400 → ValidationError", () => {
    const err = mapHttpError(400, errorBody("bad request"), "openai_chat");
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.message).toBe("bad request");
  });

  it("400 with a context overflow code → TokenLimitExceededError", () => {
    const err = mapHttpError(
      400,
      errorBody("This model's maximum context is 8192", "context_length_exceeded"),
      "openai_chat",
    );
    expect(err).toBeInstanceOf(TokenLimitExceededError);
  });

  it("413 with a context overflow message → TokenLimitExceededError", () => {
    const err = mapHttpError(413, errorBody("prompt is too long: 300000 tokens"), "anthropic_messages");
    expect(err).toBeInstanceOf(TokenLimitExceededError);
  });

  it("404 naming a model → ModelNotFoundError", () => {
    const err = mapHttpError(404, errorBody("The model `gpt-unknown` does not exist"), "openai_chat");
    expect(err).toBeInstanceOf(ModelNotFoundError);
    expect(err).toMatchObject({ model: "gpt-unknown" });
  });

  it("404 without a model name → ProviderError", () => {
    const err = mapHttpError(404, errorBody("not found"), "openai_chat");
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ status_code: 404 });
  });

  it("5xx → ProviderError carrying the parsed body and code", () => {
    const err = mapHttpError(503, errorBody("overloaded", "server_busy"), "openai_chat");
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      provider: "openai_chat",
      status_code: 503,
      error_code: "server_busy",
      raw: { error: { message: "overloaded", code: "server_busy" } },
    });
    expect(err.retryable).toBe(false);
  });

  it("falls back to the raw body when it is not JSON", () => {
    const err = mapHttpError(502, "Bad Gateway", "openai_chat");
    expect(err.message).toBe("status 502: Bad Gateway");
    expect(err).toMatchObject({ raw: "Bad Gateway" });
  });
});

// ---------------------------------------------------------------------------
// Tests: helpers
// ---------------------------------------------------------------------------

describe("extractMessage", () => {
  it("reads error.message, then message, then a string error", () => {
    expect(extractMessage({ error: { message: "nested" } })).toBe("nested");
    expect(extractMessage({ message: "top" })).toBe("top");
    expect(extractMessage({ error: "plain" })).toBe("plain");
    expect(extractMessage(["not", "an", "object"])).toBeUndefined();
  });
});

describe("extractErrorCode", () => {
  it("prefers error.code, then error.type, then error.status", () => {
    expect(extractErrorCode({ error: { code: "c", type: "t" } })).toBe("c");
    expect(extractErrorCode({ error: { type: "invalid_request_error" } })).toBe("invalid_request_error");
    expect(extractErrorCode({ error: { status: "RESOURCE_EXHAUSTED" } })).toBe("RESOURCE_EXHAUSTED");
    expect(extractErrorCode({ code: "top" })).toBe("top");
  });
});

describe("parseRetryAfter", () => {
  it("reads whole seconds case-insensitively", () => {
    expect(parseRetryAfter({ "Retry-After": " 5 " })).toBe(5);
  });

  it("ignores HTTP dates and missing headers", () => {
    expect(parseRetryAfter({ "retry-after": "Wed, 21 Oct 2015 07:28:00 GMT" })).toBeUndefined();
    expect(parseRetryAfter({})).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
  });
});

describe("looksLikeTokenLimitError", () => {
  it("matches known codes and hint phrases", () => {
    expect(looksLikeTokenLimitError("context_length_exceeded", "")).toBe(true);
    expect(looksLikeTokenLimitError(undefined, "Input exceeds the context window")).toBe(true);
    expect(looksLikeTokenLimitError("invalid_value", "temperature out of range")).toBe(false);
  });
});

describe("extractModelIdentifier", () => {
  it("returns the first quoted token", () => {
    expect(extractModelIdentifier("model 'claude-x' not found")).toBe("claude-x");
    expect(extractModelIdentifier('model "gemini-y" missing')).toBe("gemini-y");
    expect(extractModelIdentifier("no quotes here")).toBeUndefined();
  });
});
