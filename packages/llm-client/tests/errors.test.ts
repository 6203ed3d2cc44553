import { describe, it, expect } from "vitest";
import {
  AbortedError,
  AuthError,
  ErrorKind,
  HandleNotFoundError,
  InvalidConfigError,
  LLMError,
  ModelNotFoundError,
  NotImplementedError,
  ProviderError,
  RateLimitError,
  StreamClosedError,
  TokenLimitExceededError,
  TransportError,
  UnknownError,
  UnsupportedFeatureError,
  ValidationError,
  toLLMError,
} from "../src/types/errors.js";

describe("LLMError", () => {
  it("is an instance of Error and carries its kind", () => {
    const err = new LLMError(ErrorKind.PROVIDER, "something went wrong");
    expect(err).toBeInstanceOf(Error);
    expect(err.kind).toBe("provider");
    expect(err.message).toBe("something went wrong");
    expect(err.name).toBe("LLMError");
  });

  it("accepts a cause", () => {
    const cause = new Error("root cause");
    const err = new TransportError("wrapper", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("retryable flag", () => {
  it("is true only for rate_limit and transport", () => {
    const all: LLMError[] = [
      new TransportError("t"),
      new RateLimitError("r"),
      new AuthError("a"),
      new ValidationError("v"),
      new UnsupportedFeatureError("tools"),
      new ProviderError("p", { provider: "x" }),
      new TokenLimitExceededError("tl"),
      new ModelNotFoundError("m"),
      new StreamClosedError(),
      new InvalidConfigError("f", "r"),
      new AbortedError(),
      new HandleNotFoundError("h"),
      new NotImplementedError("n"),
      new UnknownError("u"),
    ];

    const retryable = all.filter((err) => err.retryable).map((err) => err.kind);
    expect(retryable).toEqual(["transport", "rate_limit"]);
  });
});

describe("subclasses", () => {
  it("RateLimitError keeps retry_after", () => {
    const err = new RateLimitError("slow down", { retry_after: 30 });
    expect(err.kind).toBe(ErrorKind.RATE_LIMIT);
    expect(err.retry_after).toBe(30);
    expect(err.name).toBe("RateLimitError");
  });

  it("UnsupportedFeatureError names the feature", () => {
    const err = new UnsupportedFeatureError("video_input");
    expect(err.feature).toBe("video_input");
    expect(err.message).toBe("unsupported feature: video_input");
  });

  it("ProviderError keeps vendor details", () => {
    const err = new ProviderError("boom", {
      provider: "openai_chat",
      status_code: 500,
      error_code: "server_error",
      raw: { error: "boom" },
    });
    expect(err).toMatchObject({
      kind: "provider",
      provider: "openai_chat",
      status_code: 500,
      error_code: "server_error",
      raw: { error: "boom" },
    });
  });

  it("ModelNotFoundError defaults its message", () => {
    const err = new ModelNotFoundError("gpt-x");
    expect(err.model).toBe("gpt-x");
    expect(err.message).toBe("model not found: gpt-x");
  });

  it("InvalidConfigError formats field and reason", () => {
    const err = new InvalidConfigError("patch.body", "too deep");
    expect(err.message).toBe("invalid config patch.body: too deep");
    expect(err.field).toBe("patch.body");
    expect(err.reason).toBe("too deep");
  });

  it("HandleNotFoundError names the handle", () => {
    const err = new HandleNotFoundError("missing");
    expect(err.handle).toBe("missing");
    expect(err.message).toBe("handle not found: missing");
  });

  it("StreamClosedError and AbortedError have default messages", () => {
    expect(new StreamClosedError().message).toBe("stream closed before a terminal event");
    expect(new AbortedError().message).toBe("request aborted");
  });
});

describe("toLLMError", () => {
  it("returns library errors unchanged", () => {
    const err = new AuthError("nope");
    expect(toLLMError(err)).toBe(err);
  });

  it("wraps other errors as UnknownError with the original as cause", () => {
    const original = new TypeError("bad");
    const wrapped = toLLMError(original);
    expect(wrapped).toBeInstanceOf(UnknownError);
    expect(wrapped.message).toBe("bad");
    expect(wrapped.cause).toBe(original);
  });

  it("stringifies non-Error values", () => {
    expect(toLLMError("oops").message).toBe("oops");
  });
});
