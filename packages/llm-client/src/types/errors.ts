/**
 * Error hierarchy for the chat client.
 *
 * All library errors inherit from LLMError and carry a `kind` discriminator.
 * Only `rate_limit` and `transport` errors are retryable.
 */

import type { JsonValue } from "./json.js";

// ---------------------------------------------------------------------------
// ErrorKind
// ---------------------------------------------------------------------------

export const ErrorKind = {
  TRANSPORT: "transport",
  AUTH: "auth",
  RATE_LIMIT: "rate_limit",
  VALIDATION: "validation",
  UNSUPPORTED_FEATURE: "unsupported_feature",
  PROVIDER: "provider",
  TOKEN_LIMIT_EXCEEDED: "token_limit_exceeded",
  MODEL_NOT_FOUND: "model_not_found",
  STREAM_CLOSED: "stream_closed",
  INVALID_CONFIG: "invalid_config",
  ABORTED: "aborted",
  HANDLE_NOT_FOUND: "handle_not_found",
  NOT_IMPLEMENTED: "not_implemented",
  UNKNOWN: "unknown",
} as const satisfies Record<string, string>;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.RATE_LIMIT,
  ErrorKind.TRANSPORT,
]);

// ---------------------------------------------------------------------------
// LLMError -- base for all library errors
// ---------------------------------------------------------------------------

export class LLMError extends Error {
  readonly kind: ErrorKind;
  /** Whether the retry engine may re-issue the call. Derived from `kind`. */
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "LLMError";
    this.kind = kind;
    this.retryable = RETRYABLE_KINDS.has(kind);
  }
}

// ---------------------------------------------------------------------------
// Retryable
// ---------------------------------------------------------------------------

/** Network or I/O failure talking to the vendor. */
export class TransportError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.TRANSPORT, message, options);
    this.name = "TransportError";
  }
}

/** 429 or vendor overload. */
export class RateLimitError extends LLMError {
  /** Seconds the vendor asked us to wait. */
  readonly retry_after?: number;

  constructor(
    message: string,
    options?: { retry_after?: number; cause?: unknown },
  ) {
    super(ErrorKind.RATE_LIMIT, message, options);
    this.name = "RateLimitError";
    this.retry_after = options?.retry_after;
  }
}

// ---------------------------------------------------------------------------
// Non-retryable
// ---------------------------------------------------------------------------

/** Credential rejected, missing, or unsupported. */
export class AuthError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.AUTH, message, options);
    this.name = "AuthError";
  }
}

/** The request violates a canonical model invariant or was rejected as malformed. */
export class ValidationError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.VALIDATION, message, options);
    this.name = "ValidationError";
  }
}

/** The adapter does not implement a feature the request uses. */
export class UnsupportedFeatureError extends LLMError {
  readonly feature: string;

  constructor(feature: string, options?: { message?: string; cause?: unknown }) {
    super(
      ErrorKind.UNSUPPORTED_FEATURE,
      options?.message ?? `unsupported feature: ${feature}`,
      options,
    );
    this.name = "UnsupportedFeatureError";
    this.feature = feature;
  }
}

/** Opaque vendor failure. */
export class ProviderError extends LLMError {
  readonly provider: string;
  readonly status_code?: number;
  /** Vendor error code or type, when the body carried one. */
  readonly error_code?: string;
  readonly raw?: JsonValue;

  constructor(
    message: string,
    options: {
      provider: string;
      status_code?: number;
      error_code?: string;
      raw?: JsonValue;
      cause?: unknown;
    },
  ) {
    super(ErrorKind.PROVIDER, message, options);
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.error_code = options.error_code;
    this.raw = options.raw;
  }
}

/** Input plus requested output exceeds the model's context window. */
export class TokenLimitExceededError extends LLMError {
  readonly estimated?: number;
  readonly limit?: number;

  constructor(
    message: string,
    options?: { estimated?: number; limit?: number; cause?: unknown },
  ) {
    super(ErrorKind.TOKEN_LIMIT_EXCEEDED, message, options);
    this.name = "TokenLimitExceededError";
    this.estimated = options?.estimated;
    this.limit = options?.limit;
  }
}

export class ModelNotFoundError extends LLMError {
  readonly model: string;

  constructor(model: string, options?: { message?: string; cause?: unknown }) {
    super(
      ErrorKind.MODEL_NOT_FOUND,
      options?.message ?? `model not found: ${model}`,
      options,
    );
    this.name = "ModelNotFoundError";
    this.model = model;
  }
}

/** The stream ended before a terminal signal. */
export class StreamClosedError extends LLMError {
  constructor(message = "stream closed before a terminal event", options?: { cause?: unknown }) {
    super(ErrorKind.STREAM_CLOSED, message, options);
    this.name = "StreamClosedError";
  }
}

/** Configuration-time failure, e.g. a malformed request patch. */
export class InvalidConfigError extends LLMError {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string, options?: { cause?: unknown }) {
    super(ErrorKind.INVALID_CONFIG, `invalid config ${field}: ${reason}`, options);
    this.name = "InvalidConfigError";
    this.field = field;
    this.reason = reason;
  }
}

/** Cancelled via abort signal. */
export class AbortedError extends LLMError {
  constructor(message = "request aborted", options?: { cause?: unknown }) {
    super(ErrorKind.ABORTED, message, options);
    this.name = "AbortedError";
  }
}

/** Raised by the router for an unregistered handle. */
export class HandleNotFoundError extends LLMError {
  readonly handle: string;

  constructor(handle: string) {
    super(ErrorKind.HANDLE_NOT_FOUND, `handle not found: ${handle}`);
    this.name = "HandleNotFoundError";
    this.handle = handle;
  }
}

export class NotImplementedError extends LLMError {
  readonly feature: string;

  constructor(feature: string) {
    super(ErrorKind.NOT_IMPLEMENTED, `not implemented: ${feature}`);
    this.name = "NotImplementedError";
    this.feature = feature;
  }
}

export class UnknownError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.UNKNOWN, message, options);
    this.name = "UnknownError";
  }
}

/** Wrap anything thrown into an LLMError, leaving LLMErrors untouched. */
export function toLLMError(err: unknown): LLMError {
  if (err instanceof LLMError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new UnknownError(message, { cause: err });
}
