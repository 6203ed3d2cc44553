/**
 * Error mapping utility for provider HTTP responses.
 *
 * Maps HTTP status codes and response bodies to the LLMError taxonomy.
 * Adapters call `mapHttpError` from their `parseError` hook and may
 * special-case vendor statuses before falling back to it.
 */

import {
  AuthError,
  LLMError,
  ModelNotFoundError,
  ProviderError,
  RateLimitError,
  TokenLimitExceededError,
  ValidationError,
} from "../types/errors.js";
import type { JsonValue } from "../types/json.js";
import { getObject, getString, isJsonObject, tryParseJson } from "./json.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Try to extract a human-readable error message from a provider response body. */
export function extractMessage(body: JsonValue | undefined): string | undefined {
  if (!isJsonObject(body)) return undefined;

  // Most providers nest under `error.message`.
  const nested = getString(getObject(body, "error"), "message");
  if (nested !== undefined) return nested;

  // Some providers put `message` at the top level.
  const top = getString(body, "message");
  if (top !== undefined) return top;

  // Fallback: `error` as string.
  return getString(body, "error");
}

/** Try to extract an error code from a provider response body. */
export function extractErrorCode(body: JsonValue | undefined): string | undefined {
  if (!isJsonObject(body)) return undefined;

  const errObj = getObject(body, "error");
  return (
    getString(errObj, "code") ??
    getString(errObj, "type") ??
    getString(errObj, "status") ??
    getString(body, "code") ??
    getString(body, "type")
  );
}

/**
 * Parse the `Retry-After` header value as whole seconds. HTTP-date values
 * are uncommon for LLM APIs and are ignored.
 */
export function parseRetryAfter(
  headers?: Record<string, string>,
): number | undefined {
  if (!headers) return undefined;

  const entry = Object.entries(headers).find(([name]) => name.toLowerCase() === "retry-after");
  if (!entry) return undefined;

  const raw = entry[1].trim();
  if (!/^\d+$/.test(raw)) return undefined;
  return parseInt(raw, 10);
}

// ---------------------------------------------------------------------------
// Classification heuristics
// ---------------------------------------------------------------------------

const TOKEN_LIMIT_CODES = new Set([
  "context_length_exceeded",
  "max_tokens_exceeded",
  "string_above_max_length",
  "tokens_exceeded",
]);

const TOKEN_LIMIT_HINTS = [
  "context length",
  "context window",
  "token limit",
  "maximum output tokens",
  "max output tokens",
  "prompt is too long",
  "too many tokens",
];

/** Whether a vendor code or message describes a context-window overflow. */
export function looksLikeTokenLimitError(
  code: string | undefined,
  message: string,
): boolean {
  if (code !== undefined) {
    const lowered = code.toLowerCase();
    if (TOKEN_LIMIT_CODES.has(lowered) || lowered.includes("token")) return true;
  }
  const text = message.toLowerCase();
  return TOKEN_LIMIT_HINTS.some((hint) => text.includes(hint));
}

/**
 * Pull a model identifier out of a message like "The model `gpt-x` does not
 * exist": the first text between backticks or quotes.
 */
export function extractModelIdentifier(message: string): string | undefined {
  const match = /[`"']([^`"']+)[`"']/.exec(message);
  return match?.[1];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `LLMError`.
 *
 * @param status   - HTTP status code from the provider response.
 * @param rawBody  - Response body text.
 * @param provider - Adapter name (e.g. "openai_chat").
 * @param headers  - Response headers (used to extract Retry-After).
 */
export function mapHttpError(
  status: number,
  rawBody: string,
  provider: string,
  headers?: Record<string, string>,
): LLMError {
  const body = tryParseJson(rawBody);
  const message = extractMessage(body) ?? `status ${status}: ${rawBody}`;
  const errorCode = extractErrorCode(body);

  switch (status) {
    case 401:
    case 403:
      return new AuthError(message);
    case 429:
      return new RateLimitError(message, { retry_after: parseRetryAfter(headers) });
    case 400:
    case 413:
    case 422:
      return looksLikeTokenLimitError(errorCode, message)
        ? new TokenLimitExceededError(message)
        : new ValidationError(message);
    case 404: {
      const model = extractModelIdentifier(message);
      if (model !== undefined) return new ModelNotFoundError(model, { message });
      break;
    }
  }

  return new ProviderError(message, {
    provider,
    status_code: status,
    error_code: errorCode,
    raw: body ?? rawBody,
  });
}
