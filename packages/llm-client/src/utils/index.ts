/**
 * Barrel re-export for utility modules.
 */

// HTTP transport
export { FetchTransport, mergeHeaders, readStreamText } from "./http.js";
export type {
  HttpRequest,
  HttpResponse,
  HttpStreamResponse,
  HttpTransport,
} from "./http.js";

// SSE parser
export { parseSSEStream } from "./sse.js";
export type { SSEEvent, ByteSource } from "./sse.js";

// Retry utility
export { retry, calculateDelay, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryPolicy } from "./retry.js";

// Error mapping utility
export {
  mapHttpError,
  parseRetryAfter,
  looksLikeTokenLimitError,
  extractModelIdentifier,
} from "./error-mapping.js";

// JSON helpers
export {
  isJsonObject,
  parseJson,
  tryParseJson,
  getString,
  getNumber,
  getBoolean,
  getObject,
  getArray,
  getObjectArray,
  compactObject,
} from "./json.js";
