/**
 * HTTP transport used by provider adapters.
 *
 * The transport is an interface so tests and embedders can supply their own;
 * `FetchTransport` is a thin wrapper around the native `fetch` API.
 */

import { AbortedError, TransportError } from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpRequest {
  method: "POST" | "GET";
  url: string;
  headers: Record<string, string>;
  /** Serialized request body. */
  body?: string;
  signal?: AbortSignal;
  /** Request timeout in milliseconds. Combined with `signal`. */
  timeout?: number;
}

/** Resolved response from a non-streaming HTTP request. */
export interface HttpResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  /** Raw response text. */
  body: string;
}

/** Resolved response from a streaming HTTP request. */
export interface HttpStreamResponse {
  status: number;
  headers: Record<string, string>;
  body: ReadableStream<Uint8Array>;
}

/**
 * Sends requests on behalf of adapters. Implementations resolve on any HTTP
 * status and reject only on network failure or abort.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  sendStream(request: HttpRequest): Promise<HttpStreamResponse>;
}

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Build a combined `AbortSignal` from an optional caller signal and an
 * optional timeout value.  Returns `undefined` when neither is provided.
 */
function buildSignal(request: HttpRequest): AbortSignal | undefined {
  const signals: AbortSignal[] = [];

  if (request.signal) {
    signals.push(request.signal);
  }

  if (request.timeout != null && request.timeout > 0) {
    signals.push(AbortSignal.timeout(request.timeout));
  }

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

function headersToRecord(headers: FetchResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

function mapFetchFailure(err: unknown, request: HttpRequest): Error {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof Error && err.name === "TimeoutError") {
    return new TransportError(`request timed out: ${request.url}`, { cause: err });
  }
  if (request.signal?.aborted || (err instanceof Error && err.name === "AbortError")) {
    return new AbortedError("request aborted", { cause: err });
  }
  return new TransportError(`request to ${request.url} failed: ${message}`, { cause: err });
}

// ---------------------------------------------------------------------------
// FetchTransport
// ---------------------------------------------------------------------------

export class FetchTransport implements HttpTransport {
  private readonly defaultTimeout?: number;

  constructor(options?: { timeout?: number }) {
    this.defaultTimeout = options?.timeout;
  }

  private async dispatch(request: HttpRequest): Promise<FetchResponse> {
    try {
      return await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: buildSignal({ ...request, timeout: request.timeout ?? this.defaultTimeout }),
      });
    } catch (err) {
      throw mapFetchFailure(err, request);
    }
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const res = await this.dispatch(request);
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw mapFetchFailure(err, request);
    }
    return { status: res.status, headers: headersToRecord(res.headers), body: text };
  }

  async sendStream(request: HttpRequest): Promise<HttpStreamResponse> {
    const res = await this.dispatch(request);
    if (!res.body) {
      throw new TransportError("response body is null; streaming not supported");
    }
    return { status: res.status, headers: headersToRecord(res.headers), body: res.body };
  }
}

/** Read a byte stream to the end as text. Used for error bodies on streaming calls. */
export async function readStreamText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = "";
  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    return text + decoder.decode();
  } finally {
    reader.releaseLock();
  }
}
