/**
 * Shared test fixtures: in-memory byte streams and a scripted transport.
 */

import type {
  HttpRequest,
  HttpResponse,
  HttpStreamResponse,
  HttpTransport,
} from "../src/utils/http.js";

/** Create a ReadableStream from an array of string chunks (simulating network). */
export function chunkedStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

/** Collect all items from an async iterable. */
export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iter) {
    items.push(item);
  }
  return items;
}

/** SSE frames for a list of JSON payloads, each as `data:` followed by a blank line. */
export function sseFrames(payloads: unknown[], trailer?: string): string[] {
  const frames = payloads.map((payload) => `data: ${JSON.stringify(payload)}\n\n`);
  if (trailer !== undefined) frames.push(`data: ${trailer}\n\n`);
  return frames;
}

type Scripted =
  | { kind: "response"; response: HttpResponse }
  | { kind: "stream"; status: number; chunks: string[]; headers: Record<string, string> }
  | { kind: "error"; error: Error };

/**
 * Transport that replays scripted responses in order and records every
 * request it receives.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly script: Scripted[] = [];

  respond(status: number, body: unknown, headers: Record<string, string> = {}): this {
    const text = typeof body === "string" ? body : JSON.stringify(body);
    this.script.push({ kind: "response", response: { status, headers, body: text } });
    return this;
  }

  stream(chunks: string[], status = 200, headers: Record<string, string> = {}): this {
    this.script.push({ kind: "stream", status, chunks, headers });
    return this;
  }

  fail(error: Error): this {
    this.script.push({ kind: "error", error });
    return this;
  }

  /** The parsed JSON body of the n-th recorded request. */
  body(n = 0): unknown {
    const raw = this.requests[n]?.body;
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  private next(request: HttpRequest): Scripted {
    this.requests.push(request);
    const step = this.script.shift();
    if (!step) throw new Error(`unscripted request to ${request.url}`);
    return step;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const step = this.next(request);
    if (step.kind === "error") throw step.error;
    if (step.kind === "stream") {
      return { status: step.status, headers: step.headers, body: step.chunks.join("") };
    }
    return step.response;
  }

  async sendStream(request: HttpRequest): Promise<HttpStreamResponse> {
    const step = this.next(request);
    if (step.kind === "error") throw step.error;
    if (step.kind === "response") {
      return {
        status: step.response.status,
        headers: step.response.headers,
        body: chunkedStream([step.response.body]),
      };
    }
    return { status: step.status, headers: step.headers, body: chunkedStream(step.chunks) };
  }
}
