import { describe, it, expect } from "vitest";
import { decodeChatStream, type StreamEventMapper } from "../src/stream-decoder.js";
import { ChatEventType } from "../src/types/enums.js";
import {
  AbortedError,
  ErrorKind,
  LLMError,
  ProviderError,
  StreamClosedError,
  TransportError,
  ValidationError,
} from "../src/types/errors.js";
import type { ChatChunk } from "../src/types/stream.js";
import { getString, isJsonObject } from "../src/utils/json.js";
import { chunkedStream, collect } from "./helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `{"t":"x"}` -> text delta "x"; `{"end":true}` -> done. */
const mapper: StreamEventMapper = (payload) => {
  if (isJsonObject(payload) && payload["end"] === true) {
    return { events: [{ type: ChatEventType.DONE }] };
  }
  const text = isJsonObject(payload) ? getString(payload, "t") : undefined;
  return text === undefined
    ? { events: [] }
    : { events: [{ type: ChatEventType.TEXT_DELTA, index: 0, text }] };
};

function errorOf(chunk: ChatChunk | undefined): LLMError | undefined {
  const event = chunk?.events[0];
  return event?.type === ChatEventType.ERROR ? event.error : undefined;
}

// ===========================================================================
// decodeChatStream
// ===========================================================================

describe("decodeChatStream", () => {
  it("maps payloads and ends with a terminal done chunk on the sentinel", async () => {
    const source = chunkedStream(['data: {"t":"Hel"}\n\n', 'data: {"t":"lo"}\n\n', "data: [DONE]\n\n"]);

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: mapper, sentinel: "[DONE]" }),
    );

    expect(chunks).toHaveLength(3);
    expect(chunks[0]).toEqual({
      events: [{ type: ChatEventType.TEXT_DELTA, index: 0, text: "Hel" }],
      is_terminal: false,
      provider: { provider: "test", endpoint: undefined },
    });
    expect(chunks[2]?.events).toEqual([{ type: ChatEventType.DONE }]);
    expect(chunks[2]?.is_terminal).toBe(true);
  });

  it("stops reading after the sentinel", async () => {
    const source = chunkedStream(["data: [DONE]\n\n", 'data: {"t":"late"}\n\n']);

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: mapper, sentinel: "[DONE]" }),
    );

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.events[0]?.type).toBe(ChatEventType.DONE);
  });

  it("skips empty payloads and payloads that map to nothing", async () => {
    const source = chunkedStream(["data: \n\n", 'data: {"other":1}\n\n', 'data: {"t":"x"}\n\n']);

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: mapper, requireTerminal: false }),
    );

    expect(chunks.map((c) => c.events[0]?.type)).toEqual([
      ChatEventType.TEXT_DELTA,
      ChatEventType.DONE,
    ]);
  });

  it("carries usage reported by the mapper", async () => {
    const withUsage: StreamEventMapper = () => ({ events: [], usage: { total_tokens: 9 } });
    const source = chunkedStream(['data: {"u":1}\n\n']);

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: withUsage, requireTerminal: false }),
    );

    expect(chunks[0]?.usage).toEqual({ total_tokens: 9 });
    expect(chunks[0]?.events).toEqual([]);
  });

  it("ends on a mapped terminal event", async () => {
    const source = chunkedStream(['data: {"end":true}\n\n', 'data: {"t":"after"}\n\n']);

    const chunks = await collect(decodeChatStream(source, { provider: "test", mapEvent: mapper }));

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.is_terminal).toBe(true);
  });

  it("yields a terminal error chunk for malformed JSON", async () => {
    const source = chunkedStream(['data: {"t":"ok"}\n\n', "data: {not json\n\n", 'data: {"t":"x"}\n\n']);

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: mapper, sentinel: "[DONE]" }),
    );

    expect(chunks).toHaveLength(2);
    const error = errorOf(chunks[1]);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error?.message).toMatch(/^failed to parse stream payload: /);
    expect(chunks[1]?.is_terminal).toBe(true);
  });

  it("turns a mapper exception into a terminal error chunk", async () => {
    const failing: StreamEventMapper = () => {
      throw new ValidationError("bad frame");
    };

    const chunks = await collect(
      decodeChatStream(chunkedStream(['data: {"t":"x"}\n\n']), { provider: "test", mapEvent: failing }),
    );

    expect(chunks).toHaveLength(1);
    expect(errorOf(chunks[0])?.message).toBe("bad frame");
  });

  it("reports StreamClosedError when a required terminal never arrives", async () => {
    const source = chunkedStream(['data: {"t":"x"}\n\n']);

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: mapper, sentinel: "[DONE]" }),
    );

    expect(chunks).toHaveLength(2);
    expect(errorOf(chunks[1])).toBeInstanceOf(StreamClosedError);
    expect(errorOf(chunks[1])?.kind).toBe(ErrorKind.STREAM_CLOSED);
  });

  it("treats end of input as a normal finish when no terminal is required", async () => {
    const source = chunkedStream(['data: {"t":"x"}\n\n']);

    const chunks = await collect(decodeChatStream(source, { provider: "test", mapEvent: mapper }));

    expect(chunks).toHaveLength(2);
    expect(chunks[1]?.events).toEqual([{ type: ChatEventType.DONE }]);
  });

  it("maps a read failure to TransportError", async () => {
    const encoder = new TextEncoder();
    let pulls = 0;
    const source = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls++;
        if (pulls === 1) {
          controller.enqueue(encoder.encode('data: {"t":"x"}\n\n'));
        } else {
          controller.error(new Error("socket hang up"));
        }
      },
    });

    const chunks = await collect(decodeChatStream(source, { provider: "test", mapEvent: mapper }));

    const error = errorOf(chunks[chunks.length - 1]);
    expect(error).toBeInstanceOf(TransportError);
    expect(error?.message).toBe("stream read failed: socket hang up");
  });

  it("maps a read failure after abort to AbortedError", async () => {
    const controller = new AbortController();
    const source = new ReadableStream<Uint8Array>({
      pull(c) {
        controller.abort();
        c.error(new Error("body stream aborted"));
      },
    });

    const chunks = await collect(
      decodeChatStream(source, { provider: "test", mapEvent: mapper, signal: controller.signal }),
    );

    expect(chunks).toHaveLength(1);
    expect(errorOf(chunks[0])).toBeInstanceOf(AbortedError);
  });

  it("cancels the source when the consumer abandons the stream", async () => {
    let cancelled = false;
    const encoder = new TextEncoder();
    const source = new ReadableStream<Uint8Array>({
      pull(c) {
        c.enqueue(encoder.encode('data: {"t":"x"}\n\n'));
      },
      cancel() {
        cancelled = true;
      },
    });

    const stream = decodeChatStream(source, { provider: "test", mapEvent: mapper });
    const first = await stream.next();
    expect(first.done).toBe(false);
    await stream.return?.(undefined);

    expect(cancelled).toBe(true);
  });

  it("cancels the source when the stream is closed before the first read", async () => {
    let cancelled = false;
    const source = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });

    const stream = decodeChatStream(source, { provider: "test", mapEvent: mapper });
    await stream.return?.(undefined);

    expect(cancelled).toBe(true);
    expect(await stream.next()).toEqual({ done: true, value: undefined });
  });
});

// ===========================================================================
// Chunking
// ===========================================================================

describe("decodeChatStream chunking", () => {
  const wire =
    'data: {"t":"h\u00e9"}\r\n\r\n' +
    'data: {"t":\r\ndata: "x"}\r\n\r\n' +
    "data: [DONE]\r\n\r\n" +
    'data: {"t":"late"}\r\n\r\n';

  /** One byte per chunk, so CRLF pairs and the two bytes of "é" are split. */
  function byteStream(text: string): ReadableStream<Uint8Array> {
    const bytes = new TextEncoder().encode(text);
    let offset = 0;
    return new ReadableStream<Uint8Array>({
      pull(controller) {
        if (offset < bytes.length) {
          controller.enqueue(bytes.slice(offset, offset + 1));
          offset++;
        } else {
          controller.close();
        }
      },
    });
  }

  it("yields the same chunks for byte-at-a-time and single-buffer input", async () => {
    const options = { provider: "test", mapEvent: mapper, sentinel: "[DONE]" };

    const whole = await collect(decodeChatStream(chunkedStream([wire]), options));
    const split = await collect(decodeChatStream(byteStream(wire), options));

    expect(whole.flatMap((chunk) => chunk.events)).toEqual([
      { type: ChatEventType.TEXT_DELTA, index: 0, text: "h\u00e9" },
      { type: ChatEventType.TEXT_DELTA, index: 0, text: "x" },
      { type: ChatEventType.DONE },
    ]);
    expect(split).toEqual(whole);
  });
});
