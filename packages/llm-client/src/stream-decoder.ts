/**
 * Shared streaming decoder.
 *
 * Turns an SSE byte source into canonical chat chunks using a per-adapter
 * mapping function. Every failure mode ends the sequence with exactly one
 * terminal chunk; the consumer never sees an exception from iteration.
 */

import { ChatEventType } from "./types/enums.js";
import {
  AbortedError,
  LLMError,
  ProviderError,
  StreamClosedError,
  TransportError,
  toLLMError,
} from "./types/errors.js";
import type { JsonValue } from "./types/json.js";
import type { ProviderMetadata, TokenUsage } from "./types/response.js";
import type { ChatChunk, ChatEvent, ChatStream } from "./types/stream.js";
import { isTerminalEvent } from "./types/stream.js";
import type { Logger } from "./logging/logger.js";
import { parseJson } from "./utils/json.js";
import { parseSSEStream, type ByteSource, type SSEEvent } from "./utils/sse.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What an adapter's mapper produces for one vendor payload. */
export interface MappedEvents {
  events: ChatEvent[];
  usage?: TokenUsage;
}

/**
 * Maps one parsed vendor payload to canonical events. May throw an LLMError
 * to end the stream with that error.
 */
export type StreamEventMapper = (payload: JsonValue, frame: SSEEvent) => MappedEvents;

export interface DecodeOptions {
  /** Adapter name recorded on every chunk. */
  provider: string;
  endpoint?: string;
  mapEvent: StreamEventMapper;
  /** Payload that marks normal completion, e.g. "[DONE]". */
  sentinel?: string;
  /**
   * Whether reaching end of input without a terminal event is an error.
   * Defaults to `true` when a sentinel is declared.
   */
  requireTerminal?: boolean;
  /** Used to tell an abort apart from a transport failure on read errors. */
  signal?: AbortSignal;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isAbortLike(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

function readFailure(err: unknown, signal?: AbortSignal): LLMError {
  if (err instanceof LLMError) return err;
  if (signal?.aborted || isAbortLike(err)) {
    return new AbortedError("stream aborted", { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`stream read failed: ${message}`, { cause: err });
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

async function* decodeFrames(
  source: ByteSource,
  options: DecodeOptions,
): AsyncGenerator<ChatChunk, void, undefined> {
  const { provider, sentinel, mapEvent, logger } = options;
  const requireTerminal = options.requireTerminal ?? sentinel !== undefined;
  const metadata: ProviderMetadata = { provider, endpoint: options.endpoint };

  const chunk = (events: ChatEvent[], is_terminal: boolean, usage?: TokenUsage): ChatChunk =>
    usage ? { events, usage, is_terminal, provider: metadata } : { events, is_terminal, provider: metadata };

  const errorChunk = (error: LLMError): ChatChunk => {
    logger?.debug({ provider, kind: error.kind, err: error.message }, "stream terminated with error");
    return chunk([{ type: ChatEventType.ERROR, error }], true);
  };

  const frames = parseSSEStream(source);

  try {
    for (;;) {
      let next: IteratorResult<SSEEvent>;
      try {
        next = await frames.next();
      } catch (err) {
        yield errorChunk(readFailure(err, options.signal));
        return;
      }
      if (next.done) break;

      const frame = next.value;
      const data = frame.data.trim();
      if (data.length === 0) continue;

      if (sentinel !== undefined && data === sentinel) {
        logger?.debug({ provider }, "stream completed");
        yield chunk([{ type: ChatEventType.DONE }], true);
        return;
      }

      let payload: JsonValue;
      try {
        payload = parseJson(frame.data);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        yield errorChunk(
          new ProviderError(`failed to parse stream payload: ${reason}`, {
            provider,
            raw: frame.data,
            cause: err,
          }),
        );
        return;
      }

      let mapped: MappedEvents;
      try {
        mapped = mapEvent(payload, frame);
      } catch (err) {
        yield errorChunk(toLLMError(err));
        return;
      }

      if (mapped.events.length === 0 && !mapped.usage) continue;

      const terminal = mapped.events.some(isTerminalEvent);
      yield chunk(mapped.events, terminal, mapped.usage);
      if (terminal) {
        logger?.debug({ provider }, "stream completed");
        return;
      }
    }

    if (requireTerminal) {
      yield errorChunk(new StreamClosedError());
    } else {
      logger?.debug({ provider }, "stream completed");
      yield chunk([{ type: ChatEventType.DONE }], true);
    }
  } finally {
    await frames.return?.();
  }
}

// ---------------------------------------------------------------------------
// Stream handle
// ---------------------------------------------------------------------------

/** Release a source no reader has been opened on yet. */
async function cancelSource(source: ByteSource): Promise<void> {
  if ("getReader" in source) {
    if (!source.locked) await source.cancel();
    return;
  }
  await source[Symbol.asyncIterator]().return?.();
}

/**
 * The generator body only runs on the first `next()`, so closing a stream
 * that was never pulled has to release the source here.
 */
class DecodedChatStream implements ChatStream {
  private started = false;

  constructor(
    private readonly source: ByteSource,
    private readonly frames: AsyncGenerator<ChatChunk, void, undefined>,
  ) {}

  next(): Promise<IteratorResult<ChatChunk, void>> {
    this.started = true;
    return this.frames.next();
  }

  async return(): Promise<IteratorResult<ChatChunk, void>> {
    await this.releaseUnstarted();
    return this.frames.return(undefined);
  }

  async throw(err?: unknown): Promise<IteratorResult<ChatChunk, void>> {
    await this.releaseUnstarted();
    return this.frames.throw(err);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private async releaseUnstarted(): Promise<void> {
    if (this.started) return;
    this.started = true;
    await cancelSource(this.source);
  }
}

/**
 * Decode an SSE byte source into a lazy sequence of ChatChunks.
 *
 * - A sentinel payload yields a terminal `done` chunk; nothing after it is read.
 * - A payload that is not valid JSON yields a terminal `error` chunk.
 * - A mapped `done` or `error` event makes its chunk terminal.
 * - Abandoning iteration cancels the source, including before the first read.
 */
export function decodeChatStream(source: ByteSource, options: DecodeOptions): ChatStream {
  return new DecodedChatStream(source, decodeFrames(source, options));
}
