/**
 * Server-Sent Events (SSE) stream parser.
 *
 * Parses a byte source into an async iterable of SSE events:
 *   - `event:` lines set the event type
 *   - `data:` lines form the payload (multiple `data:` lines are joined with "\n")
 *   - `id:` and `retry:` lines are recorded on the event
 *   - Lines starting with `:` are comments (ignored)
 *   - A blank line dispatches the accumulated event
 *
 * Correctly handles chunks that split mid-line, mid-codepoint, or between the
 * two bytes of a "\r\n" terminator.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single parsed SSE event. */
export interface SSEEvent {
  /** The event type (from `event:` line). `undefined` if not specified. */
  event?: string;
  /** The event data (from `data:` lines, joined with newlines). */
  data: string;
  /** Last event id (from `id:` line). */
  id?: string;
  /** Reconnection interval in milliseconds (from `retry:` line). */
  retry?: number;
}

/** Anything the parser can pull bytes or text from. */
export type ByteSource =
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array | string>;

// ---------------------------------------------------------------------------
// Internal: source abstraction
// ---------------------------------------------------------------------------

type ChunkResult = { done: true } | { done: false; value: Uint8Array | string };

interface ChunkReader {
  read(): Promise<ChunkResult>;
  /** Stop the underlying source early. */
  cancel(): Promise<void>;
  release(): void;
}

function openReader(source: ByteSource): ChunkReader {
  if ("getReader" in source) {
    const reader = source.getReader();
    return {
      async read() {
        const result = await reader.read();
        return result.done ? { done: true } : { done: false, value: result.value };
      },
      cancel: () => reader.cancel(),
      release: () => reader.releaseLock(),
    };
  }

  const iterator = source[Symbol.asyncIterator]();
  return {
    async read() {
      const result = await iterator.next();
      return result.done ? { done: true } : { done: false, value: result.value };
    },
    async cancel() {
      await iterator.return?.();
    },
    release: () => undefined,
  };
}

// ---------------------------------------------------------------------------
// Internal: parse a single non-blank, non-comment line into field accumulators.
// ---------------------------------------------------------------------------

interface SSEAccumulator {
  eventType: string | undefined;
  dataLines: string[];
  id: string | undefined;
  retry: number | undefined;
}

/**
 * Process a single SSE line, updating the accumulator.
 * Blank lines and comment lines must be handled by the caller before
 * invoking this function.
 */
function processField(line: string, acc: SSEAccumulator): void {
  const colonIdx = line.indexOf(":");
  let field: string;
  let value: string;

  if (colonIdx === -1) {
    field = line;
    value = "";
  } else {
    field = line.slice(0, colonIdx);
    value = line.slice(colonIdx + 1);
    // Strip a single leading space if present.
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }
  }

  switch (field) {
    case "event":
      acc.eventType = value;
      break;
    case "data":
      acc.dataLines.push(value);
      break;
    case "id":
      acc.id = value;
      break;
    case "retry": {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        acc.retry = parsed;
      }
      break;
    }
    // Unknown fields are ignored.
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a byte source as an SSE event stream.
 *
 * Yields `SSEEvent` objects as they become complete (delimited by blank lines).
 * If the consumer stops iterating early, the source is cancelled.
 */
export async function* parseSSEStream(
  source: ByteSource,
): AsyncIterableIterator<SSEEvent> {
  const reader = openReader(source);
  const decoder = new TextDecoder();

  // Buffer for incomplete lines across chunk boundaries.
  let buffer = "";
  // The previous chunk ended in "\r"; a leading "\n" belongs to that terminator.
  let pendingCR = false;
  let finished = false;

  const acc: SSEAccumulator = {
    eventType: undefined,
    dataLines: [],
    id: undefined,
    retry: undefined,
  };

  function takeEvent(): SSEEvent | undefined {
    const event =
      acc.dataLines.length > 0
        ? { event: acc.eventType, data: acc.dataLines.join("\n"), id: acc.id, retry: acc.retry }
        : undefined;
    acc.eventType = undefined;
    acc.dataLines = [];
    acc.id = undefined;
    acc.retry = undefined;
    return event;
  }

  try {
    for (;;) {
      let result: ChunkResult;
      try {
        result = await reader.read();
      } catch (err) {
        finished = true;
        throw err;
      }

      if (result.done) {
        finished = true;
        buffer += decoder.decode();

        // A trailing line without a final newline.
        if (buffer.length > 0 && !buffer.startsWith(":")) {
          processField(buffer, acc);
        }
        buffer = "";

        // A trailing partial event (no final blank line) is still dispatched.
        const last = takeEvent();
        if (last) yield last;
        break;
      }

      let text =
        typeof result.value === "string"
          ? result.value
          : decoder.decode(result.value, { stream: true });
      if (text.length === 0) continue;

      if (pendingCR && text.startsWith("\n")) {
        text = text.slice(1);
      }
      pendingCR = text.endsWith("\r");
      buffer += text;

      // Lines are terminated by \r\n, \r, or \n.  The last element is either
      // "" (chunk ended on a terminator) or a partial line kept for later.
      const lines = buffer.split(/\r\n|\r|\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line === "") {
          const event = takeEvent();
          if (event) yield event;
          continue;
        }

        if (line.startsWith(":")) {
          continue;
        }

        processField(line, acc);
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.release();
  }
}
