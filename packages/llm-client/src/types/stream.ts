/**
 * Stream event types and accumulator for the canonical chat model.
 */

import { ChatEventType, ContentKind, OutputKind, Role, ToolKind } from "./enums.js";
import type { LLMError } from "./errors.js";
import type { JsonValue } from "./json.js";
import type { ToolCall } from "./tool.js";
import type {
  ChatResponse,
  FinishReason,
  OutputItem,
  ProviderMetadata,
  TokenUsage,
} from "./response.js";

// ---------------------------------------------------------------------------
// ChatEvent -- discriminated union on `type`
// ---------------------------------------------------------------------------

export interface TextDeltaEvent {
  readonly type: typeof ChatEventType.TEXT_DELTA;
  readonly index: number;
  readonly text: string;
}

/**
 * Incremental tool call. `id` and `name` usually arrive on the first delta
 * for an index; later deltas carry argument fragments only.
 */
export interface ToolCallDeltaEvent {
  readonly type: typeof ChatEventType.TOOL_CALL_DELTA;
  readonly index: number;
  readonly id?: string;
  readonly name?: string;
  readonly arguments_delta?: string;
  readonly kind?: ToolKind;
  readonly is_finished: boolean;
}

export interface ReasoningDeltaEvent {
  readonly type: typeof ChatEventType.REASONING_DELTA;
  readonly index: number;
  readonly text: string;
}

export interface FinishEvent {
  readonly type: typeof ChatEventType.FINISH;
  readonly index: number;
  readonly finish_reason: FinishReason;
}

export interface DoneEvent {
  readonly type: typeof ChatEventType.DONE;
}

export interface ErrorEvent {
  readonly type: typeof ChatEventType.ERROR;
  readonly error: LLMError;
}

export interface CustomEvent {
  readonly type: typeof ChatEventType.CUSTOM;
  readonly data: JsonValue;
}

export type ChatEvent =
  | TextDeltaEvent
  | ToolCallDeltaEvent
  | ReasoningDeltaEvent
  | FinishEvent
  | DoneEvent
  | ErrorEvent
  | CustomEvent;

/** Events that end a stream. */
export function isTerminalEvent(event: ChatEvent): event is DoneEvent | ErrorEvent {
  return event.type === ChatEventType.DONE || event.type === ChatEventType.ERROR;
}

// ---------------------------------------------------------------------------
// ChatChunk / ChatStream
// ---------------------------------------------------------------------------

/** One decoded stream payload, as an ordered batch of events. */
export interface ChatChunk {
  readonly events: readonly ChatEvent[];
  readonly usage?: TokenUsage;
  /** True for the last chunk of a stream. */
  readonly is_terminal: boolean;
  readonly provider: ProviderMetadata;
}

/** Lazy, finite, non-restartable sequence of chunks. */
export type ChatStream = AsyncIterableIterator<ChatChunk>;

// ---------------------------------------------------------------------------
// StreamAccumulator
// ---------------------------------------------------------------------------

interface ToolCallBuilder {
  id?: string;
  name: string;
  kind: ToolKind;
  argumentChunks: string[];
}

function parseArguments(raw: string): JsonValue {
  if (raw.length === 0) return {};
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

/**
 * Collects stream chunks into a complete ChatResponse.
 *
 * Usage:
 * ```ts
 * const acc = new StreamAccumulator();
 * for await (const chunk of stream) {
 *   acc.process(chunk);
 * }
 * const response = acc.response();
 * ```
 */
export class StreamAccumulator {
  private textChunks = new Map<number, string[]>();
  private reasoningChunks = new Map<number, string[]>();
  private toolCallBuilders = new Map<number, ToolCallBuilder>();
  private finishReason: FinishReason | undefined;
  private accumulatedUsage: TokenUsage | undefined;
  private providerMetadata: ProviderMetadata | undefined;
  private streamError: LLMError | undefined;
  private completed = false;

  process(chunk: ChatChunk): void {
    this.providerMetadata = chunk.provider;
    if (chunk.usage) this.accumulatedUsage = chunk.usage;

    for (const event of chunk.events) {
      switch (event.type) {
        case ChatEventType.TEXT_DELTA:
          appendTo(this.textChunks, event.index, event.text);
          break;

        case ChatEventType.REASONING_DELTA:
          appendTo(this.reasoningChunks, event.index, event.text);
          break;

        case ChatEventType.TOOL_CALL_DELTA: {
          let builder = this.toolCallBuilders.get(event.index);
          if (!builder) {
            builder = { name: "", kind: ToolKind.FUNCTION, argumentChunks: [] };
            this.toolCallBuilders.set(event.index, builder);
          }
          if (event.id !== undefined) builder.id = event.id;
          if (event.name !== undefined) builder.name = event.name;
          if (event.kind !== undefined) builder.kind = event.kind;
          if (event.arguments_delta !== undefined) {
            builder.argumentChunks.push(event.arguments_delta);
          }
          break;
        }

        case ChatEventType.FINISH:
          this.finishReason = event.finish_reason;
          break;

        case ChatEventType.DONE:
          this.completed = true;
          break;

        case ChatEventType.ERROR:
          this.streamError = event.error;
          break;

        default:
          // custom events carry nothing to accumulate
          break;
      }
    }
  }

  /**
   * Build the accumulated ChatResponse. Reasoning outputs come first, then
   * messages, then tool calls, each in index order.
   */
  response(): ChatResponse {
    const outputs: OutputItem[] = [];

    for (const [index, parts] of sortedEntries(this.reasoningChunks)) {
      outputs.push({ kind: OutputKind.REASONING, index, text: parts.join("") });
    }

    for (const [index, parts] of sortedEntries(this.textChunks)) {
      outputs.push({
        kind: OutputKind.MESSAGE,
        index,
        message: {
          role: Role.ASSISTANT,
          content: [{ kind: ContentKind.TEXT, text: parts.join("") }],
        },
      });
    }

    for (const [index, call] of sortedEntries(this.toolCallBuilders)) {
      outputs.push({ kind: OutputKind.TOOL_CALL, index, tool_call: buildToolCall(call) });
    }

    return {
      outputs,
      usage: this.accumulatedUsage,
      finish_reason: this.finishReason,
      provider: this.providerMetadata ?? { provider: "" },
    };
  }

  /** Accumulated text across all indices. */
  get text(): string {
    return sortedEntries(this.textChunks).map(([, parts]) => parts.join("")).join("");
  }

  get reasoning(): string {
    return sortedEntries(this.reasoningChunks).map(([, parts]) => parts.join("")).join("");
  }

  get toolCalls(): ToolCall[] {
    return sortedEntries(this.toolCallBuilders).map(([, call]) => buildToolCall(call));
  }

  /** The error carried by a terminal error event, if one arrived. */
  get error(): LLMError | undefined {
    return this.streamError;
  }

  /** Whether a `done` event has been seen. */
  get done(): boolean {
    return this.completed;
  }
}

function appendTo(map: Map<number, string[]>, index: number, text: string): void {
  const parts = map.get(index);
  if (parts) {
    parts.push(text);
  } else {
    map.set(index, [text]);
  }
}

function sortedEntries<T>(map: Map<number, T>): Array<[number, T]> {
  return [...map.entries()].sort(([a], [b]) => a - b);
}

function buildToolCall(builder: ToolCallBuilder): ToolCall {
  return {
    id: builder.id,
    name: builder.name,
    arguments: parseArguments(builder.argumentChunks.join("")),
    kind: builder.kind,
  };
}
