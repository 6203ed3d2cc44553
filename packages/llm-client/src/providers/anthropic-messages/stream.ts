/**
 * Anthropic Messages stream mapping.
 *
 * The event stream is a sequence of typed frames:
 *   message_start -> (content_block_start -> content_block_delta* -> content_block_stop)*
 *   -> message_delta -> message_stop
 *
 * Tool-use blocks are tracked per stream so `content_block_stop` can mark
 * the call finished, and input tokens from `message_start` are carried
 * into the final usage report.
 */

import {
  ChatEventType,
  ProviderError,
  RateLimitError,
  ToolKind,
  type ChatEvent,
  type JsonValue,
  type TokenUsage,
} from "../../types/index.js";
import type { MappedEvents, StreamEventMapper } from "../../stream-decoder.js";
import { getNumber, getObject, getString, isJsonObject } from "../../utils/json.js";
import { translateStopReason, translateUsage } from "./translate-response.js";

const PROVIDER = "anthropic_messages";

/** Text and reasoning share one output; tool calls keep their block index. */
const MESSAGE_INDEX = 0;

interface StreamState {
  toolBlocks: Set<number>;
  inputTokens?: number;
}

function streamError(payload: JsonValue): Error {
  const error = isJsonObject(payload) ? getObject(payload, "error") : undefined;
  const type = getString(error, "type");
  const message = getString(error, "message") ?? "stream error";
  if (type === "overloaded_error" || type === "rate_limit_error") {
    return new RateLimitError(message);
  }
  return new ProviderError(message, { provider: PROVIDER, error_code: type, raw: payload });
}

function mapEvent(state: StreamState, payload: JsonValue): MappedEvents {
  if (!isJsonObject(payload)) {
    throw new ProviderError("unexpected stream payload", { provider: PROVIDER, raw: payload });
  }

  const events: ChatEvent[] = [];
  const index = getNumber(payload, "index") ?? 0;

  switch (getString(payload, "type")) {
    case "message_start": {
      const usage = getObject(getObject(payload, "message"), "usage");
      if (!usage) return { events };
      state.inputTokens = getNumber(usage, "input_tokens");
      return { events, usage: translateUsage(usage) };
    }

    case "content_block_start": {
      const block = getObject(payload, "content_block");
      const blockType = getString(block, "type");
      if (blockType === "tool_use") {
        state.toolBlocks.add(index);
        events.push({
          type: ChatEventType.TOOL_CALL_DELTA,
          index,
          id: getString(block, "id"),
          name: getString(block, "name"),
          kind: ToolKind.FUNCTION,
          is_finished: false,
        });
      } else if (blockType === "text") {
        const text = getString(block, "text");
        if (text !== undefined && text.length > 0) {
          events.push({ type: ChatEventType.TEXT_DELTA, index: MESSAGE_INDEX, text });
        }
      }
      return { events };
    }

    case "content_block_delta": {
      const delta = getObject(payload, "delta");
      switch (getString(delta, "type")) {
        case "text_delta":
          events.push({
            type: ChatEventType.TEXT_DELTA,
            index: MESSAGE_INDEX,
            text: getString(delta, "text") ?? "",
          });
          break;
        case "input_json_delta":
          events.push({
            type: ChatEventType.TOOL_CALL_DELTA,
            index,
            arguments_delta: getString(delta, "partial_json") ?? "",
            is_finished: false,
          });
          break;
        case "thinking_delta":
          events.push({
            type: ChatEventType.REASONING_DELTA,
            index: MESSAGE_INDEX,
            text: getString(delta, "thinking") ?? "",
          });
          break;
        default:
          // signature_delta and future delta kinds
          break;
      }
      return { events };
    }

    case "content_block_stop":
      if (state.toolBlocks.delete(index)) {
        events.push({ type: ChatEventType.TOOL_CALL_DELTA, index, is_finished: true });
      }
      return { events };

    case "message_delta": {
      const stopReason = getString(getObject(payload, "delta"), "stop_reason");
      if (stopReason !== undefined) {
        events.push({
          type: ChatEventType.FINISH,
          index: MESSAGE_INDEX,
          finish_reason: translateStopReason(stopReason),
        });
      }
      const usage = getObject(payload, "usage");
      if (!usage) return { events };

      const completion = getNumber(usage, "output_tokens");
      const prompt = getNumber(usage, "input_tokens") ?? state.inputTokens;
      const merged: TokenUsage = {
        prompt_tokens: prompt,
        completion_tokens: completion,
        total_tokens:
          prompt !== undefined && completion !== undefined ? prompt + completion : undefined,
        details: usage,
      };
      return { events, usage: merged };
    }

    case "message_stop":
      events.push({ type: ChatEventType.DONE });
      return { events };

    case "error":
      throw streamError(payload);

    default:
      // ping
      return { events };
  }
}

/** Mapper with fresh per-stream state. */
export function createStreamMapper(): StreamEventMapper {
  const state: StreamState = { toolBlocks: new Set() };
  return (payload) => mapEvent(state, payload);
}
