/**
 * OpenAI Responses API stream mapping.
 *
 * Every frame carries a `type`:
 *   response.created -> (response.output_item.added -> *.delta* ->
 *   response.output_item.done)* -> response.completed | response.incomplete
 *
 * `response.failed` and `error` end the stream with an error.
 */

import {
  ChatEventType,
  ProviderError,
  RateLimitError,
  ToolKind,
  type ChatEvent,
  type JsonValue,
} from "../../types/index.js";
import type { MappedEvents, StreamEventMapper } from "../../stream-decoder.js";
import { getNumber, getObject, getString, isJsonObject } from "../../utils/json.js";
import { translateStatus, translateUsage } from "./translate-response.js";

const PROVIDER = "openai_responses";

interface StreamState {
  functionCalls: Set<number>;
  sawFunctionCall: boolean;
}

function streamError(error: JsonValue | undefined, payload: JsonValue): Error {
  const details = isJsonObject(error) ? error : undefined;
  const code = getString(details, "code") ?? getString(details, "type");
  const message = getString(details, "message") ?? "stream error";
  if (code === "rate_limit_exceeded") {
    return new RateLimitError(message);
  }
  return new ProviderError(message, { provider: PROVIDER, error_code: code, raw: payload });
}

function mapEvent(state: StreamState, payload: JsonValue): MappedEvents {
  if (!isJsonObject(payload)) {
    throw new ProviderError("unexpected stream payload", { provider: PROVIDER, raw: payload });
  }

  const events: ChatEvent[] = [];
  const index = getNumber(payload, "output_index") ?? 0;

  switch (getString(payload, "type")) {
    case "response.output_item.added": {
      const item = getObject(payload, "item");
      if (getString(item, "type") === "function_call") {
        state.functionCalls.add(index);
        state.sawFunctionCall = true;
        const args = getString(item, "arguments");
        events.push({
          type: ChatEventType.TOOL_CALL_DELTA,
          index,
          id: getString(item, "call_id"),
          name: getString(item, "name"),
          arguments_delta: args !== undefined && args.length > 0 ? args : undefined,
          kind: ToolKind.FUNCTION,
          is_finished: false,
        });
      }
      return { events };
    }

    case "response.output_text.delta": {
      const text = getString(payload, "delta");
      if (text !== undefined && text.length > 0) {
        events.push({ type: ChatEventType.TEXT_DELTA, index, text });
      }
      return { events };
    }

    case "response.reasoning_summary_text.delta": {
      const text = getString(payload, "delta");
      if (text !== undefined && text.length > 0) {
        events.push({ type: ChatEventType.REASONING_DELTA, index, text });
      }
      return { events };
    }

    case "response.function_call_arguments.delta":
      events.push({
        type: ChatEventType.TOOL_CALL_DELTA,
        index,
        arguments_delta: getString(payload, "delta") ?? "",
        is_finished: false,
      });
      return { events };

    case "response.output_item.done":
      if (state.functionCalls.delete(index)) {
        events.push({ type: ChatEventType.TOOL_CALL_DELTA, index, is_finished: true });
      }
      return { events };

    case "response.completed":
    case "response.incomplete": {
      const response = getObject(payload, "response") ?? {};
      const finish = translateStatus(response, state.sawFunctionCall);
      if (finish !== undefined) {
        events.push({ type: ChatEventType.FINISH, index: 0, finish_reason: finish });
      }
      events.push({ type: ChatEventType.DONE });
      const usage = getObject(response, "usage");
      return usage ? { events, usage: translateUsage(usage) } : { events };
    }

    case "response.failed":
      throw streamError(getObject(payload, "response")?.["error"], payload);

    case "error":
      throw streamError(payload, payload);

    default:
      // response.created, content_part and *.done text frames
      return { events };
  }
}

/** Mapper with fresh per-stream state. */
export function createStreamMapper(): StreamEventMapper {
  const state: StreamState = { functionCalls: new Set(), sawFunctionCall: false };
  return (payload) => mapEvent(state, payload);
}
