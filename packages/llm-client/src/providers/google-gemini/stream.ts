/**
 * Gemini stream mapping.
 *
 * With `alt=sse` every frame is a complete GenerateContentResponse holding
 * only the newest parts. Function calls arrive whole, so each becomes a
 * single finished tool-call delta with its own index.
 */

import {
  ChatEventType,
  ProviderError,
  ToolKind,
  type ChatEvent,
  type JsonValue,
} from "../../types/index.js";
import type { MappedEvents, StreamEventMapper } from "../../stream-decoder.js";
import { getNumber, getObject, getObjectArray, getString, isJsonObject } from "../../utils/json.js";
import { isThoughtPart, translateFinishReason, translateUsage } from "./translate-response.js";

const PROVIDER = "google_gemini";

interface StreamState {
  nextToolIndex: number;
}

function mapPayload(state: StreamState, payload: JsonValue): MappedEvents {
  if (!isJsonObject(payload)) {
    throw new ProviderError("unexpected stream payload", { provider: PROVIDER, raw: payload });
  }

  const error = getObject(payload, "error");
  if (error) {
    throw new ProviderError(getString(error, "message") ?? "stream error", {
      provider: PROVIDER,
      error_code: getString(error, "status"),
      raw: payload,
    });
  }

  const events: ChatEvent[] = [];

  getObjectArray(payload, "candidates").forEach((candidate, position) => {
    const index = getNumber(candidate, "index") ?? position;

    for (const part of getObjectArray(getObject(candidate, "content"), "parts")) {
      const call = getObject(part, "functionCall");
      const text = getString(part, "text");

      if (call) {
        events.push({
          type: ChatEventType.TOOL_CALL_DELTA,
          index: state.nextToolIndex++,
          id: getString(call, "id"),
          name: getString(call, "name"),
          arguments_delta: JSON.stringify(call["args"] ?? {}),
          kind: ToolKind.FUNCTION,
          is_finished: true,
        });
      } else if (text !== undefined && text.length > 0) {
        events.push(
          isThoughtPart(part)
            ? { type: ChatEventType.REASONING_DELTA, index, text }
            : { type: ChatEventType.TEXT_DELTA, index, text },
        );
      } else {
        events.push({ type: ChatEventType.CUSTOM, data: part });
      }
    }

    const finishRaw = getString(candidate, "finishReason");
    if (finishRaw !== undefined) {
      events.push({ type: ChatEventType.FINISH, index, finish_reason: translateFinishReason(finishRaw) });
    }
  });

  const usage = getObject(payload, "usageMetadata");
  return usage ? { events, usage: translateUsage(usage) } : { events };
}

export function createStreamMapper(): StreamEventMapper {
  const state: StreamState = { nextToolIndex: 0 };
  return (payload) => mapPayload(state, payload);
}
