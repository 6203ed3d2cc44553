/**
 * OpenAI Chat Completions stream mapping.
 *
 * - data: {"choices":[{"delta":{"content":"text"}, "finish_reason": null}]}
 * - data: {"choices":[{"delta":{"tool_calls":[{"index":0,...}]}}]}
 * - data: {"choices":[], "usage":{...}}
 * - data: [DONE]   (handled by the decoder's sentinel)
 */

import {
  ChatEventType,
  ProviderError,
  ToolKind,
  type ChatEvent,
  type JsonValue,
} from "../../types/index.js";
import type { MappedEvents, StreamEventMapper } from "../../stream-decoder.js";
import {
  getNumber,
  getObject,
  getObjectArray,
  getString,
  isJsonObject,
} from "../../utils/json.js";
import { mapFinishReason } from "../finish-reason.js";
import { translateUsage } from "./translate-response.js";

const PROVIDER = "openai_chat";

/** Map one Chat Completions stream payload to canonical events. */
export function translateStreamPayload(payload: JsonValue): MappedEvents {
  if (!isJsonObject(payload)) {
    throw new ProviderError("unexpected stream payload", { provider: PROVIDER, raw: payload });
  }

  // Some compatible servers report failures in-band.
  const error = getObject(payload, "error");
  if (error) {
    throw new ProviderError(getString(error, "message") ?? "stream error", {
      provider: PROVIDER,
      error_code: getString(error, "code") ?? getString(error, "type"),
      raw: payload,
    });
  }

  const events: ChatEvent[] = [];

  for (const choice of getObjectArray(payload, "choices")) {
    const index = getNumber(choice, "index") ?? 0;
    const finishRaw = getString(choice, "finish_reason");
    const delta = getObject(choice, "delta");

    const content = getString(delta, "content");
    if (content !== undefined && content.length > 0) {
      events.push({ type: ChatEventType.TEXT_DELTA, index, text: content });
    }

    // Reasoning text as emitted by several compatible servers.
    const reasoning = getString(delta, "reasoning_content");
    if (reasoning !== undefined && reasoning.length > 0) {
      events.push({ type: ChatEventType.REASONING_DELTA, index, text: reasoning });
    }

    for (const call of getObjectArray(delta, "tool_calls")) {
      const fn = getObject(call, "function");
      events.push({
        type: ChatEventType.TOOL_CALL_DELTA,
        index: getNumber(call, "index") ?? index,
        id: getString(call, "id"),
        name: getString(fn, "name"),
        arguments_delta: getString(fn, "arguments"),
        kind: getString(call, "type") === "function" ? ToolKind.FUNCTION : undefined,
        is_finished: finishRaw === "tool_calls",
      });
    }

    if (finishRaw !== undefined) {
      events.push({ type: ChatEventType.FINISH, index, finish_reason: mapFinishReason(finishRaw) });
    }
  }

  const usage = getObject(payload, "usage");
  return usage ? { events, usage: translateUsage(usage) } : { events };
}

/** The mapping is stateless, so every stream can share it. */
export function createStreamMapper(): StreamEventMapper {
  return (payload) => translateStreamPayload(payload);
}
