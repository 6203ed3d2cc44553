/**
 * Translate an Anthropic Messages response into a canonical ChatResponse.
 */

import {
  ContentKind,
  OutputKind,
  ProviderError,
  Role,
  ToolKind,
  type ChatResponse,
  type ContentPart,
  type FinishReason,
  type JsonObject,
  type JsonValue,
  type OutputItem,
  type ProviderMetadata,
  type TokenUsage,
} from "../../types/index.js";
import { getNumber, getObjectArray, getObject, getString, isJsonObject } from "../../utils/json.js";
import { mapFinishReason } from "../finish-reason.js";

const PROVIDER = "anthropic_messages";

export const STOP_REASON_ALIASES: Readonly<Record<string, FinishReason["reason"]>> = {
  end_turn: "stop",
  stop_sequence: "stop",
  pause_turn: "stop",
  max_tokens: "length",
  tool_use: "tool_calls",
  refusal: "content_filter",
};

export function translateStopReason(raw: string): FinishReason {
  return mapFinishReason(raw, STOP_REASON_ALIASES);
}

/** Anthropic reports no total, so it is derived when both halves are present. */
export function translateUsage(usage: JsonObject): TokenUsage {
  const prompt = getNumber(usage, "input_tokens");
  const completion = getNumber(usage, "output_tokens");
  return {
    prompt_tokens: prompt,
    completion_tokens: completion,
    total_tokens: prompt !== undefined && completion !== undefined ? prompt + completion : undefined,
    details: usage,
  };
}

export function translateResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
  if (!isJsonObject(body)) {
    throw new ProviderError("unexpected response shape", { provider: PROVIDER, raw: body });
  }

  const parts: ContentPart[] = [];
  const reasoning: string[] = [];
  const toolCalls: OutputItem[] = [];

  getObjectArray(body, "content").forEach((block, position) => {
    switch (getString(block, "type")) {
      case "text":
        parts.push({ kind: ContentKind.TEXT, text: getString(block, "text") ?? "" });
        break;
      case "thinking":
        reasoning.push(getString(block, "thinking") ?? "");
        break;
      case "tool_use":
        toolCalls.push({
          kind: OutputKind.TOOL_CALL,
          index: position,
          tool_call: {
            id: getString(block, "id"),
            name: getString(block, "name") ?? "",
            arguments: block["input"] ?? {},
            kind: ToolKind.FUNCTION,
          },
        });
        break;
      default:
        // redacted_thinking, server tool blocks
        parts.push({ kind: ContentKind.DATA, data: block });
    }
  });

  const outputs: OutputItem[] = [];
  if (reasoning.length > 0) {
    outputs.push({ kind: OutputKind.REASONING, index: 0, text: reasoning.join("") });
  }
  if (parts.length > 0) {
    outputs.push({
      kind: OutputKind.MESSAGE,
      index: 0,
      message: { role: Role.ASSISTANT, content: parts },
    });
  }
  outputs.push(...toolCalls);

  const stopReason = getString(body, "stop_reason");
  const usage = getObject(body, "usage");

  return {
    outputs,
    usage: usage ? translateUsage(usage) : undefined,
    finish_reason: stopReason !== undefined ? translateStopReason(stopReason) : undefined,
    model: getString(body, "model"),
    provider: {
      ...metadata,
      request_id: metadata.request_id ?? getString(body, "id"),
      raw: body,
    },
  };
}
