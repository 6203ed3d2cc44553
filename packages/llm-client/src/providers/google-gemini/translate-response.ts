/**
 * Translate a Gemini GenerateContent response into a canonical ChatResponse.
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
import { getBoolean, getNumber, getObject, getObjectArray, getString, isJsonObject } from "../../utils/json.js";
import { mapFinishReason } from "../finish-reason.js";

const PROVIDER = "google_gemini";

const FINISH_REASON_ALIASES: Readonly<Record<string, FinishReason["reason"]>> = {
  STOP: "stop",
  MAX_TOKENS: "length",
  MALFORMED_FUNCTION_CALL: "function_call",
  SAFETY: "content_filter",
  RECITATION: "content_filter",
  LANGUAGE: "content_filter",
  BLOCKLIST: "content_filter",
  PROHIBITED_CONTENT: "content_filter",
  SPII: "content_filter",
  IMAGE_SAFETY: "content_filter",
};

export function translateFinishReason(raw: string): FinishReason {
  return mapFinishReason(raw, FINISH_REASON_ALIASES);
}

export function translateUsage(usage: JsonObject): TokenUsage {
  return {
    prompt_tokens: getNumber(usage, "promptTokenCount"),
    completion_tokens: getNumber(usage, "candidatesTokenCount"),
    reasoning_tokens: getNumber(usage, "thoughtsTokenCount"),
    total_tokens: getNumber(usage, "totalTokenCount"),
    details: usage,
  };
}

/** Parts flagged `thought: true` are the model's reasoning summary. */
export function isThoughtPart(part: JsonObject): boolean {
  return getBoolean(part, "thought") === true;
}

export function translateResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
  if (!isJsonObject(body)) {
    throw new ProviderError("unexpected response shape", { provider: PROVIDER, raw: body });
  }

  const outputs: OutputItem[] = [];
  const candidates = getObjectArray(body, "candidates");

  candidates.forEach((candidate, position) => {
    const index = getNumber(candidate, "index") ?? position;
    const parts = getObjectArray(getObject(candidate, "content"), "parts");

    const content: ContentPart[] = [];
    const reasoning: string[] = [];
    const calls: OutputItem[] = [];

    for (const part of parts) {
      const text = getString(part, "text");
      const call = getObject(part, "functionCall");
      const reply = getObject(part, "functionResponse");

      if (call) {
        const name = getString(call, "name") ?? "";
        calls.push({
          kind: OutputKind.TOOL_CALL,
          index,
          tool_call: {
            id: getString(call, "id"),
            name,
            arguments: call["args"] ?? {},
            kind: ToolKind.FUNCTION,
          },
        });
      } else if (reply) {
        calls.push({
          kind: OutputKind.TOOL_RESULT,
          index,
          tool_result: {
            call_id: getString(reply, "name"),
            output: reply["response"] ?? null,
            is_error: false,
          },
        });
      } else if (text !== undefined && isThoughtPart(part)) {
        reasoning.push(text);
      } else if (text !== undefined && text.length > 0) {
        content.push({ kind: ContentKind.TEXT, text });
      } else {
        content.push({ kind: ContentKind.DATA, data: part });
      }
    }

    if (reasoning.length > 0) {
      outputs.push({ kind: OutputKind.REASONING, index, text: reasoning.join("") });
    }
    if (content.length > 0) {
      outputs.push({ kind: OutputKind.MESSAGE, index, message: { role: Role.ASSISTANT, content } });
    }
    outputs.push(...calls);
  });

  const rawFinish = candidates
    .map((candidate) => getString(candidate, "finishReason"))
    .find((reason) => reason !== undefined);
  const usage = getObject(body, "usageMetadata");

  return {
    outputs,
    usage: usage ? translateUsage(usage) : undefined,
    finish_reason: rawFinish !== undefined ? translateFinishReason(rawFinish) : undefined,
    model: getString(body, "modelVersion"),
    provider: {
      ...metadata,
      request_id: metadata.request_id ?? getString(body, "responseId"),
      raw: body,
    },
  };
}
