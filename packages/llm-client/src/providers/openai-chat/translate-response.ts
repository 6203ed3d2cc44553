/**
 * Translate an OpenAI Chat Completions response into a canonical ChatResponse.
 */

import {
  ContentKind,
  OutputKind,
  ProviderError,
  Role,
  ToolKind,
  type ChatResponse,
  type ContentPart,
  type JsonObject,
  type JsonValue,
  type OutputItem,
  type ProviderMetadata,
  type TokenUsage,
  type ToolCall,
} from "../../types/index.js";
import {
  getNumber,
  getObject,
  getObjectArray,
  getString,
  isJsonObject,
  tryParseJson,
} from "../../utils/json.js";
import { mapFinishReason } from "../finish-reason.js";

const PROVIDER = "openai_chat";

/** Parsed arguments, or the raw string when it is not valid JSON. */
export function parseToolArguments(raw: string | undefined): JsonValue {
  if (raw === undefined || raw.length === 0) return {};
  return tryParseJson(raw) ?? raw;
}

export function translateUsage(usage: JsonObject): TokenUsage {
  return {
    prompt_tokens: getNumber(usage, "prompt_tokens"),
    completion_tokens: getNumber(usage, "completion_tokens"),
    reasoning_tokens: getNumber(getObject(usage, "completion_tokens_details"), "reasoning_tokens"),
    total_tokens: getNumber(usage, "total_tokens"),
    details: usage,
  };
}

function translateContent(content: JsonValue | undefined): ContentPart[] {
  if (typeof content === "string") {
    return content.length > 0 ? [{ kind: ContentKind.TEXT, text: content }] : [];
  }
  if (!Array.isArray(content)) return [];

  return content.filter(isJsonObject).map((part): ContentPart => {
    const text = getString(part, "text");
    return getString(part, "type") === "text" && text !== undefined
      ? { kind: ContentKind.TEXT, text }
      : { kind: ContentKind.DATA, data: part };
  });
}

function translateToolCall(call: JsonObject): ToolCall {
  const fn = getObject(call, "function");
  return {
    id: getString(call, "id"),
    name: getString(fn, "name") ?? "",
    arguments: parseToolArguments(getString(fn, "arguments")),
    kind: ToolKind.FUNCTION,
  };
}

export function translateResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
  if (!isJsonObject(body)) {
    throw new ProviderError("unexpected response shape", { provider: PROVIDER, raw: body });
  }

  const outputs: OutputItem[] = [];
  const choices = getObjectArray(body, "choices");
  choices.forEach((choice, position) => {
    const index = getNumber(choice, "index") ?? position;
    const message = getObject(choice, "message");
    if (!message) return;

    const content = translateContent(message["content"]);
    if (content.length > 0) {
      const name = getString(message, "name");
      outputs.push({
        kind: OutputKind.MESSAGE,
        index,
        message: { role: Role.ASSISTANT, content, ...(name !== undefined && { name }) },
      });
    }

    for (const call of getObjectArray(message, "tool_calls")) {
      outputs.push({ kind: OutputKind.TOOL_CALL, index, tool_call: translateToolCall(call) });
    }
  });

  const rawFinish = choices
    .map((choice) => getString(choice, "finish_reason"))
    .find((reason) => reason !== undefined);
  const usage = getObject(body, "usage");

  return {
    outputs,
    usage: usage ? translateUsage(usage) : undefined,
    finish_reason: rawFinish !== undefined ? mapFinishReason(rawFinish) : undefined,
    model: getString(body, "model"),
    provider: {
      ...metadata,
      request_id: metadata.request_id ?? getString(body, "id"),
      raw: body,
    },
  };
}
