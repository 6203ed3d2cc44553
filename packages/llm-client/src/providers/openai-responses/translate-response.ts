/**
 * Translate an OpenAI Responses API body into a canonical ChatResponse.
 *
 * Every `output` item keeps its position as its index.
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
import {
  getArray,
  getNumber,
  getObject,
  getObjectArray,
  getString,
  isJsonObject,
} from "../../utils/json.js";
import { mapFinishReason } from "../finish-reason.js";
import { parseToolArguments } from "../openai-chat/translate-response.js";

const PROVIDER = "openai_responses";

const INCOMPLETE_REASONS: Readonly<Record<string, FinishReason["reason"]>> = {
  max_output_tokens: "length",
  content_filter: "content_filter",
};

export function translateUsage(usage: JsonObject): TokenUsage {
  return {
    prompt_tokens: getNumber(usage, "input_tokens"),
    completion_tokens: getNumber(usage, "output_tokens"),
    reasoning_tokens: getNumber(getObject(usage, "output_tokens_details"), "reasoning_tokens"),
    total_tokens: getNumber(usage, "total_tokens"),
    details: usage,
  };
}

/**
 * Finish reason from the response `status`. A completed response that
 * called functions finishes with `tool_calls`.
 */
export function translateStatus(
  response: JsonObject,
  hasToolCalls: boolean,
): FinishReason | undefined {
  const status = getString(response, "status");
  if (getObject(response, "error") || status === "failed") {
    return { reason: "error", raw: status ?? "failed" };
  }
  if (status === "incomplete") {
    const reason = getString(getObject(response, "incomplete_details"), "reason") ?? status;
    return mapFinishReason(reason, INCOMPLETE_REASONS);
  }
  if (status === "completed") {
    return { reason: hasToolCalls ? "tool_calls" : "stop", raw: status };
  }
  return status !== undefined ? mapFinishReason(status) : undefined;
}

function translateMessageContent(item: JsonObject): ContentPart[] {
  return getObjectArray(item, "content").map((part): ContentPart => {
    const text = getString(part, "text");
    return getString(part, "type") === "output_text" && text !== undefined
      ? { kind: ContentKind.TEXT, text }
      : { kind: ContentKind.DATA, data: part };
  });
}

function summaryText(item: JsonObject): string | undefined {
  const texts = getObjectArray(item, "summary")
    .map((part) => getString(part, "text"))
    .filter((text): text is string => text !== undefined);
  return texts.length > 0 ? texts.join("\n") : undefined;
}

function translateOutputItem(item: JsonObject, index: number): OutputItem {
  switch (getString(item, "type")) {
    case "message":
      return {
        kind: OutputKind.MESSAGE,
        index,
        message: { role: Role.ASSISTANT, content: translateMessageContent(item) },
      };

    case "function_call":
      return {
        kind: OutputKind.TOOL_CALL,
        index,
        tool_call: {
          id: getString(item, "call_id") ?? getString(item, "id"),
          name: getString(item, "name") ?? "",
          arguments: parseToolArguments(getString(item, "arguments")),
          kind: ToolKind.FUNCTION,
        },
      };

    case "function_call_output":
      return {
        kind: OutputKind.TOOL_RESULT,
        index,
        tool_result: {
          call_id: getString(item, "call_id"),
          output: item["output"] ?? null,
          is_error: false,
        },
      };

    case "reasoning": {
      const text = summaryText(item);
      return text !== undefined
        ? { kind: OutputKind.REASONING, index, text }
        : { kind: OutputKind.CUSTOM, index, data: item };
    }

    default:
      // Built-in tool calls (web_search_call, file_search_call, ...) pass through.
      return { kind: OutputKind.CUSTOM, index, data: item };
  }
}

export function translateResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
  if (!isJsonObject(body) || getArray(body, "output") === undefined) {
    throw new ProviderError("unexpected response shape", { provider: PROVIDER, raw: body });
  }

  const outputs = getObjectArray(body, "output").map(translateOutputItem);
  const hasToolCalls = outputs.some((item) => item.kind === OutputKind.TOOL_CALL);
  const usage = getObject(body, "usage");

  return {
    outputs,
    usage: usage ? translateUsage(usage) : undefined,
    finish_reason: translateStatus(body, hasToolCalls),
    model: getString(body, "model"),
    provider: {
      ...metadata,
      request_id: metadata.request_id ?? getString(body, "id"),
      raw: body,
    },
  };
}
