/**
 * Translate a canonical ChatRequest into Anthropic Messages API format.
 *
 * - System and developer messages are lifted into the top-level `system` string.
 * - Tool results travel as `tool_result` blocks inside a user message.
 * - `max_tokens` is mandatory for this API and defaults to 1024.
 */

import {
  ContentKind,
  Role,
  ToolKind,
  UnsupportedFeatureError,
  ValidationError,
  type ChatRequest,
  type ContentPart,
  type JsonObject,
  type JsonValue,
  type Message,
  type ReasoningOptions,
  type ToolChoice,
  type ToolDefinition,
} from "../../types/index.js";
import { compactObject, isJsonObject, tryParseJson } from "../../utils/json.js";

export const DEFAULT_MAX_TOKENS = 1024;

// ---------------------------------------------------------------------------
// Content blocks
// ---------------------------------------------------------------------------

function toolInput(args: JsonValue): JsonValue {
  if (typeof args !== "string") return args;
  const parsed = tryParseJson(args);
  return isJsonObject(parsed) ? parsed : { input: args };
}

function translateContentPart(part: ContentPart): JsonValue {
  switch (part.kind) {
    case ContentKind.TEXT:
      return { type: "text", text: part.text };

    case ContentKind.IMAGE: {
      const source = part.source;
      if (source.type === "base64") {
        return {
          type: "image",
          source: {
            type: "base64",
            media_type: source.mime_type ?? "image/png",
            data: source.data,
          },
        };
      }
      if (source.type === "url") {
        return { type: "image", source: { type: "url", url: source.url } };
      }
      throw new UnsupportedFeatureError("image_file_id");
    }

    case ContentKind.TOOL_CALL: {
      const call = part.tool_call;
      if (call.id === undefined) {
        throw new ValidationError("tool call missing id");
      }
      return { type: "tool_use", id: call.id, name: call.name, input: toolInput(call.arguments) };
    }

    case ContentKind.TOOL_RESULT: {
      const result = part.tool_result;
      if (result.call_id === undefined) {
        throw new ValidationError("tool message missing call_id");
      }
      return {
        type: "tool_result",
        tool_use_id: result.call_id,
        content: typeof result.output === "string" ? result.output : JSON.stringify(result.output),
        is_error: result.is_error,
      };
    }

    case ContentKind.AUDIO:
      throw new UnsupportedFeatureError("audio_input");
    case ContentKind.VIDEO:
      throw new UnsupportedFeatureError("video_input");
    case ContentKind.FILE:
      throw new UnsupportedFeatureError("file_input");

    case ContentKind.DATA:
      return part.data;
  }
}

function systemText(message: Message): string {
  return message.content
    .map((part) => (part.kind === ContentKind.TEXT ? part.text : ""))
    .filter((text) => text.length > 0)
    .join("\n");
}

function translateMessage(message: Message): JsonObject {
  if (message.content.length === 0) {
    throw new ValidationError("message must contain at least one content part");
  }
  return {
    role: message.role === Role.ASSISTANT ? "assistant" : "user",
    content: message.content.map(translateContentPart),
  };
}

// ---------------------------------------------------------------------------
// Reasoning, tools
// ---------------------------------------------------------------------------

function translateThinking(reasoning: ReasoningOptions | undefined): JsonValue | undefined {
  if (!reasoning) return undefined;

  const explicit = reasoning.extra?.["thinking"];
  if (explicit !== undefined) return explicit;

  if (reasoning.budget_tokens === undefined) return undefined;
  const rest: JsonObject = { ...reasoning.extra };
  return { ...rest, type: "enabled", budget_tokens: reasoning.budget_tokens };
}

function translateTool(tool: ToolDefinition): JsonValue {
  switch (tool.kind) {
    case ToolKind.FUNCTION:
      return compactObject({
        name: tool.name,
        description: tool.description,
        input_schema: tool.parameters ?? { type: "object", properties: {} },
      });
    case ToolKind.CUSTOM:
      return tool.config ?? { type: tool.name, name: tool.name };
    default:
      throw new UnsupportedFeatureError(`${tool.kind}_tool`);
  }
}

function translateToolChoice(choice: ToolChoice, parallel: boolean | undefined): JsonValue {
  const disable: JsonObject = parallel === false ? { disable_parallel_tool_use: true } : {};
  switch (choice.mode) {
    case "auto":
      return { type: "auto", ...disable };
    case "any":
      return { type: "any", ...disable };
    case "tool":
      return { type: "tool", name: choice.name, ...disable };
    case "none":
      return { type: "none" };
    case "custom":
      return choice.value;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateRequest(
  request: ChatRequest,
  model: string,
  stream: boolean,
): JsonObject {
  const options = request.options ?? {};

  const systemParts: string[] = [];
  const messages: JsonObject[] = [];
  for (const message of request.messages) {
    if (message.role === Role.SYSTEM || message.role === Role.DEVELOPER) {
      const text = systemText(message);
      if (text.length > 0) systemParts.push(text);
    } else {
      messages.push(translateMessage(message));
    }
  }

  const body = compactObject({
    model,
    system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    messages,
    max_tokens: options.max_output_tokens ?? DEFAULT_MAX_TOKENS,
    temperature: options.temperature,
    top_p: options.top_p,
    thinking: translateThinking(options.reasoning),
    tools:
      request.tools && request.tools.length > 0 ? request.tools.map(translateTool) : undefined,
    tool_choice: request.tool_choice
      ? translateToolChoice(request.tool_choice, options.parallel_tool_calls)
      : undefined,
    metadata: request.metadata,
    ...options.extra,
  });

  body["stream"] = stream;
  return body;
}
