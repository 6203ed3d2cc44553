/**
 * Translate a canonical ChatRequest into OpenAI Chat Completions format.
 *
 * Also used for the many self-hosted servers that speak the same protocol,
 * so only fields common to all of them are emitted unless the caller opts in.
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
  type ResponseFormat,
  type ToolCall,
  type ToolChoice,
  type ToolDefinition,
} from "../../types/index.js";
import { compactObject } from "../../utils/json.js";
import { expectToolResult } from "../../validation/validators.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** "audio/mpeg" -> "mp3", "audio/wav" -> "wav". */
function audioFormat(mimeType: string | undefined): string {
  if (mimeType === undefined) return "wav";
  const subtype = mimeType.split("/").pop() ?? mimeType;
  return subtype === "mpeg" ? "mp3" : subtype;
}

/** Tool outputs are sent as strings; structured outputs are serialized. */
export function stringifyOutput(output: JsonValue): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateContentPart(part: ContentPart): JsonValue {
  switch (part.kind) {
    case ContentKind.TEXT:
      return { type: "text", text: part.text };

    case ContentKind.IMAGE: {
      const detail = part.detail ?? "auto";
      const source = part.source;
      if (source.type === "url") {
        return { type: "image_url", image_url: { url: source.url, detail } };
      }
      if (source.type === "base64") {
        const mime = source.mime_type ?? "application/octet-stream";
        return {
          type: "image_url",
          image_url: { url: `data:${mime};base64,${source.data}`, detail },
        };
      }
      throw new UnsupportedFeatureError("image_file_id");
    }

    case ContentKind.AUDIO:
      if (part.source.type !== "inline") {
        throw new UnsupportedFeatureError("audio_reference");
      }
      return {
        type: "input_audio",
        input_audio: { data: part.source.data, format: audioFormat(part.mime_type) },
      };

    case ContentKind.VIDEO:
      throw new UnsupportedFeatureError("video_input");

    case ContentKind.FILE:
      return { type: "file", file: { file_id: part.file_id } };

    case ContentKind.DATA:
      return part.data;

    case ContentKind.TOOL_CALL:
    case ContentKind.TOOL_RESULT:
      throw new ValidationError("tool content must use dedicated message fields");
  }
}

function translateToolCall(call: ToolCall): JsonObject {
  if (call.kind !== ToolKind.FUNCTION) {
    throw new ValidationError("openai_chat only supports function tool calls");
  }
  return compactObject({
    id: call.id,
    type: "function",
    function: { name: call.name, arguments: stringifyOutput(call.arguments) },
  });
}

function translateMessage(message: Message): JsonObject {
  if (message.role === Role.TOOL) {
    const result = expectToolResult(message);
    return {
      role: "tool",
      tool_call_id: result.call_id,
      content: stringifyOutput(result.output),
    };
  }

  const content: JsonValue[] = [];
  const toolCalls: JsonObject[] = [];
  for (const part of message.content) {
    if (part.kind === ContentKind.TOOL_CALL) {
      toolCalls.push(translateToolCall(part.tool_call));
    } else {
      content.push(translateContentPart(part));
    }
  }

  return compactObject({
    role: message.role,
    name: message.name,
    content: content.length > 0 ? content : null,
    tool_calls: toolCalls.length > 0 ? toolCalls : undefined,
  });
}

// ---------------------------------------------------------------------------
// Tools and formats
// ---------------------------------------------------------------------------

function translateTool(tool: ToolDefinition): JsonObject {
  return {
    type: "function",
    function: compactObject({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }),
  };
}

function translateToolChoice(choice: ToolChoice): JsonValue {
  switch (choice.mode) {
    case "auto":
      return "auto";
    case "any":
      return "required";
    case "none":
      return "none";
    case "tool":
      return { type: "function", function: { name: choice.name } };
    case "custom":
      return choice.value;
  }
}

function translateResponseFormat(format: ResponseFormat): JsonValue {
  switch (format.type) {
    case "text":
      return { type: "text" };
    case "json_object":
      return { type: "json_object" };
    case "json_schema":
      return {
        type: "json_schema",
        json_schema: compactObject({
          name: format.name ?? "response",
          schema: format.schema,
          strict: format.strict,
        }),
      };
    case "custom":
      return format.value;
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
  const reasoning = options.reasoning;

  const body = compactObject({
    model,
    messages: request.messages.map(translateMessage),
    temperature: options.temperature,
    top_p: options.top_p,
    max_tokens: options.max_output_tokens,
    presence_penalty: options.presence_penalty,
    frequency_penalty: options.frequency_penalty,
    parallel_tool_calls: options.parallel_tool_calls,
    reasoning_effort: reasoning?.effort,
    max_reasoning_tokens: reasoning?.budget_tokens,
    ...reasoning?.extra,
    tools:
      request.tools && request.tools.length > 0 ? request.tools.map(translateTool) : undefined,
    tool_choice: request.tool_choice ? translateToolChoice(request.tool_choice) : undefined,
    response_format: request.response_format
      ? translateResponseFormat(request.response_format)
      : undefined,
    metadata: request.metadata,
    ...options.extra,
  });

  body["stream"] = stream;
  if (stream) {
    body["stream_options"] = { include_usage: true };
  }
  return body;
}
