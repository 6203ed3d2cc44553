/**
 * Translate a canonical ChatRequest into OpenAI Responses API format.
 *
 * - SYSTEM/DEVELOPER text -> `instructions`
 * - Other messages go in `input` as `message` items
 * - Tool calls and tool results are top-level `function_call` /
 *   `function_call_output` input items
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
  type ToolChoice,
  type ToolDefinition,
} from "../../types/index.js";
import { compactObject } from "../../utils/json.js";
import { expectToolResult } from "../../validation/validators.js";
import { stringifyOutput } from "../openai-chat/translate-request.js";

// ---------------------------------------------------------------------------
// Instructions
// ---------------------------------------------------------------------------

function messageText(message: Message): string | undefined {
  const texts: string[] = [];
  for (const part of message.content) {
    if (part.kind === ContentKind.TEXT) texts.push(part.text);
  }
  return texts.length > 0 ? texts.join("\n") : undefined;
}

function isInstruction(message: Message): boolean {
  return message.role === Role.SYSTEM || message.role === Role.DEVELOPER;
}

// ---------------------------------------------------------------------------
// Content parts
// ---------------------------------------------------------------------------

function translateContentPart(part: ContentPart, role: Role): JsonValue {
  switch (part.kind) {
    case ContentKind.TEXT:
      // Earlier assistant turns are replayed as model output.
      return { type: role === Role.ASSISTANT ? "output_text" : "input_text", text: part.text };

    case ContentKind.IMAGE: {
      const detail = part.detail ?? "auto";
      const source = part.source;
      if (source.type === "url") {
        return { type: "input_image", image_url: source.url, detail };
      }
      if (source.type === "base64") {
        const mime = source.mime_type ?? "application/octet-stream";
        return { type: "input_image", image_url: `data:${mime};base64,${source.data}`, detail };
      }
      return { type: "input_image", file_id: source.file_id, detail };
    }

    case ContentKind.AUDIO:
      throw new UnsupportedFeatureError("audio_input");

    case ContentKind.VIDEO:
      throw new UnsupportedFeatureError("video_input");

    case ContentKind.FILE:
      return { type: "input_file", file_id: part.file_id };

    case ContentKind.DATA:
      return part.data;

    case ContentKind.TOOL_CALL:
    case ContentKind.TOOL_RESULT:
      throw new ValidationError("tool content must use dedicated input items");
  }
}

// ---------------------------------------------------------------------------
// Input items
// ---------------------------------------------------------------------------

function translateMessage(message: Message): JsonObject[] {
  if (message.role === Role.TOOL) {
    const result = expectToolResult(message);
    return [
      { type: "function_call_output", call_id: result.call_id, output: stringifyOutput(result.output) },
    ];
  }

  const content: JsonValue[] = [];
  const calls: JsonObject[] = [];
  for (const part of message.content) {
    if (part.kind === ContentKind.TOOL_CALL) {
      const call = part.tool_call;
      if (call.kind !== ToolKind.FUNCTION) {
        throw new ValidationError("openai_responses only replays function tool calls");
      }
      if (call.id === undefined) {
        throw new ValidationError("function call replayed to openai_responses needs an id");
      }
      calls.push({
        type: "function_call",
        call_id: call.id,
        name: call.name,
        arguments: stringifyOutput(call.arguments),
      });
    } else {
      content.push(translateContentPart(part, message.role));
    }
  }

  const items: JsonObject[] = [];
  if (content.length > 0) {
    items.push({ type: "message", role: message.role, content });
  }
  items.push(...calls);
  return items;
}

// ---------------------------------------------------------------------------
// Tools and formats
// ---------------------------------------------------------------------------

const BUILT_IN_TOOL_TYPES: Partial<Record<ToolKind, string>> = {
  [ToolKind.FILE_SEARCH]: "file_search",
  [ToolKind.WEB_SEARCH]: "web_search_preview",
  [ToolKind.COMPUTER_USE]: "computer_use_preview",
};

function translateTool(tool: ToolDefinition): JsonObject {
  if (tool.kind === ToolKind.FUNCTION) {
    return compactObject({
      type: "function",
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
      strict: true,
    });
  }

  const builtIn = BUILT_IN_TOOL_TYPES[tool.kind];
  if (builtIn !== undefined) {
    return { type: builtIn, ...tool.config };
  }
  // Custom tools are sent as configured.
  return tool.config ?? { type: "custom", name: tool.name };
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
      return { type: "function", name: choice.name };
    case "custom":
      return choice.value;
  }
}

/** The `text` object; a custom format replaces it entirely. */
function translateTextConfig(format: ResponseFormat): JsonValue {
  switch (format.type) {
    case "text":
      return { format: { type: "text" } };
    case "json_object":
      return { format: { type: "json_object" } };
    case "json_schema":
      return {
        format: compactObject({
          type: "json_schema",
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

  const instructions: string[] = [];
  const input: JsonObject[] = [];
  for (const message of request.messages) {
    if (isInstruction(message)) {
      const text = messageText(message);
      if (text !== undefined) instructions.push(text);
    } else {
      input.push(...translateMessage(message));
    }
  }

  const reasoning = options.reasoning
    ? compactObject({ effort: options.reasoning.effort, ...options.reasoning.extra })
    : undefined;

  const body = compactObject({
    model,
    input: input.length > 0 ? input : undefined,
    instructions: instructions.length > 0 ? instructions.join("\n\n") : undefined,
    temperature: options.temperature,
    top_p: options.top_p,
    max_output_tokens: options.max_output_tokens,
    parallel_tool_calls: options.parallel_tool_calls,
    reasoning: reasoning && Object.keys(reasoning).length > 0 ? reasoning : undefined,
    tools:
      request.tools && request.tools.length > 0 ? request.tools.map(translateTool) : undefined,
    tool_choice: request.tool_choice ? translateToolChoice(request.tool_choice) : undefined,
    text: request.response_format ? translateTextConfig(request.response_format) : undefined,
    metadata: request.metadata,
    ...options.extra,
  });

  body["stream"] = stream;
  return body;
}
