/**
 * Translate a canonical ChatRequest into a Gemini GenerateContent body.
 *
 * The model travels in the URL path, not the body. Function calls and their
 * results are matched by function name, so a tool result's `call_id` must
 * carry the name of the function it answers.
 */

import {
  ContentKind,
  Role,
  ToolKind,
  UnsupportedFeatureError,
  ValidationError,
  type ChatOptions,
  type ChatRequest,
  type ContentPart,
  type JsonObject,
  type JsonValue,
  type MediaSource,
  type Message,
  type ResponseFormat,
  type ToolChoice,
  type ToolDefinition,
} from "../../types/index.js";
import { compactObject, isJsonObject, tryParseJson } from "../../utils/json.js";

// ---------------------------------------------------------------------------
// Parts
// ---------------------------------------------------------------------------

function mediaPart(source: MediaSource, mimeType: string): JsonObject {
  switch (source.type) {
    case "inline":
      return { inlineData: { mimeType, data: source.data } };
    case "url":
      return { fileData: { mimeType, fileUri: source.url } };
    case "file_id":
      return { fileData: { mimeType, fileUri: source.file_id } };
  }
}

function functionArgs(args: JsonValue): JsonObject {
  if (isJsonObject(args)) return args;
  if (typeof args === "string") {
    const parsed = tryParseJson(args);
    if (isJsonObject(parsed)) return parsed;
  }
  return { input: args };
}

function translateContentPart(part: ContentPart): JsonValue {
  switch (part.kind) {
    case ContentKind.TEXT:
      return { text: part.text };

    case ContentKind.IMAGE: {
      const source = part.source;
      if (source.type === "base64") {
        return { inlineData: { mimeType: source.mime_type ?? "image/jpeg", data: source.data } };
      }
      const uri = source.type === "url" ? source.url : source.file_id;
      return { fileData: { mimeType: "application/octet-stream", fileUri: uri } };
    }

    case ContentKind.AUDIO:
      return mediaPart(part.source, part.mime_type ?? "audio/mpeg");
    case ContentKind.VIDEO:
      return mediaPart(part.source, part.mime_type ?? "video/mp4");
    case ContentKind.FILE:
      return { fileData: { mimeType: "application/octet-stream", fileUri: part.file_id } };

    case ContentKind.TOOL_CALL:
      if (part.tool_call.kind !== ToolKind.FUNCTION) {
        throw new ValidationError("google_gemini only supports function tool calls");
      }
      return {
        functionCall: { name: part.tool_call.name, args: functionArgs(part.tool_call.arguments) },
      };

    case ContentKind.TOOL_RESULT: {
      const result = part.tool_result;
      if (result.call_id === undefined) {
        throw new ValidationError("tool message missing call_id");
      }
      return {
        functionResponse: {
          name: result.call_id,
          response: isJsonObject(result.output) ? result.output : { content: result.output },
        },
      };
    }

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
  return {
    role: message.role === Role.ASSISTANT ? "model" : "user",
    parts: message.content.map(translateContentPart),
  };
}

// ---------------------------------------------------------------------------
// generationConfig
// ---------------------------------------------------------------------------

function responseFormatFields(format: ResponseFormat | undefined): JsonObject {
  if (!format) return {};
  switch (format.type) {
    case "text":
    case "custom":
      return {};
    case "json_object":
      return { responseMimeType: "application/json" };
    case "json_schema":
      return { responseMimeType: "application/json", responseSchema: format.schema };
  }
}

function thinkingConfig(options: ChatOptions): JsonValue | undefined {
  const reasoning = options.reasoning;
  if (!reasoning) return undefined;
  if (reasoning.budget_tokens === undefined && reasoning.extra === undefined) return undefined;
  return compactObject({ thinkingBudget: reasoning.budget_tokens, ...reasoning.extra });
}

/** A `custom` response format is taken as the whole generationConfig. */
function generationConfig(request: ChatRequest): JsonValue | undefined {
  if (request.response_format?.type === "custom") {
    return request.response_format.value;
  }

  const options = request.options ?? {};
  const config = compactObject({
    temperature: options.temperature,
    topP: options.top_p,
    maxOutputTokens: options.max_output_tokens,
    presencePenalty: options.presence_penalty,
    frequencyPenalty: options.frequency_penalty,
    thinkingConfig: thinkingConfig(options),
    ...responseFormatFields(request.response_format),
  });
  return Object.keys(config).length > 0 ? config : undefined;
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

function translateTool(tool: ToolDefinition): JsonValue {
  switch (tool.kind) {
    case ToolKind.FUNCTION:
      return {
        functionDeclarations: [
          compactObject({
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
          }),
        ],
      };
    case ToolKind.CUSTOM:
      return tool.config ?? { type: tool.name, name: tool.name };
    default:
      throw new UnsupportedFeatureError(`${tool.kind}_tool`);
  }
}

function translateToolChoice(choice: ToolChoice): JsonValue | undefined {
  switch (choice.mode) {
    case "auto":
      return undefined;
    case "any":
      return { functionCallingConfig: { mode: "ANY" } };
    case "none":
      return { functionCallingConfig: { mode: "NONE" } };
    case "tool":
      return { functionCallingConfig: { mode: "ANY", allowedFunctionNames: [choice.name] } };
    case "custom":
      return choice.value;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateRequest(request: ChatRequest): JsonObject {
  const systemParts: string[] = [];
  const contents: JsonObject[] = [];
  for (const message of request.messages) {
    if (message.role === Role.SYSTEM || message.role === Role.DEVELOPER) {
      const text = systemText(message);
      if (text.length > 0) systemParts.push(text);
    } else {
      contents.push(translateMessage(message));
    }
  }

  return compactObject({
    contents,
    systemInstruction:
      systemParts.length > 0 ? { parts: [{ text: systemParts.join("\n\n") }] } : undefined,
    generationConfig: generationConfig(request),
    tools:
      request.tools && request.tools.length > 0 ? request.tools.map(translateTool) : undefined,
    toolConfig: request.tool_choice ? translateToolChoice(request.tool_choice) : undefined,
    ...request.options?.extra,
  });
}
