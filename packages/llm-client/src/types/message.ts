/**
 * Message and ContentPart types for the canonical chat model.
 */

import { ContentKind, Role, ToolKind } from "./enums.js";
import type { JsonObject, JsonValue } from "./json.js";
import type { ToolCall, ToolResult } from "./tool.js";

// ---------------------------------------------------------------------------
// Media sources
// ---------------------------------------------------------------------------

/** Where an image comes from. */
export type ImageSource =
  | { readonly type: "url"; readonly url: string }
  | { readonly type: "base64"; readonly data: string; readonly mime_type?: string }
  | { readonly type: "file_id"; readonly file_id: string };

/** Processing fidelity hint for images. */
export type ImageDetail = "low" | "high" | "auto";

/** Where an audio or video payload comes from. `inline` data is base64. */
export type MediaSource =
  | { readonly type: "inline"; readonly data: string }
  | { readonly type: "file_id"; readonly file_id: string }
  | { readonly type: "url"; readonly url: string };

// ---------------------------------------------------------------------------
// ContentPart -- discriminated union on `kind`
// ---------------------------------------------------------------------------

export interface TextContentPart {
  readonly kind: typeof ContentKind.TEXT;
  readonly text: string;
}

export interface ImageContentPart {
  readonly kind: typeof ContentKind.IMAGE;
  readonly source: ImageSource;
  readonly detail?: ImageDetail;
}

export interface AudioContentPart {
  readonly kind: typeof ContentKind.AUDIO;
  readonly source: MediaSource;
  /** e.g. "audio/wav", "audio/mp3". */
  readonly mime_type?: string;
}

export interface VideoContentPart {
  readonly kind: typeof ContentKind.VIDEO;
  readonly source: MediaSource;
  readonly mime_type?: string;
}

export interface FileContentPart {
  readonly kind: typeof ContentKind.FILE;
  readonly file_id: string;
  readonly purpose?: string;
}

export interface ToolCallContentPart {
  readonly kind: typeof ContentKind.TOOL_CALL;
  readonly tool_call: ToolCall;
}

export interface ToolResultContentPart {
  readonly kind: typeof ContentKind.TOOL_RESULT;
  readonly tool_result: ToolResult;
}

export interface DataContentPart {
  readonly kind: typeof ContentKind.DATA;
  readonly data: JsonValue;
}

/**
 * A single piece of message content. Which variants a given adapter accepts
 * is declared by the adapter.
 */
export type ContentPart =
  | TextContentPart
  | ImageContentPart
  | AudioContentPart
  | VideoContentPart
  | FileContentPart
  | ToolCallContentPart
  | ToolResultContentPart
  | DataContentPart;

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** The fundamental unit of conversation. */
export interface Message {
  readonly role: Role;
  readonly content: readonly ContentPart[];
  /** Participant name, where the vendor supports one. */
  readonly name?: string;
  readonly metadata?: JsonObject;
}

// ---------------------------------------------------------------------------
// Factory helpers
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): Message {
  return { role: Role.SYSTEM, content: [{ kind: ContentKind.TEXT, text }] };
}

/** Create a user message from plain text. */
export function createUserMessage(text: string): Message {
  return { role: Role.USER, content: [{ kind: ContentKind.TEXT, text }] };
}

/** Create an assistant message from plain text. */
export function createAssistantMessage(text: string): Message {
  return { role: Role.ASSISTANT, content: [{ kind: ContentKind.TEXT, text }] };
}

/** Create an assistant message carrying a single function call. */
export function createToolCallMessage(
  id: string,
  name: string,
  args: JsonValue,
): Message {
  return {
    role: Role.ASSISTANT,
    content: [
      {
        kind: ContentKind.TOOL_CALL,
        tool_call: { id, name, arguments: args, kind: ToolKind.FUNCTION },
      },
    ],
  };
}

/** Create a tool-result message. */
export function createToolResultMessage(
  call_id: string,
  output: JsonValue,
  is_error = false,
): Message {
  return {
    role: Role.TOOL,
    content: [
      { kind: ContentKind.TOOL_RESULT, tool_result: { call_id, output, is_error } },
    ],
  };
}

/** Concatenate all text parts of a message. */
export function getMessageText(message: Message): string {
  return message.content
    .filter((part): part is TextContentPart => part.kind === ContentKind.TEXT)
    .map((part) => part.text)
    .join("");
}

/** Extract all tool calls from a message's content parts. */
export function getMessageToolCalls(message: Message): ToolCall[] {
  return message.content
    .filter(
      (part): part is ToolCallContentPart => part.kind === ContentKind.TOOL_CALL,
    )
    .map((part) => part.tool_call);
}
