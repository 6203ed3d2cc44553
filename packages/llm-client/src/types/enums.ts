/**
 * Core enums for the canonical chat model.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** The five roles covering the semantics of all supported providers. */
export const Role = {
  /** High-level instructions shaping model behavior. Typically first. */
  SYSTEM: "system",
  /** Privileged instructions from the application (not the end user). */
  DEVELOPER: "developer",
  /** Human input. Text, images, audio, video, files. */
  USER: "user",
  /** Model output. Text, tool calls. */
  ASSISTANT: "assistant",
  /** Tool execution results, linked by call_id. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// ContentKind
// ---------------------------------------------------------------------------

/** Discriminator tags for ContentPart. */
export const ContentKind = {
  TEXT: "text",
  /** Image as URL, base64, or file reference. */
  IMAGE: "image",
  AUDIO: "audio",
  VIDEO: "video",
  /** Reference to a previously uploaded file. */
  FILE: "file",
  /** A model-initiated tool invocation. */
  TOOL_CALL: "tool_call",
  /** The result of executing a tool call. */
  TOOL_RESULT: "tool_result",
  /** Arbitrary JSON passed through to the adapter. */
  DATA: "data",
} as const satisfies Record<string, string>;

export type ContentKind = (typeof ContentKind)[keyof typeof ContentKind];

// ---------------------------------------------------------------------------
// ToolKind
// ---------------------------------------------------------------------------

/** Families of tools a model can be offered. */
export const ToolKind = {
  FUNCTION: "function",
  FILE_SEARCH: "file_search",
  WEB_SEARCH: "web_search",
  COMPUTER_USE: "computer_use",
  CUSTOM: "custom",
} as const satisfies Record<string, string>;

export type ToolKind = (typeof ToolKind)[keyof typeof ToolKind];

// ---------------------------------------------------------------------------
// OutputKind
// ---------------------------------------------------------------------------

/** Discriminator tags for OutputItem. */
export const OutputKind = {
  MESSAGE: "message",
  TOOL_CALL: "tool_call",
  TOOL_RESULT: "tool_result",
  REASONING: "reasoning",
  CUSTOM: "custom",
} as const satisfies Record<string, string>;

export type OutputKind = (typeof OutputKind)[keyof typeof OutputKind];

// ---------------------------------------------------------------------------
// ChatEventType
// ---------------------------------------------------------------------------

/** Discriminator tags for ChatEvent. */
export const ChatEventType = {
  /** Incremental text content for one output index. */
  TEXT_DELTA: "text_delta",
  /** Incremental tool call (id, name, partial arguments). */
  TOOL_CALL_DELTA: "tool_call_delta",
  /** Incremental reasoning content. */
  REASONING_DELTA: "reasoning_delta",
  /** An output index has finished, with its reason. */
  FINISH: "finish",
  /** The stream completed normally. Terminal. */
  DONE: "done",
  /** The stream failed. Terminal. */
  ERROR: "error",
  /** Provider payload with no canonical equivalent. */
  CUSTOM: "custom",
} as const satisfies Record<string, string>;

export type ChatEventType = (typeof ChatEventType)[keyof typeof ChatEventType];

// ---------------------------------------------------------------------------
// ProviderKind
// ---------------------------------------------------------------------------

/** Vendor protocols with a built-in adapter. */
export const ProviderKind = {
  OPENAI_CHAT: "openai_chat",
  OPENAI_RESPONSES: "openai_responses",
  ANTHROPIC_MESSAGES: "anthropic_messages",
  GOOGLE_GEMINI: "google_gemini",
} as const satisfies Record<string, string>;

export type ProviderKind = (typeof ProviderKind)[keyof typeof ProviderKind];
