/**
 * Barrel re-export for all type modules.
 */

// Enums
export {
  Role,
  ContentKind,
  ToolKind,
  OutputKind,
  ChatEventType,
  ProviderKind,
} from "./enums.js";

// JSON
export type { JsonPrimitive, JsonValue, JsonObject } from "./json.js";

// Message types
export type {
  ImageSource,
  ImageDetail,
  MediaSource,
  TextContentPart,
  ImageContentPart,
  AudioContentPart,
  VideoContentPart,
  FileContentPart,
  ToolCallContentPart,
  ToolResultContentPart,
  DataContentPart,
  ContentPart,
  Message,
} from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createToolCallMessage,
  createToolResultMessage,
  getMessageText,
  getMessageToolCalls,
} from "./message.js";

// Tool types
export type { ToolDefinition, ToolCall, ToolResult, ToolChoice } from "./tool.js";

// Request types
export type {
  ChatRequest,
  ChatOptions,
  ReasoningOptions,
  ResponseFormat,
} from "./request.js";

// Response types
export type {
  ChatResponse,
  FinishReason,
  OutputItem,
  ProviderMetadata,
  TokenUsage,
} from "./response.js";
export {
  getResponseText,
  getResponseToolCalls,
  getResponseReasoning,
} from "./response.js";

// Capabilities
export type { CapabilityDescriptor } from "./capabilities.js";
export { NO_CAPABILITIES } from "./capabilities.js";

// Stream types
export type {
  ChatEvent,
  TextDeltaEvent,
  ToolCallDeltaEvent,
  ReasoningDeltaEvent,
  FinishEvent,
  DoneEvent,
  ErrorEvent,
  CustomEvent,
  ChatChunk,
  ChatStream,
} from "./stream.js";
export { StreamAccumulator, isTerminalEvent } from "./stream.js";

// Error types
export {
  ErrorKind,
  LLMError,
  TransportError,
  RateLimitError,
  AuthError,
  ValidationError,
  UnsupportedFeatureError,
  ProviderError,
  TokenLimitExceededError,
  ModelNotFoundError,
  StreamClosedError,
  InvalidConfigError,
  AbortedError,
  HandleNotFoundError,
  NotImplementedError,
  UnknownError,
  toLLMError,
} from "./errors.js";
