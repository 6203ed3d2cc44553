export const VERSION = "0.1.0";

// Canonical types and errors
export * from "./types/index.js";

// Utilities: transport, SSE, retry, error mapping, JSON helpers
export * from "./utils/index.js";

// Provider adapters
export * from "./providers/index.js";

// Client router
export { LLMClient, LLMClientBuilder } from "./client.js";
export type { ClientOptions, FromConfigOptions } from "./client.js";

// Streaming decoder
export { decodeChatStream } from "./stream-decoder.js";
export type { DecodeOptions, MappedEvents, StreamEventMapper } from "./stream-decoder.js";

// Request patches
export {
  MAX_PATCH_DEPTH,
  applyRequestPatch,
  compileRequestPatch,
  deepMerge,
  parseFieldPath,
  removeField,
} from "./patch/request-patch.js";
export type { CompiledRequestPatch, OutgoingRequest, RequestPatch } from "./patch/request-patch.js";

// Configuration
export {
  CredentialSchema,
  JsonObjectSchema,
  JsonValueSchema,
  LogLevelSchema,
  LoggingEnvSchema,
  ModelConfigListSchema,
  ModelConfigSchema,
  ProviderKindSchema,
  RequestPatchSchema,
  loadLoggingConfig,
  parseModelConfigs,
} from "./config/index.js";
export type { Credential, LoggingConfig, ModelConfig, ModelConfigInput } from "./config/index.js";

// Logging
export { createLogger, silentLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

// Validators
export {
  ensureCapabilities,
  ensureContentSupported,
  ensureConversationMessage,
  ensureFunctionTools,
  ensureToolMessages,
  expectToolResult,
  resolveCredential,
  resolveModel,
} from "./validation/validators.js";
export type { CredentialPolicy } from "./validation/validators.js";
