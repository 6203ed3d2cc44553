/**
 * Barrel re-export for all provider adapters, plus the factory that turns a
 * validated model entry into an adapter.
 */

import type { ModelConfig } from "../config/index.js";
import type { Logger } from "../logging/logger.js";
import { ProviderKind } from "../types/index.js";
import type { HttpTransport } from "../utils/http.js";
import type { ProviderAdapter } from "./adapter.js";
import { AnthropicMessagesAdapter } from "./anthropic-messages/index.js";
import { GoogleGeminiAdapter } from "./google-gemini/index.js";
import type { HttpAdapterOptions } from "./http-adapter.js";
import { OpenAIChatAdapter } from "./openai-chat/index.js";
import { OpenAIResponsesAdapter } from "./openai-responses/index.js";

// Adapter interface
export type { CallOptions, ProviderAdapter } from "./adapter.js";
export { HttpProviderAdapter } from "./http-adapter.js";
export type { HttpAdapterOptions, HttpAdapterSettings, StreamSettings } from "./http-adapter.js";
export { mapFinishReason } from "./finish-reason.js";

// OpenAI Chat Completions
export { OpenAIChatAdapter, OPENAI_CHAT_CAPABILITIES } from "./openai-chat/index.js";

// OpenAI Responses
export { OpenAIResponsesAdapter, OPENAI_RESPONSES_CAPABILITIES } from "./openai-responses/index.js";

// Anthropic Messages
export {
  AnthropicMessagesAdapter,
  ANTHROPIC_MESSAGES_CAPABILITIES,
  DEFAULT_ANTHROPIC_VERSION,
} from "./anthropic-messages/index.js";

// Google Gemini
export { GoogleGeminiAdapter, GOOGLE_GEMINI_CAPABILITIES } from "./google-gemini/index.js";

export interface AdapterDependencies {
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Construct the adapter for one model entry.
 *
 * @throws AuthError when the entry's credential is not accepted by the adapter.
 * @throws InvalidConfigError when the entry's patch is malformed.
 */
export function createAdapter(config: ModelConfig, deps: AdapterDependencies = {}): ProviderAdapter {
  const options: HttpAdapterOptions = {
    credential: config.credential,
    baseUrl: config.base_url,
    defaultModel: config.default_model,
    extra: config.extra,
    patch: config.patch,
    transport: deps.transport,
    logger: deps.logger?.child({ handle: config.handle }),
  };

  switch (config.provider) {
    case ProviderKind.OPENAI_CHAT:
      return new OpenAIChatAdapter(options);
    case ProviderKind.OPENAI_RESPONSES:
      return new OpenAIResponsesAdapter(options);
    case ProviderKind.ANTHROPIC_MESSAGES:
      return new AnthropicMessagesAdapter(options);
    case ProviderKind.GOOGLE_GEMINI:
      return new GoogleGeminiAdapter(options);
  }
}
