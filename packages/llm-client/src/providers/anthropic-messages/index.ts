/**
 * Anthropic Messages adapter (`anthropic_messages`).
 *
 * POST {base}/v1/messages with `x-api-key` and `anthropic-version` headers.
 * The stream has no sentinel; `message_stop` is the terminal frame, and a
 * stream that ends without one is reported as closed.
 */

import type { StreamEventMapper } from "../../stream-decoder.js";
import {
  RateLimitError,
  type CapabilityDescriptor,
  type ChatRequest,
  type ChatResponse,
  type JsonObject,
  type JsonValue,
  type LLMError,
  type ProviderMetadata,
} from "../../types/index.js";
import { extractMessage, parseRetryAfter } from "../../utils/error-mapping.js";
import { getString, tryParseJson } from "../../utils/json.js";
import { ensureConversationMessage, resolveModel } from "../../validation/validators.js";
import { HttpProviderAdapter, type HttpAdapterOptions, type StreamSettings } from "../http-adapter.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { createStreamMapper } from "./stream.js";

export const DEFAULT_ANTHROPIC_VERSION = "2023-06-01";

export const ANTHROPIC_MESSAGES_CAPABILITIES: CapabilityDescriptor = Object.freeze({
  supports_stream: true,
  supports_image_input: true,
  supports_audio_input: false,
  supports_video_input: false,
  supports_tools: true,
  supports_structured_output: false,
  supports_parallel_tool_calls: true,
});

export class AnthropicMessagesAdapter extends HttpProviderAdapter {
  constructor(options: HttpAdapterOptions) {
    super({ name: "anthropic_messages", defaultBaseUrl: "https://api.anthropic.com" }, options);
  }

  capabilities(): CapabilityDescriptor {
    return ANTHROPIC_MESSAGES_CAPABILITIES;
  }

  protected validate(request: ChatRequest): void {
    super.validate(request);
    ensureConversationMessage(request.messages);
  }

  buildBody(request: ChatRequest, options: { stream: boolean }): JsonObject {
    return translateRequest(request, resolveModel(request, this.defaultModel, this.name), options.stream);
  }

  protected endpoint(): string {
    return this.baseUrl.endsWith("/v1") ? `${this.baseUrl}/messages` : `${this.baseUrl}/v1/messages`;
  }

  protected authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    const credential = this.credential;

    if (credential.type === "api_key") {
      headers[credential.header ?? "x-api-key"] = credential.key;
    } else if (credential.type === "bearer") {
      headers["Authorization"] = `Bearer ${credential.token}`;
    }

    headers["anthropic-version"] = getString(this.extra, "version") ?? DEFAULT_ANTHROPIC_VERSION;
    const beta = getString(this.extra, "beta");
    if (beta !== undefined) {
      headers["anthropic-beta"] = beta;
    }
    return headers;
  }

  /** 529 is Anthropic's "overloaded" status and is retried like a 429. */
  parseError(status: number, rawBody: string, headers?: Record<string, string>): LLMError {
    if (status === 529) {
      const message = extractMessage(tryParseJson(rawBody)) ?? `status ${status}: ${rawBody}`;
      return new RateLimitError(message, { retry_after: parseRetryAfter(headers) });
    }
    return super.parseError(status, rawBody, headers);
  }

  protected parseResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
    return translateResponse(body, metadata);
  }

  protected createStreamMapper(): StreamEventMapper {
    return createStreamMapper();
  }

  protected streamSettings(): StreamSettings {
    return { requireTerminal: true };
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse, translateStopReason } from "./translate-response.js";
