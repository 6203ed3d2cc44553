/**
 * OpenAI Chat Completions adapter (`openai_chat`).
 *
 * POST {base}/v1/chat/completions, or {base}/chat/completions when the base
 * URL already ends in /v1. Also serves OpenAI-compatible servers, which is
 * why it is the one adapter that accepts running without a credential.
 */

import type { StreamEventMapper } from "../../stream-decoder.js";
import type {
  CapabilityDescriptor,
  ChatRequest,
  ChatResponse,
  JsonObject,
  JsonValue,
  ProviderMetadata,
} from "../../types/index.js";
import { getString } from "../../utils/json.js";
import { ensureFunctionTools, resolveModel } from "../../validation/validators.js";
import { HttpProviderAdapter, type HttpAdapterOptions, type StreamSettings } from "../http-adapter.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { createStreamMapper } from "./stream.js";

export const OPENAI_CHAT_CAPABILITIES: CapabilityDescriptor = Object.freeze({
  supports_stream: true,
  supports_image_input: true,
  supports_audio_input: true,
  supports_video_input: false,
  supports_tools: true,
  supports_structured_output: true,
  supports_parallel_tool_calls: true,
});

export class OpenAIChatAdapter extends HttpProviderAdapter {
  constructor(options: HttpAdapterOptions) {
    super(
      {
        name: "openai_chat",
        defaultBaseUrl: "https://api.openai.com",
        credentialPolicy: { allowNone: true },
      },
      options,
    );
  }

  capabilities(): CapabilityDescriptor {
    return OPENAI_CHAT_CAPABILITIES;
  }

  protected validate(request: ChatRequest): void {
    super.validate(request);
    ensureFunctionTools(request);
  }

  buildBody(request: ChatRequest, options: { stream: boolean }): JsonObject {
    return translateRequest(request, resolveModel(request, this.defaultModel, this.name), options.stream);
  }

  protected endpoint(): string {
    return this.baseUrl.endsWith("/v1")
      ? `${this.baseUrl}/chat/completions`
      : `${this.baseUrl}/v1/chat/completions`;
  }

  protected authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    const credential = this.credential;

    if (credential.type === "api_key") {
      if (credential.header !== undefined) {
        headers[credential.header] = credential.key;
      } else {
        headers["Authorization"] = `Bearer ${credential.key}`;
      }
    } else if (credential.type === "bearer") {
      headers["Authorization"] = `Bearer ${credential.token}`;
    }

    const organization = getString(this.extra, "organization");
    if (organization !== undefined) {
      headers["OpenAI-Organization"] = organization;
    }
    const project = getString(this.extra, "project");
    if (project !== undefined) {
      headers["OpenAI-Project"] = project;
    }
    return headers;
  }

  protected parseResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
    return translateResponse(body, metadata);
  }

  protected createStreamMapper(): StreamEventMapper {
    return createStreamMapper();
  }

  protected streamSettings(): StreamSettings {
    return { sentinel: "[DONE]" };
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { translateStreamPayload } from "./stream.js";
