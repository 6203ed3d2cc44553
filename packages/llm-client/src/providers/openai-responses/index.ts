/**
 * OpenAI Responses API adapter (`openai_responses`).
 *
 * POST {base}/v1/responses, or {base}/responses when the base URL already
 * ends in /v1. The stream has no sentinel; `response.completed` or
 * `response.incomplete` is the terminal frame. Built-in tools (file search,
 * web search, computer use) are forwarded with their config.
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
import { resolveModel } from "../../validation/validators.js";
import { HttpProviderAdapter, type HttpAdapterOptions, type StreamSettings } from "../http-adapter.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { createStreamMapper } from "./stream.js";

export const OPENAI_RESPONSES_CAPABILITIES: CapabilityDescriptor = Object.freeze({
  supports_stream: true,
  supports_image_input: true,
  supports_audio_input: false,
  supports_video_input: false,
  supports_tools: true,
  supports_structured_output: true,
  supports_parallel_tool_calls: true,
});

export class OpenAIResponsesAdapter extends HttpProviderAdapter {
  constructor(options: HttpAdapterOptions) {
    super({ name: "openai_responses", defaultBaseUrl: "https://api.openai.com" }, options);
  }

  capabilities(): CapabilityDescriptor {
    return OPENAI_RESPONSES_CAPABILITIES;
  }

  buildBody(request: ChatRequest, options: { stream: boolean }): JsonObject {
    return translateRequest(request, resolveModel(request, this.defaultModel, this.name), options.stream);
  }

  protected endpoint(): string {
    return this.baseUrl.endsWith("/v1") ? `${this.baseUrl}/responses` : `${this.baseUrl}/v1/responses`;
  }

  protected authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    const credential = this.credential;

    if (credential.type === "api_key") {
      headers[credential.header ?? "Authorization"] =
        credential.header !== undefined ? credential.key : `Bearer ${credential.key}`;
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
    return { requireTerminal: true };
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { createStreamMapper } from "./stream.js";
