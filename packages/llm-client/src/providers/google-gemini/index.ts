/**
 * Google Gemini adapter (`google_gemini`).
 *
 * POST {base}/v1beta/models/{model}:generateContent, or
 * :streamGenerateContent?alt=sse when streaming. The stream carries no
 * terminal frame, so its end is treated as a normal finish.
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
import { ensureConversationMessage } from "../../validation/validators.js";
import { HttpProviderAdapter, type HttpAdapterOptions, type StreamSettings } from "../http-adapter.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";
import { createStreamMapper } from "./stream.js";

export const GOOGLE_GEMINI_CAPABILITIES: CapabilityDescriptor = Object.freeze({
  supports_stream: true,
  supports_image_input: true,
  supports_audio_input: true,
  supports_video_input: true,
  supports_tools: true,
  supports_structured_output: true,
  supports_parallel_tool_calls: true,
});

/** "gemini-2.0-flash" -> "models/gemini-2.0-flash"; tuned model paths pass through. */
export function modelPath(model: string): string {
  return model.startsWith("models/") || model.startsWith("tunedModels/") ? model : `models/${model}`;
}

export class GoogleGeminiAdapter extends HttpProviderAdapter {
  constructor(options: HttpAdapterOptions) {
    super(
      { name: "google_gemini", defaultBaseUrl: "https://generativelanguage.googleapis.com" },
      options,
    );
  }

  capabilities(): CapabilityDescriptor {
    return GOOGLE_GEMINI_CAPABILITIES;
  }

  protected validate(request: ChatRequest): void {
    super.validate(request);
    ensureConversationMessage(request.messages);
  }

  buildBody(request: ChatRequest): JsonObject {
    return translateRequest(request);
  }

  protected endpoint(model: string, stream: boolean): string {
    const root = this.baseUrl.endsWith("/v1beta") ? this.baseUrl : `${this.baseUrl}/v1beta`;
    const method = stream ? "streamGenerateContent?alt=sse" : "generateContent";
    return `${root}/${modelPath(model)}:${method}`;
  }

  protected authHeaders(): Record<string, string> {
    const credential = this.credential;
    if (credential.type === "api_key") {
      return { [credential.header ?? "x-goog-api-key"]: credential.key };
    }
    if (credential.type === "bearer") {
      return { Authorization: `Bearer ${credential.token}` };
    }
    return {};
  }

  protected parseResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse {
    return translateResponse(body, metadata);
  }

  protected createStreamMapper(): StreamEventMapper {
    return createStreamMapper();
  }

  protected streamSettings(): StreamSettings {
    return { requireTerminal: false };
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse, translateFinishReason } from "./translate-response.js";
