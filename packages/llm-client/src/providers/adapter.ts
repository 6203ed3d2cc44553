/**
 * ProviderAdapter interface -- the contract every vendor adapter implements.
 *
 * Each adapter translates between the canonical ChatRequest/ChatResponse
 * types and the vendor's native API format.
 */

import type {
  CapabilityDescriptor,
  ChatRequest,
  ChatResponse,
  ChatStream,
  JsonObject,
  LLMError,
} from "../types/index.js";

/** Per-call options. */
export interface CallOptions {
  /** Aborts the HTTP call and, for streams, the body read. */
  signal?: AbortSignal;
}

export interface ProviderAdapter {
  /** Adapter name, e.g. "openai_chat". */
  readonly name: string;

  /** Send a request and wait for the full response. */
  chat(request: ChatRequest, options?: CallOptions): Promise<ChatResponse>;

  /**
   * Open a stream. Rejects if the stream cannot be established; failures
   * after that arrive as a terminal error event.
   */
  streamChat(request: ChatRequest, options?: CallOptions): Promise<ChatStream>;

  /** Static feature flags. Never performs I/O. */
  capabilities(): CapabilityDescriptor;

  /** Build the vendor request body. */
  buildBody(request: ChatRequest, options: { stream: boolean }): JsonObject;

  /** Classify a non-2xx vendor response. */
  parseError(status: number, rawBody: string, headers?: Record<string, string>): LLMError;
}
