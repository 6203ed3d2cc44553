/**
 * Shared request pipeline for HTTP-based adapters.
 *
 * Subclasses supply the vendor-specific pieces (body, endpoint, auth headers,
 * response and stream mapping); this class runs validation, the configured
 * request patch, the transport call and error classification the same way
 * for every vendor.
 */

import type { Credential, RequestPatch } from "../config/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { applyRequestPatch, compileRequestPatch, type CompiledRequestPatch } from "../patch/request-patch.js";
import { decodeChatStream, type StreamEventMapper } from "../stream-decoder.js";
import type {
  CapabilityDescriptor,
  ChatRequest,
  ChatResponse,
  ChatStream,
  JsonObject,
  JsonValue,
  LLMError,
  ProviderMetadata,
} from "../types/index.js";
import { ProviderError, UnsupportedFeatureError } from "../types/index.js";
import { FetchTransport, mergeHeaders, readStreamText, type HttpRequest, type HttpTransport } from "../utils/http.js";
import { mapHttpError } from "../utils/error-mapping.js";
import { parseJson } from "../utils/json.js";
import {
  ensureCapabilities,
  ensureToolMessages,
  resolveCredential,
  resolveModel,
  type CredentialPolicy,
} from "../validation/validators.js";
import type { CallOptions, ProviderAdapter } from "./adapter.js";

export interface HttpAdapterOptions {
  credential: Credential;
  /** Vendor origin; each adapter has its own default. */
  baseUrl?: string;
  defaultModel?: string;
  /** Adapter-specific settings, e.g. an API version header. */
  extra?: JsonObject;
  patch?: RequestPatch;
  transport?: HttpTransport;
  logger?: Logger;
}

/** Fixed per-vendor settings passed up by subclasses. */
export interface HttpAdapterSettings {
  name: string;
  defaultBaseUrl: string;
  credentialPolicy?: CredentialPolicy;
}

/** How the shared decoder should treat a vendor's stream. */
export interface StreamSettings {
  sentinel?: string;
  requireTerminal?: boolean;
}

export abstract class HttpProviderAdapter implements ProviderAdapter {
  readonly name: string;
  protected readonly credential: Credential;
  protected readonly baseUrl: string;
  protected readonly defaultModel?: string;
  protected readonly extra: JsonObject;
  protected readonly patch: CompiledRequestPatch;
  protected readonly transport: HttpTransport;
  protected readonly logger: Logger;

  /**
   * @throws AuthError when the credential type is not accepted.
   * @throws InvalidConfigError when the request patch is malformed.
   */
  constructor(settings: HttpAdapterSettings, options: HttpAdapterOptions) {
    this.name = settings.name;
    this.credential = resolveCredential(options.credential, settings.name, settings.credentialPolicy);
    this.baseUrl = (options.baseUrl ?? settings.defaultBaseUrl).replace(/\/+$/, "");
    this.defaultModel = options.defaultModel;
    this.extra = options.extra ?? {};
    this.patch = compileRequestPatch(options.patch ?? {});
    this.transport = options.transport ?? new FetchTransport();
    this.logger = (options.logger ?? silentLogger()).child({ provider: settings.name });
  }

  // -----------------------------------------------------------------------
  // Vendor hooks
  // -----------------------------------------------------------------------

  abstract capabilities(): CapabilityDescriptor;

  abstract buildBody(request: ChatRequest, options: { stream: boolean }): JsonObject;

  /** Full URL for a call. */
  protected abstract endpoint(model: string, stream: boolean): string;

  protected abstract authHeaders(): Record<string, string>;

  protected abstract parseResponse(body: JsonValue, metadata: ProviderMetadata): ChatResponse;

  /** A fresh mapper per stream; mappers may keep per-stream state. */
  protected abstract createStreamMapper(): StreamEventMapper;

  protected abstract streamSettings(): StreamSettings;

  parseError(status: number, rawBody: string, headers?: Record<string, string>): LLMError {
    return mapHttpError(status, rawBody, this.name, headers);
  }

  /** Checks run before any body is built. Subclasses may add their own. */
  protected validate(request: ChatRequest): void {
    ensureToolMessages(request.messages);
    ensureCapabilities(request, this.capabilities());
  }

  // -----------------------------------------------------------------------
  // Pipeline
  // -----------------------------------------------------------------------

  private prepare(request: ChatRequest, stream: boolean, options?: CallOptions): HttpRequest {
    this.validate(request);
    const model = resolveModel(request, this.defaultModel, this.name);
    const body = this.buildBody(request, { stream });

    const patched = applyRequestPatch(
      {
        url: this.endpoint(model, stream),
        body,
        headers: mergeHeaders(this.authHeaders(), stream ? { Accept: "text/event-stream" } : undefined),
      },
      this.patch,
    );

    return {
      method: "POST",
      url: patched.url,
      headers: patched.headers,
      body: JSON.stringify(patched.body),
      signal: options?.signal,
    };
  }

  private fail(status: number, rawBody: string, headers: Record<string, string>): LLMError {
    const error = this.parseError(status, rawBody, headers);
    this.logger.warn({ status, kind: error.kind }, "provider returned error status");
    return error;
  }

  async chat(request: ChatRequest, options?: CallOptions): Promise<ChatResponse> {
    const httpRequest = this.prepare(request, false, options);
    this.logger.debug({ url: httpRequest.url }, "dispatching chat request");

    const res = await this.transport.send(httpRequest);
    if (res.status < 200 || res.status >= 300) {
      throw this.fail(res.status, res.body, res.headers);
    }

    let body: JsonValue;
    try {
      body = parseJson(res.body);
    } catch (err) {
      throw new ProviderError("failed to parse response body", {
        provider: this.name,
        status_code: res.status,
        raw: res.body,
        cause: err,
      });
    }

    return this.parseResponse(body, {
      provider: this.name,
      endpoint: httpRequest.url,
      request_id: res.headers["x-request-id"] ?? res.headers["request-id"],
    });
  }

  async streamChat(request: ChatRequest, options?: CallOptions): Promise<ChatStream> {
    if (!this.capabilities().supports_stream) {
      throw new UnsupportedFeatureError("stream");
    }

    const httpRequest = this.prepare(request, true, options);
    this.logger.debug({ url: httpRequest.url }, "opening chat stream");

    const res = await this.transport.sendStream(httpRequest);
    if (res.status < 200 || res.status >= 300) {
      const text = await readStreamText(res.body);
      throw this.fail(res.status, text, res.headers);
    }

    return decodeChatStream(res.body, {
      provider: this.name,
      endpoint: httpRequest.url,
      mapEvent: this.createStreamMapper(),
      ...this.streamSettings(),
      signal: options?.signal,
      logger: this.logger,
    });
  }
}
