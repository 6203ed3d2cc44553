/**
 * LLMClient -- routes requests by handle to registered provider adapters.
 *
 * The handle-to-adapter mapping is fixed once the client is built. Clients
 * come from `LLMClient.builder()` (hand-built adapters) or
 * `LLMClient.fromConfig()` (validated model entries).
 */

import { parseModelConfigs } from "./config/index.js";
import { silentLogger, type Logger } from "./logging/logger.js";
import { createAdapter } from "./providers/index.js";
import type { CallOptions, ProviderAdapter } from "./providers/adapter.js";
import type {
  CapabilityDescriptor,
  ChatRequest,
  ChatResponse,
  ChatStream,
  LLMError,
} from "./types/index.js";
import { HandleNotFoundError, ValidationError } from "./types/index.js";
import type { HttpTransport } from "./utils/http.js";
import { retry, type RetryPolicy } from "./utils/retry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ClientOptions {
  /** Receives routing and retry logs. Silent by default. */
  logger?: Logger;
}

export interface FromConfigOptions extends ClientOptions {
  /** Shared by every adapter; defaults to a fetch-based transport each. */
  transport?: HttpTransport;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class LLMClientBuilder {
  private readonly entries: Array<[string, ProviderAdapter]> = [];

  constructor(private readonly options: ClientOptions = {}) {}

  register(handle: string, adapter: ProviderAdapter): this {
    this.entries.push([handle, adapter]);
    return this;
  }

  /** @throws ValidationError when a handle was registered twice. */
  build(): LLMClient {
    const adapters = new Map<string, ProviderAdapter>();
    for (const [handle, adapter] of this.entries) {
      if (adapters.has(handle)) {
        throw new ValidationError(`duplicate handle: ${handle}`);
      }
      adapters.set(handle, adapter);
    }
    return LLMClient.create(adapters, this.options);
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class LLMClient {
  private readonly logger: Logger;

  private constructor(
    private readonly adapters: ReadonlyMap<string, ProviderAdapter>,
    options: ClientOptions,
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  /** @internal Used by the builder; the map is copied. */
  static create(adapters: ReadonlyMap<string, ProviderAdapter>, options: ClientOptions = {}): LLMClient {
    return new LLMClient(new Map(adapters), options);
  }

  static builder(options?: ClientOptions): LLMClientBuilder {
    return new LLMClientBuilder(options);
  }

  /**
   * Build a client from untrusted model entries.
   *
   * Every entry is checked before any adapter is registered:
   * @throws InvalidConfigError on a malformed entry or request patch.
   * @throws ValidationError on a duplicate handle.
   * @throws AuthError when an adapter does not accept the entry's credential.
   */
  static fromConfig(entries: unknown, options: FromConfigOptions = {}): LLMClient {
    const configs = parseModelConfigs(entries);

    const seen = new Set<string>();
    for (const config of configs) {
      if (seen.has(config.handle)) {
        throw new ValidationError(`duplicate handle: ${config.handle}`);
      }
      seen.add(config.handle);
    }

    const adapters = configs.map(
      (config) =>
        [
          config.handle,
          createAdapter(config, { transport: options.transport, logger: options.logger }),
        ] as const,
    );

    const builder = LLMClient.builder({ logger: options.logger });
    for (const [handle, adapter] of adapters) {
      builder.register(handle, adapter);
    }
    return builder.build();
  }

  // -----------------------------------------------------------------------
  // Routing
  // -----------------------------------------------------------------------

  private resolve(handle: string): ProviderAdapter {
    const adapter = this.adapters.get(handle);
    if (!adapter) {
      throw new HandleNotFoundError(handle);
    }
    return adapter;
  }

  private retryPolicy(
    handle: string,
    policy: Partial<RetryPolicy> | undefined,
    options: CallOptions | undefined,
  ): Partial<RetryPolicy> {
    const onRetry = policy?.onRetry;
    return {
      ...policy,
      signal: policy?.signal ?? options?.signal,
      onRetry: (error: LLMError, attempt: number, delay: number) => {
        this.logger.warn({ handle, kind: error.kind, attempt, delay }, "retrying request");
        onRetry?.(error, attempt, delay);
      },
    };
  }

  async chat(handle: string, request: ChatRequest, options?: CallOptions): Promise<ChatResponse> {
    const adapter = this.resolve(handle);
    this.logger.debug({ handle, provider: adapter.name }, "routing chat request");
    return adapter.chat(request, options);
  }

  async streamChat(handle: string, request: ChatRequest, options?: CallOptions): Promise<ChatStream> {
    const adapter = this.resolve(handle);
    this.logger.debug({ handle, provider: adapter.name }, "routing stream request");
    return adapter.streamChat(request, options);
  }

  /** `chat` under the retry engine; the handle is resolved once, up front. */
  async chatWithRetry(
    handle: string,
    request: ChatRequest,
    policy?: Partial<RetryPolicy>,
    options?: CallOptions,
  ): Promise<ChatResponse> {
    const adapter = this.resolve(handle);
    return retry(() => adapter.chat(request, options), this.retryPolicy(handle, policy, options));
  }

  /**
   * Retries opening the stream only. Once the stream is returned, failures
   * arrive as terminal error events and are not retried.
   */
  async streamChatWithRetry(
    handle: string,
    request: ChatRequest,
    policy?: Partial<RetryPolicy>,
    options?: CallOptions,
  ): Promise<ChatStream> {
    const adapter = this.resolve(handle);
    return retry(
      () => adapter.streamChat(request, options),
      this.retryPolicy(handle, policy, options),
    );
  }

  // -----------------------------------------------------------------------
  // Introspection (no I/O)
  // -----------------------------------------------------------------------

  capabilities(handle: string): CapabilityDescriptor {
    return this.resolve(handle).capabilities();
  }

  /** Registered handles in registration order. */
  handles(): string[] {
    return [...this.adapters.keys()];
  }

  handlesSupportingTools(): string[] {
    return this.filterHandles((caps) => caps.supports_tools);
  }

  handlesSupportingStream(): string[] {
    return this.filterHandles((caps) => caps.supports_stream);
  }

  private filterHandles(predicate: (caps: CapabilityDescriptor) => boolean): string[] {
    return [...this.adapters]
      .filter(([, adapter]) => predicate(adapter.capabilities()))
      .map(([handle]) => handle);
  }
}
