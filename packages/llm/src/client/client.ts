import type { LLMRequest, LLMResponse, ChatChunk, Middleware, ProviderAdapter } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, MAX_TOOL_ROUNDS } from '../api/constants.js';
import { OpenAICompatibleAdapter } from '../providers/openai-compatible/index.js';
import { ToolRouter } from '../tools/router.js';
import type { ToolFilter } from '../tools/types.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { executeMiddlewareChain } from './middleware.js';
import {
  detectProviders,
  loadClientSettings,
  type ClientConfig,
  type Environment,
  type RequestDefaults,
} from './config.js';

export type ProviderSettings = Readonly<Record<string, string>>;

export type AdapterFactory = (settings: ProviderSettings) => ProviderAdapter;

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com';

function requireSetting(providerName: string, settings: ProviderSettings, key: string): string {
  const value = settings[key];
  if (!value) {
    throw new ConfigurationError(`provider '${providerName}' requires '${key}'`);
  }
  return value;
}

export const DEFAULT_ADAPTER_FACTORIES: Readonly<Record<string, AdapterFactory>> = {
  openai: (settings) =>
    new OpenAICompatibleAdapter(
      requireSetting('openai', settings, 'apiKey'),
      settings['baseUrl'] ?? DEFAULT_OPENAI_BASE_URL,
      { name: 'openai' },
    ),
  'openai-compatible': (settings) =>
    new OpenAICompatibleAdapter(
      requireSetting('openai-compatible', settings, 'apiKey'),
      requireSetting('openai-compatible', settings, 'baseUrl'),
    ),
};

/**
 * Routes canonical requests to the configured provider adapters through the
 * middleware chain. One call here is one round; the tool loop in
 * `generate()`/`stream()` builds on it.
 */
export class Client {
  readonly tools: ToolRouter;
  readonly toolFilter: ToolFilter | undefined;
  readonly maxToolRounds: number;
  readonly requestTimeoutMs: number;
  readonly logger: Logger;
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | null;
  private readonly middlewares: ReadonlyArray<Middleware>;
  private readonly defaults: RequestDefaults;

  constructor(config: ClientConfig) {
    this.providers = config.providers;
    this.middlewares = config.middleware ?? [];
    this.tools = config.tools ?? new ToolRouter();
    this.toolFilter = config.toolFilter;
    this.maxToolRounds = config.maxToolRounds ?? MAX_TOOL_ROUNDS;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.defaults = config.defaults ?? {};
    this.logger = config.logger ?? createLogger('client');

    if (!Number.isInteger(this.maxToolRounds) || this.maxToolRounds < 1) {
      throw new ConfigurationError(`maxToolRounds must be a positive integer, got ${this.maxToolRounds}`);
    }

    // If no default provider specified and exactly one provider registered, use it as default
    if (config.defaultProvider === undefined) {
      const providerNames = Object.keys(config.providers);
      this.defaultProvider = providerNames.length === 1 ? providerNames[0] ?? null : null;
    } else {
      this.defaultProvider = config.defaultProvider;
    }
  }

  /**
   * Builds a client from provider keys and `SWITCHBOARD_*` settings in the
   * environment. `overrides` wins over anything read from the environment.
   */
  static fromEnv(
    overrides: Partial<ClientConfig> = {},
    adapterFactories: Readonly<Record<string, AdapterFactory>> = DEFAULT_ADAPTER_FACTORIES,
    env: Environment = process.env,
  ): Client {
    const detected = detectProviders(env);
    const settings = loadClientSettings(env);
    const providers: Record<string, ProviderAdapter> = {};

    for (const [providerName, providerSettings] of Object.entries(detected)) {
      const factory = adapterFactories[providerName];
      if (factory) {
        providers[providerName] = factory(providerSettings);
      }
    }

    return new Client({
      requestTimeoutMs: settings.requestTimeoutMs,
      maxToolRounds: settings.maxToolRounds,
      defaults: settings.defaults,
      ...overrides,
      providers: { ...providers, ...overrides.providers },
    });
  }

  get providerNames(): ReadonlyArray<string> {
    return Object.keys(this.providers);
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const adapter = this.resolveAdapter(request);

    const handler = (req: LLMRequest) => adapter.complete(req);
    const result = executeMiddlewareChain(this.middlewares, this.applyDefaults(request), handler);

    if (result instanceof Promise) {
      return result;
    }

    throw new ConfigurationError('complete() returned AsyncIterable instead of Promise');
  }

  stream(request: LLMRequest): AsyncIterable<ChatChunk> {
    const adapter = this.resolveAdapter(request);

    const handler = (req: LLMRequest) => adapter.stream(req);
    const result = executeMiddlewareChain(this.middlewares, this.applyDefaults(request), handler);

    if (result instanceof Promise) {
      throw new ConfigurationError('stream() returned Promise instead of AsyncIterable');
    }

    return result;
  }

  async close(): Promise<void> {
    const closePromises = Object.values(this.providers)
      .filter((adapter) => adapter.close !== undefined)
      .map((adapter) => adapter.close?.());

    await Promise.allSettled(closePromises);
  }

  private applyDefaults(request: LLMRequest): LLMRequest {
    return {
      ...request,
      maxTokens: request.maxTokens ?? this.defaults.maxTokens,
      temperature: request.temperature ?? this.defaults.temperature,
    };
  }

  private resolveAdapter(request: LLMRequest): ProviderAdapter {
    const provider = this.resolveProvider(request);
    const adapter = this.providers[provider];

    if (!adapter) {
      throw new ConfigurationError(`provider '${provider}' not configured`);
    }

    return adapter;
  }

  private resolveProvider(request: LLMRequest): string {
    if (request.provider) {
      return request.provider;
    }

    if (this.defaultProvider) {
      return this.defaultProvider;
    }

    throw new ConfigurationError('no provider configured and no default set');
  }
}
