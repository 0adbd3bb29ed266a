import { z } from 'zod';
import type { Middleware, ProviderAdapter } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import type { ToolRouter } from '../tools/router.js';
import type { ToolFilter } from '../tools/types.js';
import type { Logger } from '../utils/logger.js';

export type ProviderEnvConfig = {
  readonly envVar: string;
  readonly providerName: string;
};

export type ProviderOptionEnvConfig = {
  readonly envVar: string;
  readonly providerName: string;
  readonly option: string;
};

export type RequestDefaults = {
  readonly maxTokens?: number;
  readonly temperature?: number;
};

export type ClientConfig = {
  readonly providers: Record<string, ProviderAdapter>;
  readonly defaultProvider?: string;
  readonly middleware?: ReadonlyArray<Middleware>;
  /** Tool providers the tool loop draws on when a request brings no tools of its own. */
  readonly tools?: ToolRouter;
  readonly toolFilter?: ToolFilter;
  readonly maxToolRounds?: number;
  /** Upper bound for one tool-loop turn. 0 disables the bound. */
  readonly requestTimeoutMs?: number;
  /** Applied only when a request leaves the setting unset. */
  readonly defaults?: RequestDefaults;
  readonly logger?: Logger;
};

export type Environment = Readonly<Record<string, string | undefined>>;

export const DEFAULT_PROVIDER_ENV_CONFIGS: ReadonlyArray<ProviderEnvConfig> = [
  { envVar: 'OPENAI_API_KEY', providerName: 'openai' },
  { envVar: 'OPENAI_COMPATIBLE_API_KEY', providerName: 'openai-compatible' },
];

export const DEFAULT_PROVIDER_OPTION_ENV_CONFIGS: ReadonlyArray<ProviderOptionEnvConfig> = [
  { envVar: 'OPENAI_BASE_URL', providerName: 'openai', option: 'baseUrl' },
  { envVar: 'OPENAI_COMPATIBLE_BASE_URL', providerName: 'openai-compatible', option: 'baseUrl' },
];

/**
 * Provider settings found in the environment, keyed by provider name. A
 * provider appears only when its API key is set; options without a key are
 * ignored.
 */
export function detectProviders(env: Environment = process.env): Record<string, Record<string, string>> {
  const providers: Record<string, Record<string, string>> = {};

  for (const config of DEFAULT_PROVIDER_ENV_CONFIGS) {
    const apiKey = env[config.envVar];
    if (apiKey && apiKey.length > 0) {
      providers[config.providerName] = { ...providers[config.providerName], apiKey };
    }
  }

  for (const config of DEFAULT_PROVIDER_OPTION_ENV_CONFIGS) {
    const value = env[config.envVar];
    const providerConfig = providers[config.providerName];
    if (value && value.length > 0 && providerConfig) {
      providerConfig[config.option] = value;
    }
  }

  return providers;
}

const ClientEnvSchema = z.object({
  SWITCHBOARD_REQUEST_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  SWITCHBOARD_MAX_TOOL_ROUNDS: z.coerce.number().int().positive().optional(),
  SWITCHBOARD_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  SWITCHBOARD_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

export type ClientEnvSettings = {
  readonly requestTimeoutMs?: number;
  readonly maxToolRounds?: number;
  readonly defaults: RequestDefaults;
};

/** Drops unset and empty variables so they read as absent rather than as 0. */
export function presentEnv(env: Environment): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }
  return present;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function loadClientSettings(env: Environment = process.env): ClientEnvSettings {
  const parsed = ClientEnvSchema.safeParse(presentEnv(env));
  if (!parsed.success) {
    throw new ConfigurationError(`invalid client configuration: ${formatIssues(parsed.error)}`);
  }

  const settings = parsed.data;
  return {
    requestTimeoutMs: settings.SWITCHBOARD_REQUEST_TIMEOUT_MS,
    maxToolRounds: settings.SWITCHBOARD_MAX_TOOL_ROUNDS,
    defaults: {
      maxTokens: settings.SWITCHBOARD_MAX_TOKENS,
      temperature: settings.SWITCHBOARD_TEMPERATURE,
    },
  };
}
