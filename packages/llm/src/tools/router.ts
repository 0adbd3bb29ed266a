import type { ExecutionContext } from '../context/execution-context.js';
import type { ToolDescriptor } from '../types/index.js';
import { ConfigurationError, ToolNotFoundError } from '../types/index.js';
import type { ToolProvider } from './types.js';

export const DEFAULT_NAMESPACE_SEPARATOR = '/';

export type ToolRouterOptions = {
  readonly local?: ToolProvider;
  readonly remote?: ReadonlyArray<ToolProvider>;
  readonly separator?: string;
};

/**
 * Routes tool names to the provider that owns them: a name starting with a
 * remote provider's namespace goes to that provider, anything else to the
 * single unnamespaced local provider.
 */
export class ToolRouter {
  readonly separator: string;
  private readonly local: ToolProvider | null;
  private readonly remote: ReadonlyArray<ToolProvider>;

  constructor(options: ToolRouterOptions = {}) {
    this.separator = options.separator ?? DEFAULT_NAMESPACE_SEPARATOR;
    this.local = options.local ?? null;
    this.remote = options.remote ?? [];

    const seen = new Set<string>();
    for (const provider of this.remote) {
      if (!provider.namespace) {
        throw new ConfigurationError('remote tool providers must declare a namespace');
      }
      if (seen.has(provider.namespace)) {
        throw new ConfigurationError(`duplicate tool namespace '${provider.namespace}'`);
      }
      seen.add(provider.namespace);
    }
  }

  get hasProviders(): boolean {
    return this.local !== null || this.remote.length > 0;
  }

  /**
   * A router that also consults `providers`. A namespaced provider replaces
   * any remote with the same namespace; an unnamespaced one replaces the
   * local provider.
   */
  withProviders(providers: ReadonlyArray<ToolProvider>): ToolRouter {
    if (providers.length === 0) {
      return this;
    }

    let local = this.local ?? undefined;
    const remote = new Map<string, ToolProvider>();
    for (const provider of this.remote) {
      if (provider.namespace) {
        remote.set(provider.namespace, provider);
      }
    }
    for (const provider of providers) {
      if (provider.namespace) {
        remote.set(provider.namespace, provider);
      } else {
        local = provider;
      }
    }

    return new ToolRouter({ local, remote: Array.from(remote.values()), separator: this.separator });
  }

  /** Tools from the local provider first, then each remote in order. */
  async listTools(context: ExecutionContext): Promise<Array<ToolDescriptor>> {
    const tools: Array<ToolDescriptor> = [];
    if (this.local) {
      tools.push(...(await this.local.listTools(context)));
    }
    for (const provider of this.remote) {
      tools.push(...(await provider.listTools(context)));
    }
    return tools;
  }

  resolve(name: string): ToolProvider {
    for (const provider of this.remote) {
      if (provider.namespace && name.startsWith(`${provider.namespace}${this.separator}`)) {
        return provider;
      }
    }
    if (!this.local) {
      throw new ToolNotFoundError(name, `no local tool provider configured for '${name}'`);
    }
    return this.local;
  }

  async callTool(context: ExecutionContext, name: string, args: Record<string, unknown>): Promise<string> {
    return this.resolve(name).callTool(context, name, args);
  }
}

/**
 * Exposes an unprefixed provider under `namespace`: listed names gain the
 * prefix, and the prefix is stripped again before each call.
 */
export function withNamespace(
  provider: ToolProvider,
  namespace: string,
  separator: string = DEFAULT_NAMESPACE_SEPARATOR,
): ToolProvider {
  const prefix = `${namespace}${separator}`;
  return {
    namespace,
    async listTools(context) {
      const tools = await provider.listTools(context);
      return tools.map((tool) => ({ ...tool, name: `${prefix}${tool.name}` }));
    },
    async callTool(context, name, args) {
      if (!name.startsWith(prefix)) {
        throw new ToolNotFoundError(name, `tool '${name}' is outside namespace '${namespace}'`);
      }
      return provider.callTool(context, name.slice(prefix.length), args);
    },
  };
}
