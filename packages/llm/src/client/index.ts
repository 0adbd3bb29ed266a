export { Client, DEFAULT_ADAPTER_FACTORIES, DEFAULT_OPENAI_BASE_URL } from './client.js';
export type { AdapterFactory, ProviderSettings } from './client.js';
export { executeMiddlewareChain } from './middleware.js';
export { detectProviders, loadClientSettings, presentEnv, formatIssues } from './config.js';
export type { ClientConfig, ClientEnvSettings, Environment, RequestDefaults } from './config.js';
