export * from './types/index.js';
export * from './client/index.js';

export { ToolCallAccumulator } from './accumulator/tool-call-accumulator.js';
export type { ToolCallSlot, NewToolCallIdCallback } from './accumulator/tool-call-accumulator.js';
export { CompletionAccumulator } from './accumulator/completion-accumulator.js';
export { TokenCounter, estimateTokens } from './accumulator/tokens.js';

export {
  backgroundContext,
  withEnvironment,
  withCancel,
  withTimeout,
  detachContext,
  cancellationError,
  throwIfCancelled,
  raceSignal,
  raceIterable,
  linkSignals,
} from './context/execution-context.js';
export type { ContextHandle, ExecutionContext, LinkedSignal, RequestEnvironment } from './context/execution-context.js';

export type { ToolFilter, ToolObserver, ToolProvider } from './tools/types.js';
export { applyToolFilter, excludeTools, toolsByName } from './tools/filter.js';
export { LocalToolProvider } from './tools/local.js';
export type { LocalTool, ToolHandler } from './tools/local.js';
export { DEFAULT_NAMESPACE_SEPARATOR, ToolRouter, withNamespace } from './tools/router.js';
export type { ToolRouterOptions } from './tools/router.js';

export { MAX_TOOL_ROUNDS, DEFAULT_REQUEST_TIMEOUT_MS } from './api/constants.js';
export { executeToolCalls } from './api/tool-execution.js';
export type { ExecuteToolCallsOptions } from './api/tool-execution.js';
export { generate, generate as runToolLoop } from './api/generate.js';
export type { GenerateOptions, GenerateResult } from './api/generate.js';
export { stream, stream as streamToolLoop } from './api/stream.js';
export type { StreamOptions, StreamResult } from './api/stream.js';

export { OpenAICompatibleAdapter } from './providers/openai-compatible/index.js';

export { Channel, DEFAULT_CHANNEL_CAPACITY } from './utils/channel.js';
export { createLogger, formatLog, silentLogger } from './utils/logger.js';
export type { LogFields, LogLevel, Logger } from './utils/logger.js';
export { generateItemId, generateResponseId, generateToolCallId, TOOL_CALL_ID_PREFIX } from './utils/id.js';
export { isRecord, parseArguments } from './utils/json.js';
export { fetchStream, fetchWithTimeout } from './utils/http.js';
export type { FetchOptions, FetchResult } from './utils/http.js';
export { mapHttpError, parseRetryAfter } from './utils/error-mapping.js';
export { createSSEStream, formatSSE, formatSSEComment } from './utils/sse.js';
export type { SSEEvent } from './utils/sse.js';
