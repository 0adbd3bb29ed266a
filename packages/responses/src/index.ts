export { ResponseNotFoundError, ResponseTimeoutError } from './types/error.js';
export type {
  FunctionCallOutputItem,
  MessageOutputItem,
  OutputItem,
  OutputText,
  ReasoningOutputItem,
  ResponseErrorBody,
  ResponseObject,
  ResponseStatus,
  ResponseUsage,
} from './types/response.js';
export type { ResponseStreamEvent, ResponseStreamEventBody, ResponseStreamEventType } from './types/event.js';
export { CreateResponseRequestSchema } from './types/request.js';
export type { CreateResponseRequest, ParsedResponseRequest, FunctionTool } from './types/request.js';

export { convertInput, convertTools, parseImageUrl, parseResponseRequest, toLLMRequest } from './convert/request.js';
export { pendingResponse, toResponseObject, toResponseUsage } from './convert/response.js';
export type { ResponseIdentity } from './convert/response.js';

export { ResponseState } from './state/response-state.js';
export type { CancelHandle } from './state/response-state.js';
export { ResponseManager } from './state/response-manager.js';
export type { ResponseManagerOptions, ResponseWork, SpawnOptions } from './state/response-manager.js';

export { ResponsesEmulator } from './emulator/emulator.js';
export type { ResponsesEmulatorOptions } from './emulator/emulator.js';
export { streamResponse } from './emulator/stream.js';

export { createSSEToolObserver, encodeSSE } from './sse/encode.js';
export type { SSEWriter } from './sse/encode.js';

export {
  DEFAULT_RETENTION_MS,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  loadManagerOptions,
} from './config.js';
export type { ManagerEnvSettings } from './config.js';
