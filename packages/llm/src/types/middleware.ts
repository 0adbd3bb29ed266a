import type { LLMRequest } from './request.js';
import type { LLMResponse } from './response.js';
import type { ChatChunk } from './stream.js';

export type Middleware = (
  request: LLMRequest,
  next: (request: LLMRequest) => Promise<LLMResponse> | AsyncIterable<ChatChunk>,
) => Promise<LLMResponse> | AsyncIterable<ChatChunk>;
