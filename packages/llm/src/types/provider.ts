import type { LLMRequest } from './request.js';
import type { LLMResponse } from './response.js';
import type { ChatChunk } from './stream.js';

/**
 * A backend that speaks the canonical model. Implementations translate to and
 * from their own wire format internally.
 */
export interface ProviderAdapter {
  readonly name: string;
  complete(request: LLMRequest): Promise<LLMResponse>;
  stream(request: LLMRequest): AsyncIterable<ChatChunk>;
  close?(): Promise<void>;
}
