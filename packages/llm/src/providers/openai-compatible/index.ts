import type { ProviderAdapter, LLMRequest, LLMResponse, ChatChunk } from '../../types/index.js';
import { fetchWithTimeout, fetchStream } from '../../utils/http.js';
import { createSSEStream } from '../../utils/sse.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';
import { translateStream, translateChunk } from './stream.js';

/**
 * Adapter for any backend exposing the chat-completions endpoint.
 * `baseUrl` is the server root; `/v1/chat/completions` is appended.
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, baseUrl: string, options?: { readonly name?: string }) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl;
    this.name = options?.name || 'openai-compatible';
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl, false);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
      provider: this.name,
    });

    return translateResponse(result.body, this.name);
  }

  async* stream(request: LLMRequest): AsyncIterable<ChatChunk> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl, true);

    const response = await fetchStream({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
      provider: this.name,
    });

    const sseStream = createSSEStream(response);
    yield* translateStream(sseStream, this.name);
  }
}

export { translateRequest, translateResponse, translateStream, translateChunk };
