import type { Middleware, LLMRequest, LLMResponse, ChatChunk } from '../types/index.js';

type Handler = (request: LLMRequest) => Promise<LLMResponse> | AsyncIterable<ChatChunk>;

/**
 * Wraps `handler` in the middleware onion: the first middleware sees the
 * request first and the result last.
 */
export function executeMiddlewareChain(
  middlewares: ReadonlyArray<Middleware>,
  request: LLMRequest,
  handler: Handler,
): Promise<LLMResponse> | AsyncIterable<ChatChunk> {
  let chain: Handler = handler;

  for (let i = middlewares.length - 1; i >= 0; i--) {
    const mw = middlewares[i];
    if (!mw) continue;
    const nextChain = chain;

    chain = (req: LLMRequest) => mw(req, nextChain);
  }

  return chain(request);
}
