import { backgroundContext, createLogger, generate, generateResponseId } from '@switchboard/llm';
import type { Client, ExecutionContext, Logger } from '@switchboard/llm';
import { parseResponseRequest, toLLMRequest } from '../convert/request.js';
import { pendingResponse, toResponseObject } from '../convert/response.js';
import type { ResponseIdentity } from '../convert/response.js';
import type { ResponseManager } from '../state/response-manager.js';
import type { ResponseState } from '../state/response-state.js';
import type { CreateResponseRequest, ParsedResponseRequest } from '../types/request.js';
import type { ResponseObject } from '../types/response.js';
import type { ResponseStreamEvent } from '../types/event.js';
import { streamResponse } from './stream.js';

export type ResponsesEmulatorOptions = {
  readonly client: Client;
  readonly manager: ResponseManager;
  readonly logger?: Logger;
};

function identityOf(state: ResponseState, request: ParsedResponseRequest): ResponseIdentity {
  return { id: state.id, model: state.model, createdAt: state.createdAt, metadata: request.metadata };
}

/**
 * Serves the Responses protocol from a backend that only speaks chat
 * completions. Background responses run under the manager; everything else
 * runs the tool loop inline.
 */
export class ResponsesEmulator {
  private readonly client: Client;
  private readonly manager: ResponseManager;
  private readonly logger: Logger;

  constructor(options: ResponsesEmulatorOptions) {
    this.client = options.client;
    this.manager = options.manager;
    this.logger = options.logger ?? createLogger('responses');
  }

  async create(request: CreateResponseRequest, context: ExecutionContext = backgroundContext()): Promise<ResponseObject> {
    const parsed = parseResponseRequest(request);
    const llmRequest = toLLMRequest(parsed);

    if (parsed.background) {
      const state = this.manager.spawn(
        context,
        { model: parsed.model, timeoutMs: this.client.requestTimeoutMs },
        async (detached, entry) => {
          const result = await generate({ ...llmRequest, client: this.client, context: detached });
          return toResponseObject(result, identityOf(entry, parsed));
        },
      );
      this.logger.info('background response started', { responseId: state.id, model: parsed.model });
      return pendingResponse(identityOf(state, parsed));
    }

    const createdAt = Date.now();
    const result = await generate({ ...llmRequest, client: this.client, context });
    return toResponseObject(result, {
      id: generateResponseId(createdAt),
      model: parsed.model,
      createdAt,
      metadata: parsed.metadata,
    });
  }

  /**
   * Waits for a background response. Cancelled entries come back as a
   * `cancelled` snapshot; failed ones rethrow the stored error.
   */
  async get(id: string, signal?: AbortSignal): Promise<ResponseObject> {
    const state = await this.manager.get(id, signal);
    const error = state.error();
    if (state.status() === 'failed' && error) {
      throw error;
    }
    return this.view(state);
  }

  /** Cancellation is advisory: a response that already settled keeps its status. */
  cancel(id: string): ResponseObject {
    return this.view(this.manager.cancel(id));
  }

  delete(id: string): void {
    this.manager.delete(id);
  }

  /** The completed response without its `reasoning` items. */
  async compact(id: string, signal?: AbortSignal): Promise<ResponseObject> {
    const response = await this.get(id, signal);
    return { ...response, output: response.output.filter((item) => item.type !== 'reasoning') };
  }

  stream(request: CreateResponseRequest, context: ExecutionContext = backgroundContext()): AsyncGenerator<ResponseStreamEvent> {
    return streamResponse(this.client, parseResponseRequest(request), context);
  }

  private view(state: ResponseState): ResponseObject {
    const identity: ResponseIdentity = { id: state.id, model: state.model, createdAt: state.createdAt };
    const status = state.status();
    const result = state.result();
    if (status === 'completed' && result) {
      return result;
    }
    const error = state.error();
    return {
      ...pendingResponse(identity, status),
      error: error ? { code: 'response_failed', message: error.message } : null,
    };
  }
}
