import { generateItemId, responseReasoning } from '@switchboard/llm';
import type { GenerateResult, ToolCall, Usage } from '@switchboard/llm';
import type {
  FunctionCallOutputItem,
  MessageOutputItem,
  OutputItem,
  ResponseObject,
  ResponseStatus,
  ResponseUsage,
} from '../types/response.js';

export type ResponseIdentity = {
  readonly id: string;
  readonly model: string;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly metadata?: Readonly<Record<string, string>>;
};

export function toResponseUsage(usage: Readonly<Usage>): ResponseUsage {
  return {
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
    total_tokens: usage.totalTokens,
    input_tokens_details: { cached_tokens: usage.cacheReadTokens },
    output_tokens_details: { reasoning_tokens: usage.reasoningTokens },
  };
}

export function messageItem(id: string, text: string, status: MessageOutputItem['status']): MessageOutputItem {
  return {
    type: 'message',
    id,
    role: 'assistant',
    status,
    content: status === 'completed' || text !== '' ? [{ type: 'output_text', text, annotations: [] }] : [],
  };
}

export function functionCallItem(call: ToolCall): FunctionCallOutputItem {
  return {
    type: 'function_call',
    id: generateItemId('fc'),
    call_id: call.toolCallId,
    name: call.toolName,
    arguments: JSON.stringify(call.args),
    status: 'completed',
  };
}

/** A response object with no output yet, for entries that have not finished. */
export function pendingResponse(identity: ResponseIdentity, status: ResponseStatus = 'in_progress'): ResponseObject {
  return {
    id: identity.id,
    object: 'response',
    created_at: Math.floor(identity.createdAt / 1000),
    status,
    model: identity.model,
    output: [],
    usage: null,
    error: null,
    metadata: identity.metadata ?? {},
  };
}

/**
 * Output order is reasoning, then the assistant message, then one
 * `function_call` item per tool call handed back. The message item is left
 * out when the turn ended in tool calls alone.
 */
export function toResponseObject(result: GenerateResult, identity: ResponseIdentity): ResponseObject {
  const output: Array<OutputItem> = [];

  const reasoning = responseReasoning(result.response);
  if (reasoning) {
    output.push({ type: 'reasoning', id: generateItemId('rs'), summary: [{ type: 'summary_text', text: reasoning }] });
  }
  if (result.text !== '' || result.toolCalls.length === 0) {
    output.push(messageItem(generateItemId('msg'), result.text, 'completed'));
  }
  for (const call of result.toolCalls) {
    output.push(functionCallItem(call));
  }

  return {
    ...pendingResponse(identity, 'completed'),
    output,
    usage: toResponseUsage(result.totalUsage),
  };
}
