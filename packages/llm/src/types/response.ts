import type { ContentPart, TextData, ToolCallData, ThinkingData } from './content.js';
import type { ToolCall, ToolResult } from './tool.js';

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  readonly reasoningTokens: number;
  readonly cacheReadTokens: number;
};

/**
 * Sums two usage records. The total is always recomputed from input and
 * output, so the result never inherits an inconsistent total.
 */
export function usageAdd(a: Readonly<Usage>, b: Readonly<Usage>): Usage {
  const inputTokens = a.inputTokens + b.inputTokens;
  const outputTokens = a.outputTokens + b.outputTokens;
  return {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
    reasoningTokens: a.reasoningTokens + b.reasoningTokens,
    cacheReadTokens: a.cacheReadTokens + b.cacheReadTokens,
  };
}

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    reasoningTokens: 0,
    cacheReadTokens: 0,
  };
}

export function usageIsEmpty(usage: Readonly<Usage>): boolean {
  return usage.inputTokens === 0 && usage.outputTokens === 0 && usage.totalTokens === 0;
}

export type StepResult = {
  readonly response: LLMResponse;
  readonly toolCalls: ReadonlyArray<ToolCall>;
  readonly toolResults: ReadonlyArray<ToolResult>;
  readonly usage: Usage;
};

export type LLMResponse = {
  readonly id: string;
  readonly model: string;
  readonly content: ReadonlyArray<ContentPart>;
  readonly refusal: string | null;
  readonly finishReason: FinishReason;
  /** `null` when the backend reported no usage for this response. */
  readonly usage: Usage | null;
  readonly providerMetadata: Record<string, unknown>;
};

export function responseText(response: Readonly<LLMResponse>): string {
  return response.content
    .filter((part): part is TextData => part.kind === 'TEXT')
    .map((part) => part.text)
    .join('');
}

export function responseToolCalls(response: Readonly<LLMResponse>): ReadonlyArray<ToolCall> {
  return response.content
    .filter((part): part is ToolCallData => part.kind === 'TOOL_CALL')
    .map((part) => ({
      toolCallId: part.toolCallId,
      toolName: part.toolName,
      args: part.args,
    }));
}

export function responseReasoning(response: Readonly<LLMResponse>): string {
  return response.content
    .filter((part): part is ThinkingData => part.kind === 'THINKING')
    .map((part) => part.text)
    .join('');
}
