import type { FinishReason, Usage } from '../../types/index.js';
import type { WireUsage } from './schema.js';

export function translateUsage(raw: WireUsage | null | undefined): Usage | null {
  if (!raw) {
    return null;
  }
  const inputTokens = raw.prompt_tokens ?? 0;
  const outputTokens = raw.completion_tokens ?? 0;
  return {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
    reasoningTokens: raw.completion_tokens_details?.reasoning_tokens ?? 0,
    cacheReadTokens: raw.prompt_tokens_details?.cached_tokens ?? 0,
  };
}

export function translateFinishReason(raw: string | null | undefined): FinishReason | null {
  switch (raw) {
    case null:
    case undefined:
    case '':
      return null;
    case 'length':
      return 'length';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'stop';
  }
}
