import type { LLMResponse, ContentPart } from '../../types/index.js';
import { ProviderError } from '../../types/index.js';
import { parseArguments } from '../../utils/json.js';
import { generateToolCallId } from '../../utils/id.js';
import { WireResponseSchema } from './schema.js';
import { translateFinishReason, translateUsage } from './usage.js';

export function translateResponse(raw: unknown, provider: string = 'openai-compatible'): LLMResponse {
  const parsed = WireResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(`malformed chat completion response: ${parsed.error.message}`, {
      statusCode: 200,
      provider,
      raw,
    });
  }

  const wire = parsed.data;
  const firstChoice = wire.choices[0];
  const message = firstChoice?.message;
  const content: Array<ContentPart> = [];

  if (message?.reasoning_content) {
    content.push({ kind: 'THINKING', text: message.reasoning_content });
  }

  if (message?.content) {
    content.push({ kind: 'TEXT', text: message.content });
  }

  for (const toolCall of message?.tool_calls ?? []) {
    content.push({
      kind: 'TOOL_CALL',
      toolCallId: toolCall.id || generateToolCallId(),
      toolName: toolCall.function.name,
      args: parseArguments(toolCall.function.arguments ?? ''),
    });
  }

  const hasToolCalls = content.some((part) => part.kind === 'TOOL_CALL');

  return {
    id: wire.id ?? '',
    model: wire.model ?? '',
    content,
    refusal: message?.refusal || null,
    finishReason: translateFinishReason(firstChoice?.finish_reason) ?? (hasToolCalls ? 'tool_calls' : 'stop'),
    usage: translateUsage(wire.usage),
    providerMetadata: {},
  };
}
