import type { SSEEvent } from '../../utils/sse.js';
import type { ChatChunk, ChunkChoice, ToolCallDelta } from '../../types/index.js';
import { ProviderError, StreamError } from '../../types/index.js';
import { WireChunkSchema, WireErrorSchema, type WireChunk, type WireToolCallDelta } from './schema.js';
import { translateFinishReason, translateUsage } from './usage.js';

function parseEventData(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new StreamError(
      `invalid JSON in stream: ${data.slice(0, 200)}`,
      error instanceof Error ? error : undefined,
    );
  }
}

function translateToolCalls(wire: ReadonlyArray<WireToolCallDelta>): Array<ToolCallDelta> {
  return wire.map((toolCall) => ({
    index: toolCall.index,
    ...(toolCall.id ? { id: toolCall.id } : {}),
    ...(toolCall.type ? { type: toolCall.type } : {}),
    ...(toolCall.function?.name ? { name: toolCall.function.name } : {}),
    ...(toolCall.function?.arguments ? { arguments: toolCall.function.arguments } : {}),
  }));
}

export function translateChunk(wire: WireChunk): ChatChunk {
  const choices = (wire.choices ?? []).map((choice, position): ChunkChoice => {
    const delta = choice.delta;
    return {
      index: choice.index ?? position,
      delta: {
        ...(delta?.role === 'assistant' ? { role: 'assistant' as const } : {}),
        ...(delta?.content ? { content: delta.content } : {}),
        ...(delta?.refusal ? { refusal: delta.refusal } : {}),
        ...(delta?.reasoning_content ? { reasoning: delta.reasoning_content } : {}),
        ...(delta?.tool_calls && delta.tool_calls.length > 0
          ? { toolCalls: translateToolCalls(delta.tool_calls) }
          : {}),
      },
      finishReason: translateFinishReason(choice.finish_reason),
    };
  });

  return {
    id: wire.id ?? '',
    model: wire.model ?? '',
    choices,
    usage: translateUsage(wire.usage),
  };
}

/**
 * Turns a chat-completions SSE stream into canonical chunks. Ends at
 * `[DONE]`; an in-band error object or an unreadable chunk raises.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
  provider: string = 'openai-compatible',
): AsyncIterable<ChatChunk> {
  for await (const event of sseStream) {
    if (!event.data) {
      continue;
    }
    if (event.data === '[DONE]') {
      return;
    }

    const data = parseEventData(event.data);

    const wireError = WireErrorSchema.safeParse(data);
    if (wireError.success) {
      const { message, code } = wireError.data.error;
      throw new ProviderError(message, {
        statusCode: 200,
        provider,
        errorCode: code == null ? null : String(code),
        raw: data,
      });
    }

    const parsed = WireChunkSchema.safeParse(data);
    if (!parsed.success) {
      throw new StreamError(`malformed stream chunk: ${parsed.error.message}`);
    }

    yield translateChunk(parsed.data);
  }
}
