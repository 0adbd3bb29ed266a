import { generateItemId, generateResponseId, stream } from '@switchboard/llm';
import type { Client, ExecutionContext } from '@switchboard/llm';
import { toLLMRequest } from '../convert/request.js';
import { functionCallItem, messageItem, pendingResponse, toResponseUsage } from '../convert/response.js';
import type { ResponseIdentity } from '../convert/response.js';
import type { ResponseStreamEvent, ResponseStreamEventBody } from '../types/event.js';
import type { OutputItem, OutputText } from '../types/response.js';
import type { ParsedResponseRequest } from '../types/request.js';

function outputText(text: string): OutputText {
  return { type: 'output_text', text, annotations: [] };
}

/**
 * Replays one streamed tool-loop turn as Responses events. The assistant
 * message is always output 0; tool calls handed back to the caller follow
 * it. An error ends the sequence without `response.completed` and is thrown
 * from the iterator once the events before it have been yielded.
 */
export async function* streamResponse(
  client: Client,
  request: ParsedResponseRequest,
  context: ExecutionContext,
): AsyncGenerator<ResponseStreamEvent> {
  const createdAt = Date.now();
  const identity: ResponseIdentity = {
    id: generateResponseId(createdAt),
    model: request.model,
    createdAt,
    metadata: request.metadata,
  };
  let sequence = 0;
  const event = (body: ResponseStreamEventBody): ResponseStreamEvent => ({ ...body, sequence_number: sequence++ });

  const turn = stream({ ...toLLMRequest(request), client, context });
  const pending = pendingResponse(identity);
  yield event({ type: 'response.created', response: pending });
  yield event({ type: 'response.in_progress', response: pending });

  const itemId = generateItemId('msg');
  const location = { item_id: itemId, output_index: 0, content_index: 0 };
  yield event({ type: 'response.output_item.added', output_index: 0, item: messageItem(itemId, '', 'in_progress') });
  yield event({ type: 'response.content_part.added', ...location, part: outputText('') });

  let text = '';
  for await (const delta of turn.textStream) {
    text += delta;
    yield event({ type: 'response.output_text.delta', ...location, delta });
  }
  const result = await turn.response();

  yield event({ type: 'response.output_text.done', ...location, text });
  yield event({ type: 'response.content_part.done', ...location, part: outputText(text) });
  const message = messageItem(itemId, text, 'completed');
  yield event({ type: 'response.output_item.done', output_index: 0, item: message });

  const output: Array<OutputItem> = [message];
  for (const call of result.toolCalls) {
    const item = functionCallItem(call);
    const outputIndex = output.length;
    output.push(item);
    yield event({ type: 'response.output_item.added', output_index: outputIndex, item: { ...item, status: 'in_progress' } });
    yield event({
      type: 'response.function_call_arguments.done',
      item_id: item.id,
      output_index: outputIndex,
      arguments: item.arguments,
    });
    yield event({ type: 'response.output_item.done', output_index: outputIndex, item });
  }

  yield event({
    type: 'response.completed',
    response: { ...pending, status: 'completed', output, usage: toResponseUsage(result.totalUsage) },
  });
}
