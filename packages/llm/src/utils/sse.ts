import { EventSourceParserStream } from 'eventsource-parser/stream';
import { StreamError } from '../types/error.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

/**
 * Creates an async iterable of SSE events from a Response body.
 * Stopping iteration early cancels the underlying body.
 */
export async function* createSSEStream(
  response: globalThis.Response,
): AsyncIterable<SSEEvent> {
  const body = response.body;
  if (!body) {
    throw new StreamError('Response body is null or undefined');
  }

  const reader = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream())
    .getReader();
  let finished = false;

  try {
    while (true) {
      let result: ReadableStreamReadResult<{ event?: string; data: string; id?: string }>;
      try {
        result = await reader.read();
      } catch (err) {
        finished = true;
        throw new StreamError(
          `Failed to parse SSE stream: ${err instanceof Error ? err.message : 'Unknown error'}`,
          err instanceof Error ? err : undefined,
        );
      }

      if (result.done) {
        finished = true;
        return;
      }

      const { event, data, id } = result.value;
      yield {
        event: event ?? '',
        data,
        ...(id ? { id } : {}),
      };
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Serializes one SSE event. Multi-line data is split across `data:` lines.
 */
export function formatSSE(event: Readonly<{ event?: string; data: string; id?: string }>): string {
  const lines: Array<string> = [];
  if (event.event) {
    lines.push(`event: ${event.event}`);
  }
  if (event.id) {
    lines.push(`id: ${event.id}`);
  }
  for (const line of event.data.split('\n')) {
    lines.push(`data: ${line}`);
  }
  return `${lines.join('\n')}\n\n`;
}

/** An SSE comment line; conforming clients ignore it. */
export function formatSSEComment(text: string): string {
  return `:${text.replace(/\n/g, ' ')}\n\n`;
}
