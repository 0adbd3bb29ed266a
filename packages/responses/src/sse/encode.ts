import { formatSSE, formatSSEComment, silentLogger, toError } from '@switchboard/llm';
import type { Logger, ToolObserver } from '@switchboard/llm';
import type { ResponseStreamEvent } from '../types/event.js';

export type SSEWriter = (frame: string) => void | Promise<void>;

export function encodeSSE(event: ResponseStreamEvent): string {
  return formatSSE({ event: event.type, data: JSON.stringify(event) });
}

/**
 * Reports tool activity on an open SSE stream as comment frames
 * (`:tool_start:{...}` and `:tool_end:{...}`), which conforming clients
 * skip. A failed write is logged and the turn carries on.
 */
export function createSSEToolObserver(write: SSEWriter, logger: Logger = silentLogger): ToolObserver {
  const send = async (kind: 'tool_start' | 'tool_end', payload: Record<string, unknown>): Promise<void> => {
    try {
      await write(formatSSEComment(`${kind}:${JSON.stringify(payload)}`));
    } catch (error) {
      logger.warn('failed to write tool status', { kind, toolCallId: payload['tool_call_id'], error: toError(error) });
    }
  };

  return {
    onCall: (call) =>
      send('tool_start', {
        tool_call_id: call.toolCallId,
        tool_name: call.toolName,
        status: 'running',
        arguments: call.args,
      }),
    onResult: (toolCallId, toolName, result) =>
      send('tool_end', {
        tool_call_id: toolCallId,
        tool_name: toolName,
        status: 'complete',
        result,
      }),
  };
}
