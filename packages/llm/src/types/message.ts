import type { ContentPart, Role, TextData, ToolCallData } from './content.js';
import type { ToolCall } from './tool.js';

export type Message = {
  readonly role: Role;
  readonly content: ReadonlyArray<ContentPart> | string;
};

export function systemMessage(text: string): Message {
  return {
    role: 'system',
    content: text,
  };
}

export function userMessage(content: string | ReadonlyArray<ContentPart>): Message {
  return {
    role: 'user',
    content,
  };
}

export function assistantMessage(
  content: string | ReadonlyArray<ContentPart>,
): Message {
  return {
    role: 'assistant',
    content,
  };
}

/**
 * The assistant's record of the calls it made in a round, optionally with
 * whatever text it produced alongside them.
 */
export function assistantToolCallMessage(
  toolCalls: ReadonlyArray<ToolCall>,
  text: string = '',
): Message {
  const parts: Array<ContentPart> = [];
  if (text) {
    parts.push({ kind: 'TEXT', text });
  }
  for (const call of toolCalls) {
    parts.push({
      kind: 'TOOL_CALL',
      toolCallId: call.toolCallId,
      toolName: call.toolName,
      args: call.args,
    });
  }
  return { role: 'assistant', content: parts };
}

export function toolMessage(
  toolCallId: string,
  content: string,
  isError?: boolean,
): Message {
  return {
    role: 'tool',
    content: [
      {
        kind: 'TOOL_RESULT',
        toolCallId,
        content,
        isError: isError ?? false,
      },
    ],
  };
}

export function messageText(message: Readonly<Message>): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .filter((part): part is TextData => part.kind === 'TEXT')
    .map((part) => part.text)
    .join('');
}

export function messageToolCalls(message: Readonly<Message>): ReadonlyArray<ToolCall> {
  if (typeof message.content === 'string') {
    return [];
  }
  return message.content
    .filter((part): part is ToolCallData => part.kind === 'TOOL_CALL')
    .map((part) => ({
      toolCallId: part.toolCallId,
      toolName: part.toolName,
      args: part.args,
    }));
}
