import type { z } from 'zod';
import {
  ValidationError,
  assistantToolCallMessage,
  formatIssues,
  parseArguments,
  systemMessage,
  toolMessage,
  userMessage,
} from '@switchboard/llm';
import type { ContentPart, ImageData, LLMRequest, Message, ToolCall, ToolDescriptor } from '@switchboard/llm';
import {
  CreateResponseRequestSchema,
  FunctionCallItemSchema,
  FunctionCallOutputItemSchema,
  MessageItemSchema,
} from '../types/request.js';
import type { CreateResponseRequest, FunctionTool, MessageItem, ParsedResponseRequest } from '../types/request.js';

const DATA_URL = /^data:([^;,]+);base64,(.*)$/s;

export function parseImageUrl(url: string): ImageData {
  const match = DATA_URL.exec(url);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return { kind: 'IMAGE', data: match[2], url: null, mediaType: match[1] };
  }
  return { kind: 'IMAGE', data: null, url, mediaType: 'image/*' };
}

function convertContent(content: MessageItem['content']): string | Array<ContentPart> {
  if (typeof content === 'string') {
    return content;
  }
  return content.map((part): ContentPart =>
    part.type === 'input_image' ? parseImageUrl(part.image_url) : { kind: 'TEXT', text: part.text },
  );
}

function messageRole(item: MessageItem): Message['role'] {
  switch (item.type) {
    case 'user_message':
      return 'user';
    case 'system_message':
      return 'system';
    case 'assistant_message':
      return 'assistant';
    case 'message':
      if (item.role === 'developer') {
        return 'system';
      }
      return item.role ?? 'user';
  }
}

function validateItem<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, item: unknown, index: number): T {
  const parsed = schema.safeParse(item);
  if (!parsed.success) {
    throw new ValidationError(`invalid input item ${index}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Converts input items to canonical messages. Consecutive `function_call`
 * items fold into one assistant message; unknown item types are skipped.
 */
export function convertInput(input: ParsedResponseRequest['input']): Array<Message> {
  if (typeof input === 'string') {
    return [userMessage(input)];
  }

  const messages: Array<Message> = [];
  let pendingCalls: Array<ToolCall> = [];

  const flushCalls = () => {
    if (pendingCalls.length > 0) {
      messages.push(assistantToolCallMessage(pendingCalls));
      pendingCalls = [];
    }
  };

  input.forEach((item, index) => {
    switch (item['type']) {
      case 'message':
      case 'user_message':
      case 'system_message':
      case 'assistant_message': {
        flushCalls();
        const message = validateItem(MessageItemSchema, item, index);
        messages.push({ role: messageRole(message), content: convertContent(message.content) });
        break;
      }
      case 'function_call': {
        const call = validateItem(FunctionCallItemSchema, item, index);
        pendingCalls.push({ toolCallId: call.call_id, toolName: call.name, args: parseArguments(call.arguments) });
        break;
      }
      case 'function_call_output':
      case 'tool_call_result': {
        flushCalls();
        const output = validateItem(FunctionCallOutputItemSchema, item, index);
        messages.push(toolMessage(output.call_id ?? output.tool_call_id ?? '', output.output ?? output.content ?? ''));
        break;
      }
      default:
        break;
    }
  });
  flushCalls();

  return messages;
}

export function convertTools(tools: ReadonlyArray<FunctionTool>): Array<ToolDescriptor> {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description ?? '',
    parameters: tool.parameters ?? { type: 'object', properties: {} },
  }));
}

export function parseResponseRequest(request: CreateResponseRequest): ParsedResponseRequest {
  const parsed = CreateResponseRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new ValidationError(`invalid response request: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Builds the canonical request. `instructions` becomes a leading system
 * message. Tools listed on the request are caller-executed, so the tool loop
 * hands their calls back rather than running them.
 */
export function toLLMRequest(request: ParsedResponseRequest): LLMRequest {
  const messages = convertInput(request.input);
  if (request.instructions) {
    messages.unshift(systemMessage(request.instructions));
  }
  return {
    model: request.model,
    messages,
    tools: request.tools && request.tools.length > 0 ? convertTools(request.tools) : undefined,
    maxTokens: request.max_output_tokens,
    temperature: request.temperature,
    topP: request.top_p,
  };
}
