import type { LLMRequest, ContentPart, Message } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

function translateContent(content: ContentPart): Record<string, unknown> | null {
  if (content.kind === 'TEXT') {
    return { type: 'text', text: content.text };
  }
  if (content.kind === 'IMAGE') {
    if (content.data) {
      return {
        type: 'image_url',
        image_url: {
          url: `data:${content.mediaType};base64,${content.data}`,
        },
      };
    }
    if (content.url) {
      return {
        type: 'image_url',
        image_url: { url: content.url },
      };
    }
  }
  return null;
}

function translateUserContent(content: Message['content']): unknown {
  if (typeof content === 'string') {
    return content;
  }

  const parts = content
    .map((part) => translateContent(part))
    .filter((part): part is Record<string, unknown> => part !== null);

  const firstPart = parts[0];
  if (parts.length === 1 && firstPart && typeof firstPart['text'] === 'string') {
    return firstPart['text'];
  }
  return parts;
}

function translateMessage(message: Message): Array<Record<string, unknown>> {
  switch (message.role) {
    case 'system':
      return [{ role: 'system', content: translateUserContent(message.content) }];

    case 'user':
      return [{ role: 'user', content: translateUserContent(message.content) }];

    case 'assistant': {
      if (typeof message.content === 'string') {
        return [{ role: 'assistant', content: message.content }];
      }

      const textParts: Array<string> = [];
      const toolCalls: Array<Record<string, unknown>> = [];
      for (const part of message.content) {
        if (part.kind === 'TEXT') {
          textParts.push(part.text);
        } else if (part.kind === 'TOOL_CALL') {
          toolCalls.push({
            id: part.toolCallId,
            type: 'function',
            function: {
              name: part.toolName,
              arguments: JSON.stringify(part.args),
            },
          });
        }
      }

      const assistantMessage: Record<string, unknown> = {
        role: 'assistant',
        content: textParts.length > 0 ? textParts.join('') : null,
      };
      if (toolCalls.length > 0) {
        assistantMessage['tool_calls'] = toolCalls;
      }
      return [assistantMessage];
    }

    case 'tool': {
      if (typeof message.content === 'string') {
        return [];
      }
      const results: Array<Record<string, unknown>> = [];
      for (const part of message.content) {
        if (part.kind === 'TOOL_RESULT') {
          results.push({
            role: 'tool',
            tool_call_id: part.toolCallId,
            content: part.content,
          });
        }
      }
      return results;
    }
  }
}

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string,
  baseUrl: string,
  streaming: boolean = false,
): RequestOutput {
  const url = `${baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: request.model,
    messages: request.messages.flatMap((message) => translateMessage(message)),
  };

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  if (request.toolChoice) {
    if (request.toolChoice.mode === 'named') {
      body['tool_choice'] = {
        type: 'function',
        function: { name: request.toolChoice.toolName },
      };
    } else {
      body['tool_choice'] = request.toolChoice.mode;
    }
  }

  if (request.maxTokens !== undefined) {
    body['max_tokens'] = request.maxTokens;
  }
  if (request.temperature !== undefined) {
    body['temperature'] = request.temperature;
  }
  if (request.topP !== undefined) {
    body['top_p'] = request.topP;
  }
  if (request.stopSequences && request.stopSequences.length > 0) {
    body['stop'] = request.stopSequences;
  }

  if (streaming) {
    body['stream'] = true;
    body['stream_options'] = { include_usage: true };
  }

  // Provider options escape hatch
  const compatOptions = request.providerOptions?.['openaiCompatible'];
  if (compatOptions) {
    Object.assign(body, compatOptions);
  }

  return { url, headers, body };
}
