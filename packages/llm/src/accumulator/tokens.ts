import type { ChunkDelta, ContentPart, Message, ToolCall, Usage } from '../types/index.js';

const CHAT_TEMPLATE_OVERHEAD = 4;
const PER_MESSAGE_OVERHEAD = 3;
const IMAGE_TOKENS = 85;

const PUNCTUATION_RUN = /\p{P}+/gu;

/**
 * Rough token count: each whitespace-delimited word costs one token plus one
 * for every contiguous run of punctuation inside it.
 */
export function estimateTokens(text: string): number {
  let tokens = 0;
  for (const word of text.split(/\s+/)) {
    if (word === '') {
      continue;
    }
    tokens += 1 + (word.match(PUNCTUATION_RUN)?.length ?? 0);
  }
  return tokens;
}

function estimateContentTokens(content: Message['content']): number {
  if (typeof content === 'string') {
    return estimateTokens(content);
  }
  return content.reduce((sum, part) => sum + estimatePartTokens(part), 0);
}

function estimatePartTokens(part: ContentPart): number {
  switch (part.kind) {
    case 'TEXT':
    case 'THINKING':
      return estimateTokens(part.text);
    case 'IMAGE':
      return IMAGE_TOKENS;
    case 'TOOL_CALL':
      return estimateToolCallTokens(part);
    case 'TOOL_RESULT':
      return estimateTokens(part.content);
  }
}

function estimateToolCallTokens(call: Pick<ToolCall, 'toolName' | 'args'>): number {
  return estimateTokens(call.toolName) + estimateTokens(JSON.stringify(call.args));
}

/**
 * Estimates usage for responses whose backend reported none.
 */
export class TokenCounter {
  private promptTokens = 0;
  private completionTokens = 0;

  addPromptMessages(messages: ReadonlyArray<Message>): void {
    this.promptTokens += CHAT_TEMPLATE_OVERHEAD;
    for (const message of messages) {
      this.promptTokens +=
        estimateTokens(message.role) + estimateContentTokens(message.content) + PER_MESSAGE_OVERHEAD;
    }
  }

  addPromptText(text: string): void {
    this.promptTokens += estimateTokens(text);
  }

  addCompletionText(text: string): void {
    this.completionTokens += estimateTokens(text);
  }

  addCompletionMessage(message: Message): void {
    this.completionTokens += estimateContentTokens(message.content);
  }

  addCompletionDelta(delta: ChunkDelta): void {
    this.completionTokens += estimateTokens(delta.content ?? '') + estimateTokens(delta.reasoning ?? '');
    for (const toolCall of delta.toolCalls ?? []) {
      this.completionTokens += estimateTokens(toolCall.name ?? '') + estimateTokens(toolCall.arguments ?? '');
    }
  }

  usage(): Usage {
    return {
      inputTokens: this.promptTokens,
      outputTokens: this.completionTokens,
      totalTokens: this.promptTokens + this.completionTokens,
      reasoningTokens: 0,
      cacheReadTokens: 0,
    };
  }

  /**
   * Returns `reported` unless it is missing or all zero, in which case the
   * estimate stands in for it.
   */
  injectUsageIfMissing(reported: Usage | null): Usage {
    if (reported === null) {
      return this.usage();
    }
    if (reported.inputTokens === 0 && reported.outputTokens === 0 && reported.totalTokens === 0) {
      return this.usage();
    }
    return reported;
  }

  reset(): void {
    this.promptTokens = 0;
    this.completionTokens = 0;
  }
}
