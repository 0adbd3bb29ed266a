import type { Message } from './message.js';
import type { ToolDescriptor, ToolChoice } from './tool.js';
import type { TimeoutConfig } from './config.js';

export type LLMRequest = {
  readonly model: string;
  readonly provider?: string;
  readonly messages: ReadonlyArray<Message>;
  /**
   * Tools the caller executes itself. When present the tool loop performs a
   * single round and hands any tool calls back untouched.
   */
  readonly tools?: ReadonlyArray<ToolDescriptor>;
  readonly toolChoice?: ToolChoice;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly topP?: number;
  readonly stopSequences?: ReadonlyArray<string>;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
  readonly providerOptions?: Record<string, Record<string, unknown>>;
};
