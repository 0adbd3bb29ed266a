export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type ContentKind = 'TEXT' | 'IMAGE' | 'TOOL_CALL' | 'TOOL_RESULT' | 'THINKING';

export type TextData = {
  readonly kind: 'TEXT';
  readonly text: string;
};

export type ImageData = {
  readonly kind: 'IMAGE';
  readonly data: string | null;
  readonly url: string | null;
  readonly mediaType: string;
};

export type ThinkingData = {
  readonly kind: 'THINKING';
  readonly text: string;
};

export type ToolCallData = {
  readonly kind: 'TOOL_CALL';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

export type ToolResultData = {
  readonly kind: 'TOOL_RESULT';
  readonly toolCallId: string;
  readonly content: string;
  readonly isError: boolean;
};

export type ContentPart =
  | TextData
  | ImageData
  | ThinkingData
  | ToolCallData
  | ToolResultData;
