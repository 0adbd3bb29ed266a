export type ResponseStatus = 'in_progress' | 'completed' | 'failed' | 'cancelled';

export type OutputText = {
  readonly type: 'output_text';
  readonly text: string;
  readonly annotations: ReadonlyArray<unknown>;
};

export type MessageOutputItem = {
  readonly type: 'message';
  readonly id: string;
  readonly role: 'assistant';
  readonly status: 'in_progress' | 'completed';
  readonly content: ReadonlyArray<OutputText>;
};

export type ReasoningOutputItem = {
  readonly type: 'reasoning';
  readonly id: string;
  readonly summary: ReadonlyArray<{ readonly type: 'summary_text'; readonly text: string }>;
};

export type FunctionCallOutputItem = {
  readonly type: 'function_call';
  readonly id: string;
  readonly call_id: string;
  readonly name: string;
  /** JSON-encoded arguments. */
  readonly arguments: string;
  readonly status: 'in_progress' | 'completed';
};

export type OutputItem = MessageOutputItem | ReasoningOutputItem | FunctionCallOutputItem;

export type ResponseUsage = {
  readonly input_tokens: number;
  readonly output_tokens: number;
  readonly total_tokens: number;
  readonly input_tokens_details: { readonly cached_tokens: number };
  readonly output_tokens_details: { readonly reasoning_tokens: number };
};

export type ResponseErrorBody = {
  readonly code: string;
  readonly message: string;
};

export type ResponseObject = {
  readonly id: string;
  readonly object: 'response';
  /** Unix seconds. */
  readonly created_at: number;
  readonly status: ResponseStatus;
  readonly model: string;
  readonly output: ReadonlyArray<OutputItem>;
  readonly usage: ResponseUsage | null;
  readonly error: ResponseErrorBody | null;
  readonly metadata: Readonly<Record<string, string>>;
};
