import type { FinishReason, Usage } from './response.js';

/**
 * One fragment of a streamed tool call. `index` addresses the call within the
 * current stream only; it is not stable across requests.
 */
export type ToolCallDelta = {
  readonly index: number;
  readonly id?: string;
  readonly type?: string;
  readonly name?: string;
  readonly arguments?: string;
};

export type ChunkDelta = {
  readonly role?: 'assistant';
  readonly content?: string;
  readonly refusal?: string;
  readonly reasoning?: string;
  readonly toolCalls?: ReadonlyArray<ToolCallDelta>;
};

export type ChunkChoice = {
  readonly index: number;
  readonly delta: ChunkDelta;
  readonly finishReason: FinishReason | null;
};

export type ChatChunk = {
  readonly id: string;
  readonly model: string;
  readonly choices: ReadonlyArray<ChunkChoice>;
  readonly usage: Usage | null;
};

export function chunkText(chunk: Readonly<ChatChunk>): string {
  return chunk.choices.map((choice) => choice.delta.content ?? '').join('');
}

export function chunkHasToolCalls(chunk: Readonly<ChatChunk>): boolean {
  return chunk.choices.some(
    (choice) =>
      (choice.delta.toolCalls !== undefined && choice.delta.toolCalls.length > 0) ||
      choice.finishReason === 'tool_calls',
  );
}
