import type {
  ChatChunk,
  ChunkChoice,
  ContentPart,
  FinishReason,
  LLMResponse,
  ToolCall,
  Usage,
} from '../types/index.js';
import { StreamError } from '../types/index.js';
import { ToolCallAccumulator, type NewToolCallIdCallback } from './tool-call-accumulator.js';

type ChoiceState = {
  readonly contentParts: Array<string>;
  readonly refusalParts: Array<string>;
  readonly reasoningParts: Array<string>;
  readonly toolCalls: ToolCallAccumulator;
  finishReason: FinishReason | null;
};

function createChoiceState(): ChoiceState {
  return {
    contentParts: [],
    refusalParts: [],
    reasoningParts: [],
    toolCalls: new ToolCallAccumulator(),
    finishReason: null,
  };
}

/**
 * Reassembles the complete response a sequence of streamed chunks stands for.
 *
 * Finalized views (`finishedContent`, `finishedToolCalls`) only become
 * available once the matching choice has reported the matching finish reason;
 * until then they return `null`.
 */
export class CompletionAccumulator {
  private readonly choices = new Map<number, ChoiceState>();
  private id = '';
  private model = '';
  private reportedUsage: Usage | null = null;

  /**
   * Records one chunk and returns it with any synthesized tool-call ids
   * filled in, so a forwarded chunk and the finalized calls agree.
   */
  addChunk(chunk: ChatChunk, onNewToolCallId?: NewToolCallIdCallback): ChatChunk {
    if (chunk.id) {
      this.id = chunk.id;
    }
    if (chunk.model) {
      this.model = chunk.model;
    }
    if (chunk.usage) {
      this.reportedUsage = chunk.usage;
    }

    let patched = false;
    const choices = chunk.choices.map((choice): ChunkChoice => {
      const state = this.choiceState(choice.index);
      const { delta } = choice;

      if (delta.content) {
        state.contentParts.push(delta.content);
      }
      if (delta.refusal) {
        state.refusalParts.push(delta.refusal);
      }
      if (delta.reasoning) {
        state.reasoningParts.push(delta.reasoning);
      }
      if (choice.finishReason) {
        state.finishReason = choice.finishReason;
      }

      if (!delta.toolCalls || delta.toolCalls.length === 0) {
        return choice;
      }

      const toolCalls = state.toolCalls.processDelta(delta.toolCalls, onNewToolCallId);
      if (toolCalls.some((toolCall, i) => toolCall !== delta.toolCalls?.[i])) {
        patched = true;
        return { ...choice, delta: { ...delta, toolCalls } };
      }
      return choice;
    });

    return patched ? { ...chunk, choices } : chunk;
  }

  content(index: number = 0): string {
    return this.choices.get(index)?.contentParts.join('') ?? '';
  }

  refusal(index: number = 0): string {
    return this.choices.get(index)?.refusalParts.join('') ?? '';
  }

  reasoning(index: number = 0): string {
    return this.choices.get(index)?.reasoningParts.join('') ?? '';
  }

  finishReason(index: number = 0): FinishReason | null {
    return this.choices.get(index)?.finishReason ?? null;
  }

  /** Current tool calls for a choice, whether or not it has finished. */
  toolCalls(index: number = 0): Array<ToolCall> {
    return this.choices.get(index)?.toolCalls.finalize() ?? [];
  }

  finishedContent(index: number = 0): string | null {
    return this.finishReason(index) === 'stop' ? this.content(index) : null;
  }

  finishedToolCalls(index: number = 0): Array<ToolCall> | null {
    return this.finishReason(index) === 'tool_calls' ? this.toolCalls(index) : null;
  }

  finishedRefusal(index: number = 0): string | null {
    const refusal = this.refusal(index);
    return this.finishReason(index) !== null && refusal !== '' ? refusal : null;
  }

  /** True once at least one choice was seen and every choice has finished. */
  isComplete(): boolean {
    if (this.choices.size === 0) {
      return false;
    }
    for (const state of this.choices.values()) {
      if (state.finishReason === null) {
        return false;
      }
    }
    return true;
  }

  get usage(): Usage | null {
    return this.reportedUsage;
  }

  /**
   * Builds the response `complete()` would have returned for one choice.
   * Throws when that choice never reported a finish reason.
   */
  toResponse(index: number = 0): LLMResponse {
    const finishReason = this.finishReason(index);
    if (finishReason === null) {
      throw new StreamError('stream ended without a finish reason');
    }

    const content: Array<ContentPart> = [];
    const reasoning = this.reasoning(index);
    if (reasoning) {
      content.push({ kind: 'THINKING', text: reasoning });
    }
    const text = this.content(index);
    if (text) {
      content.push({ kind: 'TEXT', text });
    }
    for (const call of this.toolCalls(index)) {
      content.push({
        kind: 'TOOL_CALL',
        toolCallId: call.toolCallId,
        toolName: call.toolName,
        args: call.args,
      });
    }

    const refusal = this.refusal(index);

    return {
      id: this.id,
      model: this.model,
      content,
      refusal: refusal === '' ? null : refusal,
      finishReason,
      usage: this.reportedUsage,
      providerMetadata: {},
    };
  }

  reset(): void {
    this.choices.clear();
    this.id = '';
    this.model = '';
    this.reportedUsage = null;
  }

  private choiceState(index: number): ChoiceState {
    let state = this.choices.get(index);
    if (!state) {
      state = createChoiceState();
      this.choices.set(index, state);
    }
    return state;
  }
}
