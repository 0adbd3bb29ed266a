import type { ChatChunk, ChunkChoice, LLMResponse, Message, StepResult } from '../types/index.js';
import {
  AbortError,
  StreamError,
  ToolLoopExhaustedError,
  chunkHasToolCalls,
  chunkText,
  emptyUsage,
  responseToolCalls,
  toError,
  usageAdd,
} from '../types/index.js';
import { CompletionAccumulator } from '../accumulator/completion-accumulator.js';
import { TokenCounter } from '../accumulator/tokens.js';
import { raceIterable } from '../context/execution-context.js';
import { Channel, DEFAULT_CHANNEL_CAPACITY } from '../utils/channel.js';
import {
  finishLoop,
  openLoopContext,
  prepareToolLoop,
  roundRequest,
  runToolRound,
  type GenerateOptions,
  type GenerateResult,
} from './generate.js';

export type StreamOptions = GenerateOptions;

export type StreamResult = {
  /** Canonical chunks, ending with a usage-only chunk when any usage was counted. */
  readonly stream: AsyncIterable<ChatChunk>;
  /** The text deltas of `stream`. Consume one or the other, not both. */
  readonly textStream: AsyncIterable<string>;
  /** Resolves once the turn has finished; consumes the stream if nobody else does. */
  response(): Promise<GenerateResult>;
};

type Emit = (chunk: ChatChunk) => Promise<void>;

type Outcome =
  | { readonly ok: true; readonly result: GenerateResult }
  | { readonly ok: false; readonly error: Error };

/**
 * Strips tool-call deltas and the `tool_calls` finish from a chunk. Returns
 * `null` when nothing the consumer would see is left.
 */
function withoutToolCalls(chunk: ChatChunk): ChatChunk | null {
  const choices = chunk.choices.map((choice): ChunkChoice => {
    const { toolCalls: _toolCalls, ...delta } = choice.delta;
    return { ...choice, delta, finishReason: choice.finishReason === 'tool_calls' ? null : choice.finishReason };
  });
  const visible = choices.some(
    ({ delta }) => Boolean(delta.content) || Boolean(delta.reasoning) || Boolean(delta.refusal),
  );
  return visible ? { ...chunk, choices } : null;
}

async function runStreamLoop(options: StreamOptions, emit: Emit): Promise<GenerateResult> {
  const { client } = options;
  const handle = openLoopContext(client, options.context, options.signal);
  const { context } = handle;

  try {
    const setup = await prepareToolLoop(options, handle);
    const steps: Array<StepResult> = [];
    let messages: Array<Message> = Array.from(options.messages);
    let totalUsage = emptyUsage();

    for (let round = 0; round < setup.maxRounds; round++) {
      const request = roundRequest(options, setup, messages);
      const accumulator = new CompletionAccumulator();
      const counter = new TokenCounter();
      counter.addPromptMessages(messages);

      for await (const raw of raceIterable(client.stream(request), context.signal)) {
        const chunk = accumulator.addChunk(raw);
        for (const choice of chunk.choices) {
          counter.addCompletionDelta(choice.delta);
        }
        if (chunk.choices.length === 0) {
          continue;
        }
        const forwarded = setup.manageTools && chunkHasToolCalls(chunk) ? withoutToolCalls(chunk) : chunk;
        if (forwarded) {
          await emit({ ...forwarded, usage: null });
        }
      }

      const streamed = accumulator.toResponse();
      const response: LLMResponse = { ...streamed, usage: counter.injectUsageIfMissing(streamed.usage) };
      totalUsage = usageAdd(totalUsage, response.usage ?? emptyUsage());

      const toolCalls = responseToolCalls(response);
      if (!setup.manageTools || toolCalls.length === 0) {
        if (totalUsage.totalTokens > 0) {
          await emit({ id: response.id, model: response.model, choices: [], usage: totalUsage });
        }
        return finishLoop(response, steps, totalUsage);
      }

      client.logger.debug('executing streamed tool calls', { round, count: toolCalls.length });
      const next = await runToolRound(options, setup, response, toolCalls);
      steps.push(next.step);
      messages = [...messages, ...next.messages];
    }

    throw new ToolLoopExhaustedError(setup.maxRounds);
  } finally {
    handle.cancel();
  }
}

/**
 * Streaming form of `generate()`. A single producer runs the tool loop in the
 * background and writes chunks into a bounded channel; it starts when the
 * stream is first iterated or `response()` is called.
 *
 * When the loop manages tools, tool-call deltas and `tool_calls` finish
 * chunks are not forwarded. A consumer that stops iterating early cancels the
 * turn.
 */
export function stream(options: StreamOptions): StreamResult {
  const channel = new Channel<ChatChunk>(DEFAULT_CHANNEL_CAPACITY);
  let run: Promise<Outcome> | null = null;
  let claimed = false;
  let discard = false;

  const emit: Emit = async (chunk) => {
    if (discard) {
      return;
    }
    if (!(await channel.send(chunk))) {
      throw new AbortError('stream consumer stopped reading');
    }
  };

  const start = (): Promise<Outcome> => {
    run ??= runStreamLoop(options, emit).then(
      (result): Outcome => {
        channel.close();
        return { ok: true, result };
      },
      (error: unknown): Outcome => {
        const failure = toError(error);
        channel.close(failure);
        return { ok: false, error: failure };
      },
    );
    return run;
  };

  const claim = (): AsyncIterator<ChatChunk> => {
    if (claimed) {
      throw new StreamError('stream has already been consumed');
    }
    claimed = true;
    const iterator = channel[Symbol.asyncIterator]();
    void start();
    return iterator;
  };

  const chunks: AsyncIterable<ChatChunk> = {
    [Symbol.asyncIterator]: claim,
  };

  async function* texts(): AsyncGenerator<string> {
    for await (const chunk of chunks) {
      const text = chunkText(chunk);
      if (text) {
        yield text;
      }
    }
  }

  return {
    stream: chunks,
    textStream: { [Symbol.asyncIterator]: () => texts() },
    async response() {
      if (!claimed) {
        claimed = true;
        discard = true;
      }
      const outcome = await start();
      if (!outcome.ok) {
        throw outcome.error;
      }
      return outcome.result;
    },
  };
}
