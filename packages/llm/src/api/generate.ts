import type { LLMRequest, LLMResponse, Message, StepResult, ToolCall, ToolDescriptor, Usage } from '../types/index.js';
import {
  ToolLoopExhaustedError,
  assistantToolCallMessage,
  emptyUsage,
  responseText,
  responseToolCalls,
  toolMessage,
  usageAdd,
} from '../types/index.js';
import type { Client } from '../client/index.js';
import type { ContextHandle, ExecutionContext } from '../context/execution-context.js';
import {
  backgroundContext,
  cancellationError,
  raceSignal,
  withCancel,
  withTimeout,
} from '../context/execution-context.js';
import { TokenCounter } from '../accumulator/tokens.js';
import { applyToolFilter } from '../tools/filter.js';
import type { ToolRouter } from '../tools/router.js';
import type { ToolFilter } from '../tools/types.js';
import { executeToolCalls } from './tool-execution.js';

export type GenerateOptions = LLMRequest & {
  readonly client: Client;
  /** Parent context; its `env` supplies the observer and per-request tool providers. */
  readonly context?: ExecutionContext;
  readonly maxToolRounds?: number;
  readonly stopOnToolError?: boolean;
  readonly toolFilter?: ToolFilter;
};

export type GenerateResult = {
  /** The final round's response, with `usage` replaced by the cumulative total. */
  readonly response: LLMResponse;
  readonly steps: ReadonlyArray<StepResult>;
  readonly totalUsage: Usage;
  readonly text: string;
  readonly toolCalls: ReadonlyArray<ToolCall>;
};

/** What both loop variants settle before the first round. */
export type ToolLoopSetup = {
  readonly handle: ContextHandle;
  readonly router: ToolRouter;
  /** `true` when the loop executes tools itself. */
  readonly manageTools: boolean;
  readonly tools: ReadonlyArray<ToolDescriptor> | undefined;
  readonly maxRounds: number;
};

/**
 * The context one turn runs under. The caller's `signal` is linked in once
 * here and detached when the handle is cancelled.
 */
export function openLoopContext(
  client: Client,
  parent: ExecutionContext | undefined,
  signal?: AbortSignal,
): ContextHandle {
  const base = parent ?? backgroundContext();
  const handle = client.requestTimeoutMs > 0 ? withTimeout(base, client.requestTimeoutMs) : withCancel(base);
  if (!signal) {
    return handle;
  }

  const onAbort = () => handle.cancel(cancellationError(signal));
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }
  return {
    context: handle.context,
    cancel: (reason) => {
      signal.removeEventListener('abort', onAbort);
      handle.cancel(reason);
    },
  };
}

/**
 * Decides whether the loop manages tools for this request and which
 * descriptors it advertises. A non-empty caller tool list always wins and is
 * never executed here; an empty one counts as no tools.
 */
export async function prepareToolLoop(options: GenerateOptions, handle: ContextHandle): Promise<ToolLoopSetup> {
  const { client } = options;
  const { context } = handle;
  const router = client.tools.withProviders(context.env.toolProviders ?? []);
  const maxRounds = options.maxToolRounds ?? client.maxToolRounds;

  if ((options.tools !== undefined && options.tools.length > 0) || !router.hasProviders) {
    return { handle, router, manageTools: false, tools: options.tools, maxRounds };
  }

  const listed = await raceSignal(router.listTools(context), context.signal);
  const tools = applyToolFilter(listed, options.toolFilter ?? client.toolFilter);
  return { handle, router, manageTools: true, tools: tools.length > 0 ? tools : undefined, maxRounds };
}

/** The request for one round, minus the loop-only options. */
export function roundRequest(
  options: GenerateOptions,
  setup: ToolLoopSetup,
  messages: ReadonlyArray<Message>,
): LLMRequest {
  return {
    model: options.model,
    provider: options.provider,
    toolChoice: options.toolChoice,
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    topP: options.topP,
    stopSequences: options.stopSequences,
    timeout: options.timeout,
    providerOptions: options.providerOptions,
    messages,
    tools: setup.tools,
    signal: setup.handle.context.signal,
  };
}

/**
 * Runs one round's tool calls and returns the messages to append: the
 * assistant's call record followed by one tool message per result.
 */
export async function runToolRound(
  options: GenerateOptions,
  setup: ToolLoopSetup,
  response: LLMResponse,
  toolCalls: ReadonlyArray<ToolCall>,
): Promise<{ messages: Array<Message>; step: StepResult }> {
  const { context } = setup.handle;
  const results = await executeToolCalls(context, setup.router, toolCalls, {
    observer: context.env.observer,
    stopOnError: options.stopOnToolError ?? false,
    logger: options.client.logger,
  });

  const usage = response.usage ?? emptyUsage();
  return {
    messages: [
      assistantToolCallMessage(toolCalls, responseText(response)),
      ...results.map((result) => toolMessage(result.toolCallId, result.content, result.isError)),
    ],
    step: { response, toolCalls, toolResults: results, usage },
  };
}

export function finishLoop(
  response: LLMResponse,
  steps: Array<StepResult>,
  totalUsage: Usage,
): GenerateResult {
  const toolCalls = responseToolCalls(response);
  steps.push({ response, toolCalls, toolResults: [], usage: response.usage ?? emptyUsage() });
  return {
    response: { ...response, usage: totalUsage },
    steps,
    totalUsage,
    text: responseText(response),
    toolCalls,
  };
}

/**
 * Sends a request and, when the loop manages tools, keeps executing the
 * model's tool calls and feeding the results back until it answers without
 * calling any, or `maxToolRounds` rounds have run.
 *
 * The whole turn is bounded by the client's request timeout and by the
 * parent context and `signal`.
 */
export async function generate(options: GenerateOptions): Promise<GenerateResult> {
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
      const raw = await raceSignal(client.complete(request), context.signal);

      const counter = new TokenCounter();
      counter.addPromptMessages(messages);
      counter.addCompletionMessage({ role: 'assistant', content: raw.content });
      const response: LLMResponse = { ...raw, usage: counter.injectUsageIfMissing(raw.usage) };
      totalUsage = usageAdd(totalUsage, response.usage ?? emptyUsage());

      const toolCalls = responseToolCalls(response);
      if (!setup.manageTools || toolCalls.length === 0) {
        return finishLoop(response, steps, totalUsage);
      }

      client.logger.debug('executing tool calls', { round, count: toolCalls.length });
      const next = await runToolRound(options, setup, response, toolCalls);
      steps.push(next.step);
      messages = [...messages, ...next.messages];
    }

    throw new ToolLoopExhaustedError(setup.maxRounds);
  } finally {
    handle.cancel();
  }
}
