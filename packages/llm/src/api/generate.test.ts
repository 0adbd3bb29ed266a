import { getEventListeners } from 'node:events';
import { describe, it, expect, vi } from 'vitest';
import { Client } from '../client/index.js';
import { backgroundContext, withCancel } from '../context/execution-context.js';
import { LocalToolProvider, type LocalTool } from '../tools/local.js';
import { ToolRouter } from '../tools/router.js';
import type { ToolObserver } from '../tools/types.js';
import {
  AbortError,
  type LLMResponse,
  type ProviderAdapter,
  ToolExecutionError,
  ToolLoopExhaustedError,
  ToolObserverError,
  userMessage,
  type ToolCall,
} from '../types/index.js';
import { silentLogger } from '../utils/logger.js';
import {
  ScriptedAdapter,
  textResponse,
  toolCallResponse,
  usageOf,
  type ScriptedTurn,
} from '../testing/scripted-adapter.js';
import { generate } from './generate.js';

const addCall: ToolCall = { toolCallId: 'call_1', toolName: 'add', args: { a: 2, b: 3 } };

function addTool(execute: LocalTool['execute'] = (args) => String(Number(args['a']) + Number(args['b']))): LocalTool {
  return {
    name: 'add',
    description: 'Adds two numbers',
    parameters: { type: 'object', properties: { a: { type: 'number' }, b: { type: 'number' } } },
    execute,
  };
}

function setup(turns: ReadonlyArray<ScriptedTurn>, tools: ReadonlyArray<LocalTool> = [], maxToolRounds?: number) {
  const adapter = new ScriptedAdapter(turns);
  const client = new Client({
    providers: { scripted: adapter },
    tools: tools.length > 0 ? new ToolRouter({ local: new LocalToolProvider(tools) }) : undefined,
    maxToolRounds,
    logger: silentLogger,
  });
  return { adapter, client };
}

describe('generate()', () => {
  it('returns a plain answer in one round', async () => {
    const { adapter, client } = setup([{ response: textResponse('Hello') }]);

    const result = await generate({ client, model: 'test-model', messages: [userMessage('hi')] });

    expect(result.text).toBe('Hello');
    expect(result.totalUsage).toEqual(usageOf(10, 5));
    expect(result.steps).toHaveLength(1);
    expect(adapter.calls).toBe(1);
    expect(adapter.requests[0]?.tools).toBeUndefined();
  });

  it('executes tool calls and sums usage across rounds', async () => {
    const { adapter, client } = setup(
      [{ response: toolCallResponse([addCall]) }, { response: textResponse('5') }],
      [addTool()],
    );

    const result = await generate({ client, model: 'test-model', messages: [userMessage('2+3?')] });

    expect(result.text).toBe('5');
    expect(result.totalUsage).toEqual(usageOf(20, 10));
    expect(result.response.usage).toEqual(usageOf(20, 10));
    expect(adapter.calls).toBe(2);
    expect(result.steps[0]?.toolResults).toEqual([
      { toolCallId: 'call_1', toolName: 'add', content: '5', isError: false },
    ]);
    expect(adapter.requests[0]?.tools?.map((tool) => tool.name)).toEqual(['add']);
    expect(adapter.requests[1]?.messages).toEqual([
      userMessage('2+3?'),
      { role: 'assistant', content: [{ kind: 'TOOL_CALL', ...addCall }] },
      { role: 'tool', content: [{ kind: 'TOOL_RESULT', toolCallId: 'call_1', content: '5', isError: false }] },
    ]);
  });

  it('gives up after the round limit', async () => {
    const execute = vi.fn(() => '5');
    const { adapter, client } = setup([{ response: toolCallResponse([addCall]) }], [addTool(execute)]);

    const error = await generate({ client, model: 'test-model', messages: [userMessage('loop')] }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ToolLoopExhaustedError);
    expect(error).toMatchObject({ maxRounds: 20, message: 'maximum tool call iterations (20) reached' });
    expect(adapter.calls).toBe(20);
    expect(execute).toHaveBeenCalledTimes(20);
  });

  it('takes the round limit from the client', async () => {
    const { adapter, client } = setup([{ response: toolCallResponse([addCall]) }], [addTool()], 3);

    await expect(generate({ client, model: 'test-model', messages: [userMessage('loop')] })).rejects.toThrow(
      'maximum tool call iterations (3) reached',
    );
    expect(adapter.calls).toBe(3);
  });

  it('hands caller-supplied tool calls back without executing them', async () => {
    const execute = vi.fn(() => '5');
    const { adapter, client } = setup([{ response: toolCallResponse([addCall]) }], [addTool(execute)]);
    const descriptor = { name: 'add', description: 'Adds two numbers', parameters: {} };

    const result = await generate({
      client,
      model: 'test-model',
      messages: [userMessage('2+3?')],
      tools: [descriptor],
    });

    expect(result.toolCalls).toEqual([addCall]);
    expect(adapter.calls).toBe(1);
    expect(adapter.requests[0]?.tools).toEqual([descriptor]);
    expect(execute).not.toHaveBeenCalled();
  });

  it('treats an empty caller tool list as no tools', async () => {
    const execute = vi.fn(() => '5');
    const { adapter, client } = setup(
      [{ response: toolCallResponse([addCall]) }, { response: textResponse('5') }],
      [addTool(execute)],
    );

    const result = await generate({ client, model: 'test-model', messages: [userMessage('2+3?')], tools: [] });

    expect(execute).toHaveBeenCalledTimes(1);
    expect(adapter.calls).toBe(2);
    expect(adapter.requests[0]?.tools?.map((tool) => tool.name)).toEqual(['add']);
    expect(result.text).toBe('5');
  });

  it('folds a failing tool into an error result', async () => {
    const { adapter, client } = setup(
      [{ response: toolCallResponse([addCall]) }, { response: textResponse('sorry') }],
      [
        addTool(() => {
          throw new Error('boom');
        }),
      ],
    );

    const result = await generate({ client, model: 'test-model', messages: [userMessage('2+3?')] });

    expect(result.steps[0]?.toolResults[0]).toEqual({
      toolCallId: 'call_1',
      toolName: 'add',
      content: 'Error: boom',
      isError: true,
    });
    expect(adapter.requests[1]?.messages[2]).toEqual({
      role: 'tool',
      content: [{ kind: 'TOOL_RESULT', toolCallId: 'call_1', content: 'Error: boom', isError: true }],
    });
  });

  it('reports unknown tools back to the model', async () => {
    const { client } = setup(
      [
        { response: toolCallResponse([{ toolCallId: 'call_9', toolName: 'nope', args: {} }]) },
        { response: textResponse('ok') },
      ],
      [addTool()],
    );

    const result = await generate({ client, model: 'test-model', messages: [userMessage('x')] });

    expect(result.steps[0]?.toolResults[0]?.content).toBe("Error: tool 'nope' not found");
  });

  it('aborts on the first failing tool with stopOnToolError', async () => {
    const { adapter, client } = setup(
      [{ response: toolCallResponse([addCall]) }, { response: textResponse('unused') }],
      [
        addTool(() => {
          throw new Error('boom');
        }),
      ],
    );

    const error = await generate({
      client,
      model: 'test-model',
      messages: [userMessage('2+3?')],
      stopOnToolError: true,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ toolName: 'add', toolCallId: 'call_1', message: "tool 'add' failed: boom" });
    expect(adapter.calls).toBe(1);
  });

  it('notifies the observer around each call', async () => {
    const events: Array<string> = [];
    const observer: ToolObserver = {
      onCall: (call) => {
        events.push(`call:${call.toolName}`);
      },
      onResult: (id, name, result) => {
        events.push(`result:${id}:${name}:${result}`);
      },
    };
    const { client } = setup(
      [{ response: toolCallResponse([addCall]) }, { response: textResponse('5') }],
      [addTool()],
    );

    await generate({
      client,
      model: 'test-model',
      messages: [userMessage('2+3?')],
      context: backgroundContext({ observer }),
    });

    expect(events).toEqual(['call:add', 'result:call_1:add:5']);
  });

  it('aborts when the observer throws', async () => {
    const execute = vi.fn(() => '5');
    const observer: ToolObserver = {
      onCall: () => {
        throw new Error('client disconnected');
      },
      onResult: () => undefined,
    };
    const { client } = setup(
      [{ response: toolCallResponse([addCall]) }, { response: textResponse('5') }],
      [addTool(execute)],
    );

    await expect(
      generate({
        client,
        model: 'test-model',
        messages: [userMessage('2+3?')],
        context: backgroundContext({ observer }),
      }),
    ).rejects.toBeInstanceOf(ToolObserverError);
    expect(execute).not.toHaveBeenCalled();
  });

  it('uses tool providers attached to the request context', async () => {
    const { adapter, client } = setup([{ response: toolCallResponse([addCall]) }, { response: textResponse('5') }]);

    const result = await generate({
      client,
      model: 'test-model',
      messages: [userMessage('2+3?')],
      context: backgroundContext({ toolProviders: [new LocalToolProvider([addTool()])] }),
    });

    expect(result.text).toBe('5');
    expect(adapter.calls).toBe(2);
  });

  it('applies the tool filter to advertised tools', async () => {
    const subtract: LocalTool = { ...addTool(), name: 'subtract' };
    const { adapter, client } = setup([{ response: textResponse('ok') }], [addTool(), subtract]);

    await generate({
      client,
      model: 'test-model',
      messages: [userMessage('x')],
      toolFilter: { exclude: ['add'] },
    });

    expect(adapter.requests[0]?.tools?.map((tool) => tool.name)).toEqual(['subtract']);
  });

  it('estimates usage the backend did not report', async () => {
    const { client } = setup([{ response: textResponse('Hello world', null) }]);

    const result = await generate({ client, model: 'test-model', messages: [userMessage('hi')] });

    // prompt: 4 template + (1 role + 1 text + 3 per message); completion: 2 words
    expect(result.totalUsage).toEqual(usageOf(9, 2));
  });

  it('rejects with the cancellation error of a cancelled parent context', async () => {
    const { client } = setup([{ response: textResponse('late') }]);
    const parent = withCancel(backgroundContext());
    parent.cancel();

    await expect(
      generate({ client, model: 'test-model', messages: [userMessage('hi')], context: parent.context }),
    ).rejects.toBeInstanceOf(AbortError);
  });

  it('holds one listener on the caller signal across rounds and none afterwards', async () => {
    const controller = new AbortController();
    const listenerCounts: Array<number> = [];
    const { adapter, client } = setup(
      [
        { response: toolCallResponse([addCall]) },
        { response: toolCallResponse([addCall]) },
        { response: toolCallResponse([addCall]) },
        { response: textResponse('done') },
      ],
      [
        addTool(() => {
          listenerCounts.push(getEventListeners(controller.signal, 'abort').length);
          return '5';
        }),
      ],
    );

    const result = await generate({
      client,
      model: 'test-model',
      messages: [userMessage('hi')],
      signal: controller.signal,
    });

    expect(result.text).toBe('done');
    expect(adapter.calls).toBe(4);
    expect(listenerCounts).toEqual([1, 1, 1]);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('rejects with AbortError when the caller signal aborts mid-round', async () => {
    const controller = new AbortController();
    const adapter: ProviderAdapter = {
      name: 'stalled',
      complete: () => new Promise<LLMResponse>(() => undefined),
      stream: () => {
        throw new Error('unused');
      },
    };
    const client = new Client({ providers: { stalled: adapter }, logger: silentLogger });

    const pending = generate({ client, model: 'test-model', messages: [userMessage('hi')], signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });
});
