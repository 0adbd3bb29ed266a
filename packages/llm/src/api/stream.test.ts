import { describe, it, expect } from 'vitest';
import { Client } from '../client/index.js';
import { LocalToolProvider } from '../tools/local.js';
import { ToolRouter } from '../tools/router.js';
import {
  AbortError,
  StreamError,
  ToolLoopExhaustedError,
  userMessage,
  type ChatChunk,
  type ProviderAdapter,
  type ToolCall,
} from '../types/index.js';
import { silentLogger } from '../utils/logger.js';
import {
  ScriptedAdapter,
  chunk,
  textChunks,
  toolCallChunks,
  usageOf,
  type ScriptedTurn,
} from '../testing/scripted-adapter.js';
import { stream } from './stream.js';

const addCall: ToolCall = { toolCallId: 'call_1', toolName: 'add', args: { a: 2, b: 3 } };

const addProvider = () =>
  new LocalToolProvider([
    {
      name: 'add',
      description: 'Adds two numbers',
      parameters: { type: 'object' },
      execute: (args) => String(Number(args['a']) + Number(args['b'])),
    },
  ]);

function clientFor(adapter: ProviderAdapter, options: { tools?: boolean; maxToolRounds?: number } = {}): Client {
  return new Client({
    providers: { [adapter.name]: adapter },
    tools: options.tools ? new ToolRouter({ local: addProvider() }) : undefined,
    maxToolRounds: options.maxToolRounds,
    logger: silentLogger,
  });
}

function scripted(turns: ReadonlyArray<ScriptedTurn>, options: { tools?: boolean; maxToolRounds?: number } = {}) {
  const adapter = new ScriptedAdapter(turns);
  return { adapter, client: clientFor(adapter, options) };
}

async function collect(source: AsyncIterable<ChatChunk>): Promise<{ chunks: Array<ChatChunk>; error: unknown }> {
  const chunks: Array<ChatChunk> = [];
  try {
    for await (const item of source) {
      chunks.push(item);
    }
  } catch (error) {
    return { chunks, error };
  }
  return { chunks, error: null };
}

describe('stream()', () => {
  it('forwards text chunks and ends with a usage-only chunk', async () => {
    const { client } = scripted([{ chunks: textChunks(['Hel', 'lo']) }]);

    const result = stream({ client, model: 'test-model', messages: [userMessage('hi')] });
    const { chunks, error } = await collect(result.stream);

    expect(error).toBeNull();
    expect(chunks).toHaveLength(4);
    expect(chunks[0]?.choices[0]?.delta).toEqual({ role: 'assistant', content: 'Hel' });
    expect(chunks[2]).toEqual({
      id: 'chatcmpl-test',
      model: 'test-model',
      choices: [{ index: 0, delta: {}, finishReason: 'stop' }],
      usage: null,
    });
    expect(chunks[3]).toEqual({ id: 'chatcmpl-test', model: 'test-model', choices: [], usage: usageOf(10, 5) });

    const response = await result.response();
    expect(response.text).toBe('Hello');
  });

  it('yields only text through textStream', async () => {
    const { client } = scripted([{ chunks: textChunks(['a', 'b', 'c']) }]);

    const texts: Array<string> = [];
    for await (const text of stream({ client, model: 'test-model', messages: [userMessage('hi')] }).textStream) {
      texts.push(text);
    }

    expect(texts).toEqual(['a', 'b', 'c']);
  });

  it('suppresses tool chunks when it executes the tools itself', async () => {
    const { adapter, client } = scripted(
      [{ chunks: toolCallChunks(addCall) }, { chunks: textChunks(['5']) }],
      { tools: true },
    );

    const result = stream({ client, model: 'test-model', messages: [userMessage('2+3?')] });
    const { chunks } = await collect(result.stream);

    expect(chunks.map((item) => item.choices[0]?.delta.content ?? null)).toEqual(['5', null, null]);
    expect(chunks[2]?.usage).toEqual(usageOf(20, 10));
    expect(adapter.calls).toBe(2);

    const response = await result.response();
    expect(response.text).toBe('5');
    expect(response.totalUsage).toEqual(usageOf(20, 10));
    expect(response.steps[0]?.toolResults[0]?.content).toBe('5');
  });

  it('keeps the text of a chunk that also carries a managed tool call', async () => {
    const { client } = scripted(
      [
        {
          chunks: [
            chunk({
              role: 'assistant',
              content: 'Let me check',
              toolCalls: [{ index: 0, id: 'call_1', type: 'function', name: 'add' }],
            }),
            chunk({ toolCalls: [{ index: 0, arguments: '{"a":2,"b":3}' }] }),
            chunk({}, 'tool_calls', usageOf(10, 5)),
          ],
        },
        { chunks: textChunks(['5']) },
      ],
      { tools: true },
    );

    const result = stream({ client, model: 'test-model', messages: [userMessage('2+3?')] });
    const { chunks, error } = await collect(result.stream);

    expect(error).toBeNull();
    expect(chunks[0]?.choices).toEqual([
      { index: 0, delta: { role: 'assistant', content: 'Let me check' }, finishReason: null },
    ]);
    expect(chunks.map((item) => item.choices[0]?.delta.content ?? null)).toEqual(['Let me check', '5', null, null]);
    expect(chunks.some((item) => item.choices.some((choice) => choice.delta.toolCalls !== undefined))).toBe(false);
    expect((await result.response()).steps[0]?.toolResults[0]?.content).toBe('5');
  });

  it('forwards tool chunks for caller-supplied tools', async () => {
    const { adapter, client } = scripted([{ chunks: toolCallChunks(addCall) }], { tools: true });

    const result = stream({
      client,
      model: 'test-model',
      messages: [userMessage('2+3?')],
      tools: [{ name: 'add', description: 'Adds two numbers', parameters: {} }],
    });
    const { chunks } = await collect(result.stream);

    expect(chunks).toHaveLength(4);
    expect(chunks[2]?.choices[0]?.finishReason).toBe('tool_calls');
    expect((await result.response()).toolCalls).toEqual([addCall]);
    expect(adapter.calls).toBe(1);
  });

  it('patches synthesized tool-call ids into forwarded chunks', async () => {
    const { client } = scripted([
      {
        chunks: [
          chunk({ toolCalls: [{ index: 0, name: 'add' }] }),
          chunk({ toolCalls: [{ index: 0, arguments: '{}' }] }),
          chunk({}, 'tool_calls'),
        ],
      },
    ]);

    const result = stream({
      client,
      model: 'test-model',
      messages: [userMessage('x')],
      tools: [{ name: 'add', description: '', parameters: {} }],
    });
    const { chunks } = await collect(result.stream);
    const response = await result.response();

    const forwardedId = chunks[0]?.choices[0]?.delta.toolCalls?.[0]?.id;
    expect(forwardedId).toMatch(/^call_[0-9a-f]{24}$/);
    expect(response.toolCalls[0]?.toolCallId).toBe(forwardedId);
  });

  it('fails a round that ends without a finish reason', async () => {
    const { client } = scripted([{ chunks: [chunk({ content: 'partial' })] }]);

    const result = stream({ client, model: 'test-model', messages: [userMessage('hi')] });
    const { chunks, error } = await collect(result.stream);

    expect(chunks).toHaveLength(1);
    expect(error).toBeInstanceOf(StreamError);
    expect(error).toMatchObject({ message: 'stream ended without a finish reason' });
    await expect(result.response()).rejects.toBeInstanceOf(StreamError);
  });

  it('delivers buffered chunks before a backend error', async () => {
    const { client } = scripted([{ chunks: [chunk({ content: 'a' })], error: new StreamError('connection reset') }]);

    const result = stream({ client, model: 'test-model', messages: [userMessage('hi')] });
    const { chunks, error } = await collect(result.stream);

    expect(chunks.map((item) => item.choices[0]?.delta.content)).toEqual(['a']);
    expect(error).toMatchObject({ message: 'connection reset' });
  });

  it('runs the loop for response() when nobody reads the stream', async () => {
    const { client } = scripted([{ chunks: textChunks(['Hello']) }]);

    const response = await stream({ client, model: 'test-model', messages: [userMessage('hi')] }).response();

    expect(response.text).toBe('Hello');
    expect(response.totalUsage).toEqual(usageOf(10, 5));
  });

  it('raises the round limit from the iterator', async () => {
    const { adapter, client } = scripted([{ chunks: toolCallChunks(addCall) }], { tools: true, maxToolRounds: 2 });

    const { chunks, error } = await collect(
      stream({ client, model: 'test-model', messages: [userMessage('loop')] }).stream,
    );

    expect(chunks).toEqual([]);
    expect(error).toBeInstanceOf(ToolLoopExhaustedError);
    expect(adapter.calls).toBe(2);
  });

  it('allows only one consumer', () => {
    const { client } = scripted([{ chunks: textChunks(['x']) }]);
    const result = stream({ client, model: 'test-model', messages: [userMessage('hi')] });

    result.stream[Symbol.asyncIterator]();

    expect(() => result.stream[Symbol.asyncIterator]()).toThrow(StreamError);
  });

  it('cancels the turn when the consumer stops reading', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const adapter: ProviderAdapter = {
      name: 'gated',
      complete: () => Promise.reject(new Error('unused')),
      async *stream() {
        yield chunk({ content: 'first' });
        await gate;
        yield chunk({ content: 'second' });
        yield chunk({}, 'stop');
      },
    };

    const result = stream({ client: clientFor(adapter), model: 'test-model', messages: [userMessage('hi')] });
    for await (const item of result.stream) {
      expect(item.choices[0]?.delta.content).toBe('first');
      break;
    }
    release();

    await expect(result.response()).rejects.toBeInstanceOf(AbortError);
  });
});
