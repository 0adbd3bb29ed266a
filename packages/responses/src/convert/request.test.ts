import { describe, it, expect } from 'vitest';
import { ValidationError } from '@switchboard/llm';
import { convertInput, parseImageUrl, parseResponseRequest, toLLMRequest } from './request.js';

describe('parseImageUrl()', () => {
  it('splits a base64 data URL', () => {
    expect(parseImageUrl('data:image/png;base64,iVBORw0KGgo=')).toEqual({
      kind: 'IMAGE',
      data: 'iVBORw0KGgo=',
      url: null,
      mediaType: 'image/png',
    });
  });

  it('keeps a remote URL as is', () => {
    expect(parseImageUrl('https://example.com/cat.jpg')).toEqual({
      kind: 'IMAGE',
      data: null,
      url: 'https://example.com/cat.jpg',
      mediaType: 'image/*',
    });
  });
});

describe('convertInput()', () => {
  it('turns a string into one user message', () => {
    expect(convertInput('hello')).toEqual([{ role: 'user', content: 'hello' }]);
  });

  it('maps message item types to roles', () => {
    const messages = convertInput([
      { type: 'system_message', content: 'be brief' },
      { type: 'message', role: 'developer', content: 'no emoji' },
      { type: 'message', content: 'hi' },
      { type: 'assistant_message', content: [{ type: 'output_text', text: 'hello' }] },
      { type: 'user_message', content: [{ type: 'input_text', text: 'look' }, { type: 'input_image', image_url: 'https://example.com/a.png' }] },
    ]);

    expect(messages).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'system', content: 'no emoji' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: [{ kind: 'TEXT', text: 'hello' }] },
      {
        role: 'user',
        content: [
          { kind: 'TEXT', text: 'look' },
          { kind: 'IMAGE', data: null, url: 'https://example.com/a.png', mediaType: 'image/*' },
        ],
      },
    ]);
  });

  it('folds consecutive function calls into one assistant message', () => {
    const messages = convertInput([
      { type: 'function_call', call_id: 'call_a', name: 'add', arguments: '{"a":1}' },
      { type: 'function_call', call_id: 'call_b', name: 'now', arguments: '' },
      { type: 'function_call_output', call_id: 'call_a', output: '3' },
      { type: 'tool_call_result', tool_call_id: 'call_b', content: 'noon' },
    ]);

    expect(messages).toEqual([
      {
        role: 'assistant',
        content: [
          { kind: 'TOOL_CALL', toolCallId: 'call_a', toolName: 'add', args: { a: 1 } },
          { kind: 'TOOL_CALL', toolCallId: 'call_b', toolName: 'now', args: {} },
        ],
      },
      { role: 'tool', content: [{ kind: 'TOOL_RESULT', toolCallId: 'call_a', content: '3', isError: false }] },
      { role: 'tool', content: [{ kind: 'TOOL_RESULT', toolCallId: 'call_b', content: 'noon', isError: false }] },
    ]);
  });

  it('skips item types it does not know', () => {
    expect(convertInput([{ type: 'reasoning', summary: [] }, { type: 'message', content: 'hi' }])).toEqual([
      { role: 'user', content: 'hi' },
    ]);
  });

  it('rejects a malformed known item', () => {
    expect(() => convertInput([{ type: 'message', content: 42 }])).toThrow(ValidationError);
    expect(() => convertInput([{ type: 'message', content: 42 }])).toThrow(/^invalid input item 0: content: /);
  });

  it('rejects a tool output without a call id', () => {
    expect(() => convertInput([{ type: 'function_call_output', output: 'x' }])).toThrow(
      'invalid input item 0: call_id: call_id is required',
    );
  });
});

describe('toLLMRequest()', () => {
  it('prepends instructions and copies sampling options', () => {
    const request = toLLMRequest(
      parseResponseRequest({
        model: 'test-model',
        input: 'hi',
        instructions: 'be brief',
        max_output_tokens: 64,
        temperature: 0.2,
        top_p: 0.9,
      }),
    );

    expect(request).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hi' },
      ],
      maxTokens: 64,
      temperature: 0.2,
      topP: 0.9,
    });
  });

  it('converts function tools to descriptors', () => {
    const request = toLLMRequest(
      parseResponseRequest({
        model: 'test-model',
        input: 'hi',
        tools: [
          { type: 'function', name: 'lookup' },
          { type: 'function', name: 'add', description: 'Adds', parameters: { type: 'object' } },
        ],
      }),
    );

    expect(request.tools).toEqual([
      { name: 'lookup', description: '', parameters: { type: 'object', properties: {} } },
      { name: 'add', description: 'Adds', parameters: { type: 'object' } },
    ]);
  });

  it('leaves tools unset for an empty list', () => {
    expect(toLLMRequest(parseResponseRequest({ model: 'test-model', input: 'hi', tools: [] })).tools).toBeUndefined();
  });
});

describe('parseResponseRequest()', () => {
  it('raises ValidationError for a missing model', () => {
    expect(() => parseResponseRequest({ model: '', input: 'hi' })).toThrow(ValidationError);
  });

  it('raises ValidationError for an out-of-range temperature', () => {
    expect(() => parseResponseRequest({ model: 'test-model', input: 'hi', temperature: 3 })).toThrow(
      /^invalid response request: temperature: /,
    );
  });
});
