import { describe, it, expect } from 'vitest';
import { estimateTokens, TokenCounter } from './tokens.js';
import { assistantToolCallMessage } from '../types/index.js';
import type { Usage } from '../types/index.js';

describe('estimateTokens', () => {
  it('returns 0 for empty or whitespace-only text', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('   \n\t')).toBe(0);
  });

  it('counts one token per word', () => {
    expect(estimateTokens('hello big world')).toBe(3);
  });

  it('adds one token per contiguous punctuation run', () => {
    expect(estimateTokens('Hello, world!')).toBe(4);
    expect(estimateTokens('a.b.c')).toBe(3);
    expect(estimateTokens('wait...')).toBe(2);
    expect(estimateTokens('...')).toBe(2);
  });
});

describe('TokenCounter', () => {
  it('adds template and per-message overhead to prompt estimates', () => {
    const counter = new TokenCounter();
    counter.addPromptMessages([{ role: 'user', content: 'hi there' }]);

    expect(counter.usage()).toEqual({
      inputTokens: 10,
      outputTokens: 0,
      totalTokens: 10,
      reasoningTokens: 0,
      cacheReadTokens: 0,
    });
  });

  it('charges a fixed cost for image parts', () => {
    const counter = new TokenCounter();
    counter.addPromptMessages([
      {
        role: 'user',
        content: [
          { kind: 'TEXT', text: 'look' },
          { kind: 'IMAGE', data: null, url: 'https://example.com/a.png', mediaType: 'image/png' },
        ],
      },
    ]);

    expect(counter.usage().inputTokens).toBe(94);
  });

  it('counts tool call names and JSON arguments', () => {
    const counter = new TokenCounter();
    counter.addPromptMessages([
      assistantToolCallMessage([{ toolCallId: 'c1', toolName: 'get_weather', args: { city: 'Paris' } }]),
    ]);

    expect(counter.usage().inputTokens).toBe(14);
  });

  it('estimates completion tokens from streamed deltas', () => {
    const counter = new TokenCounter();
    counter.addCompletionDelta({ content: 'two words' });
    counter.addCompletionDelta({ reasoning: 'hmm' });
    counter.addCompletionDelta({ toolCalls: [{ index: 0, name: 'f', arguments: '{}' }] });

    expect(counter.usage().outputTokens).toBe(6);
  });

  it('injects the estimate only when usage is missing or all zero', () => {
    const counter = new TokenCounter();
    counter.addPromptText('one two');
    counter.addCompletionText('three');
    const reported: Usage = { inputTokens: 100, outputTokens: 50, totalTokens: 150, reasoningTokens: 0, cacheReadTokens: 0 };
    const zero: Usage = { inputTokens: 0, outputTokens: 0, totalTokens: 0, reasoningTokens: 0, cacheReadTokens: 0 };

    expect(counter.injectUsageIfMissing(reported)).toBe(reported);
    expect(counter.injectUsageIfMissing(null)).toEqual({ ...zero, inputTokens: 2, outputTokens: 1, totalTokens: 3 });
    expect(counter.injectUsageIfMissing(zero)).toEqual({ ...zero, inputTokens: 2, outputTokens: 1, totalTokens: 3 });
  });

  it('reset zeroes both counts', () => {
    const counter = new TokenCounter();
    counter.addPromptText('a b c');
    counter.reset();

    expect(counter.usage().totalTokens).toBe(0);
  });
});
