import { describe, it, expect } from 'vitest';
import { generateItemId, generateResponseId, generateToolCallId } from './id.js';

describe('ids', () => {
  it('generates tool call ids with the call_ prefix and 24 hex chars', () => {
    expect(generateToolCallId()).toMatch(/^call_[0-9a-f]{24}$/);
  });

  it('generates distinct tool call ids', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateToolCallId()));
    expect(ids.size).toBe(100);
  });

  it('orders response ids by creation time', () => {
    const earlier = generateResponseId(1_700_000_000_000);
    const later = generateResponseId(1_700_000_000_001);

    expect(earlier).toMatch(/^resp_[0-9a-f]{12}[0-9a-z]{16}$/);
    expect(earlier < later).toBe(true);
  });

  it('prefixes item ids', () => {
    expect(generateItemId('msg')).toMatch(/^msg_[0-9a-f]{24}$/);
  });
});
