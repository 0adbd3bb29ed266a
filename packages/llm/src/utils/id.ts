import { customAlphabet } from 'nanoid';

const hex24 = customAlphabet('0123456789abcdef', 24);
const suffix16 = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 16);

export const TOOL_CALL_ID_PREFIX = 'call_';

export function generateToolCallId(): string {
  return `${TOOL_CALL_ID_PREFIX}${hex24()}`;
}

/**
 * Response ids lead with a fixed-width hex millisecond timestamp, so sorting
 * them lexically approximates creation order.
 */
export function generateResponseId(now: number = Date.now()): string {
  return `resp_${now.toString(16).padStart(12, '0')}${suffix16()}`;
}

export function generateItemId(prefix: string): string {
  return `${prefix}_${hex24()}`;
}
