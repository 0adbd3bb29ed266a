import { SDKError } from '@switchboard/llm';

export class ResponseNotFoundError extends SDKError {
  readonly responseId: string;

  constructor(responseId: string) {
    super(`response not found: ${responseId}`);
    this.responseId = responseId;
  }
}

/**
 * A blocking retrieval gave up waiting. Says nothing about how the response
 * itself will end.
 */
export class ResponseTimeoutError extends SDKError {
  readonly responseId: string;
  readonly waitedMs: number;

  constructor(responseId: string, waitedMs: number) {
    super(`timed out after ${waitedMs}ms waiting for response ${responseId}`);
    this.responseId = responseId;
    this.waitedMs = waitedMs;
  }
}
