export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class ValidationError extends SDKError {}

export class AbortError extends SDKError {}

export class RequestTimeoutError extends SDKError {}

export class NetworkError extends SDKError {}

export class StreamError extends SDKError {}

/**
 * The tool loop ran its full round budget without the model settling on an
 * answer. Never retried.
 */
export class ToolLoopExhaustedError extends SDKError {
  readonly maxRounds: number;

  constructor(maxRounds: number) {
    super(`maximum tool call iterations (${maxRounds}) reached`);
    this.maxRounds = maxRounds;
  }
}

export class ToolNotFoundError extends SDKError {
  readonly toolName: string;

  constructor(toolName: string, message?: string) {
    super(message ?? `tool '${toolName}' not found`);
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends SDKError {
  readonly toolName: string;
  readonly toolCallId: string;

  constructor(toolName: string, toolCallId: string, cause?: Error) {
    super(`tool '${toolName}' failed: ${cause?.message ?? 'unknown error'}`, cause);
    this.toolName = toolName;
    this.toolCallId = toolCallId;
  }
}

export class ToolObserverError extends SDKError {
  readonly toolName: string;

  constructor(toolName: string, cause?: Error) {
    super(`tool observer failed for '${toolName}': ${cause?.message ?? 'unknown error'}`, cause);
    this.toolName = toolName;
  }
}

export type ProviderErrorDetails = {
  readonly statusCode: number;
  readonly provider: string;
  readonly errorCode?: string | null;
  /** The decoded error body, or the raw text when it was not JSON. */
  readonly raw?: unknown;
  /** Milliseconds, from a `Retry-After` header. */
  readonly retryAfter?: number | null;
  readonly retryable?: boolean;
};

/**
 * A backend rejected a request or failed while serving it. Subclasses name
 * the category; `retryable` tells callers whether trying again may succeed.
 */
export class ProviderError extends SDKError {
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly retryAfter: number | null;
  readonly provider: string;
  readonly errorCode: string | null;
  readonly raw: unknown;

  constructor(message: string, details: ProviderErrorDetails) {
    super(message);
    this.statusCode = details.statusCode;
    this.provider = details.provider;
    this.errorCode = details.errorCode ?? null;
    this.raw = details.raw ?? null;
    this.retryAfter = details.retryAfter ?? null;
    this.retryable = details.retryable ?? false;
  }
}

export class AuthenticationError extends ProviderError {}

export class AccessDeniedError extends ProviderError {}

export class NotFoundError extends ProviderError {}

export class InvalidRequestError extends ProviderError {}

export class ContextLengthError extends ProviderError {}

export class QuotaExceededError extends ProviderError {}

export class ContentFilterError extends ProviderError {}

export class RateLimitError extends ProviderError {
  constructor(message: string, details: ProviderErrorDetails) {
    super(message, { ...details, retryable: true });
  }
}

export class ServerError extends ProviderError {
  constructor(message: string, details: ProviderErrorDetails) {
    super(message, { ...details, retryable: true });
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
