import {
  AccessDeniedError,
  AuthenticationError,
  ContentFilterError,
  ContextLengthError,
  InvalidRequestError,
  NotFoundError,
  ProviderError,
  RateLimitError,
  ServerError,
} from '../types/error.js';
import type { ProviderErrorDetails } from '../types/error.js';
import { isRecord } from './json.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
  readonly raw?: unknown;
};

export type ErrorDetails = {
  readonly message: string;
  readonly code: string | null;
};

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (isNaN(retryDate.getTime())) {
    return null;
  }
  return Math.max(0, retryDate.getTime() - Date.now());
}

function stringOrNull(value: unknown): string | null {
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

/**
 * Pulls a message and machine-readable code out of an error body. Understands
 * `{"error": {"message", "code" | "type"}}` and `{"message"}`; anything else
 * is returned verbatim as the message.
 */
export function extractErrorDetails(body: string): ErrorDetails {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { message: body, code: null };
  }

  if (!isRecord(parsed)) {
    return { message: body, code: null };
  }

  const source = isRecord(parsed['error']) ? parsed['error'] : parsed;
  const message = stringOrNull(source['message']);
  if (message === null) {
    return { message: body, code: null };
  }
  return { message, code: stringOrNull(source['code']) ?? stringOrNull(source['type']) };
}

/**
 * Maps an HTTP failure to the matching `ProviderError` subclass. Status
 * decides first; a 400 is narrowed further by what its body says.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers, raw = body } = options;
  const { message, code } = extractErrorDetails(body);
  const details: ProviderErrorDetails = {
    statusCode,
    provider,
    errorCode: code,
    raw,
    retryAfter: parseRetryAfter(headers),
  };

  switch (statusCode) {
    case 400:
      return classifyBadRequest(message, details);
    case 401:
      return new AuthenticationError(`Authentication failed: ${message}`, details);
    case 403:
      return new AccessDeniedError(`Access denied: ${message}`, details);
    case 404:
      return new NotFoundError(`Resource not found: ${message}`, details);
    case 413:
      return new ContextLengthError(`Context length exceeded: ${message}`, details);
    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${message}`, details);
    case 429:
      return new RateLimitError(`Rate limit exceeded: ${message}`, details);
    default:
      if (statusCode >= 500) {
        return new ServerError(`Server error: ${message}`, details);
      }
      return new ProviderError(`HTTP ${statusCode}: ${message}`, details);
  }
}

const CONTENT_FILTER_MARKERS = ['content_filter', 'content_policy', 'safety'];
const CONTEXT_LENGTH_MARKERS = ['context_length', 'too many tokens', 'maximum context'];

function classifyBadRequest(message: string, details: ProviderErrorDetails): ProviderError {
  const haystack = `${message} ${details.errorCode ?? ''}`.toLowerCase();
  if (CONTENT_FILTER_MARKERS.some((marker) => haystack.includes(marker))) {
    return new ContentFilterError(`Content filtered: ${message}`, details);
  }
  if (CONTEXT_LENGTH_MARKERS.some((marker) => haystack.includes(marker))) {
    return new ContextLengthError(`Context length exceeded: ${message}`, details);
  }
  return new InvalidRequestError(`Invalid request: ${message}`, details);
}
