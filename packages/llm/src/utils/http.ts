import { AbortError, NetworkError, RequestTimeoutError, SDKError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { linkSignals } from '../context/execution-context.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
  /** Provider name recorded on mapped HTTP errors. */
  readonly provider?: string;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Issues the request and maps transport failures and non-2xx statuses onto
 * the SDK error hierarchy. `consume` runs while the timeout is still armed
 * and owns the signal link once it is called: it must call `release` when the
 * response is no longer read.
 */
async function performFetch<T>(
  options: FetchOptions,
  consume: (response: globalThis.Response, release: () => void) => Promise<T>,
): Promise<T> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    signal: externalSignal,
    provider = 'unknown',
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  const link = linkSignals(externalSignal, timeoutController.signal);

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    const requestMs = timeout.requestMs;
    timeoutId = setTimeout(() => {
      timeoutController.abort(new RequestTimeoutError(`request timed out after ${requestMs}ms`));
    }, requestMs);
  }

  let response: globalThis.Response;
  try {
    response = await fetch(url, {
      method,
      headers: { 'Content-Type': 'application/json', ...customHeaders },
      body: bodyData !== undefined ? JSON.stringify(bodyData) : undefined,
      signal: link.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        provider,
        headers: response.headers,
        raw: text,
      });
    }
  } catch (err) {
    link.release();
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
    throw toTransportError(err, url, timeoutController.signal);
  }

  try {
    return await consume(response, link.release);
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
  }
}

function toTransportError(err: unknown, url: string, timeoutSignal: AbortSignal): Error {
  if (err instanceof SDKError) {
    return err;
  }
  if (timeoutSignal.aborted) {
    return new RequestTimeoutError(`request to ${url} timed out`, err instanceof Error ? err : undefined);
  }
  if (err instanceof globalThis.Error && err.name === 'AbortError') {
    return new AbortError('Fetch was aborted', err);
  }
  return new NetworkError(
    `request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err : undefined,
  );
}

/**
 * Passes `body` through unchanged and calls `release` once it has been read
 * to the end, has failed, or has been cancelled.
 */
function releasingBody(body: ReadableStream<Uint8Array>, release: () => void): ReadableStream<Uint8Array> {
  const reader = body.getReader();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { done, value } = await reader.read();
        if (done) {
          release();
          controller.close();
          return;
        }
        controller.enqueue(value);
      } catch (err) {
        release();
        controller.error(err);
      }
    },
    async cancel(reason: unknown) {
      release();
      await reader.cancel(reason);
    },
  });
}

/**
 * Fetches with timeout support, header merging, and JSON body serialization.
 * Returns both the raw response and parsed JSON body.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  return performFetch(options, async (response, release) => {
    try {
      const body: unknown = await response.json();
      return { response, body };
    } finally {
      release();
    }
  });
}

/**
 * Fetches for streaming. The timeout covers only the time until headers
 * arrive; the caller's signal stays linked until the body is read to the end
 * or cancelled.
 */
export async function fetchStream(options: FetchOptions): Promise<globalThis.Response> {
  return performFetch(options, async (response, release) => {
    if (!response.body) {
      release();
      return response;
    }
    return new Response(releasingBody(response.body, release), {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  });
}
