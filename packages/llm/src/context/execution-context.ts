import type { ToolObserver, ToolProvider } from '../tools/types.js';
import { AbortError, RequestTimeoutError, SDKError } from '../types/index.js';

/**
 * Request-scoped values carried alongside cancellation. Detached contexts
 * keep reading these from their parent.
 */
export type RequestEnvironment = {
  readonly observer?: ToolObserver;
  readonly toolProviders?: ReadonlyArray<ToolProvider>;
  readonly requestId?: string;
};

export type ExecutionContext = {
  readonly env: RequestEnvironment;
  readonly signal: AbortSignal;
  /** Epoch milliseconds, or `null` when the context has no deadline. */
  readonly deadline: number | null;
};

export type ContextHandle = {
  readonly context: ExecutionContext;
  /** Releases the context's timer and listeners, aborting it if still live. */
  readonly cancel: (reason?: Error) => void;
};

export function backgroundContext(env: RequestEnvironment = {}): ExecutionContext {
  return { env, signal: new AbortController().signal, deadline: null };
}

export function withEnvironment(parent: ExecutionContext, env: RequestEnvironment): ExecutionContext {
  return { ...parent, env: { ...parent.env, ...env } };
}

function createHandle(
  env: RequestEnvironment,
  deadline: number | null,
  parentSignal: AbortSignal | null,
  timeoutMs: number | null,
): ContextHandle {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;

  const onParentAbort = () => {
    controller.abort(parentSignal?.reason);
  };

  const release = () => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
    parentSignal?.removeEventListener('abort', onParentAbort);
  };

  if (parentSignal) {
    if (parentSignal.aborted) {
      controller.abort(parentSignal.reason);
    } else {
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  if (timeoutMs !== null && timeoutMs > 0 && !controller.signal.aborted) {
    timer = setTimeout(() => {
      timer = null;
      controller.abort(new RequestTimeoutError(`operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  controller.signal.addEventListener('abort', release, { once: true });

  return {
    context: { env, signal: controller.signal, deadline },
    cancel: (reason?: Error) => {
      release();
      if (!controller.signal.aborted) {
        controller.abort(reason ?? new AbortError('operation was cancelled'));
      }
    },
  };
}

export function withCancel(parent: ExecutionContext): ContextHandle {
  return createHandle(parent.env, parent.deadline, parent.signal, null);
}

export function withTimeout(parent: ExecutionContext, timeoutMs: number): ContextHandle {
  const ownDeadline = Date.now() + timeoutMs;
  const deadline = parent.deadline === null ? ownDeadline : Math.min(parent.deadline, ownDeadline);
  return createHandle(parent.env, deadline, parent.signal, timeoutMs);
}

/**
 * A context that shares its parent's environment but not its lifetime: the
 * parent being cancelled or timing out has no effect on it. It is bounded by
 * its own `timeoutMs` instead (no deadline when `timeoutMs` is 0).
 */
export function detachContext(parent: ExecutionContext, timeoutMs: number): ContextHandle {
  const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : null;
  return createHandle(parent.env, deadline, null, timeoutMs);
}

/**
 * The error a cancelled signal stands for: its reason when that is already
 * one of ours, otherwise a generic `AbortError`.
 */
export function cancellationError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof SDKError) {
    return reason;
  }
  return new AbortError('operation was cancelled', reason instanceof Error ? reason : undefined);
}

export function throwIfCancelled(context: ExecutionContext): void {
  if (context.signal.aborted) {
    throw cancellationError(context.signal);
  }
}

/**
 * Settles with `promise` unless `signal` aborts first, in which case it
 * rejects with the cancellation error. The losing promise keeps running.
 */
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(cancellationError(signal));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export type LinkedSignal = {
  readonly signal: AbortSignal;
  /** Detaches from both inputs. Safe to call more than once. */
  readonly release: () => void;
};

const noRelease = () => {};

/**
 * Links an optional caller signal with a context signal into one that aborts
 * with whichever aborts first. Callers release the link when they are done
 * with it, so a long-lived input does not collect listeners.
 */
export function linkSignals(first: AbortSignal | undefined, second: AbortSignal): LinkedSignal {
  if (!first) {
    return { signal: second, release: noRelease };
  }
  if (first.aborted) {
    return { signal: first, release: noRelease };
  }
  if (second.aborted) {
    return { signal: second, release: noRelease };
  }

  const controller = new AbortController();
  const release = () => {
    first.removeEventListener('abort', onFirst);
    second.removeEventListener('abort', onSecond);
  };
  const onFirst = () => {
    release();
    controller.abort(first.reason);
  };
  const onSecond = () => {
    release();
    controller.abort(second.reason);
  };
  first.addEventListener('abort', onFirst, { once: true });
  second.addEventListener('abort', onSecond, { once: true });

  return { signal: controller.signal, release };
}

/**
 * Iterates `iterable` until it ends or `signal` aborts. Leaving early closes
 * the source, except after an abort, where the source is expected to observe
 * the same signal itself.
 */
export async function* raceIterable<T>(iterable: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T> {
  const iterator = iterable[Symbol.asyncIterator]();
  let exhausted = false;
  try {
    while (true) {
      const next = await raceSignal(iterator.next(), signal);
      if (next.done) {
        exhausted = true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!exhausted && !signal.aborted) {
      await iterator.return?.();
    }
  }
}
