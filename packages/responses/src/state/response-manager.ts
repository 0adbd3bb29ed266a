import {
  AbortError,
  cancellationError,
  createLogger,
  detachContext,
  generateResponseId,
  toError,
} from '@switchboard/llm';
import type { ExecutionContext, Logger } from '@switchboard/llm';
import { DEFAULT_RETENTION_MS, DEFAULT_SWEEP_INTERVAL_MS, DEFAULT_WAIT_TIMEOUT_MS } from '../config.js';
import { ResponseNotFoundError, ResponseTimeoutError } from '../types/error.js';
import type { ResponseObject } from '../types/response.js';
import { ResponseState } from './response-state.js';
import type { CancelHandle } from './response-state.js';

export type ResponseManagerOptions = {
  readonly retentionMs?: number;
  readonly sweepIntervalMs?: number;
  readonly waitTimeoutMs?: number;
  readonly logger?: Logger;
  /** Clock used for ids, creation times and sweeping. */
  readonly now?: () => number;
};

export type SpawnOptions = {
  readonly model: string;
  /** Bound on the detached work; 0 leaves it unbounded. */
  readonly timeoutMs: number;
};

export type ResponseWork = (context: ExecutionContext, state: ResponseState) => Promise<ResponseObject>;

/**
 * Registry of background responses. Entries live until `delete` or until
 * the sweep reaps them once terminal and older than the retention window.
 */
export class ResponseManager {
  readonly retentionMs: number;
  readonly sweepIntervalMs: number;
  readonly waitTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly entries = new Map<string, ResponseState>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ResponseManagerOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('response-manager');
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  create(options: { readonly cancel: CancelHandle; readonly model: string }): ResponseState {
    const createdAt = this.now();
    const state = new ResponseState(generateResponseId(createdAt), options.model, options.cancel, createdAt);
    this.entries.set(state.id, state);
    this.logger.debug('response registered', { responseId: state.id, model: state.model });
    return state;
  }

  /**
   * Registers a response and runs `work` under a context detached from
   * `parent`, so the caller returning does not cancel it. The state always
   * ends terminal and the context is always released.
   */
  spawn(parent: ExecutionContext, options: SpawnOptions, work: ResponseWork): ResponseState {
    const handle = detachContext(parent, options.timeoutMs);
    const state = this.create({ cancel: () => handle.cancel(), model: options.model });

    const run = async (): Promise<ResponseObject> => work(handle.context, state);
    run()
      .then(
        (result) => {
          state.setResult(result);
        },
        (error: unknown) => {
          const failure = toError(error);
          if (state.setError(failure)) {
            this.logger.warn('background response failed', { responseId: state.id, error: failure });
          }
        },
      )
      .finally(() => {
        handle.cancel();
      })
      .catch((error: unknown) => {
        this.logger.error('background response bookkeeping failed', { responseId: state.id, error });
      });

    return state;
  }

  lookup(id: string): ResponseState | undefined {
    return this.entries.get(id);
  }

  /**
   * Returns the entry once it is terminal, waiting up to `waitTimeoutMs` for
   * an in-progress one. `signal` aborts the wait, not the response.
   */
  async get(id: string, signal?: AbortSignal): Promise<ResponseState> {
    const state = this.require(id);
    if (state.isTerminal()) {
      return state;
    }
    if (signal?.aborted) {
      throw cancellationError(signal);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;
    try {
      await new Promise<void>((resolve, reject) => {
        timer = setTimeout(() => {
          reject(new ResponseTimeoutError(id, this.waitTimeoutMs));
        }, this.waitTimeoutMs);
        if (signal) {
          onAbort = () => {
            reject(new AbortError(`wait for response ${id} was aborted`));
          };
          signal.addEventListener('abort', onAbort, { once: true });
        }
        void state.settled().then(resolve);
      });
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
    return state;
  }

  cancel(id: string): ResponseState {
    const state = this.require(id);
    if (state.cancel()) {
      this.logger.info('response cancelled', { responseId: id });
    }
    return state;
  }

  /** Cancels the entry when it is still running, then forgets it. */
  delete(id: string): void {
    const state = this.require(id);
    if (!state.isTerminal()) {
      state.cancel();
    }
    this.entries.delete(id);
    this.logger.debug('response deleted', { responseId: id });
  }

  /** Removes terminal entries created more than `retentionMs` before `now`. Returns how many went. */
  sweep(now: number = this.now()): number {
    let removed = 0;
    for (const [id, state] of this.entries) {
      if (state.isTerminal() && now - state.createdAt > this.retentionMs) {
        this.entries.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug('swept expired responses', { removed, remaining: this.entries.size });
    }
    return removed;
  }

  /** Starts the periodic sweep. Calling it again has no effect. */
  start(): void {
    if (this.sweepTimer !== null) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private require(id: string): ResponseState {
    const state = this.entries.get(id);
    if (!state) {
      throw new ResponseNotFoundError(id);
    }
    return state;
  }
}
