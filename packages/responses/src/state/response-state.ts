import type { ResponseObject, ResponseStatus } from '../types/response.js';

export type CancelHandle = () => void;

/**
 * Lifecycle of one response. Status starts at `in_progress` and moves to
 * exactly one terminal status; the first terminal transition wins and every
 * later `setResult`, `setError` or `cancel` leaves the status alone.
 */
export class ResponseState {
  readonly id: string;
  readonly model: string;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  private currentStatus: ResponseStatus = 'in_progress';
  private storedResult: ResponseObject | null = null;
  private storedError: Error | null = null;
  private readonly cancelHandle: CancelHandle;
  private readonly done: Promise<void>;
  private markDone: () => void = () => {};

  constructor(id: string, model: string, cancel: CancelHandle, createdAt: number = Date.now()) {
    this.id = id;
    this.model = model;
    this.createdAt = createdAt;
    this.cancelHandle = cancel;
    this.done = new Promise<void>((resolve) => {
      this.markDone = resolve;
    });
  }

  status(): ResponseStatus {
    return this.currentStatus;
  }

  result(): ResponseObject | null {
    return this.storedResult;
  }

  error(): Error | null {
    return this.storedError;
  }

  isTerminal(): boolean {
    return this.currentStatus !== 'in_progress';
  }

  /** Resolves once the state has reached a terminal status. Never rejects. */
  settled(): Promise<void> {
    return this.done;
  }

  /** Returns `false` when the state had already settled. */
  setResult(result: ResponseObject): boolean {
    if (this.isTerminal()) {
      return false;
    }
    this.storedResult = result;
    this.finish('completed');
    return true;
  }

  setError(error: Error): boolean {
    if (this.isTerminal()) {
      return false;
    }
    this.storedError = error;
    this.finish('failed');
    return true;
  }

  /**
   * Invokes the cancel handle, then marks the state cancelled if it has not
   * settled yet. Running work may still finish; its result is dropped.
   */
  cancel(): boolean {
    this.cancelHandle();
    if (this.isTerminal()) {
      return false;
    }
    this.finish('cancelled');
    return true;
  }

  private finish(status: Exclude<ResponseStatus, 'in_progress'>): void {
    this.currentStatus = status;
    this.markDone();
  }
}
