/**
 * Cancellation Token System
 *
 * Provides a way to signal cancellation to every region job of a run.
 *
 * Two levels:
 * - cancel(): soft. Region jobs stop at their next checkpoint (stage boundary),
 *   queued regions are never launched.
 * - expire(): hard. Raised when the run deadline passes. Also aborts `signal`,
 *   so in-flight AI calls and listing extraction stop early.
 */

import { RunCancelledError, RunTimedOutError } from '../errors';

export type CancellationReason = 'cancelled' | 'timed-out';

export class CancellationToken {
  private _reason: CancellationReason | null = null;
  private readonly runId: string;
  private readonly timeoutMs: number;
  private abortController: AbortController;

  constructor(runId: string, timeoutMs: number = 0) {
    this.runId = runId;
    this.timeoutMs = timeoutMs;
    this.abortController = new AbortController();
  }

  get id(): string {
    return this.runId;
  }

  /**
   * True once either cancellation or the deadline has been signalled
   */
  get isCancelled(): boolean {
    return this._reason !== null;
  }

  get reason(): CancellationReason | null {
    return this._reason;
  }

  /**
   * Only true for the hard stop (deadline)
   */
  get isExpired(): boolean {
    return this._reason === 'timed-out';
  }

  /**
   * Aborted on the hard stop only. Pass to fetches and AI calls.
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  cancel(): void {
    if (!this._reason) {
      this._reason = 'cancelled';
      console.log(`🛑 [CancellationToken] Run ${this.runId} cancellation requested`);
    }
  }

  expire(): void {
    if (this._reason === 'timed-out') return;
    this._reason = 'timed-out';
    this.abortController.abort();
    console.log(`⏱️ [CancellationToken] Run ${this.runId} deadline reached`);
  }

  /**
   * The error describing why the run stopped, if it did
   */
  toError(): RunCancelledError | RunTimedOutError | null {
    if (this._reason === 'timed-out') return new RunTimedOutError(this.runId, this.timeoutMs);
    if (this._reason === 'cancelled') return new RunCancelledError(this.runId);
    return null;
  }

  /**
   * Throw if cancelled - use this at checkpoint locations
   */
  throwIfCancelled(): void {
    const error = this.toError();
    if (error) throw error;
  }

  /**
   * Throw only on the hard stop - use inside a stage
   */
  throwIfExpired(): void {
    if (this.isExpired) throw new RunTimedOutError(this.runId, this.timeoutMs);
  }
}

/**
 * Sleep that ends early (rejecting) when the token's hard stop fires
 */
export function sleepWithCancellation(ms: number, token?: CancellationToken): Promise<void> {
  if (token?.isExpired) {
    return Promise.reject(token.toError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timeout);
      reject(token?.toError() ?? new Error('Sleep aborted'));
    };
    const timeout = setTimeout(() => {
      token?.signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    token?.signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Combine the run's hard-stop signal with a per-call timeout.
 * `timedOut()` tells a per-call timeout apart from the run deadline.
 */
export function createCallSignal(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let didTimeOut = false;

  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with `work`, or reject with the run's stop error once the hard stop fires.
 * For calls that cannot be interrupted through a signal.
 */
export function withDeadline<T>(work: Promise<T>, token?: CancellationToken): Promise<T> {
  if (!token) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(token.toError());
    if (token.isExpired) {
      onAbort();
    } else {
      token.signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        token.signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        token.signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
