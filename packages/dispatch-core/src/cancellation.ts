/**
 * Dispatch cancellation: caller abort signals combined with the configured timeout.
 */
import { DispatchErrors } from "./errors/DispatchError.js";

export interface Cancellation {
  /** Aborts when the caller's signal aborts or the timeout elapses */
  readonly signal: AbortSignal;
  /** Detach from the caller's signal and clear the timer */
  dispose(): void;
}

/**
 * Combine an optional caller signal with an optional timeout.
 */
export function createCancellation(parent?: AbortSignal, timeoutMs?: number): Cancellation {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      const onAbort = (): void => controller.abort(parent.reason);
      parent.addEventListener("abort", onAbort, { once: true });
      cleanups.push(() => parent.removeEventListener("abort", onAbort));
    }
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      const reason = new Error(`Dispatch timed out after ${timeoutMs}ms`);
      reason.name = "TimeoutError";
      controller.abort(reason);
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose(): void {
      for (const cleanup of cleanups.splice(0)) {
        cleanup();
      }
    },
  };
}

/**
 * @throws DispatchError (DISPATCH_ABORTED) if the signal has aborted
 */
export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw DispatchErrors.aborted(signal.reason);
  }
}

/**
 * Settle with `work`, or reject with DISPATCH_ABORTED as soon as the signal aborts.
 *
 * The abandoned work keeps running; its late result or rejection is observed
 * and discarded.
 */
export function raceAbort<T>(work: T | PromiseLike<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(DispatchErrors.aborted(signal.reason));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    void Promise.resolve(work).then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
