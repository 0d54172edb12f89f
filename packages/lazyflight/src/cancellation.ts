/**
 * Per-caller cancellation of a wait.
 *
 * Cancelling only detaches the caller from a promise: the underlying work
 * keeps running and other callers still receive its outcome.
 */

import { CancellationError } from "./errors";

/**
 * Wait for `promise`, giving up with a CancellationError when `signal` aborts.
 *
 * The abort listener is removed as soon as the promise settles, so a
 * long-lived signal does not accumulate listeners.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const pending = withCancellation(sharedWork, controller.signal);
 * controller.abort("user left");
 * await pending; // rejects with CancellationError { reason: "user left" }
 * ```
 */
export function withCancellation<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new CancellationError({ reason: signal.reason }));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new CancellationError({ reason: signal.reason }));
    };

    signal.addEventListener("abort", onAbort, { once: true });

    void promise.then(
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
