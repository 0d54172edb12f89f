/**
 * lazyflight/errors
 *
 * Error types raised by AsyncLazy.
 * Uses TaggedError for type-safe exhaustive matching.
 *
 * @example
 * ```typescript
 * import { isReentrancyError, type AsyncLazyError } from 'lazyflight/errors';
 *
 * function describe(error: AsyncLazyError): string {
 *   switch (error._tag) {
 *     case "ReentrancyError":
 *       return "factory called back into its own lazy value";
 *     case "CancellationError":
 *       return "caller stopped waiting";
 *     case "FactoryError":
 *       return `factory failed: ${String(error.cause)}`;
 *   }
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

const label = (lazyName: string | undefined): string =>
  lazyName ? ` "${lazyName}"` : "";

// =============================================================================
// Error Types
// =============================================================================

/**
 * Raised when a value factory calls back into the lazy value it is producing,
 * on the same logical call chain, before that value has settled.
 *
 * Always a programming error; never retried.
 *
 * @example
 * ```typescript
 * const error = new ReentrancyError({ lazyName: "config" });
 * console.log(error.message);
 * // 'ReentrancyError: Value factory "config" attempted to access its own value'
 * ```
 */
export class ReentrancyError extends TaggedError("ReentrancyError", {
  message: (p: {
    /** Name given to the lazy value, if any */
    lazyName?: string;
  }) =>
    `ReentrancyError: Value factory${label(p.lazyName)} attempted to access its own value`,
}) {
  declare readonly lazyName?: string;
}

/**
 * Raised to one caller whose signal aborted while waiting, or before the
 * factory was started on its behalf. The shared computation is unaffected.
 *
 * @example
 * ```typescript
 * const error = new CancellationError({ reason: "navigated away" });
 * console.log(error.message); // "CancellationError: Wait for lazy value was cancelled"
 * ```
 */
export class CancellationError extends TaggedError("CancellationError", {
  message: (_p: {
    /** The `reason` of the aborted signal */
    reason?: unknown;
  }) => "CancellationError: Wait for lazy value was cancelled",
}) {
  declare readonly reason?: unknown;
}

/**
 * Wraps whatever a value factory threw, for the Result-returning accessors.
 * One instance exists per failed lazy value, so every caller sees the same
 * object.
 *
 * @example
 * ```typescript
 * const error = new FactoryError({ lazyName: "db", cause: new Error("refused") });
 * console.log(error.message); // 'FactoryError: Value factory "db" failed'
 * ```
 */
export class FactoryError extends TaggedError("FactoryError", {
  message: (p: {
    /** Name given to the lazy value, if any */
    lazyName?: string;
    /** The value the factory threw or rejected with */
    cause: unknown;
  }) => `FactoryError: Value factory${label(p.lazyName)} failed`,
}) {
  declare readonly lazyName?: string;
}

/**
 * Raised by the synchronous accessor when the value has not settled and no
 * scheduler is able to wait for it. A Node.js thread cannot block on its own
 * event loop, so the caller has to await `getValueAsync()` instead.
 *
 * @example
 * ```typescript
 * const error = new SynchronousWaitError({ lazyName: "config" });
 * console.log(error.message);
 * // 'SynchronousWaitError: Value of "config" is not available synchronously; await getValueAsync()'
 * ```
 */
export class SynchronousWaitError extends TaggedError("SynchronousWaitError", {
  message: (p: {
    /** Name given to the lazy value, if any */
    lazyName?: string;
  }) =>
    `SynchronousWaitError: Value${p.lazyName ? ` of "${p.lazyName}"` : ""} is not available synchronously; await getValueAsync()`,
}) {
  declare readonly lazyName?: string;
}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Errors returned by `AsyncLazy.getResultAsync()`.
 */
export type AsyncLazyError = ReentrancyError | CancellationError | FactoryError;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a ReentrancyError.
 */
export function isReentrancyError(error: unknown): error is ReentrancyError {
  return TaggedError.isTaggedError(error) && error._tag === "ReentrancyError";
}

/**
 * Check if an error is a CancellationError.
 */
export function isCancellationError(error: unknown): error is CancellationError {
  return TaggedError.isTaggedError(error) && error._tag === "CancellationError";
}

/**
 * Check if an error is a FactoryError.
 */
export function isFactoryError(error: unknown): error is FactoryError {
  return TaggedError.isTaggedError(error) && error._tag === "FactoryError";
}

/**
 * Check if an error is a SynchronousWaitError.
 */
export function isSynchronousWaitError(
  error: unknown
): error is SynchronousWaitError {
  return (
    TaggedError.isTaggedError(error) && error._tag === "SynchronousWaitError"
  );
}

/**
 * Check if an error is any AsyncLazyError.
 */
export function isAsyncLazyError(error: unknown): error is AsyncLazyError {
  return (
    isReentrancyError(error) || isCancellationError(error) || isFactoryError(error)
  );
}
