/**
 * lazyflight/errors
 *
 * Error classes raised by AsyncLazy, with type guards.
 *
 * @example
 * ```typescript
 * import { isCancellationError } from 'lazyflight/errors';
 *
 * try {
 *   await lazy.getValueAsync(signal);
 * } catch (error) {
 *   if (isCancellationError(error)) return;
 *   throw error;
 * }
 * ```
 */

export {
  ReentrancyError,
  CancellationError,
  FactoryError,
  SynchronousWaitError,
  isReentrancyError,
  isCancellationError,
  isFactoryError,
  isSynchronousWaitError,
  isAsyncLazyError,
  type AsyncLazyError,
} from "./errors";
export {
  TaggedError,
  type TaggedErrorInstance,
  type TaggedErrorOptions,
} from "./tagged-error";
