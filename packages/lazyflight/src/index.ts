/**
 * lazyflight
 *
 * Lazily and asynchronously evaluated values with single-flight semantics:
 * the factory runs at most once and every caller shares its outcome.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { AsyncLazy } from 'lazyflight';
 *
 * const settings = new AsyncLazy(() => fetchSettings());
 *
 * // All concurrent callers share one fetch
 * const [a, b] = await Promise.all([
 *   settings.getValueAsync(),
 *   settings.getValueAsync(),
 * ]);
 * ```
 *
 * ## Entry Points
 *
 * - `lazyflight` - AsyncLazy, scheduler contract, errors, Result types
 * - `lazyflight/errors` - Error classes and type guards only
 * - `lazyflight/testing` - Test scheduler and deferred helper
 */

// =============================================================================
// AsyncLazy
// =============================================================================
export {
  AsyncLazy,
  createAsyncLazy,
  LAZY_VALUE_NOT_CREATED,
  LAZY_VALUE_FAULTED,
  type ValueFactory,
  type AsyncLazyOptions,
  type AsyncLazyEvent,
  type AsyncLazyEventPayload,
} from "./async-lazy";

// =============================================================================
// Scheduler contract
// =============================================================================
export type { Scheduler, JoinHandle } from "./scheduler";

// =============================================================================
// Errors
// =============================================================================
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
export { TaggedError, type TaggedErrorInstance } from "./tagged-error";

// =============================================================================
// Result types
// =============================================================================
export {
  ok,
  err,
  isOk,
  isErr,
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
} from "./result";

// =============================================================================
// Utilities
// =============================================================================
export { withCancellation } from "./cancellation";
