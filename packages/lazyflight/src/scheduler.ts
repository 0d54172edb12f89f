/**
 * lazyflight scheduler contract
 *
 * A cooperative scheduler lets a lazy value run its factory under an external
 * execution policy, and lets a synchronous caller on a privileged context
 * (a UI or main loop, say) pump that scheduler while it waits instead of
 * blocking it outright. AsyncLazy only depends on this interface; the
 * scheduler itself is supplied by the host.
 *
 * @example
 * ```typescript
 * import { AsyncLazy, type Scheduler } from 'lazyflight';
 *
 * const scheduler: Scheduler = hostScheduler;
 * const settings = new AsyncLazy(() => loadSettings(), { scheduler });
 *
 * // On the privileged context: pumps the scheduler until the value is ready
 * const value = settings.getValue();
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Handle to work started through {@link Scheduler.runAsync}.
 */
export interface JoinHandle<T> {
  /** Settles with the outcome of the scheduled work. */
  readonly task: Promise<T>;

  /**
   * Register cooperative interest in the work, so a context that later waits
   * on it synchronously can be serviced without deadlocking.
   *
   * Resolves once the work settles, whatever its outcome. Rejects with a
   * CancellationError when `signal` aborts, which also withdraws the
   * registration; the work itself is never cancelled by this.
   */
  join(signal?: AbortSignal): Promise<void>;
}

/**
 * Cooperative scheduler used by AsyncLazy.
 */
export interface Scheduler {
  /**
   * Start `work` under the scheduler's own execution policy.
   */
  runAsync<T>(work: () => Promise<T>): JoinHandle<T>;

  /**
   * Run `work` to completion synchronously, pumping the scheduler's queue
   * when called from a context the scheduler treats as privileged.
   */
  run<T>(work: () => Promise<T>): T;
}
