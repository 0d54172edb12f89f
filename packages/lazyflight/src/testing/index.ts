/**
 * lazyflight/testing
 *
 * Deterministic helpers for testing code built on AsyncLazy: a recording
 * scheduler and a manually settled promise.
 */

import { AsyncResource } from "node:async_hooks";
import { withCancellation } from "../cancellation";
import { SynchronousWaitError } from "../errors";
import { err, ok, type AsyncResult } from "../result";
import type { JoinHandle, Scheduler } from "../scheduler";

// =============================================================================
// deferred()
// =============================================================================

/**
 * A promise settled from the outside.
 */
export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

/**
 * Create a promise that settles when `resolve` or `reject` is called.
 *
 * @example
 * ```typescript
 * const gate = deferred<number>();
 * const lazy = new AsyncLazy(() => gate.promise);
 * const pending = lazy.getValueAsync();
 * gate.resolve(42);
 * await pending; // 42
 * ```
 */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

// =============================================================================
// createTestScheduler()
// =============================================================================

/**
 * Options for the test scheduler.
 */
export interface TestSchedulerOptions {
  /**
   * Start work as soon as it is scheduled. When false, work is queued until
   * `drain()`.
   * @default true
   */
  autoStart?: boolean;
}

/**
 * Counters recorded by the test scheduler.
 */
export interface TestSchedulerStats {
  /** Calls to runAsync */
  runAsyncCalls: number;
  /** Calls to run */
  runCalls: number;
  /** Calls to join on any handle */
  totalJoins: number;
  /** Joins still registered */
  activeJoins: number;
  /** Joins withdrawn because their signal aborted */
  cancelledJoins: number;
}

/**
 * Scheduler double that records how it is used.
 */
export interface TestScheduler extends Scheduler {
  /** Snapshot of the counters. */
  readonly stats: TestSchedulerStats;
  /** Work waiting for `drain()`. */
  readonly queued: number;
  /** Outcome of the work passed to the most recent `run` call. */
  readonly lastRun: AsyncResult<unknown, unknown> | undefined;
  /** Start all queued work. Returns how many items were started. */
  drain(): number;
}

/**
 * Create a scheduler double.
 *
 * `run` cannot pump in-process promises synchronously, so it invokes the work,
 * records its outcome in `lastRun` and throws a SynchronousWaitError. Queued
 * work keeps the async context it was scheduled from.
 *
 * @example
 * ```typescript
 * const scheduler = createTestScheduler({ autoStart: false });
 * const lazy = new AsyncLazy(load, { scheduler });
 *
 * const pending = lazy.getValueAsync();
 * expect(lazy.isValueCreated).toBe(true);
 * expect(scheduler.queued).toBe(1);
 *
 * scheduler.drain();
 * await pending;
 * ```
 */
export function createTestScheduler(
  options: TestSchedulerOptions = {}
): TestScheduler {
  const { autoStart = true } = options;
  const queue: Array<() => void> = [];
  const stats: TestSchedulerStats = {
    runAsyncCalls: 0,
    runCalls: 0,
    totalJoins: 0,
    activeJoins: 0,
    cancelledJoins: 0,
  };
  let lastRun: AsyncResult<unknown, unknown> | undefined;

  return {
    runAsync<T>(work: () => Promise<T>): JoinHandle<T> {
      stats.runAsyncCalls++;
      const outcome = deferred<T>();
      const begin = () => {
        try {
          void work().then(outcome.resolve, outcome.reject);
        } catch (error) {
          outcome.reject(error);
        }
      };

      if (autoStart) {
        begin();
      } else {
        queue.push(AsyncResource.bind(begin));
      }

      const settled = outcome.promise.then(
        () => undefined,
        () => undefined
      );

      return {
        task: outcome.promise,
        join(signal?: AbortSignal): Promise<void> {
          stats.totalJoins++;
          stats.activeJoins++;
          return withCancellation(settled, signal).then(
            () => {
              stats.activeJoins--;
            },
            (error: unknown) => {
              stats.activeJoins--;
              stats.cancelledJoins++;
              throw error;
            }
          );
        },
      };
    },

    run<T>(work: () => Promise<T>): T {
      stats.runCalls++;
      lastRun = work().then(
        (value) => ok(value),
        (error: unknown) => err(error)
      );
      throw new SynchronousWaitError({});
    },

    drain(): number {
      const started = queue.splice(0, queue.length);
      for (const begin of started) {
        begin();
      }
      return started.length;
    },

    get stats(): TestSchedulerStats {
      return { ...stats };
    },

    get queued(): number {
      return queue.length;
    },

    get lastRun(): AsyncResult<unknown, unknown> | undefined {
      return lastRun;
    },
  };
}
