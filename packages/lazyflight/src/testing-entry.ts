/**
 * lazyflight/testing
 *
 * Test doubles for code that depends on AsyncLazy or a Scheduler.
 *
 * @example
 * ```typescript
 * import { createTestScheduler, deferred } from 'lazyflight/testing';
 *
 * const scheduler = createTestScheduler({ autoStart: false });
 * const load = deferred<string>();
 * const lazy = new AsyncLazy(() => load.promise, { scheduler });
 * ```
 */

export {
  createTestScheduler,
  deferred,
  type Deferred,
  type TestScheduler,
  type TestSchedulerOptions,
  type TestSchedulerStats,
} from "./testing";
