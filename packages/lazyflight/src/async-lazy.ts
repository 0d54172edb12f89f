/**
 * lazyflight
 *
 * A lazily and asynchronously evaluated value. The factory runs at most once,
 * however many callers ask concurrently, and its outcome (value or failure)
 * is shared with every caller for the lifetime of the instance.
 *
 * @example
 * ```typescript
 * import { AsyncLazy } from 'lazyflight';
 *
 * const config = new AsyncLazy(() => loadConfigFromDisk(), { name: 'config' });
 *
 * // Both callers share one load
 * const [a, b] = await Promise.all([config.getValueAsync(), config.getValueAsync()]);
 *
 * // A caller can stop waiting without cancelling the load for others
 * const controller = new AbortController();
 * const mine = config.getValueAsync(controller.signal);
 * controller.abort();
 * ```
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { withCancellation } from "./cancellation";
import {
  CancellationError,
  FactoryError,
  ReentrancyError,
  SynchronousWaitError,
  isCancellationError,
  isReentrancyError,
  type AsyncLazyError,
} from "./errors";
import { createGate } from "./gate";
import { err, ok, type AsyncResult } from "./result";
import type { JoinHandle, Scheduler } from "./scheduler";

// =============================================================================
// Types
// =============================================================================

/**
 * Produces the lazily computed value. Invoked at most once.
 */
export type ValueFactory<T> = () => Promise<T>;

/**
 * Event payloads emitted through {@link AsyncLazyOptions.onEvent}.
 */
export type AsyncLazyEventPayload =
  | { type: "lazy_start"; scheduled: boolean }
  | { type: "lazy_success"; durationMs: number }
  | { type: "lazy_error"; durationMs: number; error: unknown }
  | { type: "lazy_cancelled"; reason?: unknown }
  | { type: "lazy_reentrancy" }
  | { type: "lazy_join_error"; error: unknown };

/**
 * Event emitted by an AsyncLazy instance.
 */
export type AsyncLazyEvent = AsyncLazyEventPayload & {
  /** The instance's `name` option */
  name?: string;
  /** Timestamp from the instance's clock */
  ts: number;
};

/**
 * Options for an AsyncLazy instance.
 */
export interface AsyncLazyOptions {
  /**
   * Cooperative scheduler that runs the factory and services synchronous
   * waits from `getValue()`. Released once the factory completes.
   */
  scheduler?: Scheduler;

  /**
   * Name used in events and error messages.
   */
  name?: string;

  /**
   * Receives lifecycle events (start, success, error, cancellation,
   * reentrancy). Called synchronously; it must not throw.
   */
  onEvent?: (event: AsyncLazyEvent) => void;

  /**
   * Time source for event timestamps and durations.
   * @default Date.now
   */
  clock?: () => number;
}

/** `toString()` of a lazy value that has not settled. */
export const LAZY_VALUE_NOT_CREATED = "Value is not created.";

/** `toString()` of a lazy value whose factory failed. */
export const LAZY_VALUE_FAULTED = "Value factory faulted.";

/**
 * Internal state. Each transition replaces the whole object, so a reader
 * never sees a half-written state.
 *
 * unstarted → starting → pending → fulfilled | rejected
 */
type LazyState<T> =
  | { status: "unstarted"; factory: ValueFactory<T> }
  | { status: "starting" }
  | { status: "pending"; promise: Promise<T>; joinHandle?: JoinHandle<T> }
  | { status: "fulfilled"; promise: Promise<T>; value: T }
  | {
      status: "rejected";
      promise: Promise<T>;
      error: unknown;
      factoryError: FactoryError;
    };

type StartedWork<T> = { promise: Promise<T>; joinHandle?: JoinHandle<T> };

// =============================================================================
// AsyncLazy
// =============================================================================

/**
 * A thread-safe, lazily and asynchronously evaluated value.
 *
 * ## Guarantees
 *
 * 1. The factory is invoked at most once.
 * 2. Every caller, before or after completion, observes the same outcome.
 *    A failed factory is never retried.
 * 3. A factory that calls back into its own instance, on its own call chain,
 *    gets a ReentrancyError. Independent callers simply wait.
 * 4. Aborting a caller's signal only ends that caller's wait.
 */
export class AsyncLazy<T> {
  /** Set on the factory's call chain while the value is being produced. */
  private readonly _recursiveFactoryCheck = new AsyncLocalStorage<boolean>();
  private readonly _name: string | undefined;
  private readonly _onEvent: ((event: AsyncLazyEvent) => void) | undefined;
  private readonly _clock: () => number;
  private _scheduler: Scheduler | undefined;
  private _state: LazyState<T>;

  /**
   * @param valueFactory - The async function that produces the value. Invoked at most once.
   * @param options - Scheduler, name and event options
   */
  constructor(valueFactory: ValueFactory<T>, options: AsyncLazyOptions = {}) {
    if (typeof valueFactory !== "function") {
      throw new TypeError("AsyncLazy: valueFactory must be a function");
    }

    this._state = { status: "unstarted", factory: valueFactory };
    this._scheduler = options.scheduler;
    this._name = options.name;
    this._onEvent = options.onEvent;
    this._clock = options.clock ?? Date.now;
  }

  /**
   * Whether the value factory has been claimed by a caller. True as soon as
   * the start is committed, before the factory completes.
   */
  get isValueCreated(): boolean {
    return this._state.status !== "unstarted";
  }

  /**
   * Whether the value factory has run to completion, successfully or not.
   */
  get isValueFactoryCompleted(): boolean {
    const status = this._state.status;
    return status === "fulfilled" || status === "rejected";
  }

  /**
   * Get the value, starting the factory if no one has yet.
   *
   * @param signal - Aborting it ends this caller's wait with a
   *   CancellationError. It never cancels the factory, which other callers
   *   may still be waiting on.
   * @throws ReentrancyError when called from the factory's own call chain
   * @throws CancellationError when `signal` aborts before the value settles
   */
  async getValueAsync(signal?: AbortSignal): Promise<T> {
    const promise = this.acquire(signal);

    const state = this._state;
    if (state.status !== "pending") {
      return promise;
    }

    if (state.joinHandle) {
      this.join(state.joinHandle, signal);
    }

    try {
      return await withCancellation(promise, signal);
    } catch (error) {
      if (signal?.aborted && isCancellationError(error)) {
        this.emit({ type: "lazy_cancelled", reason: signal.reason });
      }
      throw error;
    }
  }

  /**
   * Get the value synchronously.
   *
   * A settled value is returned (or its failure rethrown) without consulting
   * the scheduler. Otherwise the scheduler runs the wait cooperatively; with
   * no scheduler the factory is started and a SynchronousWaitError is thrown,
   * since the calling thread cannot block on its own event loop.
   *
   * @throws ReentrancyError when called from the factory's own call chain
   * @throws CancellationError when `signal` has already aborted and the
   *   value has not settled
   * @throws SynchronousWaitError when the value is still pending and there
   *   is no scheduler
   */
  getValue(signal?: AbortSignal): T {
    const state = this._state;
    if (state.status === "fulfilled") return state.value;
    if (state.status === "rejected") throw state.error;

    this.assertNotReentrant();

    const scheduler = this._scheduler;
    if (scheduler) {
      return scheduler.run(() => this.getValueAsync(signal));
    }

    void this.acquire(signal);
    if (signal?.aborted) {
      this.emit({ type: "lazy_cancelled", reason: signal.reason });
      throw new CancellationError({ reason: signal.reason });
    }
    throw new SynchronousWaitError({ lazyName: this._name });
  }

  /**
   * Result-returning variant of {@link getValueAsync}. Never rejects.
   *
   * A failed factory is reported as this instance's single FactoryError,
   * whose `cause` is what the factory threw.
   */
  async getResultAsync(signal?: AbortSignal): AsyncResult<T, AsyncLazyError> {
    try {
      return ok(await this.getValueAsync(signal));
    } catch (error) {
      const state = this._state;
      if (state.status === "rejected" && state.error === error) {
        return err(state.factoryError);
      }
      if (isReentrancyError(error) || isCancellationError(error)) {
        return err(error);
      }
      return err(new FactoryError({ lazyName: this._name, cause: error }));
    }
  }

  /**
   * Describes an unsettled value, a faulted one, or renders the value itself.
   * Never starts the factory.
   */
  toString(): string {
    const state = this._state;
    if (state.status === "fulfilled") return String(state.value);
    if (state.status === "rejected") return LAZY_VALUE_FAULTED;
    return LAZY_VALUE_NOT_CREATED;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private acquire(signal: AbortSignal | undefined): Promise<T> {
    const state = this._state;
    if (state.status === "fulfilled" || state.status === "rejected") {
      return state.promise;
    }

    this.assertNotReentrant();

    if (state.status === "unstarted") {
      return this.start(state.factory, signal);
    }
    // Re-entered while the start is being committed (e.g. from runAsync).
    if (state.status === "starting") {
      throw this.reentrancyError();
    }
    return state.promise;
  }

  /**
   * Claims the factory and publishes the pending promise before the factory
   * is allowed to run. Everything up to `gate.open()` is synchronous, so it
   * cannot interleave with another caller.
   */
  private start(
    factory: ValueFactory<T>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    if (signal?.aborted) {
      this.emit({ type: "lazy_cancelled", reason: signal.reason });
      throw new CancellationError({ reason: signal.reason });
    }

    this._state = { status: "starting" };

    const gate = createGate();
    const valueFactory = async (): Promise<T> => {
      try {
        await gate.wait();
        return await factory();
      } finally {
        this._scheduler = undefined;
        this.releaseJoinHandle();
      }
    };

    const scheduler = this._scheduler;
    let promise: Promise<T>;
    let joinHandle: JoinHandle<T> | undefined = undefined;
    let launched = true;
    try {
      // The marker is captured by valueFactory's async context, so it flows
      // into the factory's call chain but not back into the caller's.
      const started = this._recursiveFactoryCheck.run(true, (): StartedWork<T> => {
        if (!scheduler) return { promise: valueFactory() };
        const handle = scheduler.runAsync(valueFactory);
        return { promise: handle.task, joinHandle: handle };
      });
      promise = started.promise;
      joinHandle = started.joinHandle;
    } catch (error) {
      // The factory is consumed either way; settle to the scheduler's failure.
      launched = false;
      this._scheduler = undefined;
      promise = Promise.reject(error);
    }

    this.track(promise, joinHandle);
    try {
      this.emit({ type: "lazy_start", scheduled: scheduler !== undefined });
    } finally {
      if (launched) {
        gate.open();
      }
    }
    return promise;
  }

  private track(promise: Promise<T>, joinHandle: JoinHandle<T> | undefined): void {
    const startedAt = this._clock();
    this._state = { status: "pending", promise, joinHandle };

    void promise.then(
      (value) => {
        this._state = { status: "fulfilled", promise, value };
        this.emit({ type: "lazy_success", durationMs: this._clock() - startedAt });
      },
      (error: unknown) => {
        this._state = {
          status: "rejected",
          promise,
          error,
          factoryError: new FactoryError({ lazyName: this._name, cause: error }),
        };
        this.emit({
          type: "lazy_error",
          durationMs: this._clock() - startedAt,
          error,
        });
      }
    );
  }

  private releaseJoinHandle(): void {
    const state = this._state;
    if (state.status === "pending" && state.joinHandle) {
      this._state = { status: "pending", promise: state.promise };
    }
  }

  /**
   * Fire-and-forget join, so a later synchronous wait elsewhere can be
   * serviced by the scheduler. The caller's signal de-joins.
   */
  private join(joinHandle: JoinHandle<T>, signal: AbortSignal | undefined): void {
    void joinHandle.join(signal).catch((error: unknown) => {
      if (isCancellationError(error)) return;
      this.emit({ type: "lazy_join_error", error });
    });
  }

  private assertNotReentrant(): void {
    if (this._recursiveFactoryCheck.getStore() === true) {
      throw this.reentrancyError();
    }
  }

  private reentrancyError(): ReentrancyError {
    this.emit({ type: "lazy_reentrancy" });
    return new ReentrancyError({ lazyName: this._name });
  }

  private emit(payload: AsyncLazyEventPayload): void {
    if (!this._onEvent) return;
    this._onEvent({ ...payload, name: this._name, ts: this._clock() });
  }
}

// =============================================================================
// createAsyncLazy() - Functional constructor
// =============================================================================

/**
 * Create an {@link AsyncLazy}.
 *
 * @example
 * ```typescript
 * const db = createAsyncLazy(() => connectToDatabase(), {
 *   name: 'db',
 *   onEvent: (e) => console.debug(e.type, e.name),
 * });
 *
 * const connection = await db.getValueAsync();
 * ```
 */
export function createAsyncLazy<T>(
  valueFactory: ValueFactory<T>,
  options?: AsyncLazyOptions
): AsyncLazy<T> {
  return new AsyncLazy(valueFactory, options);
}
