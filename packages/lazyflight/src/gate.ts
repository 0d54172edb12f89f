/**
 * Single-resolution gate.
 *
 * Work that waits on a closed gate stays parked until `open()` is called.
 * Opening is idempotent; a gate never closes again.
 */
export interface Gate {
  /** Resolves once the gate has been opened. */
  wait(): Promise<void>;
  /** Open the gate. Later calls are no-ops. */
  open(): void;
  readonly isOpen: boolean;
}

/**
 * Create a closed gate.
 *
 * @example
 * ```typescript
 * const gate = createGate();
 * const work = (async () => {
 *   await gate.wait();
 *   return doWork();
 * })();
 *
 * publish(work); // visible to others before doWork() starts
 * gate.open();
 * ```
 */
export function createGate(): Gate {
  let isOpen = false;
  let release: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });

  return {
    wait: () => opened,

    open(): void {
      if (isOpen) return;
      isOpen = true;
      release();
    },

    get isOpen(): boolean {
      return isOpen;
    },
  };
}
