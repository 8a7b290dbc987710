/**
 * External readiness signal a background task waits on before it reads
 * project metadata, such as an IDE finishing its indexing pass.
 */
export interface ReadinessGate {
  isReady(): boolean;
  /** Resolves once the gate is open; resolves immediately if it already is. */
  whenReady(): Promise<void>;
}

/**
 * Posts a continuation onto the caller's designated context (a UI queue, an
 * event loop turn, a test harness).
 */
export type CallbackExecutor = (task: () => void) => void;

export const alwaysReady: ReadinessGate = {
  isReady: () => true,
  whenReady: () => Promise.resolve(),
};

export const nextTickExecutor: CallbackExecutor = (task) => {
  setImmediate(task);
};

/**
 * A gate that stays closed until {@link ManualReadinessGate.open} is called.
 * Hosts flip it when their index settles; calling {@link close} makes later
 * waiters block again.
 */
export class ManualReadinessGate implements ReadinessGate {
  private ready: boolean;
  private waiters: Array<() => void> = [];

  constructor(initiallyReady = false) {
    this.ready = initiallyReady;
  }

  isReady(): boolean {
    return this.ready;
  }

  whenReady(): Promise<void> {
    if (this.ready) return Promise.resolve();
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  open(): void {
    this.ready = true;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve());
  }

  close(): void {
    this.ready = false;
  }
}

/**
 * Runs `body` once `gate` is open and settles the returned promise from
 * inside `deliver`, so callers observe the result on their own context.
 */
export function runWhenReady<T>(
  gate: ReadinessGate,
  body: () => Promise<T>,
  deliver: CallbackExecutor = nextTickExecutor,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    void gate
      .whenReady()
      .then(body)
      .then(
        (value) => deliver(() => resolve(value)),
        (error: unknown) => deliver(() => reject(error)),
      );
  });
}
