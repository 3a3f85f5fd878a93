import { brand, isBranded } from "./utils.js";

export declare namespace DeadlockError {
  export interface Options {
    /**
     * Number of reactions the queue ran during the `wait` call that gave up.
     */
    drainedTasks?: number;
  }
}

/**
 * Thrown by `SyncPromiseAdapter.wait` when the reaction queue runs dry while
 * the awaited promise is still pending.
 *
 * @remarks
 *
 * Nothing left in the queue can settle the promise, so waiting longer would
 * never finish. This usually means the promise depends on a source the
 * adapter cannot drain, such as a native `Promise` or a timer.
 *
 * @example
 *
 * ```ts
 * try {
 *   adapter.wait(promise);
 * } catch (error) {
 *   if (DeadlockError.is(error)) {
 *     // the promise can only be settled from outside the adapter
 *   }
 * }
 * ```
 */
export class DeadlockError extends Error {
  /** Determine if an error is a `DeadlockError` instance */
  static is(error: unknown): error is DeadlockError {
    return isBranded(error, "DeadlockError");
  }

  readonly drainedTasks: number;

  constructor(
    message = "Could not resolve promise: the queue is empty but the promise is still pending.",
    options: DeadlockError.Options = {}
  ) {
    super(message);
    this.name = "DeadlockError";
    this.drainedTasks = options.drainedTasks ?? 0;

    brand(this);
    Object.setPrototypeOf(this, DeadlockError.prototype);
  }
}
