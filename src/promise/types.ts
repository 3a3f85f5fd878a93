import type { Deferred } from "./Deferred.js";
import type { SyncPromise } from "./SyncPromise.js";

/**
 * Anything a resolver can return in place of a ready value.
 */
export type Thenable<TValue> =
  | SyncPromise<TValue>
  | Deferred<TValue>
  | PromiseLike<TValue>;

export type PromiseOrValue<TValue> = TValue | SyncPromise<TValue>;

export declare namespace PromiseAdapter {
  export type Executor<TValue> = (
    resolve: (value: TValue | PromiseLike<TValue>) => void,
    reject: (reason?: unknown) => void
  ) => void;
}

/**
 * The surface the executor uses to create and combine promises. It never
 * touches `SyncPromise` internals directly, only this interface.
 */
export interface PromiseAdapter {
  /**
   * Splits resolver results into plain values and values that still have to
   * be waited for.
   */
  isThenable(value: unknown): value is Thenable<unknown>;

  /**
   * Wraps any thenable into a promise created by this adapter.
   */
  convert<TValue>(thenable: Thenable<TValue>): SyncPromise<TValue>;

  createFulfilled<TValue>(value: TValue): SyncPromise<TValue>;

  createRejected<TValue = never>(reason: unknown): SyncPromise<TValue>;

  create<TValue>(executor: PromiseAdapter.Executor<TValue>): SyncPromise<TValue>;

  then<TValue, TResult1 = TValue, TResult2 = never>(
    promise: SyncPromise<TValue>,
    onFulfilled?: ((value: TValue) => TResult1 | Thenable<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | Thenable<TResult2>) | null
  ): SyncPromise<TResult1 | TResult2>;

  all<TValue>(
    promises: ReadonlyArray<SyncPromise<TValue>>
  ): SyncPromise<TValue[]>;

  /**
   * Runs queued work until `promise` settles, then returns its value or
   * throws its rejection reason.
   */
  wait<TValue>(promise: SyncPromise<TValue>): TValue;
}
