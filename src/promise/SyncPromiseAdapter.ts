import { DeadlockError } from "../errors/index.js";
import { __DEV__ } from "../utilities/globals/environment/index.js";
import { isPromiseLike } from "../utilities/internal/index.js";
import { invariant } from "../utilities/invariant/index.js";

import { Deferred } from "./Deferred.js";
import { SyncPromise } from "./SyncPromise.js";
import { SyncPromiseQueue } from "./SyncPromiseQueue.js";
import type { PromiseAdapter, Thenable } from "./types.js";

/**
 * Creates and combines `SyncPromise`s for one execution, and drains them.
 *
 * Every adapter owns its own reaction queue, so two executions never see
 * each other's pending work. Use one adapter per request.
 *
 * @example
 *
 * ```ts
 * const adapter = new SyncPromiseAdapter();
 * const promise = execute({ schema, document, promiseAdapter: adapter });
 *
 * const result =
 *   promise.status === "fulfilled" ? promise.inspect() : adapter.wait(promise);
 * ```
 */
export class SyncPromiseAdapter implements PromiseAdapter {
  readonly queue = new SyncPromiseQueue();

  public isThenable(value: unknown): value is Thenable<unknown> {
    return (
      value instanceof SyncPromise ||
      value instanceof Deferred ||
      isPromiseLike(value)
    );
  }

  public convert<TValue>(thenable: Thenable<TValue>): SyncPromise<TValue> {
    // A `Deferred` first converted by another adapter stays on that
    // adapter's queue and is followed like any other foreign promise.
    const source =
      thenable instanceof Deferred ? thenable.toPromise(this.queue) : thenable;

    if (source instanceof SyncPromise && source.queue === this.queue) {
      return source;
    }

    if (__DEV__ && source instanceof Promise) {
      invariant.warn(
        "A native Promise was passed to a SyncPromiseAdapter. It settles outside of the adapter's queue, so `wait` will report a deadlock unless the promise is awaited elsewhere first. Return a `Deferred` instead."
      );
    }

    const promise = new SyncPromise<TValue>(this.queue);
    promise.resolve(source);
    return promise;
  }

  public createFulfilled<TValue>(value: TValue): SyncPromise<TValue> {
    return SyncPromise.fulfilled(this.queue, value);
  }

  public createRejected<TValue = never>(reason: unknown): SyncPromise<TValue> {
    return SyncPromise.rejected<TValue>(this.queue, reason);
  }

  public create<TValue>(
    executor: PromiseAdapter.Executor<TValue>
  ): SyncPromise<TValue> {
    const promise = new SyncPromise<TValue>(this.queue);
    let settled = false;

    const once =
      <TArgs extends unknown[]>(
        operation: "resolve" | "reject",
        settle: (...args: TArgs) => void
      ) =>
      (...args: TArgs) => {
        if (settled) {
          if (__DEV__) {
            invariant.warn(
              "Ignoring a call to `%s` on a promise that has already been settled.",
              operation
            );
          }
          return;
        }
        settled = true;
        settle(...args);
      };

    const resolve = once("resolve", (value: TValue | PromiseLike<TValue>) =>
      promise.resolve(value)
    );
    const reject = once("reject", (reason?: unknown) => promise.reject(reason));

    try {
      executor(resolve, reject);
    } catch (error) {
      reject(error);
    }

    return promise;
  }

  public then<TValue, TResult1 = TValue, TResult2 = never>(
    promise: SyncPromise<TValue>,
    onFulfilled?: ((value: TValue) => TResult1 | Thenable<TResult1>) | null,
    onRejected?: ((reason: unknown) => TResult2 | Thenable<TResult2>) | null
  ): SyncPromise<TResult1 | TResult2> {
    return promise.then(
      onFulfilled && ((value) => this.normalize(onFulfilled(value))),
      onRejected && ((reason) => this.normalize(onRejected(reason)))
    );
  }

  public all<TValue>(
    promises: ReadonlyArray<SyncPromise<TValue>>
  ): SyncPromise<TValue[]> {
    if (promises.length === 0) {
      return this.createFulfilled<TValue[]>([]);
    }

    const all = new SyncPromise<TValue[]>(this.queue);
    const results = new Array<TValue>(promises.length);
    let remaining = promises.length;

    promises.forEach((promise, index) => {
      promise.then(
        (value) => {
          results[index] = value;
          remaining--;
          if (remaining === 0) {
            all.resolve(results);
          }
        },
        (reason) => {
          if (all.status === "pending") {
            all.reject(reason);
          }
        }
      );
    });

    return all;
  }

  /**
   * Runs queued reactions until `promise` settles, then returns its value or
   * throws its rejection reason.
   *
   * Throws a `DeadlockError` if the queue empties first.
   */
  public wait<TValue>(promise: SyncPromise<TValue>): TValue {
    let drainedTasks = 0;

    while (promise.status === "pending" && this.queue.runNext()) {
      drainedTasks++;
    }

    const settlement = promise.inspect();

    switch (settlement.status) {
      case "fulfilled":
        return settlement.value;
      case "rejected":
        throw settlement.reason;
      default:
        throw new DeadlockError(undefined, { drainedTasks });
    }
  }

  private normalize<TValue>(
    value: TValue | Thenable<TValue>
  ): TValue | PromiseLike<TValue> {
    return value instanceof Deferred ? value.toPromise(this.queue) : value;
  }
}
