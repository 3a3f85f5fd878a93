import { SyncPromise } from "./SyncPromise.js";
import type { SyncPromiseQueue } from "./SyncPromiseQueue.js";

export declare namespace Deferred {
  export type Executor<TValue> = () =>
    | TValue
    | PromiseLike<TValue>
    | Deferred<TValue>;
}

/**
 * A value a field resolver promises to compute later.
 *
 * Returning a `Deferred` from a resolver marks the field as asynchronous
 * without doing any work up front. The executor runs exactly once, as a
 * queued task, after the adapter first converts the `Deferred`.
 *
 * @example
 *
 * ```ts
 * const resolvers = {
 *   author: (post) => new Deferred(() => authors.get(post.authorId)),
 * };
 * ```
 */
export class Deferred<TValue> {
  static create<TValue>(executor: Deferred.Executor<TValue>): Deferred<TValue> {
    return new Deferred(executor);
  }

  private promise?: SyncPromise<TValue>;

  constructor(private readonly executor: Deferred.Executor<TValue>) {}

  /**
   * Whether an adapter has already picked this computation up.
   */
  public get scheduled() {
    return this.promise !== undefined;
  }

  /** @internal */
  public toPromise(queue: SyncPromiseQueue): SyncPromise<TValue> {
    if (this.promise) {
      return this.promise;
    }

    const promise = new SyncPromise<TValue>(queue);
    this.promise = promise;

    queue.enqueue(() => {
      let value: TValue | PromiseLike<TValue> | Deferred<TValue>;
      try {
        value = this.executor();
      } catch (error) {
        promise.reject(error);
        return;
      }
      promise.resolve(
        value instanceof Deferred ? value.toPromise(queue) : value
      );
    });

    return promise;
  }
}
