import { isPromiseLike } from "../utilities/internal/isPromiseLike.js";
import { invariant } from "../utilities/invariant/index.js";

import type { SyncPromiseQueue } from "./SyncPromiseQueue.js";

export declare namespace SyncPromise {
  export type Status = "pending" | "fulfilled" | "rejected";

  export type Settlement<TValue> =
    | { status: "pending" }
    | { status: "fulfilled"; value: TValue }
    | { status: "rejected"; reason: unknown };

  export type OnFulfilled<TValue, TResult> = (
    value: TValue
  ) => TResult | PromiseLike<TResult>;

  export type OnRejected<TResult> = (
    reason: unknown
  ) => TResult | PromiseLike<TResult>;
}

interface Reaction<TValue> {
  fulfill(value: TValue): void;
  reject(reason: unknown): void;
}

type Settled<TValue> =
  | { tag: "fulfilled"; value: TValue }
  | { tag: "rejected"; reason: unknown };

type State<TValue> =
  | { tag: "pending"; reactions: Array<Reaction<TValue>> }
  // Resolved with another thenable and following it. Still reported as
  // "pending", but no longer open to `resolve`/`reject`.
  | { tag: "adopting"; reactions: Array<Reaction<TValue>> }
  | Settled<TValue>;

/**
 * A settle-once container for a value that may not be available yet.
 *
 * Unlike a native `Promise`, reactions never run on their own: settling a
 * `SyncPromise`, or registering a reaction on one that already settled, only
 * appends work to the queue it was created with. Draining that queue, usually
 * through `SyncPromiseAdapter.wait`, is what moves a chain of promises
 * forward.
 */
export class SyncPromise<TValue> implements PromiseLike<TValue> {
  static fulfilled<TValue>(
    queue: SyncPromiseQueue,
    value: TValue
  ): SyncPromise<TValue> {
    const promise = new SyncPromise<TValue>(queue);
    promise.state = { tag: "fulfilled", value };
    return promise;
  }

  static rejected<TValue = never>(
    queue: SyncPromiseQueue,
    reason: unknown
  ): SyncPromise<TValue> {
    const promise = new SyncPromise<TValue>(queue);
    promise.state = { tag: "rejected", reason };
    return promise;
  }

  private state: State<TValue> = { tag: "pending", reactions: [] };

  constructor(readonly queue: SyncPromiseQueue) {}

  public get status(): SyncPromise.Status {
    return this.state.tag === "adopting" ? "pending" : this.state.tag;
  }

  public inspect(): SyncPromise.Settlement<TValue> {
    switch (this.state.tag) {
      case "fulfilled":
        return { status: "fulfilled", value: this.state.value };
      case "rejected":
        return { status: "rejected", reason: this.state.reason };
      default:
        return { status: "pending" };
    }
  }

  /**
   * Fulfills the promise, or makes it follow `value` when `value` is itself
   * a thenable.
   */
  public resolve(value: TValue | PromiseLike<TValue>): void {
    this.assertPending("resolve");
    this.settleWith(value);
  }

  public reject(reason: unknown): void {
    this.assertPending("reject");
    this.settle({ tag: "rejected", reason });
  }

  public then<TResult1 = TValue, TResult2 = never>(
    onFulfilled?: SyncPromise.OnFulfilled<TValue, TResult1> | null,
    onRejected?: SyncPromise.OnRejected<TResult2> | null
  ): SyncPromise<TResult1 | TResult2>;
  public then(
    onFulfilled?: SyncPromise.OnFulfilled<TValue, unknown> | null,
    onRejected?: SyncPromise.OnRejected<unknown> | null
  ): SyncPromise<unknown> {
    const downstream = new SyncPromise<unknown>(this.queue);

    this.subscribe({
      fulfill: (value) => {
        if (onFulfilled) {
          downstream.settleFrom(() => onFulfilled(value));
        } else {
          downstream.settleWith(value);
        }
      },
      reject: (reason) => {
        if (onRejected) {
          downstream.settleFrom(() => onRejected(reason));
        } else {
          downstream.settle({ tag: "rejected", reason });
        }
      },
    });

    return downstream;
  }

  public catch<TResult = never>(
    onRejected?: SyncPromise.OnRejected<TResult> | null
  ): SyncPromise<TValue | TResult> {
    return this.then(undefined, onRejected);
  }

  private subscribe(reaction: Reaction<TValue>) {
    if (this.state.tag === "pending" || this.state.tag === "adopting") {
      this.state.reactions.push(reaction);
    } else {
      this.schedule(reaction, this.state);
    }
  }

  private assertPending(operation: "resolve" | "reject") {
    invariant(
      this.state.tag === "pending",
      "Cannot %s a promise that is already %s.",
      operation,
      this.state.tag === "adopting" ? "resolved" : this.state.tag
    );
  }

  private settleFrom(handler: () => TValue | PromiseLike<TValue>) {
    let result: TValue | PromiseLike<TValue>;
    try {
      result = handler();
    } catch (error) {
      this.settle({ tag: "rejected", reason: error });
      return;
    }
    this.settleWith(result);
  }

  private settleWith(value: TValue | PromiseLike<TValue>) {
    if (value === this) {
      this.settle({
        tag: "rejected",
        reason: new TypeError("Cannot resolve a promise with itself."),
      });
    } else if (value instanceof SyncPromise) {
      this.follow(value);
    } else if (isPromiseLike(value)) {
      this.followForeign(value);
    } else {
      this.settle({ tag: "fulfilled", value });
    }
  }

  private follow(target: SyncPromise<TValue>) {
    this.state = { tag: "adopting", reactions: this.pendingReactions() };

    const reaction: Reaction<TValue> = {
      fulfill: (value) => this.settle({ tag: "fulfilled", value }),
      reject: (reason) => this.settle({ tag: "rejected", reason }),
    };

    // Every link of an adoption chain settles from a queued task, never from
    // the stack. A settled target is read on this promise's own queue, which
    // matters when the target belongs to another adapter.
    if (target.state.tag === "fulfilled" || target.state.tag === "rejected") {
      this.schedule(reaction, target.state);
    } else {
      target.subscribe(reaction);
    }
  }

  private followForeign(thenable: PromiseLike<TValue>) {
    this.state = { tag: "adopting", reactions: this.pendingReactions() };

    let called = false;
    const onFulfilled = (value: TValue | PromiseLike<TValue>) => {
      if (called) return;
      called = true;
      this.settleWith(value);
    };
    const onRejected = (reason: unknown) => {
      if (called) return;
      called = true;
      this.settle({ tag: "rejected", reason });
    };

    this.queue.enqueue(() => {
      try {
        thenable.then(onFulfilled, onRejected);
      } catch (error) {
        onRejected(error);
      }
    });
  }

  private settle(settled: Settled<TValue>) {
    if (this.state.tag === "fulfilled" || this.state.tag === "rejected") {
      return;
    }

    const reactions = this.state.reactions;
    this.state = settled;
    reactions.forEach((reaction) => this.schedule(reaction, settled));
  }

  private schedule(reaction: Reaction<TValue>, settled: Settled<TValue>) {
    this.queue.enqueue(() => {
      if (settled.tag === "fulfilled") {
        reaction.fulfill(settled.value);
      } else {
        reaction.reject(settled.reason);
      }
    });
  }

  private pendingReactions(): Array<Reaction<TValue>> {
    return this.state.tag === "pending" || this.state.tag === "adopting" ?
        this.state.reactions
      : [];
  }
}
