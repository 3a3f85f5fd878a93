import { InvariantError } from "../../utilities/invariant/index.js";
import { SyncPromise } from "../SyncPromise.js";
import { SyncPromiseQueue } from "../SyncPromiseQueue.js";

function drain(queue: SyncPromiseQueue) {
  let count = 0;
  while (queue.runNext()) {
    count++;
  }
  return count;
}

describe("settling", () => {
  test("starts pending and settles exactly once", () => {
    const queue = new SyncPromiseQueue();
    const promise = new SyncPromise<number>(queue);

    expect(promise.status).toBe("pending");
    expect(promise.inspect()).toEqual({ status: "pending" });

    promise.resolve(1);

    expect(promise.status).toBe("fulfilled");
    expect(promise.inspect()).toEqual({ status: "fulfilled", value: 1 });

    expect(() => promise.resolve(2)).toThrow(InvariantError);
    expect(() => promise.resolve(2)).toThrow(
      "Cannot resolve a promise that is already fulfilled."
    );
    expect(() => promise.reject(new Error("late"))).toThrow(
      "Cannot reject a promise that is already fulfilled."
    );
    expect(promise.inspect()).toEqual({ status: "fulfilled", value: 1 });
  });

  test("cannot be fulfilled after it was rejected", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("boom");
    const promise = new SyncPromise<number>(queue);

    promise.reject(error);

    expect(() => promise.resolve(1)).toThrow(
      "Cannot resolve a promise that is already rejected."
    );
    expect(promise.inspect()).toEqual({ status: "rejected", reason: error });
  });

  test("cannot be settled again while it follows another promise", () => {
    const queue = new SyncPromiseQueue();
    const promise = new SyncPromise<number>(queue);

    promise.resolve(new SyncPromise<number>(queue));

    expect(promise.status).toBe("pending");
    expect(() => promise.resolve(1)).toThrow(
      "Cannot resolve a promise that is already resolved."
    );
  });

  test("rejects with a TypeError when resolved with itself", () => {
    const queue = new SyncPromiseQueue();
    const promise = new SyncPromise<unknown>(queue);

    promise.resolve(promise);

    const settlement = promise.inspect();
    expect(settlement.status).toBe("rejected");
    expect(settlement).toEqual({
      status: "rejected",
      reason: new TypeError("Cannot resolve a promise with itself."),
    });
  });

  test("creates already settled promises without queueing work", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("boom");

    expect(SyncPromise.fulfilled(queue, "value").inspect()).toEqual({
      status: "fulfilled",
      value: "value",
    });
    expect(SyncPromise.rejected(queue, error).inspect()).toEqual({
      status: "rejected",
      reason: error,
    });
    expect(queue.isEmpty()).toBe(true);
  });
});

describe("reactions", () => {
  test("do not run until the queue is drained", () => {
    const queue = new SyncPromiseQueue();
    const promise = new SyncPromise<string>(queue);
    const onFulfilled = jest.fn();

    promise.then(onFulfilled);
    promise.resolve("a");

    expect(onFulfilled).not.toHaveBeenCalled();
    expect(queue.size).toBe(1);

    drain(queue);

    expect(onFulfilled).toHaveBeenCalledTimes(1);
    expect(onFulfilled).toHaveBeenCalledWith("a");
  });

  test("are queued at once when registered on a settled promise", () => {
    const queue = new SyncPromiseQueue();
    const onFulfilled = jest.fn();

    SyncPromise.fulfilled(queue, 1).then(onFulfilled);

    expect(queue.size).toBe(1);
    expect(onFulfilled).not.toHaveBeenCalled();

    drain(queue);

    expect(onFulfilled).toHaveBeenCalledWith(1);
  });

  test("run in registration order", () => {
    const queue = new SyncPromiseQueue();
    const promise = new SyncPromise<number>(queue);
    const calls: string[] = [];

    promise.then(() => calls.push("first"));
    promise.then(() => calls.push("second"));
    promise.then(undefined, () => calls.push("never"));
    promise.then(() => calls.push("third"));
    promise.resolve(1);
    drain(queue);

    expect(calls).toEqual(["first", "second", "third"]);
  });

  test("run only the handler matching the outcome", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("boom");
    const onFulfilled = jest.fn();
    const onRejected = jest.fn();

    SyncPromise.rejected(queue, error).then(onFulfilled, onRejected);
    drain(queue);

    expect(onFulfilled).not.toHaveBeenCalled();
    expect(onRejected).toHaveBeenCalledTimes(1);
    expect(onRejected).toHaveBeenCalledWith(error);
  });

  test("pass the outcome through missing handlers", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("boom");
    const onRejected = jest.fn(() => "recovered");

    const result = SyncPromise.rejected<number>(queue, error)
      .then((value) => value + 1)
      .catch(onRejected);
    drain(queue);

    expect(onRejected).toHaveBeenCalledWith(error);
    expect(result.inspect()).toEqual({
      status: "fulfilled",
      value: "recovered",
    });

    const passed = SyncPromise.fulfilled(queue, 1).catch(() => 0);
    drain(queue);

    expect(passed.inspect()).toEqual({ status: "fulfilled", value: 1 });
  });

  test("reject the downstream promise when a handler throws", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("thrown");

    const result = SyncPromise.fulfilled(queue, 1).then(() => {
      throw error;
    });
    drain(queue);

    expect(result.inspect()).toEqual({ status: "rejected", reason: error });
  });
});

describe("adoption", () => {
  test("follows a SyncPromise returned from a handler", () => {
    const queue = new SyncPromiseQueue();
    const inner = new SyncPromise<string>(queue);

    const outer = SyncPromise.fulfilled(queue, 1).then(() => inner);
    drain(queue);

    expect(outer.status).toBe("pending");

    inner.resolve("inner");
    drain(queue);

    expect(outer.inspect()).toEqual({ status: "fulfilled", value: "inner" });
  });

  test("types the downstream promise after the handler results", () => {
    const queue = new SyncPromiseQueue();
    const source = SyncPromise.fulfilled(queue, "3");

    const parsed: SyncPromise<number> = source.then((value) =>
      SyncPromise.fulfilled(queue, Number(value))
    );
    const recovered: SyncPromise<number | string> = parsed
      .then<number>(() => {
        throw new Error("boom");
      })
      .catch((error: unknown) =>
        error instanceof Error ? error.message : "unknown"
      );
    drain(queue);

    expect(parsed.inspect()).toEqual({ status: "fulfilled", value: 3 });
    expect(recovered.inspect()).toEqual({ status: "fulfilled", value: "boom" });
  });

  test("follows a rejected SyncPromise", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("boom");
    const promise = new SyncPromise<string>(queue);

    promise.resolve(SyncPromise.rejected(queue, error));
    drain(queue);

    expect(promise.inspect()).toEqual({ status: "rejected", reason: error });
  });

  test("adopts foreign thenables from a queued task", () => {
    const queue = new SyncPromiseQueue();
    const thenable = {
      then: jest.fn((onFulfilled: (value: string) => void) => {
        onFulfilled("foreign");
      }),
    };
    const promise = new SyncPromise<unknown>(queue);

    promise.resolve(thenable);

    expect(thenable.then).not.toHaveBeenCalled();
    expect(promise.status).toBe("pending");

    drain(queue);

    expect(thenable.then).toHaveBeenCalledTimes(1);
    expect(promise.inspect()).toEqual({ status: "fulfilled", value: "foreign" });
  });

  test("listens only to the first outcome a foreign thenable reports", () => {
    const queue = new SyncPromiseQueue();
    const promise = new SyncPromise<unknown>(queue);

    promise.resolve({
      then(
        onFulfilled: (value: string) => void,
        onRejected: (reason: unknown) => void
      ) {
        onFulfilled("first");
        onRejected(new Error("ignored"));
        onFulfilled("second");
      },
    });
    drain(queue);

    expect(promise.inspect()).toEqual({ status: "fulfilled", value: "first" });
  });

  test("rejects when a foreign thenable throws", () => {
    const queue = new SyncPromiseQueue();
    const error = new Error("boom");
    const promise = new SyncPromise<unknown>(queue);

    promise.resolve({
      then() {
        throw error;
      },
    });
    drain(queue);

    expect(promise.inspect()).toEqual({ status: "rejected", reason: error });
  });

  test("settles long chains of handlers through the queue", () => {
    const queue = new SyncPromiseQueue();
    let promise = SyncPromise.fulfilled(queue, 0);

    for (let i = 0; i < 10000; i++) {
      promise = promise.then((value) => SyncPromise.fulfilled(queue, value + 1));
    }
    drain(queue);

    expect(promise.inspect()).toEqual({ status: "fulfilled", value: 10000 });
  });

  test("settles deeply nested adoptions without growing the stack", () => {
    const queue = new SyncPromiseQueue();
    const root = new SyncPromise<string>(queue);
    let tail = root;

    for (let i = 0; i < 100000; i++) {
      const next = new SyncPromise<string>(queue);
      next.resolve(tail);
      tail = next;
    }

    root.resolve("done");
    const drained = drain(queue);

    expect(tail.inspect()).toEqual({ status: "fulfilled", value: "done" });
    expect(drained).toBe(100000);
  });
});
