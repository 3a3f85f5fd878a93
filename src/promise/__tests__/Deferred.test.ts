import { Deferred } from "../Deferred.js";
import { SyncPromiseAdapter } from "../SyncPromiseAdapter.js";

test("does nothing until an adapter converts it and drains", () => {
  const executor = jest.fn(() => "value");
  const deferred = new Deferred(executor);

  expect(deferred.scheduled).toBe(false);

  const adapter = new SyncPromiseAdapter();
  const promise = adapter.convert(deferred);

  expect(deferred.scheduled).toBe(true);
  expect(executor).not.toHaveBeenCalled();
  expect(promise.status).toBe("pending");

  expect(adapter.wait(promise)).toBe("value");
  expect(executor).toHaveBeenCalledTimes(1);
});

test("runs exactly once however often it is converted", () => {
  const executor = jest.fn(() => 1);
  const deferred = Deferred.create(executor);
  const adapter = new SyncPromiseAdapter();

  const promise = adapter.convert(deferred);

  expect(adapter.convert(deferred)).toBe(promise);
  expect(adapter.wait(promise)).toBe(1);
  expect(adapter.wait(adapter.convert(deferred))).toBe(1);
  expect(executor).toHaveBeenCalledTimes(1);
});

test("resolves with the value of a nested deferred", () => {
  const adapter = new SyncPromiseAdapter();

  const promise = adapter.convert(
    new Deferred(() => new Deferred(() => new Deferred(() => 42)))
  );

  expect(adapter.wait(promise)).toBe(42);
});

test("rejects when its executor throws", () => {
  const adapter = new SyncPromiseAdapter();
  const error = new Error("boom");

  const promise = adapter.convert(
    new Deferred(() => {
      throw error;
    })
  );

  expect(() => adapter.wait(promise)).toThrow(error);
  expect(promise.inspect()).toEqual({ status: "rejected", reason: error });
});

test("runs deferreds in the order they were converted", () => {
  const adapter = new SyncPromiseAdapter();
  const calls: string[] = [];
  const track = (name: string) =>
    new Deferred(() => {
      calls.push(name);
      return name;
    });

  const first = adapter.convert(track("first"));
  const second = adapter.convert(track("second"));
  adapter.convert(track("third"));

  expect(adapter.wait(second)).toBe("second");
  expect(calls).toEqual(["first", "second"]);
  expect(first.status).toBe("fulfilled");
});

test("is followed by an adapter other than the one that scheduled it", () => {
  const executor = jest.fn(() => "shared");
  const deferred = new Deferred(executor);
  const first = new SyncPromiseAdapter();
  const second = new SyncPromiseAdapter();

  const firstPromise = first.convert(deferred);
  expect(first.wait(firstPromise)).toBe("shared");

  const secondPromise = second.convert(deferred);

  expect(secondPromise).not.toBe(firstPromise);
  expect(secondPromise.queue).toBe(second.queue);
  expect(second.wait(secondPromise)).toBe("shared");
  expect(executor).toHaveBeenCalledTimes(1);
});
