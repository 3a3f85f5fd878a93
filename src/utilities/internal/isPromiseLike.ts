/**
 * Checks for the minimal `then` contract shared by native promises,
 * `SyncPromise` and third-party thenables.
 *
 * @internal
 */
export function isPromiseLike<T>(
  value: T | PromiseLike<T>
): value is PromiseLike<T> {
  return hasCallableThen(value);
}

function hasCallableThen(value: unknown): boolean {
  return (
    ((typeof value === "object" && value !== null) ||
      typeof value === "function") &&
    typeof Reflect.get(value, "then") === "function"
  );
}
