const BRAND = Symbol.for("graphql-sync-executor.error");

export function isBranded(error: unknown, name: string) {
  return (
    typeof error === "object" &&
    error !== null &&
    Reflect.get(error, BRAND) === name
  );
}

export function brand<T extends Error>(error: T) {
  Object.defineProperty(error, BRAND, {
    value: error.name,
    enumerable: false,
    writable: false,
    configurable: false,
  });
}
