import { __DEV__ } from "../globals/environment/index.js";

/**
 * Freezes `obj` itself, in development only. Values it refers to are left
 * alone.
 *
 * @internal
 */
export function maybeFreeze<T extends object>(obj: T): T {
  if (__DEV__ && !Object.isFrozen(obj)) {
    try {
      Object.freeze(obj);
    } catch (e) {
      // Typed arrays with elements cannot be frozen and throw a TypeError.
      if (!(e instanceof TypeError)) throw e;
    }
  }
  return obj;
}
