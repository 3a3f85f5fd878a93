import { setVerbosity } from "ts-invariant";

declare global {
  // Set to `false` before this package loads to disable development-only
  // checks and diagnostics.
  // eslint-disable-next-line no-var
  var __DEV__: boolean | undefined;
}

export const __DEV__ = (() => {
  // side effects in an IIFE
  const __DEV__: boolean = globalThis.__DEV__ !== false;
  setVerbosity(__DEV__ ? "log" : "silent");
  return __DEV__;
})();
