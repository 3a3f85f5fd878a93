import { invariant as baseInvariant, InvariantError } from "ts-invariant";

import { stringifyForDisplay } from "../internal/stringifyForDisplay.js";

type LogFunction = {
  /**
   * Logs a `$level` message if the user used `setLogVerbosity` to set a
   * verbosity level of `$level` or lower (defaults to `"log"`).
   *
   * String substitutions like %s, %o, %d or %f are left to the console.
   */
  (message?: string, ...optionalParams: unknown[]): void;
};

type WrappedInvariant = {
  /**
   * Throws an `InvariantError` with the given message if the condition is
   * false.
   *
   * String substitutions with %s are supported and will also print
   * pretty-stringified objects. Excess `optionalParams` are swallowed.
   */
  (
    condition: unknown,
    message: string,
    ...optionalParams: unknown[]
  ): asserts condition;

  debug: LogFunction;
  log: LogFunction;
  warn: LogFunction;
  error: LogFunction;
};

const invariant: WrappedInvariant = Object.assign(
  function invariant(
    condition: unknown,
    message: string,
    ...args: unknown[]
  ): asserts condition {
    if (!condition) {
      baseInvariant(condition, formatMessage(message, args));
    }
  },
  {
    debug: baseInvariant.debug,
    log: baseInvariant.log,
    warn: baseInvariant.warn,
    error: baseInvariant.error,
  }
);

/**
 * Returns an InvariantError.
 *
 * String substitutions with %s are supported and will also print
 * pretty-stringified objects. Excess `optionalParams` are swallowed.
 */
function newInvariantError(message: string, ...optionalParams: unknown[]) {
  return new InvariantError(formatMessage(message, optionalParams));
}

function stringify(arg: unknown) {
  if (typeof arg == "string") {
    return arg;
  }

  return stringifyForDisplay(arg, 2).slice(0, 1000);
}

function formatMessage(message: string, args: unknown[]) {
  let index = 0;
  return message.replace(/%s/g, () =>
    index < args.length ? stringify(args[index++]) : "%s"
  );
}

export { invariant, InvariantError, newInvariantError };
