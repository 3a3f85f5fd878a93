type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

const noOp = () => {};

/**
 * Silences a console method for the current test and records its calls.
 * Spies are restored after every test by the `restoreMocks` option.
 *
 * @internal
 */
export function spyOnConsole(method: ConsoleMethod) {
  return jest.spyOn(console, method).mockImplementation(noOp);
}
