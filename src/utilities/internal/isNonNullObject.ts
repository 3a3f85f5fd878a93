/** @internal */
export function isNonNullObject(
  obj: unknown
): obj is Record<string | number, unknown> {
  return obj !== null && typeof obj === "object";
}
