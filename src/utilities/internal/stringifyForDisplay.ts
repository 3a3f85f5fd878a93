/**
 * `JSON.stringify` for error messages: `undefined` values are printed as
 * `<undefined>` instead of being dropped, and values `JSON.stringify` rejects
 * (circular structures, `BigInt`s) as `<non-serializable>`.
 *
 * @internal
 */
export function stringifyForDisplay(value: unknown, space = 0): string {
  const undefId = `stringifyForDisplay:${Math.random().toString(36).slice(2)}`;
  let json: string | undefined;
  try {
    json = JSON.stringify(
      value,
      (_key, value: unknown) => {
        return value === void 0 ? undefId : value;
      },
      space
    );
  } catch {
    return "<non-serializable>";
  }

  return (json ?? String(value))
    .split(JSON.stringify(undefId))
    .join("<undefined>");
}
