import type { ExecutionResult, FormattedExecutionResult } from "graphql";

/**
 * Turns an `ExecutionResult` into the shape sent over the wire: errors are
 * serialized with `GraphQLError#toJSON`, and keys the result does not have
 * are left out.
 */
export function formatExecutionResult<
  TData = Record<string, unknown>,
  TExtensions = Record<string, unknown>,
>(
  result: ExecutionResult<TData, TExtensions>
): FormattedExecutionResult<TData, TExtensions> {
  const formatted: FormattedExecutionResult<TData, TExtensions> = {};

  if (result.errors && result.errors.length > 0) {
    formatted.errors = result.errors.map((error) => error.toJSON());
  }
  if (result.data !== undefined) {
    formatted.data = result.data;
  }
  if (result.extensions !== undefined) {
    formatted.extensions = result.extensions;
  }

  return formatted;
}
