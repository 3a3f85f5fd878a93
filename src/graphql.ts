import type {
  DocumentNode,
  ExecutionResult,
  ValidationRule,
} from "graphql";
import {
  GraphQLError,
  parse,
  Source,
  specifiedRules,
  validate,
  validateSchema,
} from "graphql";

import { execute } from "./execution/index.js";
import type { SyncPromise } from "./promise/index.js";
import { SyncPromiseAdapter } from "./promise/index.js";

export declare namespace graphql {
  export interface Options extends Omit<execute.Options, "document"> {
    /**
     * The request, either as text or already parsed.
     */
    source: string | Source | DocumentNode;
    /**
     * Rules the document is validated against before execution. Defaults to
     * every rule of the GraphQL specification.
     */
    validationRules?: ReadonlyArray<ValidationRule>;
  }
}

export declare namespace graphqlSync {
  export type Options = graphql.Options;
}

/**
 * Parses, validates and executes a request.
 *
 * Problems found before execution starts (an invalid schema, a syntax error,
 * a document that fails validation) are reported as `errors` of an already
 * fulfilled result without `data`.
 */
export function graphql(
  options: graphql.Options
): SyncPromise<ExecutionResult> {
  const { schema, source, validationRules = specifiedRules } = options;
  const promiseAdapter = options.promiseAdapter ?? new SyncPromiseAdapter();

  const schemaValidationErrors = validateSchema(schema);
  if (schemaValidationErrors.length > 0) {
    return promiseAdapter.createFulfilled<ExecutionResult>({
      errors: schemaValidationErrors,
    });
  }

  let document: DocumentNode;
  if (typeof source === "string" || source instanceof Source) {
    try {
      document = parse(source);
    } catch (syntaxError) {
      if (syntaxError instanceof GraphQLError) {
        return promiseAdapter.createFulfilled<ExecutionResult>({
          errors: [syntaxError],
        });
      }
      throw syntaxError;
    }
  } else {
    document = source;
  }

  const validationErrors = validate(schema, document, validationRules);
  if (validationErrors.length > 0) {
    return promiseAdapter.createFulfilled<ExecutionResult>({
      errors: validationErrors,
    });
  }

  return execute({ ...options, document, promiseAdapter });
}

/**
 * Like `graphql`, but drains the adapter and returns the result itself.
 */
export function graphqlSync(options: graphqlSync.Options): ExecutionResult {
  const promiseAdapter = options.promiseAdapter ?? new SyncPromiseAdapter();
  return promiseAdapter.wait(graphql({ ...options, promiseAdapter }));
}
