import type {
  DocumentNode,
  FieldNode,
  GraphQLFieldResolver,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLTypeResolver,
  OperationDefinitionNode,
} from "graphql";
import {
  assertValidSchema,
  defaultFieldResolver,
  getVariableValues,
  GraphQLError,
  Kind,
} from "graphql";

import type { PromiseAdapter } from "../promise/index.js";
import type { FragmentMap } from "../utilities/internal/index.js";
import {
  createFragmentMap,
  getFragmentDefinitions,
} from "../utilities/internal/index.js";

export type FieldsByResponseKey = Map<string, ReadonlyArray<FieldNode>>;

/**
 * Everything a single execution needs to carry through the tree walk.
 *
 * @internal
 */
export interface ExecutionContext {
  schema: GraphQLSchema;
  fragments: FragmentMap;
  rootValue: unknown;
  contextValue: unknown;
  operation: OperationDefinitionNode;
  variableValues: { [variable: string]: unknown };
  fieldResolver: GraphQLFieldResolver<unknown, unknown>;
  // Falls back to an `isTypeOf` lookup that goes through the adapter.
  typeResolver: GraphQLTypeResolver<unknown, unknown> | undefined;
  promiseAdapter: PromiseAdapter;
  errors: GraphQLError[];
  subfieldCache: WeakMap<
    ReadonlyArray<FieldNode>,
    Map<GraphQLObjectType, FieldsByResponseKey>
  >;
}

export declare namespace buildExecutionContext {
  export interface Options {
    schema: GraphQLSchema;
    document: DocumentNode;
    rootValue?: unknown;
    contextValue?: unknown;
    variableValues?: { readonly [variable: string]: unknown } | null;
    operationName?: string | null;
    fieldResolver?: GraphQLFieldResolver<unknown, unknown> | null;
    typeResolver?: GraphQLTypeResolver<unknown, unknown> | null;
    promiseAdapter: PromiseAdapter;
  }
}

/**
 * Picks the operation to run and coerces its variables.
 *
 * Returns the errors instead of a context when execution cannot start.
 * Throws if the schema itself is invalid, since that is a programming error
 * rather than a problem with the request.
 *
 * @internal
 */
export function buildExecutionContext(
  options: buildExecutionContext.Options
): ReadonlyArray<GraphQLError> | ExecutionContext {
  const { schema, document, operationName } = options;

  assertValidSchema(schema);

  let operation: OperationDefinitionNode | undefined;
  for (const definition of document.definitions) {
    if (definition.kind !== Kind.OPERATION_DEFINITION) {
      continue;
    }
    if (operationName == null) {
      if (operation !== undefined) {
        return [
          new GraphQLError(
            "Must provide operation name if query contains multiple operations."
          ),
        ];
      }
      operation = definition;
    } else if (definition.name?.value === operationName) {
      operation = definition;
    }
  }

  if (!operation) {
    if (operationName != null) {
      return [
        new GraphQLError(`Unknown operation named "${operationName}".`),
      ];
    }
    return [new GraphQLError("Must provide an operation.")];
  }

  const coercedVariableValues = getVariableValues(
    schema,
    operation.variableDefinitions ?? [],
    options.variableValues ?? {},
    { maxErrors: 50 }
  );

  if (coercedVariableValues.errors) {
    return coercedVariableValues.errors;
  }

  return {
    schema,
    fragments: createFragmentMap(getFragmentDefinitions(document)),
    rootValue: options.rootValue,
    contextValue: options.contextValue,
    operation,
    variableValues: coercedVariableValues.coerced,
    fieldResolver: options.fieldResolver ?? defaultFieldResolver,
    typeResolver: options.typeResolver ?? undefined,
    promiseAdapter: options.promiseAdapter,
    errors: [],
    subfieldCache: new WeakMap(),
  };
}
