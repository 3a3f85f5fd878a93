import type {
  DocumentNode,
  ExecutionResult,
  FieldNode,
  GraphQLAbstractType,
  GraphQLField,
  GraphQLFieldResolver,
  GraphQLLeafType,
  GraphQLList,
  GraphQLObjectType,
  GraphQLOutputType,
  GraphQLResolveInfo,
  GraphQLSchema,
  GraphQLTypeResolver,
} from "graphql";
import {
  getArgumentValues,
  GraphQLError,
  isAbstractType,
  isLeafType,
  isListType,
  isNonNullType,
  isObjectType,
  locatedError,
  OperationTypeNode,
  responsePathAsArray,
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
} from "graphql";

import type { PromiseAdapter, PromiseOrValue } from "../promise/index.js";
import { SyncPromise, SyncPromiseAdapter } from "../promise/index.js";
import {
  isNonNullObject,
  maybeFreeze,
  stringifyForDisplay,
} from "../utilities/internal/index.js";
import { newInvariantError } from "../utilities/invariant/index.js";

import { collectFields, collectSubfields } from "./collectFields.js";
import type {
  ExecutionContext,
  FieldsByResponseKey,
} from "./ExecutionContext.js";
import { buildExecutionContext } from "./ExecutionContext.js";

type Path = GraphQLResolveInfo["path"];

interface ObjMap {
  [key: string]: unknown;
}

export declare namespace execute {
  export interface Options {
    schema: GraphQLSchema;
    document: DocumentNode;
    rootValue?: unknown;
    contextValue?: unknown;
    variableValues?: { readonly [variable: string]: unknown } | null;
    operationName?: string | null;
    /**
     * Used for fields that do not define a `resolve` function. Defaults to
     * reading the property with the field's name from the parent value.
     */
    fieldResolver?: GraphQLFieldResolver<unknown, unknown> | null;
    /**
     * Used for abstract types that do not define `resolveType`. Defaults to
     * `__typename` on the value, then to the `isTypeOf` of each possible
     * type.
     */
    typeResolver?: GraphQLTypeResolver<unknown, unknown> | null;
    /**
     * Creates every promise of this execution. A new `SyncPromiseAdapter` is
     * used when omitted.
     */
    promiseAdapter?: PromiseAdapter;
  }
}

export declare namespace executeSync {
  export type Options = execute.Options;
}

/**
 * Executes a parsed operation against a schema.
 *
 * The returned promise is already fulfilled when every resolver returned a
 * plain value. When some of them returned a thenable, it stays pending until
 * the adapter's queue is drained, for example with
 * `SyncPromiseAdapter.wait`.
 *
 * The document is expected to be valid. Use `graphql` to parse and validate
 * a request first.
 */
export function execute(
  options: execute.Options
): SyncPromise<ExecutionResult> {
  const promiseAdapter = options.promiseAdapter ?? new SyncPromiseAdapter();
  const exeContext = buildExecutionContext({ ...options, promiseAdapter });

  if (!("schema" in exeContext)) {
    return promiseAdapter.createFulfilled<ExecutionResult>({
      errors: exeContext,
    });
  }

  return executeOperation(exeContext);
}

/**
 * Executes an operation and drains the adapter until the result is
 * available.
 *
 * Throws a `DeadlockError` if a resolver returned a thenable the adapter
 * cannot settle, such as a native `Promise`.
 */
export function executeSync(options: executeSync.Options): ExecutionResult {
  const promiseAdapter = options.promiseAdapter ?? new SyncPromiseAdapter();
  return promiseAdapter.wait(execute({ ...options, promiseAdapter }));
}

function executeOperation(
  exeContext: ExecutionContext
): SyncPromise<ExecutionResult> {
  const { schema, operation, rootValue, promiseAdapter, errors } = exeContext;

  let result: PromiseOrValue<ObjMap>;
  try {
    const rootType = schema.getRootType(operation.operation);
    if (rootType == null) {
      throw new GraphQLError(
        `Schema is not configured to execute ${operation.operation} operation.`,
        { nodes: operation }
      );
    }

    const rootFields = collectFields(
      exeContext,
      rootType,
      operation.selectionSet
    );

    result =
      operation.operation === OperationTypeNode.MUTATION ?
        executeFieldsSerially(
          exeContext,
          rootType,
          rootValue,
          undefined,
          rootFields
        )
      : executeFields(exeContext, rootType, rootValue, undefined, rootFields);
  } catch (error) {
    errors.push(asGraphQLError(error, operation));
    return promiseAdapter.createFulfilled(buildResponse(null, errors));
  }

  if (result instanceof SyncPromise) {
    return promiseAdapter.then(
      result,
      (data) => buildResponse(data, errors),
      (error) => {
        errors.push(asGraphQLError(error, operation));
        return buildResponse(null, errors);
      }
    );
  }

  return promiseAdapter.createFulfilled(buildResponse(result, errors));
}

function asGraphQLError(
  error: unknown,
  operation: ExecutionContext["operation"]
): GraphQLError {
  return error instanceof GraphQLError ? error : (
      locatedError(error, [operation])
    );
}

function buildResponse(
  data: ObjMap | null,
  errors: ReadonlyArray<GraphQLError>
): ExecutionResult {
  // Fields left pending by a null at the root can still push errors.
  return errors.length === 0 ? { data } : { data, errors: errors.slice() };
}

/**
 * Resolves every field of a selection set. Fields whose value is already
 * known are returned as a plain object; as soon as one of them is pending,
 * the whole object is assembled once all of them have settled.
 */
function executeFields(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  fields: FieldsByResponseKey
): PromiseOrValue<ObjMap> {
  const { promiseAdapter } = exeContext;
  const results: ObjMap = Object.create(null);
  let containsPromise = false;

  for (const [responseName, fieldNodes] of fields) {
    const fieldPath = addPath(path, responseName, parentType.name);
    const result = executeField(
      exeContext,
      parentType,
      sourceValue,
      fieldNodes,
      fieldPath
    );

    if (result === undefined) {
      continue;
    }

    results[responseName] = result;
    if (result instanceof SyncPromise) {
      containsPromise = true;
    }
  }

  if (!containsPromise) {
    return maybeFreeze(results);
  }

  const responseNames = Object.keys(results);
  return promiseAdapter.then(
    promiseAdapter.all(
      responseNames.map((responseName) => {
        const value = results[responseName];
        return value instanceof SyncPromise ? value : (
            promiseAdapter.createFulfilled(value)
          );
      })
    ),
    (values) => {
      const resolved: ObjMap = Object.create(null);
      responseNames.forEach((responseName, index) => {
        resolved[responseName] = values[index];
      });
      return maybeFreeze(resolved);
    }
  );
}

/**
 * Resolves the fields of a mutation one after another: a field starts only
 * once the previous one has settled.
 */
function executeFieldsSerially(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  fields: FieldsByResponseKey
): PromiseOrValue<ObjMap> {
  const { promiseAdapter } = exeContext;
  let results: PromiseOrValue<ObjMap> = Object.create(null);

  for (const [responseName, fieldNodes] of fields) {
    const fieldPath = addPath(path, responseName, parentType.name);

    const addField = (fieldResults: ObjMap): PromiseOrValue<ObjMap> => {
      const result = executeField(
        exeContext,
        parentType,
        sourceValue,
        fieldNodes,
        fieldPath
      );

      if (result === undefined) {
        return fieldResults;
      }

      if (result instanceof SyncPromise) {
        return promiseAdapter.then(result, (resolved) => {
          fieldResults[responseName] = resolved;
          return fieldResults;
        });
      }

      fieldResults[responseName] = result;
      return fieldResults;
    };

    results =
      results instanceof SyncPromise ?
        promiseAdapter.then(results, addField)
      : addField(results);
  }

  return results instanceof SyncPromise ?
      promiseAdapter.then(results, (fieldResults) =>
        maybeFreeze(fieldResults)
      )
    : maybeFreeze(results);
}

/**
 * Resolves a single field and completes its value. Errors are caught here,
 * so a failing field never affects its siblings.
 *
 * Returns `undefined` for fields the parent type does not define.
 */
function executeField(
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  source: unknown,
  fieldNodes: ReadonlyArray<FieldNode>,
  path: Path
): PromiseOrValue<unknown> {
  const { promiseAdapter } = exeContext;
  const fieldDef = getFieldDef(exeContext.schema, parentType, fieldNodes[0]);
  if (!fieldDef) {
    return;
  }

  const returnType = fieldDef.type;
  const resolveFn = fieldDef.resolve ?? exeContext.fieldResolver;
  const info = buildResolveInfo(
    exeContext,
    fieldDef,
    fieldNodes,
    parentType,
    path
  );

  try {
    const args = getArgumentValues(
      fieldDef,
      fieldNodes[0],
      exeContext.variableValues
    );
    const result = resolveFn(source, args, exeContext.contextValue, info);

    const completed =
      promiseAdapter.isThenable(result) ?
        promiseAdapter.then(promiseAdapter.convert(result), (resolved) =>
          completeValue(exeContext, returnType, fieldNodes, info, path, resolved)
        )
      : completeValue(exeContext, returnType, fieldNodes, info, path, result);

    if (completed instanceof SyncPromise) {
      return promiseAdapter.then(completed, undefined, (rawError) =>
        handleFieldError(rawError, returnType, fieldNodes, path, exeContext)
      );
    }
    return completed;
  } catch (rawError) {
    return handleFieldError(rawError, returnType, fieldNodes, path, exeContext);
  }
}

function buildResolveInfo(
  exeContext: ExecutionContext,
  fieldDef: GraphQLField<unknown, unknown>,
  fieldNodes: ReadonlyArray<FieldNode>,
  parentType: GraphQLObjectType,
  path: Path
): GraphQLResolveInfo {
  return {
    fieldName: fieldDef.name,
    fieldNodes,
    returnType: fieldDef.type,
    parentType,
    path,
    schema: exeContext.schema,
    fragments: exeContext.fragments,
    rootValue: exeContext.rootValue,
    operation: exeContext.operation,
    variableValues: exeContext.variableValues,
  };
}

function handleFieldError(
  rawError: unknown,
  returnType: GraphQLOutputType,
  fieldNodes: ReadonlyArray<FieldNode>,
  path: Path,
  exeContext: ExecutionContext
): null {
  const error = locatedError(rawError, fieldNodes, responsePathAsArray(path));

  // Let the parent field decide what to do with a null it may not hold.
  if (isNonNullType(returnType)) {
    throw error;
  }

  exeContext.errors.push(error);
  return null;
}

function completeValue(
  exeContext: ExecutionContext,
  returnType: GraphQLOutputType,
  fieldNodes: ReadonlyArray<FieldNode>,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown
): PromiseOrValue<unknown> {
  if (result instanceof Error) {
    throw result;
  }

  if (isNonNullType(returnType)) {
    const completed = completeValue(
      exeContext,
      returnType.ofType,
      fieldNodes,
      info,
      path,
      result
    );
    if (completed === null) {
      throw new Error(
        `Cannot return null for non-nullable field ${info.parentType.name}.${info.fieldName}.`
      );
    }
    return completed;
  }

  if (result == null) {
    return null;
  }

  if (isListType(returnType)) {
    return completeListValue(
      exeContext,
      returnType,
      fieldNodes,
      info,
      path,
      result
    );
  }

  if (isLeafType(returnType)) {
    return completeLeafValue(returnType, result);
  }

  if (isAbstractType(returnType)) {
    return completeAbstractValue(
      exeContext,
      returnType,
      fieldNodes,
      info,
      path,
      result
    );
  }

  if (isObjectType(returnType)) {
    return completeObjectValue(
      exeContext,
      returnType,
      fieldNodes,
      info,
      path,
      result
    );
  }

  throw newInvariantError(
    "Cannot complete value of unexpected output type: %s",
    String(returnType)
  );
}

function completeListValue(
  exeContext: ExecutionContext,
  returnType: GraphQLList<GraphQLOutputType>,
  fieldNodes: ReadonlyArray<FieldNode>,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown
): PromiseOrValue<unknown[]> {
  if (!isIterableObject(result)) {
    throw new GraphQLError(
      `Expected Iterable, but did not find one for field "${info.parentType.name}.${info.fieldName}".`
    );
  }

  const { promiseAdapter } = exeContext;
  const itemType = returnType.ofType;
  let containsPromise = false;

  const completedResults = Array.from(result, (item, index) => {
    const itemPath = addPath(path, index, undefined);
    const completedItem = completeListItemValue(
      exeContext,
      itemType,
      fieldNodes,
      info,
      itemPath,
      item
    );
    if (completedItem instanceof SyncPromise) {
      containsPromise = true;
    }
    return completedItem;
  });

  if (!containsPromise) {
    return maybeFreeze(completedResults);
  }

  return promiseAdapter.then(
    promiseAdapter.all(
      completedResults.map((item) =>
        item instanceof SyncPromise ? item : (
          promiseAdapter.createFulfilled(item)
        )
      )
    ),
    (values) => maybeFreeze(values)
  );
}

function completeListItemValue(
  exeContext: ExecutionContext,
  itemType: GraphQLOutputType,
  fieldNodes: ReadonlyArray<FieldNode>,
  info: GraphQLResolveInfo,
  itemPath: Path,
  item: unknown
): PromiseOrValue<unknown> {
  const { promiseAdapter } = exeContext;

  try {
    const completedItem =
      promiseAdapter.isThenable(item) ?
        promiseAdapter.then(promiseAdapter.convert(item), (resolved) =>
          completeValue(
            exeContext,
            itemType,
            fieldNodes,
            info,
            itemPath,
            resolved
          )
        )
      : completeValue(exeContext, itemType, fieldNodes, info, itemPath, item);

    if (completedItem instanceof SyncPromise) {
      return promiseAdapter.then(completedItem, undefined, (rawError) =>
        handleFieldError(rawError, itemType, fieldNodes, itemPath, exeContext)
      );
    }
    return completedItem;
  } catch (rawError) {
    return handleFieldError(
      rawError,
      itemType,
      fieldNodes,
      itemPath,
      exeContext
    );
  }
}

function completeLeafValue(
  returnType: GraphQLLeafType,
  result: unknown
): unknown {
  const serializedResult = returnType.serialize(result);
  if (serializedResult == null) {
    throw new Error(
      `Expected \`${returnType.name}.serialize(${stringifyForDisplay(
        result
      )})\` to return non-nullable value, returned: ${stringifyForDisplay(
        serializedResult
      )}`
    );
  }
  return serializedResult;
}

function completeAbstractValue(
  exeContext: ExecutionContext,
  returnType: GraphQLAbstractType,
  fieldNodes: ReadonlyArray<FieldNode>,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown
): PromiseOrValue<unknown> {
  const { promiseAdapter, contextValue } = exeContext;
  const resolveTypeFn = returnType.resolveType ?? exeContext.typeResolver;
  const runtimeType: PromiseOrValue<unknown> =
    resolveTypeFn ?
      resolveTypeFn(result, contextValue, info, returnType)
    : resolveTypeFromValue(exeContext, result, info, returnType);

  const complete = (runtimeTypeName: unknown) =>
    completeObjectValue(
      exeContext,
      ensureValidRuntimeType(
        runtimeTypeName,
        exeContext,
        returnType,
        fieldNodes,
        info,
        result
      ),
      fieldNodes,
      info,
      path,
      result
    );

  if (promiseAdapter.isThenable(runtimeType)) {
    return promiseAdapter.then(promiseAdapter.convert(runtimeType), complete);
  }

  return complete(runtimeType);
}

/**
 * Picks the runtime type of an abstract value from its `__typename`, or else
 * from the first possible type whose `isTypeOf` accepts it. `isTypeOf` may
 * return a thenable, in which case every check is waited for.
 */
function resolveTypeFromValue(
  exeContext: ExecutionContext,
  value: unknown,
  info: GraphQLResolveInfo,
  abstractType: GraphQLAbstractType
): PromiseOrValue<string | undefined> {
  const typename = isNonNullObject(value) ? value.__typename : undefined;
  if (typeof typename === "string") {
    return typename;
  }

  const { promiseAdapter, contextValue } = exeContext;
  const possibleTypes = info.schema.getPossibleTypes(abstractType);
  const pendingTypes: GraphQLObjectType[] = [];
  const pendingChecks: Array<SyncPromise<unknown>> = [];

  for (const type of possibleTypes) {
    if (type.isTypeOf) {
      const isTypeOfResult = type.isTypeOf(value, contextValue, info);

      if (promiseAdapter.isThenable(isTypeOfResult)) {
        pendingTypes.push(type);
        pendingChecks.push(promiseAdapter.convert(isTypeOfResult));
      } else if (isTypeOfResult) {
        return type.name;
      }
    }
  }

  if (pendingChecks.length === 0) {
    return undefined;
  }

  return promiseAdapter.then(promiseAdapter.all(pendingChecks), (results) => {
    const index = results.findIndex(Boolean);
    return index < 0 ? undefined : pendingTypes[index].name;
  });
}

function ensureValidRuntimeType(
  runtimeTypeName: unknown,
  exeContext: ExecutionContext,
  returnType: GraphQLAbstractType,
  fieldNodes: ReadonlyArray<FieldNode>,
  info: GraphQLResolveInfo,
  result: unknown
): GraphQLObjectType {
  if (runtimeTypeName == null) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}". Either the "${returnType.name}" type should provide a "resolveType" function or each possible type should provide an "isTypeOf" function.`,
      { nodes: fieldNodes }
    );
  }

  if (typeof runtimeTypeName !== "string") {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}" with value ${stringifyForDisplay(result)}, received "${stringifyForDisplay(runtimeTypeName)}".`,
      { nodes: fieldNodes }
    );
  }

  const runtimeType = exeContext.schema.getType(runtimeTypeName);
  if (runtimeType == null) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" was resolved to a type "${runtimeTypeName}" that does not exist inside the schema.`,
      { nodes: fieldNodes }
    );
  }

  if (!isObjectType(runtimeType)) {
    throw new GraphQLError(
      `Abstract type "${returnType.name}" was resolved to a non-object type "${runtimeTypeName}".`,
      { nodes: fieldNodes }
    );
  }

  if (!exeContext.schema.isSubType(returnType, runtimeType)) {
    throw new GraphQLError(
      `Runtime Object type "${runtimeType.name}" is not a possible type for "${returnType.name}".`,
      { nodes: fieldNodes }
    );
  }

  return runtimeType;
}

function completeObjectValue(
  exeContext: ExecutionContext,
  returnType: GraphQLObjectType,
  fieldNodes: ReadonlyArray<FieldNode>,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown
): PromiseOrValue<ObjMap> {
  const { promiseAdapter } = exeContext;

  const executeSubfields = () =>
    executeFields(
      exeContext,
      returnType,
      result,
      path,
      collectSubfields(exeContext, returnType, fieldNodes)
    );

  if (returnType.isTypeOf) {
    const isTypeOf = returnType.isTypeOf(result, exeContext.contextValue, info);

    if (promiseAdapter.isThenable(isTypeOf)) {
      return promiseAdapter.then(
        promiseAdapter.convert(isTypeOf),
        (resolvedIsTypeOf) => {
          if (!resolvedIsTypeOf) {
            throw invalidReturnTypeError(returnType, result, fieldNodes);
          }
          return executeSubfields();
        }
      );
    }

    if (!isTypeOf) {
      throw invalidReturnTypeError(returnType, result, fieldNodes);
    }
  }

  return executeSubfields();
}

function invalidReturnTypeError(
  returnType: GraphQLObjectType,
  result: unknown,
  fieldNodes: ReadonlyArray<FieldNode>
): GraphQLError {
  return new GraphQLError(
    `Expected value of type "${returnType.name}" but got: ${stringifyForDisplay(
      result
    )}.`,
    { nodes: fieldNodes }
  );
}

function getFieldDef(
  schema: GraphQLSchema,
  parentType: GraphQLObjectType,
  fieldNode: FieldNode
): GraphQLField<unknown, unknown> | undefined {
  const fieldName = fieldNode.name.value;

  if (
    fieldName === SchemaMetaFieldDef.name &&
    schema.getQueryType() === parentType
  ) {
    return SchemaMetaFieldDef;
  } else if (
    fieldName === TypeMetaFieldDef.name &&
    schema.getQueryType() === parentType
  ) {
    return TypeMetaFieldDef;
  } else if (fieldName === TypeNameMetaFieldDef.name) {
    return TypeNameMetaFieldDef;
  }
  return parentType.getFields()[fieldName];
}

function addPath(
  prev: Path | undefined,
  key: string | number,
  typename: string | undefined
): Path {
  return { prev, key, typename };
}

function isIterableObject(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === "function"
  );
}
