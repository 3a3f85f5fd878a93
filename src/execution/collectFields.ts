import type {
  FieldNode,
  FragmentDefinitionNode,
  FragmentSpreadNode,
  GraphQLObjectType,
  GraphQLSchema,
  InlineFragmentNode,
  SelectionSetNode,
} from "graphql";
import {
  getDirectiveValues,
  GraphQLIncludeDirective,
  GraphQLSkipDirective,
  isAbstractType,
  Kind,
  typeFromAST,
} from "graphql";

import type {
  ExecutionContext,
  FieldsByResponseKey,
} from "./ExecutionContext.js";

type CollectContext = Pick<
  ExecutionContext,
  "schema" | "fragments" | "variableValues"
>;

/**
 * Groups the fields of a selection set, including those reached through
 * fragments, by the key they will have in the response.
 *
 * @internal
 */
export function collectFields(
  exeContext: CollectContext,
  runtimeType: GraphQLObjectType,
  selectionSet: SelectionSetNode
): FieldsByResponseKey {
  const fields = new Map<string, FieldNode[]>();
  collectFieldsImpl(exeContext, runtimeType, selectionSet, fields, new Set());
  return fields;
}

/**
 * Merges the sub-selections of every node that shares a response key.
 * Results are cached per execution, since every item of a list hits the same
 * field nodes.
 *
 * @internal
 */
export function collectSubfields(
  exeContext: CollectContext & Pick<ExecutionContext, "subfieldCache">,
  returnType: GraphQLObjectType,
  fieldNodes: ReadonlyArray<FieldNode>
): FieldsByResponseKey {
  let byType = exeContext.subfieldCache.get(fieldNodes);
  if (!byType) {
    byType = new Map();
    exeContext.subfieldCache.set(fieldNodes, byType);
  }

  const cached = byType.get(returnType);
  if (cached) {
    return cached;
  }

  const subFieldNodes = new Map<string, FieldNode[]>();
  const visitedFragmentNames = new Set<string>();
  for (const node of fieldNodes) {
    if (node.selectionSet) {
      collectFieldsImpl(
        exeContext,
        returnType,
        node.selectionSet,
        subFieldNodes,
        visitedFragmentNames
      );
    }
  }

  byType.set(returnType, subFieldNodes);
  return subFieldNodes;
}

export function resultKeyNameFromField(field: FieldNode): string {
  return field.alias ? field.alias.value : field.name.value;
}

function collectFieldsImpl(
  exeContext: CollectContext,
  runtimeType: GraphQLObjectType,
  selectionSet: SelectionSetNode,
  fields: Map<string, FieldNode[]>,
  visitedFragmentNames: Set<string>
) {
  const { schema, fragments, variableValues } = exeContext;

  for (const selection of selectionSet.selections) {
    switch (selection.kind) {
      case Kind.FIELD: {
        if (!shouldInclude(selection, variableValues)) {
          continue;
        }
        const name = resultKeyNameFromField(selection);
        const fieldList = fields.get(name);
        if (fieldList !== undefined) {
          fieldList.push(selection);
        } else {
          fields.set(name, [selection]);
        }
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        if (
          !shouldInclude(selection, variableValues) ||
          !doesFragmentConditionMatch(schema, selection, runtimeType)
        ) {
          continue;
        }
        collectFieldsImpl(
          exeContext,
          runtimeType,
          selection.selectionSet,
          fields,
          visitedFragmentNames
        );
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const fragName = selection.name.value;
        if (
          visitedFragmentNames.has(fragName) ||
          !shouldInclude(selection, variableValues)
        ) {
          continue;
        }
        visitedFragmentNames.add(fragName);

        const fragment = fragments[fragName];
        if (
          !fragment ||
          !doesFragmentConditionMatch(schema, fragment, runtimeType)
        ) {
          continue;
        }
        collectFieldsImpl(
          exeContext,
          runtimeType,
          fragment.selectionSet,
          fields,
          visitedFragmentNames
        );
        break;
      }
    }
  }
}

function shouldInclude(
  node: FieldNode | FragmentSpreadNode | InlineFragmentNode,
  variableValues: ExecutionContext["variableValues"]
): boolean {
  const skip = getDirectiveValues(GraphQLSkipDirective, node, variableValues);
  if (skip?.if === true) {
    return false;
  }

  const include = getDirectiveValues(
    GraphQLIncludeDirective,
    node,
    variableValues
  );
  if (include?.if === false) {
    return false;
  }

  return true;
}

function doesFragmentConditionMatch(
  schema: GraphQLSchema,
  fragment: FragmentDefinitionNode | InlineFragmentNode,
  type: GraphQLObjectType
): boolean {
  const typeConditionNode = fragment.typeCondition;
  if (!typeConditionNode) {
    return true;
  }

  const conditionalType = typeFromAST(schema, typeConditionNode);
  if (conditionalType === type) {
    return true;
  }

  if (isAbstractType(conditionalType)) {
    return schema.isSubType(conditionalType, type);
  }

  return false;
}
