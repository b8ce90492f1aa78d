// node_templates: type lookup, property merge, relationships and operations

import { CONTAINED_IN_RELATIONSHIP_TYPE } from "../constants.js";
import {
  DslLogicError,
  ERROR_CODE_MULTIPLE_CONTAINED_IN,
  ERROR_CODE_NODE_OPERATION_PLUGIN,
  ERROR_CODE_NO_TYPE_DEFINITION,
  ERROR_CODE_RELATIONSHIP_OPERATION_PLUGIN,
  ERROR_CODE_SELF_RELATIONSHIP,
  ERROR_CODE_UNKNOWN_RELATIONSHIP_TARGET,
  ERROR_CODE_UNKNOWN_RELATIONSHIP_TYPE,
} from "../errors.js";
import type { ElementType } from "../framework/element.js";
import { requirement } from "../framework/requirements.js";
import { FunctionRegistry } from "../functions/function.js";
import { dictOf, leaf, listOf, record } from "../framework/schema.js";
import type {
  PlanNodeTemplate,
  PlanOperation,
  PlanPlugin,
  PlanRelationship,
  RawMap,
  RawValue,
} from "../model.js";
import {
  mergeSchemaAndInstanceProperties,
  type DataTypes,
} from "../properties.js";
import { DATA_TYPE, DataTypeDefinition, toDataTypes } from "./data-types.js";
import {
  allValues,
  asMap,
  byName,
  instancesOf,
  siblingNames,
} from "./helpers.js";
import { mergeNodeTypeAndNodeTemplateInterfaces } from "./interfaces.js";
import {
  processInterfaces,
  toInterfaces,
  type MappingOptions,
} from "./operation.js";
import { PLUGIN, PluginDefinition, toPlugins } from "./plugins.js";
import {
  NODE_TYPE,
  NodeTypeDefinition,
  RELATIONSHIP,
  RelationshipDefinition,
} from "./types.js";

export const NODE_TEMPLATE = "NodeTemplate";

export class NodeTemplateDefinition implements PlanNodeTemplate {
  readonly id: string;

  constructor(
    readonly name: string,
    readonly type: string,
    readonly type_hierarchy: string[],
    readonly properties: RawMap,
    readonly operations: Record<string, PlanOperation>,
    readonly relationships: PlanRelationship[],
    readonly plugins: string[]
  ) {
    this.id = name;
  }
}

interface TemplateContext {
  nodeName: string;
  nodeNames: readonly string[];
  relationshipTypes: ReadonlyMap<string, RelationshipDefinition>;
  dataTypes: DataTypes;
  plugins: Readonly<Record<string, PlanPlugin>>;
  resourceBase: string | null;
  functions: FunctionRegistry | undefined;
}

function parseRelationship(
  raw: RawValue,
  index: number,
  ctx: TemplateContext
): PlanRelationship {
  const map = asMap(raw);
  const typeName = String(map["type"]);
  const target = String(map["target"]);
  const label = `Relationship ${index} of node '${ctx.nodeName}'`;

  const relationshipType = ctx.relationshipTypes.get(typeName);
  if (!relationshipType) {
    throw new DslLogicError(
      ERROR_CODE_UNKNOWN_RELATIONSHIP_TYPE,
      `${label} has an undefined relationship type '${typeName}'`
    );
  }
  if (target === ctx.nodeName) {
    throw new DslLogicError(
      ERROR_CODE_SELF_RELATIONSHIP,
      `${label} targets its own node template; ` +
        "a node template cannot relate to itself"
    );
  }
  if (!ctx.nodeNames.includes(target)) {
    throw new DslLogicError(
      ERROR_CODE_UNKNOWN_RELATIONSHIP_TARGET,
      `${label} targets an undefined node template '${target}'`
    );
  }

  const properties = mergeSchemaAndInstanceProperties(
    asMap(map["properties"]),
    relationshipType.properties,
    {
      dataTypes: ctx.dataTypes,
      owner: `${ctx.nodeName}.relationships[${index}]`,
      functions: ctx.functions,
      undefinedMessage: (owner, property) =>
        `'${owner}' relationship '${property}' property is not part of ` +
        `the derived type properties schema`,
      missingMessage: (owner, property) =>
        `'${owner}' relationship does not provide a value for mandatory ` +
        `'${property}' property which is part of its type schema`,
    }
  );

  const options: MappingOptions = {
    plugins: ctx.plugins,
    errorCode: ERROR_CODE_RELATIONSHIP_OPERATION_PLUGIN,
    resourceBase: ctx.resourceBase,
  };
  return {
    type: typeName,
    target_id: target,
    type_hierarchy: [...relationshipType.typeHierarchy],
    properties,
    source_operations: processInterfaces(
      mergeNodeTypeAndNodeTemplateInterfaces(
        relationshipType.sourceInterfaces,
        toInterfaces(map["source_interfaces"], "template")
      ),
      options
    ),
    target_operations: processInterfaces(
      mergeNodeTypeAndNodeTemplateInterfaces(
        relationshipType.targetInterfaces,
        toInterfaces(map["target_interfaces"], "template")
      ),
      options
    ),
  };
}

function checkSingleContainer(
  nodeName: string,
  relationships: readonly PlanRelationship[]
): void {
  const containers = relationships.filter((r) =>
    r.type_hierarchy.includes(CONTAINED_IN_RELATIONSHIP_TYPE)
  );
  if (containers.length <= 1) return;
  const types = containers.map((r) => r.type);
  const error = new DslLogicError(
    ERROR_CODE_MULTIPLE_CONTAINED_IN,
    `Node '${nodeName}' has more than one relationship derived from ` +
      `'${CONTAINED_IN_RELATIONSHIP_TYPE}': [${types.join(", ")}]`
  );
  error.relationshipTypes = types;
  throw error;
}

/** Distinct plugins mapped by the node's operations and its relationships. */
function usedPlugins(
  operations: Record<string, PlanOperation>,
  relationships: readonly PlanRelationship[]
): string[] {
  const all = [
    ...Object.values(operations),
    ...relationships.flatMap((r) => [
      ...Object.values(r.source_operations),
      ...Object.values(r.target_operations),
    ]),
  ];
  const plugins = all.map((op) => op.plugin).filter((plugin) => plugin !== "");
  return [...new Set(plugins)];
}

export const nodeTemplateElements: ElementType[] = [
  { name: "NodeTemplateType", schema: leaf("string"), required: true },
  { name: "NodeTemplateProperties", schema: leaf("dict") },
  {
    name: "NodeTemplateRelationshipType",
    schema: leaf("string"),
    required: true,
  },
  {
    name: "NodeTemplateRelationshipTarget",
    schema: leaf("string"),
    required: true,
  },
  {
    name: "NodeTemplateRelationship",
    schema: record({
      type: "NodeTemplateRelationshipType",
      target: "NodeTemplateRelationshipTarget",
      properties: "NodeTemplateProperties",
      source_interfaces: "NodeTemplateInterfaces",
      target_interfaces: "NodeTemplateInterfaces",
    }),
  },
  {
    name: "NodeTemplateRelationships",
    schema: listOf("NodeTemplateRelationship"),
  },
  {
    name: NODE_TEMPLATE,
    schema: record({
      type: "NodeTemplateType",
      properties: "NodeTemplateProperties",
      interfaces: "NodeTemplateInterfaces",
      relationships: "NodeTemplateRelationships",
    }),
    requires: {
      [NODE_TYPE]: [allValues("node_types")],
      [RELATIONSHIP]: [allValues("relationship_types")],
      [DATA_TYPE]: [allValues("data_types")],
      [PLUGIN]: [allValues("plugins")],
      inputs: [
        requirement("resource_base", { required: false }),
        requirement("functions", { required: false }),
      ],
    },
    parse(element, args) {
      const raw = asMap(element.initialValue);
      const nodeName = String(element.name);
      const typeName = String(raw["type"]);
      const nodeTypes = byName(
        instancesOf(args["node_types"], NodeTypeDefinition, "node_types")
      );
      const nodeType = nodeTypes.get(typeName);
      if (!nodeType) {
        const existing = [...nodeTypes.keys()].join(", ");
        throw new DslLogicError(
          ERROR_CODE_NO_TYPE_DEFINITION,
          `Could not locate node type: '${typeName}'; ` +
            `existing types: [${existing}]`
        );
      }

      const resourceBase = args["resource_base"];
      const functions = args["functions"];
      const ctx: TemplateContext = {
        nodeName,
        nodeNames: siblingNames(element),
        relationshipTypes: byName(
          instancesOf(
            args["relationship_types"],
            RelationshipDefinition,
            "relationship_types"
          )
        ),
        dataTypes: toDataTypes(
          instancesOf(args["data_types"], DataTypeDefinition, "data_types")
        ),
        plugins: toPlugins(
          instancesOf(args["plugins"], PluginDefinition, "plugins")
        ),
        resourceBase: typeof resourceBase === "string" ? resourceBase : null,
        functions:
          functions instanceof FunctionRegistry ? functions : undefined,
      };

      const properties = mergeSchemaAndInstanceProperties(
        asMap(raw["properties"]),
        nodeType.properties,
        {
          dataTypes: ctx.dataTypes,
          owner: nodeName,
          functions: ctx.functions,
          undefinedMessage: (owner, property) =>
            `'${owner}' node '${property}' property is not part of ` +
            "the derived type properties schema",
          missingMessage: (owner, property) =>
            `'${owner}' node does not provide a value for mandatory ` +
            `'${property}' property which is part of its type schema`,
        }
      );

      const operations = processInterfaces(
        mergeNodeTypeAndNodeTemplateInterfaces(
          nodeType.interfaces,
          toInterfaces(raw["interfaces"], "template")
        ),
        {
          plugins: ctx.plugins,
          errorCode: ERROR_CODE_NODE_OPERATION_PLUGIN,
          resourceBase: ctx.resourceBase,
        }
      );

      const rawRelationships = raw["relationships"];
      const relationships = Array.isArray(rawRelationships)
        ? rawRelationships.map((r, index) => parseRelationship(r, index, ctx))
        : [];
      checkSingleContainer(nodeName, relationships);

      return new NodeTemplateDefinition(
        nodeName,
        typeName,
        [...nodeType.typeHierarchy],
        properties,
        operations,
        relationships,
        usedPlugins(operations, relationships)
      );
    },
  },
  { name: "NodeTemplates", schema: dictOf(NODE_TEMPLATE) },
];
