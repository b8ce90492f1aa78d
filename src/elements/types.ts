// node_types and relationships: derivation, merged schemas and interfaces

import {
  DslLogicError,
  ERROR_CODE_RELATIONSHIP_OPERATION_PLUGIN,
  ERROR_CODE_UNKNOWN_TYPE,
} from "../errors.js";
import type {
  Element,
  ElementType,
  RequirementValues,
} from "../framework/element.js";
import { requirement } from "../framework/requirements.js";
import { dictOf, leaf, record } from "../framework/schema.js";
import { mergeSchemas, type PropertySchema } from "../properties.js";
import {
  DATA_TYPE,
  DataTypeDefinition,
  SCHEMA,
  toDataTypes,
  toPropertySchema,
} from "./data-types.js";
import {
  allValues,
  asMap,
  instancesOf,
  optionalString,
  siblingNames,
  type Kind,
} from "./helpers.js";
import { mergeNodeTypeInterfaces } from "./interfaces.js";
import {
  processInterfaces,
  toInterfaces,
  type InterfaceSpecs,
} from "./operation.js";
import { PLUGIN, PluginDefinition, toPlugins } from "./plugins.js";

export const NODE_TYPE = "NodeType";
export const RELATIONSHIP = "Relationship";

export class NodeTypeDefinition {
  constructor(
    readonly name: string,
    /** Ancestors first, this type last. */
    readonly typeHierarchy: readonly string[],
    readonly properties: PropertySchema,
    readonly interfaces: InterfaceSpecs,
    readonly derivedFrom?: string
  ) {}
}

export class RelationshipDefinition {
  constructor(
    readonly name: string,
    readonly typeHierarchy: readonly string[],
    readonly properties: PropertySchema,
    readonly sourceInterfaces: InterfaceSpecs,
    readonly targetInterfaces: InterfaceSpecs,
    readonly derivedFrom?: string
  ) {}
}

/** A type depends on the sibling type it derives from. */
function derivesFrom(dependent: Element, dependency: Element): boolean {
  return (
    dependent.parent === dependency.parent &&
    asMap(dependent.initialValue)["derived_from"] === dependency.name
  );
}

function checkParentDeclared(element: Element): void {
  const parent = optionalString(asMap(element.initialValue), "derived_from");
  if (parent === undefined || siblingNames(element).includes(parent)) return;
  throw new DslLogicError(
    ERROR_CODE_UNKNOWN_TYPE,
    `Missing definition for type '${parent}' which is declared as derived ` +
      `by type '${String(element.name)}'`
  );
}

interface Derivation<T> {
  parent: T | undefined;
  hierarchy: string[];
  properties: PropertySchema;
}

interface DerivedType {
  name: string;
  typeHierarchy: readonly string[];
  properties: PropertySchema;
}

function derive<T extends DerivedType>(
  element: Element,
  args: RequirementValues,
  kind: Kind<T>
): Derivation<T> {
  const raw = asMap(element.initialValue);
  const parents = instancesOf(args["parent_types"], kind, "parent_types");
  const parent: T | undefined = parents[0];
  const dataTypes = toDataTypes(
    instancesOf(args["data_types"], DataTypeDefinition, "data_types")
  );
  const own = toPropertySchema(raw["properties"]);
  return {
    parent,
    hierarchy: [...(parent?.typeHierarchy ?? []), String(element.name)],
    properties: parent ? mergeSchemas(parent.properties, own, dataTypes) : own,
  };
}

const typeRequirements = {
  self: [allValues("parent_types", { predicate: derivesFrom })],
  [DATA_TYPE]: [allValues("data_types")],
};

export const typeElements: ElementType[] = [
  { name: "TypeDerivedFrom", schema: leaf("string") },
  {
    name: NODE_TYPE,
    schema: record({
      derived_from: "TypeDerivedFrom",
      interfaces: "NodeTypeInterfaces",
      properties: SCHEMA,
    }),
    requires: typeRequirements,
    validate: checkParentDeclared,
    parse(element, args) {
      const raw = asMap(element.initialValue);
      const { parent, hierarchy, properties } = derive(
        element,
        args,
        NodeTypeDefinition
      );
      const own = toInterfaces(raw["interfaces"], "type");
      return new NodeTypeDefinition(
        String(element.name),
        hierarchy,
        properties,
        parent ? mergeNodeTypeInterfaces(own, parent.interfaces) : own,
        parent?.name
      );
    },
  },
  { name: "NodeTypes", schema: dictOf(NODE_TYPE) },
  {
    name: RELATIONSHIP,
    schema: record({
      derived_from: "TypeDerivedFrom",
      properties: SCHEMA,
      source_interfaces: "NodeTypeInterfaces",
      target_interfaces: "NodeTypeInterfaces",
    }),
    requires: {
      ...typeRequirements,
      [PLUGIN]: [allValues("plugins")],
      inputs: [requirement("resource_base", { required: false })],
    },
    validate(element, args) {
      checkParentDeclared(element);
      const raw = asMap(element.initialValue);
      const resourceBase = args["resource_base"];
      const options = {
        plugins: toPlugins(
          instancesOf(args["plugins"], PluginDefinition, "plugins")
        ),
        errorCode: ERROR_CODE_RELATIONSHIP_OPERATION_PLUGIN,
        resourceBase: typeof resourceBase === "string" ? resourceBase : null,
      };
      for (const key of ["source_interfaces", "target_interfaces"]) {
        processInterfaces(toInterfaces(raw[key], "type"), options);
      }
    },
    parse(element, args) {
      const raw = asMap(element.initialValue);
      const { parent, hierarchy, properties } = derive(
        element,
        args,
        RelationshipDefinition
      );
      const source = toInterfaces(raw["source_interfaces"], "type");
      const target = toInterfaces(raw["target_interfaces"], "type");
      return new RelationshipDefinition(
        String(element.name),
        hierarchy,
        properties,
        parent
          ? mergeNodeTypeInterfaces(source, parent.sourceInterfaces)
          : source,
        parent
          ? mergeNodeTypeInterfaces(target, parent.targetInterfaces)
          : target,
        parent?.name
      );
    },
  },
  { name: "Relationships", schema: dictOf(RELATIONSHIP) },
];
