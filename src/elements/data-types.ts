// Property schemas and data_types

import { DslLogicError, ERROR_CODE_UNKNOWN_TYPE } from "../errors.js";
import type { Element, ElementType } from "../framework/element.js";
import { dictOf, leaf, record } from "../framework/schema.js";
import { USER_PRIMITIVE_TYPES } from "../constants.js";
import { isRawMap, type RawValue } from "../model.js";
import {
  mergeSchemas,
  type DataType,
  type DataTypes,
  type PropertySchema,
} from "../properties.js";
import {
  allValues,
  asMap,
  instancesOf,
  optionalString,
  siblingNames,
} from "./helpers.js";

export const SCHEMA = "Schema";
export const DATA_TYPE = "DataType";

/** Reads a validated property schema mapping. */
export function toPropertySchema(raw: RawValue | undefined): PropertySchema {
  const schema: PropertySchema = {};
  for (const [key, definition] of Object.entries(asMap(raw))) {
    const entry = asMap(definition);
    const { type, description, required } = entry;
    schema[key] = {
      ...(typeof type === "string" ? { type } : {}),
      ...(typeof description === "string" ? { description } : {}),
      ...(entry["default"] !== undefined ? { default: entry["default"] } : {}),
      ...(typeof required === "boolean" ? { required } : {}),
    };
  }
  return schema;
}

export class DataTypeDefinition implements DataType {
  constructor(
    readonly name: string,
    readonly properties: PropertySchema,
    /** Data types this one was resolved against, transitively. */
    readonly components: DataTypes,
    readonly derived_from?: string,
    readonly description?: string
  ) {}
}

/** Data types a property schema refers to by type name. */
function referencedTypes(schema: RawValue | undefined): string[] {
  return Object.values(asMap(schema)).flatMap((definition) => {
    const type = isRawMap(definition) ? definition["type"] : undefined;
    if (typeof type !== "string" || USER_PRIMITIVE_TYPES.includes(type)) {
      return [];
    }
    return [type];
  });
}

function dataTypeDependsOn(dependent: Element, dependency: Element): boolean {
  if (dependent.parent !== dependency.parent) return false;
  const raw = asMap(dependent.initialValue);
  const name = String(dependency.name);
  return (
    raw["derived_from"] === name ||
    referencedTypes(raw["properties"]).includes(name)
  );
}

/** Name-keyed data types, including the ones they were resolved against. */
export function toDataTypes(
  definitions: readonly DataTypeDefinition[]
): DataTypes {
  const result: Record<string, DataType> = {};
  for (const definition of definitions) {
    Object.assign(result, definition.components);
    result[definition.name] = definition;
  }
  return result;
}

export const schemaElements: ElementType[] = [
  { name: "SchemaPropertyType", schema: leaf("string") },
  { name: "SchemaPropertyDescription", schema: leaf("string") },
  { name: "SchemaPropertyRequired", schema: leaf("boolean") },
  {
    name: "SchemaPropertyDefault",
    schema: leaf("string", "integer", "float", "boolean", "dict", "list"),
  },
  {
    name: "SchemaProperty",
    schema: record({
      type: "SchemaPropertyType",
      default: "SchemaPropertyDefault",
      description: "SchemaPropertyDescription",
      required: "SchemaPropertyRequired",
    }),
  },
  {
    name: SCHEMA,
    schema: dictOf("SchemaProperty"),
    parse: (element) => toPropertySchema(element.initialValue),
  },
  { name: "DataTypeDerivedFrom", schema: leaf("string") },
  { name: "DataTypeDescription", schema: leaf("string") },
  {
    name: DATA_TYPE,
    schema: record({
      derived_from: "DataTypeDerivedFrom",
      description: "DataTypeDescription",
      properties: SCHEMA,
    }),
    requires: {
      self: [allValues("component_types", { predicate: dataTypeDependsOn })],
    },
    validate(element) {
      const raw = asMap(element.initialValue);
      const known = siblingNames(element);
      const types = [
        optionalString(raw, "derived_from"),
        ...referencedTypes(raw["properties"]),
      ];
      for (const type of types) {
        if (type !== undefined && !known.includes(type)) {
          throw new DslLogicError(
            ERROR_CODE_UNKNOWN_TYPE,
            `Type '${String(element.name)}' refers to an undefined data type ` +
              `'${type}'`
          );
        }
      }
    },
    parse(element, args) {
      const raw = asMap(element.initialValue);
      const components = instancesOf(
        args["component_types"],
        DataTypeDefinition,
        "component_types"
      );
      const derivedFrom = optionalString(raw, "derived_from");
      let properties = toPropertySchema(raw["properties"]);
      const dataTypes = toDataTypes(components);
      const parent = components.find((c) => c.name === derivedFrom);
      if (parent) {
        properties = mergeSchemas(parent.properties, properties, dataTypes);
      }
      return new DataTypeDefinition(
        String(element.name),
        properties,
        dataTypes,
        derivedFrom,
        optionalString(raw, "description")
      );
    },
  },
  { name: "DataTypes", schema: dictOf(DATA_TYPE) },
];
