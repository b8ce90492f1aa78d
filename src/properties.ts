// Property schemas: defaults, derived-type merging and typed value checks

import {
  DslFormatError,
  DslLogicError,
  ERROR_CODE_MISSING_PROPERTY,
  ERROR_CODE_UNDEFINED_PROPERTY,
  ERROR_CODE_UNKNOWN_TYPE,
  ERROR_CODE_VALUE_DOES_NOT_MATCH_TYPE,
  FunctionEvaluationError,
} from "./errors.js";
import { defaultFunctions } from "./functions/defaults.js";
import type { FunctionRegistry } from "./functions/function.js";
import { hasKey, isRawMap, type RawMap, type RawValue } from "./model.js";
import { USER_PRIMITIVE_TYPES } from "./constants.js";

export interface PropertyDefinition {
  type?: string;
  description?: string;
  default?: RawValue;
  required?: boolean;
}

export type PropertySchema = Record<string, PropertyDefinition>;

export interface DataType {
  description?: string;
  derived_from?: string;
  properties: PropertySchema;
}

export type DataTypes = Readonly<Record<string, DataType>>;

/** Renders a property error from the owner and the dotted property path. */
export type PropertyMessage = (owner: string, property: string) => string;

export interface PropertyMergeOptions {
  dataTypes: DataTypes;
  undefinedMessage: PropertyMessage;
  missingMessage: PropertyMessage;
  /** Node template, type or input owning the properties; used in messages. */
  owner: string;
  path?: readonly string[];
  raiseOnMissing?: boolean;
  functions?: FunctionRegistry;
}

export interface ParseValueOptions extends PropertyMergeOptions {
  typeName: string | undefined;
  /** Defaults inherited from a base definition, merged under the value. */
  derivedValue?: RawValue;
}

/**
 * Property name to default value, for properties that declare one. Each call
 * returns fresh copies, so no two owners share a default.
 */
export function flattenSchema(schema: PropertySchema): RawMap {
  const result: RawMap = {};
  for (const [key, definition] of Object.entries(schema)) {
    if (definition.default !== undefined) {
      result[key] = structuredClone(definition.default);
    }
  }
  return result;
}

/**
 * Overlays `overriding` on `overridden`. A property that keeps the same data
 * type on both sides keeps the inherited defaults the override leaves out.
 */
export function mergeSchemas(
  overridden: PropertySchema,
  overriding: PropertySchema,
  dataTypes: DataTypes,
  functions: FunctionRegistry = defaultFunctions
): PropertySchema {
  const merged: PropertySchema = { ...overriding };
  for (const [key, base] of Object.entries(overridden)) {
    if (!hasKey(overriding, key)) {
      merged[key] = base;
      continue;
    }
    const override = overriding[key];
    const type = override.type;
    if (
      type === undefined ||
      type !== base.type ||
      !hasKey(dataTypes, type) ||
      USER_PRIMITIVE_TYPES.includes(type) ||
      base.default === undefined ||
      base.default === null
    ) {
      continue;
    }
    const illegal: PropertyMessage = () => "illegal state";
    const overrideDefault = isRawMap(override.default) ? override.default : {};
    const value = parseValue(overrideDefault, {
      typeName: type,
      derivedValue: base.default,
      dataTypes,
      undefinedMessage: illegal,
      missingMessage: illegal,
      owner: "illegal state",
      raiseOnMissing: false,
      functions,
    });
    if (isRawMap(value) && Object.keys(value).length > 0) {
      merged[key] = { ...override, default: value };
    }
  }
  return merged;
}

/**
 * Validates instance values against a schema and fills in defaults. Fails
 * with 106 for a value the schema does not declare and 107 for a required
 * property with neither value nor default.
 */
export function mergeSchemaAndInstanceProperties(
  instanceProperties: RawMap,
  schema: PropertySchema,
  options: PropertyMergeOptions
): RawMap {
  const defaults = flattenSchema(schema);
  return mergeWithDefaults(instanceProperties, schema, defaults, options);
}

function mergeWithDefaults(
  instanceProperties: RawMap,
  schema: PropertySchema,
  defaults: RawMap,
  options: PropertyMergeOptions
): RawMap {
  const { owner, path = [], raiseOnMissing = true } = options;

  for (const key of Object.keys(instanceProperties)) {
    if (hasKey(schema, key)) continue;
    const error = new DslLogicError(
      ERROR_CODE_UNDEFINED_PROPERTY,
      options.undefinedMessage(owner, describe(path, key))
    );
    error.property = key;
    throw error;
  }

  const merged: RawMap = { ...defaults, ...instanceProperties };
  const result: RawMap = {};
  for (const [key, definition] of Object.entries(schema)) {
    if (!hasKey(merged, key)) {
      if ((definition.required ?? true) && raiseOnMissing) {
        const error = new DslLogicError(
          ERROR_CODE_MISSING_PROPERTY,
          options.missingMessage(owner, describe(path, key))
        );
        error.property = key;
        throw error;
      }
      continue;
    }
    result[key] = parseValue(merged[key], {
      ...options,
      typeName: definition.type,
      derivedValue: hasKey(defaults, key) ? defaults[key] : undefined,
      path: [...path, key],
    });
  }
  return result;
}

/**
 * Checks `value` against a primitive or data type. Intrinsic functions pass
 * unchecked; data type values are merged with their defaults recursively.
 */
export function parseValue(
  value: RawValue,
  options: ParseValueOptions
): RawValue {
  const {
    typeName,
    dataTypes,
    owner,
    path = [],
    functions = defaultFunctions,
  } = options;
  if (typeName === undefined) return value;
  if (isFunctionValue(value, functions, `${owner}.${describe(path)}`)) {
    return value;
  }

  switch (typeName) {
    case "integer":
      if (typeof value === "number" && Number.isInteger(value)) return value;
      break;
    case "float":
      if (typeof value === "number" && Number.isFinite(value)) return value;
      break;
    case "boolean":
      if (typeof value === "boolean") return value;
      break;
    case "string":
      return value;
    default: {
      if (!hasKey(dataTypes, typeName)) {
        throw new DslLogicError(
          ERROR_CODE_UNKNOWN_TYPE,
          "Unexpected type defined in property schema for property " +
            `'${describe(path)}' - unknown type is '${typeName}'`
        );
      }
      if (!isRawMap(value)) break;
      const dataSchema = dataTypes[typeName].properties;
      const defaults = flattenSchema(dataSchema);
      if (isRawMap(options.derivedValue)) {
        Object.assign(defaults, options.derivedValue);
      }
      return mergeWithDefaults(value, dataSchema, defaults, {
        ...options,
        path,
      });
    }
  }

  const rendered = typeof value === "string" ? value : JSON.stringify(value);
  throw new DslLogicError(
    ERROR_CODE_VALUE_DOES_NOT_MATCH_TYPE,
    `Property type validation failed in '${owner}': ` +
      `property '${describe(path)}' type is '${typeName}', ` +
      `yet it was assigned with the value '${rendered}'`
  );
}

/** Malformed function arguments surface as a format error of the element. */
function isFunctionValue(
  value: RawValue,
  functions: FunctionRegistry,
  path: string
): boolean {
  try {
    return functions.parse(value, { path }) !== undefined;
  } catch (err) {
    if (err instanceof FunctionEvaluationError) {
      throw new DslFormatError(err.message);
    }
    throw err;
  }
}

function describe(path: readonly string[], name?: string): string {
  return (name === undefined ? path : [...path, name]).join(".");
}
