// Schema engine entry point: checks the schema API, builds the graph and
// runs the pipeline

import {
  DslFormatError,
  DslLogicError,
  DslParsingError,
  DslSchemaApiError,
  ERROR_CODE_VERSION_MISMATCH,
  IllegalStateError,
} from "../errors.js";
import {
  compareVersions,
  hasKey,
  isDslVersion,
  isRawMap,
  type RawValue,
} from "../model.js";
import { Context, resolveRequiredType } from "./context.js";
import type { Element, ElementRegistry, RequirementValues } from "./element.js";
import {
  INPUTS,
  SELF_TYPE,
  toRequirement,
  type Requirement,
} from "./requirements.js";
import {
  matchesLeafType,
  typeNameOf,
  type SchemaDescriptor,
} from "./schema.js";

export interface ParseOptions {
  /** Name given to the root element (default "root"). */
  rootName?: string;
  /** Input table read by "inputs" requirements. */
  inputs?: Readonly<Record<string, unknown>>;
  /** Reject mapping keys the schema does not declare (default true). */
  strict?: boolean;
}

/**
 * Parse a raw document against a root element type. Returns the root
 * element's parsed value or throws the first structured error, annotated
 * with the element that was being processed.
 */
export function parse(
  registry: ElementRegistry,
  document: RawValue | undefined,
  rootType: string,
  options: ParseOptions = {}
): unknown {
  const { rootName = "root", inputs = {}, strict = true } = options;
  validateSchemaApi(registry, rootType);
  const context = new Context(registry, document, rootType, rootName, inputs);
  for (const element of context.processingOrder()) {
    try {
      validateElementSchema(element, strict);
      processElement(context, element);
    } catch (err) {
      if (err instanceof DslParsingError && !err.element) {
        err.element = element;
      }
      throw err;
    }
  }
  return context.parsedValue;
}

// --- Schema API validation ---

/**
 * Checks every element type reachable from `rootType` once, before any
 * document is read.
 */
export function validateSchemaApi(
  registry: ElementRegistry,
  rootType: string
): void {
  const visited = new Set<string>();

  const visitType = (typeName: string): void => {
    if (visited.has(typeName)) return;
    visited.add(typeName);
    const type = registry.get(typeName);
    for (const key of Object.keys(type.requires ?? {})) {
      if (key !== SELF_TYPE && key !== INPUTS && !registry.has(key)) {
        throw new DslSchemaApiError(
          `Element type '${typeName}' requires unknown element type '${key}'`
        );
      }
    }
    visitSchema(typeName, type.schema, 0);
  };

  const visitSchema = (
    typeName: string,
    schema: SchemaDescriptor,
    nesting: number
  ): void => {
    switch (schema.kind) {
      case "record":
        for (const [key, fieldType] of Object.entries(schema.fields)) {
          if (!key) {
            throw new DslSchemaApiError(
              `Element type '${typeName}' declares an empty key`
            );
          }
          visitType(fieldType);
        }
        return;
      case "alternatives":
        if (nesting > 0 || schema.options.length === 0) {
          throw new DslSchemaApiError(
            `Element type '${typeName}' has empty or nested schema alternatives`
          );
        }
        for (const option of schema.options) {
          visitSchema(typeName, option, nesting + 1);
        }
        return;
      case "leaf":
        if (schema.types.length === 0) {
          throw new DslSchemaApiError(
            `Element type '${typeName}' has a leaf with no types`
          );
        }
        return;
      case "dict":
      case "list":
        visitType(schema.elementType);
        return;
      case "unknown":
        return;
    }
  };

  visitType(rootType);
}

// --- Phase 1: schema validation ---

function validateElementSchema(element: Element, strict: boolean): void {
  const value = element.initialValue;
  if (element.required && (value === undefined || value === null)) {
    throw new DslFormatError(
      `'${element.name}' key is required but it is currently missing`
    );
  }
  if (value === undefined || value === null) return;

  const schema = element.schema;
  if (schema.kind !== "alternatives") {
    validateSchema(schema, strict, value, element);
    return;
  }

  let lastError: DslFormatError | undefined;
  for (const option of schema.options) {
    try {
      validateSchema(option, strict, value, element);
      return;
    } catch (err) {
      if (!(err instanceof DslFormatError)) throw err;
      lastError = err;
    }
  }
  throw (
    lastError ??
    new IllegalStateError("Schema alternatives should have been validated")
  );
}

function validateSchema(
  schema: SchemaDescriptor,
  strict: boolean,
  value: RawValue,
  element: Element
): void {
  switch (schema.kind) {
    case "record":
    case "dict":
      if (!isRawMap(value)) {
        throw new DslFormatError(expectedTypeMessage(value, ["dict"]));
      }
      if (strict && schema.kind === "record") {
        for (const key of Object.keys(value)) {
          if (hasKey(schema.fields, key)) continue;
          const valid = Object.keys(schema.fields).join(", ");
          const error = new DslFormatError(
            `'${key}' is not in schema. Valid schema values: ${valid}`
          );
          error.element = element.child(key);
          throw error;
        }
      }
      return;
    case "list":
      if (!Array.isArray(value)) {
        throw new DslFormatError(expectedTypeMessage(value, ["list"]));
      }
      return;
    case "leaf":
      if (!schema.types.some((type) => matchesLeafType(value, type))) {
        throw new DslFormatError(expectedTypeMessage(value, schema.types));
      }
      return;
    case "alternatives":
      throw new IllegalStateError(
        "Nested schema alternatives should have been rejected"
      );
    case "unknown":
      return;
  }
}

function expectedTypeMessage(
  value: RawValue,
  expected: readonly string[]
): string {
  const wanted =
    expected.length === 1
      ? `'${expected[0]}'`
      : `one of [${expected.join(", ")}]`;
  return `Expected ${wanted} type but found '${typeNameOf(value)}' type`;
}

// --- Phases 2 and 3: requirements, then validate/parse/provide ---

function processElement(context: Context, element: Element): void {
  const args = extractRequirements(context, element);
  const type = element.type;
  type.validate?.(element, args);
  if (args["validate_version"]) {
    validateVersion(element, args["version"]);
  }
  element.value = type.parse ? type.parse(element, args) : element.initialValue;
  element.provided = type.calculateProvided?.(element, args) ?? {};
}

function validateVersion(element: Element, version: unknown): void {
  const supported = element.type.supportedVersion;
  if (
    !supported ||
    element.initialValue === undefined ||
    !isDslVersion(version)
  ) {
    return;
  }
  if (compareVersions(version, supported) < 0) {
    throw new DslLogicError(
      ERROR_CODE_VERSION_MISMATCH,
      `'${element.name}' is not supported in ${version.raw}. ` +
        `It was introduced in ${supported.raw}`
    );
  }
}

function extractRequirements(
  context: Context,
  element: Element
): RequirementValues {
  const args: Record<string, unknown> = {};
  const requires = element.type.requires ?? {};
  for (const [requiredKey, entries] of Object.entries(requires)) {
    const requirements = entries.map(toRequirement);
    // An empty list only orders this element after the required type.
    if (requirements.length === 0) continue;

    if (requiredKey === INPUTS) {
      for (const r of requirements) {
        const known = hasKey(context.inputs, r.name);
        if (!known && r.required) {
          throw new DslFormatError(
            `Missing required input '${r.name}'. ` +
              `Existing inputs: ${Object.keys(context.inputs).join(", ")}`
          );
        }
        args[r.name] = known ? context.inputs[r.name] : undefined;
      }
      continue;
    }

    const dependencies = context.elementsOfType(
      resolveRequiredType(requiredKey, element.type)
    );
    for (const r of requirements) {
      const found = searchRequirement(dependencies, r, element);
      args[r.name] = collapseResults(found, r);
    }
  }
  return args;
}

function searchRequirement(
  dependencies: readonly Element[],
  requirement: Requirement,
  element: Element
): unknown[] {
  const result: unknown[] = [];
  for (const dependency of dependencies) {
    if (requirement.predicate && !requirement.predicate(element, dependency)) {
      continue;
    }
    if (requirement.parsed) {
      result.push(dependency.value);
      continue;
    }
    if (!hasKey(dependency.provided, requirement.name)) {
      if (!requirement.required) continue;
      throw new DslFormatError(
        `Required value '${requirement.name}' is not provided by ` +
          `'${dependency.name}'. Provided values are: ` +
          Object.keys(dependency.provided).join(", ")
      );
    }
    result.push(dependency.provided[requirement.name]);
  }
  return result;
}

function collapseResults(result: unknown[], requirement: Requirement): unknown {
  if (requirement.multipleResults) return result;
  if (result.length === 1) return result[0];
  if (requirement.required) {
    throw new DslFormatError(
      `Expected exactly one result for requirement '${requirement.name}' ` +
        `but found ${result.length === 0 ? "none" : result.length}`
    );
  }
  if (result.length === 0) return undefined;
  throw new IllegalStateError(
    `Optional requirement '${requirement.name}' matched ` +
      `${result.length} elements`
  );
}
