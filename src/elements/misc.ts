// description, dsl_definitions, inputs and outputs

import type { ElementType } from "../framework/element.js";
import { dictOf, leaf, record } from "../framework/schema.js";
import type { PlanOutput, RawValue } from "../model.js";
import { DSL_VERSION_1_2 } from "../version.js";
import { VERSION_REQUIREMENTS, asMap, optionalString } from "./helpers.js";

export function toOutputs(
  raw: RawValue | undefined
): Record<string, PlanOutput> {
  const result: Record<string, PlanOutput> = {};
  for (const [name, definition] of Object.entries(asMap(raw))) {
    const map = asMap(definition);
    const description = optionalString(map, "description");
    result[name] = {
      ...(description !== undefined ? { description } : {}),
      value: structuredClone(map["value"] ?? null),
    };
  }
  return result;
}

export const miscElements: ElementType[] = [
  {
    name: "Description",
    schema: leaf("string"),
    supportedVersion: DSL_VERSION_1_2,
    requires: VERSION_REQUIREMENTS,
  },
  {
    // Anchors for YAML aliases; nothing reads it once loaded.
    name: "DslDefinitions",
    schema: leaf("dict", "list"),
    supportedVersion: DSL_VERSION_1_2,
    requires: VERSION_REQUIREMENTS,
  },
  { name: "Inputs", schema: dictOf("SchemaProperty") },
  { name: "OutputDescription", schema: leaf("string") },
  {
    name: "OutputValue",
    schema: leaf("string", "integer", "float", "boolean", "dict", "list"),
    required: true,
  },
  {
    name: "Output",
    schema: record({ description: "OutputDescription", value: "OutputValue" }),
  },
  { name: "Outputs", schema: dictOf("Output") },
];
