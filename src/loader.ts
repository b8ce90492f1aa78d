// YAML blueprint loading
// Uses the YAML core schema: no timestamps or other type instantiation.

import { readFileSync } from "node:fs";
import { dirname } from "node:path";
import yaml from "js-yaml";
import { parseBlueprint, type BlueprintParseOptions } from "./blueprint.js";
import { DslFormatError } from "./errors.js";
import { isRawMap, type Plan, type RawMap, type RawValue } from "./model.js";

/** Narrows a loaded YAML value to a raw document value. */
export function toRawValue(value: unknown, where = "document"): RawValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toRawValue(item, `${where}[${index}]`));
  }
  if (isRawMap(value) && Object.getPrototypeOf(value) === Object.prototype) {
    const result: RawMap = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toRawValue(item, `${where}.${key}`);
    }
    return result;
  }
  throw new DslFormatError(`Unsupported value at ${where}: ${String(value)}`);
}

/** Loads a YAML document from text; the top level must be a mapping. */
export function loadDocumentText(text: string, source = "document"): RawMap {
  const data = toRawValue(
    yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: source })
  );
  if (!isRawMap(data)) {
    throw new DslFormatError(`Invalid YAML structure in: ${source}`);
  }
  return data;
}

export function loadDocument(filePath: string): RawMap {
  return loadDocumentText(readFileSync(filePath, "utf-8"), filePath);
}

/**
 * Loads and parses a blueprint file. Script mappings resolve against the
 * file's directory unless `resourceBase` says otherwise.
 */
export function parseBlueprintFile(
  filePath: string,
  options: BlueprintParseOptions = {}
): Plan {
  return parseBlueprint(loadDocument(filePath), {
    ...options,
    resourceBase: options.resourceBase ?? dirname(filePath),
  });
}
