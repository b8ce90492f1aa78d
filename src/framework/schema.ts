// Schema descriptors: the declarative shape an element's raw value must take

import { isRawMap, type RawValue } from "../model.js";

export type LeafType =
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "dict"
  | "list";

export interface LeafSchema {
  kind: "leaf";
  types: readonly LeafType[];
}

/** Mapping whose values are all parsed by one element type. */
export interface DictSchema {
  kind: "dict";
  elementType: string;
}

/** Sequence whose items are all parsed by one element type. */
export interface ListSchema {
  kind: "list";
  elementType: string;
}

/** Fixed mapping of declared keys to element types. */
export interface RecordSchema {
  kind: "record";
  fields: Readonly<Record<string, string>>;
}

/** Ordered alternatives; the first one that validates wins. */
export interface AlternativesSchema {
  kind: "alternatives";
  options: readonly SchemaDescriptor[];
}

export interface UnknownSchema {
  kind: "unknown";
}

export type SchemaDescriptor =
  | LeafSchema
  | DictSchema
  | ListSchema
  | RecordSchema
  | AlternativesSchema
  | UnknownSchema;

export function leaf(...types: LeafType[]): LeafSchema {
  return { kind: "leaf", types };
}

export function dictOf(elementType: string): DictSchema {
  return { kind: "dict", elementType };
}

export function listOf(elementType: string): ListSchema {
  return { kind: "list", elementType };
}

export function record(fields: Record<string, string>): RecordSchema {
  return { kind: "record", fields };
}

export function anyOf(...options: SchemaDescriptor[]): AlternativesSchema {
  return { kind: "alternatives", options };
}

export const PRIMITIVE_TYPES: readonly LeafType[] = [
  "string",
  "integer",
  "float",
  "boolean",
];

/** The user-facing type name of a raw value, as used in error messages. */
export function typeNameOf(value: RawValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  if (isRawMap(value)) return "dict";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float";
  }
  return typeof value;
}

export function matchesLeafType(value: RawValue, type: LeafType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
    case "dict":
      return isRawMap(value);
    case "list":
      return Array.isArray(value);
  }
}
