// Shared pieces of the blueprint element types

import { IllegalStateError } from "../errors.js";
import type { Element } from "../framework/element.js";
import {
  value,
  type Requirement,
  type RequirementOptions,
} from "../framework/requirements.js";
import { isRawMap, type RawMap, type RawValue } from "../model.js";

export const VERSION_ELEMENT = "ToscaDefinitionsVersion";

/** Requirements an element needs for the DSL version gate. */
export const VERSION_REQUIREMENTS = {
  [VERSION_ELEMENT]: ["version"],
  inputs: ["validate_version"],
} as const;

/** All parsed values of a type, possibly none. */
export function allValues(
  name: string,
  options: Pick<RequirementOptions, "predicate"> = {}
): Requirement {
  return value(name, { ...options, multipleResults: true, required: false });
}

export type Kind<T> = abstract new (...args: never[]) => T;

export function requireInstance<T>(
  candidate: unknown,
  kind: Kind<T>,
  label: string
): T {
  if (candidate instanceof kind) return candidate;
  throw new IllegalStateError(`Expected ${label} to be a ${kind.name}`);
}

/** Narrows a multiple-results requirement value to instances of `kind`. */
export function instancesOf<T>(
  values: unknown,
  kind: Kind<T>,
  label: string
): T[] {
  if (!Array.isArray(values)) {
    throw new IllegalStateError(`Expected ${label} to be a list`);
  }
  return values.map((item) => requireInstance(item, kind, label));
}

/** Name-keyed lookup over parsed definitions. */
export function byName<T extends { readonly name: string }>(
  definitions: readonly T[]
): Map<string, T> {
  return new Map(definitions.map((d) => [d.name, d]));
}

export function asMap(raw: RawValue | undefined): RawMap {
  return isRawMap(raw) ? raw : {};
}

export function optionalString(map: RawMap, key: string): string | undefined {
  const item = map[key];
  return typeof item === "string" ? item : undefined;
}

export function optionalNumber(map: RawMap, key: string): number | null {
  const item = map[key];
  return typeof item === "number" ? item : null;
}

/** Names of the sibling entries of a dict-valued element's child. */
export function siblingNames(element: Element): string[] {
  return Object.keys(asMap(element.parent?.initialValue));
}
