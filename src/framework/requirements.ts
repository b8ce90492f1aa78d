// Cross-element data dependencies declared by element types

import type { Element } from "./element.js";

/** Type key that resolves to the dependent element's own type. */
export const SELF_TYPE = "self";
/** Type key that reads from the parse input table instead of the graph. */
export const INPUTS = "inputs";

export type RequirementPredicate = (
  dependent: Element,
  dependency: Element
) => boolean;

export interface Requirement {
  readonly name: string;
  /** Take the dependency's parsed value instead of a provided entry. */
  readonly parsed: boolean;
  readonly multipleResults: boolean;
  readonly required: boolean;
  readonly predicate?: RequirementPredicate;
}

export interface RequirementOptions {
  parsed?: boolean;
  multipleResults?: boolean;
  required?: boolean;
  predicate?: RequirementPredicate;
}

export function requirement(
  name: string,
  options: RequirementOptions = {}
): Requirement {
  return {
    name,
    parsed: options.parsed ?? false,
    multipleResults: options.multipleResults ?? false,
    required: options.required ?? true,
    predicate: options.predicate,
  };
}

/** A requirement on the dependency's parsed value. */
export function value(
  name: string,
  options: Omit<RequirementOptions, "parsed"> = {}
): Requirement {
  return requirement(name, { ...options, parsed: true });
}

export function toRequirement(entry: string | Requirement): Requirement {
  return typeof entry === "string" ? requirement(entry) : entry;
}

export const siblingPredicate: RequirementPredicate = (dependent, dependency) =>
  dependent.parent === dependency.parent;
