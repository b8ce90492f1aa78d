// Property path lookup through nested mappings and sequences

import { FunctionEvaluationError } from "../errors.js";
import { hasKey, isRawMap, type RawValue } from "../model.js";
import { typeNameOf } from "../framework/schema.js";

export type PathSegment = string | number;

export interface PropertyLookup {
  functionName: string;
  /** Leading part of the rendered path, e.g. "vm.properties". */
  owner: string;
  /** Where the lookup was requested from. */
  contextPath: string;
  label?: string;
  raiseIfNotFound?: boolean;
}

export function isPathSegment(value: RawValue): value is PathSegment {
  return typeof value === "string" || typeof value === "number";
}

/**
 * Walks `path` through `properties`. A missing key or index either throws
 * or yields undefined, per `raiseIfNotFound` (default true). A non-integer
 * segment applied to a sequence always throws.
 */
export function getPropertyValue(
  properties: RawValue,
  path: readonly PathSegment[],
  lookup: PropertyLookup
): RawValue | undefined {
  const {
    functionName,
    owner,
    contextPath,
    label = "Node template property",
  } = lookup;
  const raiseIfNotFound = lookup.raiseIfNotFound ?? true;
  const dotted = `${owner}.${path.map(String).join(".")}`;
  const rendered = `${label} '${dotted}' referenced from '${contextPath}'`;

  const notFound = (): undefined => {
    if (raiseIfNotFound) {
      throw new FunctionEvaluationError(
        functionName,
        `${rendered} doesn't exist.`,
        contextPath
      );
    }
    return undefined;
  };

  let value: RawValue = properties;
  for (const segment of path) {
    if (isRawMap(value)) {
      const key = String(segment);
      if (!hasKey(value, key)) return notFound();
      value = value[key];
    } else if (Array.isArray(value)) {
      if (typeof segment !== "number" || !Number.isInteger(segment)) {
        throw new FunctionEvaluationError(
          functionName,
          `${rendered} is expected ${segment} to be an int ` +
            `but it is a ${typeNameOf(segment)}.`,
          contextPath
        );
      }
      if (segment < 0 || segment >= value.length) {
        if (raiseIfNotFound) {
          throw new FunctionEvaluationError(
            functionName,
            `${rendered} index is out of range. ` +
              `Got ${segment} but list size is ${value.length}.`,
            contextPath
          );
        }
        return undefined;
      }
      value = value[segment];
    } else {
      return notFound();
    }
  }
  return value;
}
