// Interface merging between derived types, and between a type and its templates

import { LOCAL_AGENT } from "../constants.js";
import { flattenSchema } from "../properties.js";
import { toPropertySchema } from "./data-types.js";
import type { InterfaceSpecs, OperationSpec } from "./operation.js";

/** Union of both sides; `overriding` operations replace inherited ones. */
export function mergeNodeTypeInterfaces(
  overriding: InterfaceSpecs,
  overridden: InterfaceSpecs
): InterfaceSpecs {
  const merged: InterfaceSpecs = {};
  for (const [name, operations] of Object.entries(overridden)) {
    merged[name] = { ...operations };
  }
  for (const [name, operations] of Object.entries(overriding)) {
    merged[name] = { ...(merged[name] ?? {}), ...operations };
  }
  return merged;
}

function fromTypeOnly(spec: OperationSpec): OperationSpec {
  return { ...spec, inputs: flattenSchema(toPropertySchema(spec.inputs)) };
}

function mergeOperation(
  typeOp: OperationSpec,
  templateOp: OperationSpec
): OperationSpec {
  const implementation = templateOp.implementation || typeOp.implementation;
  // A template mapping the operation elsewhere does not inherit type inputs.
  const remapped =
    templateOp.implementation !== "" &&
    templateOp.implementation !== typeOp.implementation;
  const inputs = remapped
    ? templateOp.inputs
    : {
        ...flattenSchema(toPropertySchema(typeOp.inputs)),
        ...templateOp.inputs,
      };
  return {
    implementation,
    inputs,
    executor: templateOp.executor ?? typeOp.executor ?? LOCAL_AGENT,
    max_retries: templateOp.max_retries ?? typeOp.max_retries,
    retry_interval: templateOp.retry_interval ?? typeOp.retry_interval,
  };
}

/**
 * Operations a template ends up with: the type's operations with their input
 * defaults, overlaid by the template's declarations.
 */
export function mergeNodeTypeAndNodeTemplateInterfaces(
  typeInterfaces: InterfaceSpecs,
  templateInterfaces: InterfaceSpecs
): InterfaceSpecs {
  const merged: InterfaceSpecs = {};
  for (const [name, operations] of Object.entries(typeInterfaces)) {
    merged[name] = {};
    for (const [operationName, spec] of Object.entries(operations)) {
      merged[name][operationName] = fromTypeOnly(spec);
    }
  }
  for (const [name, operations] of Object.entries(templateInterfaces)) {
    const typeOperations = typeInterfaces[name] ?? {};
    merged[name] ??= {};
    for (const [operationName, spec] of Object.entries(operations)) {
      const typeOp = typeOperations[operationName];
      merged[name][operationName] = typeOp
        ? mergeOperation(typeOp, spec)
        : { ...spec, executor: spec.executor ?? LOCAL_AGENT };
    }
  }
  return merged;
}
