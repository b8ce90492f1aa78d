// Walks documents and plans; a handler sees each value and may replace it

import {
  isRawMap,
  type Plan,
  type PlanNodeTemplate,
  type PlanOperation,
  type PlanRelationship,
  type RawValue,
} from "../model.js";

export const NODE_TEMPLATE_SCOPE = "node_template";
export const NODE_TEMPLATE_RELATIONSHIP_SCOPE = "node_template_relationship";
export const OUTPUTS_SCOPE = "outputs";

export type FunctionScope =
  | typeof NODE_TEMPLATE_SCOPE
  | typeof NODE_TEMPLATE_RELATIONSHIP_SCOPE
  | typeof OUTPUTS_SCOPE;

/**
 * Where a function was found. Template-time scans fill the plan entries;
 * runtime evaluation fills the instance ids.
 */
export interface FunctionContext {
  nodeTemplate?: PlanNodeTemplate;
  relationship?: PlanRelationship;
  operation?: PlanOperation;
  self?: string;
  source?: string;
  target?: string;
}

export interface ScanLocation {
  scope?: FunctionScope;
  context: FunctionContext;
}

export type ScanHandler = (
  value: RawValue,
  scope: FunctionScope | undefined,
  context: FunctionContext,
  path: string
) => RawValue;

export interface ScanOptions {
  scope?: FunctionScope;
  context?: FunctionContext;
  path?: string;
  replace?: boolean;
}

/** Hands `value` to the handler, then descends unless it was replaced. */
export function scanValue(
  value: RawValue,
  handler: ScanHandler,
  options: ScanOptions = {}
): RawValue {
  const { scope, context = {}, path = "" } = options;
  const result = handler(value, scope, context, path);
  if (result === value) scanProperties(value, handler, options);
  return result;
}

/** Visits every entry nested in `value`; the root itself is not visited. */
export function scanProperties(
  value: RawValue,
  handler: ScanHandler,
  options: ScanOptions = {}
): void {
  const { path = "", replace = false } = options;
  if (isRawMap(value)) {
    for (const [key, item] of Object.entries(value)) {
      const result = scanValue(item, handler, {
        ...options,
        path: `${path}.${key}`,
      });
      if (replace && result !== item) value[key] = result;
    }
  } else if (Array.isArray(value)) {
    value.forEach((item, index) => {
      const result = scanValue(item, handler, {
        ...options,
        path: `${path}[${index}]`,
      });
      if (replace && result !== item) value[index] = result;
    });
  }
}

function scanOperations(
  operations: Record<string, PlanOperation>,
  handler: ScanHandler,
  location: ScanLocation,
  path: string,
  replace: boolean
): void {
  for (const [name, operation] of Object.entries(operations)) {
    scanProperties(operation.inputs, handler, {
      scope: location.scope,
      context: { ...location.context, operation },
      path: `${path}.${name}.inputs`,
      replace,
    });
  }
}

/**
 * Scans node properties, operation inputs, relationship properties and
 * outputs of a plan.
 */
export function scanServiceTemplate(
  plan: Plan,
  handler: ScanHandler,
  replace = false
): void {
  for (const nodeTemplate of plan.node_templates) {
    const nodeLocation: ScanLocation = {
      scope: NODE_TEMPLATE_SCOPE,
      context: { nodeTemplate },
    };
    scanProperties(nodeTemplate.properties, handler, {
      ...nodeLocation,
      path: `${nodeTemplate.name}.properties`,
      replace,
    });
    scanOperations(
      nodeTemplate.operations,
      handler,
      nodeLocation,
      `${nodeTemplate.name}.operations`,
      replace
    );

    for (const relationship of nodeTemplate.relationships) {
      const relLocation: ScanLocation = {
        scope: NODE_TEMPLATE_RELATIONSHIP_SCOPE,
        context: { nodeTemplate, relationship },
      };
      const relPath = `${nodeTemplate.name}.${relationship.type}`;
      scanProperties(relationship.properties, handler, {
        ...relLocation,
        path: relPath,
        replace,
      });
      for (const operations of [
        relationship.source_operations,
        relationship.target_operations,
      ]) {
        scanOperations(operations, handler, relLocation, relPath, replace);
      }
    }
  }

  for (const [name, output] of Object.entries(plan.outputs)) {
    const result = scanValue(output.value, handler, {
      scope: OUTPUTS_SCOPE,
      context: {},
      path: `outputs.${name}.value`,
      replace,
    });
    if (replace) output.value = result;
  }
}
