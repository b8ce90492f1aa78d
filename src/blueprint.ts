// Blueprint parsing and deployment plan preparation

import { USER_PRIMITIVE_TYPES } from "./constants.js";
import { toPropertySchema } from "./elements/data-types.js";
import { BLUEPRINT, BlueprintPlan } from "./elements/blueprint.js";
import { requireInstance } from "./elements/helpers.js";
import { createBlueprintRegistry } from "./elements/registry.js";
import { MissingRequiredInputError, UnknownInputError } from "./errors.js";
import type { ElementRegistry } from "./framework/element.js";
import { parse } from "./framework/parser.js";
import { defaultFunctions } from "./functions/defaults.js";
import {
  evaluatePlanFunctions,
  validateFunctions,
} from "./functions/evaluation.js";
import type { FunctionRegistry } from "./functions/function.js";
import { hasKey, type Plan, type RawMap, type RawValue } from "./model.js";
import { parseValue } from "./properties.js";

export interface BlueprintParseOptions {
  /** Directory that script operation mappings are resolved against. */
  resourceBase?: string | null;
  /** Reject elements newer than the document's DSL version (default false). */
  validateVersion?: boolean;
  /** Reject undeclared keys (default true). */
  strict?: boolean;
  functions?: FunctionRegistry;
  /** Element types to parse with; defaults to the blueprint language. */
  elements?: ElementRegistry;
}

/**
 * Parses a loaded blueprint document into a plan and validates the
 * intrinsic functions it contains. Throws the first DslParsingError or
 * FunctionEvaluationError found.
 */
export function parseBlueprint(
  document: RawValue | undefined,
  options: BlueprintParseOptions = {}
): Plan {
  const {
    resourceBase = null,
    validateVersion = false,
    strict = true,
    functions = defaultFunctions,
    elements = createBlueprintRegistry(),
  } = options;

  const parsed = parse(elements, document, BLUEPRINT, {
    rootName: "blueprint",
    strict,
    inputs: {
      validate_version: validateVersion,
      resource_base: resourceBase,
      functions,
    },
  });
  const plan = requireInstance(parsed, BlueprintPlan, "the parsed blueprint");
  validateFunctions(plan, functions);
  return plan;
}

/**
 * Resolves input values against the plan's input definitions and returns a
 * copy of the plan with every statically resolvable function evaluated.
 */
export function prepareDeploymentPlan(
  plan: Plan,
  inputValues: RawMap = {},
  functions: FunctionRegistry = defaultFunctions
): Plan {
  const definitions = toPropertySchema(plan.inputs);
  const expected = `expected inputs: [${Object.keys(definitions).join(", ")}]`;

  for (const name of Object.keys(inputValues)) {
    if (!hasKey(definitions, name)) {
      throw new UnknownInputError(
        name,
        `Unknown input '${name}' specified - ${expected}`
      );
    }
  }

  const inputs: RawMap = {};
  for (const [name, definition] of Object.entries(definitions)) {
    let value: RawValue;
    if (hasKey(inputValues, name)) value = inputValues[name];
    else if (definition.default !== undefined) value = definition.default;
    else if (definition.required === false) continue;
    else {
      throw new MissingRequiredInputError(
        name,
        `Required input '${name}' was not specified - ${expected}`
      );
    }

    const type = definition.type;
    if (type !== undefined && USER_PRIMITIVE_TYPES.includes(type)) {
      parseValue(value, {
        typeName: type,
        dataTypes: {},
        owner: "inputs",
        path: [name],
        undefinedMessage: (owner, property) =>
          `'${owner}' does not declare '${property}'`,
        missingMessage: (owner, property) =>
          `'${owner}' is missing '${property}'`,
        functions,
      });
    }
    inputs[name] = structuredClone(value);
  }

  return evaluatePlanFunctions({ ...plan, inputs }, functions);
}
