// Static and runtime evaluation passes, plus static validation of functions

import { isDeepStrictEqual } from "node:util";
import { DslLogicError, ERROR_CODE_CYCLE } from "../errors.js";
import {
  isRawMap,
  type Plan,
  type PlanOutput,
  type RawMap,
  type RawValue,
} from "../model.js";
import { defaultFunctions } from "./defaults.js";
import type { FunctionRegistry, IntrinsicFunction } from "./function.js";
import { GetProperty } from "./get-property.js";
import {
  scanProperties,
  scanServiceTemplate,
  type FunctionContext,
  type ScanHandler,
  type ScanLocation,
} from "./scan.js";
import { RuntimeEvaluationStorage, type RuntimeAccessors } from "./storage.js";

interface Evaluated {
  value: RawValue;
  location?: ScanLocation;
}

type Evaluator = (fn: IntrinsicFunction) => Evaluated;

/**
 * Replaces functions with their evaluated results. A result that is or
 * contains a function is evaluated again, until a pass changes nothing.
 */
function evaluationHandler(
  registry: FunctionRegistry,
  evaluator: Evaluator
): ScanHandler {
  const handler: ScanHandler = (value, scope, context, path) => {
    let evaluated = value;
    let location: ScanLocation = { scope, context };
    let scanned = false;
    for (;;) {
      const fn = registry.parse(evaluated, { ...location, path });
      if (!fn) break;
      const previous = evaluated;
      const result = evaluator(fn);
      evaluated = result.value;
      location = result.location ?? location;
      if (scanned && isDeepStrictEqual(previous, evaluated)) break;
      scanProperties(evaluated, handler, { ...location, path, replace: true });
      scanned = true;
    }
    return evaluated;
  };
  return handler;
}

function planEvaluator(plan: Plan): Evaluator {
  return (fn) => ({
    value: fn.evaluate(plan),
    location: fn.resultLocation(plan),
  });
}

function runtimeEvaluator(accessors: RuntimeAccessors): Evaluator {
  const storage = new RuntimeEvaluationStorage(accessors);
  return (fn) => ({ value: fn.evaluateRuntime(storage) });
}

/** A copy of `plan` with every statically resolvable function evaluated. */
export function evaluatePlanFunctions(
  plan: Plan,
  registry: FunctionRegistry = defaultFunctions
): Plan {
  const result = structuredClone(plan);
  const handler = evaluationHandler(registry, planEvaluator(result));
  scanServiceTemplate(result, handler, true);
  return result;
}

/** Runtime pass over a payload; returns an evaluated copy. */
export function evaluateFunctions(
  payload: RawMap,
  context: FunctionContext,
  accessors: RuntimeAccessors,
  registry: FunctionRegistry = defaultFunctions
): RawMap {
  const result = structuredClone(payload);
  const handler = evaluationHandler(registry, runtimeEvaluator(accessors));
  scanProperties(result, handler, {
    context,
    path: "payload",
    replace: true,
  });
  return result;
}

/** Output name to evaluated output value. */
export function evaluateOutputs(
  outputs: Readonly<Record<string, PlanOutput>>,
  accessors: RuntimeAccessors,
  registry: FunctionRegistry = defaultFunctions
): RawMap {
  const payload: RawMap = {};
  for (const [name, output] of Object.entries(outputs)) {
    payload[name] = output.value;
  }
  return evaluateFunctions(payload, {}, accessors, registry);
}

/**
 * Validates every function in the plan and rejects get_property chains that
 * lead back to a property already on the chain. The plan is not modified.
 */
export function validateFunctions(
  plan: Plan,
  registry: FunctionRegistry = defaultFunctions
): void {
  const getProperties: GetProperty[] = [];
  scanServiceTemplate(plan, (value, scope, context, path) => {
    const fn = registry.parse(value, { scope, context, path });
    if (fn) {
      fn.validate(plan);
      if (fn instanceof GetProperty) getProperties.push(fn);
    }
    return value;
  });

  for (const fn of getProperties) {
    checkGetPropertyChain(plan, registry, fn, [fn.functionId(plan)]);
  }
}

function checkGetPropertyChain(
  plan: Plan,
  registry: FunctionRegistry,
  fn: GetProperty,
  visited: readonly string[]
): void {
  const location = fn.resultLocation(plan);

  const visit = (value: RawValue): void => {
    const nested = registry.parse(value, { ...location, path: fn.path });
    if (nested instanceof GetProperty) {
      const id = nested.functionId(plan);
      const chain = [...visited, id];
      if (visited.includes(id)) {
        const error = new DslLogicError(
          ERROR_CODE_CYCLE,
          `Circular get_property function call detected: ${chain.join(" -> ")}`
        );
        error.circularDependency = chain;
        throw error;
      }
      checkGetPropertyChain(plan, registry, nested, chain);
      return;
    }
    if (isRawMap(value)) Object.values(value).forEach(visit);
    else if (Array.isArray(value)) value.forEach(visit);
  };

  visit(fn.evaluate(plan));
}
