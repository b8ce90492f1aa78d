// Operations and interfaces: element types and plugin mapping

import { existsSync } from "node:fs";
import { join } from "node:path";
import {
  LOCAL_AGENT,
  SCRIPT_PATH_PROPERTY,
  SCRIPT_PLUGIN_EXECUTE_WORKFLOW_TASK,
  SCRIPT_PLUGIN_NAME,
  SCRIPT_PLUGIN_RUN_TASK,
  VALID_EXECUTORS,
} from "../constants.js";
import {
  DslFormatError,
  DslLogicError,
  ERROR_CODE_AMBIGUOUS_OPERATION_MAPPING,
  ERROR_CODE_ILLEGAL_EXECUTOR,
  ERROR_CODE_MISSING_SCRIPT_PLUGIN,
  ERROR_CODE_SCRIPT_PATH_PROPERTY,
} from "../errors.js";
import type { ElementType } from "../framework/element.js";
import { anyOf, dictOf, leaf, record } from "../framework/schema.js";
import {
  hasKey,
  type PlanOperation,
  type PlanPlugin,
  type PlanWorkflow,
  type RawMap,
  type RawValue,
} from "../model.js";
import { DSL_VERSION_1_1 } from "../version.js";
import { SCHEMA } from "./data-types.js";
import {
  VERSION_REQUIREMENTS,
  asMap,
  optionalNumber,
  optionalString,
} from "./helpers.js";

/**
 * An operation as declared on a type or a template. On a type `inputs` is a
 * property schema; on a template it holds values.
 */
export interface OperationSpec {
  implementation: string;
  inputs: RawMap;
  executor: string | null;
  max_retries: number | null;
  retry_interval: number | null;
}

/** Interface name to operation name to operation. */
export type InterfaceSpecs = Record<string, Record<string, OperationSpec>>;

/** Types default the executor; templates leave it unset for the type's. */
export type OperationLevel = "type" | "template";

export const NO_OP: Readonly<OperationSpec> = {
  implementation: "",
  inputs: {},
  executor: LOCAL_AGENT,
  max_retries: null,
  retry_interval: null,
};

export function toOperationSpec(
  raw: RawValue | undefined,
  level: OperationLevel
): OperationSpec {
  const defaultExecutor = level === "type" ? LOCAL_AGENT : null;
  if (typeof raw === "string") {
    return {
      ...NO_OP,
      implementation: raw,
      inputs: {},
      executor: defaultExecutor,
    };
  }
  const map = asMap(raw);
  return {
    implementation: optionalString(map, "implementation") ?? "",
    inputs: asMap(map["inputs"]),
    executor: optionalString(map, "executor") ?? defaultExecutor,
    max_retries: optionalNumber(map, "max_retries"),
    retry_interval: optionalNumber(map, "retry_interval"),
  };
}

export function toInterfaces(
  raw: RawValue | undefined,
  level: OperationLevel
): InterfaceSpecs {
  const result: InterfaceSpecs = {};
  for (const [interfaceName, operations] of Object.entries(asMap(raw))) {
    const specs: Record<string, OperationSpec> = {};
    for (const [name, operation] of Object.entries(asMap(operations))) {
      specs[name] = toOperationSpec(operation, level);
    }
    result[interfaceName] = specs;
  }
  return result;
}

// --- element types ---

function operationFields(inputsType: string): Record<string, string> {
  return {
    implementation: "OperationImplementation",
    inputs: inputsType,
    executor: "OperationExecutor",
    max_retries: "OperationMaxRetries",
    retry_interval: "OperationRetryInterval",
  };
}

export const operationElements: ElementType[] = [
  { name: "OperationImplementation", schema: leaf("string") },
  {
    name: "OperationExecutor",
    schema: leaf("string"),
    validate(element) {
      const executor = element.initialValue;
      if (typeof executor !== "string") return;
      if (VALID_EXECUTORS.includes(executor)) return;
      const operation = element.parent;
      const interfaceName = String(operation?.parent?.name);
      const fullName = `${interfaceName}.${String(operation?.name)}`;
      throw new DslLogicError(
        ERROR_CODE_ILLEGAL_EXECUTOR,
        `Operation '${fullName}' has an illegal executor ` +
          `value '${executor}'. ` +
          `valid values are [${VALID_EXECUTORS.join(", ")}]`
      );
    },
  },
  {
    name: "OperationMaxRetries",
    schema: leaf("integer"),
    supportedVersion: DSL_VERSION_1_1,
    requires: VERSION_REQUIREMENTS,
    validate(element) {
      const value = element.initialValue;
      if (typeof value === "number" && value < -1) {
        throw new DslFormatError(
          `'${String(element.name)}' value must be either -1 ` +
            "to specify unlimited retries " +
            `or a non negative number but got ${value}.`
        );
      }
    },
  },
  {
    name: "OperationRetryInterval",
    schema: leaf("integer", "float"),
    supportedVersion: DSL_VERSION_1_1,
    requires: VERSION_REQUIREMENTS,
    validate(element) {
      const value = element.initialValue;
      if (typeof value === "number" && value < 0) {
        throw new DslFormatError(
          `'${String(element.name)}' value must be a non negative number ` +
            `but got ${value}.`
        );
      }
    },
  },
  { name: "NodeTemplateOperationInputs", schema: leaf("dict") },
  {
    name: "NodeTypeOperation",
    schema: anyOf(leaf("string"), record(operationFields(SCHEMA))),
    parse: (element) => toOperationSpec(element.initialValue, "type"),
  },
  {
    name: "NodeTemplateOperation",
    schema: anyOf(
      leaf("string"),
      record(operationFields("NodeTemplateOperationInputs"))
    ),
    parse: (element) => toOperationSpec(element.initialValue, "template"),
  },
  { name: "NodeTypeInterface", schema: dictOf("NodeTypeOperation") },
  {
    name: "NodeTypeInterfaces",
    schema: dictOf("NodeTypeInterface"),
    parse: (element) => toInterfaces(element.initialValue, "type"),
  },
  { name: "NodeTemplateInterface", schema: dictOf("NodeTemplateOperation") },
  {
    name: "NodeTemplateInterfaces",
    schema: dictOf("NodeTemplateInterface"),
    parse: (element) => toInterfaces(element.initialValue, "template"),
  },
];

// --- mapping implementations to plugins ---

export interface MappingOptions {
  plugins: Readonly<Record<string, PlanPlugin>>;
  /** Code raised when the mapping names no plugin and no script. */
  errorCode: number;
  partialErrorMessage?: string;
  /** Directory that script mappings are resolved against. */
  resourceBase?: string | null;
}

type Resolution =
  | { kind: "plugin"; plugin: string; mapping: string }
  | { kind: "script" };

function resolveMapping(
  kind: "operation" | "workflow",
  name: string,
  mapping: string,
  options: MappingOptions
): Resolution {
  const candidates = Object.keys(options.plugins).filter((p) =>
    mapping.startsWith(`${p}.`)
  );
  if (candidates.length > 1) {
    throw new DslLogicError(
      ERROR_CODE_AMBIGUOUS_OPERATION_MAPPING,
      `Ambiguous operation mapping. ` +
        `[operation=${name}, plugins=${candidates.join(", ")}]`
    );
  }
  if (candidates.length === 1) {
    const plugin = candidates[0];
    return {
      kind: "plugin",
      plugin,
      mapping: mapping.slice(plugin.length + 1),
    };
  }
  if (options.resourceBase && existsSync(join(options.resourceBase, mapping))) {
    return { kind: "script" };
  }
  const partial = options.partialErrorMessage;
  const hint = partial ? ` ${partial}` : "";
  throw new DslLogicError(
    options.errorCode,
    `Could not extract plugin from ${kind} mapping '${mapping}', ` +
      `which is declared for ${kind} '${name}'.${hint}`
  );
}

function checkScriptMapping(
  kind: "operation" | "workflow",
  name: string,
  scriptPath: string,
  task: string,
  payload: RawMap,
  plugins: Readonly<Record<string, PlanPlugin>>
): void {
  if (hasKey(payload, SCRIPT_PATH_PROPERTY)) {
    throw new DslLogicError(
      ERROR_CODE_SCRIPT_PATH_PROPERTY,
      `Cannot define '${SCRIPT_PATH_PROPERTY}' property in '${scriptPath}' ` +
        `for ${kind} '${name}'`
    );
  }
  if (!hasKey(plugins, SCRIPT_PLUGIN_NAME)) {
    throw new DslLogicError(
      ERROR_CODE_MISSING_SCRIPT_PLUGIN,
      "Script plugin is not defined but it is required for mapping " +
        `'${task}' of ${kind} '${name}'`
    );
  }
}

export function noOpOperation(name: string): PlanOperation {
  return {
    name,
    plugin: "",
    operation: "",
    executor: null,
    inputs: {},
    has_intrinsic_functions: false,
    max_retries: null,
    retry_interval: null,
  };
}

/**
 * Maps an operation's implementation to `plugin.task` or to a script run by
 * the script plugin. An empty implementation gives a no-op.
 */
export function processOperation(
  name: string,
  spec: OperationSpec,
  options: MappingOptions
): PlanOperation {
  const { plugins } = options;
  if (!spec.implementation) return noOpOperation(name);

  const executorFor = (plugin: string): string =>
    !spec.executor || spec.executor === LOCAL_AGENT
      ? plugins[plugin]?.executor ?? LOCAL_AGENT
      : spec.executor;
  const build = (
    plugin: string,
    operation: string,
    inputs: RawMap
  ): PlanOperation => ({
    name,
    plugin,
    operation,
    executor: executorFor(plugin),
    inputs,
    has_intrinsic_functions: false,
    max_retries: spec.max_retries,
    retry_interval: spec.retry_interval,
  });

  const { implementation, inputs } = spec;
  const resolution = resolveMapping("operation", name, implementation, options);
  if (resolution.kind === "plugin") {
    return build(resolution.plugin, resolution.mapping, inputs);
  }
  checkScriptMapping(
    "operation",
    name,
    implementation,
    SCRIPT_PLUGIN_RUN_TASK,
    inputs,
    plugins
  );
  return build(SCRIPT_PLUGIN_NAME, SCRIPT_PLUGIN_RUN_TASK, {
    ...structuredClone(inputs),
    [SCRIPT_PATH_PROPERTY]: implementation,
  });
}

/** Operations of every interface, keyed `interface.operation`. */
export function processInterfaces(
  interfaces: InterfaceSpecs,
  options: MappingOptions
): Record<string, PlanOperation> {
  const result: Record<string, PlanOperation> = {};
  for (const [interfaceName, operations] of Object.entries(interfaces)) {
    for (const [operationName, spec] of Object.entries(operations)) {
      result[`${interfaceName}.${operationName}`] = processOperation(
        operationName,
        spec,
        options
      );
    }
  }
  return result;
}

export function processWorkflow(
  name: string,
  mapping: string,
  parameters: RawMap,
  options: MappingOptions
): PlanWorkflow {
  const resolution = resolveMapping("workflow", name, mapping, options);
  if (resolution.kind === "plugin") {
    return {
      plugin: resolution.plugin,
      operation: resolution.mapping,
      parameters,
    };
  }
  checkScriptMapping(
    "workflow",
    name,
    mapping,
    SCRIPT_PLUGIN_EXECUTE_WORKFLOW_TASK,
    parameters,
    options.plugins
  );
  return {
    plugin: SCRIPT_PLUGIN_NAME,
    operation: SCRIPT_PLUGIN_EXECUTE_WORKFLOW_TASK,
    parameters: {
      ...structuredClone(parameters),
      [SCRIPT_PATH_PROPERTY]: {
        default: mapping,
        description: "Workflow script executed by the script plugin",
      },
    },
  };
}
