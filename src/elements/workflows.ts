// workflows section

import { ERROR_CODE_WORKFLOW_MAPPING } from "../errors.js";
import type { ElementType } from "../framework/element.js";
import { requirement } from "../framework/requirements.js";
import { anyOf, dictOf, leaf, record } from "../framework/schema.js";
import type { PlanWorkflow } from "../model.js";
import { SCHEMA } from "./data-types.js";
import { allValues, asMap, instancesOf, optionalString } from "./helpers.js";
import { processWorkflow } from "./operation.js";
import { PLUGIN, PluginDefinition, toPlugins } from "./plugins.js";

export const WORKFLOW = "Workflow";
export const WORKFLOWS = "Workflows";

export class WorkflowDefinition {
  constructor(
    readonly name: string,
    readonly workflow: PlanWorkflow
  ) {}
}

export const workflowElements: ElementType[] = [
  { name: "WorkflowMapping", schema: leaf("string"), required: true },
  {
    name: WORKFLOW,
    schema: anyOf(
      leaf("string"),
      record({ mapping: "WorkflowMapping", parameters: SCHEMA })
    ),
    required: true,
    requires: {
      [PLUGIN]: [allValues("plugins")],
      inputs: [requirement("resource_base", { required: false })],
    },
    parse(element, args) {
      const raw = element.initialValue;
      const map = asMap(raw);
      const mapping =
        typeof raw === "string" ? raw : optionalString(map, "mapping") ?? "";
      const parameters = structuredClone(asMap(map["parameters"]));
      const resourceBase = args["resource_base"];
      const name = String(element.name);
      return new WorkflowDefinition(
        name,
        processWorkflow(name, mapping, parameters, {
          plugins: toPlugins(
            instancesOf(args["plugins"], PluginDefinition, "plugins")
          ),
          errorCode: ERROR_CODE_WORKFLOW_MAPPING,
          resourceBase:
            typeof resourceBase === "string" ? resourceBase : null,
        })
      );
    },
  },
  {
    name: WORKFLOWS,
    schema: dictOf(WORKFLOW),
    requires: {
      [PLUGIN]: [allValues("plugins")],
      [WORKFLOW]: [allValues("workflows")],
    },
    calculateProvided(_element, args) {
      const plugins = instancesOf(args["plugins"], PluginDefinition, "plugins");
      const workflows = instancesOf(
        args["workflows"],
        WorkflowDefinition,
        "workflows"
      );
      return {
        workflow_plugins_to_install: workflowPlugins(workflows, plugins),
      };
    },
  },
];

/** Plugins the workflows map to, each once, in workflow order. */
function workflowPlugins(
  workflows: readonly WorkflowDefinition[],
  plugins: readonly PluginDefinition[]
): PluginDefinition[] {
  const result: PluginDefinition[] = [];
  for (const { workflow } of workflows) {
    const plugin = plugins.find((p) => p.name === workflow.plugin);
    if (plugin && !result.includes(plugin)) result.push(plugin);
  }
  return result;
}

export function toWorkflows(
  definitions: readonly WorkflowDefinition[]
): Record<string, PlanWorkflow> {
  const result: Record<string, PlanWorkflow> = {};
  for (const definition of definitions) {
    result[definition.name] = definition.workflow;
  }
  return result;
}
