// Document root: assembles the parsed sections into a plan

import { IllegalStateError } from "../errors.js";
import type { ElementType } from "../framework/element.js";
import { record } from "../framework/schema.js";
import {
  isDslVersion,
  type DslVersion,
  type Plan,
  type PlanNodeTemplate,
  type PlanOutput,
  type PlanPlugin,
  type PlanWorkflow,
  type RawMap,
} from "../model.js";
import { VERSION_KEY } from "../version.js";
import {
  allValues,
  asMap,
  instancesOf,
  optionalString,
  VERSION_ELEMENT,
} from "./helpers.js";
import { toOutputs } from "./misc.js";
import { NODE_TEMPLATE, NodeTemplateDefinition } from "./node-templates.js";
import { PLUGIN, PluginDefinition, toPlugins } from "./plugins.js";
import {
  toWorkflows,
  WORKFLOW,
  WorkflowDefinition,
  WORKFLOWS,
} from "./workflows.js";

export const BLUEPRINT = "Blueprint";

export class BlueprintPlan implements Plan {
  constructor(
    readonly version: DslVersion,
    readonly description: string | undefined,
    readonly inputs: RawMap,
    readonly plugins: Record<string, PlanPlugin>,
    readonly node_templates: PlanNodeTemplate[],
    readonly workflows: Record<string, PlanWorkflow>,
    readonly workflow_plugins_to_install: PlanPlugin[],
    readonly outputs: Record<string, PlanOutput>
  ) {}
}

export const blueprintElement: ElementType = {
  name: BLUEPRINT,
  schema: record({
    [VERSION_KEY]: VERSION_ELEMENT,
    description: "Description",
    dsl_definitions: "DslDefinitions",
    inputs: "Inputs",
    data_types: "DataTypes",
    plugins: "Plugins",
    node_types: "NodeTypes",
    relationships: "Relationships",
    node_templates: "NodeTemplates",
    workflows: WORKFLOWS,
    outputs: "Outputs",
  }),
  requires: {
    [VERSION_ELEMENT]: ["version"],
    [PLUGIN]: [allValues("plugins")],
    [NODE_TEMPLATE]: [allValues("node_templates")],
    [WORKFLOW]: [allValues("workflows")],
    [WORKFLOWS]: ["workflow_plugins_to_install"],
  },
  parse(element, args) {
    const raw = asMap(element.initialValue);
    const version = args["version"];
    if (!isDslVersion(version)) {
      throw new IllegalStateError(`Expected a parsed ${VERSION_KEY}`);
    }
    return new BlueprintPlan(
      version,
      optionalString(raw, "description"),
      structuredClone(asMap(raw["inputs"])),
      toPlugins(instancesOf(args["plugins"], PluginDefinition, "plugins")),
      instancesOf(
        args["node_templates"],
        NodeTemplateDefinition,
        "node_templates"
      ),
      toWorkflows(
        instancesOf(args["workflows"], WorkflowDefinition, "workflows")
      ),
      Object.values(
        toPlugins(
          instancesOf(
            args["workflow_plugins_to_install"],
            PluginDefinition,
            "workflow_plugins_to_install"
          )
        )
      ),
      toOutputs(raw["outputs"])
    );
  },
};
