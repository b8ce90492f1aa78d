// plugins section

import { VALID_EXECUTORS } from "../constants.js";
import { DslLogicError, ERROR_CODE_ILLEGAL_EXECUTOR } from "../errors.js";
import type { ElementType } from "../framework/element.js";
import { dictOf, leaf, record } from "../framework/schema.js";
import type { PlanPlugin } from "../model.js";
import { asMap, optionalString } from "./helpers.js";

export const PLUGIN = "Plugin";

export class PluginDefinition implements PlanPlugin {
  constructor(
    readonly name: string,
    readonly executor: string | null,
    readonly source: string | null,
    readonly install: boolean
  ) {}
}

export function toPlugins(
  definitions: readonly PluginDefinition[]
): Record<string, PlanPlugin> {
  const result: Record<string, PlanPlugin> = {};
  for (const plugin of definitions) {
    result[plugin.name] = {
      name: plugin.name,
      executor: plugin.executor,
      source: plugin.source,
      install: plugin.install,
    };
  }
  return result;
}

export const pluginElements: ElementType[] = [
  {
    name: "PluginExecutor",
    schema: leaf("string"),
    validate(element) {
      const executor = element.initialValue;
      if (typeof executor !== "string") return;
      if (VALID_EXECUTORS.includes(executor)) return;
      throw new DslLogicError(
        ERROR_CODE_ILLEGAL_EXECUTOR,
        `Plugin '${String(element.parent?.name)}' has an illegal executor ` +
          `value '${executor}'. ` +
          `valid values are [${VALID_EXECUTORS.join(", ")}]`
      );
    },
  },
  { name: "PluginSource", schema: leaf("string") },
  { name: "PluginInstall", schema: leaf("boolean") },
  {
    name: PLUGIN,
    schema: record({
      executor: "PluginExecutor",
      source: "PluginSource",
      install: "PluginInstall",
    }),
    parse(element) {
      const raw = asMap(element.initialValue);
      const install = raw["install"];
      return new PluginDefinition(
        String(element.name),
        optionalString(raw, "executor") ?? null,
        optionalString(raw, "source") ?? null,
        typeof install === "boolean" ? install : true
      );
    },
  },
  { name: "Plugins", schema: dictOf(PLUGIN) },
];
