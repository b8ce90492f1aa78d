// Element types of the blueprint language

import { ElementRegistry } from "../framework/element.js";
import { blueprintElement } from "./blueprint.js";
import { schemaElements } from "./data-types.js";
import { miscElements } from "./misc.js";
import { nodeTemplateElements } from "./node-templates.js";
import { operationElements } from "./operation.js";
import { pluginElements } from "./plugins.js";
import { typeElements } from "./types.js";
import { toscaDefinitionsVersion } from "./version.js";
import { workflowElements } from "./workflows.js";

export function createBlueprintRegistry(): ElementRegistry {
  return new ElementRegistry([
    blueprintElement,
    toscaDefinitionsVersion,
    ...miscElements,
    ...schemaElements,
    ...pluginElements,
    ...operationElements,
    ...typeElements,
    ...nodeTemplateElements,
    ...workflowElements,
  ]);
}
