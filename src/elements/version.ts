// tosca_definitions_version element

import type { ElementType } from "../framework/element.js";
import { leaf } from "../framework/schema.js";
import { parseSupportedDslVersion } from "../version.js";
import { VERSION_ELEMENT } from "./helpers.js";

export const toscaDefinitionsVersion: ElementType = {
  name: VERSION_ELEMENT,
  schema: leaf("string"),
  validate(element) {
    parseSupportedDslVersion(element.initialValue);
  },
  parse(element) {
    return parseSupportedDslVersion(element.initialValue);
  },
  calculateProvided(element) {
    return { version: element.value };
  },
};
