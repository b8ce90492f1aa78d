// Built-in intrinsic functions

import { Concat } from "./concat.js";
import { FunctionRegistry } from "./function.js";
import { GetAttribute } from "./get-attribute.js";
import { GetInput } from "./get-input.js";
import { GetProperty } from "./get-property.js";

export function createDefaultFunctionRegistry(): FunctionRegistry {
  return new FunctionRegistry()
    .register("get_input", GetInput)
    .register("get_property", GetProperty)
    .register("get_attribute", GetAttribute)
    .register("concat", Concat);
}

/**
 * Shared registry for callers that do not build their own. Registering on it
 * affects every such caller.
 */
export const defaultFunctions = createDefaultFunctionRegistry();
