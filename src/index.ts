// Blueprint semantics: public library surface

export { parseBlueprint, prepareDeploymentPlan } from "./blueprint.js";
export type { BlueprintParseOptions } from "./blueprint.js";
export {
  loadDocument,
  loadDocumentText,
  parseBlueprintFile,
  toRawValue,
} from "./loader.js";
export * from "./errors.js";
export * from "./model.js";
export * from "./constants.js";
export {
  DSL_VERSION_1_0,
  DSL_VERSION_1_1,
  DSL_VERSION_1_2,
  SUPPORTED_VERSIONS,
  parseDslVersion,
  parseSupportedDslVersion,
} from "./version.js";

// Engine
export {
  Element,
  ElementRegistry,
  UNKNOWN_ELEMENT,
} from "./framework/element.js";
export type { ElementType, RequirementValues } from "./framework/element.js";
export { parse, validateSchemaApi } from "./framework/parser.js";
export type { ParseOptions } from "./framework/parser.js";
export {
  requirement,
  value,
  siblingPredicate,
  SELF_TYPE,
  INPUTS,
} from "./framework/requirements.js";
export type {
  Requirement,
  RequirementOptions,
  RequirementPredicate,
} from "./framework/requirements.js";
export { anyOf, dictOf, leaf, listOf, record } from "./framework/schema.js";
export type { LeafType, SchemaDescriptor } from "./framework/schema.js";
export { DirectedGraph } from "./framework/graph.js";

// Intrinsic functions
export {
  FunctionRegistry,
  IntrinsicFunction,
  SELF,
  SOURCE,
  TARGET,
} from "./functions/function.js";
export type {
  FunctionInit,
  FunctionKind,
  ParseFunctionOptions,
} from "./functions/function.js";
export {
  createDefaultFunctionRegistry,
  defaultFunctions,
} from "./functions/defaults.js";
export {
  evaluateFunctions,
  evaluateOutputs,
  evaluatePlanFunctions,
  validateFunctions,
} from "./functions/evaluation.js";
export { RuntimeEvaluationStorage } from "./functions/storage.js";
export type { RuntimeAccessors } from "./functions/storage.js";
export type { FunctionContext, FunctionScope } from "./functions/scan.js";
export { GetInput } from "./functions/get-input.js";
export { GetProperty } from "./functions/get-property.js";
export { GetAttribute } from "./functions/get-attribute.js";
export { Concat } from "./functions/concat.js";

// Type/Property resolver
export {
  flattenSchema,
  mergeSchemas,
  mergeSchemaAndInstanceProperties,
  parseValue,
} from "./properties.js";
export type {
  DataType,
  DataTypes,
  PropertyDefinition,
  PropertySchema,
} from "./properties.js";

// Blueprint language
export { createBlueprintRegistry } from "./elements/registry.js";
export {
  mergeNodeTypeAndNodeTemplateInterfaces,
  mergeNodeTypeInterfaces,
} from "./elements/interfaces.js";
export {
  processOperation,
  processWorkflow,
  toOperationSpec,
} from "./elements/operation.js";
export type { InterfaceSpecs, OperationSpec } from "./elements/operation.js";
