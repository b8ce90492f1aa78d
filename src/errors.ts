// Numbered errors raised while parsing blueprints and evaluating functions

import type { Element } from "./framework/element.js";

export const ERROR_CODE_FORMAT = 1;
export const ERROR_CODE_NO_TYPE_DEFINITION = 7;
export const ERROR_CODE_NODE_OPERATION_PLUGIN = 10;
export const ERROR_CODE_RELATIONSHIP_OPERATION_PLUGIN = 19;
export const ERROR_CODE_WORKFLOW_MAPPING = 21;
export const ERROR_CODE_SELF_RELATIONSHIP = 23;
export const ERROR_CODE_UNKNOWN_RELATIONSHIP_TARGET = 25;
export const ERROR_CODE_UNKNOWN_RELATIONSHIP_TYPE = 26;
export const ERROR_CODE_MISSING_VERSION = 27;
export const ERROR_CODE_ILLEGAL_EXECUTOR = 28;
export const ERROR_CODE_VERSION_MISMATCH = 28;
export const ERROR_CODE_SCRIPT_PATH_PROPERTY = 60;
export const ERROR_CODE_MISSING_SCRIPT_PLUGIN = 61;
export const ERROR_CODE_INVALID_VERSION = 71;
export const ERROR_CODE_UNSUPPORTED_VERSION = 73;
export const ERROR_CODE_AMBIGUOUS_OPERATION_MAPPING = 91;
export const ERROR_CODE_CYCLE = 100;
export const ERROR_CODE_UNKNOWN_TYPE = 103;
export const ERROR_CODE_VALUE_DOES_NOT_MATCH_TYPE = 105;
export const ERROR_CODE_UNDEFINED_PROPERTY = 106;
export const ERROR_CODE_MISSING_PROPERTY = 107;
export const ERROR_CODE_MULTIPLE_CONTAINED_IN = 112;

export class DslParsingError extends Error {
  readonly code: number;
  /** The element being processed when the error surfaced. */
  element?: Element;

  constructor(code: number, message: string) {
    super(message);
    this.name = "DslParsingError";
    this.code = code;
  }

  get elementPath(): string | undefined {
    return this.element?.path;
  }
}

/** Structural mismatch between a document and its schema. */
export class DslFormatError extends DslParsingError {
  constructor(message: string, code: number = ERROR_CODE_FORMAT) {
    super(code, message);
    this.name = "DslFormatError";
  }
}

export class DslLogicError extends DslParsingError {
  property?: string;
  relationshipTypes?: string[];
  circularDependency?: string[];

  constructor(code: number, message: string) {
    super(code, message);
    this.name = "DslLogicError";
  }
}

/** The element type definitions themselves are malformed. */
export class DslSchemaApiError extends DslParsingError {
  constructor(message: string) {
    super(ERROR_CODE_FORMAT, message);
    this.name = "DslSchemaApiError";
  }
}

export class FunctionEvaluationError extends Error {
  readonly functionName: string;
  readonly path: string | undefined;

  constructor(functionName: string, message: string, path?: string) {
    super(message);
    this.name = "FunctionEvaluationError";
    this.functionName = functionName;
    this.path = path;
  }
}

export class UnknownInputError extends FunctionEvaluationError {
  readonly inputName: string;

  constructor(inputName: string, message: string, path?: string) {
    super("get_input", message, path);
    this.name = "UnknownInputError";
    this.inputName = inputName;
  }
}

export class MissingRequiredInputError extends FunctionEvaluationError {
  readonly inputName: string;

  constructor(inputName: string, message: string) {
    super("get_input", message);
    this.name = "MissingRequiredInputError";
    this.inputName = inputName;
  }
}

/** Raised for states that well-formed schemas and plans never reach. */
export class IllegalStateError extends Error {
  constructor(message = "Illegal state") {
    super(message);
    this.name = "IllegalStateError";
  }
}
