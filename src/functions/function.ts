// Intrinsic function contract and the name-to-kind registry

import { FunctionEvaluationError } from "../errors.js";
import {
  compareVersions,
  isRawMap,
  type DslVersion,
  type Plan,
  type RawMap,
  type RawValue,
} from "../model.js";
import type { RuntimeEvaluationStorage } from "./storage.js";
import type { FunctionContext, FunctionScope, ScanLocation } from "./scan.js";

export const SELF = "SELF";
export const SOURCE = "SOURCE";
export const TARGET = "TARGET";

export interface FunctionInit {
  name: string;
  registry: FunctionRegistry;
  scope?: FunctionScope;
  context: FunctionContext;
  path: string;
  raw: RawMap;
}

/**
 * An expression embedded in a document as a single-key mapping, e.g.
 * `{ get_input: port }`. `A` is the shape of its parsed arguments.
 */
export abstract class IntrinsicFunction<A = unknown> {
  readonly name: string;
  readonly registry: FunctionRegistry;
  readonly scope: FunctionScope | undefined;
  readonly context: FunctionContext;
  readonly path: string;
  readonly raw: RawMap;
  readonly args: A;
  readonly supportedVersion?: DslVersion;

  constructor(args: RawValue, init: FunctionInit) {
    this.name = init.name;
    this.registry = init.registry;
    this.scope = init.scope;
    this.context = init.context;
    this.path = init.path;
    this.raw = init.raw;
    this.args = this.parseArgs(args);
  }

  /** Checks the argument shape; throws on malformed arguments. */
  protected abstract parseArgs(args: RawValue): A;

  /** Static existence checks against a built plan. */
  abstract validate(plan: Plan): void;

  /** Template-time value, or `raw` when the value is only known at runtime. */
  abstract evaluate(plan: Plan): RawValue;

  abstract evaluateRuntime(storage: RuntimeEvaluationStorage): RawValue;

  /** Scope and context that functions nested in `evaluate(plan)` belong to. */
  resultLocation(_plan: Plan): ScanLocation {
    return { scope: this.scope, context: this.context };
  }

  protected fail(message: string): never {
    throw new FunctionEvaluationError(this.name, message, this.path);
  }

  protected validateVersion(version: DslVersion | undefined): void {
    const supported = this.supportedVersion;
    if (!supported || !version) return;
    if (compareVersions(version, supported) < 0) {
      this.fail(
        `Using ${this.name} requires using dsl version ${supported.raw} ` +
          "or greater, " +
          `but found: ${version.raw} in ${this.path}.`
      );
    }
  }
}

export type FunctionKind = new (
  args: RawValue,
  init: FunctionInit
) => IntrinsicFunction;

export interface ParseFunctionOptions {
  scope?: FunctionScope;
  context?: FunctionContext;
  path?: string;
}

export class FunctionRegistry {
  private readonly kinds = new Map<string, FunctionKind>();

  register(name: string, kind: FunctionKind): this {
    this.kinds.set(name, kind);
    return this;
  }

  unregister(name: string): boolean {
    return this.kinds.delete(name);
  }

  has(name: string): boolean {
    return this.kinds.has(name);
  }

  names(): string[] {
    return [...this.kinds.keys()];
  }

  /** The function `raw` denotes, or undefined when it is plain data. */
  parse(
    raw: RawValue,
    options: ParseFunctionOptions = {}
  ): IntrinsicFunction | undefined {
    if (!isRawMap(raw)) return undefined;
    const keys = Object.keys(raw);
    if (keys.length !== 1) return undefined;
    const name = keys[0];
    const kind = this.kinds.get(name);
    if (!kind) return undefined;
    return new kind(raw[name], {
      name,
      registry: this,
      scope: options.scope,
      context: options.context ?? {},
      path: options.path ?? "",
      raw,
    });
  }

  isFunction(raw: RawValue): boolean {
    return this.parse(raw) !== undefined;
  }
}
