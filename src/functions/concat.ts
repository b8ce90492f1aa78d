// concat: joins its arguments into one string once all of them are resolved

import type { Plan, RawValue } from "../model.js";
import { DSL_VERSION_1_1 } from "../version.js";
import { IntrinsicFunction } from "./function.js";
import {
  NODE_TEMPLATE_RELATIONSHIP_SCOPE,
  NODE_TEMPLATE_SCOPE,
  OUTPUTS_SCOPE,
} from "./scan.js";

export class Concat extends IntrinsicFunction<RawValue[]> {
  readonly supportedVersion = DSL_VERSION_1_1;

  protected parseArgs(args: RawValue): RawValue[] {
    if (!Array.isArray(args)) {
      return this.fail(
        `Illegal arguments passed to ${this.name} function. ` +
          `Expected: [arg1, arg2, ...] but got: ${JSON.stringify(args)}.`
      );
    }
    return args;
  }

  validate(plan: Plan): void {
    this.validateVersion(plan.version);
    const allowed = [
      NODE_TEMPLATE_SCOPE,
      NODE_TEMPLATE_RELATIONSHIP_SCOPE,
      OUTPUTS_SCOPE,
    ];
    if (!this.scope || !allowed.includes(this.scope)) {
      this.fail(`${this.name} cannot be used in ${this.path}.`);
    }
  }

  evaluate(_plan: Plan): RawValue {
    return this.joinWhenResolved();
  }

  evaluateRuntime(): RawValue {
    return this.joinWhenResolved();
  }

  /** The joined string, or the raw form while an argument is a function. */
  private joinWhenResolved(): RawValue {
    if (this.args.some((arg) => this.registry.isFunction(arg))) return this.raw;
    return this.args
      .map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg)))
      .join("");
  }
}
