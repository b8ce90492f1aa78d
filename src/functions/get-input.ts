// get_input: reads a deployment input, optionally walking into it

import { UnknownInputError } from "../errors.js";
import { hasKey, type Plan, type RawValue } from "../model.js";
import { IntrinsicFunction } from "./function.js";
import {
  getPropertyValue,
  isPathSegment,
  type PathSegment,
} from "./property-path.js";

export interface GetInputArgs {
  inputName: string;
  path: PathSegment[];
}

export class GetInput extends IntrinsicFunction<GetInputArgs> {
  protected parseArgs(args: RawValue): GetInputArgs {
    if (typeof args === "string") return { inputName: args, path: [] };
    if (Array.isArray(args) && args.length > 0) {
      const [inputName, ...path] = args;
      if (typeof inputName === "string" && path.every(isPathSegment)) {
        return { inputName, path };
      }
    }
    return this.fail(
      "get_input function argument should be a string or a list starting " +
        `with the input name in ${this.path} but is '${JSON.stringify(args)}'.`
    );
  }

  validate(plan: Plan): void {
    this.checkKnown(plan);
  }

  evaluate(plan: Plan): RawValue {
    this.checkKnown(plan);
    const { inputName, path } = this.args;
    const value = plan.inputs[inputName];
    if (path.length === 0) return structuredClone(value);
    const nested = getPropertyValue(value, path, {
      functionName: this.name,
      owner: inputName,
      contextPath: this.path,
      label: "Input",
    });
    return structuredClone(nested ?? null);
  }

  evaluateRuntime(): RawValue {
    return this.fail(`runtime evaluation for ${this.name} is not supported`);
  }

  private checkKnown(plan: Plan): void {
    const { inputName } = this.args;
    if (!hasKey(plan.inputs, inputName)) {
      throw new UnknownInputError(
        inputName,
        `get_input function references an unknown input '${inputName}'.`,
        this.path
      );
    }
  }
}
