// get_attribute: reads live runtime properties of a node instance

import type { NodeInstance, Plan, RawValue } from "../model.js";
import {
  resolveByRelationship,
  resolveByScalingGroup,
} from "./disambiguation.js";
import { IntrinsicFunction, SELF, SOURCE, TARGET } from "./function.js";
import { parseNodePathArgs, type NodePathArgs } from "./get-property.js";
import { getPropertyValue } from "./property-path.js";
import {
  NODE_TEMPLATE_RELATIONSHIP_SCOPE,
  NODE_TEMPLATE_SCOPE,
  OUTPUTS_SCOPE,
} from "./scan.js";
import type { RuntimeEvaluationStorage } from "./storage.js";

const INSTANCE_REFS: readonly string[] = [SELF, SOURCE, TARGET];

export class GetAttribute extends IntrinsicFunction<NodePathArgs> {
  protected parseArgs(args: RawValue): NodePathArgs {
    return (
      parseNodePathArgs(args) ??
      this.fail(
        `Illegal arguments passed to ${this.name} function. Expected: ` +
          "<node_name, attribute_name [, nested-attr-1, ...]> " +
          `but got: ${JSON.stringify(args)}.`
      )
    );
  }

  validate(plan: Plan): void {
    const { nodeName } = this.args;
    const isRef = INSTANCE_REFS.includes(nodeName);
    const relationshipRef = nodeName === SOURCE || nodeName === TARGET;
    const forbidden =
      (this.scope === OUTPUTS_SCOPE && isRef) ||
      (this.scope === NODE_TEMPLATE_SCOPE && relationshipRef) ||
      (this.scope === NODE_TEMPLATE_RELATIONSHIP_SCOPE && nodeName === SELF);
    if (forbidden) {
      this.fail(
        `${nodeName} cannot be used with ${this.name} function in ${this.path}.`
      );
    }
    if (!isRef && !plan.node_templates.some((n) => n.id === nodeName)) {
      this.fail(
        `${this.name} function node reference '${nodeName}' does not exist.`
      );
    }
  }

  /**
   * Attributes only exist at runtime; flags the owning operation and keeps
   * the raw form.
   */
  evaluate(_plan: Plan): RawValue {
    const { operation } = this.context;
    if (operation) operation.has_intrinsic_functions = true;
    return this.raw;
  }

  evaluateRuntime(storage: RuntimeEvaluationStorage): RawValue {
    const instance = this.resolveInstance(storage);
    const lookup = {
      functionName: this.name,
      owner: `${instance.node_id}.properties`,
      contextPath: this.path,
      raiseIfNotFound: false,
    };
    const runtimeProperties = instance.runtime_properties ?? {};
    const runtimeValue = getPropertyValue(
      runtimeProperties,
      this.args.path,
      lookup
    );
    if (runtimeValue !== undefined && runtimeValue !== null) {
      return structuredClone(runtimeValue);
    }

    const node = storage.getNode(instance.node_id);
    const nodeValue = getPropertyValue(node.properties, this.args.path, lookup);
    return structuredClone(nodeValue ?? null);
  }

  private resolveInstance(storage: RuntimeEvaluationStorage): NodeInstance {
    const { nodeName } = this.args;
    switch (nodeName) {
      case SELF: {
        const id = this.requireRef(this.context.self, SELF);
        return storage.getNodeInstance(id);
      }
      case SOURCE: {
        const id = this.requireRef(this.context.source, SOURCE);
        return storage.getNodeInstance(id);
      }
      case TARGET: {
        const id = this.requireRef(this.context.target, TARGET);
        return storage.getNodeInstance(id);
      }
      default:
        return this.resolveByName(storage, nodeName);
    }
  }

  private resolveByName(
    storage: RuntimeEvaluationStorage,
    nodeName: string
  ): NodeInstance {
    const candidates = storage.getNodeInstances(nodeName);
    if (candidates.length === 0) {
      return this.fail(
        `Node specified in function does not exist: ${nodeName}.`
      );
    }
    if (candidates.length === 1) return candidates[0];

    const resolved =
      resolveByRelationship(storage, this.context.self, nodeName, candidates) ??
      resolveByScalingGroup(storage, this.context, candidates);
    return (
      resolved ??
      this.fail(
        `More than one node instance found for node "${nodeName}". ` +
          `Cannot resolve a node instance unambiguously.`
      )
    );
  }

  private requireRef(instanceId: string | undefined, refName: string): string {
    if (!instanceId) {
      return this.fail(
        `${refName} is missing in request context in ${this.path} ` +
          "for attribute " +
          JSON.stringify(this.args.path)
      );
    }
    return instanceId;
  }
}
