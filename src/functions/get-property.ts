// get_property: reads a node template property, statically or at runtime

import type { Plan, PlanNodeTemplate, RawValue } from "../model.js";
import { IntrinsicFunction, SELF, SOURCE, TARGET } from "./function.js";
import {
  getPropertyValue,
  isPathSegment,
  type PathSegment,
} from "./property-path.js";
import {
  NODE_TEMPLATE_RELATIONSHIP_SCOPE,
  NODE_TEMPLATE_SCOPE,
  type ScanLocation,
} from "./scan.js";
import type { RuntimeEvaluationStorage } from "./storage.js";

export interface NodePathArgs {
  nodeName: string;
  path: PathSegment[];
}

/** `[node_name, key, nested...]` as taken by get_property and get_attribute. */
export function parseNodePathArgs(args: RawValue): NodePathArgs | undefined {
  if (!Array.isArray(args) || args.length < 2) return undefined;
  const [nodeName, ...path] = args;
  if (typeof nodeName !== "string") return undefined;
  if (!path.every(isPathSegment)) return undefined;
  return { nodeName, path };
}

export class GetProperty extends IntrinsicFunction<NodePathArgs> {
  protected parseArgs(args: RawValue): NodePathArgs {
    return (
      parseNodePathArgs(args) ??
      this.fail(
        `Illegal arguments passed to ${this.name} function. Expected: ` +
          "<node_name, property_name [, nested-property-1, ... ]> " +
          `but got: ${JSON.stringify(args)}.`
      )
    );
  }

  validate(plan: Plan): void {
    this.evaluate(plan);
  }

  evaluate(plan: Plan): RawValue {
    const node = this.nodeTemplate(plan);
    return structuredClone(this.propertyOf(node.name, node.properties));
  }

  /**
   * Functions found in the value belong to the node that owns the property.
   * The operation being evaluated, if any, is carried along.
   */
  resultLocation(plan: Plan): ScanLocation {
    return {
      scope: NODE_TEMPLATE_SCOPE,
      context: {
        nodeTemplate: this.nodeTemplate(plan),
        operation: this.context.operation,
      },
    };
  }

  /** `node.path` key used to detect get_property reference cycles. */
  functionId(plan: Plan): string {
    const path = this.args.path.map(String).join(",");
    return `${this.nodeTemplate(plan).name}.${path}`;
  }

  nodeTemplate(plan: Plan): PlanNodeTemplate {
    const { nodeName } = this.args;
    const { nodeTemplate, relationship } = this.context;

    if (nodeName === SELF) {
      if (this.scope !== NODE_TEMPLATE_SCOPE || !nodeTemplate) {
        return this.fail(
          `${SELF} can only be used in a context of node template ` +
            `but appears in ${this.scope ?? this.path}.`
        );
      }
      return nodeTemplate;
    }

    if (nodeName === SOURCE || nodeName === TARGET) {
      const inRelationship = this.scope === NODE_TEMPLATE_RELATIONSHIP_SCOPE;
      if (!inRelationship || !nodeTemplate || !relationship) {
        return this.fail(
          `${nodeName} can only be used within a relationship ` +
            `but is used in ${this.path}`
        );
      }
      if (nodeName === SOURCE) return nodeTemplate;
      const target = plan.node_templates.find(
        (n) => n.name === relationship.target_id
      );
      return target ?? this.missingNode(relationship.target_id);
    }

    return (
      plan.node_templates.find((n) => n.id === nodeName) ??
      this.missingNode(nodeName)
    );
  }

  evaluateRuntime(storage: RuntimeEvaluationStorage): RawValue {
    const node = storage.getNode(this.runtimeNodeId(storage));
    return structuredClone(this.propertyOf(node.id, node.properties));
  }

  private runtimeNodeId(storage: RuntimeEvaluationStorage): string {
    const { nodeName, path } = this.args;
    const refs: Record<string, string | undefined> = {
      [SELF]: this.context.self,
      [SOURCE]: this.context.source,
      [TARGET]: this.context.target,
    };
    if (nodeName !== SELF && nodeName !== SOURCE && nodeName !== TARGET) {
      return nodeName;
    }
    const instanceId = refs[nodeName];
    if (!instanceId) {
      return this.fail(
        `${nodeName} is missing in request context in ${this.path} ` +
          `for property ${JSON.stringify(path)}`
      );
    }
    return storage.getNodeInstance(instanceId).node_id;
  }

  private propertyOf(nodeName: string, properties: RawValue): RawValue {
    return (
      getPropertyValue(properties, this.args.path, {
        functionName: this.name,
        owner: `${nodeName}.properties`,
        contextPath: this.path,
      }) ?? null
    );
  }

  private missingNode(nodeName: string): never {
    return this.fail(
      `${this.name} function node reference '${nodeName}' does not exist.`
    );
  }
}
