// Memoizing facade over the host's node and node instance store

import type { NodeInstance, RuntimeNode } from "../model.js";

/** Callbacks through which runtime evaluation reads live data. */
export interface RuntimeAccessors {
  getNodeInstances(nodeId: string): NodeInstance[];
  getNodeInstance(nodeInstanceId: string): NodeInstance;
  getNode(nodeId: string): RuntimeNode;
}

/**
 * Each key is fetched from the host at most once. One storage lives for a
 * single evaluation call.
 */
export class RuntimeEvaluationStorage {
  private readonly instancesByNode = new Map<string, NodeInstance[]>();
  private readonly instances = new Map<string, NodeInstance>();
  private readonly nodes = new Map<string, RuntimeNode>();

  constructor(private readonly accessors: RuntimeAccessors) {}

  getNodeInstances(nodeId: string): NodeInstance[] {
    const cached = this.instancesByNode.get(nodeId);
    if (cached) return cached;
    const instances = this.accessors.getNodeInstances(nodeId);
    this.instancesByNode.set(nodeId, instances);
    for (const instance of instances) this.instances.set(instance.id, instance);
    return instances;
  }

  getNodeInstance(nodeInstanceId: string): NodeInstance {
    const cached = this.instances.get(nodeInstanceId);
    if (cached) return cached;
    const instance = this.accessors.getNodeInstance(nodeInstanceId);
    this.instances.set(nodeInstanceId, instance);
    return instance;
  }

  getNode(nodeId: string): RuntimeNode {
    const cached = this.nodes.get(nodeId);
    if (cached) return cached;
    const node = this.accessors.getNode(nodeId);
    this.nodes.set(nodeId, node);
    return node;
  }
}
