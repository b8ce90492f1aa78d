// Picks one node instance among several sharing a template name

import { CONTAINED_IN_RELATIONSHIP_TYPE } from "../constants.js";
import { IllegalStateError } from "../errors.js";
import type { NodeInstance } from "../model.js";
import type { RuntimeEvaluationStorage } from "./storage.js";

export interface InstanceReferences {
  self?: string;
  source?: string;
  target?: string;
}

/**
 * The candidate that `selfId`'s instance targets through its relationships
 * to `nodeName`, when they point at exactly one instance id.
 */
export function resolveByRelationship(
  storage: RuntimeEvaluationStorage,
  selfId: string | undefined,
  nodeName: string,
  candidates: readonly NodeInstance[]
): NodeInstance | undefined {
  if (!selfId) return undefined;
  const self = storage.getNodeInstance(selfId);
  const targetIds = new Set<string>();
  for (const relationship of self.relationships ?? []) {
    if (relationship.target_name === nodeName) {
      targetIds.add(relationship.target_id);
    }
  }
  if (targetIds.size !== 1) return undefined;
  const [targetId] = targetIds;
  const found = candidates.find((candidate) => candidate.id === targetId);
  if (!found) {
    throw new IllegalStateError(
      `Relationship target '${targetId}' is not an instance of node ` +
        `'${nodeName}'`
    );
  }
  return found;
}

/** The instance hosting `instance` through a contained-in relationship. */
export function parentInstance(
  storage: RuntimeEvaluationStorage,
  instance: NodeInstance
): NodeInstance | undefined {
  const node = storage.getNode(instance.node_id);
  for (const relationship of node.relationships ?? []) {
    const hierarchy = relationship.type_hierarchy;
    if (!hierarchy.includes(CONTAINED_IN_RELATIONSHIP_TYPE)) continue;
    const targetName = relationship.target_id;
    const link = (instance.relationships ?? []).find(
      (r) => r.target_name === targetName
    );
    if (!link) {
      throw new IllegalStateError(
        `Instance '${instance.id}' has no relationship to its host node ` +
          `'${targetName}'`
      );
    }
    return storage.getNodeInstance(link.target_id);
  }
  return undefined;
}

/** Scaling groups containing `instance`, innermost first, up the hosts. */
export function containingGroups(
  storage: RuntimeEvaluationStorage,
  instance: NodeInstance
): string[] {
  const groups: string[] = [];
  let current: NodeInstance | undefined = instance;
  while (current) {
    for (const group of current.scaling_groups ?? []) groups.push(group.name);
    current = parentInstance(storage, current);
  }
  return groups;
}

export function minimalSharedGroup(
  storage: RuntimeEvaluationStorage,
  a: NodeInstance,
  b: NodeInstance
): string | undefined {
  const bGroups = new Set(containingGroups(storage, b));
  return containingGroups(storage, a).find((group) => bGroups.has(group));
}

/** Id of the `groupName` group instance that contains `instance`. */
export function groupInstance(
  storage: RuntimeEvaluationStorage,
  instance: NodeInstance,
  groupName: string
): string {
  let current: NodeInstance | undefined = instance;
  while (current) {
    const membership = (current.scaling_groups ?? []).find(
      (g) => g.name === groupName
    );
    if (membership) return membership.id;
    current = parentInstance(storage, current);
  }
  throw new IllegalStateError(
    `Instance '${instance.id}' is not contained in group '${groupName}'`
  );
}

function resolveWithin(
  storage: RuntimeEvaluationStorage,
  contextInstanceId: string,
  candidates: readonly NodeInstance[]
): NodeInstance | undefined {
  if (candidates.length === 0) return undefined;
  const contextInstance = storage.getNodeInstance(contextInstanceId);
  const shared = minimalSharedGroup(storage, contextInstance, candidates[0]);
  if (!shared) return undefined;
  const contextGroup = groupInstance(storage, contextInstance, shared);
  const matches = candidates.filter(
    (candidate) => groupInstance(storage, candidate, shared) === contextGroup
  );
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * The single candidate in the same scaling group instance as the evaluating
 * instance: SELF when present, otherwise SOURCE and then TARGET.
 */
export function resolveByScalingGroup(
  storage: RuntimeEvaluationStorage,
  refs: InstanceReferences,
  candidates: readonly NodeInstance[]
): NodeInstance | undefined {
  if (refs.self) return resolveWithin(storage, refs.self, candidates);
  if (!refs.source) return undefined;
  const fromSource = resolveWithin(storage, refs.source, candidates);
  if (fromSource) return fromSource;
  if (!refs.target) return undefined;
  return resolveWithin(storage, refs.target, candidates);
}
