// Blueprint data model: raw documents, resolved plans and runtime instances

// --- Raw documents (as produced by the YAML loader) ---

export type RawScalar = string | number | boolean | null;
export type RawValue = RawScalar | RawValue[] | RawMap;

export interface RawMap {
  [key: string]: RawValue;
}

export function isRawMap(value: unknown): value is RawMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasKey(map: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

// --- DSL version ---

export interface DslVersion {
  raw: string;
  major: number;
  minor: number;
  micro: number;
}

export function isDslVersion(value: unknown): value is DslVersion {
  return (
    typeof value === "object" &&
    value !== null &&
    "raw" in value &&
    "major" in value &&
    "minor" in value &&
    "micro" in value &&
    typeof value.raw === "string" &&
    typeof value.major === "number" &&
    typeof value.minor === "number" &&
    typeof value.micro === "number"
  );
}

export function compareVersions(a: DslVersion, b: DslVersion): number {
  return a.major - b.major || a.minor - b.minor || a.micro - b.micro;
}

// --- Resolved plan ---

export interface PlanOperation {
  name: string;
  plugin: string;
  operation: string;
  executor: string | null;
  inputs: RawMap;
  has_intrinsic_functions: boolean;
  max_retries: number | null;
  retry_interval: number | null;
}

export interface PlanRelationship {
  type: string;
  target_id: string;
  type_hierarchy: string[];
  properties: RawMap;
  source_operations: Record<string, PlanOperation>;
  target_operations: Record<string, PlanOperation>;
}

export interface PlanNodeTemplate {
  id: string;
  name: string;
  type: string;
  type_hierarchy: string[];
  properties: RawMap;
  operations: Record<string, PlanOperation>;
  relationships: PlanRelationship[];
  plugins: string[];
}

export interface PlanWorkflow {
  plugin: string;
  operation: string;
  parameters: RawMap;
}

export interface PlanOutput {
  description?: string;
  value: RawValue;
}

export interface PlanPlugin {
  name: string;
  executor: string | null;
  source: string | null;
  install: boolean;
}

export interface Plan {
  version?: DslVersion;
  description?: string;
  /** Input definitions while validating, input values once prepared. */
  inputs: RawMap;
  plugins: Record<string, PlanPlugin>;
  node_templates: PlanNodeTemplate[];
  workflows: Record<string, PlanWorkflow>;
  /** Plugins the workflows map to, each listed once. */
  workflow_plugins_to_install?: PlanPlugin[];
  outputs: Record<string, PlanOutput>;
}

// --- Runtime instances (read through the host's accessors) ---

export interface InstanceRelationship {
  type?: string;
  target_id: string;
  target_name: string;
}

export interface ScalingGroupMembership {
  name: string;
  id: string;
}

export interface NodeInstance {
  id: string;
  node_id: string;
  runtime_properties?: RawMap | null;
  relationships?: InstanceRelationship[] | null;
  scaling_groups?: ScalingGroupMembership[] | null;
}

export interface RuntimeNodeRelationship {
  type: string;
  target_id: string;
  type_hierarchy: string[];
}

export interface RuntimeNode {
  id: string;
  properties: RawMap;
  relationships?: RuntimeNodeRelationship[] | null;
}
