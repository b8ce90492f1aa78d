// Names and values shared by the blueprint language and the function engine

export const CONTAINED_IN_RELATIONSHIP_TYPE = "tosca.relationships.HostedOn";

export const LOCAL_AGENT = "local";
export const VALID_EXECUTORS: readonly string[] = [LOCAL_AGENT];

export const SCRIPT_PLUGIN_NAME = "script";
export const SCRIPT_PLUGIN_RUN_TASK = "script_runner.tasks.run";
export const SCRIPT_PLUGIN_EXECUTE_WORKFLOW_TASK =
  "script_runner.tasks.execute_workflow";
export const SCRIPT_PATH_PROPERTY = "script_path";

export const USER_PRIMITIVE_TYPES: readonly string[] = [
  "string",
  "integer",
  "float",
  "boolean",
];
