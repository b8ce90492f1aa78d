import { describe, it, expect, beforeEach } from "vitest";
import { CONTAINED_IN_RELATIONSHIP_TYPE } from "../src/constants.js";
import { FunctionEvaluationError, IllegalStateError } from "../src/errors.js";
import {
  parentInstance,
  resolveByRelationship,
} from "../src/functions/disambiguation.js";
import {
  evaluateFunctions,
  evaluateOutputs,
} from "../src/functions/evaluation.js";
import {
  RuntimeEvaluationStorage,
  type RuntimeAccessors,
} from "../src/functions/storage.js";
import type { NodeInstance, RawMap, RuntimeNode } from "../src/model.js";

/** In-memory node store that records every lookup. */
class FakeStore implements RuntimeAccessors {
  readonly calls: string[] = [];

  constructor(
    private readonly nodes: RuntimeNode[],
    private readonly instances: NodeInstance[]
  ) {}

  getNodeInstances(nodeId: string): NodeInstance[] {
    this.calls.push(`getNodeInstances:${nodeId}`);
    return this.instances.filter((instance) => instance.node_id === nodeId);
  }

  getNodeInstance(nodeInstanceId: string): NodeInstance {
    this.calls.push(`getNodeInstance:${nodeInstanceId}`);
    const instance = this.instances.find((i) => i.id === nodeInstanceId);
    if (!instance) throw new Error(`no instance ${nodeInstanceId}`);
    return instance;
  }

  getNode(nodeId: string): RuntimeNode {
    this.calls.push(`getNode:${nodeId}`);
    const node = this.nodes.find((n) => n.id === nodeId);
    if (!node) throw new Error(`no node ${nodeId}`);
    return node;
  }
}

const hostedOn = (target: string) => ({
  type: CONTAINED_IN_RELATIONSHIP_TYPE,
  target_id: target,
  type_hierarchy: [
    "tosca.relationships.Root",
    CONTAINED_IN_RELATIONSHIP_TYPE,
  ],
});

function dbStore(runtime: RawMap[], properties: RawMap = {}): FakeStore {
  return new FakeStore(
    [
      { id: "db", properties },
      { id: "app", properties: { port: 8080 } },
    ],
    [
      ...runtime.map((runtime_properties, i) => ({
        id: `db_${i + 1}`,
        node_id: "db",
        runtime_properties,
      })),
      {
        id: "app_1",
        node_id: "app",
        relationships: [{ target_id: "db_2", target_name: "db" }],
      },
    ]
  );
}

describe("get_attribute at runtime", () => {
  it("follows the evaluating instance's relationship to pick a target", () => {
    const store = dbStore([{ port: 1 }, { port: 2 }]);
    const payload = { p: { get_attribute: ["db", "port"] } };
    const result = evaluateFunctions(payload, { self: "app_1" }, store);
    expect(result).toEqual({ p: 2 });
  });

  it("takes the only instance without further lookups", () => {
    const store = dbStore([{ port: 1 }]);
    const payload = { p: { get_attribute: ["db", "port"] } };
    expect(evaluateFunctions(payload, {}, store)).toEqual({ p: 1 });
    expect(store.calls).toEqual(["getNodeInstances:db"]);
  });

  it("falls back to node properties, then to null", () => {
    const store = dbStore([{}], { port: 5432 });
    const payload = {
      p: { get_attribute: ["db", "port"] },
      q: { get_attribute: ["db", "nope"] },
    };
    const result = evaluateFunctions(payload, {}, store);
    expect(result).toEqual({ p: 5432, q: null });
  });

  it("reads nested runtime properties", () => {
    const nested = new FakeStore(
      [{ id: "db", properties: {} }],
      [
        {
          id: "db_1",
          node_id: "db",
          runtime_properties: { endpoints: [{ host: "h" }] },
        },
      ]
    );
    const payload = { p: { get_attribute: ["db", "endpoints", 0, "host"] } };
    expect(evaluateFunctions(payload, {}, nested)).toEqual({ p: "h" });
  });

  it("resolves SELF through the request context", () => {
    const store = dbStore([{ port: 1 }, { port: 2 }]);
    const payload = { p: { get_attribute: ["SELF", "port"] } };
    expect(evaluateFunctions(payload, { self: "db_2" }, store)).toEqual({
      p: 2,
    });
  });

  it("requires the instance references it uses", () => {
    const store = dbStore([{ port: 1 }]);
    const payload = { p: { get_attribute: ["SELF", "port"] } };
    expect(() => evaluateFunctions(payload, {}, store)).toThrow(
      'SELF is missing in request context in payload.p for attribute ["port"]'
    );
  });

  it("rejects nodes without instances", () => {
    const store = dbStore([]);
    const payload = { p: { get_attribute: ["ghost", "x"] } };
    const run = () => evaluateFunctions(payload, {}, store);
    expect(run).toThrow(FunctionEvaluationError);
    expect(run).toThrow("Node specified in function does not exist: ghost.");
  });

  it("fails when several instances remain", () => {
    const store = dbStore([{ port: 1 }, { port: 2 }]);
    const payload = { p: { get_attribute: ["db", "port"] } };
    expect(() => evaluateFunctions(payload, {}, store)).toThrow(
      'More than one node instance found for node "db". ' +
        "Cannot resolve a node instance unambiguously."
    );
  });

  it("leaves the payload untouched", () => {
    const store = dbStore([{ port: 1 }]);
    const payload = { p: { get_attribute: ["db", "port"] } };
    evaluateFunctions(payload, {}, store);
    expect(payload).toEqual({ p: { get_attribute: ["db", "port"] } });
  });
});

describe("scaling group disambiguation", () => {
  let store: FakeStore;

  beforeEach(() => {
    store = new FakeStore(
      [
        { id: "vm", properties: {} },
        { id: "web", properties: {}, relationships: [hostedOn("vm")] },
        { id: "app", properties: {}, relationships: [hostedOn("vm")] },
      ],
      [
        {
          id: "vm_1",
          node_id: "vm",
          scaling_groups: [{ name: "g", id: "g_1" }],
        },
        {
          id: "vm_2",
          node_id: "vm",
          scaling_groups: [{ name: "g", id: "g_2" }],
        },
        {
          id: "web_1",
          node_id: "web",
          relationships: [{ target_id: "vm_1", target_name: "vm" }],
        },
        {
          id: "web_2",
          node_id: "web",
          relationships: [{ target_id: "vm_2", target_name: "vm" }],
        },
        {
          id: "app_1",
          node_id: "app",
          runtime_properties: { name: "first" },
          relationships: [{ target_id: "vm_1", target_name: "vm" }],
        },
        {
          id: "app_2",
          node_id: "app",
          runtime_properties: { name: "second" },
          relationships: [{ target_id: "vm_2", target_name: "vm" }],
        },
        { id: "web_3", node_id: "web" },
        { id: "vm_9", node_id: "vm" },
      ]
    );
  });

  const payload = () => ({ name: { get_attribute: ["app", "name"] } });

  it("picks the instance sharing SELF's group instance", () => {
    expect(evaluateFunctions(payload(), { self: "web_1" }, store)).toEqual({
      name: "first",
    });
  });

  it("uses SOURCE when SELF is absent", () => {
    expect(evaluateFunctions(payload(), { source: "web_2" }, store)).toEqual({
      name: "second",
    });
  });

  it("uses TARGET when SOURCE finds nothing", () => {
    const context = { source: "vm_9", target: "web_2" };
    expect(evaluateFunctions(payload(), context, store)).toEqual({
      name: "second",
    });
  });

  it("reports a hosted instance without a link to its host", () => {
    const storage = new RuntimeEvaluationStorage(store);
    const orphan = storage.getNodeInstance("web_3");
    const run = () => parentInstance(storage, orphan);
    expect(run).toThrow(IllegalStateError);
    expect(run).toThrow(
      "Instance 'web_3' has no relationship to its host node 'vm'"
    );
  });

  it("finds the host of a contained instance", () => {
    const storage = new RuntimeEvaluationStorage(store);
    const web = storage.getNodeInstance("web_2");
    const vm = storage.getNodeInstance("vm_2");
    expect(parentInstance(storage, web)?.id).toBe("vm_2");
    expect(parentInstance(storage, vm)).toBeUndefined();
  });
});

describe("resolveByRelationship", () => {
  it("rejects a relationship target outside the candidates", () => {
    const store = new FakeStore(
      [],
      [
        { id: "db_1", node_id: "db" },
        {
          id: "app_1",
          node_id: "app",
          relationships: [{ target_id: "db_9", target_name: "db" }],
        },
      ]
    );
    const storage = new RuntimeEvaluationStorage(store);
    const candidates = storage.getNodeInstances("db");
    expect(() =>
      resolveByRelationship(storage, "app_1", "db", candidates)
    ).toThrow("Relationship target 'db_9' is not an instance of node 'db'");
  });

  it("gives up when the relationships point at several instances", () => {
    const store = new FakeStore(
      [],
      [
        { id: "db_1", node_id: "db" },
        { id: "db_2", node_id: "db" },
        {
          id: "app_1",
          node_id: "app",
          relationships: [
            { target_id: "db_1", target_name: "db" },
            { target_id: "db_2", target_name: "db" },
          ],
        },
      ]
    );
    const storage = new RuntimeEvaluationStorage(store);
    const candidates = storage.getNodeInstances("db");
    expect(
      resolveByRelationship(storage, "app_1", "db", candidates)
    ).toBeUndefined();
  });
});

describe("other functions at runtime", () => {
  it("reads SELF's node properties for get_property", () => {
    const store = dbStore([]);
    const payload = { p: { get_property: ["SELF", "port"] } };
    expect(evaluateFunctions(payload, { self: "app_1" }, store)).toEqual({
      p: 8080,
    });
    expect(store.calls).toEqual(["getNodeInstance:app_1", "getNode:app"]);
  });

  it("reads a named node's properties for get_property", () => {
    const store = dbStore([]);
    const payload = { p: { get_property: ["app", "port"] } };
    expect(evaluateFunctions(payload, {}, store)).toEqual({ p: 8080 });
  });

  it("evaluates functions in a property without changing the node", () => {
    const conf = { ip: { get_attribute: ["SELF", "ip"] } };
    const store = new FakeStore(
      [{ id: "app", properties: { conf } }],
      [
        {
          id: "app_1",
          node_id: "app",
          runtime_properties: { ip: "10.0.0.1" },
        },
        {
          id: "app_2",
          node_id: "app",
          runtime_properties: { ip: "10.0.0.2" },
        },
      ]
    );
    const payload = { p: { get_property: ["SELF", "conf"] } };
    expect(evaluateFunctions(payload, { self: "app_1" }, store)).toEqual({
      p: { ip: "10.0.0.1" },
    });
    expect(evaluateFunctions(payload, { self: "app_2" }, store)).toEqual({
      p: { ip: "10.0.0.2" },
    });
    expect(conf).toEqual({ ip: { get_attribute: ["SELF", "ip"] } });
  });

  it("returns copies of runtime properties", () => {
    const endpoints = [{ host: "h" }];
    const store = new FakeStore(
      [{ id: "db", properties: {} }],
      [{ id: "db_1", node_id: "db", runtime_properties: { endpoints } }]
    );
    const result = evaluateFunctions(
      { p: { get_attribute: ["db", "endpoints"] } },
      {},
      store
    );
    expect(result).toEqual({ p: [{ host: "h" }] });
    expect(result["p"]).not.toBe(endpoints);
  });

  it("requires SELF for get_property", () => {
    const payload = { p: { get_property: ["SELF", "port"] } };
    expect(() => evaluateFunctions(payload, {}, dbStore([]))).toThrow(
      'SELF is missing in request context in payload.p for property ["port"]'
    );
  });

  it("joins concat once its parts are resolved", () => {
    const store = dbStore([{ port: 1 }]);
    const payload = { p: { concat: ["x", { get_attribute: ["db", "port"] }] } };
    expect(evaluateFunctions(payload, {}, store)).toEqual({ p: "x1" });
  });

  it("evaluates outputs", () => {
    const store = dbStore([{ port: 1 }]);
    const outputs = {
      port: { value: { get_attribute: ["db", "port"] } },
      fixed: { description: "constant", value: "s" },
    };
    expect(evaluateOutputs(outputs, store)).toEqual({ port: 1, fixed: "s" });
  });
});

describe("RuntimeEvaluationStorage", () => {
  it("fetches each key from the host once", () => {
    const store = dbStore([{ port: 1 }]);
    const storage = new RuntimeEvaluationStorage(store);
    storage.getNode("db");
    storage.getNode("db");
    storage.getNodeInstances("db");
    storage.getNodeInstance("db_1");
    storage.getNodeInstance("app_1");
    storage.getNodeInstance("app_1");
    expect(store.calls).toEqual([
      "getNode:db",
      "getNodeInstances:db",
      "getNodeInstance:app_1",
    ]);
  });
});
