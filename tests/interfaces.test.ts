import { describe, it, expect } from "vitest";
import {
  mergeNodeTypeAndNodeTemplateInterfaces,
  mergeNodeTypeInterfaces,
} from "../src/elements/interfaces.js";
import {
  processOperation,
  processWorkflow,
  toInterfaces,
  toOperationSpec,
  type InterfaceSpecs,
  type MappingOptions,
  type OperationSpec,
} from "../src/elements/operation.js";

function spec(
  implementation: string,
  extra: Partial<OperationSpec> = {}
): OperationSpec {
  return {
    implementation,
    inputs: {},
    executor: null,
    max_retries: null,
    retry_interval: null,
    ...extra,
  };
}

const options: MappingOptions = {
  plugins: {
    agent: { name: "agent", executor: null, source: null, install: true },
  },
  errorCode: 10,
};

describe("toOperationSpec", () => {
  it("defaults the executor on types only", () => {
    expect(toOperationSpec("a.b", "type")).toEqual(
      spec("a.b", { executor: "local" })
    );
    expect(toOperationSpec("a.b", "template")).toEqual(spec("a.b"));
  });

  it("reads the long form", () => {
    const raw = {
      implementation: "a.b",
      inputs: { x: 1 },
      executor: "local",
      max_retries: 2,
      retry_interval: 1.5,
    };
    expect(toOperationSpec(raw, "template")).toEqual({
      implementation: "a.b",
      inputs: { x: 1 },
      executor: "local",
      max_retries: 2,
      retry_interval: 1.5,
    });
  });

  it("reads nested interfaces", () => {
    const raw = { lifecycle: { start: "a.start" } };
    expect(toInterfaces(raw, "template")).toEqual({
      lifecycle: { start: spec("a.start") },
    });
  });
});

describe("mergeNodeTypeInterfaces", () => {
  it("lets the derived type override inherited operations", () => {
    const parent: InterfaceSpecs = {
      lifecycle: { create: spec("a.create"), start: spec("a.start") },
      monitor: { check: spec("a.check") },
    };
    const child: InterfaceSpecs = {
      lifecycle: { start: spec("b.start") },
      backup: { run: spec("b.run") },
    };
    expect(mergeNodeTypeInterfaces(child, parent)).toEqual({
      lifecycle: { create: spec("a.create"), start: spec("b.start") },
      monitor: { check: spec("a.check") },
      backup: { run: spec("b.run") },
    });
    expect(parent["lifecycle"]["start"].implementation).toBe("a.start");
  });
});

describe("mergeNodeTypeAndNodeTemplateInterfaces", () => {
  const typeInterfaces: InterfaceSpecs = {
    lifecycle: {
      create: spec("a.create", {
        inputs: { key: { default: "v" }, other: { type: "string" } },
        executor: "local",
        max_retries: 1,
      }),
      start: spec("a.start", {
        inputs: { x: { default: 1 } },
        executor: "local",
      }),
    },
  };

  it("flattens the input defaults of operations only the type declares", () => {
    const merged = mergeNodeTypeAndNodeTemplateInterfaces(typeInterfaces, {});
    expect(merged["lifecycle"]["create"]).toEqual(
      spec("a.create", {
        inputs: { key: "v" },
        executor: "local",
        max_retries: 1,
      })
    );
  });

  it("drops the type's inputs when the template remaps the operation", () => {
    const merged = mergeNodeTypeAndNodeTemplateInterfaces(typeInterfaces, {
      lifecycle: {
        start: spec("b.start", { inputs: { y: 2 }, retry_interval: 5 }),
      },
    });
    expect(merged["lifecycle"]["start"]).toEqual(
      spec("b.start", {
        inputs: { y: 2 },
        executor: "local",
        retry_interval: 5,
      })
    );
  });

  it("layers template inputs over the type's defaults otherwise", () => {
    const overridden = mergeNodeTypeAndNodeTemplateInterfaces(typeInterfaces, {
      lifecycle: { start: spec("", { inputs: { y: 2 } }) },
    });
    expect(overridden["lifecycle"]["start"]).toEqual(
      spec("a.start", { inputs: { x: 1, y: 2 }, executor: "local" })
    );

    const same = mergeNodeTypeAndNodeTemplateInterfaces(typeInterfaces, {
      lifecycle: { start: spec("a.start", { inputs: { x: 3 } }) },
    });
    expect(same["lifecycle"]["start"].inputs).toEqual({ x: 3 });
  });

  it("keeps the template's executor and retry settings over the type's", () => {
    const merged = mergeNodeTypeAndNodeTemplateInterfaces(typeInterfaces, {
      lifecycle: { create: spec("", { max_retries: 4 }) },
    });
    expect(merged["lifecycle"]["create"].max_retries).toBe(4);
    expect(merged["lifecycle"]["create"].executor).toBe("local");
  });

  it("adds operations only the template declares", () => {
    const merged = mergeNodeTypeAndNodeTemplateInterfaces(typeInterfaces, {
      custom: { run: spec("a.run") },
    });
    expect(merged["custom"]).toEqual({
      run: spec("a.run", { executor: "local" }),
    });
    expect(Object.keys(merged["lifecycle"])).toEqual(["create", "start"]);
  });
});

describe("processOperation", () => {
  it("maps an implementation to its plugin", () => {
    const start = spec("agent.tasks.start", { inputs: { a: 1 } });
    expect(processOperation("start", start, options)).toEqual({
      name: "start",
      plugin: "agent",
      operation: "tasks.start",
      executor: "local",
      inputs: { a: 1 },
      has_intrinsic_functions: false,
      max_retries: null,
      retry_interval: null,
    });
  });

  it("gives a no-op for an empty implementation", () => {
    expect(processOperation("stop", spec(""), options)).toEqual({
      name: "stop",
      plugin: "",
      operation: "",
      executor: null,
      inputs: {},
      has_intrinsic_functions: false,
      max_retries: null,
      retry_interval: null,
    });
  });

  it("appends the partial error message", () => {
    const withHint = { ...options, partialErrorMessage: "See the docs." };
    expect(() =>
      processOperation("start", spec("nope.start"), withHint)
    ).toThrow(
      "Could not extract plugin from operation mapping 'nope.start', " +
        "which is declared for operation 'start'. See the docs."
    );
  });
});

describe("processWorkflow", () => {
  it("maps a workflow to its plugin", () => {
    const parameters = { p: { default: 1 } };
    expect(
      processWorkflow("deploy", "agent.wf.run", parameters, options)
    ).toEqual({
      plugin: "agent",
      operation: "wf.run",
      parameters: { p: { default: 1 } },
    });
  });
});
