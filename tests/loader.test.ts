import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { DslFormatError, DslLogicError } from "../src/errors.js";
import {
  loadDocument,
  loadDocumentText,
  parseBlueprintFile,
  toRawValue,
} from "../src/loader.js";

const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("loadDocumentText", () => {
  it("loads a mapping", () => {
    expect(loadDocumentText("a: 1\nb: [x, 2.5, true, null]")).toEqual({
      a: 1,
      b: ["x", 2.5, true, null],
    });
  });

  it("keeps dates as strings", () => {
    expect(loadDocumentText("when: 2024-01-01")).toEqual({
      when: "2024-01-01",
    });
  });

  it("expands aliases", () => {
    expect(loadDocumentText("base: &b {x: 1}\ncopy: *b")).toEqual({
      base: { x: 1 },
      copy: { x: 1 },
    });
  });

  it("requires a mapping at the top level", () => {
    const run = () => loadDocumentText("- a\n- b", "inline.yaml");
    expect(run).toThrow(DslFormatError);
    expect(run).toThrow("Invalid YAML structure in: inline.yaml");
  });

  it("rejects values a document cannot hold", () => {
    expect(() => loadDocumentText("n: .inf")).toThrow(
      "Unsupported value at document.n: Infinity"
    );
  });
});

describe("toRawValue", () => {
  it("accepts plain data only", () => {
    expect(toRawValue({ a: [1, { b: "c" }] })).toEqual({ a: [1, { b: "c" }] });
    expect(() => toRawValue({ list: [new Map()] })).toThrow(
      "Unsupported value at document.list[0]: [object Map]"
    );
  });
});

describe("parseBlueprintFile", () => {
  it("parses a blueprint with scripts next to it", () => {
    const plan = parseBlueprintFile(fixture("blueprint.yaml"));
    expect(plan.description).toBe("Web server hosted on a single VM");
    expect(plan.node_templates.map((n) => n.name)).toEqual(["vm", "web"]);
    const web = plan.node_templates[1];
    expect(web.operations["lifecycle.configure"]).toMatchObject({
      plugin: "script",
      operation: "script_runner.tasks.run",
      inputs: { script_path: "scripts/install.sh" },
    });
    expect(web.operations["lifecycle.start"].inputs).toEqual({ wait: 5 });
    expect(web.plugins).toEqual(["script", "agent"]);
    expect(plan.plugins["script"]).toEqual({
      name: "script",
      executor: "local",
      source: null,
      install: true,
    });
  });

  it("resolves scripts against an explicit resource base", () => {
    const resourceBase = fileURLToPath(new URL(".", import.meta.url));
    const run = () =>
      parseBlueprintFile(fixture("blueprint.yaml"), { resourceBase });
    expect(run).toThrow(DslLogicError);
    expect(run).toThrow(
      "Could not extract plugin from operation mapping " +
        "'scripts/install.sh', which is declared for operation 'configure'."
    );
  });

  it("loads documents from disk", () => {
    expect(loadDocument(fixture("inputs.yaml"))).toEqual({ image: "nginx" });
  });
});
