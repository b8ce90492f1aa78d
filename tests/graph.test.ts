import { describe, it, expect } from "vitest";
import { DirectedGraph } from "../src/framework/graph.js";

function graphOf(
  edges: [string, string][],
  nodes: string[] = []
): DirectedGraph<string> {
  const graph = new DirectedGraph<string>();
  for (const node of nodes) graph.addNode(node);
  for (const [from, to] of edges) graph.addEdge(from, to);
  return graph;
}

describe("DirectedGraph.topologicalSort", () => {
  it("puts every node after its predecessors", () => {
    const graph = graphOf([
      ["c", "d"],
      ["a", "b"],
      ["b", "d"],
    ]);
    const order = graph.topologicalSort() ?? [];
    expect(order).toHaveLength(4);
    expect(order.indexOf("a")).toBeLessThan(order.indexOf("b"));
    expect(order.indexOf("b")).toBeLessThan(order.indexOf("d"));
    expect(order.indexOf("c")).toBeLessThan(order.indexOf("d"));
  });

  it("keeps insertion order between independent nodes", () => {
    const graph = graphOf([], ["x", "y", "z"]);
    expect(graph.topologicalSort()).toEqual(["x", "y", "z"]);
  });

  it("returns undefined for a cyclic graph", () => {
    expect(graphOf([["a", "b"], ["b", "a"]]).topologicalSort()).toBeUndefined();
  });
});

describe("DirectedGraph.findCycle", () => {
  it("finds a simple cycle", () => {
    const graph = graphOf([
      ["start", "a"],
      ["a", "b"],
      ["b", "c"],
      ["c", "a"],
    ]);
    expect(graph.findCycle()).toEqual(["a", "b", "c"]);
  });

  it("finds a self loop", () => {
    expect(graphOf([["a", "a"]]).findCycle()).toEqual(["a"]);
  });

  it("returns undefined for an acyclic graph", () => {
    const graph = graphOf([
      ["a", "b"],
      ["a", "c"],
      ["b", "c"],
    ]);
    expect(graph.findCycle()).toBeUndefined();
  });
});

describe("DirectedGraph structure", () => {
  it("reverses every edge", () => {
    const reversed = graphOf([["a", "b"]]).reverse();
    expect(reversed.hasEdge("b", "a")).toBe(true);
    expect(reversed.hasEdge("a", "b")).toBe(false);
  });

  it("copies nodes and edges independently", () => {
    const original = graphOf([["a", "b"]]);
    const copy = original.copy();
    copy.addEdge("b", "c");
    expect(original.nodes()).toEqual(["a", "b"]);
    expect(copy.nodes()).toEqual(["a", "b", "c"]);
  });

  it("lists descendants", () => {
    const graph = graphOf([["a", "b"], ["b", "c"], ["d", "a"]]);
    expect(graph.descendants("a").sort()).toEqual(["b", "c"]);
    expect(graph.predecessors("a")).toEqual(["d"]);
  });
});
