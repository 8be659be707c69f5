import { describe, it, expect } from "vitest";
import { RouteGraph, edgeKey } from "./route-graph.js";
import { CostModel } from "../cost/cost-model.js";
import { ValidationError } from "../errors.js";

function makeGraph(): RouteGraph {
  const graph = new RouteGraph(new CostModel());
  graph.addNode("A", { lat: 0, lng: 0 });
  graph.addNode("B", { lat: 0, lng: 1 });
  graph.addNode("C", { lat: 0, lng: 2 });
  return graph;
}

describe("RouteGraph", () => {
  it("stores the cost model weight on each edge", () => {
    const graph = makeGraph();
    const edge = graph.addEdge("A", "B", 1000, 100);
    expect(edge.baseRisk).toBe(1);
    expect(edge.baseWeight).toBeCloseTo(430.3, 9);
  });

  it("treats edges as undirected", () => {
    const graph = makeGraph();
    graph.addEdge("A", "B", 1000, 100);
    expect(graph.getEdge("B", "A")?.key).toBe(edgeKey("A", "B"));
    expect(graph.neighbors("B").map((n) => n.nodeId)).toEqual(["A"]);
  });

  it("overwrites an edge added twice", () => {
    const graph = makeGraph();
    graph.addEdge("A", "B", 1000, 100);
    graph.addEdge("B", "A", 10, 1, 0);
    expect(graph.edgeCount).toBe(1);
    expect(graph.getEdge("A", "B")?.baseWeight).toBeCloseTo(4.3, 9);
  });

  it("overwrites node coordinates and keeps a stored elevation", () => {
    const graph = makeGraph();
    graph.addNode("A", { lat: 0, lng: 0 }, 120);
    graph.addNode("A", { lat: 1, lng: 1 });
    expect(graph.getNode("A")).toEqual({ id: "A", coordinate: { lat: 1, lng: 1 }, elevationMeters: 120 });
    expect(graph.nodeCount).toBe(3);
  });

  it("rejects self-loops", () => {
    const graph = makeGraph();
    expect(() => graph.addEdge("A", "A", 1, 1)).toThrow(ValidationError);
  });

  it("rejects edges to unknown nodes", () => {
    const graph = makeGraph();
    expect(() => graph.addEdge("A", "Z", 1, 1)).toThrow("unknown node Z");
  });

  it("rejects negative distances through the cost model", () => {
    const graph = makeGraph();
    expect(() => graph.addEdge("A", "B", -1, 1)).toThrow(ValidationError);
    expect(graph.edgeCount).toBe(0);
  });

  it("rejects invalid coordinates and empty ids", () => {
    const graph = new RouteGraph();
    expect(() => graph.addNode("", { lat: 0, lng: 0 })).toThrow(ValidationError);
    expect(() => graph.addNode("X", { lat: 100, lng: 0 })).toThrow(ValidationError);
  });

  it("returns no neighbors for unknown nodes", () => {
    expect(new RouteGraph().neighbors("nope")).toEqual([]);
  });
});
