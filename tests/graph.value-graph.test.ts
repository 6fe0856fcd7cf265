import { describe, it } from "mocha";
import { expect } from "chai";

import { EndpointPair } from "../src/graph/endpointPair.js";
import { InvalidEndpointsError } from "../src/graph/errors.js";
import { ImmutableValueGraph, ValueGraphBuilder } from "../src/graph/valueGraph.js";

function edgeStrings<N>(edges: Iterable<EndpointPair<N>>): string[] {
  return Array.from(edges, (edge) => edge.toString());
}

describe("value graphs", () => {
  describe("directed storage", () => {
    function buildTriangle() {
      const graph = ValueGraphBuilder.directed().build<string, number>();
      graph.putEdgeValue("a", "b", 1);
      graph.putEdgeValue("b", "c", 2);
      graph.putEdgeValue("a", "c", 3);
      return graph;
    }

    it("keeps nodes and edges in insertion order", () => {
      const graph = buildTriangle();
      expect(graph.nodes().toArray()).to.deep.equal(["a", "b", "c"]);
      expect(edgeStrings(graph.edges())).to.deep.equal(["<a -> b>", "<a -> c>", "<b -> c>"]);
      expect(graph.edges().size).to.equal(3);
    });

    it("answers adjacency and degree queries", () => {
      const graph = buildTriangle();
      expect(graph.successors("a")).to.deep.equal(["b", "c"]);
      expect(graph.predecessors("c")).to.deep.equal(["b", "a"]);
      expect(graph.adjacentNodes("b")).to.deep.equal(["a", "c"]);
      expect(edgeStrings(graph.incidentEdges("b"))).to.deep.equal(["<a -> b>", "<b -> c>"]);
      expect(graph.degree("a")).to.equal(2);
      expect(graph.inDegree("c")).to.equal(2);
      expect(graph.outDegree("c")).to.equal(0);
    });

    it("reads edge values by endpoints or by pair", () => {
      const graph = buildTriangle();
      expect(graph.edgeValue("a", "c")).to.equal(3);
      expect(graph.edgeValue("c", "a")).to.equal(undefined);
      expect(graph.edgeValueOrDefault("a", "b", 0)).to.equal(1);
      expect(graph.edgeValueOrDefault("c", "a", null)).to.equal(null);
      expect(graph.edgeValueOf(EndpointPair.ordered("b", "c"))).to.equal(2);
      expect(graph.hasEdge(EndpointPair.ordered("a", "b"))).to.equal(true);
      expect(graph.hasEdge(EndpointPair.ordered("b", "a"))).to.equal(false);
    });

    it("rejects unordered pairs", () => {
      const graph = buildTriangle();
      expect(() => graph.hasEdge(EndpointPair.unordered("a", "b"))).to.throw(InvalidEndpointsError);
      expect(() => graph.edgeValueOf(EndpointPair.unordered("a", "b"))).to.throw(InvalidEndpointsError);
    });

    it("replaces values and returns the previous one", () => {
      const graph = buildTriangle();
      expect(graph.putEdgeValue("a", "c", 4)).to.equal(3);
      expect(graph.edgeValue("a", "c")).to.equal(4);
      expect(graph.edges().size).to.equal(3);
    });

    it("removes nodes together with their edges", () => {
      const graph = buildTriangle();
      expect(graph.removeNode("b")).to.equal(true);
      expect(graph.removeNode("b")).to.equal(false);
      expect(graph.nodes().toArray()).to.deep.equal(["a", "c"]);
      expect(edgeStrings(graph.edges())).to.deep.equal(["<a -> c>"]);
      expect(graph.predecessors("c")).to.deep.equal(["a"]);
    });

    it("removes single edges", () => {
      const graph = buildTriangle();
      expect(graph.removeEdge("a", "b")).to.equal(1);
      expect(graph.removeEdge("a", "b")).to.equal(undefined);
      expect(graph.edges().size).to.equal(2);
      expect(graph.hasNode("b")).to.equal(true);
    });

    it("counts a directed self-loop once in each direction", () => {
      const graph = ValueGraphBuilder.directed().allowsSelfLoops(true).build<string, number>();
      graph.putEdgeValue("a", "a", 1);
      expect(graph.degree("a")).to.equal(2);
      expect(edgeStrings(graph.incidentEdges("a"))).to.deep.equal(["<a -> a>"]);
    });

    it("refuses self-loops unless allowed", () => {
      const graph = ValueGraphBuilder.directed().build<string, number>();
      expect(() => graph.putEdgeValue("a", "a", 1)).to.throw(InvalidEndpointsError);
      expect(graph.nodes().size).to.equal(0);
    });

    it("refuses undefined edge values", () => {
      const graph = ValueGraphBuilder.directed().build<string, number | undefined>();
      expect(() => graph.putEdgeValue("a", "b", undefined)).to.throw(TypeError);
    });

    it("rejects queries about unknown nodes", () => {
      const graph = buildTriangle();
      expect(() => graph.successors("z")).to.throw(InvalidEndpointsError);
      expect(() => graph.degree("z")).to.throw(InvalidEndpointsError);
      expect(graph.hasNode("z")).to.equal(false);
      expect(graph.hasEdgeConnecting("z", "a")).to.equal(false);
    });
  });

  describe("undirected storage", () => {
    it("reports each edge once and counts self-loops twice", () => {
      const graph = ValueGraphBuilder.undirected().allowsSelfLoops(true).build<number, string>();
      graph.putEdgeValue(1, 2, "x");
      graph.putEdgeValue(2, 2, "loop");

      expect(edgeStrings(graph.edges())).to.deep.equal(["[1, 2]", "[2, 2]"]);
      expect(graph.edges().size).to.equal(2);
      expect(graph.degree(1)).to.equal(1);
      expect(graph.degree(2)).to.equal(3);
      expect(graph.edgeValue(2, 1)).to.equal("x");
      expect(graph.hasEdge(EndpointPair.unordered(2, 1))).to.equal(true);
    });

    it("accepts ordered pairs as addresses", () => {
      const graph = ValueGraphBuilder.undirected().build<number, string>();
      graph.putEdgeValue(1, 2, "x");
      expect(graph.edgeValueOf(EndpointPair.ordered(2, 1))).to.equal("x");
    });

    it("drops both directions when removing an edge", () => {
      const graph = ValueGraphBuilder.undirected().build<number, string>();
      graph.putEdgeValue(1, 2, "x");
      expect(graph.removeEdge(2, 1)).to.equal("x");
      expect(graph.hasEdgeConnecting(1, 2)).to.equal(false);
      expect(graph.edges().size).to.equal(0);
    });
  });

  it("derives node equality from the key function", () => {
    const graph = ValueGraphBuilder.directed()
      .nodeKey((node: { id: string }) => node.id)
      .build<{ id: string }, number>();
    expect(graph.addNode({ id: "a" })).to.equal(true);
    expect(graph.addNode({ id: "a" })).to.equal(false);
    graph.putEdgeValue({ id: "a" }, { id: "b" }, 7);
    expect(graph.edgeValue({ id: "a" }, { id: "b" })).to.equal(7);
    expect(graph.nodes().size).to.equal(2);
  });

  describe("ImmutableValueGraph.copyOf", () => {
    it("copies nodes, edges and values without sharing storage", () => {
      const source = ValueGraphBuilder.undirected().build<string, number>();
      source.addNode("lonely");
      source.putEdgeValue("a", "b", 1);

      const copy = ImmutableValueGraph.copyOf(source);
      source.putEdgeValue("b", "c", 2);
      source.removeNode("lonely");

      expect(copy.nodes().toArray()).to.deep.equal(["lonely", "a", "b"]);
      expect(edgeStrings(copy.edges())).to.deep.equal(["[a, b]"]);
      expect(copy.edgeValue("b", "a")).to.equal(1);
      expect(copy.isDirected).to.equal(false);
    });

    it("reports an unmodifiable type", () => {
      const source = ValueGraphBuilder.directed().allowsSelfLoops(true).build<string, number>();
      expect(source.type().modifiable).to.equal(true);
      const copy = ImmutableValueGraph.copyOf(source);
      expect(copy.type().modifiable).to.equal(false);
      expect(copy.type().allowsSelfLoops).to.equal(true);
      expect(copy.type().directed).to.equal(true);
    });
  });

  it("ValueGraphBuilder.from() reuses orientation, self-loop policy and keys", () => {
    const source = ValueGraphBuilder.undirected().allowsSelfLoops(true).build<string, number>();
    const target = ValueGraphBuilder.from(source).build<string, number>();
    expect(target.isDirected).to.equal(false);
    expect(target.allowsSelfLoops).to.equal(true);
    expect(target.nodeKey).to.equal(source.nodeKey);
  });
});
