import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";
import { Buffer } from "node:buffer";

import { BinaryWriter } from "../../src/codec/binary.js";
import { GRAPH_TYPE_FLAGS, writeStreamHeader } from "../../src/codec/graphCodec.js";
import { float64Codec, stringCodec } from "../../src/codec/valueCodecs.js";
import { identityConverter, scaledConverter } from "../../src/graph/converters.js";
import { GraphImmutableError, UnsupportedGraphShapeError } from "../../src/graph/errors.js";
import { ImmutableValueGraphAdapter } from "../../src/graph/immutableAdapter.js";
import { ImmutableValueGraph, ValueGraphBuilder } from "../../src/graph/valueGraph.js";

const codecs = { nodeCodec: stringCodec, valueCodec: float64Codec };
const limits = { maxVertices: 1_000, maxEdges: 1_000 };

const graphArbitrary = fc.record({
  directed: fc.boolean(),
  selfLoops: fc.boolean(),
  nodes: fc.uniqueArray(fc.string({ maxLength: 4 }), { minLength: 1, maxLength: 8 }),
  edges: fc.array(fc.tuple(fc.nat(), fc.nat(), fc.double({ noNaN: true, noDefaultInfinity: true })), { maxLength: 20 }),
});

type GraphSample = typeof graphArbitrary extends fc.Arbitrary<infer T> ? T : never;

function buildAdapter(sample: GraphSample): ImmutableValueGraphAdapter<string, number> {
  const builder = sample.directed ? ValueGraphBuilder.directed() : ValueGraphBuilder.undirected();
  const values = builder.allowsSelfLoops(sample.selfLoops).build<string, number>();
  for (const node of sample.nodes) {
    values.addNode(node);
  }
  for (const [from, to, value] of sample.edges) {
    const source = sample.nodes[from % sample.nodes.length];
    const target = sample.nodes[to % sample.nodes.length];
    if (source === target && !sample.selfLoops) {
      continue;
    }
    values.putEdgeValue(source, target, value);
  }
  return new ImmutableValueGraphAdapter(ImmutableValueGraph.copyOf(values), identityConverter());
}

function describeGraph(adapter: ImmutableValueGraphAdapter<string, number>) {
  return {
    type: adapter.getType().toFlags(),
    vertices: adapter.vertexSet().toArray(),
    edges: adapter.edgeSet().toArray().map((edge) => [edge.toString(), adapter.getEdgeWeight(edge)]),
  };
}

describe("adapter properties", () => {
  it("round-trips every simple graph", () => {
    fc.assert(
      fc.property(graphArbitrary, (sample) => {
        const adapter = buildAdapter(sample);
        const restored = ImmutableValueGraphAdapter.deserialize(adapter.serialize(codecs), { ...codecs, limits });
        expect(describeGraph(restored)).to.deep.equal(describeGraph(adapter));
      }),
    );
  });

  it("rejects every mutation without changing observable state", () => {
    fc.assert(
      fc.property(graphArbitrary, fc.string({ maxLength: 4 }), fc.double({ noNaN: true }), (sample, vertex, weight) => {
        const adapter = buildAdapter(sample);
        const before = describeGraph(adapter);
        const firstEdge = adapter.edgeSet().toArray()[0];
        const attempts: Array<() => unknown> = [
          () => adapter.addVertex(vertex),
          () => adapter.removeVertex(vertex),
          () => adapter.addEdge(vertex, vertex),
          () => adapter.removeEdge(vertex, vertex),
        ];
        if (firstEdge) {
          attempts.push(
            () => adapter.removeEdge(firstEdge),
            () => adapter.addEdge(firstEdge.nodeU, firstEdge.nodeV, firstEdge),
            () => adapter.setEdgeWeight(firstEdge, weight),
          );
        }
        for (const attempt of attempts) {
          expect(attempt).to.throw(GraphImmutableError);
        }
        expect(describeGraph(adapter)).to.deep.equal(before);
        expect(adapter.getType().modifiable).to.equal(false);
      }),
    );
  });

  it("derives weights from edge values through the converter", () => {
    fc.assert(
      fc.property(graphArbitrary, fc.integer({ min: -8, max: 8 }), (sample, factor) => {
        const adapter = buildAdapter(sample);
        const scaled = new ImmutableValueGraphAdapter(adapter.view, scaledConverter(factor));
        for (const edge of adapter.edgeSet()) {
          expect(scaled.getEdgeWeight(edge)).to.equal(adapter.getEdgeWeight(edge) * factor);
        }
        expect(scaled.vertexSet().toArray()).to.deep.equal(adapter.vertexSet().toArray());
      }),
    );
  });

  it("rejects mixed and multi-edge descriptors whatever follows them", () => {
    const shapeArbitrary = fc.oneof(
      fc.constant(GRAPH_TYPE_FLAGS.directed | GRAPH_TYPE_FLAGS.undirected),
      fc.constant(GRAPH_TYPE_FLAGS.directed | GRAPH_TYPE_FLAGS.allowsMultipleEdges),
      fc.constant(GRAPH_TYPE_FLAGS.undirected | GRAPH_TYPE_FLAGS.allowsMultipleEdges),
    );
    fc.assert(
      fc.property(shapeArbitrary, fc.uint8Array({ maxLength: 32 }), (mask, tail) => {
        const writer = new BinaryWriter();
        writeStreamHeader(writer, identityConverter(), codecs);
        writer.writeUint8(mask);
        const bytes = Buffer.concat([writer.toBuffer(), tail]);
        expect(() => ImmutableValueGraphAdapter.deserialize(bytes, { ...codecs, limits })).to.throw(
          UnsupportedGraphShapeError,
        );
      }),
    );
  });
});
