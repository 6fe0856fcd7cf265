import { Buffer } from "node:buffer";

import { converterDescriptorSchema, type WeightConverterDescriptor } from "../graph/converters.js";
import { sameKey } from "../graph/endpointPair.js";
import { GraphFormatError, NoSuchEdgeError, UnsupportedGraphShapeError } from "../graph/errors.js";
import { GraphTypeDescriptor, type GraphTypeFlags, type NodeKeyFn } from "../graph/types.js";
import { ImmutableValueGraph, ValueGraphBuilder, type ValueGraphView } from "../graph/valueGraph.js";
import type { BinaryReader, BinaryWriter } from "./binary.js";
import type { ValueCodec } from "./valueCodecs.js";

/** Leading bytes identifying a graph stream. */
export const GRAPH_STREAM_MAGIC = Buffer.from("VGRF", "ascii");

/** Revision of the layout produced by {@link writeGraphStream}. */
export const GRAPH_STREAM_VERSION = 1;

/** Bit assigned to every flag of the persisted type descriptor. */
export const GRAPH_TYPE_FLAGS = {
  directed: 0x01,
  undirected: 0x02,
  allowsSelfLoops: 0x04,
  allowsMultipleEdges: 0x08,
  weighted: 0x10,
  modifiable: 0x20,
} as const satisfies Record<keyof GraphTypeFlags, number>;

const KNOWN_FLAG_BITS = Object.values(GRAPH_TYPE_FLAGS).reduce((mask, bit) => mask | bit, 0);

/** Codecs persisting the nodes and the edge values of a stream. */
export interface GraphStreamCodecs<N, W> {
  readonly nodeCodec: ValueCodec<N>;
  readonly valueCodec: ValueCodec<W>;
}

/** Upper bounds applied to the counts announced by a stream. */
export interface GraphStreamLimits {
  readonly maxVertices: number;
  readonly maxEdges: number;
}

/** Everything {@link writeGraphStream} persists. */
export interface GraphStreamContent<N, W> {
  readonly converter: WeightConverterDescriptor;
  readonly type: GraphTypeDescriptor;
  readonly graph: ValueGraphView<N, W>;
}

/** Result of {@link readGraphStream}: a freshly built immutable graph. */
export interface DecodedGraphStream<N, W> {
  readonly converter: WeightConverterDescriptor;
  readonly type: GraphTypeDescriptor;
  readonly graph: ImmutableValueGraph<N, W>;
}

export function encodeGraphType(type: GraphTypeFlags): number {
  return (
    (type.directed ? GRAPH_TYPE_FLAGS.directed : 0) |
    (type.undirected ? GRAPH_TYPE_FLAGS.undirected : 0) |
    (type.allowsSelfLoops ? GRAPH_TYPE_FLAGS.allowsSelfLoops : 0) |
    (type.allowsMultipleEdges ? GRAPH_TYPE_FLAGS.allowsMultipleEdges : 0) |
    (type.weighted ? GRAPH_TYPE_FLAGS.weighted : 0) |
    (type.modifiable ? GRAPH_TYPE_FLAGS.modifiable : 0)
  );
}

export function decodeGraphType(mask: number): GraphTypeDescriptor {
  if ((mask & ~KNOWN_FLAG_BITS) !== 0) {
    throw new GraphFormatError(`unknown graph type flags 0x${mask.toString(16)}`);
  }
  const directed = (mask & GRAPH_TYPE_FLAGS.directed) !== 0;
  const undirected = (mask & GRAPH_TYPE_FLAGS.undirected) !== 0;
  if (!directed && !undirected) {
    throw new GraphFormatError("graph type declares neither directed nor undirected edges");
  }
  return new GraphTypeDescriptor({
    directed,
    undirected,
    allowsSelfLoops: (mask & GRAPH_TYPE_FLAGS.allowsSelfLoops) !== 0,
    allowsMultipleEdges: (mask & GRAPH_TYPE_FLAGS.allowsMultipleEdges) !== 0,
    weighted: (mask & GRAPH_TYPE_FLAGS.weighted) !== 0,
    modifiable: (mask & GRAPH_TYPE_FLAGS.modifiable) !== 0,
  });
}

/**
 * Writes the adapter-native fields: the magic bytes, the layout version, the
 * converter description and the kinds of the element codecs.
 */
export function writeStreamHeader(
  writer: BinaryWriter,
  converter: WeightConverterDescriptor,
  codecs: GraphStreamCodecs<unknown, unknown>,
): void {
  writer.writeBytes(GRAPH_STREAM_MAGIC);
  writer.writeUint16(GRAPH_STREAM_VERSION);
  writer.writeString(converter.kind);
  writer.writeString(JSON.stringify(converter.params));
  writer.writeString(codecs.nodeCodec.kind);
  writer.writeString(codecs.valueCodec.kind);
}

/**
 * Serializes a graph: header, type descriptor, `n` vertices in iteration order
 * then `m` edges as (source, target, value). Errors raised by the codecs
 * propagate as-is and leave the writer partially filled.
 */
export function writeGraphStream<N, W>(
  writer: BinaryWriter,
  content: GraphStreamContent<N, W>,
  codecs: GraphStreamCodecs<N, W>,
): void {
  writeStreamHeader(writer, content.converter, codecs);
  writer.writeUint8(encodeGraphType(content.type));

  const vertices = content.graph.nodes();
  writer.writeInt32(vertices.size);
  for (const vertex of vertices) {
    codecs.nodeCodec.write(writer, vertex);
  }

  const edges = content.graph.edges();
  writer.writeInt32(edges.size);
  for (const edge of edges) {
    const value = content.graph.edgeValue(edge.nodeU, edge.nodeV);
    if (value === undefined) {
      throw new NoSuchEdgeError(edge.nodeU, edge.nodeV);
    }
    codecs.nodeCodec.write(writer, edge.nodeU);
    codecs.nodeCodec.write(writer, edge.nodeV);
    codecs.valueCodec.write(writer, value);
  }
}

/**
 * Reads a stream produced by {@link writeGraphStream}. Mixed or multi-edge
 * descriptors are rejected before any element is decoded; every other
 * inconsistency raises a {@link GraphFormatError}. The reader is left just
 * after the last edge, so a graph can sit inside a larger record.
 */
export function readGraphStream<N, W>(
  reader: BinaryReader,
  codecs: GraphStreamCodecs<N, W>,
  limits: GraphStreamLimits,
  nodeKey: NodeKeyFn<N> = (node) => node,
): DecodedGraphStream<N, W> {
  const converter = readStreamHeader(reader, codecs);

  const type = decodeGraphType(reader.readUint8());
  if (type.mixed || type.allowsMultipleEdges) {
    throw new UnsupportedGraphShapeError({ mixed: type.mixed, allowsMultipleEdges: type.allowsMultipleEdges });
  }

  const scratch = (type.directed ? ValueGraphBuilder.directed() : ValueGraphBuilder.undirected())
    .allowsSelfLoops(type.allowsSelfLoops)
    .nodeKey(nodeKey)
    .build<N, W>();

  const vertexCount = readCount(reader, "vertex", limits.maxVertices);
  for (let index = 0; index < vertexCount; index += 1) {
    const vertex = codecs.nodeCodec.read(reader);
    if (!scratch.addNode(vertex)) {
      throw new GraphFormatError("duplicate vertex in stream", { index });
    }
  }

  const edgeCount = readCount(reader, "edge", limits.maxEdges);
  for (let index = 0; index < edgeCount; index += 1) {
    const source = codecs.nodeCodec.read(reader);
    const target = codecs.nodeCodec.read(reader);
    const value = codecs.valueCodec.read(reader);
    if (!scratch.hasNode(source) || !scratch.hasNode(target)) {
      throw new GraphFormatError("edge references an undeclared vertex", { index });
    }
    if (!type.allowsSelfLoops && sameKey(nodeKey(source), nodeKey(target))) {
      throw new GraphFormatError("self-loop in a graph that does not allow them", { index });
    }
    if (scratch.putEdgeValue(source, target, value) !== undefined) {
      throw new GraphFormatError("duplicate edge in stream", { index });
    }
  }

  return { converter, type, graph: ImmutableValueGraph.copyOf(scratch) };
}

/** Fails when a standalone graph buffer carries bytes past its last edge. */
export function assertStreamConsumed(reader: BinaryReader): void {
  if (reader.remaining > 0) {
    throw new GraphFormatError("unexpected trailing bytes after graph", { trailing: reader.remaining });
  }
}

function readStreamHeader(
  reader: BinaryReader,
  codecs: GraphStreamCodecs<unknown, unknown>,
): WeightConverterDescriptor {
  const magic = reader.readBytes(GRAPH_STREAM_MAGIC.length);
  if (!magic.equals(GRAPH_STREAM_MAGIC)) {
    throw new GraphFormatError("not a graph stream: bad magic bytes");
  }
  const version = reader.readUint16();
  if (version !== GRAPH_STREAM_VERSION) {
    throw new GraphFormatError(`unsupported graph stream version ${version}`, { expected: GRAPH_STREAM_VERSION });
  }

  const kind = reader.readString();
  const rawParams = reader.readString();
  let params: unknown;
  try {
    params = JSON.parse(rawParams);
  } catch (error) {
    throw new GraphFormatError(`malformed converter params: ${error instanceof Error ? error.message : String(error)}`);
  }
  const converter = converterDescriptorSchema.safeParse({ kind, params });
  if (!converter.success) {
    throw new GraphFormatError(`invalid converter description: ${converter.error.issues[0]?.message ?? "invalid"}`);
  }

  const nodeCodecKind = reader.readString();
  const valueCodecKind = reader.readString();
  if (nodeCodecKind !== codecs.nodeCodec.kind) {
    throw new GraphFormatError(`stream nodes use codec '${nodeCodecKind}', not '${codecs.nodeCodec.kind}'`);
  }
  if (valueCodecKind !== codecs.valueCodec.kind) {
    throw new GraphFormatError(`stream values use codec '${valueCodecKind}', not '${codecs.valueCodec.kind}'`);
  }
  return converter.data;
}

function readCount(reader: BinaryReader, label: "vertex" | "edge", max: number): number {
  const count = reader.readInt32();
  if (count < 0) {
    throw new GraphFormatError(`negative ${label} count ${count}`);
  }
  if (count > max) {
    throw new GraphFormatError(`${label} count ${count} exceeds the limit of ${max}`, { limit: max });
  }
  return count;
}
