import type { GraphLogger } from "../logger.js";
import { assertPersistableConverter, type WeightConverter } from "./converters.js";
import { EndpointPair } from "./endpointPair.js";
import { NoSuchEdgeError, NoSuchNodeError } from "./errors.js";
import type { Graph, GraphMutation, GraphTypeDescriptor, NodeKeyFn, ReadonlyCollection } from "./types.js";
import type { ValueGraphView } from "./valueGraph.js";

/** Options shared by every adapter variant. */
export interface AdapterOptions {
  /** Receives debug/warn/error events emitted by the adapter. */
  readonly logger?: GraphLogger;
}

/** Value returned by {@link BaseValueGraphAdapter.applyMutation}. */
export type MutationResult<N> = boolean | EndpointPair<N> | null | undefined;

/**
 * Array-backed collection whose membership test follows the supplied equality
 * instead of JavaScript identity.
 */
export function collectionOf<T>(items: T[], equals: (left: T, right: T) => boolean): ReadonlyCollection<T> {
  return {
    size: items.length,
    has: (item) => items.some((candidate) => equals(candidate, item)),
    toArray: () => [...items],
    [Symbol.iterator]: () => items[Symbol.iterator](),
  };
}

/**
 * Read path shared by the mutable and immutable adapters. Every query
 * delegates to the wrapped {@link ValueGraphView}; numeric weights are derived
 * from edge values through the weight converter. Writes are funnelled through
 * {@link applyMutation}, which each variant implements once.
 */
export abstract class BaseValueGraphAdapter<N, W, G extends ValueGraphView<N, W>> implements Graph<N> {
  protected readonly valueGraph: G;
  protected readonly converter: WeightConverter<W>;
  protected readonly logger?: GraphLogger;

  /** Lazily created vertex view; never carried over to copies. */
  private unmodifiableVertexSet?: ReadonlyCollection<N>;
  /** Lazily created edge view; never carried over to copies. */
  private unmodifiableEdgeSet?: ReadonlyCollection<EndpointPair<N>>;

  protected constructor(valueGraph: G, converter: WeightConverter<W>, options: AdapterOptions = {}) {
    assertPersistableConverter(converter);
    this.valueGraph = valueGraph;
    this.converter = converter;
    this.logger = options.logger;
  }

  /** The wrapped value graph. */
  get view(): G {
    return this.valueGraph;
  }

  get weightConverter(): WeightConverter<W> {
    return this.converter;
  }

  protected get nodeKey(): NodeKeyFn<N> {
    return this.valueGraph.nodeKey;
  }

  /**
   * Applies (or rejects) a write. Public mutators only translate their
   * arguments into a {@link GraphMutation} and interpret the result.
   */
  protected abstract applyMutation(mutation: GraphMutation<N>): MutationResult<N>;

  getType(): GraphTypeDescriptor {
    return this.valueGraph.type().asWeighted();
  }

  vertexSet(): ReadonlyCollection<N> {
    if (!this.unmodifiableVertexSet) {
      this.unmodifiableVertexSet = this.valueGraph.nodes();
    }
    return this.unmodifiableVertexSet;
  }

  edgeSet(): ReadonlyCollection<EndpointPair<N>> {
    if (!this.unmodifiableEdgeSet) {
      this.unmodifiableEdgeSet = this.valueGraph.edges();
    }
    return this.unmodifiableEdgeSet;
  }

  containsVertex(vertex: N): boolean {
    return this.valueGraph.hasNode(vertex);
  }

  containsEdge(edge: EndpointPair<N>): boolean {
    if (this.valueGraph.isDirected && !edge.isOrdered) {
      return false;
    }
    return this.valueGraph.hasEdgeConnecting(edge.nodeU, edge.nodeV);
  }

  containsEdgeBetween(source: N, target: N): boolean {
    return this.valueGraph.hasEdgeConnecting(source, target);
  }

  getEdge(source: N, target: N): EndpointPair<N> | null {
    if (!this.valueGraph.hasEdgeConnecting(source, target)) {
      return null;
    }
    return EndpointPair.of(this.valueGraph.isDirected, source, target);
  }

  getAllEdges(source: N, target: N): ReadonlyCollection<EndpointPair<N>> {
    const edge = this.getEdge(source, target);
    return this.edgeCollection(edge ? [edge] : []);
  }

  degreeOf(vertex: N): number {
    this.assertVertexExist(vertex);
    return this.valueGraph.degree(vertex);
  }

  inDegreeOf(vertex: N): number {
    this.assertVertexExist(vertex);
    return this.valueGraph.inDegree(vertex);
  }

  outDegreeOf(vertex: N): number {
    this.assertVertexExist(vertex);
    return this.valueGraph.outDegree(vertex);
  }

  edgesOf(vertex: N): ReadonlyCollection<EndpointPair<N>> {
    this.assertVertexExist(vertex);
    return this.edgeCollection(this.valueGraph.incidentEdges(vertex));
  }

  incomingEdgesOf(vertex: N): ReadonlyCollection<EndpointPair<N>> {
    this.assertVertexExist(vertex);
    if (!this.valueGraph.isDirected) {
      return this.edgesOf(vertex);
    }
    const edges = this.valueGraph.predecessors(vertex).map((source) => EndpointPair.ordered(source, vertex));
    return this.edgeCollection(edges);
  }

  outgoingEdgesOf(vertex: N): ReadonlyCollection<EndpointPair<N>> {
    this.assertVertexExist(vertex);
    if (!this.valueGraph.isDirected) {
      return this.edgesOf(vertex);
    }
    const edges = this.valueGraph.successors(vertex).map((target) => EndpointPair.ordered(vertex, target));
    return this.edgeCollection(edges);
  }

  getEdgeSource(edge: EndpointPair<N>): N {
    this.assertEdgeExist(edge);
    return edge.nodeU;
  }

  getEdgeTarget(edge: EndpointPair<N>): N {
    this.assertEdgeExist(edge);
    return edge.nodeV;
  }

  getEdgeWeight(edge: EndpointPair<N>): number {
    const value = this.valueGraph.edgeValueOf(edge);
    if (value === undefined) {
      throw new NoSuchEdgeError(edge.nodeU, edge.nodeV);
    }
    return this.converter.toWeight(value);
  }

  addVertex(vertex: N): boolean {
    return this.applyMutation({ kind: "addVertex", vertex }) === true;
  }

  removeVertex(vertex: N): boolean {
    return this.applyMutation({ kind: "removeVertex", vertex }) === true;
  }

  addEdge(source: N, target: N): EndpointPair<N> | null;
  addEdge(source: N, target: N, edge: EndpointPair<N>): boolean;
  addEdge(...args: [N, N] | [N, N, EndpointPair<N>]): EndpointPair<N> | null | boolean {
    if (args.length === 3) {
      const [source, target, edge] = args;
      return this.applyMutation({ kind: "addEdge", source, target, edge }) === true;
    }
    const [source, target] = args;
    const result = this.applyMutation({ kind: "addEdge", source, target });
    return result instanceof EndpointPair ? result : null;
  }

  removeEdge(edge: EndpointPair<N>): boolean;
  removeEdge(source: N, target: N): EndpointPair<N> | null;
  removeEdge(...args: [EndpointPair<N>] | [N, N]): EndpointPair<N> | null | boolean {
    if (args.length === 1) {
      const [edge] = args;
      return this.applyMutation({ kind: "removeEdge", edge }) === true;
    }
    const [source, target] = args;
    const result = this.applyMutation({ kind: "removeEdgeBetween", source, target });
    return result instanceof EndpointPair ? result : null;
  }

  setEdgeWeight(edge: EndpointPair<N>, weight: number): void {
    this.applyMutation({ kind: "setEdgeWeight", edge, weight });
  }

  protected assertVertexExist(vertex: N): void {
    if (!this.valueGraph.hasNode(vertex)) {
      throw new NoSuchNodeError(vertex);
    }
  }

  protected assertEdgeExist(edge: EndpointPair<N>): void {
    if (!this.containsEdge(edge)) {
      throw new NoSuchEdgeError(edge.nodeU, edge.nodeV);
    }
  }

  protected edgeCollection(edges: EndpointPair<N>[]): ReadonlyCollection<EndpointPair<N>> {
    const keyOf = this.nodeKey;
    return collectionOf(edges, (left, right) => left.equals(right, keyOf));
  }
}
