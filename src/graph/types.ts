/**
 * Shared type definitions describing the graph contract exposed by the
 * adapters. Keeping the types centralised prevents circular dependencies
 * between the value-graph storage, the adapters and the wire codec.
 */
import type { EndpointPair } from "./endpointPair.js";

/** Plain snapshot of the shape flags carried by {@link GraphTypeDescriptor}. */
export interface GraphTypeFlags {
  readonly directed: boolean;
  readonly undirected: boolean;
  readonly allowsSelfLoops: boolean;
  readonly allowsMultipleEdges: boolean;
  readonly weighted: boolean;
  readonly modifiable: boolean;
}

/**
 * Read-only summary of a graph's shape. A graph that allows both directed and
 * undirected edges is reported as mixed. Adjustments always return a new
 * descriptor.
 */
export class GraphTypeDescriptor implements GraphTypeFlags {
  readonly directed: boolean;
  readonly undirected: boolean;
  readonly allowsSelfLoops: boolean;
  readonly allowsMultipleEdges: boolean;
  readonly weighted: boolean;
  readonly modifiable: boolean;

  constructor(flags: GraphTypeFlags) {
    if (!flags.directed && !flags.undirected) {
      throw new RangeError("a graph type must allow directed or undirected edges");
    }
    this.directed = flags.directed;
    this.undirected = flags.undirected;
    this.allowsSelfLoops = flags.allowsSelfLoops;
    this.allowsMultipleEdges = flags.allowsMultipleEdges;
    this.weighted = flags.weighted;
    this.modifiable = flags.modifiable;
    Object.freeze(this);
  }

  /** Simple, unweighted, modifiable directed graph. */
  static directedSimple(allowsSelfLoops = false): GraphTypeDescriptor {
    return new GraphTypeDescriptor({
      directed: true,
      undirected: false,
      allowsSelfLoops,
      allowsMultipleEdges: false,
      weighted: false,
      modifiable: true,
    });
  }

  /** Simple, unweighted, modifiable undirected graph. */
  static undirectedSimple(allowsSelfLoops = false): GraphTypeDescriptor {
    return new GraphTypeDescriptor({
      directed: false,
      undirected: true,
      allowsSelfLoops,
      allowsMultipleEdges: false,
      weighted: false,
      modifiable: true,
    });
  }

  get mixed(): boolean {
    return this.directed && this.undirected;
  }

  asUnmodifiable(): GraphTypeDescriptor {
    return this.with({ modifiable: false });
  }

  asModifiable(): GraphTypeDescriptor {
    return this.with({ modifiable: true });
  }

  asWeighted(): GraphTypeDescriptor {
    return this.with({ weighted: true });
  }

  with(overrides: Partial<GraphTypeFlags>): GraphTypeDescriptor {
    return new GraphTypeDescriptor({ ...this.toFlags(), ...overrides });
  }

  toFlags(): GraphTypeFlags {
    return {
      directed: this.directed,
      undirected: this.undirected,
      allowsSelfLoops: this.allowsSelfLoops,
      allowsMultipleEdges: this.allowsMultipleEdges,
      weighted: this.weighted,
      modifiable: this.modifiable,
    };
  }

  equals(other: GraphTypeFlags): boolean {
    return (
      this.directed === other.directed &&
      this.undirected === other.undirected &&
      this.allowsSelfLoops === other.allowsSelfLoops &&
      this.allowsMultipleEdges === other.allowsMultipleEdges &&
      this.weighted === other.weighted &&
      this.modifiable === other.modifiable
    );
  }
}

/**
 * Minimal read-only collection returned by the vertex/edge queries. Membership
 * follows the graph's own equality rules rather than JavaScript identity, so
 * `has()` accepts freshly built endpoint pairs.
 */
export interface ReadonlyCollection<T> extends Iterable<T> {
  readonly size: number;
  has(item: T): boolean;
  toArray(): T[];
}

/** Identity function used to derive the equality key of a node. */
export type NodeKeyFn<N> = (node: N) => unknown;

/**
 * Mutation accepted by {@link Graph}. Every write method of the adapters is
 * routed through a single `applyMutation` entry point using this union.
 */
export type GraphMutation<N> =
  | { readonly kind: "addVertex"; readonly vertex: N }
  | { readonly kind: "removeVertex"; readonly vertex: N }
  | { readonly kind: "addEdge"; readonly source: N; readonly target: N; readonly edge?: EndpointPair<N> }
  | { readonly kind: "removeEdge"; readonly edge: EndpointPair<N> }
  | { readonly kind: "removeEdgeBetween"; readonly source: N; readonly target: N }
  | { readonly kind: "setEdgeWeight"; readonly edge: EndpointPair<N>; readonly weight: number };

/** Discriminant of {@link GraphMutation}. */
export type GraphMutationKind = GraphMutation<unknown>["kind"];

/**
 * General weighted graph contract whose edges are endpoint pairs. Read
 * operations are total over present elements; write operations may be
 * rejected by read-only implementations.
 */
export interface Graph<N> {
  getType(): GraphTypeDescriptor;

  vertexSet(): ReadonlyCollection<N>;
  edgeSet(): ReadonlyCollection<EndpointPair<N>>;
  containsVertex(vertex: N): boolean;
  containsEdge(edge: EndpointPair<N>): boolean;
  containsEdgeBetween(source: N, target: N): boolean;
  getEdge(source: N, target: N): EndpointPair<N> | null;
  getAllEdges(source: N, target: N): ReadonlyCollection<EndpointPair<N>>;

  degreeOf(vertex: N): number;
  inDegreeOf(vertex: N): number;
  outDegreeOf(vertex: N): number;
  edgesOf(vertex: N): ReadonlyCollection<EndpointPair<N>>;
  incomingEdgesOf(vertex: N): ReadonlyCollection<EndpointPair<N>>;
  outgoingEdgesOf(vertex: N): ReadonlyCollection<EndpointPair<N>>;

  getEdgeSource(edge: EndpointPair<N>): N;
  getEdgeTarget(edge: EndpointPair<N>): N;
  getEdgeWeight(edge: EndpointPair<N>): number;

  addVertex(vertex: N): boolean;
  removeVertex(vertex: N): boolean;
  addEdge(source: N, target: N): EndpointPair<N> | null;
  addEdge(source: N, target: N, edge: EndpointPair<N>): boolean;
  removeEdge(edge: EndpointPair<N>): boolean;
  removeEdge(source: N, target: N): EndpointPair<N> | null;
  setEdgeWeight(edge: EndpointPair<N>, weight: number): void;
}
