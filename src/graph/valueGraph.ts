import { EndpointPair, sameKey } from "./endpointPair.js";
import { InvalidEndpointsError } from "./errors.js";
import { GraphTypeDescriptor, type NodeKeyFn, type ReadonlyCollection } from "./types.js";

/**
 * Read-only capability over a value graph: a node set, a set of endpoint pairs
 * and one value per edge. Adapters consume graphs exclusively through this
 * contract so alternative storages can be plugged in.
 */
export interface ValueGraphView<N, W> {
  readonly isDirected: boolean;
  readonly allowsSelfLoops: boolean;
  /** Function deriving the equality key of a node (SameValueZero on the key). */
  readonly nodeKey: NodeKeyFn<N>;

  type(): GraphTypeDescriptor;
  nodes(): ReadonlyCollection<N>;
  edges(): ReadonlyCollection<EndpointPair<N>>;
  hasNode(node: N): boolean;
  hasEdgeConnecting(source: N, target: N): boolean;
  hasEdge(endpoints: EndpointPair<N>): boolean;
  /** Value of the edge, or `undefined` when the edge is absent. */
  edgeValue(source: N, target: N): W | undefined;
  edgeValueOf(endpoints: EndpointPair<N>): W | undefined;
  edgeValueOrDefault<D>(source: N, target: N, defaultValue: D): W | D;
  successors(node: N): N[];
  predecessors(node: N): N[];
  adjacentNodes(node: N): N[];
  incidentEdges(node: N): EndpointPair<N>[];
  degree(node: N): number;
  inDegree(node: N): number;
  outDegree(node: N): number;
}

/** Settings shared by the mutable and immutable value graphs. */
export interface ValueGraphShape<N> {
  readonly directed: boolean;
  readonly allowsSelfLoops: boolean;
  readonly nodeKey?: NodeKeyFn<N>;
}

const identityKey = <N>(node: N): unknown => node;

/**
 * Map-backed storage shared by {@link MutableValueGraph} and
 * {@link ImmutableValueGraph}. Nodes keep their insertion order and edges are
 * enumerated by walking each node's successors in that order.
 */
abstract class AbstractValueGraph<N, W> implements ValueGraphView<N, W> {
  readonly isDirected: boolean;
  readonly allowsSelfLoops: boolean;
  readonly nodeKey: NodeKeyFn<N>;

  private readonly nodeIndex = new Map<unknown, { node: N; ordinal: number }>();
  /** Outgoing adjacency (both directions for undirected graphs). */
  private readonly successorValues = new Map<unknown, Map<unknown, W>>();
  /** Incoming adjacency, only maintained for directed graphs. */
  private readonly predecessorValues = new Map<unknown, Map<unknown, W>>();
  private nextOrdinal = 0;
  private edgeTotal = 0;

  protected constructor(shape: ValueGraphShape<N>) {
    this.isDirected = shape.directed;
    this.allowsSelfLoops = shape.allowsSelfLoops;
    this.nodeKey = shape.nodeKey ?? identityKey;
  }

  protected abstract get modifiable(): boolean;

  type(): GraphTypeDescriptor {
    const base = this.isDirected
      ? GraphTypeDescriptor.directedSimple(this.allowsSelfLoops)
      : GraphTypeDescriptor.undirectedSimple(this.allowsSelfLoops);
    return this.modifiable ? base : base.asUnmodifiable();
  }

  nodes(): ReadonlyCollection<N> {
    const self = this;
    return {
      get size() {
        return self.nodeIndex.size;
      },
      has: (node) => self.hasNode(node),
      toArray: () => Array.from(self.nodeIndex.values(), (entry) => entry.node),
      [Symbol.iterator]: function* () {
        for (const entry of self.nodeIndex.values()) {
          yield entry.node;
        }
      },
    };
  }

  edges(): ReadonlyCollection<EndpointPair<N>> {
    const self = this;
    return {
      get size() {
        return self.edgeTotal;
      },
      has: (endpoints) => self.hasEdge(endpoints),
      toArray: () => Array.from(self.iterateEdges()),
      [Symbol.iterator]: () => self.iterateEdges(),
    };
  }

  hasNode(node: N): boolean {
    return this.nodeIndex.has(this.nodeKey(node));
  }

  hasEdgeConnecting(source: N, target: N): boolean {
    return this.lookup(source, target) !== undefined;
  }

  hasEdge(endpoints: EndpointPair<N>): boolean {
    this.checkOrientation(endpoints);
    return this.hasEdgeConnecting(endpoints.nodeU, endpoints.nodeV);
  }

  edgeValue(source: N, target: N): W | undefined {
    return this.lookup(source, target)?.value;
  }

  edgeValueOf(endpoints: EndpointPair<N>): W | undefined {
    this.checkOrientation(endpoints);
    return this.edgeValue(endpoints.nodeU, endpoints.nodeV);
  }

  edgeValueOrDefault<D>(source: N, target: N, defaultValue: D): W | D {
    const found = this.lookup(source, target);
    return found === undefined ? defaultValue : found.value;
  }

  successors(node: N): N[] {
    return this.resolveAll(this.successorValues.get(this.requireKey(node)));
  }

  predecessors(node: N): N[] {
    const key = this.requireKey(node);
    if (!this.isDirected) {
      return this.resolveAll(this.successorValues.get(key));
    }
    return this.resolveAll(this.predecessorValues.get(key));
  }

  adjacentNodes(node: N): N[] {
    const key = this.requireKey(node);
    if (!this.isDirected) {
      return this.resolveAll(this.successorValues.get(key));
    }
    const keys = new Set<unknown>([
      ...(this.predecessorValues.get(key)?.keys() ?? []),
      ...(this.successorValues.get(key)?.keys() ?? []),
    ]);
    return this.resolveAll(keys);
  }

  incidentEdges(node: N): EndpointPair<N>[] {
    const key = this.requireKey(node);
    if (!this.isDirected) {
      return this.resolveAll(this.successorValues.get(key)).map((other) => EndpointPair.unordered(node, other));
    }
    const incoming = this.resolveAll(this.predecessorValues.get(key)).map((other) => EndpointPair.ordered(other, node));
    const outgoing = this.resolveAll(this.successorValues.get(key))
      // A self-loop is already listed among the incoming edges.
      .filter((other) => !sameKey(this.nodeKey(other), key))
      .map((other) => EndpointPair.ordered(node, other));
    return [...incoming, ...outgoing];
  }

  degree(node: N): number {
    const key = this.requireKey(node);
    const out = this.successorValues.get(key);
    if (this.isDirected) {
      return (out?.size ?? 0) + (this.predecessorValues.get(key)?.size ?? 0);
    }
    // Undirected self-loops count twice towards the degree.
    return (out?.size ?? 0) + (out?.has(key) ? 1 : 0);
  }

  inDegree(node: N): number {
    return this.isDirected ? this.predecessorValues.get(this.requireKey(node))?.size ?? 0 : this.degree(node);
  }

  outDegree(node: N): number {
    return this.isDirected ? this.successorValues.get(this.requireKey(node))?.size ?? 0 : this.degree(node);
  }

  protected insertNode(node: N): boolean {
    const key = this.nodeKey(node);
    if (this.nodeIndex.has(key)) {
      return false;
    }
    this.nodeIndex.set(key, { node, ordinal: this.nextOrdinal });
    this.nextOrdinal += 1;
    return true;
  }

  protected insertEdge(source: N, target: N, value: W): W | undefined {
    if (value === undefined) {
      throw new TypeError("edge values cannot be undefined");
    }
    const sourceKey = this.nodeKey(source);
    const targetKey = this.nodeKey(target);
    if (!this.allowsSelfLoops && sameKey(sourceKey, targetKey)) {
      throw new InvalidEndpointsError(
        `cannot add self-loop on ${String(source)}`,
        "build the graph with allowsSelfLoops(true)",
      );
    }
    this.insertNode(source);
    this.insertNode(target);

    const previous = this.adjacency(this.successorValues, sourceKey).get(targetKey);
    this.adjacency(this.successorValues, sourceKey).set(targetKey, value);
    if (this.isDirected) {
      this.adjacency(this.predecessorValues, targetKey).set(sourceKey, value);
    } else {
      this.adjacency(this.successorValues, targetKey).set(sourceKey, value);
    }
    if (previous === undefined) {
      this.edgeTotal += 1;
    }
    return previous;
  }

  protected deleteEdge(source: N, target: N): W | undefined {
    const sourceKey = this.nodeKey(source);
    const targetKey = this.nodeKey(target);
    const previous = this.successorValues.get(sourceKey)?.get(targetKey);
    if (previous === undefined) {
      return undefined;
    }
    this.successorValues.get(sourceKey)?.delete(targetKey);
    if (this.isDirected) {
      this.predecessorValues.get(targetKey)?.delete(sourceKey);
    } else {
      this.successorValues.get(targetKey)?.delete(sourceKey);
    }
    this.edgeTotal -= 1;
    return previous;
  }

  protected deleteNode(node: N): boolean {
    const key = this.nodeKey(node);
    const entry = this.nodeIndex.get(key);
    if (!entry) {
      return false;
    }
    for (const successor of this.resolveAll(this.successorValues.get(key))) {
      this.deleteEdge(entry.node, successor);
    }
    if (this.isDirected) {
      for (const predecessor of this.resolveAll(this.predecessorValues.get(key))) {
        this.deleteEdge(predecessor, entry.node);
      }
    }
    this.successorValues.delete(key);
    this.predecessorValues.delete(key);
    this.nodeIndex.delete(key);
    return true;
  }

  private *iterateEdges(): IterableIterator<EndpointPair<N>> {
    for (const [key, entry] of this.nodeIndex) {
      const successors = this.successorValues.get(key);
      if (!successors) {
        continue;
      }
      for (const successorKey of successors.keys()) {
        const successor = this.nodeIndex.get(successorKey);
        if (!successor) {
          continue;
        }
        if (this.isDirected) {
          yield EndpointPair.ordered(entry.node, successor.node);
        } else if (successor.ordinal >= entry.ordinal) {
          // Each undirected edge is reported once, from its older endpoint.
          yield EndpointPair.unordered(entry.node, successor.node);
        }
      }
    }
  }

  private lookup(source: N, target: N): { value: W } | undefined {
    const value = this.successorValues.get(this.nodeKey(source))?.get(this.nodeKey(target));
    return value === undefined ? undefined : { value };
  }

  private checkOrientation(endpoints: EndpointPair<N>): void {
    if (this.isDirected && !endpoints.isOrdered) {
      throw new InvalidEndpointsError(
        "unordered endpoints cannot address an edge of a directed graph",
        "use EndpointPair.ordered(source, target)",
      );
    }
  }

  private requireKey(node: N): unknown {
    const key = this.nodeKey(node);
    if (!this.nodeIndex.has(key)) {
      throw new InvalidEndpointsError(`node ${String(node)} is not an element of this graph`);
    }
    return key;
  }

  private resolveAll(keys: Iterable<unknown> | Map<unknown, W> | undefined): N[] {
    if (!keys) {
      return [];
    }
    const iterable = keys instanceof Map ? keys.keys() : keys;
    const nodes: N[] = [];
    for (const key of iterable) {
      const entry = this.nodeIndex.get(key);
      if (entry) {
        nodes.push(entry.node);
      }
    }
    return nodes;
  }

  private adjacency(table: Map<unknown, Map<unknown, W>>, key: unknown): Map<unknown, W> {
    let bucket = table.get(key);
    if (!bucket) {
      bucket = new Map();
      table.set(key, bucket);
    }
    return bucket;
  }
}

/** Value graph accepting node and edge insertions/removals. */
export class MutableValueGraph<N, W> extends AbstractValueGraph<N, W> {
  constructor(shape: ValueGraphShape<N>) {
    super(shape);
  }

  protected get modifiable(): boolean {
    return true;
  }

  /** Adds `node`; returns `false` when it was already present. */
  addNode(node: N): boolean {
    return this.insertNode(node);
  }

  /**
   * Connects `source` to `target` with `value`, adding missing endpoints.
   * Returns the value previously associated with the edge, if any.
   */
  putEdgeValue(source: N, target: N, value: W): W | undefined {
    return this.insertEdge(source, target, value);
  }

  removeNode(node: N): boolean {
    return this.deleteNode(node);
  }

  /** Removes the edge and returns its value, or `undefined` when absent. */
  removeEdge(source: N, target: N): W | undefined {
    return this.deleteEdge(source, target);
  }
}

/** Frozen value graph. Instances are only created through {@link copyOf}. */
export class ImmutableValueGraph<N, W> extends AbstractValueGraph<N, W> {
  private constructor(shape: ValueGraphShape<N>) {
    super(shape);
  }

  protected get modifiable(): boolean {
    return false;
  }

  /**
   * Builds an immutable graph holding the same nodes (in iteration order),
   * edges and values as `graph`. The result never shares storage with its
   * source.
   */
  static copyOf<N, W>(graph: ValueGraphView<N, W>): ImmutableValueGraph<N, W> {
    const copy = new ImmutableValueGraph<N, W>({
      directed: graph.isDirected,
      allowsSelfLoops: graph.allowsSelfLoops,
      nodeKey: graph.nodeKey,
    });
    for (const node of graph.nodes()) {
      copy.insertNode(node);
    }
    for (const endpoints of graph.edges()) {
      const value = graph.edgeValue(endpoints.nodeU, endpoints.nodeV);
      if (value === undefined) {
        throw new InvalidEndpointsError(`edge ${endpoints.toString()} has no value`);
      }
      copy.insertEdge(endpoints.nodeU, endpoints.nodeV, value);
    }
    return copy;
  }
}

/** Structural copy primitive used by the adapters when cloning. */
export function copyValueGraph<N, W>(graph: ValueGraphView<N, W>): ImmutableValueGraph<N, W> {
  return ImmutableValueGraph.copyOf(graph);
}

/**
 * Fluent configuration of a new {@link MutableValueGraph}:
 * `ValueGraphBuilder.directed().allowsSelfLoops(true).build<string, number>()`.
 */
export class ValueGraphBuilder<N = unknown> {
  private selfLoops = false;
  private keyFn?: NodeKeyFn<N>;

  private constructor(private readonly directedEdges: boolean) {}

  static directed(): ValueGraphBuilder {
    return new ValueGraphBuilder(true);
  }

  static undirected(): ValueGraphBuilder {
    return new ValueGraphBuilder(false);
  }

  /** Starts from the orientation and self-loop policy of an existing graph. */
  static from<N>(graph: Pick<ValueGraphView<N, unknown>, "isDirected" | "allowsSelfLoops" | "nodeKey">): ValueGraphBuilder<N> {
    const builder = new ValueGraphBuilder<N>(graph.isDirected);
    builder.selfLoops = graph.allowsSelfLoops;
    builder.keyFn = graph.nodeKey;
    return builder;
  }

  allowsSelfLoops(allowed: boolean): this {
    this.selfLoops = allowed;
    return this;
  }

  /** Derives node equality from `keyFn(node)` instead of the node itself. */
  nodeKey<K>(keyFn: NodeKeyFn<K>): ValueGraphBuilder<K> {
    const builder = new ValueGraphBuilder<K>(this.directedEdges);
    builder.selfLoops = this.selfLoops;
    builder.keyFn = keyFn;
    return builder;
  }

  build<T extends N, W>(): MutableValueGraph<T, W> {
    return new MutableValueGraph<T, W>({
      directed: this.directedEdges,
      allowsSelfLoops: this.selfLoops,
      nodeKey: this.keyFn,
    });
  }
}
