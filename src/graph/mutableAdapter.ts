import { BaseValueGraphAdapter, type AdapterOptions, type MutationResult } from "./baseAdapter.js";
import type { WeightConverter } from "./converters.js";
import { EndpointPair } from "./endpointPair.js";
import { InvalidEndpointsError, NoSuchEdgeError, UnsupportedMutationError } from "./errors.js";
import type { GraphMutation } from "./types.js";
import { ImmutableValueGraph, type MutableValueGraph } from "./valueGraph.js";

export interface MutableAdapterOptions<W> extends AdapterOptions {
  /** Value stored on edges created through `addEdge(source, target)`. */
  readonly defaultValue?: W;
  /** Inverse of the weight converter, required by `setEdgeWeight`. */
  readonly weightToValue?: (weight: number) => W;
}

/**
 * Graph adapter over a {@link MutableValueGraph}. Writes go straight to the
 * wrapped graph; {@link freeze} hands out an immutable snapshot.
 */
export class MutableValueGraphAdapter<N, W> extends BaseValueGraphAdapter<N, W, MutableValueGraph<N, W>> {
  private readonly defaultValue?: W;
  private readonly weightToValue?: (weight: number) => W;

  constructor(valueGraph: MutableValueGraph<N, W>, converter: WeightConverter<W>, options: MutableAdapterOptions<W> = {}) {
    super(valueGraph, converter, options);
    this.defaultValue = options.defaultValue;
    this.weightToValue = options.weightToValue;
  }

  protected applyMutation(mutation: GraphMutation<N>): MutationResult<N> {
    switch (mutation.kind) {
      case "addVertex":
        return this.valueGraph.addNode(mutation.vertex);
      case "removeVertex":
        return this.valueGraph.removeNode(mutation.vertex);
      case "addEdge":
        return this.insertEdge(mutation.source, mutation.target, mutation.edge);
      case "removeEdge":
        if (!this.containsEdge(mutation.edge)) {
          return false;
        }
        return this.valueGraph.removeEdge(mutation.edge.nodeU, mutation.edge.nodeV) !== undefined;
      case "removeEdgeBetween": {
        const edge = this.getEdge(mutation.source, mutation.target);
        if (edge) {
          this.valueGraph.removeEdge(mutation.source, mutation.target);
        }
        return edge;
      }
      case "setEdgeWeight":
        this.updateWeight(mutation.edge, mutation.weight);
        return undefined;
    }
  }

  /** Immutable snapshot of the current state, independent from later writes. */
  freeze(): ImmutableValueGraph<N, W> {
    return ImmutableValueGraph.copyOf(this.valueGraph);
  }

  private insertEdge(source: N, target: N, edge: EndpointPair<N> | undefined): EndpointPair<N> | boolean | null {
    this.assertVertexExist(source);
    this.assertVertexExist(target);
    if (edge !== undefined) {
      const expected = EndpointPair.of(this.valueGraph.isDirected, source, target);
      if (!expected.equals(edge, this.nodeKey)) {
        throw new InvalidEndpointsError("edge object does not match the given endpoints");
      }
    }
    if (this.valueGraph.hasEdgeConnecting(source, target)) {
      return edge === undefined ? null : false;
    }
    if (this.defaultValue === undefined) {
      throw new UnsupportedMutationError("addEdge", "adding an edge requires a default edge value");
    }
    this.valueGraph.putEdgeValue(source, target, this.defaultValue);
    return edge === undefined ? EndpointPair.of(this.valueGraph.isDirected, source, target) : true;
  }

  private updateWeight(edge: EndpointPair<N>, weight: number): void {
    if (!this.weightToValue) {
      throw new UnsupportedMutationError("setEdgeWeight", "setting weights requires a weightToValue function");
    }
    if (!this.containsEdge(edge)) {
      throw new NoSuchEdgeError(edge.nodeU, edge.nodeV);
    }
    this.valueGraph.putEdgeValue(edge.nodeU, edge.nodeV, this.weightToValue(weight));
  }
}
