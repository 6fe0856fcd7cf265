import type { NodeKeyFn } from "./types.js";

const identityKey = <N>(node: N): unknown => node;

/**
 * The two nodes identifying an edge. Ordered pairs describe directed edges
 * (`source` → `target`) while unordered pairs describe undirected ones, in
 * which case `nodeU`/`nodeV` carry no orientation.
 */
export class EndpointPair<N> {
  private constructor(
    readonly nodeU: N,
    readonly nodeV: N,
    readonly isOrdered: boolean,
  ) {
    Object.freeze(this);
  }

  static ordered<N>(source: N, target: N): EndpointPair<N> {
    return new EndpointPair(source, target, true);
  }

  static unordered<N>(nodeU: N, nodeV: N): EndpointPair<N> {
    return new EndpointPair(nodeU, nodeV, false);
  }

  /** Builds the pair matching the orientation of a graph. */
  static of<N>(directed: boolean, nodeU: N, nodeV: N): EndpointPair<N> {
    return directed ? EndpointPair.ordered(nodeU, nodeV) : EndpointPair.unordered(nodeU, nodeV);
  }

  /** Source of an ordered pair. Unordered pairs have no source. */
  get source(): N {
    if (!this.isOrdered) {
      throw new TypeError("cannot call source() on an unordered endpoint pair");
    }
    return this.nodeU;
  }

  /** Target of an ordered pair. Unordered pairs have no target. */
  get target(): N {
    if (!this.isOrdered) {
      throw new TypeError("cannot call target() on an unordered endpoint pair");
    }
    return this.nodeV;
  }

  /**
   * Returns the endpoint opposite to `node`. For a self-loop the node itself
   * is returned.
   */
  adjacentNode(node: N, keyOf: NodeKeyFn<N> = identityKey): N {
    const key = keyOf(node);
    if (sameKey(keyOf(this.nodeU), key)) {
      return this.nodeV;
    }
    if (sameKey(keyOf(this.nodeV), key)) {
      return this.nodeU;
    }
    throw new RangeError("node is not an endpoint of this pair");
  }

  /**
   * Orientation-aware equality: ordered (u, v) differs from (v, u) whereas
   * unordered pairs compare as sets. Ordered and unordered pairs never match.
   */
  equals(other: EndpointPair<N>, keyOf: NodeKeyFn<N> = identityKey): boolean {
    if (this.isOrdered !== other.isOrdered) {
      return false;
    }
    const u = keyOf(this.nodeU);
    const v = keyOf(this.nodeV);
    const otherU = keyOf(other.nodeU);
    const otherV = keyOf(other.nodeV);
    if (sameKey(u, otherU) && sameKey(v, otherV)) {
      return true;
    }
    return !this.isOrdered && sameKey(u, otherV) && sameKey(v, otherU);
  }

  toArray(): [N, N] {
    return [this.nodeU, this.nodeV];
  }

  toString(): string {
    return this.isOrdered ? `<${String(this.nodeU)} -> ${String(this.nodeV)}>` : `[${String(this.nodeU)}, ${String(this.nodeV)}]`;
  }
}

/** SameValueZero, the comparison `Map` applies to its keys. */
export function sameKey(left: unknown, right: unknown): boolean {
  return left === right || (left !== left && right !== right);
}
