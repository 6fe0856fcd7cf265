import { describe, it } from "mocha";
import { expect } from "chai";

import { GraphTypeDescriptor } from "../src/graph/types.js";

describe("GraphTypeDescriptor", () => {
  it("describes simple directed and undirected graphs", () => {
    const directed = GraphTypeDescriptor.directedSimple(true);
    expect(directed.toFlags()).to.deep.equal({
      directed: true,
      undirected: false,
      allowsSelfLoops: true,
      allowsMultipleEdges: false,
      weighted: false,
      modifiable: true,
    });
    expect(directed.mixed).to.equal(false);

    const undirected = GraphTypeDescriptor.undirectedSimple();
    expect(undirected.undirected).to.equal(true);
    expect(undirected.allowsSelfLoops).to.equal(false);
  });

  it("returns new descriptors from the adjustment helpers", () => {
    const base = GraphTypeDescriptor.directedSimple();
    const adjusted = base.asWeighted().asUnmodifiable();

    expect(base.weighted).to.equal(false);
    expect(base.modifiable).to.equal(true);
    expect(adjusted.weighted).to.equal(true);
    expect(adjusted.modifiable).to.equal(false);
    expect(adjusted.asModifiable().modifiable).to.equal(true);
    expect(adjusted.equals(base.with({ weighted: true, modifiable: false }))).to.equal(true);
  });

  it("reports mixed graphs", () => {
    const mixed = GraphTypeDescriptor.directedSimple().with({ undirected: true });
    expect(mixed.mixed).to.equal(true);
  });

  it("rejects descriptors without any edge orientation", () => {
    expect(
      () =>
        new GraphTypeDescriptor({
          directed: false,
          undirected: false,
          allowsSelfLoops: false,
          allowsMultipleEdges: false,
          weighted: false,
          modifiable: false,
        }),
    ).to.throw(RangeError);
  });

  it("freezes instances", () => {
    expect(Object.isFrozen(GraphTypeDescriptor.undirectedSimple())).to.equal(true);
  });
});
