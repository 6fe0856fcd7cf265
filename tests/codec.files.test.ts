import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { readGraphFile, writeGraphFile } from "../src/codec/files.js";
import { int32Codec, stringCodec } from "../src/codec/valueCodecs.js";
import { identityConverter } from "../src/graph/converters.js";
import { EndpointPair } from "../src/graph/endpointPair.js";
import { ImmutableValueGraphAdapter } from "../src/graph/immutableAdapter.js";
import { ImmutableValueGraph, ValueGraphBuilder } from "../src/graph/valueGraph.js";
import { hasErrnoCode } from "../src/nodePrimitives.js";

describe("graph files", () => {
  const codecs = { nodeCodec: stringCodec, valueCodec: int32Codec };

  function buildAdapter() {
    const values = ValueGraphBuilder.undirected().build<string, number>();
    values.putEdgeValue("north", "south", 12);
    return new ImmutableValueGraphAdapter(ImmutableValueGraph.copyOf(values), identityConverter());
  }

  it("writes the serialized bytes and reads them back", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "value-graph-"));
    const filePath = path.join(directory, "nested", "roads.vgrf");

    try {
      const adapter = buildAdapter();
      const written = await writeGraphFile(filePath, adapter, codecs);

      expect(written).to.equal((await stat(filePath)).size);
      expect((await readFile(filePath)).equals(adapter.serialize(codecs))).to.equal(true);

      const restored = await readGraphFile(filePath, codecs);
      expect(restored.vertexSet().toArray()).to.deep.equal(["north", "south"]);
      expect(restored.getEdgeWeight(EndpointPair.unordered("south", "north"))).to.equal(12);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("propagates file-system errors unchanged", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "value-graph-"));
    try {
      let failure: unknown;
      try {
        await readGraphFile(path.join(directory, "missing.vgrf"), codecs);
      } catch (error) {
        failure = error;
      }
      expect(hasErrnoCode(failure, "ENOENT")).to.equal(true);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
