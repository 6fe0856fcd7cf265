/**
 * The bootstrap (`tests/setup.ts`) patches the networking primitives; this
 * suite only checks the guard is active.
 */
import { describe, it } from "mocha";
import { expect } from "chai";
import { Socket } from "node:net";

import { createDeterministicRandom, NetworkBlockedError } from "./setup.js";

describe("offline guard", () => {
  it("rejects outbound socket connections", () => {
    const socket = new Socket();
    try {
      expect(() => socket.connect({ host: "example.com", port: 80 })).to.throw(
        NetworkBlockedError,
        "network access via net.Socket#connect is disabled during tests",
      );
    } finally {
      socket.destroy();
    }
  });

  it("rejects fetch calls", async () => {
    let failure: unknown;
    try {
      await fetch("http://example.com");
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(NetworkBlockedError);
    expect(failure).to.have.property("code", "E-NETWORK-BLOCKED");
  });

  it("replays the same random sequence for the same seed", () => {
    const first = createDeterministicRandom("seed");
    const second = createDeterministicRandom("seed");
    const sequence = [first(), first(), first()];
    expect([second(), second(), second()]).to.deep.equal(sequence);
    for (const value of sequence) {
      expect(value).to.be.within(0, 1);
    }
  });
});
