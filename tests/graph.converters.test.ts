import { describe, it } from "mocha";
import { expect } from "chai";

import {
  assertPersistableConverter,
  identityConverter,
  propertyConverter,
  scaledConverter,
  WeightConverterRegistry,
  type WeightConverter,
} from "../src/graph/converters.js";
import { InvalidConverterError, UnknownConverterError } from "../src/graph/errors.js";
import { ERROR_CODES } from "../src/types.js";

describe("weight converters", () => {
  it("converts values with the built-in converters", () => {
    expect(identityConverter().toWeight(2.5)).to.equal(2.5);
    expect(propertyConverter("km").toWeight({ km: 5 })).to.equal(5);
    expect(scaledConverter(2).toWeight(3)).to.equal(6);
    expect(scaledConverter(0.5, "km").toWeight({ km: 4 })).to.equal(2);
  });

  it("describes the built-ins with JSON params", () => {
    expect(identityConverter().params).to.equal(null);
    expect(propertyConverter("km").params).to.deep.equal({ field: "km" });
    expect(scaledConverter(2).params).to.deep.equal({ factor: 2, field: null });
    expect(scaledConverter(2, "km").params).to.deep.equal({ factor: 2, field: "km" });
  });

  it("refuses non-numeric fields", () => {
    expect(() => propertyConverter("km").toWeight({ km: "5" })).to.throw(TypeError, "edge value field 'km' is not a number");
    expect(() => scaledConverter(2).toWeight({ km: 1 })).to.throw(TypeError);
  });

  describe("assertPersistableConverter", () => {
    const toWeight = (value: number) => value;

    it("returns the persisted description", () => {
      expect(assertPersistableConverter({ kind: "custom", params: [1, "a"], toWeight })).to.deep.equal({
        kind: "custom",
        params: [1, "a"],
      });
    });

    it("rejects empty or malformed kinds", () => {
      for (const kind of ["", "   ", " custom ", "has space", "slash/kind"]) {
        expect(() => assertPersistableConverter({ kind, params: null, toWeight }), kind).to.throw(InvalidConverterError);
      }
    });

    it("rejects params that are not JSON", () => {
      let failure: unknown;
      try {
        assertPersistableConverter({ kind: "custom", params: Number.POSITIVE_INFINITY, toWeight });
      } catch (error) {
        failure = error;
      }
      expect(failure).to.be.instanceOf(InvalidConverterError);
      expect(failure).to.have.property("code", ERROR_CODES.GRAPH_INVALID_CONVERTER);
    });
  });

  describe("WeightConverterRegistry", () => {
    it("rebuilds the built-in converters from their description", () => {
      const registry = WeightConverterRegistry.withBuiltins();
      expect(registry.has("identity")).to.equal(true);

      const identity = registry.resolve<number>(identityConverter());
      expect(identity.toWeight(3)).to.equal(3);

      const scaled = registry.resolve<number>({ kind: "scaled", params: { factor: 3, field: null } });
      expect(scaled.toWeight(2)).to.equal(6);

      const property = registry.resolve<Record<string, unknown>>({ kind: "property", params: { field: "cost" } });
      expect(property.toWeight({ cost: 9 })).to.equal(9);
    });

    it("rejects unknown kinds", () => {
      const registry = new WeightConverterRegistry();
      expect(() => registry.resolve({ kind: "identity", params: null })).to.throw(UnknownConverterError, "unknown weight converter 'identity'");
    });

    it("rejects params that do not fit the converter", () => {
      const registry = WeightConverterRegistry.withBuiltins();
      expect(() => registry.resolve({ kind: "property", params: {} })).to.throw(InvalidConverterError);
      expect(() => registry.resolve({ kind: "scaled", params: { factor: "two" } })).to.throw(InvalidConverterError);
    });

    it("accepts custom factories", () => {
      const offset = (delta: number): WeightConverter<number> => ({
        kind: "offset",
        params: { delta },
        toWeight: (value) => value + delta,
      });
      const registry = WeightConverterRegistry.withBuiltins().register("offset", (params) => {
        const delta = typeof params === "object" && params !== null && !Array.isArray(params) ? params.delta : 0;
        return offset(typeof delta === "number" ? delta : 0);
      });

      expect(registry.resolve<number>(offset(10)).toWeight(1)).to.equal(11);
    });

    it("refuses to register kinds that cannot be persisted", () => {
      const registry = WeightConverterRegistry.withBuiltins();
      let failure: unknown;
      try {
        registry.register(" km ", () => identityConverter());
      } catch (error) {
        failure = error;
      }
      expect(failure).to.be.instanceOf(InvalidConverterError);
      expect(failure).to.have.deep.property("details", { kind: " km " });
      expect(registry.has(" km ")).to.equal(false);
    });
  });
});
