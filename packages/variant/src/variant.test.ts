/**
 * Tests for Variant construction, accessors, equality and ordering
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Variant, isVariantLike } from "./variant.js";
import {
  allocateInstanceId,
  releaseInstanceId,
  type Identifiable,
} from "./instance-id.js";

const makeObject = (): Identifiable => ({ instanceId: allocateInstanceId() });

describe("Variant", () => {
  describe("construction", () => {
    it("should tag each constructor with its type", () => {
      expect(Variant.null().getType()).to.equal("Null");
      expect(Variant.bool(true).getType()).to.equal("Bool");
      expect(Variant.int64(3).getType()).to.equal("Int64");
      expect(Variant.double(1.5).getType()).to.equal("Double");
      expect(Variant.string("abc").getType()).to.equal("String");
      expect(Variant.object(makeObject()).getType()).to.equal("Object");
    });

    it("should turn a null object reference into a Null variant", () => {
      expect(Variant.object(null).getType()).to.equal("Null");
    });

    it("should wrap Int64 values outside the signed 64-bit range", () => {
      expect(Variant.int64(2n ** 63n).asInt64()).to.equal(-(2n ** 63n));
      expect(Variant.int64(-(2n ** 63n) - 1n).asInt64()).to.equal(
        2n ** 63n - 1n
      );
    });

    it("should truncate fractional numbers passed to int64", () => {
      expect(Variant.int64(-7.9).asInt64()).to.equal(-7n);
    });

    it("should reject non-finite numbers passed to int64", () => {
      expect(() => Variant.int64(Number.NaN)).to.throw(RangeError);
    });

    describe("from", () => {
      it("should map bigint to Int64 and number to Double", () => {
        expect(Variant.from(4n).getType()).to.equal("Int64");
        expect(Variant.from(4).getType()).to.equal("Double");
      });

      it("should map null and undefined to Null", () => {
        expect(Variant.from(null).isNull()).to.equal(true);
        expect(Variant.from(undefined).isNull()).to.equal(true);
      });

      it("should return an existing variant unchanged", () => {
        const v = Variant.string("same");
        expect(Variant.from(v)).to.equal(v);
      });

      it("should wrap identifiable objects", () => {
        const obj = makeObject();
        expect(Variant.from(obj).asObject()).to.equal(obj);
      });
    });
  });

  describe("accessors", () => {
    it("should fall back to the default when a String is read as Int64", () => {
      expect(Variant.string("12").asInt64()).to.equal(0n);
      expect(Variant.string("12").asInt64(5n)).to.equal(5n);
    });

    it("should read Bool as 1/0 in numeric accessors", () => {
      expect(Variant.bool(true).asInt64()).to.equal(1n);
      expect(Variant.bool(false).asDouble()).to.equal(0);
    });

    it("should truncate Double toward zero for integers", () => {
      expect(Variant.double(-2.75).asInt64()).to.equal(-2n);
      expect(Variant.double(9.99).asInt32()).to.equal(9);
    });

    it("should return the default for non-finite Double integers", () => {
      expect(Variant.double(Number.POSITIVE_INFINITY).asInt64(-1n)).to.equal(
        -1n
      );
    });

    it("should narrow integers with two's complement truncation", () => {
      expect(Variant.int64(300).asUInt8()).to.equal(44);
      expect(Variant.int64(200).asInt8()).to.equal(-56);
      expect(Variant.int64(-1).asUInt16()).to.equal(65535);
      expect(Variant.int64(2n ** 31n).asInt32()).to.equal(-2147483648);
      expect(Variant.int64(-1).asUInt32()).to.equal(4294967295);
    });

    it("should reinterpret negative Int64 as UInt64", () => {
      expect(Variant.int64(-1).asUInt64()).to.equal(2n ** 64n - 1n);
    });

    it("should round Double to single precision in asFloat", () => {
      expect(Variant.double(0.1).asFloat()).to.equal(Math.fround(0.1));
    });

    it("should read numbers as bools by non-zero test", () => {
      expect(Variant.int64(0).asBool(true)).to.equal(false);
      expect(Variant.double(0.5).asBool()).to.equal(true);
      expect(Variant.double(Number.NaN).asBool(true)).to.equal(true);
      expect(Variant.string("true").asBool()).to.equal(false);
    });

    it("should format scalars in asString and default the rest", () => {
      expect(Variant.int64(-42).asString()).to.equal("-42");
      expect(Variant.double(1.5).asString()).to.equal("1.5");
      expect(Variant.bool(false).asString()).to.equal("false");
      expect(Variant.null().asString("none")).to.equal("none");
      expect(Variant.object(makeObject()).asString("obj")).to.equal("obj");
    });

    it("should return the object while it is alive and the default after", () => {
      const obj = makeObject();
      const v = Variant.object(obj);
      expect(v.asObject()).to.equal(obj);
      expect(v.isStale()).to.equal(false);

      releaseInstanceId(obj.instanceId);
      const fallback = makeObject();
      expect(v.asObject()).to.equal(null);
      expect(v.asObject(fallback)).to.equal(fallback);
      expect(v.isStale()).to.equal(true);
    });
  });

  describe("round trips", () => {
    it("should return the original value for every tag", () => {
      const obj = makeObject();
      expect(Variant.bool(true).asBool()).to.equal(true);
      expect(Variant.int64(-(2n ** 63n)).asInt64()).to.equal(-(2n ** 63n));
      expect(Variant.double(-0.125).asDouble()).to.equal(-0.125);
      expect(Variant.string("héllo").asString()).to.equal("héllo");
      expect(Variant.object(obj).asObject()).to.equal(obj);
    });
  });

  describe("equals", () => {
    it("should compare by tag first", () => {
      expect(Variant.int64(3).equals(Variant.double(3))).to.equal(false);
      expect(Variant.null().equals(Variant.bool(false))).to.equal(false);
    });

    it("should compare payloads of the same tag", () => {
      expect(Variant.int64(3).equals(Variant.int64(3))).to.equal(true);
      expect(Variant.string("a").equals(Variant.string("b"))).to.equal(false);
      expect(Variant.null().equals(Variant.null())).to.equal(true);
    });

    it("should compare objects by instance identity", () => {
      const a = makeObject();
      const b = makeObject();
      expect(Variant.object(a).equals(Variant.object(a))).to.equal(true);
      expect(Variant.object(a).equals(Variant.object(b))).to.equal(false);
    });
  });

  describe("compare", () => {
    it("should order same-tag scalars", () => {
      expect(Variant.int64(1).compare(Variant.int64(2))).to.equal(-1);
      expect(Variant.double(2).compare(Variant.double(2))).to.equal(0);
      expect(Variant.string("b").compare(Variant.string("a"))).to.equal(1);
      expect(Variant.bool(false).compare(Variant.bool(true))).to.equal(-1);
    });

    it("should leave differing tags unordered", () => {
      expect(Variant.int64(1).compare(Variant.double(2))).to.be.undefined;
    });

    it("should leave NaN unordered", () => {
      expect(Variant.double(Number.NaN).compare(Variant.double(1))).to.be
        .undefined;
    });
  });

  describe("toString", () => {
    it("should format every tag", () => {
      expect(Variant.null().toString()).to.equal("null");
      expect(Variant.int64(7).toString()).to.equal("7");
      expect(Variant.string("x").toString()).to.equal("x");
    });

    it("should mark released objects as stale", () => {
      const obj = makeObject();
      const v = Variant.object(obj);
      expect(v.toString()).to.equal(
        `<object #${obj.instanceId.index}:${obj.instanceId.generation}>`
      );
      releaseInstanceId(obj.instanceId);
      expect(v.toString()).to.equal("<stale object>");
    });
  });

  describe("isVariantLike", () => {
    it("should accept primitives, variants and identifiables", () => {
      expect(isVariantLike(1)).to.equal(true);
      expect(isVariantLike(Variant.NULL)).to.equal(true);
      expect(isVariantLike(makeObject())).to.equal(true);
    });

    it("should reject plain objects", () => {
      expect(isVariantLike({ index: 1 })).to.equal(false);
    });
  });
});
