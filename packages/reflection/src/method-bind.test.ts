/**
 * Tests for MethodBind
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Variant, type Identifiable } from "@metareflect/variant";
import { bindConstMethod, bindMethod, bindStatic } from "./method-bind.js";
import { ManualObject } from "./object.js";
import { statusOf } from "./types/result.js";

class Counter extends ManualObject {
  count = 0;

  add(amount: number): number {
    this.count += amount;
    return this.count;
  }

  peek(): number {
    return this.count;
  }
}

class Unrelated extends ManualObject {}

describe("MethodBind", () => {
  describe("bindStatic", () => {
    const add = bindStatic((a: number, b: number) => a + b, {
      returns: "Int32",
      parameters: ["Int32", "Int32"],
    });

    it("should describe its signature", () => {
      expect(add.isStatic()).to.equal(true);
      expect(add.isConst()).to.equal(false);
      expect(add.getReturnKind()).to.equal("Int32");
      expect(add.getReturnType()).to.equal("Int64");
      expect(add.getArgumentCount()).to.equal(2);
      expect(add.getArgumentKind(1)).to.equal("Int32");
      expect(add.getArgumentType(0)).to.equal("Int64");
      expect(add.getArgumentType(2)).to.equal(undefined);
      expect(add.getDeclaringType()).to.equal(undefined);
    });

    it("should convert arguments and wrap the result", () => {
      const result = add.invoke(null, [Variant.int64(3), Variant.int64(4)]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.getType()).to.equal("Int64");
        expect(result.value.asInt64()).to.equal(7n);
      }
    });

    it("should convert mismatched arguments leniently", () => {
      const result = add.invoke(null, [
        Variant.string("not a number"),
        Variant.double(2.9),
      ]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.asInt64()).to.equal(2n);
      }
    });

    it("should wrap a narrow return to its declared width", () => {
      const widen = bindStatic((value: number) => value * 100, {
        returns: "Int8",
        parameters: ["Int8"],
      });
      const result = widen.invoke(null, [Variant.int64(3)]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.asInt64()).to.equal(44n);
        expect(result.value.asInt8()).to.equal(44);
      }
    });

    it("should ignore the receiver", () => {
      const receiver = new Counter();
      receiver.destroy();
      const result = add.invoke(receiver, [Variant.int64(1), Variant.int64(1)]);
      expect(statusOf(result)).to.equal("OK");
    });

    it("should reject a wrong argument count without calling", () => {
      let calls = 0;
      const counted = bindStatic(
        (value: number) => {
          calls++;
          return value;
        },
        { returns: "Int32", parameters: ["Int32"] }
      );

      const tooFew = counted.invoke(null, []);
      const tooMany = counted.invoke(null, [Variant.int64(1), Variant.int64(2)]);

      expect(calls).to.equal(0);
      expect(tooFew.ok).to.equal(false);
      if (!tooFew.ok) {
        expect(tooFew.error.status).to.equal("ArgumentCountMismatch");
        expect(tooFew.error.message).to.equal("Expected 1 arguments, got 0");
      }
      expect(statusOf(tooMany)).to.equal("ArgumentCountMismatch");
    });

    it("should fill missing trailing arguments from defaults", () => {
      const result = add.invoke(null, [Variant.int64(1)], [Variant.int64(10)]);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.asInt64()).to.equal(11n);
      }
    });

    it("should prefer supplied arguments over defaults", () => {
      const result = add.invoke(
        null,
        [Variant.int64(1), Variant.int64(2)],
        [Variant.int64(10)]
      );
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.asInt64()).to.equal(3n);
      }
    });

    it("should report the accepted range when defaults exist", () => {
      const result = add.invoke(
        null,
        [Variant.int64(1), Variant.int64(2), Variant.int64(3)],
        [Variant.int64(10)]
      );
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal("Expected 1 to 2 arguments, got 3");
      }
    });

    it("should return Null for Void functions", () => {
      let seen = "";
      const record = bindStatic(
        (text: string): void => {
          seen = text;
        },
        { returns: "Void", parameters: ["String"] }
      );

      const result = record.invoke(null, [Variant.string("hi")]);
      expect(seen).to.equal("hi");
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.isNull()).to.equal(true);
      }
    });

    it("should let errors thrown by the function propagate", () => {
      const fail = bindStatic(
        (): void => {
          throw new Error("native failure");
        },
        { returns: "Void", parameters: [] }
      );
      expect(() => fail.invoke(null, [])).to.throw("native failure");
    });

    it("should pass released objects as null", () => {
      const isPresent = bindStatic((ref: Identifiable | null) => ref !== null, {
        returns: "Bool",
        parameters: ["Object"],
      });
      const counter = new Counter();
      const live = isPresent.invoke(null, [Variant.object(counter)]);
      counter.destroy();
      const stale = isPresent.invoke(null, [Variant.object(counter)]);

      expect(live.ok && live.value.asBool()).to.equal(true);
      expect(stale.ok && stale.value.asBool()).to.equal(false);
    });
  });

  describe("bindMethod", () => {
    const add = bindMethod(Counter, Counter.prototype.add, {
      returns: "Int32",
      parameters: ["Int32"],
    });

    it("should call the method on the receiver", () => {
      const counter = new Counter();
      add.invoke(counter, [Variant.int64(5)]);
      const result = add.invoke(counter, [Variant.int64(2)]);

      expect(counter.count).to.equal(7);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.asInt64()).to.equal(7n);
      }
      expect(add.isStatic()).to.equal(false);
      expect(add.getDeclaringType()).to.equal(Counter);
    });

    it("should reject a missing receiver", () => {
      expect(statusOf(add.invoke(null, [Variant.int64(1)]))).to.equal(
        "NullInstance"
      );
      expect(statusOf(add.invoke(undefined, [Variant.int64(1)]))).to.equal(
        "NullInstance"
      );
    });

    it("should reject a released receiver", () => {
      const counter = new Counter();
      counter.destroy();
      expect(statusOf(add.invoke(counter, [Variant.int64(1)]))).to.equal(
        "StaleInstance"
      );
      expect(counter.count).to.equal(0);
    });

    it("should reject a receiver of another class", () => {
      const result = add.invoke(new Unrelated(), [Variant.int64(1)]);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.status).to.equal("InstanceTypeMismatch");
        expect(result.error.message).to.equal(
          "Receiver is not an instance of Counter"
        );
      }
    });

    it("should check the argument count before the receiver", () => {
      expect(statusOf(add.invoke(null, []))).to.equal("ArgumentCountMismatch");
    });
  });

  describe("bindConstMethod", () => {
    it("should mark the bind const", () => {
      const peek = bindConstMethod(Counter, Counter.prototype.peek, {
        returns: "Int32",
        parameters: [],
      });
      const counter = new Counter();
      counter.count = 3;

      const result = peek.invoke(counter, []);
      expect(peek.isConst()).to.equal(true);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.asInt64()).to.equal(3n);
      }
    });
  });
});
