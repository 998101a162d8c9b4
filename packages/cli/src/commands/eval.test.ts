/**
 * Tests for the eval command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { evalOperator } from "./eval.js";

describe("evalOperator", () => {
  it("should add integers", () => {
    expect(evalOperator("+", ["2", "3"])).to.deep.equal({ ok: true, value: "5" });
  });

  it("should promote mixed numbers to Double", () => {
    expect(evalOperator("Add", ["2", "0.5"])).to.deep.equal({
      ok: true,
      value: "2.5",
    });
  });

  it("should not compare Int64 against Double", () => {
    expect(evalOperator("==", ["1", "1.0"])).to.deep.equal({
      ok: false,
      error: {
        kind: "invocation",
        message: "MRV2001: Cannot evaluate Equal on Int64 and Double",
      },
    });
    expect(evalOperator("==", ["1.0", "1.0"])).to.deep.equal({
      ok: true,
      value: "true",
    });
  });

  it("should evaluate unary operators", () => {
    expect(evalOperator("-", ["4"])).to.deep.equal({ ok: true, value: "-4" });
    expect(evalOperator("!", ["true"])).to.deep.equal({
      ok: true,
      value: "false",
    });
    expect(evalOperator("~", ["true"])).to.deep.equal({ ok: true, value: "-2" });
  });

  it("should mask shift counts", () => {
    expect(evalOperator("<<", ["1", "65"])).to.deep.equal({
      ok: true,
      value: "2",
    });
  });

  it("should concatenate strings", () => {
    expect(evalOperator("+", ['"a"', "b"])).to.deep.equal({
      ok: true,
      value: '"ab"',
    });
  });

  it("should report integer division by zero", () => {
    expect(evalOperator("/", ["1", "0"])).to.deep.equal({
      ok: false,
      error: { kind: "invocation", message: "MRV2002: Integer Divide by zero" },
    });
  });

  it("should report unsupported combinations", () => {
    expect(evalOperator("+", ["true", "null"])).to.deep.equal({
      ok: false,
      error: {
        kind: "invocation",
        message: "MRV2001: Cannot evaluate Add on Bool and Null",
      },
    });
  });

  it("should reject unknown operators", () => {
    expect(evalOperator("??", ["1", "2"])).to.deep.equal({
      ok: false,
      error: { kind: "usage", message: "Unknown operator '??'" },
    });
  });

  it("should match the operand count to the operator", () => {
    expect(evalOperator("Negative", ["1", "2"])).to.deep.equal({
      ok: false,
      error: { kind: "usage", message: "Negative takes one operand" },
    });
    expect(evalOperator("*", ["6"])).to.deep.equal({
      ok: false,
      error: { kind: "usage", message: "Multiply takes two operands" },
    });
  });

  it("should require one or two operands", () => {
    const none = evalOperator("+", []);
    const three = evalOperator("+", ["1", "2", "3"]);
    expect(!none.ok && none.error.kind).to.equal("usage");
    expect(!three.ok && three.error.message).to.equal(
      "eval takes one or two operands"
    );
  });
});
