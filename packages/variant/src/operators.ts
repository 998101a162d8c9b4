/**
 * Operator dispatch table.
 *
 * A flat array indexed by (left type, right type, operator) holding the
 * evaluator for that combination, or undefined when it is unsupported. The
 * table is filled once, when this module is first evaluated, by a single
 * registration pass; afterwards it is only read.
 *
 * Unary operators live under (operand type, "Null").
 */

import { DivisionByZeroError, UnsupportedOperatorError } from "./errors.js";
import { isInstanceAlive, sameInstance } from "./instance-id.js";
import { Variant, orderOf } from "./variant.js";
import {
  VARIANT_OPERATORS,
  VARIANT_OPERATOR_ORDINAL,
  VARIANT_TYPES,
  VARIANT_TYPE_ORDINAL,
  type VariantOperator,
  type VariantType,
} from "./variant-type.js";

export type Evaluator = (a: Variant, b: Variant) => Variant;

type Order = (a: Variant, b: Variant) => number | undefined;

const TYPE_COUNT = VARIANT_TYPES.length;
const OPERATOR_COUNT = VARIANT_OPERATORS.length;

const slotOf = (
  op: VariantOperator,
  left: VariantType,
  right: VariantType
): number =>
  (VARIANT_TYPE_ORDINAL[left] * TYPE_COUNT + VARIANT_TYPE_ORDINAL[right]) *
    OPERATOR_COUNT +
  VARIANT_OPERATOR_ORDINAL[op];

const NUMERIC_PAIRS: readonly (readonly [VariantType, VariantType])[] = [
  ["Int64", "Double"],
  ["Double", "Int64"],
  ["Double", "Double"],
];

const BITWISE_PAIRS: readonly (readonly [VariantType, VariantType])[] = [
  ["Bool", "Bool"],
  ["Bool", "Int64"],
  ["Int64", "Bool"],
  ["Int64", "Int64"],
];

const int64Op =
  (fn: (x: bigint, y: bigint) => bigint): Evaluator =>
  (a, b) =>
    Variant.int64(fn(a.asInt64(), b.asInt64()));

const doubleOp =
  (fn: (x: number, y: number) => number): Evaluator =>
  (a, b) =>
    Variant.double(fn(a.asDouble(), b.asDouble()));

const int64Divide: Evaluator = (a, b) => {
  const divisor = b.asInt64();
  if (divisor === 0n) throw new DivisionByZeroError("Divide");
  return Variant.int64(a.asInt64() / divisor);
};

const int64Mod: Evaluator = (a, b) => {
  const divisor = b.asInt64();
  if (divisor === 0n) throw new DivisionByZeroError("Mod");
  return Variant.int64(a.asInt64() % divisor);
};

const identity: Evaluator = (a) => a;

const objectsEqual: Evaluator = (a, b) => {
  const left = a.getInstanceId();
  const right = b.getInstanceId();
  return Variant.bool(
    left !== undefined && right !== undefined && sameInstance(left, right)
  );
};

// A released object compares equal to null
const isNullish = (v: Variant): boolean => {
  const id = v.getInstanceId();
  return id === undefined || !isInstanceAlive(id);
};

const nullEquals: Evaluator = (a, b) =>
  Variant.bool(isNullish(a) && isNullish(b));

/**
 * Build the evaluator table. Called once at module evaluation.
 */
const buildEvaluatorTable = (): readonly (Evaluator | undefined)[] => {
  const table: (Evaluator | undefined)[] = new Array<Evaluator | undefined>(
    TYPE_COUNT * TYPE_COUNT * OPERATOR_COUNT
  ).fill(undefined);

  const register = (
    op: VariantOperator,
    left: VariantType,
    right: VariantType,
    evaluator: Evaluator
  ): void => {
    table[slotOf(op, left, right)] = evaluator;
  };

  const registerComparisons = (
    left: VariantType,
    right: VariantType,
    order: Order
  ): void => {
    register("Equal", left, right, (a, b) => Variant.bool(order(a, b) === 0));
    register("NotEqual", left, right, (a, b) =>
      Variant.bool(order(a, b) !== 0)
    );
    register("Less", left, right, (a, b) => {
      const o = order(a, b);
      return Variant.bool(o !== undefined && o < 0);
    });
    register("LessEqual", left, right, (a, b) => {
      const o = order(a, b);
      return Variant.bool(o !== undefined && o <= 0);
    });
    register("Greater", left, right, (a, b) => {
      const o = order(a, b);
      return Variant.bool(o !== undefined && o > 0);
    });
    register("GreaterEqual", left, right, (a, b) => {
      const o = order(a, b);
      return Variant.bool(o !== undefined && o >= 0);
    });
  };

  // Null and Object
  register("Equal", "Null", "Null", () => Variant.TRUE);
  register("NotEqual", "Null", "Null", () => Variant.FALSE);
  register("Equal", "Object", "Object", objectsEqual);
  register("NotEqual", "Object", "Object", (a, b) =>
    Variant.bool(!objectsEqual(a, b).asBool())
  );
  for (const [left, right] of [
    ["Null", "Object"],
    ["Object", "Null"],
  ] as const) {
    register("Equal", left, right, nullEquals);
    register("NotEqual", left, right, (a, b) =>
      Variant.bool(!nullEquals(a, b).asBool())
    );
  }

  // Bool
  registerComparisons("Bool", "Bool", (a, b) =>
    orderOf(Number(a.asBool()), Number(b.asBool()))
  );
  register("And", "Bool", "Bool", (a, b) =>
    Variant.bool(a.asBool() && b.asBool())
  );
  register("Or", "Bool", "Bool", (a, b) =>
    Variant.bool(a.asBool() || b.asBool())
  );
  register("XOr", "Bool", "Bool", (a, b) =>
    Variant.bool(a.asBool() !== b.asBool())
  );
  register("Not", "Bool", "Null", (a) => Variant.bool(!a.asBool()));
  register("BitFlip", "Bool", "Null", (a) => Variant.int64(~a.asInt64()));

  // Bitwise, with Bool read as 1/0
  for (const [left, right] of BITWISE_PAIRS) {
    register("BitAnd", left, right, int64Op((x, y) => x & y));
    register("BitOr", left, right, int64Op((x, y) => x | y));
    register("BitXOr", left, right, int64Op((x, y) => x ^ y));
  }

  // Int64
  registerComparisons("Int64", "Int64", (a, b) =>
    orderOf(a.asInt64(), b.asInt64())
  );
  register("Add", "Int64", "Int64", int64Op((x, y) => x + y));
  register("Subtract", "Int64", "Int64", int64Op((x, y) => x - y));
  register("Multiply", "Int64", "Int64", int64Op((x, y) => x * y));
  register("Divide", "Int64", "Int64", int64Divide);
  register("Mod", "Int64", "Int64", int64Mod);
  register("BitShiftLeft", "Int64", "Int64", int64Op((x, y) => x << (y & 63n)));
  register("BitShiftRight", "Int64", "Int64", int64Op((x, y) => x >> (y & 63n)));
  register("Negative", "Int64", "Null", (a) => Variant.int64(-a.asInt64()));
  register("Positive", "Int64", "Null", identity);
  register("BitFlip", "Int64", "Null", (a) => Variant.int64(~a.asInt64()));

  // Double; Int64 mixed with Double promotes for arithmetic only, since
  // comparisons across tags are unordered
  registerComparisons("Double", "Double", (a, b) =>
    orderOf(a.asDouble(), b.asDouble())
  );
  for (const [left, right] of NUMERIC_PAIRS) {
    register("Add", left, right, doubleOp((x, y) => x + y));
    register("Subtract", left, right, doubleOp((x, y) => x - y));
    register("Multiply", left, right, doubleOp((x, y) => x * y));
    register("Divide", left, right, doubleOp((x, y) => x / y));
    register("Mod", left, right, doubleOp((x, y) => x % y));
  }
  register("Negative", "Double", "Null", (a) => Variant.double(-a.asDouble()));
  register("Positive", "Double", "Null", identity);

  // String
  registerComparisons("String", "String", (a, b) =>
    orderOf(a.asString(), b.asString())
  );
  register("Add", "String", "String", (a, b) =>
    Variant.string(a.asString() + b.asString())
  );

  return Object.freeze(table);
};

const evaluators = buildEvaluatorTable();

/**
 * Whether (op, typeA, typeB) has an evaluator.
 */
export const canEvaluate = (
  op: VariantOperator,
  typeA: VariantType,
  typeB: VariantType = "Null"
): boolean => evaluators[slotOf(op, typeA, typeB)] !== undefined;

/**
 * Evaluate `a op b` (or `op a` for unary operators).
 * Throws UnsupportedOperatorError when the combination has no evaluator.
 */
export const evaluate = (
  op: VariantOperator,
  a: Variant,
  b: Variant = Variant.NULL
): Variant => {
  const evaluator = evaluators[slotOf(op, a.getType(), b.getType())];
  if (!evaluator) {
    throw new UnsupportedOperatorError(op, a.getType(), b.getType());
  }
  return evaluator(a, b);
};

/**
 * Every supported (operator, left, right) triple, in table order.
 */
export const listEvaluators = (): readonly {
  readonly op: VariantOperator;
  readonly left: VariantType;
  readonly right: VariantType;
}[] => {
  const result: {
    readonly op: VariantOperator;
    readonly left: VariantType;
    readonly right: VariantType;
  }[] = [];
  for (const left of VARIANT_TYPES) {
    for (const right of VARIANT_TYPES) {
      for (const op of VARIANT_OPERATORS) {
        if (canEvaluate(op, left, right)) {
          result.push({ op, left, right });
        }
      }
    }
  }
  return result;
};
