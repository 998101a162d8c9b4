/**
 * VariantType and VariantOperator - the closed sets a Variant and the
 * operator table are indexed by.
 */

/**
 * Type tag of a Variant payload.
 */
export type VariantType =
  | "Null"
  | "Bool"
  | "Int64" // signed 64-bit integer, held as bigint
  | "Double" // IEEE 754 double
  | "String"
  | "Object"; // reference to an Identifiable plus its instance id

/**
 * Operators understood by the dispatch table.
 * Unary operators are evaluated with a Null right operand.
 */
export type VariantOperator =
  | "Equal"
  | "NotEqual"
  | "Less"
  | "LessEqual"
  | "Greater"
  | "GreaterEqual"
  | "Add"
  | "Subtract"
  | "Multiply"
  | "Divide"
  | "Mod"
  | "Negative"
  | "Positive"
  | "And"
  | "Or"
  | "XOr"
  | "Not"
  | "BitAnd"
  | "BitOr"
  | "BitXOr"
  | "BitFlip"
  | "BitShiftLeft"
  | "BitShiftRight";

/**
 * Table ordinal of each type tag.
 */
export const VARIANT_TYPE_ORDINAL: Readonly<Record<VariantType, number>> = {
  Null: 0,
  Bool: 1,
  Int64: 2,
  Double: 3,
  String: 4,
  Object: 5,
};

/**
 * Table ordinal of each operator.
 */
export const VARIANT_OPERATOR_ORDINAL: Readonly<
  Record<VariantOperator, number>
> = {
  Equal: 0,
  NotEqual: 1,
  Less: 2,
  LessEqual: 3,
  Greater: 4,
  GreaterEqual: 5,
  Add: 6,
  Subtract: 7,
  Multiply: 8,
  Divide: 9,
  Mod: 10,
  Negative: 11,
  Positive: 12,
  And: 13,
  Or: 14,
  XOr: 15,
  Not: 16,
  BitAnd: 17,
  BitOr: 18,
  BitXOr: 19,
  BitFlip: 20,
  BitShiftLeft: 21,
  BitShiftRight: 22,
};

export const VARIANT_TYPES: readonly VariantType[] = [
  "Null",
  "Bool",
  "Int64",
  "Double",
  "String",
  "Object",
];

export const VARIANT_OPERATORS: readonly VariantOperator[] = [
  "Equal",
  "NotEqual",
  "Less",
  "LessEqual",
  "Greater",
  "GreaterEqual",
  "Add",
  "Subtract",
  "Multiply",
  "Divide",
  "Mod",
  "Negative",
  "Positive",
  "And",
  "Or",
  "XOr",
  "Not",
  "BitAnd",
  "BitOr",
  "BitXOr",
  "BitFlip",
  "BitShiftLeft",
  "BitShiftRight",
];

/**
 * Operators that take a single operand.
 */
export const UNARY_OPERATORS: ReadonlySet<VariantOperator> = new Set([
  "Negative",
  "Positive",
  "Not",
  "BitFlip",
]);

export const isVariantOperator = (value: string): value is VariantOperator =>
  Object.prototype.hasOwnProperty.call(VARIANT_OPERATOR_ORDINAL, value);
