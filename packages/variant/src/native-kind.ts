/**
 * NativeKind - the native types a bound function may take or return.
 *
 * This module provides:
 * - NativeKind type union and its TypeScript value types
 * - Mapping from native kinds to the Variant tag they report
 * - Integer widths for the fixed-width kinds
 * - Variant <-> native conversion used by method invocation
 */

import { isIdentifiable, type Identifiable } from "./instance-id.js";
import { Variant } from "./variant.js";
import type { VariantType } from "./variant-type.js";

export type NativeKind =
  | "Void" // no value; only valid as a return kind
  | "Bool"
  | "Int8" // -128 to 127
  | "UInt8" // 0 to 255
  | "Int16"
  | "UInt16"
  | "Int32"
  | "UInt32"
  | "Int64" // bigint
  | "UInt64" // bigint
  | "Float" // single precision, carried as number
  | "Double"
  | "String"
  | "Object" // Identifiable or null
  | "Variant"; // passed through unconverted

/**
 * Kinds a parameter may declare.
 */
export type ParameterKind = Exclude<NativeKind, "Void">;

/**
 * TypeScript type of a native kind.
 */
export type NativeValue<K> = K extends "Void"
  ? void
  : K extends "Bool"
    ? boolean
    : K extends "Int64" | "UInt64"
      ? bigint
      : K extends "String"
        ? string
        : K extends "Object"
          ? Identifiable | null
          : K extends "Variant"
            ? Variant
            : number;

/**
 * Native argument tuple for a list of parameter kinds.
 */
export type NativeArguments<P extends readonly unknown[]> = {
  -readonly [I in keyof P]: NativeValue<P[I]>;
};

/**
 * Variant tag reported for each native kind.
 * Void reports Null; Variant reports Null as well, meaning "any".
 */
export const NATIVE_KIND_TO_VARIANT_TYPE: Readonly<
  Record<NativeKind, VariantType>
> = {
  Void: "Null",
  Bool: "Bool",
  Int8: "Int64",
  UInt8: "Int64",
  Int16: "Int64",
  UInt16: "Int64",
  Int32: "Int64",
  UInt32: "Int64",
  Int64: "Int64",
  UInt64: "Int64",
  Float: "Double",
  Double: "Double",
  String: "String",
  Object: "Object",
  Variant: "Null",
};

/**
 * Bit width and signedness of the fixed-width integer kinds.
 */
const INTEGER_WIDTHS: ReadonlyMap<
  NativeKind,
  { readonly bits: number; readonly signed: boolean }
> = new Map([
  ["Int8", { bits: 8, signed: true }],
  ["UInt8", { bits: 8, signed: false }],
  ["Int16", { bits: 16, signed: true }],
  ["UInt16", { bits: 16, signed: false }],
  ["Int32", { bits: 32, signed: true }],
  ["UInt32", { bits: 32, signed: false }],
  ["Int64", { bits: 64, signed: true }],
  ["UInt64", { bits: 64, signed: false }],
]);

/**
 * Wrap an integer to the width of `kind`. Non-integer kinds pass it through.
 */
export const wrapToKind = (value: bigint, kind: NativeKind): bigint => {
  const width = INTEGER_WIDTHS.get(kind);
  if (width === undefined) {
    return value;
  }
  return width.signed
    ? BigInt.asIntN(width.bits, value)
    : BigInt.asUintN(width.bits, value);
};

/**
 * Any value fromVariant can produce.
 */
type NativeUnion =
  | boolean
  | number
  | bigint
  | string
  | Identifiable
  | null
  | Variant
  | undefined;

/**
 * Convert a Variant to the native value of `kind`.
 * Mismatched payloads degrade to the kind's zero value, never fail.
 */
export const fromVariant = (kind: NativeKind, value: Variant): NativeUnion => {
  switch (kind) {
    case "Void":
      return undefined;
    case "Bool":
      return value.asBool();
    case "Int8":
      return value.asInt8();
    case "UInt8":
      return value.asUInt8();
    case "Int16":
      return value.asInt16();
    case "UInt16":
      return value.asUInt16();
    case "Int32":
      return value.asInt32();
    case "UInt32":
      return value.asUInt32();
    case "Int64":
      return value.asInt64();
    case "UInt64":
      return value.asUInt64();
    case "Float":
      return value.asFloat();
    case "Double":
      return value.asDouble();
    case "String":
      return value.asString();
    case "Object":
      return value.asObject();
    case "Variant":
      return value;
  }
};

/**
 * Wrap a native value of `kind` into a Variant.
 * Integers narrower than 64 bits wrap to their declared width. Void, and a
 * value whose runtime type does not match the kind, yield Null.
 */
export const toVariant = (kind: NativeKind, value: unknown): Variant => {
  switch (kind) {
    case "Void":
      return Variant.NULL;
    case "Bool":
      return typeof value === "boolean" ? Variant.bool(value) : Variant.NULL;
    case "Int8":
    case "UInt8":
    case "Int16":
    case "UInt16":
    case "Int32":
    case "UInt32":
      return typeof value === "number" && Number.isFinite(value)
        ? Variant.int64(wrapToKind(BigInt(Math.trunc(value)), kind))
        : Variant.NULL;
    case "Int64":
    case "UInt64":
      return typeof value === "bigint" ? Variant.int64(value) : Variant.NULL;
    case "Float":
    case "Double":
      return typeof value === "number" ? Variant.double(value) : Variant.NULL;
    case "String":
      return typeof value === "string" ? Variant.string(value) : Variant.NULL;
    case "Object":
      return isIdentifiable(value) ? Variant.object(value) : Variant.NULL;
    case "Variant":
      return value instanceof Variant ? value : Variant.NULL;
  }
};
