/**
 * Variant - closed tagged union used to carry arguments and results across
 * the reflection boundary.
 *
 * Variants are immutable. Copying one copies the payload handle: strings are
 * shared, object references keep the raw reference plus the instance id seen
 * at construction.
 */

import {
  formatInstanceId,
  isIdentifiable,
  isInstanceAlive,
  sameInstance,
  type Identifiable,
  type InstanceId,
} from "./instance-id.js";
import type { VariantType } from "./variant-type.js";

type ObjectData = {
  readonly ref: Identifiable;
  readonly id: InstanceId;
};

type VariantPayload =
  | { readonly type: "Null" }
  | { readonly type: "Bool"; readonly value: boolean }
  | { readonly type: "Int64"; readonly value: bigint }
  | { readonly type: "Double"; readonly value: number }
  | { readonly type: "String"; readonly value: string }
  | { readonly type: "Object"; readonly value: ObjectData };

/**
 * Values accepted wherever a Variant can be built implicitly.
 * `number` always becomes Double; use bigint (or Variant.int64) for Int64.
 */
export type VariantLike =
  | Variant
  | boolean
  | number
  | bigint
  | string
  | Identifiable
  | null
  | undefined;

const wrapInt64 = (value: bigint): bigint => BigInt.asIntN(64, value);

/**
 * Three-way order of two primitives; undefined when unordered (NaN).
 */
export const orderOf = <T extends number | bigint | string>(
  a: T,
  b: T
): number | undefined => {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  return undefined;
};

export class Variant {
  static readonly NULL: Variant = new Variant({ type: "Null" });
  static readonly TRUE: Variant = new Variant({ type: "Bool", value: true });
  static readonly FALSE: Variant = new Variant({ type: "Bool", value: false });

  private readonly payload: VariantPayload;

  private constructor(payload: VariantPayload) {
    this.payload = payload;
  }

  static null(): Variant {
    return Variant.NULL;
  }

  static bool(value: boolean): Variant {
    return value ? Variant.TRUE : Variant.FALSE;
  }

  /**
   * Int64 from a bigint or an integral number. Values outside the signed
   * 64-bit range wrap; fractional numbers truncate toward zero.
   */
  static int64(value: number | bigint): Variant {
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        throw new RangeError(`Cannot represent ${value} as Int64`);
      }
      return new Variant({
        type: "Int64",
        value: wrapInt64(BigInt(Math.trunc(value))),
      });
    }
    return new Variant({ type: "Int64", value: wrapInt64(value) });
  }

  static double(value: number): Variant {
    return new Variant({ type: "Double", value });
  }

  static string(value: string): Variant {
    return new Variant({ type: "String", value });
  }

  /**
   * Object reference. A null reference yields a Null variant.
   */
  static object(ref: Identifiable | null): Variant {
    if (ref === null) {
      return Variant.NULL;
    }
    return new Variant({
      type: "Object",
      value: { ref, id: ref.instanceId },
    });
  }

  static from(value: VariantLike): Variant {
    if (value instanceof Variant) return value;
    if (value === null || value === undefined) return Variant.NULL;
    switch (typeof value) {
      case "boolean":
        return Variant.bool(value);
      case "bigint":
        return Variant.int64(value);
      case "number":
        return Variant.double(value);
      case "string":
        return Variant.string(value);
    }
    return Variant.object(value);
  }

  static isVariant(value: unknown): value is Variant {
    return value instanceof Variant;
  }

  getType(): VariantType {
    return this.payload.type;
  }

  isNull(): boolean {
    return this.payload.type === "Null";
  }

  /**
   * Instance id of an Object variant, live or not.
   */
  getInstanceId(): InstanceId | undefined {
    return this.payload.type === "Object" ? this.payload.value.id : undefined;
  }

  /**
   * True for an Object variant whose referent has been released.
   */
  isStale(): boolean {
    return (
      this.payload.type === "Object" && !isInstanceAlive(this.payload.value.id)
    );
  }

  // Integral view shared by the integer accessors
  private toInteger(): bigint | undefined {
    const p = this.payload;
    switch (p.type) {
      case "Bool":
        return p.value ? 1n : 0n;
      case "Int64":
        return p.value;
      case "Double":
        return Number.isFinite(p.value)
          ? wrapInt64(BigInt(Math.trunc(p.value)))
          : undefined;
      default:
        return undefined;
    }
  }

  private toNumber(): number | undefined {
    const p = this.payload;
    switch (p.type) {
      case "Bool":
        return p.value ? 1 : 0;
      case "Int64":
        return Number(p.value);
      case "Double":
        return p.value;
      default:
        return undefined;
    }
  }

  private toWidth(bits: number, signed: boolean, defaultValue: number): number {
    const value = this.toInteger();
    if (value === undefined) return defaultValue;
    return Number(signed ? BigInt.asIntN(bits, value) : BigInt.asUintN(bits, value));
  }

  asBool(defaultValue = false): boolean {
    const p = this.payload;
    switch (p.type) {
      case "Bool":
        return p.value;
      case "Int64":
        return p.value !== 0n;
      case "Double":
        return Number.isNaN(p.value) ? defaultValue : p.value !== 0;
      default:
        return defaultValue;
    }
  }

  asInt8(defaultValue = 0): number {
    return this.toWidth(8, true, defaultValue);
  }

  asUInt8(defaultValue = 0): number {
    return this.toWidth(8, false, defaultValue);
  }

  asInt16(defaultValue = 0): number {
    return this.toWidth(16, true, defaultValue);
  }

  asUInt16(defaultValue = 0): number {
    return this.toWidth(16, false, defaultValue);
  }

  asInt32(defaultValue = 0): number {
    return this.toWidth(32, true, defaultValue);
  }

  asUInt32(defaultValue = 0): number {
    return this.toWidth(32, false, defaultValue);
  }

  asInt64(defaultValue = 0n): bigint {
    return this.toInteger() ?? defaultValue;
  }

  asUInt64(defaultValue = 0n): bigint {
    const value = this.toInteger();
    return value === undefined ? defaultValue : BigInt.asUintN(64, value);
  }

  asFloat(defaultValue = 0): number {
    const value = this.toNumber();
    return value === undefined ? defaultValue : Math.fround(value);
  }

  asDouble(defaultValue = 0): number {
    return this.toNumber() ?? defaultValue;
  }

  asString(defaultValue = ""): string {
    const p = this.payload;
    switch (p.type) {
      case "String":
        return p.value;
      case "Bool":
      case "Int64":
      case "Double":
        return String(p.value);
      default:
        return defaultValue;
    }
  }

  /**
   * Referenced object while it is alive; the default once it was released.
   */
  asObject(defaultValue: Identifiable | null = null): Identifiable | null {
    const p = this.payload;
    if (p.type !== "Object" || !isInstanceAlive(p.value.id)) {
      return defaultValue;
    }
    return p.value.ref;
  }

  /**
   * Tag-first equality: differing tags are never equal.
   */
  equals(other: Variant): boolean {
    const a = this.payload;
    const b = other.payload;
    switch (a.type) {
      case "Null":
        return b.type === "Null";
      case "Bool":
        return b.type === "Bool" && a.value === b.value;
      case "Int64":
        return b.type === "Int64" && a.value === b.value;
      case "Double":
        return b.type === "Double" && a.value === b.value;
      case "String":
        return b.type === "String" && a.value === b.value;
      case "Object":
        return b.type === "Object" && sameInstance(a.value.id, b.value.id);
    }
  }

  /**
   * Tag-first ordering. Returns undefined when the pair is unordered
   * (differing tags, Null, Object, or NaN).
   */
  compare(other: Variant): number | undefined {
    const a = this.payload;
    const b = other.payload;
    if (a.type === "Bool" && b.type === "Bool") {
      return orderOf(Number(a.value), Number(b.value));
    }
    if (a.type === "Int64" && b.type === "Int64") {
      return orderOf(a.value, b.value);
    }
    if (a.type === "Double" && b.type === "Double") {
      return orderOf(a.value, b.value);
    }
    if (a.type === "String" && b.type === "String") {
      return orderOf(a.value, b.value);
    }
    return undefined;
  }

  toString(): string {
    const p = this.payload;
    switch (p.type) {
      case "Null":
        return "null";
      case "Bool":
      case "Int64":
      case "Double":
        return String(p.value);
      case "String":
        return p.value;
      case "Object":
        return isInstanceAlive(p.value.id)
          ? `<object ${formatInstanceId(p.value.id)}>`
          : "<stale object>";
    }
  }
}

export const isVariantLike = (value: unknown): value is VariantLike =>
  value === null ||
  value === undefined ||
  value instanceof Variant ||
  typeof value === "boolean" ||
  typeof value === "number" ||
  typeof value === "bigint" ||
  typeof value === "string" ||
  isIdentifiable(value);
