/**
 * ReflectionProperty - named pair of getter/setter methods.
 */

import {
  NATIVE_KIND_TO_VARIANT_TYPE,
  Variant,
  type NativeKind,
  type VariantLike,
  type VariantType,
} from "@metareflect/variant";
import { InvalidPropertyError } from "./errors.js";
import type { MetaObject } from "./object.js";
import type { ReflectionMethod } from "./reflection-method.js";
import { invokeFailure, type InvokeResult } from "./types/result.js";

/**
 * Property as declared on a class: accessor names, resolved at registration.
 */
export type PropertyDeclaration = {
  readonly name: string;
  readonly getter: string | undefined;
  readonly setter: string | undefined;
};

export type ReflectionProperty = {
  readonly name: string;
  readonly getter: ReflectionMethod | undefined;
  readonly setter: ReflectionMethod | undefined;
  readonly getKind: () => NativeKind;
  readonly getType: () => VariantType;
  readonly isReadable: () => boolean;
  readonly isWritable: () => boolean;
  readonly get: (receiver: MetaObject | null | undefined) => InvokeResult;
  readonly set: (
    receiver: MetaObject | null | undefined,
    value: VariantLike
  ) => InvokeResult;
};

export const property = (
  name: string,
  getter?: string,
  setter?: string
): PropertyDeclaration => ({ name, getter, setter });

const validateGetter = (name: string, getter: ReflectionMethod): void => {
  if (getter.bind.getArgumentCount() !== 0) {
    throw new InvalidPropertyError(
      name,
      `getter '${getter.name}' must take no arguments`
    );
  }
  if (getter.bind.getReturnKind() === "Void") {
    throw new InvalidPropertyError(
      name,
      `getter '${getter.name}' must return a value`
    );
  }
};

const validateSetter = (name: string, setter: ReflectionMethod): void => {
  if (setter.bind.isStatic()) {
    throw new InvalidPropertyError(
      name,
      `setter '${setter.name}' must be an instance method`
    );
  }
  if (setter.bind.isConst()) {
    throw new InvalidPropertyError(
      name,
      `setter '${setter.name}' must not be const`
    );
  }
  if (setter.bind.getArgumentCount() !== 1) {
    throw new InvalidPropertyError(
      name,
      `setter '${setter.name}' must take exactly one argument`
    );
  }
};

/**
 * Build a property from resolved accessors.
 * At least one accessor is required; with both, their kinds must agree.
 */
export const createReflectionProperty = (
  name: string,
  getter: ReflectionMethod | undefined,
  setter: ReflectionMethod | undefined
): ReflectionProperty => {
  if (getter === undefined && setter === undefined) {
    throw new InvalidPropertyError(name, "needs a getter or a setter");
  }
  if (getter) validateGetter(name, getter);
  if (setter) validateSetter(name, setter);

  const setterKind = setter?.bind.getArgumentKind(0);
  const getterKind = getter?.bind.getReturnKind();
  if (
    getterKind !== undefined &&
    setterKind !== undefined &&
    getterKind !== setterKind
  ) {
    throw new InvalidPropertyError(
      name,
      `getter returns ${getterKind} but setter takes ${setterKind}`
    );
  }

  const kind: NativeKind = getterKind ?? setterKind ?? "Variant";

  return {
    name,
    getter,
    setter,
    getKind: () => kind,
    getType: () => NATIVE_KIND_TO_VARIANT_TYPE[kind],
    isReadable: () => getter !== undefined,
    isWritable: () => setter !== undefined,
    get: (receiver) =>
      getter
        ? getter.invoke(receiver)
        : invokeFailure("NotReadable", `Property '${name}' has no getter`),
    set: (receiver, value) =>
      setter
        ? setter.invoke(receiver, [Variant.from(value)])
        : invokeFailure("NotWritable", `Property '${name}' has no setter`),
  };
};
