/**
 * ReflectionMethod - a named method of a reflected class.
 *
 * Pairs a MethodBind with parameter names and the defaults declared for the
 * trailing parameters.
 */

import {
  NATIVE_KIND_TO_VARIANT_TYPE,
  Variant,
  type NativeKind,
  type NativeValue,
  type ParameterKind,
  type VariantLike,
  type VariantType,
} from "@metareflect/variant";
import { InvalidMethodError } from "./errors.js";
import { createMethodBind, type ClassType, type MethodBind } from "./method-bind.js";
import type { MetaObject } from "./object.js";
import type { InvokeResult } from "./types/result.js";

export type ParameterDeclaration<K extends ParameterKind = ParameterKind> = {
  readonly name: string;
  readonly kind: K;
  readonly defaultValue?: VariantLike;
};

/**
 * Native argument tuple for a list of parameter declarations.
 */
export type DeclaredArguments<P extends readonly ParameterDeclaration[]> = {
  -readonly [I in keyof P]: P[I] extends ParameterDeclaration<infer K>
    ? NativeValue<K>
    : never;
};

export type MethodDeclaration<
  P extends readonly ParameterDeclaration[],
  R extends NativeKind,
> = {
  readonly returns: R;
  readonly parameters: P;
};

export type ReflectionParameter = {
  readonly name: string;
  readonly kind: ParameterKind;
  readonly type: VariantType;
  readonly defaultValue: Variant | undefined;
};

export type ReflectionMethod = {
  readonly name: string;
  readonly bind: MethodBind;
  readonly getParameters: () => readonly ReflectionParameter[];
  readonly getDefaults: () => readonly Variant[];
  /**
   * Arguments that must be supplied; the rest have defaults.
   */
  readonly getMinArgumentCount: () => number;
  readonly invoke: (
    receiver: MetaObject | null | undefined,
    args?: readonly VariantLike[]
  ) => InvokeResult;
  /**
   * e.g. `static SetStatic(value: Int32 = 114): Void`
   */
  readonly toSignatureString: () => string;
};

/**
 * Declare a parameter. A default makes it optional; only a trailing run of
 * parameters may have defaults.
 */
export const param = <K extends ParameterKind>(
  name: string,
  kind: K,
  defaultValue?: VariantLike
): ParameterDeclaration<K> =>
  defaultValue === undefined ? { name, kind } : { name, kind, defaultValue };

const formatDefault = (value: Variant): string =>
  value.getType() === "String" ? JSON.stringify(value.asString()) : value.toString();

/**
 * Wrap a bind under a name with its parameter names and defaults.
 */
export const createReflectionMethod = (
  name: string,
  bind: MethodBind,
  parameters: readonly {
    readonly name: string;
    readonly defaultValue?: VariantLike;
  }[]
): ReflectionMethod => {
  if (parameters.length !== bind.getArgumentCount()) {
    throw new InvalidMethodError(
      name,
      `${parameters.length} parameter names for ${bind.getArgumentCount()} arguments`
    );
  }

  const defaults: Variant[] = [];
  const described: ReflectionParameter[] = [];
  parameters.forEach((p, index) => {
    const defaultValue =
      p.defaultValue === undefined ? undefined : Variant.from(p.defaultValue);
    if (defaultValue !== undefined) {
      defaults.push(defaultValue);
    } else if (defaults.length > 0) {
      throw new InvalidMethodError(
        name,
        `parameter '${p.name}' has no default but follows a defaulted parameter`
      );
    }
    const kind = bind.getArgumentKind(index) ?? "Variant";
    described.push({
      name: p.name,
      kind,
      type: NATIVE_KIND_TO_VARIANT_TYPE[kind],
      defaultValue,
    });
  });

  const minArgumentCount = parameters.length - defaults.length;

  const toSignatureString = (): string => {
    const params = described
      .map((p) =>
        p.defaultValue === undefined
          ? `${p.name}: ${p.kind}`
          : `${p.name}: ${p.kind} = ${formatDefault(p.defaultValue)}`
      )
      .join(", ");
    const prefix = bind.isStatic() ? "static " : "";
    const suffix = bind.isConst() ? " const" : "";
    return `${prefix}${name}(${params}): ${bind.getReturnKind()}${suffix}`;
  };

  return {
    name,
    bind,
    getParameters: () => described,
    getDefaults: () => defaults,
    getMinArgumentCount: () => minArgumentCount,
    invoke: (receiver, args = []) =>
      bind.invoke(receiver, args.map(Variant.from), defaults),
    toSignatureString,
  };
};

/**
 * Declare a static method.
 */
export const staticMethod = <
  const P extends readonly ParameterDeclaration[],
  R extends NativeKind,
>(
  name: string,
  fn: (...args: DeclaredArguments<P>) => NativeValue<R>,
  declaration: MethodDeclaration<P, R>
): ReflectionMethod =>
  createReflectionMethod(
    name,
    createMethodBind({
      fn,
      returns: declaration.returns,
      parameters: declaration.parameters.map((p) => p.kind),
      declaringType: undefined,
      isConst: false,
    }),
    declaration.parameters
  );

/**
 * Declare an instance method that may mutate its receiver.
 */
export const method = <
  T extends MetaObject,
  const P extends readonly ParameterDeclaration[],
  R extends NativeKind,
>(
  name: string,
  type: ClassType<T>,
  fn: (this: T, ...args: DeclaredArguments<P>) => NativeValue<R>,
  declaration: MethodDeclaration<P, R>
): ReflectionMethod =>
  createReflectionMethod(
    name,
    createMethodBind({
      fn,
      returns: declaration.returns,
      parameters: declaration.parameters.map((p) => p.kind),
      declaringType: type,
      isConst: false,
    }),
    declaration.parameters
  );

/**
 * Declare an instance method that only reads its receiver.
 */
export const constMethod = <
  T extends MetaObject,
  const P extends readonly ParameterDeclaration[],
  R extends NativeKind,
>(
  name: string,
  type: ClassType<T>,
  fn: (this: Readonly<T>, ...args: DeclaredArguments<P>) => NativeValue<R>,
  declaration: MethodDeclaration<P, R>
): ReflectionMethod =>
  createReflectionMethod(
    name,
    createMethodBind({
      fn,
      returns: declaration.returns,
      parameters: declaration.parameters.map((p) => p.kind),
      declaringType: type,
      isConst: true,
    }),
    declaration.parameters
  );
