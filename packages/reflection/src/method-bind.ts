/**
 * MethodBind - type-erased wrapper around a native function.
 *
 * A bind is created once from a native function and its declared signature.
 * At that point the function's TypeScript type is checked against the
 * declared kinds; afterwards the bind only sees Variants. Invocation converts
 * each Variant to the declared kind, calls the function and wraps the return
 * value back into a Variant.
 */

import {
  NATIVE_KIND_TO_VARIANT_TYPE,
  Variant,
  fromVariant,
  isInstanceAlive,
  toVariant,
  type NativeArguments,
  type NativeKind,
  type NativeValue,
  type ParameterKind,
  type VariantType,
} from "@metareflect/variant";
import type { MetaObject } from "./object.js";
import { invokeFailure, ok, type InvokeResult } from "./types/result.js";

/**
 * Constructor of a reflected class (abstract classes included).
 */
export type ClassType<T extends MetaObject = MetaObject> = abstract new (
  ...args: never[]
) => T;

/**
 * Declared signature of a native function.
 */
export type MethodSignature<
  P extends readonly ParameterKind[],
  R extends NativeKind,
> = {
  readonly returns: R;
  readonly parameters: P;
};

export type MethodBind = {
  readonly isStatic: () => boolean;
  readonly isConst: () => boolean;
  readonly getReturnKind: () => NativeKind;
  readonly getReturnType: () => VariantType;
  readonly getArgumentCount: () => number;
  readonly getArgumentKind: (index: number) => ParameterKind | undefined;
  readonly getArgumentType: (index: number) => VariantType | undefined;
  /**
   * Class whose instances the bind accepts as receiver; undefined for static binds.
   */
  readonly getDeclaringType: () => ClassType | undefined;
  /**
   * Call the native function.
   *
   * `defaults` line up with the trailing parameters; `args` may omit as many
   * trailing arguments as there are defaults. The receiver is ignored by
   * static binds. Errors thrown by the native function propagate.
   */
  readonly invoke: (
    receiver: MetaObject | null | undefined,
    args: readonly Variant[],
    defaults?: readonly Variant[]
  ) => InvokeResult;
};

type ErasedFunction = CallableFunction;

type BindShape = {
  readonly fn: ErasedFunction;
  readonly returns: NativeKind;
  readonly parameters: readonly ParameterKind[];
  readonly declaringType: ClassType | undefined;
  readonly isConst: boolean;
};

const describeArity = (required: number, count: number): string =>
  required === count ? `${count}` : `${required} to ${count}`;

/**
 * Build a bind from an already type-checked function.
 */
export const createMethodBind = (shape: BindShape): MethodBind => {
  const { fn, returns, parameters, declaringType } = shape;
  const isStatic = declaringType === undefined;
  const count = parameters.length;

  const checkReceiver = (
    receiver: MetaObject | null | undefined
  ): InvokeResult | undefined => {
    if (receiver === null || receiver === undefined) {
      return invokeFailure("NullInstance", "Instance method called without a receiver");
    }
    if (!isInstanceAlive(receiver.instanceId)) {
      return invokeFailure("StaleInstance", "Receiver has been released");
    }
    if (declaringType !== undefined && !(receiver instanceof declaringType)) {
      return invokeFailure(
        "InstanceTypeMismatch",
        `Receiver is not an instance of ${declaringType.name}`
      );
    }
    return undefined;
  };

  const invoke = (
    receiver: MetaObject | null | undefined,
    args: readonly Variant[],
    defaults: readonly Variant[] = []
  ): InvokeResult => {
    const required = Math.max(0, count - defaults.length);
    if (args.length < required || args.length > count) {
      return invokeFailure(
        "ArgumentCountMismatch",
        `Expected ${describeArity(required, count)} arguments, got ${args.length}`
      );
    }

    if (!isStatic) {
      const failure = checkReceiver(receiver);
      if (failure) return failure;
    }

    // defaults[j] belongs to parameter count - defaults.length + j
    const firstDefault = count - defaults.length;
    const nativeArgs = parameters.map((kind, index) =>
      fromVariant(
        kind,
        args[index] ?? defaults[index - firstDefault] ?? Variant.NULL
      )
    );

    const result: unknown = Reflect.apply(
      fn,
      isStatic ? undefined : receiver,
      nativeArgs
    );
    return ok(toVariant(returns, result));
  };

  return {
    isStatic: () => isStatic,
    isConst: () => shape.isConst,
    getReturnKind: () => returns,
    getReturnType: () => NATIVE_KIND_TO_VARIANT_TYPE[returns],
    getArgumentCount: () => count,
    getArgumentKind: (index) => parameters[index],
    getArgumentType: (index) => {
      const kind = parameters[index];
      return kind === undefined ? undefined : NATIVE_KIND_TO_VARIANT_TYPE[kind];
    },
    getDeclaringType: () => declaringType,
    invoke,
  };
};

/**
 * Bind a free or static function. The receiver is ignored on invoke.
 */
export const bindStatic = <
  const P extends readonly ParameterKind[],
  R extends NativeKind,
>(
  fn: (...args: NativeArguments<P>) => NativeValue<R>,
  signature: MethodSignature<P, R>
): MethodBind =>
  createMethodBind({
    fn,
    returns: signature.returns,
    parameters: signature.parameters,
    declaringType: undefined,
    isConst: false,
  });

/**
 * Bind an instance method that may mutate its receiver.
 */
export const bindMethod = <
  T extends MetaObject,
  const P extends readonly ParameterKind[],
  R extends NativeKind,
>(
  type: ClassType<T>,
  fn: (this: T, ...args: NativeArguments<P>) => NativeValue<R>,
  signature: MethodSignature<P, R>
): MethodBind =>
  createMethodBind({
    fn,
    returns: signature.returns,
    parameters: signature.parameters,
    declaringType: type,
    isConst: false,
  });

/**
 * Bind an instance method that only reads its receiver.
 * Const binds cannot serve as property setters.
 */
export const bindConstMethod = <
  T extends MetaObject,
  const P extends readonly ParameterKind[],
  R extends NativeKind,
>(
  type: ClassType<T>,
  fn: (this: Readonly<T>, ...args: NativeArguments<P>) => NativeValue<R>,
  signature: MethodSignature<P, R>
): MethodBind =>
  createMethodBind({
    fn,
    returns: signature.returns,
    parameters: signature.parameters,
    declaringType: type,
    isConst: true,
  });
