/**
 * Result and invocation outcome types
 */

import type { Variant } from "@metareflect/variant";

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({ ok: true, value });

export const error = <T, E>(error: E): Result<T, E> => ({ ok: false, error });

/**
 * Why an invocation did not reach the native function.
 */
export type InvokeStatus =
  | "ArgumentCountMismatch" // fewer than the required or more than declared
  | "NullInstance" // instance method called without a receiver
  | "StaleInstance" // receiver was destroyed / released
  | "InstanceTypeMismatch" // receiver is not an instance of the declaring class
  | "NotReadable" // property has no getter
  | "NotWritable"; // property has no setter

export type InvokeFailure = {
  readonly status: InvokeStatus;
  readonly message: string;
};

export type InvokeResult = Result<Variant, InvokeFailure>;

export const invokeFailure = (
  status: InvokeStatus,
  message: string
): InvokeResult => error({ status, message });

/**
 * "OK" or the failure status, for callers that only branch on status.
 */
export const statusOf = (result: InvokeResult): "OK" | InvokeStatus =>
  result.ok ? "OK" : result.error.status;
