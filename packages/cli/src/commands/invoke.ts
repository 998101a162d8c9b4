/**
 * invoke command - call a method with literal arguments
 */

import type {
  ClassRegistry,
  MetaObject,
  Result,
} from "@metareflect/reflection";
import { releaseInstanceId } from "@metareflect/variant";
import { formatLiteral, parseLiteral } from "../literals.js";
import type { CommandFailure } from "../types.js";

const failure = (
  kind: CommandFailure["kind"],
  message: string
): Result<string, CommandFailure> => ({ ok: false, error: { kind, message } });

/**
 * Static methods are called without a receiver; instance methods on a
 * fresh instance, which the class must be able to create. The instance is
 * released after the call.
 */
export const invokeMethod = (
  registry: ClassRegistry,
  className: string,
  methodName: string,
  rawArgs: readonly string[]
): Result<string, CommandFailure> => {
  const descriptor = registry.getClass(className);
  if (descriptor === undefined) {
    return failure("lookup", `Unknown class '${className}'`);
  }
  const method = descriptor.findMethod(methodName);
  if (method === undefined) {
    return failure(
      "lookup",
      `Class '${className}' has no method '${methodName}'`
    );
  }

  let receiver: MetaObject | undefined;
  if (!method.bind.isStatic()) {
    receiver = descriptor.instantiate();
    if (receiver === undefined) {
      return failure(
        "invocation",
        `'${methodName}' is an instance method and '${className}' is not instantiatable`
      );
    }
  }

  try {
    const result = method.invoke(receiver, rawArgs.map(parseLiteral));
    if (!result.ok) {
      return failure(
        "invocation",
        `${result.error.status}: ${result.error.message}`
      );
    }
    return { ok: true, value: formatLiteral(result.value) };
  } catch (error) {
    return failure(
      "invocation",
      `${methodName} threw: ${error instanceof Error ? error.message : String(error)}`
    );
  } finally {
    if (receiver !== undefined) {
      releaseInstanceId(receiver.instanceId);
    }
  }
};
