/**
 * Declarative class registration
 */

import { UnknownParentClassError } from "./errors.js";
import type { ClassType } from "./method-bind.js";
import { OBJECT_CLASS } from "./names.js";
import type { MetaObject } from "./object.js";
import {
  createReflectionClass,
  type ReflectionClass,
} from "./reflection-class.js";
import type { ReflectionMethod } from "./reflection-method.js";
import type { PropertyDeclaration } from "./reflection-property.js";
import { reflection, type ClassRegistry } from "./registry.js";

export type ClassDefinition<T extends MetaObject> = {
  readonly name: string;
  readonly type: ClassType<T>;
  /**
   * Registered parent class name; defaults to ::Meta::Object.
   */
  readonly parent?: string;
  /**
   * Makes the class instantiatable.
   */
  readonly factory?: () => T;
  readonly methods?: readonly ReflectionMethod[];
  readonly properties?: readonly PropertyDeclaration[];
};

/**
 * Build a class descriptor and register it.
 *
 * @example
 * defineClass({
 *   name: "::Counter",
 *   type: Counter,
 *   parent: "::Meta::ManualObject",
 *   factory: () => new Counter(),
 *   methods: [
 *     constMethod("Get", Counter, Counter.prototype.get, { returns: "Int32", parameters: [] }),
 *   ],
 *   properties: [property("Value", "Get")],
 * });
 */
export const defineClass = <T extends MetaObject>(
  definition: ClassDefinition<T>,
  registry: ClassRegistry = reflection
): ReflectionClass => {
  const { name } = definition;
  const parentName =
    definition.parent ?? (name === OBJECT_CLASS ? undefined : OBJECT_CLASS);

  let parent: ReflectionClass | undefined;
  if (parentName !== undefined) {
    parent = registry.getClass(parentName);
    if (parent === undefined) {
      throw new UnknownParentClassError(name, parentName);
    }
  }

  const descriptor = createReflectionClass({
    name,
    type: definition.type,
    parent,
    factory: definition.factory,
    methods: definition.methods ?? [],
    properties: definition.properties ?? [],
  });
  registry.register(descriptor);
  return descriptor;
};
