/**
 * ReflectionClass - runtime descriptor of a registered class.
 */

import { DuplicateMemberError, UnknownMethodError } from "./errors.js";
import type { ClassType } from "./method-bind.js";
import type { MetaObject } from "./object.js";
import type { ReflectionMethod } from "./reflection-method.js";
import {
  createReflectionProperty,
  type PropertyDeclaration,
  type ReflectionProperty,
} from "./reflection-property.js";

export type ReflectionClass = {
  readonly name: string;
  readonly parent: ReflectionClass | undefined;
  readonly type: ClassType;
  readonly isInstantiatable: () => boolean;
  /**
   * Own method by name.
   */
  readonly getMethod: (name: string) => ReflectionMethod | undefined;
  /**
   * Own method, else the nearest ancestor's.
   */
  readonly findMethod: (name: string) => ReflectionMethod | undefined;
  readonly getMethods: () => readonly ReflectionMethod[];
  readonly getProperty: (name: string) => ReflectionProperty | undefined;
  readonly findProperty: (name: string) => ReflectionProperty | undefined;
  readonly getProperties: () => readonly ReflectionProperty[];
  readonly isParentOf: (other: ReflectionClass) => boolean;
  readonly isChildOf: (other: ReflectionClass) => boolean;
  /**
   * New instance from the factory; undefined when not instantiatable.
   */
  readonly instantiate: () => MetaObject | undefined;
};

export type ClassShape = {
  readonly name: string;
  readonly type: ClassType;
  readonly parent: ReflectionClass | undefined;
  readonly factory: (() => MetaObject) | undefined;
  readonly methods: readonly ReflectionMethod[];
  readonly properties: readonly PropertyDeclaration[];
};

const byName = <T extends { readonly name: string }>(a: T, b: T): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

const indexByName = <T extends { readonly name: string }>(
  className: string,
  members: readonly T[]
): ReadonlyMap<string, T> => {
  const index = new Map<string, T>();
  for (const member of [...members].sort(byName)) {
    if (index.has(member.name)) {
      throw new DuplicateMemberError(className, member.name);
    }
    index.set(member.name, member);
  }
  return index;
};

const isStrictAncestor = (
  ancestor: ReflectionClass,
  descendant: ReflectionClass
): boolean => {
  for (let c = descendant.parent; c !== undefined; c = c.parent) {
    if (c === ancestor) return true;
  }
  return false;
};

export const createReflectionClass = (shape: ClassShape): ReflectionClass => {
  const { name, type, parent, factory } = shape;
  const methods = indexByName(name, shape.methods);

  const findMethod = (methodName: string): ReflectionMethod | undefined =>
    methods.get(methodName) ?? parent?.findMethod(methodName);

  const resolveAccessor = (
    accessor: string | undefined
  ): ReflectionMethod | undefined => {
    if (accessor === undefined) return undefined;
    const found = findMethod(accessor);
    if (found === undefined) {
      throw new UnknownMethodError(name, accessor);
    }
    return found;
  };

  const properties = indexByName(
    name,
    shape.properties.map((declaration) =>
      createReflectionProperty(
        declaration.name,
        resolveAccessor(declaration.getter),
        resolveAccessor(declaration.setter)
      )
    )
  );

  const methodList = [...methods.values()];
  const propertyList = [...properties.values()];

  const descriptor: ReflectionClass = {
    name,
    parent,
    type,
    isInstantiatable: () => factory !== undefined,
    getMethod: (methodName) => methods.get(methodName),
    findMethod,
    getMethods: () => methodList,
    getProperty: (propertyName) => properties.get(propertyName),
    findProperty: (propertyName) =>
      properties.get(propertyName) ?? parent?.findProperty(propertyName),
    getProperties: () => propertyList,
    isParentOf: (other) => isStrictAncestor(descriptor, other),
    isChildOf: (other) => isStrictAncestor(other, descriptor),
    instantiate: () => factory?.(),
  };
  return descriptor;
};
