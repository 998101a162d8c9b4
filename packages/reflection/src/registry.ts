/**
 * ClassRegistry - name-indexed table of class descriptors.
 *
 * Classes are registered during startup, then the registry is sealed and
 * only read from.
 */

import { DuplicateClassError, RegistrySealedError } from "./errors.js";
import type { ReflectionClass } from "./reflection-class.js";

export type ClassRegistryOptions = {
  readonly verbose?: boolean;
  /**
   * Sink for verbose output; console.log when omitted.
   */
  readonly log?: (message: string) => void;
};

export type ClassRegistry = {
  /**
   * Add a descriptor. Registering the same descriptor again is a no-op.
   */
  readonly register: (descriptor: ReflectionClass) => void;
  readonly getClass: (name: string) => ReflectionClass | undefined;
  readonly isClassExists: (name: string) => boolean;
  readonly getClassNames: () => readonly string[];
  readonly getClasses: () => readonly ReflectionClass[];
  /**
   * Descriptor of a constructor, or of its nearest registered base class.
   */
  readonly getClassOf: (type: object) => ReflectionClass | undefined;
  readonly seal: () => void;
  readonly isSealed: () => boolean;
};

export const createClassRegistry = (
  options: ClassRegistryOptions = {}
): ClassRegistry => {
  const verbose = options.verbose ?? false;
  const log = options.log ?? ((message: string) => console.log(message));
  const byName = new Map<string, ReflectionClass>();
  const byType = new Map<unknown, ReflectionClass>();
  let sealed = false;

  const register = (descriptor: ReflectionClass): void => {
    const existing = byName.get(descriptor.name);
    if (existing === descriptor) return;
    if (sealed) {
      throw new RegistrySealedError(descriptor.name);
    }
    if (existing !== undefined) {
      throw new DuplicateClassError(descriptor.name);
    }

    byName.set(descriptor.name, descriptor);
    byType.set(descriptor.type, descriptor);

    if (verbose) {
      const parent = descriptor.parent?.name ?? "none";
      log(
        `[Reflection] registered ${descriptor.name} (parent ${parent}, ` +
          `${descriptor.getMethods().length} methods, ` +
          `${descriptor.getProperties().length} properties)`
      );
    }
  };

  const getClassOf = (type: object): ReflectionClass | undefined => {
    let current: unknown = type;
    while (typeof current === "function") {
      const found = byType.get(current);
      if (found) return found;
      current = Object.getPrototypeOf(current);
    }
    return undefined;
  };

  const getClassNames = (): readonly string[] => [...byName.keys()].sort();

  return {
    register,
    getClass: (name) => byName.get(name),
    isClassExists: (name) => byName.has(name),
    getClassNames,
    getClasses: () =>
      getClassNames().flatMap((name) => {
        const descriptor = byName.get(name);
        return descriptor ? [descriptor] : [];
      }),
    getClassOf,
    seal: () => {
      if (!sealed && verbose) {
        log(`[Reflection] sealed with ${byName.size} classes`);
      }
      sealed = true;
    },
    isSealed: () => sealed,
  };
};

/**
 * Process-wide registry used when none is passed explicitly.
 */
export const reflection: ClassRegistry = createClassRegistry({
  verbose: process.env.METAREFLECT_DEBUG === "1",
});
