/**
 * Base classes of reflected objects.
 *
 * Every MetaObject holds a generation-stamped instance id. Releasing the id
 * (destroy / last unreference) makes every Variant and receiver that still
 * points at the object stale.
 */

import {
  allocateInstanceId,
  isInstanceAlive,
  releaseInstanceId,
  type Identifiable,
  type InstanceId,
} from "@metareflect/variant";
import {
  MANUAL_OBJECT_CLASS,
  OBJECT_CLASS,
  REFERENCED_OBJECT_CLASS,
} from "./names.js";
import {
  createReflectionClass,
  type ReflectionClass,
} from "./reflection-class.js";
import { constMethod, method } from "./reflection-method.js";
import { reflection, type ClassRegistry } from "./registry.js";

export abstract class MetaObject implements Identifiable {
  readonly instanceId: InstanceId = allocateInstanceId();

  isAlive(): boolean {
    return isInstanceAlive(this.instanceId);
  }

  getClass(registry: ClassRegistry = reflection): ReflectionClass | undefined {
    return registry.getClassOf(this.constructor);
  }

  getClassName(registry: ClassRegistry = reflection): string {
    return this.getClass(registry)?.name ?? "";
  }
}

/**
 * Object whose lifetime ends with an explicit destroy().
 */
export abstract class ManualObject extends MetaObject {
  /**
   * Release the instance id. Returns false when already destroyed.
   */
  destroy(): boolean {
    return releaseInstanceId(this.instanceId);
  }
}

/**
 * Reference-counted object. Created holding one reference.
 */
export abstract class ReferencedObject extends MetaObject {
  private referenceCount = 1;

  /**
   * Returns false once the object has been released.
   */
  reference(): boolean {
    if (!this.isAlive()) return false;
    this.referenceCount++;
    return true;
  }

  /**
   * Drop a reference; true when it was the last one and the object was released.
   */
  unreference(): boolean {
    if (!this.isAlive()) return false;
    this.referenceCount--;
    if (this.referenceCount > 0) return false;
    return releaseInstanceId(this.instanceId);
  }

  getReferenceCount(): number {
    return this.referenceCount;
  }
}

const buildBuiltinClasses = (): readonly ReflectionClass[] => {
  const object = createReflectionClass({
    name: OBJECT_CLASS,
    type: MetaObject,
    parent: undefined,
    factory: undefined,
    methods: [
      constMethod("IsAlive", MetaObject, MetaObject.prototype.isAlive, {
        returns: "Bool",
        parameters: [],
      }),
    ],
    properties: [],
  });

  const manual = createReflectionClass({
    name: MANUAL_OBJECT_CLASS,
    type: ManualObject,
    parent: object,
    factory: undefined,
    methods: [
      method("Destroy", ManualObject, ManualObject.prototype.destroy, {
        returns: "Bool",
        parameters: [],
      }),
    ],
    properties: [],
  });

  const referenced = createReflectionClass({
    name: REFERENCED_OBJECT_CLASS,
    type: ReferencedObject,
    parent: object,
    factory: undefined,
    methods: [
      method("Reference", ReferencedObject, ReferencedObject.prototype.reference, {
        returns: "Bool",
        parameters: [],
      }),
      method(
        "Unreference",
        ReferencedObject,
        ReferencedObject.prototype.unreference,
        { returns: "Bool", parameters: [] }
      ),
      constMethod(
        "GetReferenceCount",
        ReferencedObject,
        ReferencedObject.prototype.getReferenceCount,
        { returns: "Int32", parameters: [] }
      ),
    ],
    properties: [
      { name: "ReferenceCount", getter: "GetReferenceCount", setter: undefined },
    ],
  });

  return [object, manual, referenced];
};

let builtinClasses: readonly ReflectionClass[] | undefined;

/**
 * Register ::Meta::Object, ::Meta::ManualObject and ::Meta::ReferencedObject.
 * The descriptors are shared, so registering them twice is harmless.
 */
export const registerBuiltinClasses = (registry: ClassRegistry): void => {
  builtinClasses ??= buildBuiltinClasses();
  for (const descriptor of builtinClasses) {
    registry.register(descriptor);
  }
};

registerBuiltinClasses(reflection);
