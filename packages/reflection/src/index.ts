/**
 * @metareflect/reflection - runtime class registry and method invocation
 */

export * from "./errors.js";
export * from "./types/result.js";
export * from "./names.js";
export * from "./method-bind.js";
export * from "./reflection-method.js";
export * from "./reflection-property.js";
export * from "./reflection-class.js";
export * from "./registry.js";
export * from "./define-class.js";
export * from "./object.js";
