/**
 * Names of the built-in classes
 */

export const OBJECT_CLASS = "::Meta::Object";
export const MANUAL_OBJECT_CLASS = "::Meta::ManualObject";
export const REFERENCED_OBJECT_CLASS = "::Meta::ReferencedObject";
