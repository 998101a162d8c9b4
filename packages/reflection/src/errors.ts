/**
 * Reflection errors.
 *
 * These signal programming errors in class declarations and registration;
 * they are thrown rather than returned. Recoverable conditions (lookups,
 * invocation failures) never use them.
 */

export type ReflectionErrorCode =
  | "MRF1001" // Class name already registered
  | "MRF1002" // Registration after the registry was sealed
  | "MRF1003" // Parent class not registered
  | "MRF1004" // Method or property name declared twice in a class
  | "MRF1005" // Invalid method declaration (defaults, parameter names)
  | "MRF1006" // Invalid property declaration
  | "MRF1007"; // Property names a method the class does not have

export class ReflectionError extends Error {
  readonly code: ReflectionErrorCode;

  constructor(code: ReflectionErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = "ReflectionError";
    this.code = code;
  }
}

export class DuplicateClassError extends ReflectionError {
  readonly className: string;

  constructor(className: string) {
    super("MRF1001", `Class '${className}' is already registered`);
    this.name = "DuplicateClassError";
    this.className = className;
  }
}

export class RegistrySealedError extends ReflectionError {
  constructor(className: string) {
    super(
      "MRF1002",
      `Cannot register '${className}': registration phase is over`
    );
    this.name = "RegistrySealedError";
  }
}

export class UnknownParentClassError extends ReflectionError {
  constructor(className: string, parentName: string) {
    super(
      "MRF1003",
      `Parent class '${parentName}' of '${className}' is not registered`
    );
    this.name = "UnknownParentClassError";
  }
}

export class DuplicateMemberError extends ReflectionError {
  constructor(className: string, memberName: string) {
    super("MRF1004", `'${memberName}' is declared twice in '${className}'`);
    this.name = "DuplicateMemberError";
  }
}

export class InvalidMethodError extends ReflectionError {
  constructor(methodName: string, reason: string) {
    super("MRF1005", `Invalid method '${methodName}': ${reason}`);
    this.name = "InvalidMethodError";
  }
}

export class InvalidPropertyError extends ReflectionError {
  constructor(propertyName: string, reason: string) {
    super("MRF1006", `Invalid property '${propertyName}': ${reason}`);
    this.name = "InvalidPropertyError";
  }
}

export class UnknownMethodError extends ReflectionError {
  constructor(className: string, methodName: string) {
    super("MRF1007", `Class '${className}' has no method '${methodName}'`);
    this.name = "UnknownMethodError";
  }
}
