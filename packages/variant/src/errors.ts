/**
 * Errors raised by Variant evaluation
 */

import type { VariantOperator, VariantType } from "./variant-type.js";

export type VariantErrorCode =
  | "MRV2001" // No evaluator for (operator, left type, right type)
  | "MRV2002"; // Integer division or modulo by zero

export class VariantError extends Error {
  readonly code: VariantErrorCode;

  constructor(code: VariantErrorCode, message: string) {
    super(message);
    this.name = "VariantError";
    this.code = code;
  }
}

export class UnsupportedOperatorError extends VariantError {
  readonly operator: VariantOperator;
  readonly left: VariantType;
  readonly right: VariantType;

  constructor(operator: VariantOperator, left: VariantType, right: VariantType) {
    super(
      "MRV2001",
      `Cannot evaluate ${operator} on ${left} and ${right}`
    );
    this.name = "UnsupportedOperatorError";
    this.operator = operator;
    this.left = left;
    this.right = right;
  }
}

export class DivisionByZeroError extends VariantError {
  constructor(operator: VariantOperator) {
    super("MRV2002", `Integer ${operator} by zero`);
    this.name = "DivisionByZeroError";
  }
}
