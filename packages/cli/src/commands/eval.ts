/**
 * eval command - evaluate a variant operator on literals
 */

import type { Result } from "@metareflect/reflection";
import {
  UNARY_OPERATORS,
  Variant,
  VariantError,
  evaluate,
} from "@metareflect/variant";
import { formatLiteral, parseLiteral, parseOperator } from "../literals.js";
import type { CommandFailure } from "../types.js";

export const evalOperator = (
  operatorText: string,
  operands: readonly string[]
): Result<string, CommandFailure> => {
  const [left, right, ...extra] = operands;
  if (left === undefined || extra.length > 0) {
    return {
      ok: false,
      error: { kind: "usage", message: "eval takes one or two operands" },
    };
  }

  const operator = parseOperator(operatorText, right === undefined);
  if (operator === undefined) {
    return {
      ok: false,
      error: { kind: "usage", message: `Unknown operator '${operatorText}'` },
    };
  }

  const unary = UNARY_OPERATORS.has(operator);
  if (unary !== (right === undefined)) {
    return {
      ok: false,
      error: {
        kind: "usage",
        message: `${operator} takes ${unary ? "one operand" : "two operands"}`,
      },
    };
  }

  try {
    const value = evaluate(
      operator,
      parseLiteral(left),
      right === undefined ? Variant.NULL : parseLiteral(right)
    );
    return { ok: true, value: formatLiteral(value) };
  } catch (error) {
    if (error instanceof VariantError) {
      return {
        ok: false,
        error: { kind: "invocation", message: `${error.code}: ${error.message}` },
      };
    }
    throw error;
  }
};
