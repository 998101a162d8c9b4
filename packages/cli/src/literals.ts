/**
 * Command-line literals: variant values and operator names
 */

import {
  Variant,
  isVariantOperator,
  type VariantOperator,
} from "@metareflect/variant";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.\d*|\.\d+|\d+(?=[eE]))([eE][+-]?\d+)?$/;

const stripQuotes = (text: string): string | undefined => {
  if (text.length < 2) return undefined;
  const first = text[0];
  if ((first === '"' || first === "'") && text.endsWith(first)) {
    return text.slice(1, -1);
  }
  return undefined;
};

/**
 * Parse a literal argument.
 *
 * `null`, `true` and `false` are keywords; integers become Int64, decimals
 * and `NaN`/`Infinity` become Double; anything else is a String. Surrounding
 * quotes force a String.
 */
export const parseLiteral = (text: string): Variant => {
  const quoted = stripQuotes(text);
  if (quoted !== undefined) {
    return Variant.string(quoted);
  }

  switch (text) {
    case "null":
      return Variant.NULL;
    case "true":
      return Variant.TRUE;
    case "false":
      return Variant.FALSE;
    case "NaN":
      return Variant.double(Number.NaN);
    case "Infinity":
    case "+Infinity":
      return Variant.double(Number.POSITIVE_INFINITY);
    case "-Infinity":
      return Variant.double(Number.NEGATIVE_INFINITY);
  }

  if (INTEGER_PATTERN.test(text)) {
    return Variant.int64(BigInt(text));
  }
  if (DECIMAL_PATTERN.test(text)) {
    return Variant.double(Number(text));
  }
  return Variant.string(text);
};

/**
 * Show a variant the way parseLiteral reads it back.
 */
export const formatLiteral = (value: Variant): string => {
  switch (value.getType()) {
    case "String":
      return JSON.stringify(value.asString());
    case "Double": {
      const text = value.toString();
      return /^-?\d+$/.test(text) ? `${text}.0` : text;
    }
    default:
      return value.toString();
  }
};

const BINARY_SYMBOLS: ReadonlyMap<string, VariantOperator> = new Map([
  ["==", "Equal"],
  ["!=", "NotEqual"],
  ["<", "Less"],
  ["<=", "LessEqual"],
  [">", "Greater"],
  [">=", "GreaterEqual"],
  ["+", "Add"],
  ["-", "Subtract"],
  ["*", "Multiply"],
  ["/", "Divide"],
  ["%", "Mod"],
  ["&&", "And"],
  ["||", "Or"],
  ["^^", "XOr"],
  ["&", "BitAnd"],
  ["|", "BitOr"],
  ["^", "BitXOr"],
  ["<<", "BitShiftLeft"],
  [">>", "BitShiftRight"],
]);

const UNARY_SYMBOLS: ReadonlyMap<string, VariantOperator> = new Map([
  ["-", "Negative"],
  ["+", "Positive"],
  ["!", "Not"],
  ["~", "BitFlip"],
]);

/**
 * Resolve an operator given by name (`Add`) or symbol (`+`).
 * `-` and `+` mean Negative / Positive when there is a single operand.
 */
export const parseOperator = (
  text: string,
  unary: boolean
): VariantOperator | undefined => {
  if (isVariantOperator(text)) {
    return text;
  }
  if (unary) {
    return UNARY_SYMBOLS.get(text) ?? BINARY_SYMBOLS.get(text);
  }
  return BINARY_SYMBOLS.get(text) ?? UNARY_SYMBOLS.get(text);
};
