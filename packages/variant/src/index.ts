/**
 * metareflect Variant - dynamic values and operator dispatch
 */

export {
  type VariantType,
  type VariantOperator,
  VARIANT_TYPES,
  VARIANT_OPERATORS,
  VARIANT_TYPE_ORDINAL,
  VARIANT_OPERATOR_ORDINAL,
  UNARY_OPERATORS,
  isVariantOperator,
} from "./variant-type.js";

export {
  type InstanceId,
  type Identifiable,
  allocateInstanceId,
  releaseInstanceId,
  isInstanceAlive,
  sameInstance,
  formatInstanceId,
  isIdentifiable,
} from "./instance-id.js";

export { Variant, type VariantLike, isVariantLike } from "./variant.js";

export {
  type Evaluator,
  canEvaluate,
  evaluate,
  listEvaluators,
} from "./operators.js";

export {
  type NativeKind,
  type ParameterKind,
  type NativeValue,
  type NativeArguments,
  NATIVE_KIND_TO_VARIANT_TYPE,
  fromVariant,
  toVariant,
} from "./native-kind.js";

export {
  type VariantErrorCode,
  VariantError,
  UnsupportedOperatorError,
  DivisionByZeroError,
} from "./errors.js";
