/**
 * @trivec/core - three-component vector math
 *
 * ## Modules
 * - scalar: element kinds (f64, f32, fixed-width integers)
 * - cast: checked conversions into a kind
 * - vec3: pure vector functions over a kind
 * - tolerance: numeric context for approximate comparisons
 * - predicates: exact and tolerance-aware parallelism tests
 */

export {
  type NumericSource,
  type ScalarKind,
  type FloatKind,
  type ScalarKindName,
  isFloatKind,
  scalarKind,
  F64,
  F32,
  I8,
  I16,
  I32,
  U8,
  U16,
  U32,
  I64,
  U64,
} from './num/scalar.js';

export { type CastResult, cast, tryCast, castAll } from './num/cast.js';

export {
  NumericError,
  NumericCastError,
  UnknownKindError,
  KindMismatchError,
  InvalidToleranceError,
} from './num/errors.js';

export {
  type Vec3,
  type Tuple3,
  type Vec3Ops,
  vec3,
  ZERO3,
  X_AXIS,
  Y_AXIS,
  Z_AXIS,
  zero3,
  splat3,
  fromTuple3,
  isNumericSource,
  dot3,
  cross3,
  scale3,
  negate3,
  lengthSq3,
  length3,
  normalize3,
  vec3Ops,
  f64,
  f32,
} from './num/vec3.js';

export {
  type Tolerances,
  type NumericContext,
  type NumericContextOptions,
  DEFAULT_TOLERANCES,
  createNumericContext,
  isZero,
  eqLength,
  eq3,
  isUnit3,
  isOrthogonal3,
  normalize3Tol,
} from './num/tolerance.js';

export { areParallel3Robust, areParallel3 } from './num/predicates.js';
