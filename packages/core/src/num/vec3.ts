/**
 * 3D vector operations
 *
 * Vectors are plain immutable records `{ x, y, z }` over an element kind.
 * All operations are pure functions that take the kind first; arithmetic
 * runs in that kind (so an F32 vector rounds after every step).
 */

import type { FloatKind, NumericSource, ScalarKind } from './scalar.js';
import { F32, F64 } from './scalar.js';

export type Vec3<T = number> = Readonly<{ x: T; y: T; z: T }>;

export type Tuple3 = readonly [NumericSource, NumericSource, NumericSource];

/**
 * Create an f64 vector from numbers (no cast)
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

/**
 * Zero vector
 */
export const ZERO3: Vec3 = vec3(0, 0, 0);

/**
 * Unit vectors along axes
 */
export const X_AXIS: Vec3 = vec3(1, 0, 0);
export const Y_AXIS: Vec3 = vec3(0, 1, 0);
export const Z_AXIS: Vec3 = vec3(0, 0, 1);

/**
 * Vector with every component set to the kind's zero
 */
export function zero3<T>(kind: ScalarKind<T>): Vec3<T> {
  return { x: kind.zero, y: kind.zero, z: kind.zero };
}

/**
 * Broadcast one scalar to all three components
 */
export function splat3<T>(kind: ScalarKind<T>, value: NumericSource): Vec3<T> {
  const v = kind.cast(value);
  return { x: v, y: v, z: v };
}

/**
 * Build from a triple, casting each component independently
 */
export function fromTuple3<T>(kind: ScalarKind<T>, [a, b, c]: Tuple3): Vec3<T> {
  return { x: kind.cast(a), y: kind.cast(b), z: kind.cast(c) };
}

/**
 * Dot product: a · b
 */
export function dot3<T>(kind: FloatKind<T>, a: Vec3<T>, b: Vec3<T>): T {
  return kind.add(kind.add(kind.mul(a.x, b.x), kind.mul(a.y, b.y)), kind.mul(a.z, b.z));
}

/**
 * Cross product: a × b
 */
export function cross3<T>(kind: FloatKind<T>, a: Vec3<T>, b: Vec3<T>): Vec3<T> {
  return {
    x: kind.sub(kind.mul(a.y, b.z), kind.mul(a.z, b.y)),
    y: kind.sub(kind.mul(a.z, b.x), kind.mul(a.x, b.z)),
    z: kind.sub(kind.mul(a.x, b.y), kind.mul(a.y, b.x)),
  };
}

/**
 * Multiply vector by scalar: v * s
 */
export function scale3<T>(kind: FloatKind<T>, v: Vec3<T>, s: T): Vec3<T> {
  return { x: kind.mul(v.x, s), y: kind.mul(v.y, s), z: kind.mul(v.z, s) };
}

/**
 * Negate every component (exact)
 */
export function negate3<T>(kind: FloatKind<T>, v: Vec3<T>): Vec3<T> {
  return { x: kind.neg(v.x), y: kind.neg(v.y), z: kind.neg(v.z) };
}

/**
 * Squared length of vector
 */
export function lengthSq3<T>(kind: FloatKind<T>, v: Vec3<T>): T {
  return dot3(kind, v, v);
}

/**
 * Length of vector
 */
export function length3<T>(kind: FloatKind<T>, v: Vec3<T>): T {
  return kind.sqrt(lengthSq3(kind, v));
}

/**
 * Normalize vector to unit length.
 * Returns the input unchanged unless its squared length is strictly
 * positive (zero and NaN inputs come back as they are).
 */
export function normalize3<T>(kind: FloatKind<T>, v: Vec3<T>): Vec3<T> {
  const lenSq = lengthSq3(kind, v);
  if (!kind.gt(lenSq, kind.zero)) {
    return v;
  }
  return scale3(kind, v, kind.div(kind.one, kind.sqrt(lenSq)));
}

export function isNumericSource(value: unknown): value is NumericSource {
  return typeof value === 'number' || typeof value === 'bigint';
}

/**
 * Operations bound to a single kind
 */
export interface Vec3Ops<T> {
  readonly kind: FloatKind<T>;
  zero(): Vec3<T>;
  splat(value: NumericSource): Vec3<T>;
  from(value: NumericSource | Tuple3): Vec3<T>;
  dot(a: Vec3<T>, b: Vec3<T>): T;
  cross(a: Vec3<T>, b: Vec3<T>): Vec3<T>;
  scale(v: Vec3<T>, s: T): Vec3<T>;
  negate(v: Vec3<T>): Vec3<T>;
  lengthSq(v: Vec3<T>): T;
  length(v: Vec3<T>): T;
  normalize(v: Vec3<T>): Vec3<T>;
}

export function vec3Ops<T>(kind: FloatKind<T>): Vec3Ops<T> {
  return {
    kind,
    zero: () => zero3(kind),
    splat: (value) => splat3(kind, value),
    from: (value) => (isNumericSource(value) ? splat3(kind, value) : fromTuple3(kind, value)),
    dot: (a, b) => dot3(kind, a, b),
    cross: (a, b) => cross3(kind, a, b),
    scale: (v, s) => scale3(kind, v, s),
    negate: (v) => negate3(kind, v),
    lengthSq: (v) => lengthSq3(kind, v),
    length: (v) => length3(kind, v),
    normalize: (v) => normalize3(kind, v),
  };
}

export const f64 = vec3Ops(F64);
export const f32 = vec3Ops(F32);
