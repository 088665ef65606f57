/**
 * @trivec/oo - Object-oriented façade for trivec
 *
 * Wraps the pure functions of @trivec/core in an immutable `Vec3` class:
 * - static constructors (`zero`, `from`, `splat`) that cast through a kind
 * - `length`, `dot`, `cross`, `normalize` methods, available only on
 *   vectors over a float kind
 */

import {
  // Kinds
  type ScalarKind,
  type FloatKind,
  type NumericSource,
  type Tuple3,
  type Vec3 as Vec3Value,
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
  scalarKind,

  // Errors
  NumericCastError,
  KindMismatchError,

  // Operations
  zero3,
  splat3,
  fromTuple3,
  isNumericSource,
  dot3,
  cross3,
  negate3,
  lengthSq3,
  length3,
  normalize3,
} from '@trivec/core';

// Re-export useful types
export type { ScalarKind, FloatKind, NumericSource, Tuple3, Vec3Value };

// Re-export kinds and errors for convenience
export { F64, F32, I8, I16, I32, U8, U16, U32, I64, U64, scalarKind, NumericCastError, KindMismatchError };

/**
 * Immutable three-component vector bound to its element kind
 */
export class Vec3<T, K extends ScalarKind<T> = ScalarKind<T>> implements Vec3Value<T> {
  private constructor(
    readonly kind: K,
    readonly x: T,
    readonly y: T,
    readonly z: T
  ) {
    Object.freeze(this);
  }

  private static wrap<T, K extends ScalarKind<T>>(kind: K, v: Vec3Value<T>): Vec3<T, K> {
    return new Vec3(kind, v.x, v.y, v.z);
  }

  /**
   * Vector with every component set to the kind's zero
   */
  static zero<T>(kind: FloatKind<T>): Vec3<T, FloatKind<T>>;
  static zero<T>(kind: ScalarKind<T>): Vec3<T>;
  static zero<T>(kind: ScalarKind<T>): Vec3<T> {
    return Vec3.wrap(kind, zero3(kind));
  }

  /**
   * Broadcast a scalar, or take the components of a triple. Every value
   * goes through the kind's checked cast; a failure throws
   * NumericCastError and no vector is produced.
   */
  static from<T>(kind: FloatKind<T>, value: NumericSource | Tuple3): Vec3<T, FloatKind<T>>;
  static from<T>(kind: ScalarKind<T>, value: NumericSource | Tuple3): Vec3<T>;
  static from<T>(kind: ScalarKind<T>, value: NumericSource | Tuple3): Vec3<T> {
    return isNumericSource(value) ? Vec3.splat(kind, value) : Vec3.wrap(kind, fromTuple3(kind, value));
  }

  static splat<T>(kind: FloatKind<T>, value: NumericSource): Vec3<T, FloatKind<T>>;
  static splat<T>(kind: ScalarKind<T>, value: NumericSource): Vec3<T>;
  static splat<T>(kind: ScalarKind<T>, value: NumericSource): Vec3<T> {
    return Vec3.wrap(kind, splat3(kind, value));
  }

  // Mixing kinds would run one kind's arithmetic on the other's values
  private static sameKind<T>(self: Vec3<T, FloatKind<T>>, other: Vec3<T, FloatKind<T>>): Vec3<T, FloatKind<T>> {
    if (other.kind !== self.kind) {
      throw new KindMismatchError(self.kind.name, other.kind.name);
    }
    return other;
  }

  length(this: Vec3<T, FloatKind<T>>): T {
    return length3(this.kind, this);
  }

  lengthSq(this: Vec3<T, FloatKind<T>>): T {
    return lengthSq3(this.kind, this);
  }

  dot(this: Vec3<T, FloatKind<T>>, other: Vec3<T, FloatKind<T>>): T {
    return dot3(this.kind, this, Vec3.sameKind(this, other));
  }

  cross(this: Vec3<T, FloatKind<T>>, other: Vec3<T, FloatKind<T>>): Vec3<T, FloatKind<T>> {
    return Vec3.wrap(this.kind, cross3(this.kind, this, Vec3.sameKind(this, other)));
  }

  negate(this: Vec3<T, FloatKind<T>>): Vec3<T, FloatKind<T>> {
    return Vec3.wrap(this.kind, negate3(this.kind, this));
  }

  /**
   * Unit vector in the same direction. A vector whose squared length is
   * not strictly positive is returned as is.
   */
  normalize(this: Vec3<T, FloatKind<T>>): Vec3<T, FloatKind<T>> {
    const n = normalize3(this.kind, this);
    return n === this ? this : Vec3.wrap(this.kind, n);
  }

  /**
   * Exact component equality (NaN equals NaN, 0 differs from -0)
   */
  equals(other: Vec3Value<T>): boolean {
    return Object.is(this.x, other.x) && Object.is(this.y, other.y) && Object.is(this.z, other.z);
  }
}
