/**
 * Geometric predicates
 *
 * Parallelism tests for vectors anchored at the origin. The robust variant
 * uses Shewchuk-style adaptive precision predicates via
 * mourner/robust-predicates, so it gives the exact answer for the double
 * inputs it is handed.
 */

import { orient2d } from 'robust-predicates';
import type { NumericContext } from './tolerance.js';
import type { FloatKind } from './scalar.js';
import type { Vec3 } from './vec3.js';
import { cross3, length3 } from './vec3.js';
import { F64 } from './scalar.js';

/**
 * Exact parallelism test.
 *
 * a × b is zero exactly when each of its components is zero, and each
 * component is the 2D orientation of (0, a, b) projected onto one
 * coordinate plane. Zero vectors are parallel to everything.
 */
export function areParallel3Robust(a: Vec3, b: Vec3): boolean {
  return (
    orient2d(0, 0, a.y, a.z, b.y, b.z) === 0 &&
    orient2d(0, 0, a.z, a.x, b.z, b.x) === 0 &&
    orient2d(0, 0, a.x, a.y, b.x, b.y) === 0
  );
}

/**
 * Parallelism test (tolerance-aware wrapper)
 *
 * Compares |a × b| (|a||b| sin θ) against the angle tolerance scaled by
 * |a||b|. Anti-parallel vectors count as parallel.
 */
export function areParallel3(
  a: Vec3,
  b: Vec3,
  ctx: NumericContext,
  kind: FloatKind<number> = F64
): boolean {
  const scale = length3(kind, a) * length3(kind, b);
  return length3(kind, cross3(kind, a, b)) <= ctx.tol.angle * scale;
}
