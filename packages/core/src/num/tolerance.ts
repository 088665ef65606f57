/**
 * Tolerance model and numeric context
 *
 * Provides a centralized tolerance system for approximate vector
 * comparisons. The exact operations in vec3.ts never consult it; these
 * helpers are for callers that need "close enough" answers.
 */

import { z } from 'zod';
import { InvalidToleranceError } from './errors.js';
import type { FloatKind } from './scalar.js';
import type { Vec3 } from './vec3.js';
import { dot3, length3, normalize3 } from './vec3.js';
import { F64 } from './scalar.js';

/**
 * Tolerance values for a context
 */
export interface Tolerances {
  /** Absolute length tolerance */
  length: number;
  /** Angle tolerance in radians */
  angle: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
  /** Log degenerate inputs to the console */
  verbose: boolean;
}

export interface NumericContextOptions {
  verbose?: boolean;
}

/**
 * Default tolerances
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-6,
  angle: 1e-8,
};

const tolerancesSchema = z
  .object({
    length: z.number().finite().nonnegative(),
    angle: z.number().finite().nonnegative(),
  })
  .partial()
  .strict();

/**
 * Create a numeric context, filling unspecified tolerances from the defaults
 */
export function createNumericContext(
  tol?: Partial<Tolerances>,
  options: NumericContextOptions = {}
): NumericContext {
  const parsed = tolerancesSchema.safeParse(tol ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new InvalidToleranceError(`Invalid tolerances: ${issues.join('; ')}`, issues);
  }
  return {
    tol: {
      length: parsed.data.length ?? DEFAULT_TOLERANCES.length,
      angle: parsed.data.angle ?? DEFAULT_TOLERANCES.angle,
    },
    verbose: options.verbose ?? false,
  };
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}

/**
 * Check if two lengths are equal within tolerance
 */
export function eqLength(a: number, b: number, ctx: NumericContext): boolean {
  return Math.abs(a - b) <= ctx.tol.length;
}

/**
 * Component-wise approximate equality
 */
export function eq3(a: Vec3, b: Vec3, ctx: NumericContext, scale = 1): boolean {
  const tol = ctx.tol.length * scale;
  return Math.abs(a.x - b.x) <= tol && Math.abs(a.y - b.y) <= tol && Math.abs(a.z - b.z) <= tol;
}

/**
 * Length within tolerance of 1
 */
export function isUnit3(v: Vec3, ctx: NumericContext, kind: FloatKind<number> = F64): boolean {
  return eqLength(length3(kind, v), 1, ctx);
}

/**
 * Angle between a and b within angle tolerance of 90°.
 * The cosine is compared against the tolerance, which matches the angle
 * deviation for small values. Zero vectors count as orthogonal to anything.
 */
export function isOrthogonal3(
  a: Vec3,
  b: Vec3,
  ctx: NumericContext,
  kind: FloatKind<number> = F64
): boolean {
  const scale = length3(kind, a) * length3(kind, b);
  return Math.abs(dot3(kind, a, b)) <= ctx.tol.angle * scale;
}

/**
 * Normalize, treating anything within length tolerance of zero as
 * degenerate. Returns null for degenerate (or NaN) input.
 */
export function normalize3Tol(
  kind: FloatKind<number>,
  v: Vec3,
  ctx: NumericContext
): Vec3 | null {
  const len = length3(kind, v);
  if (!(len > ctx.tol.length)) {
    if (ctx.verbose) {
      console.warn(`[trivec] normalize3Tol: degenerate vector (${v.x}, ${v.y}, ${v.z}), length ${len}`);
    }
    return null;
  }
  return normalize3(kind, v);
}
