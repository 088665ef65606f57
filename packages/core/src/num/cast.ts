/**
 * Checked numeric casts
 *
 * `cast` throws on a value that does not fit the target kind; `tryCast`
 * reports the same failure as a result instead.
 */

import { NumericCastError } from './errors.js';
import type { NumericSource, ScalarKind } from './scalar.js';

/**
 * Result of a checked cast
 *
 * Usage:
 * ```ts
 * const result = tryCast(U16, input);
 * if (result.ok) {
 *   use(result.value);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type CastResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: NumericCastError };

export function cast<T>(kind: ScalarKind<T>, value: NumericSource): T {
  return kind.cast(value);
}

export function tryCast<T>(kind: ScalarKind<T>, value: NumericSource): CastResult<T> {
  try {
    return { ok: true, value: kind.cast(value) };
  } catch (err) {
    if (err instanceof NumericCastError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Cast every value or none: the first failure propagates
 */
export function castAll<T>(kind: ScalarKind<T>, values: readonly NumericSource[]): T[] {
  return values.map((value) => kind.cast(value));
}
