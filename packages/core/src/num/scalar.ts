/**
 * Scalar element kinds
 *
 * A kind is a runtime descriptor for the element type of a vector. Every
 * kind knows its zero value and how to cast a number or bigint into its
 * range. Float kinds add the arithmetic the vector operations need.
 *
 * Integer kinds only support construction; length, dot, cross and
 * normalize require a float kind.
 */

import { NumericCastError, UnknownKindError } from './errors.js';

export type NumericSource = number | bigint;

/**
 * Element kind usable for construction
 */
export interface ScalarKind<T> {
  readonly name: string;
  readonly float: boolean;
  /** Default value (zero) */
  readonly zero: T;
  /**
   * Checked conversion into this kind. Throws NumericCastError when the
   * value cannot be represented.
   */
  cast(value: NumericSource): T;
}

/**
 * Element kind with floating-point arithmetic
 */
export interface FloatKind<T> extends ScalarKind<T> {
  readonly float: true;
  readonly one: T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
  neg(a: T): T;
  sqrt(a: T): T;
  /** Strict a > b */
  gt(a: T, b: T): boolean;
}

export function isFloatKind<T>(kind: ScalarKind<T>): kind is FloatKind<T> {
  return kind.float;
}

// Float casts never fail: NaN and ±Infinity pass through untouched
function toDouble(value: NumericSource): number {
  return typeof value === 'bigint' ? Number(value) : value;
}

/**
 * IEEE double (the native JS number)
 */
export const F64: FloatKind<number> = {
  name: 'f64',
  float: true,
  zero: 0,
  one: 1,
  cast: toDouble,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  neg: (a) => -a,
  sqrt: Math.sqrt,
  gt: (a, b) => a > b,
};

const f = Math.fround;

/**
 * Round a bigint straight to 24 significant bits (half to even on the
 * exact remainder). Going through Number first would round twice.
 */
function bigIntToSingle(value: bigint): number {
  const negative = value < 0n;
  const mag = negative ? -value : value;
  const shift = mag.toString(2).length - 24;
  if (shift <= 0) {
    return Number(value);
  }
  const bits = BigInt(shift);
  let q = mag >> bits;
  const rem = mag - (q << bits);
  const half = 1n << (bits - 1n);
  if (rem > half || (rem === half && (q & 1n) === 1n)) {
    q += 1n;
  }
  // at most 25 significant bits, so exact as a double; fround only overflows
  const rounded = f(Number(q << bits));
  return negative ? -rounded : rounded;
}

/**
 * IEEE single precision, stored in a number and rounded after every step.
 * Rounding a double result of +, -, *, / or sqrt to single gives the
 * correctly rounded single result.
 */
export const F32: FloatKind<number> = {
  name: 'f32',
  float: true,
  zero: 0,
  one: 1,
  cast: (value) => (typeof value === 'bigint' ? bigIntToSingle(value) : f(value)),
  add: (a, b) => f(a + b),
  sub: (a, b) => f(a - b),
  mul: (a, b) => f(a * b),
  div: (a, b) => f(a / b),
  neg: (a) => -a,
  sqrt: (a) => f(Math.sqrt(a)),
  gt: (a, b) => a > b,
};

/**
 * Integer kind backed by number. Numbers are truncated toward zero, then
 * range-checked.
 */
function intKind(name: string, min: number, max: number): ScalarKind<number> {
  return {
    name,
    float: false,
    zero: 0,
    cast(value) {
      if (typeof value === 'bigint') {
        if (value < BigInt(min) || value > BigInt(max)) {
          throw new NumericCastError(name, value);
        }
        return Number(value);
      }
      if (!Number.isFinite(value)) {
        throw new NumericCastError(name, value);
      }
      const t = Math.trunc(value);
      if (t < min || t > max) {
        throw new NumericCastError(name, value);
      }
      // trunc(-0.5) is -0
      return t === 0 ? 0 : t;
    },
  };
}

/**
 * 64-bit integer kind backed by bigint
 */
function bigIntKind(name: string, bits: number, signed: boolean): ScalarKind<bigint> {
  const width = BigInt(bits);
  const min = signed ? -(1n << (width - 1n)) : 0n;
  const max = signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n;
  return {
    name,
    float: false,
    zero: 0n,
    cast(value) {
      let v: bigint;
      if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
          throw new NumericCastError(name, value);
        }
        v = BigInt(Math.trunc(value));
      } else {
        v = value;
      }
      if (v < min || v > max) {
        throw new NumericCastError(name, value);
      }
      return v;
    },
  };
}

export const I8 = intKind('i8', -128, 127);
export const I16 = intKind('i16', -32768, 32767);
export const I32 = intKind('i32', -2147483648, 2147483647);
export const U8 = intKind('u8', 0, 255);
export const U16 = intKind('u16', 0, 65535);
export const U32 = intKind('u32', 0, 4294967295);
export const I64 = bigIntKind('i64', 64, true);
export const U64 = bigIntKind('u64', 64, false);

const KINDS = {
  f64: F64,
  f32: F32,
  i8: I8,
  i16: I16,
  i32: I32,
  u8: U8,
  u16: U16,
  u32: U32,
  i64: I64,
  u64: U64,
} as const;

export type ScalarKindName = keyof typeof KINDS;

function isKindName(name: string): name is ScalarKindName {
  return Object.prototype.hasOwnProperty.call(KINDS, name);
}

/**
 * Look up a built-in kind by name
 */
export function scalarKind<N extends ScalarKindName>(name: N): (typeof KINDS)[N];
export function scalarKind(name: string): ScalarKind<number> | ScalarKind<bigint>;
export function scalarKind(name: string): ScalarKind<number> | ScalarKind<bigint> {
  if (!isKindName(name)) {
    throw new UnknownKindError(name);
  }
  return KINDS[name];
}
