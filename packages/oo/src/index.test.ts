import { describe, it, expect } from 'vitest';
import { Vec3, F32, F64, I64, U16, NumericCastError, KindMismatchError, type Vec3Value } from './index.js';

function xyz<T>(v: Vec3Value<T>): [T, T, T] {
  return [v.x, v.y, v.z];
}

describe('@trivec/oo', () => {
  describe('construction', () => {
    it('should create a zero vector', () => {
      const v = Vec3.zero(F32);
      expect(xyz(v)).toEqual([0, 0, 0]);
      expect(v.kind).toBe(F32);
    });

    it('should broadcast a scalar', () => {
      expect(xyz(Vec3.from(U16, 11))).toEqual([11, 11, 11]);
      expect(xyz(Vec3.splat(U16, 11))).toEqual([11, 11, 11]);
    });

    it('should build from a triple', () => {
      expect(xyz(Vec3.from(U16, [1, 2, 3]))).toEqual([1, 2, 3]);
      expect(xyz(Vec3.from(I64, [1, 2n, -3]))).toEqual([1n, 2n, -3n]);
    });

    it('should agree between splat and scalar from', () => {
      expect(Vec3.splat(F32, 0.1).equals(Vec3.from(F32, 0.1))).toBe(true);
      expect(Vec3.splat(F32, 0.1).x).toBe(Math.fround(0.1));
    });

    it('should throw on out-of-range values', () => {
      expect(() => Vec3.from(U16, -1)).toThrow(NumericCastError);
      expect(() => Vec3.splat(U16, 65536)).toThrow(NumericCastError);
      expect(() => Vec3.from(U16, [1, 2, 65536])).toThrow('Cannot represent 65536 as u16');
    });

    it('should be immutable', () => {
      const v = Vec3.from(F64, [1, 2, 3]);
      expect(Object.isFrozen(v)).toBe(true);
    });
  });

  describe('operations', () => {
    it('should compute length', () => {
      expect(Vec3.from(F32, [3, 4, 0]).length()).toBe(5);
      expect(Vec3.from(F64, [2, 3, 6]).length()).toBe(7);
      expect(Vec3.from(F64, [3, 4, 5]).length()).toBe(Math.sqrt(50));
      expect(Vec3.from(F64, [2, 3, 6]).lengthSq()).toBe(49);
      expect(Vec3.zero(F64).length()).toBe(0);
    });

    it('should compute dot product', () => {
      const a = Vec3.from(F32, [1, 2, 3]);
      expect(a.dot(Vec3.from(F32, [4, 5, 6]))).toBe(32);
      expect(Vec3.from(F32, [0, 0, 1]).dot(Vec3.from(F32, [0, 2, 0]))).toBe(0);
      expect(Vec3.from(F32, [1, 0, 0]).dot(Vec3.from(F32, [-1, 0, 0]))).toBe(-1);
    });

    it('should compute cross product', () => {
      const i = Vec3.from(F64, [1, 0, 0]);
      const j = Vec3.from(F64, [0, 1, 0]);
      const k = Vec3.from(F64, [0, 0, 1]);
      expect(i.cross(j).equals(k)).toBe(true);
      expect(j.cross(k).equals(i)).toBe(true);
      expect(k.cross(i).equals(j)).toBe(true);

      const c = Vec3.from(F32, [1, 2, 3]).cross(Vec3.from(F32, [4, 5, 6]));
      expect(xyz(c)).toEqual([-3, 6, -3]);
      expect(c.kind).toBe(F32);
    });

    it('should be anticommutative', () => {
      const a = Vec3.from(F32, [0.3, -1.7, 2.9]);
      const b = Vec3.from(F32, [5.5, 0.25, -3.1]);
      const ab = a.cross(b);
      const ba = b.cross(a).negate();
      expect(ab.x === ba.x && ab.y === ba.y && ab.z === ba.z).toBe(true);
    });

    it('should reject an operand of another kind', () => {
      const a = Vec3.from(F32, [1, 2, 3]);
      const b = Vec3.from(F64, [4, 5, 6]);
      expect(() => a.dot(b)).toThrow(KindMismatchError);
      expect(() => a.cross(b)).toThrow('Expected a f32 vector, got f64');
    });

    it('should normalize', () => {
      const n = Vec3.from(F32, [2, 3, 6]).normalize();
      expect(Math.abs(n.x - 2 / 7)).toBeLessThan(1e-6);
      expect(Math.abs(n.y - 3 / 7)).toBeLessThan(1e-6);
      expect(Math.abs(n.z - 6 / 7)).toBeLessThan(1e-6);
      expect(Math.abs(n.length() - 1)).toBeLessThan(1e-6);
    });

    it('should return a zero vector itself from normalize', () => {
      const zero = Vec3.zero(F64);
      expect(zero.normalize()).toBe(zero);
    });
  });

  describe('equals', () => {
    it('should compare components exactly', () => {
      expect(Vec3.from(F64, [1, 2, 3]).equals({ x: 1, y: 2, z: 3 })).toBe(true);
      expect(Vec3.from(F64, [1, 2, 3]).equals({ x: 1, y: 2, z: 3.0000001 })).toBe(false);
      expect(Vec3.splat(F64, NaN).equals(Vec3.splat(F64, NaN))).toBe(true);
      expect(Vec3.splat(F64, 0).equals(Vec3.splat(F64, -0))).toBe(false);
    });
  });
});
