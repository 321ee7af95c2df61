import { describe, it, expect } from 'vitest';
import alea from 'alea';
import { f32, f64 } from '../../src/scalar/scalar';
import { isVecOfSize, splat, vec2, vec3, vec4, vecFromArray } from '../../src/algebra/vector';

describe('Vec construction', () => {
  it('vec3 stores its components', () => {
    const v = vec3(1, 2, 3);
    expect(v.size).toBe(3);
    expect(v.toArray()).toEqual([1, 2, 3]);
    expect([v.x, v.y, v.z]).toEqual([1, 2, 3]);
  });

  it('rounds components to the scalar width', () => {
    const v = vec2(0.1, 0.2, f32);
    expect(v.x).toBe(Math.fround(0.1));
    expect(v.y).toBe(Math.fround(0.2));
    expect(v.scalar).toBe(f32);
  });

  it('defaults to f64', () => {
    expect(vec4(1, 2, 3, 4).scalar).toBe(f64);
  });

  it('vecFromArray rejects the wrong component count', () => {
    expect(() => vecFromArray(3, [1, 2])).toThrow(RangeError);
  });

  it('get rejects indices outside the vector', () => {
    const v = vec2(1, 2);
    expect(() => v.get(2)).toThrow(RangeError);
    expect(() => v.get(-1)).toThrow(RangeError);
    expect(() => v.z).toThrow(RangeError);
  });

  it('splat fills every component', () => {
    expect(splat(4, 2).toArray()).toEqual([2, 2, 2, 2]);
  });

  it('toArray returns a copy', () => {
    const v = vec2(1, 2);
    const arr = v.toArray();
    arr[0] = 99;
    expect(v.x).toBe(1);
  });

  it('isVecOfSize checks the size', () => {
    const v = vecFromArray(3, [0, 0, 0]);
    expect(isVecOfSize(v, 3)).toBe(true);
    expect(isVecOfSize(v, 2)).toBe(false);
  });

  it('formats as GLSL', () => {
    expect(vec3(1, 2, 3).toString()).toBe('vec3(1, 2, 3)');
  });
});

describe('Vec arithmetic', () => {
  it('adds and subtracts component-wise', () => {
    expect(vec3(1, 2, 3).add(vec3(4, 5, 6)).toArray()).toEqual([5, 7, 9]);
    expect(vec3(5, 3, 1).sub(vec3(2, 1, 1)).toArray()).toEqual([3, 2, 0]);
  });

  it('mixes vector and scalar operands', () => {
    expect(vec2(2, 3).mul(2).toArray()).toEqual([4, 6]);
    expect(vec2(1, 2).div(2).toArray()).toEqual([0.5, 1]);
    expect(vec2(1, 2).add(1).toArray()).toEqual([2, 3]);
    expect(vec2(2, 3).mul(vec2(4, 5)).toArray()).toEqual([8, 15]);
  });

  it('neg negates every component', () => {
    expect(vec2(1, -2).neg().toArray()).toEqual([-1, 2]);
  });

  it('floor, fract and abs', () => {
    const v = vec2(-1.25, 2.5);
    expect(v.floor().toArray()).toEqual([-2, 2]);
    expect(v.fract().toArray()).toEqual([0.75, 0.5]);
    expect(v.abs().toArray()).toEqual([1.25, 2.5]);
  });

  it('map lifts a scalar function', () => {
    expect(vec3(1, 4, 9).map(Math.sqrt).toArray()).toEqual([1, 2, 3]);
  });

  it('map rounds through the vector width', () => {
    expect(vec2(1, 2, f32).map((c) => c / 3).x).toBe(Math.fround(1 / 3));
  });

  it('mix interpolates with a scalar or per-component t', () => {
    expect(vec2(0, 0).mix(vec2(10, 20), 0.25).toArray()).toEqual([2.5, 5]);
    expect(vec2(0, 0).mix(vec2(10, 20), vec2(0.5, 1)).toArray()).toEqual([5, 20]);
  });
});

describe('Vec geometry', () => {
  it('dot product', () => {
    expect(vec3(1, 2, 3).dot(vec3(4, 5, 6))).toBe(32);
  });

  it('cross of the x and y axes is z', () => {
    expect(vec3(1, 0, 0).cross(vec3(0, 1, 0)).toArray()).toEqual([0, 0, 1]);
  });

  it('length and lengthSquared', () => {
    expect(vec2(3, 4).length()).toBe(5);
    expect(vec3(2, 3, 6).length()).toBe(7);
    expect(vec3(2, 3, 6).lengthSquared()).toBe(49);
  });

  it('distance', () => {
    expect(vec2(1, 1).distance(vec2(4, 5))).toBe(5);
  });

  it('normalize of a zero vector is NaN', () => {
    expect(vec2(0, 0).normalize().toArray().every(Number.isNaN)).toBe(true);
  });

  it('reflect mirrors about the normal', () => {
    expect(vec2(1, -1).reflect(vec2(0, 1)).toArray()).toEqual([1, 1]);
  });

  it('refract with eta 1 passes straight through', () => {
    expect(vec2(0, -1).refract(vec2(0, 1), 1).toArray()).toEqual([0, -1]);
  });

  it('refract gives zero on total internal reflection', () => {
    const i = vec2(Math.SQRT1_2, -Math.SQRT1_2);
    expect(i.refract(vec2(0, 1), 1.5).toArray()).toEqual([0, 0]);
  });

  it('faceforward keeps or flips the normal', () => {
    const n = vec2(1, 1);
    expect(n.faceforward(vec2(-1, 0), vec2(1, 0)).toArray()).toEqual([1, 1]);
    expect(n.faceforward(vec2(1, 1), vec2(1, 0)).toArray()).toEqual([-1, -1]);
  });

  it('projection onto an axis and onto zero', () => {
    expect(vec2(2, 3).projection(vec2(1, 0)).toArray()).toEqual([2, 0]);
    expect(vec2(2, 3).projection(vec2(0, 0)).toArray()).toEqual([0, 0]);
  });
});

describe('Vec properties over random samples', () => {
  const rng = alea('vector-props');
  const rand = (lo: number, hi: number) => lo + (hi - lo) * rng();

  it('normalize has unit length (f64)', () => {
    for (let i = 0; i < 100; i++) {
      const v = vec4(rand(-10, 10), rand(-10, 10), rand(-10, 10), rand(-10, 10));
      expect(v.normalize().length()).toBeCloseTo(1, 12);
    }
  });

  it('normalize has unit length (f32)', () => {
    for (let i = 0; i < 100; i++) {
      const v = vec3(rand(-10, 10), rand(-10, 10), rand(-10, 10), f32);
      expect(v.normalize().length()).toBeCloseTo(1, 5);
    }
  });

  it('cross is orthogonal to both operands (f64)', () => {
    for (let i = 0; i < 100; i++) {
      const a = vec3(rand(-10, 10), rand(-10, 10), rand(-10, 10));
      const b = vec3(rand(-10, 10), rand(-10, 10), rand(-10, 10));
      const c = a.cross(b);
      expect(c.dot(a)).toBeCloseTo(0, 9);
      expect(c.dot(b)).toBeCloseTo(0, 9);
    }
  });

  it('cross is orthogonal to both operands (f32)', () => {
    for (let i = 0; i < 100; i++) {
      const a = vec3(rand(-1, 1), rand(-1, 1), rand(-1, 1), f32);
      const b = vec3(rand(-1, 1), rand(-1, 1), rand(-1, 1), f32);
      const c = a.cross(b);
      expect(c.dot(a)).toBeCloseTo(0, 4);
      expect(c.dot(b)).toBeCloseTo(0, 4);
    }
  });
});

describe('Vec comparison', () => {
  it('equals compares exactly', () => {
    expect(vec2(1, 2).equals(vec2(1, 2))).toBe(true);
    expect(vec2(1, 2).equals(vec2(1, 2.000001))).toBe(false);
  });

  it('isCloseTo honours the tolerance', () => {
    expect(vec2(1, 2).isCloseTo(vec2(1, 2.000001), 1e-5)).toBe(true);
    expect(vec2(1, 2).isCloseTo(vec2(1, 2.1), 1e-5)).toBe(false);
  });
});
