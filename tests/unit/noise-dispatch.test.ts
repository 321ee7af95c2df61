import { describe, it, expect } from 'vitest';
import { f32 } from '../../src/scalar/scalar';
import { vec2, vec3, vec4, type AnyVec } from '../../src/algebra/vector';
import {
  classicNoise1, classicNoise3, periodicClassicNoise1, periodicClassicNoise2,
} from '../../src/noise/classic';
import { simplexNoise1, simplexNoise2, simplexNoise4, simplexNoiseWithDerivative1 } from '../../src/noise/simplex';
import { periodicSimplexNoise3 } from '../../src/noise/periodic-simplex';
import {
  classicNoise, periodicSimplexNoise, simplexNoise, simplexNoiseWithDerivative,
} from '../../src/noise/dispatch';
import { noise1, noise2, noise3, noise4 } from '../../src/builtin/noise';

describe('dispatching entry points', () => {
  it('classicNoise picks the evaluator by dimension', () => {
    expect(classicNoise(0.7)).toBe(classicNoise1(0.7));
    expect(classicNoise(vec3(0.1, 0.2, 0.3))).toBe(classicNoise3(vec3(0.1, 0.2, 0.3)));
  });

  it('classicNoise with a period picks the periodic evaluator', () => {
    expect(classicNoise(0.7, 4)).toBe(periodicClassicNoise1(0.7, 4));
    expect(classicNoise(vec2(0.7, 1.9), vec2(3, 5))).toBe(periodicClassicNoise2(vec2(0.7, 1.9), vec2(3, 5)));
  });

  it('simplexNoise and periodicSimplexNoise', () => {
    expect(simplexNoise(-2.5)).toBe(simplexNoise1(-2.5));
    expect(simplexNoise(vec4(1, 2, 3, 4.5))).toBe(simplexNoise4(vec4(1, 2, 3, 4.5)));
    expect(periodicSimplexNoise(vec3(0.5, 1.5, 2.5), vec3(4, 4, 4)))
      .toBe(periodicSimplexNoise3(vec3(0.5, 1.5, 2.5), vec3(4, 4, 4)));
  });

  it('simplexNoiseWithDerivative returns a number gradient in 1D', () => {
    expect(simplexNoiseWithDerivative(0.4)).toEqual(simplexNoiseWithDerivative1(0.4));
  });

  it('rejects a period vector of another size', () => {
    const p: AnyVec = vec2(0.5, 0.5);
    const period: AnyVec = vec3(4, 4, 4);
    expect(() => classicNoise(p, period)).toThrow(RangeError);
    expect(() => periodicSimplexNoise(p, period)).toThrow(RangeError);
  });
});

describe('GLSL noise built-ins', () => {
  it('noise1 is the simplex value', () => {
    expect(noise1(0.3)).toBe(simplexNoise1(0.3));
    expect(noise1(vec2(0.3, 0.9))).toBe(simplexNoise2(vec2(0.3, 0.9)));
  });

  it('noise2 samples x and -x', () => {
    expect(noise2(0.3).toArray()).toEqual([simplexNoise1(0.3), simplexNoise1(-0.3)]);
  });

  it('noise3 samples x - 1, x and x + 1', () => {
    const v = noise3(vec2(0.5, 0.5));
    expect(v.toArray()).toEqual([
      simplexNoise2(vec2(-0.5, -0.5)),
      simplexNoise2(vec2(0.5, 0.5)),
      simplexNoise2(vec2(1.5, 1.5)),
    ]);
  });

  it('noise4 adds x + 2', () => {
    const v = noise4(1.25);
    expect(v.toArray()).toEqual([simplexNoise1(0.25), simplexNoise1(1.25), simplexNoise1(2.25), simplexNoise1(3.25)]);
  });

  it('keeps the width of a vector argument', () => {
    expect(noise2(vec2(0.1, 0.2, f32)).scalar).toBe(f32);
  });
});
