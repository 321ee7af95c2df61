import { describe, it, expect } from 'vitest';
import alea from 'alea';
import { vec2, vec3 } from '../../src/algebra/vector';
import { classicNoise1, classicNoise2 } from '../../src/noise/classic';
import { simplexNoise1, simplexNoise3 } from '../../src/noise/simplex';
import { fractalNoise } from '../../src/noise/fractal';
import { defaultFractalParams } from '../../src/noise/types';

describe('defaultFractalParams', () => {
  it('returns six simplex octaves', () => {
    expect(defaultFractalParams()).toEqual({ octaves: 6, lacunarity: 2, gain: 0.5, basis: 'simplex' });
  });

  it('returns a fresh object each call', () => {
    expect(defaultFractalParams()).not.toBe(defaultFractalParams());
  });
});

describe('fractalNoise', () => {
  it('one octave is the basis itself', () => {
    const p = vec3(0.3, 1.7, -2.2);
    expect(fractalNoise(p, { octaves: 1 })).toBe(simplexNoise3(p));
    expect(fractalNoise(vec2(0.3, 0.7), { octaves: 1, basis: 'classic' })).toBe(classicNoise2(vec2(0.3, 0.7)));
    expect(fractalNoise(0.7, { octaves: 1, basis: 'classic' })).toBe(classicNoise1(0.7));
  });

  it('weights octaves by gain and normalizes by the total amplitude', () => {
    const x = 0.37;
    const expected = (simplexNoise1(x) + 0.5 * simplexNoise1(2 * x)) / 1.5;
    expect(fractalNoise(x, { octaves: 2 })).toBeCloseTo(expected, 12);
  });

  it('merges partial params over the defaults', () => {
    const p = vec2(1.5, -0.25);
    expect(fractalNoise(p, {})).toBe(fractalNoise(p, defaultFractalParams()));
  });

  it('classic basis is zero on the integer lattice', () => {
    expect(Math.abs(fractalNoise(vec2(3, 4), { basis: 'classic' }))).toBe(0);
  });

  it('stays within about [-1, 1]', () => {
    const rng = alea('fractal');
    for (let i = 0; i < 500; i++) {
      const p = vec2(rng() * 100 - 50, rng() * 100 - 50);
      expect(Math.abs(fractalNoise(p))).toBeLessThanOrEqual(1.1);
    }
  });

  it('rejects octave counts that are not whole numbers >= 1', () => {
    expect(() => fractalNoise(0.5, { octaves: 0 })).toThrow(RangeError);
    expect(() => fractalNoise(0.5, { octaves: 2.5 })).toThrow(RangeError);
  });
});
