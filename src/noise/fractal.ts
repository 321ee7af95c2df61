// Fractal Brownian motion over a classic or simplex basis.

import { f64 } from '../scalar/scalar';
import { classicNoise1 } from './classic';
import { classicNoise, simplexNoise } from './dispatch';
import { defaultFractalParams, type FractalParams, type NoiseBasis, type NoisePoint } from './types';

function classicBasis(p: NoisePoint): number {
  return typeof p === 'number' ? classicNoise1(p) : classicNoise(p);
}

const BASIS: Record<NoiseBasis, (p: NoisePoint) => number> = {
  classic: classicBasis,
  simplex: simplexNoise,
};

function scalePoint(p: NoisePoint, k: number): NoisePoint {
  return typeof p === 'number' ? p * k : p.mul(k);
}

/**
 * Sums `octaves` layers of the basis, each at `lacunarity` times the
 * frequency and `gain` times the amplitude of the previous one, normalized
 * by the total amplitude.
 */
export function fractalNoise(p: NoisePoint, params: Partial<FractalParams> = {}): number {
  const { octaves, lacunarity, gain, basis } = { ...defaultFractalParams(), ...params };
  if (!Number.isInteger(octaves) || octaves < 1) {
    throw new RangeError(`Fractal noise needs a whole number of octaves >= 1, got ${octaves}`);
  }

  const sample = BASIS[basis];
  const s = typeof p === 'number' ? f64 : p.scalar;
  let value = 0;
  let max = 0;
  let amplitude = 1;
  let frequency = 1;

  for (let i = 0; i < octaves; i++) {
    value = s.add(value, s.mul(amplitude, sample(scalePoint(p, frequency))));
    max += amplitude;
    amplitude *= gain;
    frequency *= lacunarity;
  }

  return s.div(value, max);
}
