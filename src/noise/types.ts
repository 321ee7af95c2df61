import type { Precision } from '../scalar/scalar';
import type { Dim, Vec } from '../algebra/vector';

// ── Noise results ──

/** Noise value together with its analytic gradient. */
export interface NoiseDerivative<G> {
  value: number;
  gradient: G;
}

/** A noise coordinate: a number in 1D, a vector otherwise. */
export type NoisePoint = number | Vec<Dim, Precision>;

// ── Fractal parameters ──

export type NoiseBasis = 'classic' | 'simplex';

export interface FractalParams {
  octaves: number;
  lacunarity: number; // frequency multiplier per octave
  gain: number; // amplitude multiplier per octave
  basis: NoiseBasis;
}

export function defaultFractalParams(): FractalParams {
  return {
    octaves: 6,
    lacunarity: 2,
    gain: 0.5,
    basis: 'simplex',
  };
}
