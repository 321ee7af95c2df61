// Dimension-dispatching entry points: a number selects the 1D evaluator,
// a vector the evaluator of its size.

import type { Precision } from '../scalar/scalar';
import { isVecOfSize, type AnyVec, type Dim, type Vec } from '../algebra/vector';
import {
  classicNoise1, classicNoise2, classicNoise3, classicNoise4,
  periodicClassicNoise1, periodicClassicNoise2, periodicClassicNoise3, periodicClassicNoise4,
} from './classic';
import {
  simplexNoise1, simplexNoise2, simplexNoise3, simplexNoise4,
  simplexNoiseWithDerivative1, simplexNoiseWithDerivative2, simplexNoiseWithDerivative3, simplexNoiseWithDerivative4,
} from './simplex';
import {
  periodicSimplexNoise1, periodicSimplexNoise2, periodicSimplexNoise3, periodicSimplexNoise4,
} from './periodic-simplex';
import type { NoiseDerivative, NoisePoint } from './types';

type Period = number | AnyVec;

function unsupported(p: AnyVec): never {
  throw new RangeError(`Noise is not defined for vectors of size ${p.size}`);
}

function vectorPeriod<N extends Dim>(period: Period, size: N): Vec<N, Precision> {
  if (typeof period === 'number' || !isVecOfSize(period, size)) {
    throw new RangeError(`A ${size}D noise point needs a period vector of size ${size}`);
  }
  return period;
}

function scalarPeriod(period: Period): number {
  if (typeof period !== 'number') {
    throw new RangeError(`A 1D noise point needs a numeric period, got a vector of size ${period.size}`);
  }
  return period;
}

// ── Classic ──

export function classicNoise(p: number, period?: number): number;
export function classicNoise<N extends Dim, P extends Precision>(p: Vec<N, P>, period?: Vec<NoInfer<N>, Precision>): number;
export function classicNoise(p: NoisePoint, period?: Period): number {
  if (typeof p === 'number') {
    return period === undefined ? classicNoise1(p) : periodicClassicNoise1(p, scalarPeriod(period));
  }
  if (isVecOfSize(p, 2)) {
    return period === undefined ? classicNoise2(p) : periodicClassicNoise2(p, vectorPeriod(period, 2));
  }
  if (isVecOfSize(p, 3)) {
    return period === undefined ? classicNoise3(p) : periodicClassicNoise3(p, vectorPeriod(period, 3));
  }
  if (isVecOfSize(p, 4)) {
    return period === undefined ? classicNoise4(p) : periodicClassicNoise4(p, vectorPeriod(period, 4));
  }
  return unsupported(p);
}

// ── Simplex ──

export function simplexNoise(p: NoisePoint): number {
  if (typeof p === 'number') return simplexNoise1(p);
  if (isVecOfSize(p, 2)) return simplexNoise2(p);
  if (isVecOfSize(p, 3)) return simplexNoise3(p);
  if (isVecOfSize(p, 4)) return simplexNoise4(p);
  return unsupported(p);
}

export function periodicSimplexNoise(p: number, period: number): number;
export function periodicSimplexNoise<N extends Dim, P extends Precision>(
  p: Vec<N, P>,
  period: Vec<NoInfer<N>, Precision>,
): number;
export function periodicSimplexNoise(p: NoisePoint, period: Period): number {
  if (typeof p === 'number') return periodicSimplexNoise1(p, scalarPeriod(period));
  if (isVecOfSize(p, 2)) return periodicSimplexNoise2(p, vectorPeriod(period, 2));
  if (isVecOfSize(p, 3)) return periodicSimplexNoise3(p, vectorPeriod(period, 3));
  if (isVecOfSize(p, 4)) return periodicSimplexNoise4(p, vectorPeriod(period, 4));
  return unsupported(p);
}

export function simplexNoiseWithDerivative(p: number): NoiseDerivative<number>;
export function simplexNoiseWithDerivative<N extends Dim, P extends Precision>(p: Vec<N, P>): NoiseDerivative<Vec<N, P>>;
export function simplexNoiseWithDerivative(p: NoisePoint): NoiseDerivative<number> | NoiseDerivative<AnyVec> {
  if (typeof p === 'number') return simplexNoiseWithDerivative1(p);
  if (isVecOfSize(p, 2)) return simplexNoiseWithDerivative2(p);
  if (isVecOfSize(p, 3)) return simplexNoiseWithDerivative3(p);
  if (isVecOfSize(p, 4)) return simplexNoiseWithDerivative4(p);
  return unsupported(p);
}
