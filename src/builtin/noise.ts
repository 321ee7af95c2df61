// GLSL noise built-ins, evaluated with simplex noise

import { f64, type Precision, type Scalar } from '../scalar/scalar';
import { Vec, type Dim } from '../algebra/vector';
import { simplexNoise } from '../noise/dispatch';
import type { NoisePoint } from '../noise/types';

function shift(x: NoisePoint, k: number): NoisePoint {
  return typeof x === 'number' ? x + k : x.add(k);
}

function scalarOf(x: NoisePoint): Scalar {
  return typeof x === 'number' ? f64 : x.scalar;
}

export function noise1(x: NoisePoint): number {
  return simplexNoise(x);
}

export function noise2(x: number): Vec<2, 'f64'>;
export function noise2<N extends Dim, P extends Precision>(x: Vec<N, P>): Vec<2, P>;
export function noise2(x: NoisePoint): Vec<2> {
  const negated = typeof x === 'number' ? -x : x.neg();
  return new Vec(scalarOf(x), 2, [noise1(x), noise1(negated)]);
}

export function noise3(x: number): Vec<3, 'f64'>;
export function noise3<N extends Dim, P extends Precision>(x: Vec<N, P>): Vec<3, P>;
export function noise3(x: NoisePoint): Vec<3> {
  return new Vec(scalarOf(x), 3, [noise1(shift(x, -1)), noise1(x), noise1(shift(x, 1))]);
}

export function noise4(x: number): Vec<4, 'f64'>;
export function noise4<N extends Dim, P extends Precision>(x: Vec<N, P>): Vec<4, P>;
export function noise4(x: NoisePoint): Vec<4> {
  return new Vec(scalarOf(x), 4, [noise1(shift(x, -1)), noise1(x), noise1(shift(x, 1)), noise1(shift(x, 2))]);
}
