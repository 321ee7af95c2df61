// Simplex noise, 1D–4D, with analytic derivatives.
//
// The lattice is skewed so that each unit hypercube splits into N! simplices;
// a point sums the radial falloff of its N + 1 simplex corners. Each
// dimension has its own evaluator returning the value and its gradient.
// 1D noise is the 2D field along y = 0.

import { f64, type Precision, type Scalar } from '../scalar/scalar';
import { Vec, type Dim } from '../algebra/vector';
import { atWidth, SIMPLEX_GRAD2, SIMPLEX_GRAD3, SIMPLEX_GRAD4 } from './tables';
import {
  corner2, corner3, corner4, emptySum, hash2, hash3, hash4, scaled, type CornerSum,
} from './simplex-corner';
import type { NoiseDerivative } from './types';

const F2 = 0.366025403784439; // (sqrt(3) - 1) / 2
const G2 = 0.211324865405187; // (3 - sqrt(3)) / 6
const F3 = 1 / 3;
const G3 = 1 / 6;
const F4 = 0.309016994374947451; // (sqrt(5) - 1) / 4
const G4 = 0.138196601125011; // (5 - sqrt(5)) / 20

// ── Per-dimension evaluators ──

function simplex2(s: Scalar, x: number, y: number): CornerSum {
  const { add, sub, mul, floor } = s;
  const table = atWidth(SIMPLEX_GRAD2, s);
  const g1 = s.round(G2);
  const g2 = s.round(2 * G2);

  const skew = mul(add(x, y), s.round(F2));
  const i = floor(add(x, skew));
  const j = floor(add(y, skew));
  const unskew = mul(add(i, j), g1);
  const x0 = add(sub(x, i), unskew);
  const y0 = add(sub(y, j), unskew);

  // lower triangle when x leads; x wins a tie
  const i1 = x0 >= y0 ? 1 : 0;
  const j1 = 1 - i1;

  const sum = emptySum(2);
  corner2(s, sum, 0.5, table, hash2(i, j), x0, y0);
  corner2(s, sum, 0.5, table, hash2(i + i1, j + j1), add(sub(x0, i1), g1), add(sub(y0, j1), g1));
  corner2(s, sum, 0.5, table, hash2(i + 1, j + 1), add(sub(x0, 1), g2), add(sub(y0, 1), g2));
  return scaled(s, sum, 130);
}

/** First and second steps of the walk through the cube, ordered by offset, lower axis first on a tie. */
function walk3(x0: number, y0: number, z0: number): readonly [number, number, number, number, number, number] {
  if (x0 >= y0) {
    if (y0 >= z0) return [1, 0, 0, 1, 1, 0];
    if (x0 >= z0) return [1, 0, 0, 1, 0, 1];
    return [0, 0, 1, 1, 0, 1];
  }
  if (y0 < z0) return [0, 0, 1, 0, 1, 1];
  if (x0 < z0) return [0, 1, 0, 0, 1, 1];
  return [0, 1, 0, 1, 1, 0];
}

function simplex3(s: Scalar, x: number, y: number, z: number): CornerSum {
  const { add, sub, mul, floor } = s;
  const table = atWidth(SIMPLEX_GRAD3, s);
  const radius2 = s.round(0.6);
  const g1 = s.round(G3);
  const g2 = s.round(2 * G3);
  const g3 = s.round(3 * G3);

  const skew = mul(add(add(x, y), z), s.round(F3));
  const i = floor(add(x, skew));
  const j = floor(add(y, skew));
  const k = floor(add(z, skew));
  const unskew = mul(add(add(i, j), k), g1);
  const x0 = add(sub(x, i), unskew);
  const y0 = add(sub(y, j), unskew);
  const z0 = add(sub(z, k), unskew);

  const [i1, j1, k1, i2, j2, k2] = walk3(x0, y0, z0);

  const sum = emptySum(3);
  corner3(s, sum, radius2, table, hash3(i, j, k), x0, y0, z0);
  corner3(
    s, sum, radius2, table, hash3(i + i1, j + j1, k + k1),
    add(sub(x0, i1), g1), add(sub(y0, j1), g1), add(sub(z0, k1), g1),
  );
  corner3(
    s, sum, radius2, table, hash3(i + i2, j + j2, k + k2),
    add(sub(x0, i2), g2), add(sub(y0, j2), g2), add(sub(z0, k2), g2),
  );
  corner3(
    s, sum, radius2, table, hash3(i + 1, j + 1, k + 1),
    add(sub(x0, 1), g3), add(sub(y0, 1), g3), add(sub(z0, 1), g3),
  );
  return scaled(s, sum, 42);
}

function simplex4(s: Scalar, x: number, y: number, z: number, w: number): CornerSum {
  const { add, sub, mul, floor } = s;
  const table = atWidth(SIMPLEX_GRAD4, s);
  const radius2 = s.round(0.6);

  const skew = mul(add(add(add(x, y), z), w), s.round(F4));
  const i = floor(add(x, skew));
  const j = floor(add(y, skew));
  const k = floor(add(z, skew));
  const l = floor(add(w, skew));
  const unskew = mul(add(add(add(i, j), k), l), s.round(G4));
  const x0 = add(sub(x, i), unskew);
  const y0 = add(sub(y, j), unskew);
  const z0 = add(sub(z, k), unskew);
  const w0 = add(sub(w, l), unskew);

  // rank = how many axes this one beats; the lower axis wins a tie
  let rx = 0;
  let ry = 0;
  let rz = 0;
  let rw = 0;
  if (x0 >= y0) rx++; else ry++;
  if (x0 >= z0) rx++; else rz++;
  if (x0 >= w0) rx++; else rw++;
  if (y0 >= z0) ry++; else rz++;
  if (y0 >= w0) ry++; else rw++;
  if (z0 >= w0) rz++; else rw++;

  const sum = emptySum(4);
  corner4(s, sum, radius2, table, hash4(i, j, k, l), x0, y0, z0, w0);
  // corner m has stepped along every axis ranked 4 - m or higher
  for (let m = 1; m <= 3; m++) {
    const a = rx >= 4 - m ? 1 : 0;
    const b = ry >= 4 - m ? 1 : 0;
    const c = rz >= 4 - m ? 1 : 0;
    const d = rw >= 4 - m ? 1 : 0;
    const u = s.round(m * G4);
    corner4(
      s, sum, radius2, table, hash4(i + a, j + b, k + c, l + d),
      add(sub(x0, a), u), add(sub(y0, b), u), add(sub(z0, c), u), add(sub(w0, d), u),
    );
  }
  const u4 = s.round(4 * G4);
  corner4(
    s, sum, radius2, table, hash4(i + 1, j + 1, k + 1, l + 1),
    add(sub(x0, 1), u4), add(sub(y0, 1), u4), add(sub(z0, 1), u4), add(sub(w0, 1), u4),
  );
  return scaled(s, sum, 49);
}

// ── Value ──

export function simplexNoise1(x: number): number;
export function simplexNoise1<P extends Precision>(x: number, scalar: Scalar<P>): number;
export function simplexNoise1(x: number, scalar: Scalar = f64): number {
  return simplex2(scalar, scalar.round(x), 0).value;
}

export function simplexNoise2<P extends Precision>(p: Vec<2, P>): number {
  return simplex2(p.scalar, p.x, p.y).value;
}

export function simplexNoise3<P extends Precision>(p: Vec<3, P>): number {
  return simplex3(p.scalar, p.x, p.y, p.z).value;
}

export function simplexNoise4<P extends Precision>(p: Vec<4, P>): number {
  return simplex4(p.scalar, p.x, p.y, p.z, p.w).value;
}

// ── Value and gradient ──

export function simplexNoiseWithDerivative1(x: number): NoiseDerivative<number>;
export function simplexNoiseWithDerivative1<P extends Precision>(x: number, scalar: Scalar<P>): NoiseDerivative<number>;
export function simplexNoiseWithDerivative1(x: number, scalar: Scalar = f64): NoiseDerivative<number> {
  const { value, gradient } = simplex2(scalar, scalar.round(x), 0);
  return { value, gradient: gradient[0] };
}

function withGradient<N extends Dim, P extends Precision>(p: Vec<N, P>, sum: CornerSum): NoiseDerivative<Vec<N, P>> {
  return { value: sum.value, gradient: new Vec(p.scalar, p.size, sum.gradient) };
}

export function simplexNoiseWithDerivative2<P extends Precision>(p: Vec<2, P>): NoiseDerivative<Vec<2, P>> {
  return withGradient(p, simplex2(p.scalar, p.x, p.y));
}

export function simplexNoiseWithDerivative3<P extends Precision>(p: Vec<3, P>): NoiseDerivative<Vec<3, P>> {
  return withGradient(p, simplex3(p.scalar, p.x, p.y, p.z));
}

export function simplexNoiseWithDerivative4<P extends Precision>(p: Vec<4, P>): NoiseDerivative<Vec<4, P>> {
  return withGradient(p, simplex4(p.scalar, p.x, p.y, p.z, p.w));
}
