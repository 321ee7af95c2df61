// Tileable simplex noise.
//
// Integer periods need a lattice whose period vectors are lattice
// translations, so this variant splits the unskewed integer grid into
// simplices (largest fractional part first, lower axis on a tie) instead
// of the skewed one, and wraps each corner before hashing. Radius² 0.5 is
// the distance from a simplex to the nearest grid point outside it. The
// result lies in approximately [-1, 1].

import { f64, type Precision, type Scalar } from '../scalar/scalar';
import type { Vec } from '../algebra/vector';
import { atWidth, checkPeriods, SIMPLEX_GRAD2, SIMPLEX_GRAD3, SIMPLEX_GRAD4, wrap } from './tables';
import { corner2, corner3, corner4, emptySum, hash2, hash3, hash4, scaled } from './simplex-corner';

const RADIUS2 = 0.5;
const SCALE = 108;

function periodic2(s: Scalar, x: number, y: number, px: number, py: number): number {
  const { sub, floor } = s;
  const table = atWidth(SIMPLEX_GRAD2, s);
  const i = floor(x);
  const j = floor(y);
  const x0 = sub(x, i);
  const y0 = sub(y, j);
  const i1 = x0 >= y0 ? 1 : 0;
  const j1 = 1 - i1;

  const h = (a: number, b: number) => hash2(wrap(i + a, px), wrap(j + b, py));

  const sum = emptySum(2);
  corner2(s, sum, RADIUS2, table, h(0, 0), x0, y0);
  corner2(s, sum, RADIUS2, table, h(i1, j1), sub(x0, i1), sub(y0, j1));
  corner2(s, sum, RADIUS2, table, h(1, 1), sub(x0, 1), sub(y0, 1));
  return scaled(s, sum, SCALE).value;
}

function periodic3(s: Scalar, p: Vec<3, Precision>, period: Vec<3, Precision>): number {
  const { sub, floor } = s;
  const table = atWidth(SIMPLEX_GRAD3, s);
  const i = floor(p.x);
  const j = floor(p.y);
  const k = floor(p.z);
  const x0 = sub(p.x, i);
  const y0 = sub(p.y, j);
  const z0 = sub(p.z, k);

  let rx = 0;
  let ry = 0;
  let rz = 0;
  if (x0 >= y0) rx++; else ry++;
  if (x0 >= z0) rx++; else rz++;
  if (y0 >= z0) ry++; else rz++;

  const h = (a: number, b: number, c: number) =>
    hash3(wrap(i + a, period.x), wrap(j + b, period.y), wrap(k + c, period.z));

  const sum = emptySum(3);
  for (let m = 0; m <= 3; m++) {
    const a = rx >= 3 - m ? 1 : 0;
    const b = ry >= 3 - m ? 1 : 0;
    const c = rz >= 3 - m ? 1 : 0;
    corner3(s, sum, RADIUS2, table, h(a, b, c), sub(x0, a), sub(y0, b), sub(z0, c));
  }
  return scaled(s, sum, SCALE).value;
}

function periodic4(s: Scalar, p: Vec<4, Precision>, period: Vec<4, Precision>): number {
  const { sub, floor } = s;
  const table = atWidth(SIMPLEX_GRAD4, s);
  const i = floor(p.x);
  const j = floor(p.y);
  const k = floor(p.z);
  const l = floor(p.w);
  const x0 = sub(p.x, i);
  const y0 = sub(p.y, j);
  const z0 = sub(p.z, k);
  const w0 = sub(p.w, l);

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

  const h = (a: number, b: number, c: number, d: number) =>
    hash4(wrap(i + a, period.x), wrap(j + b, period.y), wrap(k + c, period.z), wrap(l + d, period.w));

  const sum = emptySum(4);
  for (let m = 0; m <= 4; m++) {
    const a = rx >= 4 - m ? 1 : 0;
    const b = ry >= 4 - m ? 1 : 0;
    const c = rz >= 4 - m ? 1 : 0;
    const d = rw >= 4 - m ? 1 : 0;
    corner4(s, sum, RADIUS2, table, h(a, b, c, d), sub(x0, a), sub(y0, b), sub(z0, c), sub(w0, d));
  }
  return scaled(s, sum, SCALE).value;
}

// ── Public entry points ──

export function periodicSimplexNoise1(x: number, period: number): number;
export function periodicSimplexNoise1<P extends Precision>(x: number, period: number, scalar: Scalar<P>): number;
export function periodicSimplexNoise1(x: number, period: number, scalar: Scalar = f64): number {
  checkPeriods('simplex', [period]);
  return periodic2(scalar, scalar.round(x), 0, period, period);
}

export function periodicSimplexNoise2<P extends Precision>(p: Vec<2, P>, period: Vec<2, Precision>): number {
  checkPeriods('simplex', period.toArray());
  return periodic2(p.scalar, p.x, p.y, period.x, period.y);
}

export function periodicSimplexNoise3<P extends Precision>(p: Vec<3, P>, period: Vec<3, Precision>): number {
  checkPeriods('simplex', period.toArray());
  return periodic3(p.scalar, p, period);
}

export function periodicSimplexNoise4<P extends Precision>(p: Vec<4, P>, period: Vec<4, Precision>): number {
  checkPeriods('simplex', period.toArray());
  return periodic4(p.scalar, p, period);
}
