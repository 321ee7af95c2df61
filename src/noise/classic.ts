// Classic (Perlin) gradient noise, 1D–4D, with periodic variants.
// Each dimension has its own evaluator; the periodic forms only differ in
// how the lattice indices are produced. All arithmetic runs at the width of
// the input's Scalar.

import { f64, type Precision, type Scalar } from '../scalar/scalar';
import type { Vec } from '../algebra/vector';
import { checkPeriods, GRAD1, GRAD2, GRAD3, GRAD4, PERM, wrap } from './tables';

function fade(s: Scalar, t: number): number {
  const { add, sub, mul } = s;
  return mul(mul(mul(t, t), t), add(mul(t, sub(mul(t, 6), 15)), 10));
}

function lerp(s: Scalar, t: number, a: number, b: number): number {
  return s.add(a, s.mul(t, s.sub(b, a)));
}

function grad1(s: Scalar, hash: number, x: number): number {
  return s.mul(GRAD1[hash & 15], x);
}

function grad2(s: Scalar, hash: number, x: number, y: number): number {
  const g = GRAD2[hash & 7];
  return s.add(s.mul(g[0], x), s.mul(g[1], y));
}

function grad3(s: Scalar, hash: number, x: number, y: number, z: number): number {
  const { add, mul } = s;
  const g = GRAD3[hash & 15];
  return add(add(mul(g[0], x), mul(g[1], y)), mul(g[2], z));
}

function grad4(s: Scalar, hash: number, x: number, y: number, z: number, w: number): number {
  const { add, mul } = s;
  const g = GRAD4[hash & 31];
  return add(add(add(mul(g[0], x), mul(g[1], y)), mul(g[2], z)), mul(g[3], w));
}

/** Lattice cell of one axis: both corner indices in 0..255 and the offset into the cell. */
interface Cell {
  i0: number;
  i1: number;
  f: number;
}

function cell(s: Scalar, x: number): Cell {
  const i = s.floor(x);
  return { i0: i & 255, i1: (i + 1) & 255, f: s.sub(x, i) };
}

function periodicCell(s: Scalar, x: number, period: number): Cell {
  const i = s.floor(x);
  return { i0: wrap(i, period) & 255, i1: wrap(i + 1, period) & 255, f: s.sub(x, i) };
}

// ── Per-dimension evaluators ──

function classic1(s: Scalar, x: Cell): number {
  const n0 = grad1(s, PERM[x.i0], x.f);
  const n1 = grad1(s, PERM[x.i1], s.sub(x.f, 1));
  return s.mul(s.round(0.188), lerp(s, fade(s, x.f), n0, n1));
}

function classic2(s: Scalar, x: Cell, y: Cell): number {
  const fx1 = s.sub(x.f, 1);
  const fy1 = s.sub(y.f, 1);

  const n00 = grad2(s, PERM[x.i0 + PERM[y.i0]], x.f, y.f);
  const n01 = grad2(s, PERM[x.i0 + PERM[y.i1]], x.f, fy1);
  const n10 = grad2(s, PERM[x.i1 + PERM[y.i0]], fx1, y.f);
  const n11 = grad2(s, PERM[x.i1 + PERM[y.i1]], fx1, fy1);

  const t = fade(s, y.f);
  const n0 = lerp(s, t, n00, n01);
  const n1 = lerp(s, t, n10, n11);
  return s.mul(s.round(0.507), lerp(s, fade(s, x.f), n0, n1));
}

function classic3(s: Scalar, x: Cell, y: Cell, z: Cell): number {
  const fx1 = s.sub(x.f, 1);
  const fy1 = s.sub(y.f, 1);
  const fz1 = s.sub(z.f, 1);

  const h = (ix: number, iy: number, iz: number) => PERM[ix + PERM[iy + PERM[iz]]];
  const mix = (t: number, a: number, b: number) => lerp(s, t, a, b);

  const r = fade(s, z.f);
  const t = fade(s, y.f);

  const n000 = grad3(s, h(x.i0, y.i0, z.i0), x.f, y.f, z.f);
  const n001 = grad3(s, h(x.i0, y.i0, z.i1), x.f, y.f, fz1);
  const n010 = grad3(s, h(x.i0, y.i1, z.i0), x.f, fy1, z.f);
  const n011 = grad3(s, h(x.i0, y.i1, z.i1), x.f, fy1, fz1);
  const nx0 = mix(t, mix(r, n000, n001), mix(r, n010, n011));

  const n100 = grad3(s, h(x.i1, y.i0, z.i0), fx1, y.f, z.f);
  const n101 = grad3(s, h(x.i1, y.i0, z.i1), fx1, y.f, fz1);
  const n110 = grad3(s, h(x.i1, y.i1, z.i0), fx1, fy1, z.f);
  const n111 = grad3(s, h(x.i1, y.i1, z.i1), fx1, fy1, fz1);
  const nx1 = mix(t, mix(r, n100, n101), mix(r, n110, n111));

  return s.mul(s.round(0.936), mix(fade(s, x.f), nx0, nx1));
}

function classic4(s: Scalar, x: Cell, y: Cell, z: Cell, w: Cell): number {
  const fx1 = s.sub(x.f, 1);
  const fy1 = s.sub(y.f, 1);
  const fz1 = s.sub(z.f, 1);
  const fw1 = s.sub(w.f, 1);

  const h = (ix: number, iy: number, iz: number, iw: number) => PERM[ix + PERM[iy + PERM[iz + PERM[iw]]]];
  const mix = (t: number, a: number, b: number) => lerp(s, t, a, b);

  const q = fade(s, w.f);
  const r = fade(s, z.f);
  const t = fade(s, y.f);

  // Blends the 16 corners sharing one x index down to a single value.
  const slab = (ix: number, fx: number): number => {
    const n0000 = grad4(s, h(ix, y.i0, z.i0, w.i0), fx, y.f, z.f, w.f);
    const n0001 = grad4(s, h(ix, y.i0, z.i0, w.i1), fx, y.f, z.f, fw1);
    const n0010 = grad4(s, h(ix, y.i0, z.i1, w.i0), fx, y.f, fz1, w.f);
    const n0011 = grad4(s, h(ix, y.i0, z.i1, w.i1), fx, y.f, fz1, fw1);
    const n0100 = grad4(s, h(ix, y.i1, z.i0, w.i0), fx, fy1, z.f, w.f);
    const n0101 = grad4(s, h(ix, y.i1, z.i0, w.i1), fx, fy1, z.f, fw1);
    const n0110 = grad4(s, h(ix, y.i1, z.i1, w.i0), fx, fy1, fz1, w.f);
    const n0111 = grad4(s, h(ix, y.i1, z.i1, w.i1), fx, fy1, fz1, fw1);
    const ny0 = mix(r, mix(q, n0000, n0001), mix(q, n0010, n0011));
    const ny1 = mix(r, mix(q, n0100, n0101), mix(q, n0110, n0111));
    return mix(t, ny0, ny1);
  };

  return s.mul(s.round(0.87), mix(fade(s, x.f), slab(x.i0, x.f), slab(x.i1, fx1)));
}

// ── Public entry points ──

export function classicNoise1(x: number): number;
export function classicNoise1<P extends Precision>(x: number, scalar: Scalar<P>): number;
export function classicNoise1(x: number, scalar: Scalar = f64): number {
  return classic1(scalar, cell(scalar, scalar.round(x)));
}

export function classicNoise2<P extends Precision>(p: Vec<2, P>): number {
  const s = p.scalar;
  return classic2(s, cell(s, p.x), cell(s, p.y));
}

export function classicNoise3<P extends Precision>(p: Vec<3, P>): number {
  const s = p.scalar;
  return classic3(s, cell(s, p.x), cell(s, p.y), cell(s, p.z));
}

export function classicNoise4<P extends Precision>(p: Vec<4, P>): number {
  const s = p.scalar;
  return classic4(s, cell(s, p.x), cell(s, p.y), cell(s, p.z), cell(s, p.w));
}

/** Classic noise repeating every `period` units along x. */
export function periodicClassicNoise1(x: number, period: number): number;
export function periodicClassicNoise1<P extends Precision>(x: number, period: number, scalar: Scalar<P>): number;
export function periodicClassicNoise1(x: number, period: number, scalar: Scalar = f64): number {
  checkPeriods('classic', [period]);
  return classic1(scalar, periodicCell(scalar, scalar.round(x), period));
}

export function periodicClassicNoise2<P extends Precision>(p: Vec<2, P>, period: Vec<2, Precision>): number {
  checkPeriods('classic', period.toArray());
  const s = p.scalar;
  return classic2(s, periodicCell(s, p.x, period.x), periodicCell(s, p.y, period.y));
}

export function periodicClassicNoise3<P extends Precision>(p: Vec<3, P>, period: Vec<3, Precision>): number {
  checkPeriods('classic', period.toArray());
  const s = p.scalar;
  return classic3(s, periodicCell(s, p.x, period.x), periodicCell(s, p.y, period.y), periodicCell(s, p.z, period.z));
}

export function periodicClassicNoise4<P extends Precision>(p: Vec<4, P>, period: Vec<4, Precision>): number {
  checkPeriods('classic', period.toArray());
  const s = p.scalar;
  return classic4(
    s,
    periodicCell(s, p.x, period.x),
    periodicCell(s, p.y, period.y),
    periodicCell(s, p.z, period.z),
    periodicCell(s, p.w, period.w),
  );
}
