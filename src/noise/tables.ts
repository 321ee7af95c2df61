// ── Permutation and gradient tables ──
// Built once at module load and frozen; shared by every noise evaluator.

import lattice from './lattice.json';
import type { Scalar } from '../scalar/scalar';
import { warnOnce } from '../utils/warn';

function frozen<T>(values: T[]): readonly T[] {
  return Object.freeze(values);
}

// ── Classic lattice ──

/** Perlin's permutation of 0..255, repeated so `PERM[i + PERM[j]]` never overflows. */
export const PERM: readonly number[] = frozen([...lattice.permutation, ...lattice.permutation]);

export const GRAD1: readonly number[] = frozen(lattice.grad1);
export const GRAD2: readonly (readonly number[])[] = frozen(lattice.grad2.map(frozen));
export const GRAD3: readonly (readonly number[])[] = frozen(lattice.grad3.map(frozen));
export const GRAD4: readonly (readonly number[])[] = frozen(lattice.grad4.map(frozen));

// ── Simplex lattice ──

export function mod289(x: number): number {
  return x - Math.floor(x / 289) * 289;
}

/** (34x² + x) mod 289 for x in 0..288. */
export const PERM289: readonly number[] = frozen(
  Array.from({ length: 289 }, (_, i) => (34 * i * i + i) % 289),
);

/** Permutation polynomial for any integer argument. */
export function perm289(x: number): number {
  return PERM289[mod289(x)];
}

function taylorInvSqrt(r: number): number {
  return 1.79284291400159 - 0.85373472095314 * r;
}

/** Pre-normalizes a gradient and appends its components to `out`. */
function pushNormalized(out: number[], g: number[]): void {
  let r = 0;
  for (const c of g) r += c * c;
  const k = taylorInvSqrt(r);
  for (const c of g) out.push(c * k);
}

/** 41 points along a line folded onto a diamond. Two entries per hash. */
export const SIMPLEX_GRAD2: readonly number[] = frozen(
  (() => {
    const out: number[] = [];
    for (let p = 0; p < 289; p++) {
      const x = (2 * (p % 41)) / 41 - 1;
      const h = Math.abs(x) - 0.5;
      const a0 = x - Math.floor(x + 0.5);
      pushNormalized(out, [a0, h]);
    }
    return out;
  })(),
);

/** 7×7 grid folded onto an octahedron. Three entries per hash. */
export const SIMPLEX_GRAD3: readonly number[] = frozen(
  (() => {
    const out: number[] = [];
    for (let p = 0; p < 289; p++) {
      const j = p % 49;
      let x = (Math.floor(j / 7) * 2) / 7 - 13 / 14;
      let y = ((j % 7) * 2) / 7 - 13 / 14;
      const h = 1 - Math.abs(x) - Math.abs(y);
      if (h <= 0) {
        x -= x < 0 ? -1 : 1;
        y -= y < 0 ? -1 : 1;
      }
      pushNormalized(out, [x, y, h]);
    }
    return out;
  })(),
);

/** 7×7×6 grid folded onto the 4-cross polytope. Four entries per hash. */
export const SIMPLEX_GRAD4: readonly number[] = frozen(
  (() => {
    const out: number[] = [];
    for (let j = 0; j < 289; j++) {
      const xyz = [Math.floor(j / 42) / 7 - 1, Math.floor((j % 49) / 7) / 7 - 1, (j % 7) / 7 - 1];
      const w = 1.5 - Math.abs(xyz[0]) - Math.abs(xyz[1]) - Math.abs(xyz[2]);
      const g = w < 0 ? xyz.map((c) => (c < 0 ? c + 1 : c - 1)) : xyz;
      pushNormalized(out, [...g, w]);
    }
    return out;
  })(),
);

const narrowed = new WeakMap<readonly number[], readonly number[]>();

/** `table` with every entry rounded to the width of `scalar`. */
export function atWidth(table: readonly number[], scalar: Scalar): readonly number[] {
  if (scalar.precision === 'f64') return table;
  let out = narrowed.get(table);
  if (out === undefined) {
    out = frozen(table.map(scalar.round));
    narrowed.set(table, out);
  }
  return out;
}

// ── Periods ──

export type NoiseFamily = 'classic' | 'simplex';

const MAX_PERIOD: Record<NoiseFamily, number> = { classic: 256, simplex: 289 };

/**
 * Floored modulo of a lattice coordinate. Negative coordinates tile too;
 * a period below 1 or not finite collapses the axis onto 0.
 */
export function wrap(i: number, period: number): number {
  const p = Math.floor(period);
  if (!Number.isFinite(p) || p < 1) return 0;
  return i - Math.floor(i / p) * p;
}

/** Warns once per family when a period falls outside the alias-free range. */
export function checkPeriods(family: NoiseFamily, periods: readonly number[]): void {
  const max = MAX_PERIOD[family];
  for (const period of periods) {
    if (!Number.isInteger(period) || period < 1 || period > max) {
      warnOnce(
        `${family}-period`,
        `${family} noise period ${period} is outside 1..${max}; the pattern will alias`,
      );
      return;
    }
  }
}
