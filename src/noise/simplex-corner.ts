// Corner terms shared by the skewed and the periodic simplex evaluators.
//
// A corner at offset d with gradient g adds t⁴(g·d) to the value and
// t⁴g − 8t³(g·d)d to the gradient, where t = r² − |d|² and only t > 0
// counts.

import type { Scalar } from '../scalar/scalar';
import { perm289 } from './tables';

/** Running sum over the corners of one simplex. */
export interface CornerSum {
  value: number;
  gradient: number[];
}

export function emptySum(size: number): CornerSum {
  return { value: 0, gradient: new Array<number>(size).fill(0) };
}

/** Multiplies the sum and its gradient by the normalization factor. */
export function scaled(s: Scalar, sum: CornerSum, scale: number): CornerSum {
  const k = s.round(scale);
  return { value: s.mul(k, sum.value), gradient: sum.gradient.map((c) => s.mul(k, c)) };
}

// ── Hashes ──
// Folded from the last axis: perm(perm(j) + i) in 2D.

export function hash2(i: number, j: number): number {
  return perm289(perm289(j) + i);
}

export function hash3(i: number, j: number, k: number): number {
  return perm289(perm289(perm289(k) + j) + i);
}

export function hash4(i: number, j: number, k: number, l: number): number {
  return perm289(perm289(perm289(perm289(l) + k) + j) + i);
}

// ── Per-dimension corner terms ──

export function corner2(
  s: Scalar,
  sum: CornerSum,
  radius2: number,
  table: readonly number[],
  hash: number,
  x: number,
  y: number,
): void {
  const { add, sub, mul } = s;
  const t = sub(radius2, add(mul(x, x), mul(y, y)));
  if (t <= 0) return;

  const gx = table[hash * 2];
  const gy = table[hash * 2 + 1];
  const dot = add(mul(gx, x), mul(gy, y));

  const t2 = mul(t, t);
  const t4 = mul(t2, t2);
  const k = mul(mul(8, mul(t2, t)), dot);

  const g = sum.gradient;
  sum.value = add(sum.value, mul(t4, dot));
  g[0] = add(g[0], sub(mul(t4, gx), mul(k, x)));
  g[1] = add(g[1], sub(mul(t4, gy), mul(k, y)));
}

export function corner3(
  s: Scalar,
  sum: CornerSum,
  radius2: number,
  table: readonly number[],
  hash: number,
  x: number,
  y: number,
  z: number,
): void {
  const { add, sub, mul } = s;
  const t = sub(radius2, add(add(mul(x, x), mul(y, y)), mul(z, z)));
  if (t <= 0) return;

  const gx = table[hash * 3];
  const gy = table[hash * 3 + 1];
  const gz = table[hash * 3 + 2];
  const dot = add(add(mul(gx, x), mul(gy, y)), mul(gz, z));

  const t2 = mul(t, t);
  const t4 = mul(t2, t2);
  const k = mul(mul(8, mul(t2, t)), dot);

  const g = sum.gradient;
  sum.value = add(sum.value, mul(t4, dot));
  g[0] = add(g[0], sub(mul(t4, gx), mul(k, x)));
  g[1] = add(g[1], sub(mul(t4, gy), mul(k, y)));
  g[2] = add(g[2], sub(mul(t4, gz), mul(k, z)));
}

export function corner4(
  s: Scalar,
  sum: CornerSum,
  radius2: number,
  table: readonly number[],
  hash: number,
  x: number,
  y: number,
  z: number,
  w: number,
): void {
  const { add, sub, mul } = s;
  const t = sub(radius2, add(add(add(mul(x, x), mul(y, y)), mul(z, z)), mul(w, w)));
  if (t <= 0) return;

  const gx = table[hash * 4];
  const gy = table[hash * 4 + 1];
  const gz = table[hash * 4 + 2];
  const gw = table[hash * 4 + 3];
  const dot = add(add(add(mul(gx, x), mul(gy, y)), mul(gz, z)), mul(gw, w));

  const t2 = mul(t, t);
  const t4 = mul(t2, t2);
  const k = mul(mul(8, mul(t2, t)), dot);

  const g = sum.gradient;
  sum.value = add(sum.value, mul(t4, dot));
  g[0] = add(g[0], sub(mul(t4, gx), mul(k, x)));
  g[1] = add(g[1], sub(mul(t4, gy), mul(k, y)));
  g[2] = add(g[2], sub(mul(t4, gz), mul(k, z)));
  g[3] = add(g[3], sub(mul(t4, gw), mul(k, w)));
}
