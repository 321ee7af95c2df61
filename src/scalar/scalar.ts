// Scalar widths: the capability contract every vector, matrix and noise
// routine is written against. Arithmetic runs on the host double and is
// quantised to the width after each operation.

export type Precision = 'f32' | 'f64';

export interface Scalar<P extends Precision = Precision> {
  readonly precision: P;
  /** Gap between 1 and the next representable value at this width. */
  readonly epsilon: number;
  round(x: number): number;
  add(a: number, b: number): number;
  sub(a: number, b: number): number;
  mul(a: number, b: number): number;
  div(a: number, b: number): number;
  abs(x: number): number;
  floor(x: number): number;
  /** x - floor(x) */
  fract(x: number): number;
  sqrt(x: number): number;
  pow(x: number, y: number): number;
  min(a: number, b: number): number;
  max(a: number, b: number): number;
  /** Total order: -1, 0 or 1. */
  compare(a: number, b: number): number;
}

function createScalar<P extends Precision>(
  precision: P,
  epsilon: number,
  round: (x: number) => number,
): Scalar<P> {
  return Object.freeze({
    precision,
    epsilon,
    round,
    add: (a: number, b: number) => round(a + b),
    sub: (a: number, b: number) => round(a - b),
    mul: (a: number, b: number) => round(a * b),
    div: (a: number, b: number) => round(a / b),
    abs: (x: number) => round(Math.abs(x)),
    floor: (x: number) => round(Math.floor(x)),
    fract: (x: number) => round(x - Math.floor(x)),
    sqrt: (x: number) => round(Math.sqrt(x)),
    pow: (x: number, y: number) => round(Math.pow(x, y)),
    min: (a: number, b: number) => round(Math.min(a, b)),
    max: (a: number, b: number) => round(Math.max(a, b)),
    compare: (a: number, b: number) => (a < b ? -1 : a > b ? 1 : 0),
  });
}

/** IEEE-754 binary64, the host's native width. */
export const f64: Scalar<'f64'> = createScalar('f64', Number.EPSILON, (x) => x);

/** IEEE-754 binary32, emulated with Math.fround. */
export const f32: Scalar<'f32'> = createScalar('f32', 2 ** -23, Math.fround);
