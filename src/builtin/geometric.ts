// GLSL geometric functions in free-function form.
// The first operand fixes the size and width; the rest must match it.

import type { Precision } from '../scalar/scalar';
import type { Dim, Vec } from '../algebra/vector';

export function dot<N extends Dim, P extends Precision>(a: Vec<N, P>, b: Vec<NoInfer<N>, NoInfer<P>>): number {
  return a.dot(b);
}

export function length<N extends Dim, P extends Precision>(v: Vec<N, P>): number {
  return v.length();
}

export function lengthSquared<N extends Dim, P extends Precision>(v: Vec<N, P>): number {
  return v.lengthSquared();
}

export function distance<N extends Dim, P extends Precision>(a: Vec<N, P>, b: Vec<NoInfer<N>, NoInfer<P>>): number {
  return a.distance(b);
}

export function cross<P extends Precision>(a: Vec<3, P>, b: Vec<3, NoInfer<P>>): Vec<3, P> {
  return a.cross(b);
}

export function normalize<N extends Dim, P extends Precision>(v: Vec<N, P>): Vec<N, P> {
  return v.normalize();
}

/** `n` if dot(nref, i) < 0, otherwise -n. */
export function faceforward<N extends Dim, P extends Precision>(
  n: Vec<N, P>,
  i: Vec<NoInfer<N>, NoInfer<P>>,
  nref: Vec<NoInfer<N>, NoInfer<P>>,
): Vec<N, P> {
  return n.faceforward(i, nref);
}

/** i - 2·dot(n, i)·n; `n` should be normalized. */
export function reflect<N extends Dim, P extends Precision>(i: Vec<N, P>, n: Vec<NoInfer<N>, NoInfer<P>>): Vec<N, P> {
  return i.reflect(n);
}

export function refract<N extends Dim, P extends Precision>(
  i: Vec<N, P>,
  n: Vec<NoInfer<N>, NoInfer<P>>,
  eta: number,
): Vec<N, P> {
  return i.refract(n, eta);
}

export function mix<N extends Dim, P extends Precision>(
  a: Vec<N, P>,
  b: Vec<NoInfer<N>, NoInfer<P>>,
  t: Vec<NoInfer<N>, NoInfer<P>> | number,
): Vec<N, P> {
  return a.mix(b, t);
}

/** Projection of `v` onto `onto`. */
export function projection<N extends Dim, P extends Precision>(
  v: Vec<N, P>,
  onto: Vec<NoInfer<N>, NoInfer<P>>,
): Vec<N, P> {
  return v.projection(onto);
}

/** |dot(a, b)| <= epsilon, with the width's machine epsilon by default. */
export function isPerpendicular<N extends Dim, P extends Precision>(
  a: Vec<N, P>,
  b: Vec<NoInfer<N>, NoInfer<P>>,
  epsilon: number = a.scalar.epsilon,
): boolean {
  return Math.abs(a.dot(b)) <= epsilon;
}
