// GLSL matrix functions in free-function form

import type { Precision } from '../scalar/scalar';
import type { Dim, Vec } from '../algebra/vector';
import { Mat } from '../algebra/matrix';

export function matrixCompMult<C extends Dim, R extends Dim, P extends Precision>(
  a: Mat<C, R, P>,
  b: Mat<NoInfer<C>, NoInfer<R>, NoInfer<P>>,
): Mat<C, R, P> {
  return a.compMult(b);
}

/** c · rᵀ: a matrix with `r.size` columns, column j being c·r[j]. */
export function outerProduct<C extends Dim, R extends Dim, P extends Precision>(
  c: Vec<R, P>,
  r: Vec<C, NoInfer<P>>,
): Mat<C, R, P> {
  const columns = r.toArray().map((k) => c.mul(k));
  return new Mat(c.scalar, r.size, c.size, columns);
}

export function transpose<C extends Dim, R extends Dim, P extends Precision>(m: Mat<C, R, P>): Mat<R, C, P> {
  return m.transpose();
}

export function determinant<N extends Dim, P extends Precision>(m: Mat<N, NoInfer<N>, P>): number {
  return m.determinant();
}

export function inverse<N extends Dim, P extends Precision>(m: Mat<N, NoInfer<N>, P>): Mat<N, N, P> {
  return m.inverse();
}

export function trace<N extends Dim, P extends Precision>(m: Mat<N, NoInfer<N>, P>): number {
  return m.trace();
}

/** |det(m)| > epsilon, with the width's machine epsilon by default. */
export function isInvertible<N extends Dim, P extends Precision>(
  m: Mat<N, NoInfer<N>, P>,
  epsilon: number = m.scalar.epsilon,
): boolean {
  return Math.abs(m.determinant()) > epsilon;
}
