// 4x4 transform builders, right-handed, OpenGL clip space (z in [-1, 1])

import { f64, type Precision, type Scalar } from '../scalar/scalar';
import { matFromColumnMajor, type Mat } from './matrix';
import type { Vec } from './vector';

export type Mat4<P extends Precision = Precision> = Mat<4, 4, P>;

/** m · T(v): appends a translation by v. */
export function translate<P extends Precision>(m: Mat4<P>, v: Vec<3, P>): Mat4<P> {
  const s = m.scalar;
  const out = m.toArray();
  for (let r = 0; r < 4; r++) {
    out[12 + r] = s.add(
      s.add(s.mul(m.get(0, r), v.x), s.mul(m.get(1, r), v.y)),
      s.add(s.mul(m.get(2, r), v.z), m.get(3, r)),
    );
  }
  return matFromColumnMajor(4, 4, out, s);
}

/** m · S(v): scales the first three columns by the components of v. */
export function scale<P extends Precision>(m: Mat4<P>, v: Vec<3, P>): Mat4<P> {
  const s = m.scalar;
  const out = m.toArray();
  const k = v.toArray();
  for (let c = 0; c < 3; c++) {
    for (let r = 0; r < 4; r++) out[c * 4 + r] = s.mul(out[c * 4 + r], k[c]);
  }
  return matFromColumnMajor(4, 4, out, s);
}

/** m · R: appends a rotation of `angle` radians about `axis` (normalized here). */
export function rotate<P extends Precision>(m: Mat4<P>, angle: number, axis: Vec<3, P>): Mat4<P> {
  const s = m.scalar;
  const c = s.round(Math.cos(angle));
  const sn = s.round(Math.sin(angle));
  const a = axis.normalize().toArray();
  const t = a.map((ai) => s.mul(s.sub(1, c), ai));

  // rot[j][i]: column j, row i of the 3x3 rotation
  const rot = [
    [s.add(c, s.mul(t[0], a[0])), s.add(s.mul(t[0], a[1]), s.mul(sn, a[2])), s.sub(s.mul(t[0], a[2]), s.mul(sn, a[1]))],
    [s.sub(s.mul(t[1], a[0]), s.mul(sn, a[2])), s.add(c, s.mul(t[1], a[1])), s.add(s.mul(t[1], a[2]), s.mul(sn, a[0]))],
    [s.add(s.mul(t[2], a[0]), s.mul(sn, a[1])), s.sub(s.mul(t[2], a[1]), s.mul(sn, a[0])), s.add(c, s.mul(t[2], a[2]))],
  ];

  const out = m.toArray();
  for (let j = 0; j < 3; j++) {
    for (let r = 0; r < 4; r++) {
      let sum = 0;
      for (let i = 0; i < 3; i++) sum = s.add(sum, s.mul(m.get(i, r), rot[j][i]));
      out[j * 4 + r] = sum;
    }
  }
  return matFromColumnMajor(4, 4, out, s);
}

/** Perspective projection with a vertical field of view in radians. */
export function perspective(fovY: number, aspect: number, near: number, far: number): Mat4<'f64'>;
export function perspective<P extends Precision>(
  fovY: number, aspect: number, near: number, far: number, scalar: Scalar<P>,
): Mat4<P>;
export function perspective(fovY: number, aspect: number, near: number, far: number, scalar: Scalar = f64): Mat4 {
  const out = new Array<number>(16).fill(0);
  const f = 1 / Math.tan(fovY / 2);
  const fn = far - near;

  out[0] = f / aspect;
  out[5] = f;
  out[10] = -(far + near) / fn;
  out[11] = -1;
  out[14] = -(2 * far * near) / fn;

  return matFromColumnMajor(4, 4, out, scalar);
}

/** Orthographic projection of the box [left, right] × [bottom, top] × [near, far]. */
export function ortho(left: number, right: number, bottom: number, top: number, near: number, far: number): Mat4<'f64'>;
export function ortho<P extends Precision>(
  left: number, right: number, bottom: number, top: number, near: number, far: number, scalar: Scalar<P>,
): Mat4<P>;
export function ortho(
  left: number, right: number, bottom: number, top: number, near: number, far: number, scalar: Scalar = f64,
): Mat4 {
  const out = new Array<number>(16).fill(0);
  const rl = right - left;
  const tb = top - bottom;
  const fn = far - near;

  out[0] = 2 / rl;
  out[5] = 2 / tb;
  out[10] = -2 / fn;
  out[12] = -(right + left) / rl;
  out[13] = -(top + bottom) / tb;
  out[14] = -(far + near) / fn;
  out[15] = 1;

  return matFromColumnMajor(4, 4, out, scalar);
}

/** View matrix for a camera at `eye` looking at `center`. */
export function lookAt<P extends Precision>(eye: Vec<3, P>, center: Vec<3, P>, up: Vec<3, P>): Mat4<P> {
  const f = center.sub(eye).normalize();
  const side = f.cross(up).normalize();
  const u = side.cross(f);

  const out = [
    side.x, u.x, -f.x, 0,
    side.y, u.y, -f.y, 0,
    side.z, u.z, -f.z, 0,
    -side.dot(eye), -u.dot(eye), f.dot(eye), 1,
  ];
  return matFromColumnMajor(4, 4, out, eye.scalar);
}
