import { f64, type Precision, type Scalar } from '../scalar/scalar';

export type Dim = 2 | 3 | 4;

export type AnyVec = Vec<Dim, Precision>;

/**
 * Fixed-size vector of N components at width P.
 *
 * Instances are immutable: every operation returns a new vector whose
 * components have been rounded through `scalar`. The receiver fixes N and P,
 * so combining vectors of different sizes does not type-check.
 */
export class Vec<N extends Dim = Dim, P extends Precision = Precision> {
  readonly scalar: Scalar<P>;
  readonly size: N;
  private readonly components: readonly number[];

  constructor(scalar: Scalar<P>, size: N, components: ArrayLike<number>) {
    if (components.length !== size) {
      throw new RangeError(`Vector of size ${size} built from ${components.length} components`);
    }
    const values = new Array<number>(size);
    for (let i = 0; i < size; i++) values[i] = scalar.round(components[i]);
    this.scalar = scalar;
    this.size = size;
    this.components = Object.freeze(values);
  }

  get(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Component ${index} out of range for vector of size ${this.size}`);
    }
    return this.components[index];
  }

  get x(): number { return this.get(0); }
  get y(): number { return this.get(1); }
  get z(): number { return this.get(2); }
  get w(): number { return this.get(3); }

  toArray(): number[] {
    return this.components.slice();
  }

  // ── Elementwise arithmetic ──

  add(other: Vec<N, P> | number): Vec<N, P> {
    return this.zip(other, this.scalar.add);
  }

  sub(other: Vec<N, P> | number): Vec<N, P> {
    return this.zip(other, this.scalar.sub);
  }

  mul(other: Vec<N, P> | number): Vec<N, P> {
    return this.zip(other, this.scalar.mul);
  }

  div(other: Vec<N, P> | number): Vec<N, P> {
    return this.zip(other, this.scalar.div);
  }

  neg(): Vec<N, P> {
    return this.map((c) => -c);
  }

  /** Lifts a scalar function over every component. */
  map(fn: (component: number, index: number) => number): Vec<N, P> {
    return new Vec(this.scalar, this.size, this.components.map(fn));
  }

  floor(): Vec<N, P> {
    return this.map(this.scalar.floor);
  }

  fract(): Vec<N, P> {
    return this.map(this.scalar.fract);
  }

  abs(): Vec<N, P> {
    return this.map(this.scalar.abs);
  }

  /** a + t * (b - a), with a scalar or per-component t. */
  mix(other: Vec<N, P>, t: Vec<N, P> | number): Vec<N, P> {
    const s = this.scalar;
    const out = new Array<number>(this.size);
    for (let i = 0; i < this.size; i++) {
      const ti = typeof t === 'number' ? s.round(t) : t.components[i];
      const a = this.components[i];
      out[i] = s.add(a, s.mul(ti, s.sub(other.components[i], a)));
    }
    return new Vec(s, this.size, out);
  }

  // ── Geometry ──

  dot(other: Vec<N, P>): number {
    const s = this.scalar;
    let sum = 0;
    for (let i = 0; i < this.size; i++) {
      sum = s.add(sum, s.mul(this.components[i], other.components[i]));
    }
    return sum;
  }

  /** Right-handed cross product, defined for 3-component vectors only. */
  cross(this: Vec<3, P>, other: Vec<3, P>): Vec<3, P> {
    const s = this.scalar;
    const [ax, ay, az] = this.components;
    const [bx, by, bz] = other.components;
    return new Vec(s, 3, [
      s.sub(s.mul(ay, bz), s.mul(by, az)),
      s.sub(s.mul(az, bx), s.mul(bz, ax)),
      s.sub(s.mul(ax, by), s.mul(bx, ay)),
    ]);
  }

  lengthSquared(): number {
    return this.dot(this);
  }

  length(): number {
    return this.scalar.sqrt(this.dot(this));
  }

  distance(other: Vec<N, P>): number {
    return this.sub(other).length();
  }

  /** Unit vector in the same direction; NaN components for a zero vector. */
  normalize(): Vec<N, P> {
    return this.div(this.length());
  }

  /** Returns this when dot(nref, incident) < 0, otherwise its negation. */
  faceforward(incident: Vec<N, P>, nref: Vec<N, P>): Vec<N, P> {
    return nref.dot(incident) < 0 ? this : this.neg();
  }

  /** Reflects this incident direction about the normalized `normal`. */
  reflect(normal: Vec<N, P>): Vec<N, P> {
    const d = normal.dot(this);
    return this.sub(normal.mul(d + d));
  }

  /**
   * Refraction direction for this normalized incident vector, surface normal
   * and ratio of indices `eta`. Total internal reflection yields zero.
   */
  refract(normal: Vec<N, P>, eta: number): Vec<N, P> {
    const s = this.scalar;
    const d = normal.dot(this);
    const k = s.sub(1, s.mul(s.mul(eta, eta), s.sub(1, s.mul(d, d))));
    if (k < 0) return this.map(() => 0);
    return this.mul(eta).sub(normal.mul(s.add(s.mul(eta, d), s.sqrt(k))));
  }

  /** Projects this onto `onto`; projecting onto a zero vector gives zero. */
  projection(onto: Vec<N, P>): Vec<N, P> {
    const sq = onto.lengthSquared();
    if (sq === 0) return this.map(() => 0);
    return onto.mul(this.scalar.div(this.dot(onto), sq));
  }

  // ── Comparison ──

  equals(other: Vec<N, P>): boolean {
    for (let i = 0; i < this.size; i++) {
      if (this.components[i] !== other.components[i]) return false;
    }
    return true;
  }

  isCloseTo(other: Vec<N, P>, maxDiff: number): boolean {
    for (let i = 0; i < this.size; i++) {
      if (!(Math.abs(this.components[i] - other.components[i]) <= maxDiff)) return false;
    }
    return true;
  }

  toString(): string {
    return `vec${this.size}(${this.components.join(', ')})`;
  }

  private zip(other: Vec<N, P> | number, op: (a: number, b: number) => number): Vec<N, P> {
    const out = new Array<number>(this.size);
    const k = typeof other === 'number' ? this.scalar.round(other) : 0;
    for (let i = 0; i < this.size; i++) {
      out[i] = op(this.components[i], typeof other === 'number' ? k : other.components[i]);
    }
    return new Vec(this.scalar, this.size, out);
  }
}

// ── Constructors ──

export function vec2(x: number, y: number): Vec<2, 'f64'>;
export function vec2<P extends Precision>(x: number, y: number, scalar: Scalar<P>): Vec<2, P>;
export function vec2(x: number, y: number, scalar: Scalar = f64): Vec<2> {
  return new Vec(scalar, 2, [x, y]);
}

export function vec3(x: number, y: number, z: number): Vec<3, 'f64'>;
export function vec3<P extends Precision>(x: number, y: number, z: number, scalar: Scalar<P>): Vec<3, P>;
export function vec3(x: number, y: number, z: number, scalar: Scalar = f64): Vec<3> {
  return new Vec(scalar, 3, [x, y, z]);
}

export function vec4(x: number, y: number, z: number, w: number): Vec<4, 'f64'>;
export function vec4<P extends Precision>(x: number, y: number, z: number, w: number, scalar: Scalar<P>): Vec<4, P>;
export function vec4(x: number, y: number, z: number, w: number, scalar: Scalar = f64): Vec<4> {
  return new Vec(scalar, 4, [x, y, z, w]);
}

/** Builds a vector of `size` components; throws RangeError on a length mismatch. */
export function vecFromArray<N extends Dim>(size: N, values: ArrayLike<number>): Vec<N, 'f64'>;
export function vecFromArray<N extends Dim, P extends Precision>(size: N, values: ArrayLike<number>, scalar: Scalar<P>): Vec<N, P>;
export function vecFromArray<N extends Dim>(size: N, values: ArrayLike<number>, scalar: Scalar = f64): Vec<N> {
  return new Vec(scalar, size, values);
}

/** Vector with every component set to `value`. */
export function splat<N extends Dim>(size: N, value: number): Vec<N, 'f64'>;
export function splat<N extends Dim, P extends Precision>(size: N, value: number, scalar: Scalar<P>): Vec<N, P>;
export function splat<N extends Dim>(size: N, value: number, scalar: Scalar = f64): Vec<N> {
  return new Vec(scalar, size, new Array<number>(size).fill(value));
}

export function isVecOfSize<N extends Dim, P extends Precision>(v: Vec<Dim, P>, size: N): v is Vec<N, P> {
  return v.size === size;
}
